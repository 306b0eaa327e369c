/*
 * Copyright 2019-2020, Offchain Labs, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *    http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { BigNumber, BigNumberish } from '@ethersproject/bignumber'
import { constants } from 'ethers'
import {
  arrayify,
  getAddress,
  hexConcat,
  hexDataLength,
  hexlify,
  keccak256,
  solidityPack,
} from 'ethers/lib/utils'
import { HostChain, Journaled } from '../chain/hostChain'
import { IOwnable } from '../rollup/rollupMock'
import {
  DEFAULT_MAX_DATA_SIZE,
  DONT_CARE_SEQUENCE_NUMBER,
  KEYSET_HASH_PREFIX,
  MAX_KEYSET_SIZE,
  MAX_UINT64,
} from '../libraries/constants'
import {
  AlreadyValidDASKeyset,
  BadMaxTimeVariation,
  BadSequencerNumber,
  DelayedBackwards,
  DelayedTooFar,
  DelayProofRequired,
  Deprecated,
  ExtraGasNotUint64,
  ForceIncludeBlockTooSoon,
  ForceIncludeTimeTooSoon,
  IncorrectMessagePreimage,
  KeysetTooLarge,
  NoSuchKeyset,
  NotBatchPoster,
  NotBatchPosterManager,
  NotCodelessOrigin,
  NotDelayBufferable,
  NotDelayedFarEnough,
  NotOwner,
  RollupNotChanged,
} from '../libraries/errors'
import {
  DelayBuffer,
  isDelayBufferable,
  validateBufferConfig,
} from './delayBuffer'
import {
  formBlobDataHash,
  formCallDataHash,
  formEmptyDataHash,
  FormedDataHash,
  HashFormingContext,
} from './headerForm'
import { IBridge } from './iBridge'
import { accumulateInboxMessage, messageHash } from './messages'
import { verifyDelayProof, verifyResyncProof } from './syncProof'
import {
  BatchDataLocation,
  BufferData,
  Caller,
  DelayConfig,
  DelayProof,
  EnqueueResult,
  Loose,
  MaxTimeVariation,
  Receipt,
  ReplenishRate,
  ResyncProof,
  SyncValidity,
} from './types'

export type KeysetInfo = {
  isValidKeyset: boolean
  creationBlock: BigNumber
}

export type BlobOverrides = {
  blobHashes?: string[]
}

/** Ids carried by `OwnerFunctionCalled`, one per privileged setter. */
export enum OwnerFunction {
  SetMaxTimeVariation = 0,
  SetIsBatchPoster = 1,
  SetValidKeyset = 2,
  InvalidateKeysetHash = 3,
  SetIsSequencer = 4,
  SetBatchPosterManager = 5,
  UpdateRollupAddress = 6,
}

const inUint64Range = (value: BigNumber) => value.gte(0) && value.lte(MAX_UINT64)

export const toMaxTimeVariation = (
  loose: Loose<MaxTimeVariation>
): MaxTimeVariation => {
  const variation = {
    delayBlocks: BigNumber.from(loose.delayBlocks),
    futureBlocks: BigNumber.from(loose.futureBlocks),
    delaySeconds: BigNumber.from(loose.delaySeconds),
    futureSeconds: BigNumber.from(loose.futureSeconds),
  }
  if (!Object.values(variation).every(inUint64Range)) {
    throw new BadMaxTimeVariation()
  }
  return variation
}

export const toReplenishRate = (loose: Loose<ReplenishRate>): ReplenishRate => ({
  blocksPerPeriod: BigNumber.from(loose.blocksPerPeriod),
  periodBlocks: BigNumber.from(loose.periodBlocks),
  secondsPerPeriod: BigNumber.from(loose.secondsPerPeriod),
  periodSeconds: BigNumber.from(loose.periodSeconds),
})

export const toDelayConfig = (loose: Loose<DelayConfig>): DelayConfig => ({
  thresholdBlocks: BigNumber.from(loose.thresholdBlocks),
  thresholdSeconds: BigNumber.from(loose.thresholdSeconds),
  maxBufferBlocks: BigNumber.from(loose.maxBufferBlocks),
  maxBufferSeconds: BigNumber.from(loose.maxBufferSeconds),
})

/** Thresholds that switch the delay buffer off. */
export const NOT_DELAY_BUFFERABLE: DelayConfig = {
  thresholdBlocks: MAX_UINT64,
  thresholdSeconds: MAX_UINT64,
  maxBufferBlocks: BigNumber.from(0),
  maxBufferSeconds: BigNumber.from(0),
}

/**
 * Data availability keysets are identified by the hash of their bytes with a
 * domain prefix, top bit flipped so it never collides with a tree root.
 */
export const keysetHash = (keysetBytes: string): string => {
  const hash = arrayify(
    keccak256(hexConcat([KEYSET_HASH_PREFIX, keccak256(keysetBytes)]))
  )
  hash[0] ^= 0x80
  return hexlify(hash)
}

class SequencerInboxState implements Journaled {
  public totalDelayedMessagesRead = BigNumber.from(0)
  public batchPosterManager: string = constants.AddressZero
  public batchPosters = new Set<string>()
  public sequencers = new Set<string>()
  public keysets = new Map<string, KeysetInfo>()

  constructor(
    public rollup: IOwnable,
    public maxTimeVariation: MaxTimeVariation
  ) {}

  public capture(): () => void {
    const snapshot = {
      totalDelayedMessagesRead: this.totalDelayedMessagesRead,
      batchPosterManager: this.batchPosterManager,
      batchPosters: new Set(this.batchPosters),
      sequencers: new Set(this.sequencers),
      keysets: new Map(this.keysets),
      rollup: this.rollup,
      maxTimeVariation: this.maxTimeVariation,
    }
    return () => {
      Object.assign(this, snapshot)
    }
  }
}

type Deployment = {
  chain: HostChain
  bridge: IBridge
  address: string
  state: SequencerInboxState
  buffer: DelayBuffer | undefined
  maxDataSize: number
  isUsingFeeToken: boolean
  deployTimeChainId: number
}

/**
 * Entry point for sequencer batches and forced inclusion of delayed
 * messages. Instances returned by `connect` share one deployment and differ
 * only in who is calling.
 */
export class SequencerInbox {
  public readonly address: string

  private readonly chain: HostChain
  private readonly bridge: IBridge
  private readonly state: SequencerInboxState
  private readonly buffer: DelayBuffer | undefined

  private constructor(
    private readonly deployment: Deployment,
    public readonly runner: Caller
  ) {
    this.address = deployment.address
    this.chain = deployment.chain
    this.bridge = deployment.bridge
    this.state = deployment.state
    this.buffer = deployment.buffer
  }

  public static deploy(
    chain: HostChain,
    bridge: IBridge,
    maxTimeVariation: Loose<MaxTimeVariation>,
    replenishRate: Loose<ReplenishRate>,
    delayConfig: Loose<DelayConfig>,
    maxDataSize = DEFAULT_MAX_DATA_SIZE,
    isUsingFeeToken = false
  ): SequencerInbox {
    const variation = toMaxTimeVariation(maxTimeVariation)
    const config = toDelayConfig(delayConfig)
    const rate = toReplenishRate(replenishRate)
    const address = chain.nextAddress()

    let buffer: DelayBuffer | undefined
    if (isDelayBufferable(config)) {
      validateBufferConfig(config, rate, variation)
      buffer = new DelayBuffer(chain, address, config, rate)
    }

    const state = new SequencerInboxState(bridge.rollup(), variation)
    chain.register(state)

    return new SequencerInbox(
      {
        chain,
        bridge,
        address,
        state,
        buffer,
        maxDataSize,
        isUsingFeeToken,
        deployTimeChainId: chain.chainId,
      },
      { sender: constants.AddressZero, origin: constants.AddressZero }
    )
  }

  /**
   * A view of this inbox called by `sender` in a transaction signed by
   * `origin`. They differ when a contract forwards the call.
   */
  public connect(sender: string, origin: string = sender): SequencerInbox {
    return new SequencerInbox(this.deployment, {
      sender: getAddress(sender),
      origin: getAddress(origin),
    })
  }

  // queries

  public get isDelayBufferable(): boolean {
    return this.buffer !== undefined
  }

  public get maxDataSize(): number {
    return this.deployment.maxDataSize
  }

  public get isUsingFeeToken(): boolean {
    return this.deployment.isUsingFeeToken
  }

  public rollup(): IOwnable {
    return this.state.rollup
  }

  public totalDelayedMessagesRead(): BigNumber {
    return this.state.totalDelayedMessagesRead
  }

  public batchCount(): BigNumber {
    return this.bridge.sequencerMessageCount()
  }

  public inboxAccs(index: BigNumberish): string {
    return this.bridge.sequencerInboxAccs(index)
  }

  public isBatchPoster(address: string): boolean {
    return this.state.batchPosters.has(getAddress(address))
  }

  public isSequencer(address: string): boolean {
    return this.state.sequencers.has(getAddress(address))
  }

  public batchPosterManager(): string {
    return this.state.batchPosterManager
  }

  public isValidKeysetHash(keysetHash: string): boolean {
    return this.state.keysets.get(hexlify(keysetHash))?.isValidKeyset ?? false
  }

  public getKeysetCreationBlock(keysetHash: string): BigNumber {
    const info = this.state.keysets.get(hexlify(keysetHash))
    if (info === undefined || info.creationBlock.isZero()) {
      throw new NoSuchKeyset(hexlify(keysetHash))
    }
    return info.creationBlock
  }

  public dasKeySetInfo(keysetHash: string): KeysetInfo {
    return (
      this.state.keysets.get(hexlify(keysetHash)) ?? {
        isValidKeyset: false,
        creationBlock: BigNumber.from(0),
      }
    )
  }

  /**
   * The configured bounds, or the narrowest possible ones once the host
   * chain id no longer matches the one seen at deployment.
   */
  public maxTimeVariation(): MaxTimeVariation {
    if (this.chain.chainId !== this.deployment.deployTimeChainId) {
      const one = BigNumber.from(1)
      return {
        delayBlocks: one,
        futureBlocks: one,
        delaySeconds: one,
        futureSeconds: one,
      }
    }
    return { ...this.state.maxTimeVariation }
  }

  /** Bounds a batch from the connected caller would be formed with now. */
  public effectiveMaxTimeVariation(): MaxTimeVariation {
    return this.timeVariationFor(this.runner.sender)
  }

  public bufferData(): BufferData {
    return this.requireBuffer().bufferData()
  }

  public syncValidity(caller: string = this.runner.sender): SyncValidity {
    return this.requireBuffer().syncValidity(caller)
  }

  public isSynced(caller: string = this.runner.sender): boolean {
    return this.buffer?.isSynced(caller) ?? false
  }

  /**
   * The first block at which a delayed message sent in `blockNumber` can be
   * force included, given the buffer as it stands.
   */
  public forceInclusionDeadline(blockNumber: BigNumberish): BigNumber {
    const strict = this.maxTimeVariation()
    if (this.buffer === undefined || this.chainIdChanged()) {
      return BigNumber.from(blockNumber).add(strict.delayBlocks)
    }
    return this.buffer.forceInclusionDeadline(blockNumber, strict.delayBlocks)
  }

  // batch submission

  public addSequencerL2BatchFromOrigin(
    sequenceNumber: BigNumberish,
    data: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish
  ): Receipt {
    return this.send(() => {
      this.onlyCodelessOrigin()
      this.onlyBatchPoster()
      this.checkDelayProofRequired(afterDelayedMessagesRead)
      const formed = formCallDataHash(
        this.hashContext(),
        data,
        afterDelayedMessagesRead
      )
      this.submitBatch(formed, {
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount,
        location: BatchDataLocation.TxInput,
        spendingReport: hexDataLength(data) > 0,
      })
    })
  }

  public addSequencerL2BatchFromOriginDelayProof(
    sequenceNumber: BigNumberish,
    data: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish,
    delayProof: DelayProof
  ): Receipt {
    return this.send(() => {
      this.onlyCodelessOrigin()
      this.onlyBatchPoster()
      this.delayProofUpdate(afterDelayedMessagesRead, delayProof)
      const formed = formCallDataHash(
        this.hashContext(),
        data,
        afterDelayedMessagesRead
      )
      this.submitBatch(formed, {
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount,
        location: BatchDataLocation.TxInput,
        spendingReport: hexDataLength(data) > 0,
      })
    })
  }

  public addSequencerL2BatchFromOriginResyncProof(
    sequenceNumber: BigNumberish,
    data: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish,
    resyncProof: ResyncProof
  ): Receipt {
    return this.send(() => {
      this.onlyCodelessOrigin()
      this.onlyBatchPoster()
      this.checkProofPath(afterDelayedMessagesRead)
      const formed = formCallDataHash(
        this.hashContext(),
        data,
        afterDelayedMessagesRead
      )
      const result = this.submitBatch(formed, {
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount,
        location: BatchDataLocation.TxInput,
        spendingReport: hexDataLength(data) > 0,
      })
      this.resyncProofUpdate(result.beforeAcc, resyncProof)
    })
  }

  /**
   * Batch posted through a contract, or by the rollup itself. The data is
   * not in the transaction input, so it is repeated in `SequencerBatchData`
   * and no spending report is filed.
   */
  public addSequencerL2Batch(
    sequenceNumber: BigNumberish,
    data: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish
  ): Receipt {
    return this.send(() => {
      if (
        !this.isBatchPoster(this.runner.sender) &&
        this.runner.sender !== getAddress(this.state.rollup.address)
      ) {
        throw new NotBatchPoster()
      }
      this.checkDelayProofRequired(afterDelayedMessagesRead)
      const formed = formCallDataHash(
        this.hashContext(),
        data,
        afterDelayedMessagesRead
      )
      const result = this.submitBatch(formed, {
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount,
        location: BatchDataLocation.SeparateBatchEvent,
        spendingReport: false,
      })
      this.chain.emit(this.address, {
        event: 'SequencerBatchData',
        args: { batchSequenceNumber: result.seqMessageIndex, data: hexlify(data) },
      })
    })
  }

  public addSequencerL2BatchFromBlobs(
    sequenceNumber: BigNumberish,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish,
    overrides: BlobOverrides = {}
  ): Receipt {
    return this.send(() => {
      this.onlyBatchPoster()
      this.checkDelayProofRequired(afterDelayedMessagesRead)
      this.submitBlobBatch(
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount
      )
    }, overrides)
  }

  public addSequencerL2BatchFromBlobsDelayProof(
    sequenceNumber: BigNumberish,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish,
    delayProof: DelayProof,
    overrides: BlobOverrides = {}
  ): Receipt {
    return this.send(() => {
      this.onlyBatchPoster()
      this.delayProofUpdate(afterDelayedMessagesRead, delayProof)
      this.submitBlobBatch(
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount
      )
    }, overrides)
  }

  public addSequencerL2BatchFromBlobsResyncProof(
    sequenceNumber: BigNumberish,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish,
    resyncProof: ResyncProof,
    overrides: BlobOverrides = {}
  ): Receipt {
    return this.send(() => {
      this.onlyBatchPoster()
      this.checkProofPath(afterDelayedMessagesRead)
      const result = this.submitBlobBatch(
        sequenceNumber,
        afterDelayedMessagesRead,
        prevMessageCount,
        newMessageCount
      )
      this.resyncProofUpdate(result.beforeAcc, resyncProof)
    }, overrides)
  }

  /** Retired entry point without sub-message counts. */
  public addSequencerL2BatchFromOriginLegacy(
    _sequenceNumber: BigNumberish,
    _data: string,
    _afterDelayedMessagesRead: BigNumberish,
    _gasRefunder: string
  ): Receipt {
    return this.send(() => {
      throw new Deprecated()
    })
  }

  /**
   * Includes every delayed message up to `totalDelayedMessagesRead` once the
   * last of them has aged past the delay window. Anyone may call it.
   */
  public forceInclusion(
    totalDelayedMessagesRead: BigNumberish,
    kind: number,
    l1BlockAndTime: [BigNumberish, BigNumberish],
    baseFeeL1: BigNumberish,
    sender: string,
    messageDataHash: string
  ): Receipt {
    return this.send(() => {
      const count = BigNumber.from(totalDelayedMessagesRead)
      if (count.lte(this.state.totalDelayedMessagesRead)) {
        throw new DelayedBackwards()
      }
      if (count.gt(this.bridge.delayedMessageCount())) {
        throw new DelayedTooFar()
      }

      const blockNumber = BigNumber.from(l1BlockAndTime[0])
      const timestamp = BigNumber.from(l1BlockAndTime[1])
      const hash = messageHash({
        kind,
        sender,
        blockNumber,
        timestamp,
        inboxSeqNum: count.sub(1),
        baseFeeL1,
        messageDataHash,
      })
      const prevDelayedAcc = count.gt(1)
        ? this.bridge.delayedInboxAccs(count.sub(2))
        : constants.HashZero
      if (
        accumulateInboxMessage(prevDelayedAcc, hash) !==
        this.bridge.delayedInboxAccs(count.sub(1))
      ) {
        throw new IncorrectMessagePreimage()
      }

      // the deadline is checked against the buffer as of this message
      this.buffer?.update(blockNumber, timestamp)
      const window = this.forceInclusionWindow()
      if (blockNumber.add(window.delayBlocks).gte(this.chain.blockNumber)) {
        throw new ForceIncludeBlockTooSoon()
      }
      if (timestamp.add(window.delaySeconds).gte(this.chain.timestamp)) {
        throw new ForceIncludeTimeTooSoon()
      }

      const formed = formEmptyDataHash(
        { ...this.hashContext(), timeVariation: window },
        count
      )
      const reported = this.bridge.sequencerReportedSubMessageCount()
      this.submitBatch(formed, {
        sequenceNumber: DONT_CARE_SEQUENCE_NUMBER,
        afterDelayedMessagesRead: count,
        prevMessageCount: reported,
        newMessageCount: reported,
        location: BatchDataLocation.NoData,
        spendingReport: false,
      })
    })
  }

  // administration

  public setMaxTimeVariation(variation: Loose<MaxTimeVariation>): Receipt {
    return this.send(() => {
      this.onlyRollupOwner()
      const next = toMaxTimeVariation(variation)
      if (
        this.buffer !== undefined &&
        (next.delayBlocks.gt(this.buffer.config.maxBufferBlocks) ||
          next.delaySeconds.gt(this.buffer.config.maxBufferSeconds))
      ) {
        throw new BadMaxTimeVariation()
      }
      this.state.maxTimeVariation = next
      this.ownerFunctionCalled(OwnerFunction.SetMaxTimeVariation)
    })
  }

  public setIsBatchPoster(address: string, isBatchPoster: boolean): Receipt {
    return this.send(() => {
      this.onlyRollupOwnerOrBatchPosterManager()
      toggle(this.state.batchPosters, address, isBatchPoster)
      this.ownerFunctionCalled(OwnerFunction.SetIsBatchPoster)
    })
  }

  public setIsSequencer(address: string, isSequencer: boolean): Receipt {
    return this.send(() => {
      this.onlyRollupOwnerOrBatchPosterManager()
      toggle(this.state.sequencers, address, isSequencer)
      this.ownerFunctionCalled(OwnerFunction.SetIsSequencer)
    })
  }

  public setBatchPosterManager(newBatchPosterManager: string): Receipt {
    return this.send(() => {
      this.onlyRollupOwner()
      this.state.batchPosterManager = getAddress(newBatchPosterManager)
      this.chain.emit(this.address, {
        event: 'BatchPosterManagerSet',
        args: { newBatchPosterManager: this.state.batchPosterManager },
      })
      this.ownerFunctionCalled(OwnerFunction.SetBatchPosterManager)
    })
  }

  public setValidKeyset(keysetBytes: string): Receipt {
    return this.send(() => {
      this.onlyRollupOwner()
      const hash = keysetHash(keysetBytes)
      if (this.isValidKeysetHash(hash)) throw new AlreadyValidDASKeyset(hash)
      if (hexDataLength(keysetBytes) >= MAX_KEYSET_SIZE) {
        throw new KeysetTooLarge()
      }
      this.state.keysets.set(hash, {
        isValidKeyset: true,
        creationBlock: BigNumber.from(this.chain.blockNumber),
      })
      this.chain.emit(this.address, {
        event: 'SetValidKeyset',
        args: { keysetHash: hash, keysetBytes: hexlify(keysetBytes) },
      })
      this.ownerFunctionCalled(OwnerFunction.SetValidKeyset)
    })
  }

  public invalidateKeysetHash(keysetHash: string): Receipt {
    return this.send(() => {
      this.onlyRollupOwner()
      const hash = hexlify(keysetHash)
      const info = this.state.keysets.get(hash)
      if (info === undefined || !info.isValidKeyset) {
        throw new NoSuchKeyset(hash)
      }
      // the creation block stays so the keyset bytes can still be found
      this.state.keysets.set(hash, { ...info, isValidKeyset: false })
      this.chain.emit(this.address, {
        event: 'InvalidateKeyset',
        args: { keysetHash: hash },
      })
      this.ownerFunctionCalled(OwnerFunction.InvalidateKeysetHash)
    })
  }

  /** Follows the bridge to a new rollup once its owner asks for it. */
  public updateRollupAddress(): Receipt {
    return this.send(() => {
      this.onlyRollupOwner()
      const rollup = this.bridge.rollup()
      if (getAddress(rollup.address) === getAddress(this.state.rollup.address)) {
        throw new RollupNotChanged()
      }
      this.state.rollup = rollup
      this.chain.emit(this.address, {
        event: 'RollupUpdated',
        args: { rollup: getAddress(rollup.address) },
      })
      this.ownerFunctionCalled(OwnerFunction.UpdateRollupAddress)
    })
  }

  // internals

  private send(fn: () => void, overrides: BlobOverrides = {}): Receipt {
    return this.chain.transact(this.runner.origin, fn, overrides).receipt
  }

  private chainIdChanged(): boolean {
    return this.chain.chainId !== this.deployment.deployTimeChainId
  }

  private timeVariationFor(caller: string): MaxTimeVariation {
    const strict = this.maxTimeVariation()
    if (this.buffer === undefined || this.chainIdChanged()) return strict
    return this.buffer.effectiveTimeVariation(strict, caller)
  }

  private forceInclusionWindow(): MaxTimeVariation {
    const strict = this.maxTimeVariation()
    if (this.buffer === undefined || this.chainIdChanged()) return strict
    return this.buffer.bufferedTimeVariation(strict)
  }

  private hashContext(): HashFormingContext {
    return {
      timeVariation: this.timeVariationFor(this.runner.sender),
      blockNumber: this.chain.blockNumber,
      timestamp: this.chain.timestamp,
      baseFee: this.chain.baseFee,
      blobBaseFee: this.chain.getBlobBaseFee(),
      maxDataSize: this.deployment.maxDataSize,
      isValidKeysetHash: hash => this.isValidKeysetHash(hash),
    }
  }

  private requireBuffer(): DelayBuffer {
    if (this.buffer === undefined) throw new NotDelayBufferable()
    return this.buffer
  }

  private checkDelayProofRequired(afterDelayedMessagesRead: BigNumberish): void {
    if (
      this.buffer !== undefined &&
      this.state.totalDelayedMessagesRead.lt(afterDelayedMessagesRead) &&
      !this.buffer.isSynced(this.runner.sender)
    ) {
      throw new DelayProofRequired()
    }
  }

  private checkProofPath(afterDelayedMessagesRead: BigNumberish): DelayBuffer {
    const buffer = this.requireBuffer()
    if (this.state.totalDelayedMessagesRead.gte(afterDelayedMessagesRead)) {
      throw new NotDelayedFarEnough()
    }
    if (this.bridge.delayedMessageCount().lt(afterDelayedMessagesRead)) {
      throw new DelayedTooFar()
    }
    return buffer
  }

  /** Proves the first unread delayed message and brings the buffer up to it. */
  private delayProofUpdate(
    afterDelayedMessagesRead: BigNumberish,
    proof: DelayProof
  ): void {
    const buffer = this.checkProofPath(afterDelayedMessagesRead)
    verifyDelayProof(this.bridge, this.state.totalDelayedMessagesRead, proof)
    this.syncBuffer(buffer, proof)
  }

  /**
   * Proves the last delayed message read by the previous batch, which only
   * the enqueue that produced `beforeAcc` can pin down.
   */
  private resyncProofUpdate(beforeAcc: string, proof: ResyncProof): void {
    verifyResyncProof(beforeAcc, proof)
    this.syncBuffer(this.requireBuffer(), proof)
  }

  private syncBuffer(buffer: DelayBuffer, proof: DelayProof): void {
    const { blockNumber, timestamp } = proof.delayedMessage
    buffer.update(blockNumber, timestamp)
    buffer.recordSync(this.runner.sender, blockNumber, timestamp)
  }

  private submitBlobBatch(
    sequenceNumber: BigNumberish,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish
  ): EnqueueResult {
    const formed = formBlobDataHash(
      this.hashContext(),
      this.chain.getDataHashes(),
      afterDelayedMessagesRead
    )
    return this.submitBatch(formed, {
      sequenceNumber,
      afterDelayedMessagesRead,
      prevMessageCount,
      newMessageCount,
      location: BatchDataLocation.Blob,
      spendingReport: this.runner.sender === this.runner.origin,
    })
  }

  private submitBatch(
    formed: FormedDataHash,
    batch: {
      sequenceNumber: BigNumberish
      afterDelayedMessagesRead: BigNumberish
      prevMessageCount: BigNumberish
      newMessageCount: BigNumberish
      location: BatchDataLocation
      spendingReport: boolean
    }
  ): EnqueueResult {
    const afterRead = BigNumber.from(batch.afterDelayedMessagesRead)
    if (afterRead.lt(this.state.totalDelayedMessagesRead)) {
      throw new DelayedBackwards()
    }
    if (afterRead.gt(this.bridge.delayedMessageCount())) {
      throw new DelayedTooFar()
    }

    const result = this.bridge.enqueueSequencerMessage(
      this.address,
      formed.dataHash,
      afterRead,
      batch.prevMessageCount,
      batch.newMessageCount
    )
    this.state.totalDelayedMessagesRead = afterRead

    // with a fee token the poster is not reimbursed in the native currency
    if (batch.spendingReport && !this.deployment.isUsingFeeToken) {
      this.submitBatchSpendingReport(
        formed.dataHash,
        result.seqMessageIndex,
        formed.blobGas
      )
    }

    const sequenceNumber = BigNumber.from(batch.sequenceNumber)
    if (
      !result.seqMessageIndex.eq(sequenceNumber) &&
      !sequenceNumber.eq(DONT_CARE_SEQUENCE_NUMBER)
    ) {
      throw new BadSequencerNumber(result.seqMessageIndex, sequenceNumber)
    }

    this.chain.emit(this.address, {
      event: 'SequencerBatchDelivered',
      args: {
        batchSequenceNumber: result.seqMessageIndex,
        beforeAcc: result.beforeAcc,
        afterAcc: result.acc,
        delayedAcc: result.delayedAcc,
        afterDelayedMessagesRead: afterRead,
        timeBounds: formed.timeBounds,
        dataLocation: batch.location,
      },
    })
    return result
  }

  private submitBatchSpendingReport(
    dataHash: string,
    seqMessageIndex: BigNumber,
    extraGas: BigNumber
  ): void {
    if (extraGas.gt(MAX_UINT64)) throw new ExtraGasNotUint64()
    const batchPoster = this.runner.sender
    const spendingReportMsg = solidityPack(
      ['uint256', 'address', 'bytes32', 'uint256', 'uint256', 'uint64'],
      [
        this.chain.timestamp,
        batchPoster,
        dataHash,
        seqMessageIndex,
        this.chain.baseFee,
        extraGas,
      ]
    )
    const messageNum = this.bridge.submitBatchSpendingReport(
      this.address,
      batchPoster,
      keccak256(spendingReportMsg)
    )
    this.chain.emit(this.address, {
      event: 'InboxMessageDelivered',
      args: { messageNum, data: spendingReportMsg },
    })
  }

  private ownerFunctionCalled(id: OwnerFunction): void {
    this.chain.emit(this.address, { event: 'OwnerFunctionCalled', args: { id } })
  }

  private onlyCodelessOrigin(): void {
    if (this.runner.sender !== this.runner.origin) throw new NotCodelessOrigin()
  }

  private onlyBatchPoster(): void {
    if (!this.isBatchPoster(this.runner.sender)) throw new NotBatchPoster()
  }

  private onlyRollupOwner(): void {
    const owner = this.state.rollup.owner()
    if (this.runner.sender !== getAddress(owner)) {
      throw new NotOwner(this.runner.sender, owner)
    }
  }

  private onlyRollupOwnerOrBatchPosterManager(): void {
    const owner = this.state.rollup.owner()
    if (
      this.runner.sender !== getAddress(owner) &&
      this.runner.sender !== this.state.batchPosterManager
    ) {
      throw new NotBatchPosterManager(this.runner.sender)
    }
  }
}

const toggle = (set: Set<string>, address: string, enabled: boolean): void => {
  if (enabled) set.add(getAddress(address))
  else set.delete(getAddress(address))
}
