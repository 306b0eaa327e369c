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
import { getAddress } from 'ethers/lib/utils'
import { HostChain, Journaled } from '../chain/hostChain'
import { MAX_UINT64 } from '../libraries/constants'
import { BadBufferConfig } from '../libraries/errors'
import {
  BufferData,
  DelayConfig,
  MaxTimeVariation,
  ReplenishRate,
  SyncValidity,
} from './types'

const ZERO = BigNumber.from(0)

const min = (a: BigNumber, b: BigNumber) => (a.lt(b) ? a : b)
const max = (a: BigNumber, b: BigNumber) => (a.gt(b) ? a : b)
const saturatingSub = (a: BigNumber, b: BigNumber) => (a.gt(b) ? a.sub(b) : ZERO)

/**
 * One dimension (blocks or seconds) of the buffer update. The previous
 * message's lateness beyond the threshold is charged, capped at the time
 * elapsed since it, then whole replenish periods are credited. Both the
 * charge and the credit round down; the result is clamped to [0, max].
 */
export const calcBuffer = (params: {
  start: BigNumber
  end: BigNumber
  buffer: BigNumber
  prevDelay: BigNumber
  threshold: BigNumber
  max: BigNumber
  amountPerPeriod: BigNumber
  period: BigNumber
}): BigNumber => {
  const elapsed = saturatingSub(params.end, params.start)
  const unexpectedDelay = min(
    saturatingSub(params.prevDelay, params.threshold),
    elapsed
  )
  const depleted = saturatingSub(params.buffer, unexpectedDelay)
  const replenished = depleted.add(
    elapsed.div(params.period).mul(params.amountPerPeriod)
  )
  return min(replenished, params.max)
}

export const isDelayBufferable = (config: DelayConfig): boolean =>
  !config.thresholdBlocks.eq(MAX_UINT64) ||
  !config.thresholdSeconds.eq(MAX_UINT64)

export const validateBufferConfig = (
  config: DelayConfig,
  rate: ReplenishRate,
  strict: MaxTimeVariation
): void => {
  const valid =
    !config.thresholdBlocks.eq(MAX_UINT64) &&
    !config.thresholdSeconds.eq(MAX_UINT64) &&
    config.thresholdBlocks.gt(0) &&
    config.thresholdSeconds.gt(0) &&
    config.thresholdBlocks.lte(config.maxBufferBlocks) &&
    config.thresholdSeconds.lte(config.maxBufferSeconds) &&
    config.maxBufferBlocks.gte(strict.delayBlocks) &&
    config.maxBufferSeconds.gte(strict.delaySeconds) &&
    config.maxBufferBlocks.lte(MAX_UINT64) &&
    config.maxBufferSeconds.lte(MAX_UINT64) &&
    rate.periodBlocks.gt(0) &&
    rate.periodSeconds.gt(0)
  if (!valid) throw new BadBufferConfig()
}

/**
 * Slack that widens the force inclusion window beyond the strict delay.
 * The buffer starts full, is depleted by delayed messages that were
 * sequenced later than the threshold and replenishes over time. Posters that
 * have proven they are caught up while the buffer is full get a cached sync
 * validity that lets them skip proofs until it expires.
 */
export class DelayBuffer implements Journaled {
  private data: BufferData
  private syncCache = new Map<string, SyncValidity>()
  private readonly genesisValidity: SyncValidity

  constructor(
    private readonly chain: HostChain,
    private readonly owner: string,
    public readonly config: DelayConfig,
    public readonly rate: ReplenishRate
  ) {
    this.data = {
      bufferBlocks: config.maxBufferBlocks,
      bufferSeconds: config.maxBufferSeconds,
      prevBlockNumber: BigNumber.from(chain.blockNumber),
      prevTimestamp: BigNumber.from(chain.timestamp),
      prevDelayBlocks: ZERO,
      prevDelaySeconds: ZERO,
    }
    // nothing can be late yet, so every poster starts synced
    this.genesisValidity = this.validityFrom(
      this.data.prevBlockNumber,
      this.data.prevTimestamp
    )
    chain.register(this)
  }

  public bufferData(): BufferData {
    return { ...this.data }
  }

  public syncValidity(caller: string): SyncValidity {
    return this.syncCache.get(getAddress(caller)) ?? this.genesisValidity
  }

  /** The buffer as it would be after an update for a message at this time. */
  public calcPendingBuffer(
    blockNumber: BigNumberish,
    timestamp: BigNumberish
  ): { bufferBlocks: BigNumber; bufferSeconds: BigNumber } {
    return {
      bufferBlocks: calcBuffer({
        start: this.data.prevBlockNumber,
        end: BigNumber.from(blockNumber),
        buffer: this.data.bufferBlocks,
        prevDelay: this.data.prevDelayBlocks,
        threshold: this.config.thresholdBlocks,
        max: this.config.maxBufferBlocks,
        amountPerPeriod: this.rate.blocksPerPeriod,
        period: this.rate.periodBlocks,
      }),
      bufferSeconds: calcBuffer({
        start: this.data.prevTimestamp,
        end: BigNumber.from(timestamp),
        buffer: this.data.bufferSeconds,
        prevDelay: this.data.prevDelaySeconds,
        threshold: this.config.thresholdSeconds,
        max: this.config.maxBufferSeconds,
        amountPerPeriod: this.rate.secondsPerPeriod,
        period: this.rate.periodSeconds,
      }),
    }
  }

  /**
   * Applies the pending depletion and replenishment as of the delayed
   * message at (`blockNumber`, `timestamp`), then makes that message the
   * reference for the next update, with its delay measured to now.
   */
  public update(blockNumber: BigNumberish, timestamp: BigNumberish): void {
    const pending = this.calcPendingBuffer(blockNumber, timestamp)
    const block = BigNumber.from(blockNumber)
    const time = BigNumber.from(timestamp)
    this.data = {
      ...pending,
      prevBlockNumber: block,
      prevTimestamp: time,
      prevDelayBlocks: saturatingSub(BigNumber.from(this.chain.blockNumber), block),
      prevDelaySeconds: saturatingSub(BigNumber.from(this.chain.timestamp), time),
    }
    this.chain.emit(this.owner, {
      event: 'BufferUpdated',
      args: this.bufferData(),
    })
  }

  /**
   * Records that `caller` proved the delayed message at (`blockNumber`,
   * `timestamp`). Any message after it that is sequenced before the expiry
   * cannot be later than the threshold.
   */
  public recordSync(
    caller: string,
    blockNumber: BigNumberish,
    timestamp: BigNumberish
  ): void {
    const validity = this.validityFrom(
      BigNumber.from(blockNumber),
      BigNumber.from(timestamp)
    )
    this.syncCache.set(getAddress(caller), validity)
    this.chain.emit(this.owner, {
      event: 'SyncValidityUpdated',
      args: { caller: getAddress(caller), ...validity },
    })
  }

  /**
   * Whether no buffer update could change anything right now: nothing
   * pending would deplete the buffer, it cannot replenish past full, and
   * the caller's sync validity has not expired.
   */
  public isSynced(caller: string): boolean {
    const validity = this.syncValidity(caller)
    return (
      this.isFull() &&
      validity.expiryBlockNumber.gte(this.chain.blockNumber) &&
      validity.expiryTimestamp.gte(this.chain.timestamp)
    )
  }

  public isFull(): boolean {
    const pending = this.calcPendingBuffer(
      this.chain.blockNumber,
      this.chain.timestamp
    )
    return (
      pending.bufferBlocks.eq(this.config.maxBufferBlocks) &&
      pending.bufferSeconds.eq(this.config.maxBufferSeconds) &&
      this.data.bufferBlocks.eq(this.config.maxBufferBlocks) &&
      this.data.bufferSeconds.eq(this.config.maxBufferSeconds)
    )
  }

  /**
   * Delay bounds for `caller`: the full buffer on the synced fast path,
   * otherwise the current buffer, never tighter than the strict bounds.
   */
  public effectiveTimeVariation(
    strict: MaxTimeVariation,
    caller: string
  ): MaxTimeVariation {
    if (this.isSynced(caller)) {
      return {
        ...strict,
        delayBlocks: this.config.maxBufferBlocks,
        delaySeconds: this.config.maxBufferSeconds,
      }
    }
    return this.bufferedTimeVariation(strict)
  }

  /** Bounds from the stored buffer alone, as force inclusion checks them. */
  public bufferedTimeVariation(strict: MaxTimeVariation): MaxTimeVariation {
    return {
      ...strict,
      delayBlocks: max(strict.delayBlocks, this.data.bufferBlocks),
      delaySeconds: max(strict.delaySeconds, this.data.bufferSeconds),
    }
  }

  public forceInclusionDeadline(
    blockNumber: BigNumberish,
    strictDelayBlocks: BigNumber
  ): BigNumber {
    const block = BigNumber.from(blockNumber)
    const { bufferBlocks } = this.calcPendingBuffer(block, this.chain.timestamp)
    return block.add(max(strictDelayBlocks, bufferBlocks))
  }

  public capture(): () => void {
    const data = this.data
    const syncCache = new Map(this.syncCache)
    return () => {
      this.data = data
      this.syncCache = syncCache
    }
  }

  private validityFrom(block: BigNumber, time: BigNumber): SyncValidity {
    return {
      expiryBlockNumber: block.add(this.config.thresholdBlocks),
      expiryTimestamp: time.add(this.config.thresholdSeconds),
    }
  }
}
