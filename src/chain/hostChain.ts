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
import { getAddress, getContractAddress } from 'ethers/lib/utils'
import {
  EventArgs,
  EventName,
  InboxEvent,
  Log,
  Receipt,
} from '../bridge/types'

/** State that must roll back when a transaction fails. */
export interface Journaled {
  /** Returns a function restoring the state as of this call. */
  capture(): () => void
}

export type HostChainOptions = {
  chainId?: number
  blockNumber?: number
  timestamp?: number
  baseFee?: BigNumberish
  blobBaseFee?: BigNumberish
}

export type TransactionOptions = {
  blobHashes?: string[]
}

const DEPLOYER = '0x00000000000000000000000000000000000000DE'

/**
 * The parent chain the inbox lives on: a block clock, the fee market the
 * batch poster pays into, and the execution context of the transaction that
 * is being processed. Transactions are applied one at a time.
 */
export class HostChain {
  public chainId: number
  public blockNumber: number
  public timestamp: number
  public baseFee: BigNumber
  public blobBaseFee: BigNumber

  private readonly stores: Journaled[] = []
  private readonly snapshots: (() => void)[][] = []
  private deployNonce = 0
  private pendingLogs: Log[] | undefined
  private txBlobHashes: string[] = []

  constructor(options: HostChainOptions = {}) {
    this.chainId = options.chainId ?? 31337
    this.blockNumber = options.blockNumber ?? 1
    this.timestamp = options.timestamp ?? 1_700_000_000
    this.baseFee = BigNumber.from(options.baseFee ?? 1_000_000_000)
    this.blobBaseFee = BigNumber.from(options.blobBaseFee ?? 1)
  }

  public register(store: Journaled): void {
    this.stores.push(store)
  }

  /** Deterministic address for a newly created component. */
  public nextAddress(): string {
    return getAddress(
      getContractAddress({ from: DEPLOYER, nonce: this.deployNonce++ })
    )
  }

  public mineBlocks(count: number, timeDiffPerBlock = 14): void {
    this.blockNumber += count
    this.timestamp += count * timeDiffPerBlock
  }

  public snapshot(): number {
    this.snapshots.push(this.captureAll())
    return this.snapshots.length - 1
  }

  public revert(id: number): void {
    const restores = this.snapshots[id]
    if (restores === undefined) throw new Error(`Unknown snapshot ${id}`)
    restores.forEach(restore => restore())
    this.snapshots.length = id
  }

  /** Blob versioned hashes attached to the transaction being executed. */
  public getDataHashes(): string[] {
    return [...this.txBlobHashes]
  }

  public getBlobBaseFee(): BigNumber {
    return this.blobBaseFee
  }

  public emit(address: string, event: InboxEvent): void {
    if (this.pendingLogs === undefined) {
      throw new Error('Events can only be emitted inside a transaction')
    }
    this.pendingLogs.push({ ...event, address })
  }

  public get inTransaction(): boolean {
    return this.pendingLogs !== undefined
  }

  /**
   * Runs `fn` as a single transaction sent by `from`. Either every journaled
   * store keeps the changes made by `fn`, or `fn` throws and all of them are
   * restored; nothing in between is observable.
   */
  public transact<T>(
    from: string,
    fn: () => T,
    options: TransactionOptions = {}
  ): { result: T; receipt: Receipt } {
    if (this.pendingLogs !== undefined) {
      // nested call from a component, already inside the outer transaction
      const result = fn()
      return {
        result,
        receipt: this.receipt(from, []),
      }
    }

    const restores = this.captureAll()
    this.pendingLogs = []
    this.txBlobHashes = options.blobHashes ?? []
    try {
      const result = fn()
      return { result, receipt: this.receipt(from, this.pendingLogs) }
    } catch (err) {
      restores.forEach(restore => restore())
      throw err
    } finally {
      this.pendingLogs = undefined
      this.txBlobHashes = []
    }
  }

  private receipt(from: string, logs: Log[]): Receipt {
    return {
      from,
      blockNumber: this.blockNumber,
      timestamp: this.timestamp,
      logs,
    }
  }

  private captureAll(): (() => void)[] {
    return this.stores.map(store => store.capture())
  }
}

const isEvent = <E extends EventName>(
  log: Log,
  name: E
): log is Extract<Log, { event: E }> => log.event === name

/** Arguments of every `name` event in the receipt, in emission order. */
export const getEvents = <E extends EventName>(
  receipt: Receipt,
  name: E
): EventArgs<E>[] =>
  receipt.logs.flatMap(log => (isEvent(log, name) ? [log.args] : []))
