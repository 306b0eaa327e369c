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
import { getAddress } from 'ethers/lib/utils'
import { HostChain, Journaled } from '../chain/hostChain'
import { IOwnable } from '../rollup/rollupMock'
import { L1_MESSAGE_TYPE_BATCH_POSTING_REPORT } from '../libraries/constants'
import {
  BadSequencerMessageNumber,
  NotDelayedInbox,
  NotOwner,
  NotSequencerInbox,
} from '../libraries/errors'
import { IBridge } from './iBridge'
import { accumulateInboxMessage, messageHash, sequencerInboxAcc } from './messages'
import { EnqueueResult, Receipt } from './types'

/**
 * In-process ledger holding the delayed and sequencer hash chains.
 */
export class Bridge implements IBridge, Journaled {
  public readonly address: string

  private _rollup: IOwnable
  private _sequencerInbox: string = constants.AddressZero
  private delayedInboxes = new Set<string>()
  private delayedAccs: string[] = []
  private sequencerAccs: string[] = []
  private reportedSubMessageCount = BigNumber.from(0)

  constructor(private readonly chain: HostChain, rollup: IOwnable) {
    this.address = chain.nextAddress()
    this._rollup = rollup
    chain.register(this)
  }

  public rollup(): IOwnable {
    return this._rollup
  }

  public sequencerInbox(): string {
    return this._sequencerInbox
  }

  public allowedDelayedInboxes(inbox: string): boolean {
    return this.delayedInboxes.has(getAddress(inbox))
  }

  public delayedMessageCount(): BigNumber {
    return BigNumber.from(this.delayedAccs.length)
  }

  public sequencerMessageCount(): BigNumber {
    return BigNumber.from(this.sequencerAccs.length)
  }

  public sequencerReportedSubMessageCount(): BigNumber {
    return this.reportedSubMessageCount
  }

  public delayedInboxAccs(index: BigNumberish): string {
    return at(this.delayedAccs, index)
  }

  public sequencerInboxAccs(index: BigNumberish): string {
    return at(this.sequencerAccs, index)
  }

  public setSequencerInbox(sender: string, sequencerInbox: string): Receipt {
    return this.chain.transact(sender, () => {
      this.onlyRollupOwner(sender)
      this._sequencerInbox = getAddress(sequencerInbox)
    }).receipt
  }

  public setDelayedInbox(
    sender: string,
    inbox: string,
    enabled: boolean
  ): Receipt {
    return this.chain.transact(sender, () => {
      this.onlyRollupOwner(sender)
      if (enabled) this.delayedInboxes.add(getAddress(inbox))
      else this.delayedInboxes.delete(getAddress(inbox))
    }).receipt
  }

  public updateRollupAddress(sender: string, rollup: IOwnable): Receipt {
    return this.chain.transact(sender, () => {
      this.onlyRollupOwner(sender)
      this._rollup = rollup
    }).receipt
  }

  /**
   * Called by an allowed delayed inbox on behalf of `from`; the message is
   * stamped with the current block, timestamp and base fee.
   */
  public enqueueDelayedMessage(
    sender: string,
    kind: number,
    from: string,
    messageDataHash: string
  ): BigNumber {
    return this.chain.transact(sender, () => {
      if (!this.allowedDelayedInboxes(sender)) {
        throw new NotDelayedInbox(getAddress(sender))
      }
      return this.addMessageToDelayedAccumulator(
        getAddress(sender),
        kind,
        from,
        messageDataHash
      )
    }).result
  }

  public enqueueSequencerMessage(
    sender: string,
    dataHash: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish
  ): EnqueueResult {
    this.onlySequencerInbox(sender)
    if (!this.reportedSubMessageCount.eq(prevMessageCount)) {
      throw new BadSequencerMessageNumber(
        this.reportedSubMessageCount,
        BigNumber.from(prevMessageCount)
      )
    }
    this.reportedSubMessageCount = BigNumber.from(newMessageCount)

    const seqMessageIndex = BigNumber.from(this.sequencerAccs.length)
    const beforeAcc =
      this.sequencerAccs.length > 0
        ? this.sequencerAccs[this.sequencerAccs.length - 1]
        : constants.HashZero
    const afterRead = BigNumber.from(afterDelayedMessagesRead)
    const delayedAcc = afterRead.gt(0)
      ? this.delayedInboxAccs(afterRead.sub(1))
      : constants.HashZero
    const acc = sequencerInboxAcc({ beforeAcc, dataHash, delayedAcc })
    this.sequencerAccs.push(acc)
    return { seqMessageIndex, beforeAcc, delayedAcc, acc }
  }

  public submitBatchSpendingReport(
    sender: string,
    batchPoster: string,
    dataHash: string
  ): BigNumber {
    this.onlySequencerInbox(sender)
    return this.addMessageToDelayedAccumulator(
      getAddress(sender),
      L1_MESSAGE_TYPE_BATCH_POSTING_REPORT,
      batchPoster,
      dataHash
    )
  }

  public capture(): () => void {
    const rollup = this._rollup
    const sequencerInbox = this._sequencerInbox
    const delayedInboxes = new Set(this.delayedInboxes)
    const delayedAccs = [...this.delayedAccs]
    const sequencerAccs = [...this.sequencerAccs]
    const reported = this.reportedSubMessageCount
    return () => {
      this._rollup = rollup
      this._sequencerInbox = sequencerInbox
      this.delayedInboxes = delayedInboxes
      this.delayedAccs = delayedAccs
      this.sequencerAccs = sequencerAccs
      this.reportedSubMessageCount = reported
    }
  }

  private addMessageToDelayedAccumulator(
    inbox: string,
    kind: number,
    sender: string,
    messageDataHash: string
  ): BigNumber {
    const count = this.delayedAccs.length
    const prevAcc = count > 0 ? this.delayedAccs[count - 1] : constants.HashZero
    const blockNumber = BigNumber.from(this.chain.blockNumber)
    const timestamp = BigNumber.from(this.chain.timestamp)
    const baseFeeL1 = this.chain.baseFee
    const messageHashValue = messageHash({
      kind,
      sender,
      blockNumber,
      timestamp,
      inboxSeqNum: count,
      baseFeeL1,
      messageDataHash,
    })
    this.delayedAccs.push(accumulateInboxMessage(prevAcc, messageHashValue))
    this.chain.emit(this.address, {
      event: 'MessageDelivered',
      args: {
        messageIndex: BigNumber.from(count),
        beforeInboxAcc: prevAcc,
        inbox,
        kind,
        sender: getAddress(sender),
        messageDataHash,
        baseFeeL1,
        timestamp,
        blockNumber,
      },
    })
    return BigNumber.from(count)
  }

  private onlySequencerInbox(sender: string): void {
    if (getAddress(sender) !== this._sequencerInbox) {
      throw new NotSequencerInbox(getAddress(sender))
    }
  }

  private onlyRollupOwner(sender: string): void {
    const owner = this._rollup.owner()
    if (getAddress(sender) !== owner) {
      throw new NotOwner(getAddress(sender), owner)
    }
  }
}

const at = (chain: string[], index: BigNumberish): string => {
  const i = BigNumber.from(index)
  if (i.lt(0) || i.gte(chain.length)) {
    throw new RangeError(`accumulator index ${i.toString()} out of bounds`)
  }
  return chain[i.toNumber()]
}
