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

export type MaxTimeVariation = {
  delayBlocks: BigNumber
  futureBlocks: BigNumber
  delaySeconds: BigNumber
  futureSeconds: BigNumber
}

export type ReplenishRate = {
  blocksPerPeriod: BigNumber
  periodBlocks: BigNumber
  secondsPerPeriod: BigNumber
  periodSeconds: BigNumber
}

export type DelayConfig = {
  thresholdBlocks: BigNumber
  thresholdSeconds: BigNumber
  maxBufferBlocks: BigNumber
  maxBufferSeconds: BigNumber
}

/** Accepts numbers, strings or BigNumbers in place of each field. */
export type Loose<T> = { [K in keyof T]: T[K] extends BigNumber ? BigNumberish : T[K] }

export type TimeBounds = {
  minTimestamp: BigNumber
  maxTimestamp: BigNumber
  minBlockNumber: BigNumber
  maxBlockNumber: BigNumber
}

export enum BatchDataLocation {
  TxInput,
  // posted by a contract caller, so the data is repeated in SequencerBatchData
  SeparateBatchEvent,
  // force inclusion
  NoData,
  Blob,
}

export type BufferData = {
  bufferBlocks: BigNumber
  bufferSeconds: BigNumber
  prevBlockNumber: BigNumber
  prevTimestamp: BigNumber
  prevDelayBlocks: BigNumber
  prevDelaySeconds: BigNumber
}

export type SyncValidity = {
  expiryBlockNumber: BigNumber
  expiryTimestamp: BigNumber
}

export type DelayedMessage = {
  kind: number
  sender: string
  blockNumber: BigNumberish
  timestamp: BigNumberish
  inboxSeqNum: BigNumberish
  baseFeeL1: BigNumberish
  messageDataHash: string
}

export type DelayProof = {
  beforeDelayedAcc: string
  delayedMessage: DelayedMessage
}

/** Preimage of the sequencer inbox accumulator of the previous batch. */
export type SequencerAccPreimage = {
  beforeAcc: string
  dataHash: string
  delayedAcc: string
}

export type ResyncProof = DelayProof & {
  preimage: SequencerAccPreimage
}

export type EnqueueResult = {
  seqMessageIndex: BigNumber
  beforeAcc: string
  delayedAcc: string
  acc: string
}

export type SequencerBatchDelivered = {
  batchSequenceNumber: BigNumber
  beforeAcc: string
  afterAcc: string
  delayedAcc: string
  afterDelayedMessagesRead: BigNumber
  timeBounds: TimeBounds
  dataLocation: BatchDataLocation
}

export type MessageDelivered = {
  messageIndex: BigNumber
  beforeInboxAcc: string
  inbox: string
  kind: number
  sender: string
  messageDataHash: string
  baseFeeL1: BigNumber
  timestamp: BigNumber
  blockNumber: BigNumber
}

export type InboxEvent =
  | { event: 'SequencerBatchDelivered'; args: SequencerBatchDelivered }
  | {
      event: 'SequencerBatchData'
      args: { batchSequenceNumber: BigNumber; data: string }
    }
  | {
      event: 'InboxMessageDelivered'
      args: { messageNum: BigNumber; data: string }
    }
  | { event: 'MessageDelivered'; args: MessageDelivered }
  | { event: 'BufferUpdated'; args: BufferData }
  | { event: 'SyncValidityUpdated'; args: SyncValidity & { caller: string } }
  | { event: 'SetValidKeyset'; args: { keysetHash: string; keysetBytes: string } }
  | { event: 'InvalidateKeyset'; args: { keysetHash: string } }
  | { event: 'BatchPosterManagerSet'; args: { newBatchPosterManager: string } }
  | { event: 'RollupUpdated'; args: { rollup: string } }
  | { event: 'OwnerFunctionCalled'; args: { id: number } }

export type EventName = InboxEvent['event']

export type Log = InboxEvent & { address: string }

export type EventArgs<E extends EventName> = Extract<Log, { event: E }>['args']

export type Receipt = {
  from: string
  blockNumber: number
  timestamp: number
  logs: Log[]
}

/** The sender of the call and the account that signed the transaction. */
export type Caller = {
  sender: string
  origin: string
}
