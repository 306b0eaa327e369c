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
import { IOwnable } from '../rollup/rollupMock'
import { EnqueueResult } from './types'

/**
 * The append-only accumulator ledger the sequencer inbox writes through.
 * It owns both hash chains; the inbox never touches them except via
 * `enqueueSequencerMessage` and `submitBatchSpendingReport`.
 */
export interface IBridge {
  readonly address: string

  rollup(): IOwnable

  delayedMessageCount(): BigNumber

  sequencerMessageCount(): BigNumber

  sequencerReportedSubMessageCount(): BigNumber

  delayedInboxAccs(index: BigNumberish): string

  sequencerInboxAccs(index: BigNumberish): string

  enqueueSequencerMessage(
    sender: string,
    dataHash: string,
    afterDelayedMessagesRead: BigNumberish,
    prevMessageCount: BigNumberish,
    newMessageCount: BigNumberish
  ): EnqueueResult

  /** Appends a batch posting report to the delayed chain and returns its index. */
  submitBatchSpendingReport(
    sender: string,
    batchPoster: string,
    dataHash: string
  ): BigNumber
}
