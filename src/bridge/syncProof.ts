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
  InvalidDelayedAccPreimage,
  InvalidSequencerInboxAccPreimage,
} from '../libraries/errors'
import { IBridge } from './iBridge'
import {
  isValidDelayedAccPreimage,
  isValidSequencerInboxAccPreimage,
} from './messages'
import {
  DelayedMessage,
  DelayProof,
  MessageDelivered,
  ResyncProof,
} from './types'

/**
 * Proves knowledge of the delayed message at `targetIndex`: it must
 * accumulate onto `beforeDelayedAcc` to give the ledger's recorded
 * accumulator at that index.
 */
export const verifyDelayProof = (
  bridge: Pick<IBridge, 'delayedInboxAccs'>,
  targetIndex: BigNumberish,
  proof: DelayProof
): void => {
  if (!BigNumber.from(proof.delayedMessage.inboxSeqNum).eq(targetIndex)) {
    throw new InvalidDelayedAccPreimage()
  }
  const delayedAcc = bridge.delayedInboxAccs(targetIndex)
  if (
    !isValidDelayedAccPreimage(
      delayedAcc,
      proof.beforeDelayedAcc,
      proof.delayedMessage
    )
  ) {
    throw new InvalidDelayedAccPreimage()
  }
}

/**
 * Proves the last delayed message read by the previous batch. `beforeAcc` is
 * the sequencer accumulator the enqueue of the current batch built on; the
 * preimage opens it to the delayed accumulator that batch committed to.
 */
export const verifyResyncProof = (
  beforeAcc: string,
  proof: ResyncProof
): void => {
  if (!isValidSequencerInboxAccPreimage(beforeAcc, proof.preimage)) {
    throw new InvalidSequencerInboxAccPreimage()
  }
  if (
    !isValidDelayedAccPreimage(
      proof.preimage.delayedAcc,
      proof.beforeDelayedAcc,
      proof.delayedMessage
    )
  ) {
    throw new InvalidDelayedAccPreimage()
  }
}

export const delayedMessageFromEvent = (
  event: MessageDelivered
): DelayedMessage => ({
  kind: event.kind,
  sender: event.sender,
  blockNumber: event.blockNumber,
  timestamp: event.timestamp,
  inboxSeqNum: event.messageIndex,
  baseFeeL1: event.baseFeeL1,
  messageDataHash: event.messageDataHash,
})

/** Builds the proof for a delayed message from the ledger's accumulators. */
export const delayProofFor = (
  bridge: Pick<IBridge, 'delayedInboxAccs'>,
  delayedMessage: DelayedMessage
): DelayProof => {
  const index = BigNumber.from(delayedMessage.inboxSeqNum)
  return {
    beforeDelayedAcc: index.gt(0)
      ? bridge.delayedInboxAccs(index.sub(1))
      : constants.HashZero,
    delayedMessage,
  }
}
