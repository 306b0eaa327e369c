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

import { keccak256, solidityKeccak256, solidityPack } from 'ethers/lib/utils'
import { DelayedMessage, SequencerAccPreimage } from './types'

export const messageHash = (message: DelayedMessage): string =>
  solidityKeccak256(
    ['uint8', 'address', 'uint64', 'uint64', 'uint256', 'uint256', 'bytes32'],
    [
      message.kind,
      message.sender,
      message.blockNumber,
      message.timestamp,
      message.inboxSeqNum,
      message.baseFeeL1,
      message.messageDataHash,
    ]
  )

export const accumulateInboxMessage = (
  prevAcc: string,
  message: string
): string => solidityKeccak256(['bytes32', 'bytes32'], [prevAcc, message])

/**
 * Each batch accumulator binds the previous batch, the batch digest and the
 * delayed accumulator of the last delayed message the batch has read.
 */
export const sequencerInboxAcc = (preimage: SequencerAccPreimage): string =>
  keccak256(
    solidityPack(
      ['bytes32', 'bytes32', 'bytes32'],
      [preimage.beforeAcc, preimage.dataHash, preimage.delayedAcc]
    )
  )

export const isValidDelayedAccPreimage = (
  delayedAcc: string,
  beforeDelayedAcc: string,
  delayedMessage: DelayedMessage
): boolean =>
  delayedAcc ===
  accumulateInboxMessage(beforeDelayedAcc, messageHash(delayedMessage))

export const isValidSequencerInboxAccPreimage = (
  acc: string,
  preimage: SequencerAccPreimage
): boolean => acc === sequencerInboxAcc(preimage)
