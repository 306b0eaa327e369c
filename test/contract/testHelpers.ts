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

/* eslint-env node, mocha */

import { BigNumber } from '@ethersproject/bignumber'
import { expect } from 'chai'
import { constants } from 'ethers'
import { getAddress, hexlify, hexZeroPad, keccak256 } from 'ethers/lib/utils'
import {
  accumulateInboxMessage,
  applyAlias,
  Bridge,
  DelayConfig,
  DelayedMessage,
  delayedMessageFromEvent,
  getEvents,
  HostChain,
  HostChainOptions,
  Inbox,
  L1_MESSAGE_TYPE_L2_MESSAGE,
  Loose,
  MaxTimeVariation,
  messageHash,
  NOT_DELAY_BUFFERABLE,
  Receipt,
  ReplenishRate,
  RollupMock,
  SequencerInbox,
  unsignedTxMessageData,
} from '../../src'
import { DelayedMsgDelivered, DelayedTx } from './types'

const account = (n: number) => getAddress(hexZeroPad(hexlify(n), 20))

export const initializeAccounts = () => ({
  admin: account(0x1001),
  user: account(0x1002),
  rollupOwner: account(0x1003),
  batchPoster: account(0x1004),
  batchPosterManager: account(0x1005),
})

export const getMessageDeliveredEvents = (receipt: Receipt) =>
  getEvents(receipt, 'MessageDelivered')

export const getInboxMessageDeliveredEvents = (receipt: Receipt) =>
  getEvents(receipt, 'InboxMessageDelivered')

export const getSequencerBatchDeliveredEvents = (receipt: Receipt) =>
  getEvents(receipt, 'SequencerBatchDelivered')

export const getBufferUpdatedEvents = (receipt: Receipt) =>
  getEvents(receipt, 'BufferUpdated')

/** The spending report a batch filed, as a delayed message ready to prove. */
export const getBatchSpendingReport = (
  receipt: Receipt
): DelayedMsgDelivered => {
  const [delivered] = getMessageDeliveredEvents(receipt)
  const [report] = getInboxMessageDeliveredEvents(receipt)
  return {
    delayedMessage: delayedMessageFromEvent(delivered),
    messageData: report.data,
    delayedAcc: delivered.beforeInboxAcc,
    delayedCount: delivered.messageIndex.toNumber(),
  }
}

export const sendDelayedTx = (
  sender: string,
  inbox: Inbox,
  bridge: Bridge,
  l2Gas: number,
  l2GasPrice: number,
  nonce: number,
  destAddr: string,
  amount: BigNumber,
  data: string
): DelayedTx => {
  const countBefore = bridge.delayedMessageCount().toNumber()
  const receipt = inbox.sendUnsignedTransaction(
    sender,
    l2Gas,
    l2GasPrice,
    nonce,
    destAddr,
    amount,
    data
  )

  const countAfter = bridge.delayedMessageCount().toNumber()
  expect(countAfter, 'Unexpected inbox count').to.eq(countBefore + 1)

  const [messageDeliveredEvent] = getMessageDeliveredEvents(receipt)
  const messageData = unsignedTxMessageData(
    l2Gas,
    l2GasPrice,
    nonce,
    destAddr,
    amount,
    data
  )
  const messageDataHash = keccak256(messageData)
  expect(
    messageDeliveredEvent.messageDataHash,
    'Incorrect messageDataHash'
  ).to.eq(messageDataHash)

  const delayedMsg = {
    kind: L1_MESSAGE_TYPE_L2_MESSAGE,
    sender: applyAlias(sender),
    blockNumber: BigNumber.from(receipt.blockNumber),
    timestamp: BigNumber.from(receipt.timestamp),
    inboxSeqNum: BigNumber.from(countBefore),
    baseFeeL1: messageDeliveredEvent.baseFeeL1,
    messageDataHash,
  }

  const prevAccumulator = messageDeliveredEvent.beforeInboxAcc
  expect(prevAccumulator, 'Incorrect prev accumulator').to.eq(
    countBefore === 0
      ? constants.HashZero
      : bridge.delayedInboxAccs(countBefore - 1)
  )
  expect(bridge.delayedInboxAccs(countBefore), 'Incorrect delayed acc').to.eq(
    accumulateInboxMessage(prevAccumulator, messageHash(delayedMsg))
  )

  return {
    countBefore,
    delayedMsg,
    messageData,
    prevAccumulator,
    inboxAccountLength: countAfter,
  }
}

export const forceIncludeMessages = (
  sequencerInbox: SequencerInbox,
  newTotalDelayedMessagesRead: number,
  delayedMessage: DelayedMessage,
  expectedErrorType?: string
): Receipt | undefined => {
  const inboxLengthBefore = sequencerInbox.batchCount().toNumber()

  const forceInclusionTx = () =>
    sequencerInbox.forceInclusion(
      newTotalDelayedMessagesRead,
      delayedMessage.kind,
      [delayedMessage.blockNumber, delayedMessage.timestamp],
      delayedMessage.baseFeeL1,
      delayedMessage.sender,
      delayedMessage.messageDataHash
    )
  if (expectedErrorType) {
    expect(forceInclusionTx).to.throw(
      `reverted with custom error '${expectedErrorType}()'`
    )
    return undefined
  }

  const receipt = forceInclusionTx()
  const totalDelayedMessagsReadAfter = sequencerInbox
    .totalDelayedMessagesRead()
    .toNumber()
  expect(
    totalDelayedMessagsReadAfter,
    'Incorrect totalDelayedMessagesRead after.'
  ).to.eq(newTotalDelayedMessagesRead)
  const inboxLengthAfter = sequencerInbox.batchCount().toNumber()
  expect(inboxLengthAfter - inboxLengthBefore, 'Inbox not incremented').to.eq(1)
  return receipt
}

export const maxVar: Loose<MaxTimeVariation> = {
  delayBlocks: (60 * 60 * 24) / 12,
  delaySeconds: 60 * 60 * 24,
  futureBlocks: 32 * 2,
  futureSeconds: 12 * 32 * 2,
}

export const rateRepl: Loose<ReplenishRate> = {
  blocksPerPeriod: 1,
  periodBlocks: 14,
  secondsPerPeriod: 1,
  periodSeconds: 12,
}

export const delayConfig: DelayConfig = {
  thresholdBlocks: BigNumber.from((2 * 60 * 60) / 12),
  thresholdSeconds: BigNumber.from(2 * 60 * 60),
  maxBufferBlocks: BigNumber.from(((60 * 60 * 24) / 12) * 2),
  maxBufferSeconds: BigNumber.from(60 * 60 * 24 * 2),
}

export type SetupOptions = {
  maxDataSize?: number
  isUsingFeeToken?: boolean
  chain?: HostChainOptions
}

export const setupSequencerInbox = (
  isDelayBufferable = false,
  max: Loose<MaxTimeVariation> = maxVar,
  rate: Loose<ReplenishRate> = rateRepl,
  config: Loose<DelayConfig> = delayConfig,
  options: SetupOptions = {}
) => {
  const { user, rollupOwner, batchPoster, batchPosterManager } =
    initializeAccounts()

  const chain = new HostChain(options.chain)
  const rollup = new RollupMock(chain, rollupOwner)
  const bridge = new Bridge(chain, rollup)
  const inbox = new Inbox(chain, bridge)
  const sequencerInbox = SequencerInbox.deploy(
    chain,
    bridge,
    max,
    rate,
    isDelayBufferable ? config : NOT_DELAY_BUFFERABLE,
    options.maxDataSize,
    options.isUsingFeeToken
  )

  bridge.setDelayedInbox(rollupOwner, inbox.address, true)
  bridge.setSequencerInbox(rollupOwner, sequencerInbox.address)

  const asOwner = sequencerInbox.connect(rollupOwner)
  asOwner.setIsBatchPoster(batchPoster, true)
  asOwner.setBatchPosterManager(batchPosterManager)

  return {
    chain,
    user,
    bridge,
    inbox,
    sequencerInbox,
    batchPoster,
    batchPosterManager,
    rollup,
    rollupOwner,
    delayConfig,
    maxDelay: max,
  }
}

/** Sends a plain delayed transaction from `user` with the usual test values. */
export const sendDefaultDelayedTx = (
  setup: Pick<
    ReturnType<typeof setupSequencerInbox>,
    'user' | 'inbox' | 'bridge'
  >,
  nonce = 0,
  data = '0x1010'
) =>
  sendDelayedTx(
    setup.user,
    setup.inbox,
    setup.bridge,
    1000000,
    21000000000,
    nonce,
    setup.user,
    BigNumber.from(10),
    data
  )
