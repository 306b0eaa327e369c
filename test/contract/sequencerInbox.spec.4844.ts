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
import {
  hexConcat,
  hexDataLength,
  hexDataSlice,
  hexZeroPad,
  keccak256,
} from 'ethers/lib/utils'
import {
  BatchDataLocation,
  DATA_BLOB_HEADER_FLAG,
  delayProofFor,
  packHeader,
} from '../../src'
import {
  getBatchSpendingReport,
  getInboxMessageDeliveredEvents,
  getSequencerBatchDeliveredEvents,
  initializeAccounts,
  sendDefaultDelayedTx,
  setupSequencerInbox,
} from './testHelpers'

const T0 = 1_700_000_000

const blobHash = (n: number) => hexConcat(['0x01', hexZeroPad([n], 31)])

const blobHashes = [blobHash(1), blobHash(2)]

const setupBlobInbox = (
  chain: { baseFee?: number; blobBaseFee?: BigNumber | number } = {},
  isUsingFeeToken = false,
  isDelayBufferable = false
) =>
  setupSequencerInbox(isDelayBufferable, undefined, undefined, undefined, {
    isUsingFeeToken,
    chain: { blobBaseFee: 10_000_000_000, ...chain },
  })

describe('SequencerInbox 4844', () => {
  it('can add blob batch', () => {
    const setup = setupBlobInbox()
    const { bridge, sequencerInbox, batchPoster } = setup
    sendDefaultDelayedTx(setup)

    const receipt = sequencerInbox
      .connect(batchPoster)
      .addSequencerL2BatchFromBlobs(0, 1, 0, 10, { blobHashes })

    const [batch] = getSequencerBatchDeliveredEvents(receipt)
    expect(batch.batchSequenceNumber.toNumber()).to.eq(0)
    expect(batch.dataLocation).to.eq(BatchDataLocation.Blob)
    expect(batch.afterDelayedMessagesRead.toNumber()).to.eq(1)
    const delayedCount = bridge.delayedMessageCount().toNumber()
    expect(delayedCount).to.eq(2)
    expect(batch.delayedAcc).to.eq(bridge.delayedInboxAccs(delayedCount - 2))

    const dataHash = keccak256(
      hexConcat([
        packHeader(batch.timeBounds, 1),
        [DATA_BLOB_HEADER_FLAG],
        ...blobHashes,
      ])
    )
    const report = getBatchSpendingReport(receipt)
    const payload = report.messageData
    expect(hexDataLength(payload)).to.eq(32 + 20 + 32 + 32 + 32 + 8)
    expect(BigNumber.from(hexDataSlice(payload, 0, 32)).toNumber()).to.eq(T0)
    expect(hexDataSlice(payload, 32, 52)).to.eq(batchPoster.toLowerCase())
    expect(hexDataSlice(payload, 52, 84)).to.eq(dataHash)
    expect(BigNumber.from(hexDataSlice(payload, 84, 116)).toNumber()).to.eq(0)
    expect(BigNumber.from(hexDataSlice(payload, 116, 148)).toNumber()).to.eq(
      1_000_000_000
    )
    // 2 blobs at 131072 blob gas, priced at 10 times the base fee
    expect(BigNumber.from(hexDataSlice(payload, 148, 156)).toNumber()).to.eq(
      2_621_440
    )

    expect(report.delayedCount).to.eq(1)
    expect(report.delayedMessage.sender).to.eq(batchPoster)
    expect(report.delayedMessage.messageDataHash).to.eq(keccak256(payload))
    const [delivered] = getInboxMessageDeliveredEvents(receipt)
    expect(delivered.messageNum.toNumber()).to.eq(1)
  })

  it('charges no blob gas without a base fee', () => {
    const setup = setupBlobInbox({ baseFee: 0 })
    const { sequencerInbox, batchPoster } = setup

    const receipt = sequencerInbox
      .connect(batchPoster)
      .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    const { messageData } = getBatchSpendingReport(receipt)
    expect(BigNumber.from(hexDataSlice(messageData, 148, 156)).toNumber()).to.eq(
      0
    )
  })

  it('rejects blob gas that does not fit in 64 bits', () => {
    const setup = setupBlobInbox({
      baseFee: 1,
      blobBaseFee: BigNumber.from(2).pow(64),
    })
    const { bridge, sequencerInbox, batchPoster } = setup

    expect(() =>
      sequencerInbox
        .connect(batchPoster)
        .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    ).to.throw("reverted with custom error 'ExtraGasNotUint64()'")
    expect(sequencerInbox.batchCount().toNumber()).to.eq(0)
    expect(bridge.sequencerReportedSubMessageCount().toNumber()).to.eq(0)
  })

  it('needs blob hashes', () => {
    const { sequencerInbox, batchPoster } = setupBlobInbox()
    expect(() =>
      sequencerInbox
        .connect(batchPoster)
        .addSequencerL2BatchFromBlobs(0, 0, 0, 1)
    ).to.throw("reverted with custom error 'MissingDataHashes()'")
  })

  it('only batch posters can post blobs', () => {
    const { sequencerInbox, batchPoster } = setupBlobInbox()
    const { user } = initializeAccounts()
    expect(() =>
      sequencerInbox
        .connect(user)
        .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    ).to.throw("reverted with custom error 'NotBatchPoster()'")

    // blobs may be posted through a contract
    sequencerInbox
      .connect(batchPoster, user)
      .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    expect(sequencerInbox.batchCount().toNumber()).to.eq(1)
  })

  it('files no spending report for a forwarded blob batch', () => {
    const { bridge, sequencerInbox, batchPoster } = setupBlobInbox()
    const { user } = initializeAccounts()

    const receipt = sequencerInbox
      .connect(batchPoster, user)
      .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    expect(getInboxMessageDeliveredEvents(receipt)).to.have.length(0)
    expect(getSequencerBatchDeliveredEvents(receipt)).to.have.length(1)
    expect(bridge.delayedMessageCount().toNumber()).to.eq(0)

    // the same poster signing directly is reimbursed
    const direct = sequencerInbox
      .connect(batchPoster)
      .addSequencerL2BatchFromBlobs(1, 0, 1, 2, { blobHashes })
    expect(getInboxMessageDeliveredEvents(direct)).to.have.length(1)
    expect(bridge.delayedMessageCount().toNumber()).to.eq(1)
  })

  it('files no spending report with a fee token', () => {
    const setup = setupBlobInbox({}, true)
    const { bridge, sequencerInbox, batchPoster } = setup

    const receipt = sequencerInbox
      .connect(batchPoster)
      .addSequencerL2BatchFromBlobs(0, 0, 0, 1, { blobHashes })
    expect(getInboxMessageDeliveredEvents(receipt)).to.have.length(0)
    expect(bridge.delayedMessageCount().toNumber()).to.eq(0)
    expect(sequencerInbox.batchCount().toNumber()).to.eq(1)
  })

  it('blob batches take delay proofs', () => {
    const setup = setupBlobInbox({}, false, true)
    const { chain, bridge, sequencerInbox, batchPoster } = setup
    const delayedTx = sendDefaultDelayedTx(setup)
    chain.mineBlocks(600)

    const poster = sequencerInbox.connect(batchPoster)
    expect(() =>
      poster.addSequencerL2BatchFromBlobs(0, 1, 0, 1, { blobHashes })
    ).to.throw("reverted with custom error 'DelayProofRequired()'")

    const receipt = poster.addSequencerL2BatchFromBlobsDelayProof(
      0,
      1,
      0,
      1,
      delayProofFor(bridge, delayedTx.delayedMsg),
      { blobHashes }
    )
    const [batch] = getSequencerBatchDeliveredEvents(receipt)
    expect(batch.dataLocation).to.eq(BatchDataLocation.Blob)
    expect(sequencerInbox.bufferData().prevDelayBlocks.toNumber()).to.eq(600)
  })

  it('blob batches take resync proofs', () => {
    const setup = setupBlobInbox({}, false, true)
    const { chain, sequencerInbox, batchPoster } = setup
    const delayedTx = sendDefaultDelayedTx(setup)

    const poster = sequencerInbox.connect(batchPoster)
    const first = poster.addSequencerL2BatchFromBlobs(0, 1, 0, 1, {
      blobHashes,
    })
    const [firstBatch] = getSequencerBatchDeliveredEvents(first)
    chain.mineBlocks(700)

    poster.addSequencerL2BatchFromBlobsResyncProof(
      1,
      2,
      1,
      2,
      {
        beforeDelayedAcc: constants.HashZero,
        delayedMessage: delayedTx.delayedMsg,
        preimage: {
          beforeAcc: constants.HashZero,
          dataHash: keccak256(
            hexConcat([
              packHeader(firstBatch.timeBounds, 1),
              [DATA_BLOB_HEADER_FLAG],
              ...blobHashes,
            ])
          ),
          delayedAcc: firstBatch.delayedAcc,
        },
      },
      { blobHashes: [blobHash(3)] }
    )
    expect(sequencerInbox.batchCount().toNumber()).to.eq(2)
    expect(sequencerInbox.bufferData().prevDelayBlocks.toNumber()).to.eq(700)
  })
})
