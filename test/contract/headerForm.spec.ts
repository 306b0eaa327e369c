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
import { hexConcat, hexDataLength, keccak256 } from 'ethers/lib/utils'
import {
  decodeHeader,
  formBlobDataHash,
  formCallDataHash,
  formEmptyDataHash,
  getTimeBounds,
  HashFormingContext,
  isValidCallDataFlag,
  packHeader,
  toMaxTimeVariation,
} from '../../src'

const variation = toMaxTimeVariation({
  delayBlocks: 100,
  futureBlocks: 10,
  delaySeconds: 1200,
  futureSeconds: 120,
})

const context = (
  overrides: Partial<HashFormingContext> = {}
): HashFormingContext => ({
  timeVariation: variation,
  blockNumber: 1000,
  timestamp: 50_000,
  baseFee: BigNumber.from(100),
  blobBaseFee: BigNumber.from(3),
  maxDataSize: 1000,
  isValidKeysetHash: () => false,
  ...overrides,
})

describe('HeaderForm', () => {
  it('bounds batches around the current block', () => {
    const bounds = getTimeBounds(variation, 1000, 50_000)
    expect(bounds.minBlockNumber.toNumber()).to.eq(900)
    expect(bounds.maxBlockNumber.toNumber()).to.eq(1010)
    expect(bounds.minTimestamp.toNumber()).to.eq(48_800)
    expect(bounds.maxTimestamp.toNumber()).to.eq(50_120)
  })

  it('lower bounds stop at zero', () => {
    const bounds = getTimeBounds(variation, 100, 1200)
    expect(bounds.minBlockNumber.toNumber()).to.eq(0)
    expect(bounds.minTimestamp.toNumber()).to.eq(0)
    expect(getTimeBounds(variation, 101, 1201).minBlockNumber.toNumber()).to.eq(1)
  })

  it('packs a 40 byte header', () => {
    const bounds = getTimeBounds(variation, 1000, 50_000)
    const header = packHeader(bounds, 7)
    expect(hexDataLength(header)).to.eq(40)
    expect(header).to.eq(
      '0x' +
        [48_800, 50_120, 900, 1010, 7]
          .map(n => n.toString(16).padStart(16, '0'))
          .join('')
    )

    const decoded = decodeHeader(header)
    expect(decoded.minTimestamp.toNumber()).to.eq(48_800)
    expect(decoded.maxBlockNumber.toNumber()).to.eq(1010)
    expect(decoded.afterDelayedMessagesRead.toNumber()).to.eq(7)
    expect(() => decodeHeader('0x00')).to.throw(
      'expected a 40 byte header, got 1'
    )
  })

  it('knows the calldata header flags', () => {
    expect([0x00, 0x80, 0x88, 0x20].map(isValidCallDataFlag)).to.deep.eq([
      true,
      true,
      true,
      true,
    ])
    expect([0x50, 0x40, 0x08, 0x01].map(isValidCallDataFlag)).to.deep.eq([
      false,
      false,
      false,
      false,
    ])
  })

  it('hashes the header followed by the data', () => {
    const formed = formCallDataHash(context(), '0x00abcd', 3)
    expect(formed.dataHash).to.eq(
      keccak256(hexConcat([packHeader(formed.timeBounds, 3), '0x00abcd']))
    )
    expect(formed.blobGas.toNumber()).to.eq(0)
  })

  it('counts the header against the size limit', () => {
    const ctx = context({ maxDataSize: 42 })
    formCallDataHash(ctx, '0x00ab', 0)
    expect(() => formCallDataHash(ctx, '0x00abcd', 0)).to.throw(
      "reverted with custom error 'DataTooLarge(43, 42)'"
    )
  })

  it('checks the keyset only for full certificates', () => {
    // too short to carry a keyset hash
    formCallDataHash(context(), '0x80aa', 0)

    const keyset = keccak256('0x01')
    const certificate = hexConcat(['0x88', keyset])
    expect(() => formCallDataHash(context(), certificate, 0)).to.throw(
      `reverted with custom error 'NoSuchKeyset(${keyset})'`
    )
    formCallDataHash(
      context({ isValidKeysetHash: hash => hash === keyset }),
      certificate,
      0
    )
  })

  it('hashes blob batches with the blob flag', () => {
    const hashes = [keccak256('0x01'), keccak256('0x02')]
    const formed = formBlobDataHash(context(), hashes, 4)
    expect(formed.dataHash).to.eq(
      keccak256(
        hexConcat([packHeader(formed.timeBounds, 4), '0x50', ...hashes])
      )
    )
    // 3 * 131072 * 2 / 100
    expect(formed.blobGas.toNumber()).to.eq(7864)
    expect(() => formBlobDataHash(context(), [], 4)).to.throw(
      "reverted with custom error 'MissingDataHashes()'"
    )
  })

  it('forced batches hash the header alone', () => {
    const formed = formEmptyDataHash(context(), 2)
    expect(formed.dataHash).to.eq(keccak256(packHeader(formed.timeBounds, 2)))
  })
})
