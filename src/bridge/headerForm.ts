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
import {
  arrayify,
  hexConcat,
  hexDataLength,
  hexDataSlice,
  hexlify,
  keccak256,
  solidityPack,
} from 'ethers/lib/utils'
import {
  BROTLI_MESSAGE_HEADER_FLAG,
  DAS_MESSAGE_HEADER_FLAG,
  DATA_BLOB_HEADER_FLAG,
  GAS_PER_BLOB,
  HEADER_LENGTH,
  TREE_DAS_MESSAGE_HEADER_FLAG,
  ZERO_HEAVY_MESSAGE_HEADER_FLAG,
} from '../libraries/constants'
import {
  DataTooLarge,
  InvalidHeaderFlag,
  MissingDataHashes,
  NoSuchKeyset,
} from '../libraries/errors'
import { MaxTimeVariation, TimeBounds } from './types'

export type BatchHeader = TimeBounds & {
  afterDelayedMessagesRead: BigNumber
}

/** What the current block and the inbox configuration contribute to a digest. */
export interface HashFormingContext {
  timeVariation: MaxTimeVariation
  blockNumber: number
  timestamp: number
  baseFee: BigNumber
  blobBaseFee: BigNumber
  maxDataSize: number
  isValidKeysetHash(keysetHash: string): boolean
}

export type FormedDataHash = {
  dataHash: string
  timeBounds: TimeBounds
  /** Blob gas normalized to execution gas at the current base fee. */
  blobGas: BigNumber
}

const CALLDATA_FLAGS = new Set([
  BROTLI_MESSAGE_HEADER_FLAG,
  DAS_MESSAGE_HEADER_FLAG,
  DAS_MESSAGE_HEADER_FLAG | TREE_DAS_MESSAGE_HEADER_FLAG,
  ZERO_HEAVY_MESSAGE_HEADER_FLAG,
])

export const getTimeBounds = (
  variation: MaxTimeVariation,
  blockNumber: BigNumberish,
  timestamp: BigNumberish
): TimeBounds => {
  const block = BigNumber.from(blockNumber)
  const time = BigNumber.from(timestamp)
  return {
    minTimestamp: time.gt(variation.delaySeconds)
      ? time.sub(variation.delaySeconds)
      : BigNumber.from(0),
    maxTimestamp: time.add(variation.futureSeconds),
    minBlockNumber: block.gt(variation.delayBlocks)
      ? block.sub(variation.delayBlocks)
      : BigNumber.from(0),
    maxBlockNumber: block.add(variation.futureBlocks),
  }
}

export const packHeader = (
  timeBounds: TimeBounds,
  afterDelayedMessagesRead: BigNumberish
): string => {
  const header = solidityPack(
    ['uint64', 'uint64', 'uint64', 'uint64', 'uint64'],
    [
      timeBounds.minTimestamp,
      timeBounds.maxTimestamp,
      timeBounds.minBlockNumber,
      timeBounds.maxBlockNumber,
      afterDelayedMessagesRead,
    ]
  )
  // always true for the packed encoding
  if (hexDataLength(header) !== HEADER_LENGTH) {
    throw new Error(`header length ${hexDataLength(header)}`)
  }
  return header
}

export const decodeHeader = (header: string): BatchHeader => {
  if (hexDataLength(header) !== HEADER_LENGTH) {
    throw new Error(
      `expected a ${HEADER_LENGTH} byte header, got ${hexDataLength(header)}`
    )
  }
  const word = (i: number) =>
    BigNumber.from(hexDataSlice(header, i * 8, (i + 1) * 8))
  return {
    minTimestamp: word(0),
    maxTimestamp: word(1),
    minBlockNumber: word(2),
    maxBlockNumber: word(3),
    afterDelayedMessagesRead: word(4),
  }
}

export const isValidCallDataFlag = (headerByte: number): boolean =>
  CALLDATA_FLAGS.has(headerByte)

export const formCallDataHash = (
  ctx: HashFormingContext,
  data: string,
  afterDelayedMessagesRead: BigNumberish
): FormedDataHash => {
  const bytes = arrayify(data)
  const fullDataLen = HEADER_LENGTH + bytes.length
  if (fullDataLen > ctx.maxDataSize) {
    throw new DataTooLarge(fullDataLen, ctx.maxDataSize)
  }

  const timeBounds = getTimeBounds(
    ctx.timeVariation,
    ctx.blockNumber,
    ctx.timestamp
  )
  const header = packHeader(timeBounds, afterDelayedMessagesRead)

  // an empty batch only advances the delayed messages read
  if (bytes.length > 0) {
    // flags of other data sources, such as blobs, are not accepted here
    if (!isValidCallDataFlag(bytes[0])) {
      throw new InvalidHeaderFlag(hexlify(bytes[0]))
    }
    // an unknown keyset that slips through becomes an empty block downstream
    if ((bytes[0] & DAS_MESSAGE_HEADER_FLAG) !== 0 && bytes.length >= 33) {
      const keysetHash = hexlify(bytes.slice(1, 33))
      if (!ctx.isValidKeysetHash(keysetHash)) {
        throw new NoSuchKeyset(keysetHash)
      }
    }
  }

  return {
    dataHash: keccak256(hexConcat([header, bytes])),
    timeBounds,
    blobGas: BigNumber.from(0),
  }
}

export const formBlobDataHash = (
  ctx: HashFormingContext,
  dataHashes: string[],
  afterDelayedMessagesRead: BigNumberish
): FormedDataHash => {
  if (dataHashes.length === 0) throw new MissingDataHashes()

  const timeBounds = getTimeBounds(
    ctx.timeVariation,
    ctx.blockNumber,
    ctx.timestamp
  )
  const header = packHeader(timeBounds, afterDelayedMessagesRead)
  const blobCost = ctx.blobBaseFee.mul(GAS_PER_BLOB).mul(dataHashes.length)

  return {
    dataHash: keccak256(
      hexConcat([
        header,
        hexlify(DATA_BLOB_HEADER_FLAG),
        solidityPack(['bytes32[]'], [dataHashes]),
      ])
    ),
    timeBounds,
    blobGas: ctx.baseFee.gt(0) ? blobCost.div(ctx.baseFee) : BigNumber.from(0),
  }
}

export const formEmptyDataHash = (
  ctx: HashFormingContext,
  afterDelayedMessagesRead: BigNumberish
): FormedDataHash => {
  const timeBounds = getTimeBounds(
    ctx.timeVariation,
    ctx.blockNumber,
    ctx.timestamp
  )
  return {
    dataHash: keccak256(packHeader(timeBounds, afterDelayedMessagesRead)),
    timeBounds,
    blobGas: BigNumber.from(0),
  }
}
