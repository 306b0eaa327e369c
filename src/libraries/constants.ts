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

import { BigNumber } from '@ethersproject/bignumber'
import { constants } from 'ethers'

export const HEADER_LENGTH = 40

export const MAX_UINT64 = BigNumber.from(2).pow(64).sub(1)

/** Sequence number a poster passes when it does not care which index it gets. */
export const DONT_CARE_SEQUENCE_NUMBER = constants.MaxUint256

// 90% of Geth's 128KB tx size limit, leaving ~13KB for proving
export const DEFAULT_MAX_DATA_SIZE = 117964

export const GAS_PER_BLOB = 1 << 17

export const MAX_KEYSET_SIZE = 64 * 1024

// calldata header flags
export const BROTLI_MESSAGE_HEADER_FLAG = 0x00
export const DAS_MESSAGE_HEADER_FLAG = 0x80
export const TREE_DAS_MESSAGE_HEADER_FLAG = 0x08
export const ZERO_HEAVY_MESSAGE_HEADER_FLAG = 0x20

export const DATA_AUTHENTICATED_FLAG = 0x40
// only ever produced by the blob path, never accepted as a calldata flag
export const DATA_BLOB_HEADER_FLAG = DATA_AUTHENTICATED_FLAG | 0x10

export const KEYSET_HASH_PREFIX = '0xfe'

// delayed message kinds
export const L1_MESSAGE_TYPE_L2_MESSAGE = 3
export const L1_MESSAGE_TYPE_BATCH_POSTING_REPORT = 13

// first byte of an L2 message
export const L2_MESSAGE_TYPE_UNSIGNED_EOA_TX = 0

export const L1_TO_L2_ALIAS_OFFSET = '0x1111000000000000000000000000000000001111'
