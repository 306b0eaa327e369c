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
  getAddress,
  hexZeroPad,
  keccak256,
  solidityPack,
} from 'ethers/lib/utils'
import { HostChain } from '../chain/hostChain'
import {
  L1_MESSAGE_TYPE_L2_MESSAGE,
  L1_TO_L2_ALIAS_OFFSET,
  L2_MESSAGE_TYPE_UNSIGNED_EOA_TX,
} from '../libraries/constants'
import { Bridge } from './bridge'
import { Receipt } from './types'

const ADDRESS_SPACE = BigNumber.from(2).pow(160)

/** The sender of a delayed message as seen on the child chain. */
export const applyAlias = (address: string): string =>
  getAddress(
    hexZeroPad(
      BigNumber.from(address)
        .add(L1_TO_L2_ALIAS_OFFSET)
        .mod(ADDRESS_SPACE)
        .toHexString(),
      20
    )
  )

export const unsignedTxMessageData = (
  gasLimit: BigNumberish,
  maxFeePerGas: BigNumberish,
  nonce: BigNumberish,
  to: string,
  value: BigNumberish,
  data: string
): string =>
  solidityPack(
    ['uint8', 'uint256', 'uint256', 'uint256', 'uint256', 'uint256', 'bytes'],
    [
      L2_MESSAGE_TYPE_UNSIGNED_EOA_TX,
      gasLimit,
      maxFeePerGas,
      nonce,
      hexZeroPad(to, 32),
      value,
      data,
    ]
  )

/**
 * Delayed inbox: the permissionless way into the delayed message queue.
 */
export class Inbox {
  public readonly address: string

  constructor(private readonly chain: HostChain, private readonly bridge: Bridge) {
    this.address = chain.nextAddress()
  }

  public sendUnsignedTransaction(
    sender: string,
    gasLimit: BigNumberish,
    maxFeePerGas: BigNumberish,
    nonce: BigNumberish,
    to: string,
    value: BigNumberish,
    data: string
  ): Receipt {
    return this.chain.transact(sender, () => {
      const messageData = unsignedTxMessageData(
        gasLimit,
        maxFeePerGas,
        nonce,
        to,
        value,
        data
      )
      const messageNum = this.bridge.enqueueDelayedMessage(
        this.address,
        L1_MESSAGE_TYPE_L2_MESSAGE,
        applyAlias(sender),
        keccak256(messageData)
      )
      this.chain.emit(this.address, {
        event: 'InboxMessageDelivered',
        args: { messageNum, data: messageData },
      })
    }).receipt
  }
}
