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

import { getAddress } from 'ethers/lib/utils'
import { HostChain, Journaled } from '../chain/hostChain'
import { Receipt } from '../bridge/types'
import { NotOwner } from '../libraries/errors'

export interface IOwnable {
  readonly address: string
  owner(): string
}

export class RollupMock implements IOwnable, Journaled {
  public readonly address: string
  private _owner: string

  constructor(private readonly chain: HostChain, owner: string) {
    this.address = chain.nextAddress()
    this._owner = getAddress(owner)
    chain.register(this)
  }

  public owner(): string {
    return this._owner
  }

  public transferOwnership(sender: string, newOwner: string): Receipt {
    return this.chain.transact(sender, () => {
      if (getAddress(sender) !== this._owner) {
        throw new NotOwner(getAddress(sender), this._owner)
      }
      this._owner = getAddress(newOwner)
    }).receipt
  }

  public capture(): () => void {
    const owner = this._owner
    return () => {
      this._owner = owner
    }
  }
}
