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

export type ErrorKind =
  | 'authorization'
  | 'ordering'
  | 'proof'
  | 'timing'
  | 'payload'
  | 'configuration'
  | 'deprecated'

export type ErrorArg = string | number | BigNumber

const formatArg = (arg: ErrorArg): string =>
  BigNumber.isBigNumber(arg) ? arg.toString() : String(arg)

/**
 * Base of every rejection raised by the inbox. The message mirrors what the
 * hardhat tooling prints for a reverted custom error, so a failed call reads
 * `reverted with custom error 'DataTooLarge(117965, 117964)'`.
 */
export abstract class CustomError extends Error {
  public abstract readonly kind: ErrorKind
  public readonly args: readonly ErrorArg[]

  constructor(public readonly errorName: string, ...args: ErrorArg[]) {
    super(
      `reverted with custom error '${errorName}(${args
        .map(formatArg)
        .join(', ')})'`
    )
    this.name = errorName
    this.args = args
  }
}

// authorization

export class NotOwner extends CustomError {
  public readonly kind = 'authorization'
  constructor(sender: string, owner: string) {
    super('NotOwner', sender, owner)
  }
}

export class NotBatchPoster extends CustomError {
  public readonly kind = 'authorization'
  constructor() {
    super('NotBatchPoster')
  }
}

export class NotBatchPosterManager extends CustomError {
  public readonly kind = 'authorization'
  constructor(sender: string) {
    super('NotBatchPosterManager', sender)
  }
}

export class NotCodelessOrigin extends CustomError {
  public readonly kind = 'authorization'
  constructor() {
    super('NotCodelessOrigin')
  }
}

export class NotSequencerInbox extends CustomError {
  public readonly kind = 'authorization'
  constructor(sender: string) {
    super('NotSequencerInbox', sender)
  }
}

export class NotDelayedInbox extends CustomError {
  public readonly kind = 'authorization'
  constructor(sender: string) {
    super('NotDelayedInbox', sender)
  }
}

// staleness and ordering

export class DelayedBackwards extends CustomError {
  public readonly kind = 'ordering'
  constructor() {
    super('DelayedBackwards')
  }
}

export class DelayedTooFar extends CustomError {
  public readonly kind = 'ordering'
  constructor() {
    super('DelayedTooFar')
  }
}

export class NotDelayedFarEnough extends CustomError {
  public readonly kind = 'ordering'
  constructor() {
    super('NotDelayedFarEnough')
  }
}

export class BadSequencerNumber extends CustomError {
  public readonly kind = 'ordering'
  constructor(stored: ErrorArg, received: ErrorArg) {
    super('BadSequencerNumber', stored, received)
  }
}

export class BadSequencerMessageNumber extends CustomError {
  public readonly kind = 'ordering'
  constructor(stored: ErrorArg, received: ErrorArg) {
    super('BadSequencerMessageNumber', stored, received)
  }
}

// proofs

export class DelayProofRequired extends CustomError {
  public readonly kind = 'proof'
  constructor() {
    super('DelayProofRequired')
  }
}

export class IncorrectMessagePreimage extends CustomError {
  public readonly kind = 'proof'
  constructor() {
    super('IncorrectMessagePreimage')
  }
}

export class InvalidDelayedAccPreimage extends CustomError {
  public readonly kind = 'proof'
  constructor() {
    super('InvalidDelayedAccPreimage')
  }
}

export class InvalidSequencerInboxAccPreimage extends CustomError {
  public readonly kind = 'proof'
  constructor() {
    super('InvalidSequencerInboxAccPreimage')
  }
}

// timing

export class ForceIncludeBlockTooSoon extends CustomError {
  public readonly kind = 'timing'
  constructor() {
    super('ForceIncludeBlockTooSoon')
  }
}

export class ForceIncludeTimeTooSoon extends CustomError {
  public readonly kind = 'timing'
  constructor() {
    super('ForceIncludeTimeTooSoon')
  }
}

// payload validity

export class DataTooLarge extends CustomError {
  public readonly kind = 'payload'
  constructor(dataLength: number, maxDataLength: number) {
    super('DataTooLarge', dataLength, maxDataLength)
  }
}

export class InvalidHeaderFlag extends CustomError {
  public readonly kind = 'payload'
  constructor(flag: string) {
    super('InvalidHeaderFlag', flag)
  }
}

export class NoSuchKeyset extends CustomError {
  public readonly kind = 'payload'
  constructor(keysetHash: string) {
    super('NoSuchKeyset', keysetHash)
  }
}

export class AlreadyValidDASKeyset extends CustomError {
  public readonly kind = 'payload'
  constructor(keysetHash: string) {
    super('AlreadyValidDASKeyset', keysetHash)
  }
}

export class KeysetTooLarge extends CustomError {
  public readonly kind = 'payload'
  constructor() {
    super('KeysetTooLarge')
  }
}

export class MissingDataHashes extends CustomError {
  public readonly kind = 'payload'
  constructor() {
    super('MissingDataHashes')
  }
}

export class ExtraGasNotUint64 extends CustomError {
  public readonly kind = 'payload'
  constructor() {
    super('ExtraGasNotUint64')
  }
}

// configuration

export class NotDelayBufferable extends CustomError {
  public readonly kind = 'configuration'
  constructor() {
    super('NotDelayBufferable')
  }
}

export class BadMaxTimeVariation extends CustomError {
  public readonly kind = 'configuration'
  constructor() {
    super('BadMaxTimeVariation')
  }
}

export class BadBufferConfig extends CustomError {
  public readonly kind = 'configuration'
  constructor() {
    super('BadBufferConfig')
  }
}

export class RollupNotChanged extends CustomError {
  public readonly kind = 'configuration'
  constructor() {
    super('RollupNotChanged')
  }
}

export class Deprecated extends CustomError {
  public readonly kind = 'deprecated'
  constructor() {
    super('Deprecated')
  }
}
