import { BigNumber } from 'ethers'
import { configs } from './files/configs'
import { SECONDS_PER_BLOCK } from './files/configs/utils'
import {
  DelayConfig,
  Loose,
  MaxTimeVariation,
  NOT_DELAY_BUFFERABLE,
  ReplenishRate,
} from '../src'

// replenishRateInBasis is out of this many
const BASIS = 10000

export type InboxConfig = {
  chainId: number
  maxDataSize: number
  isUsingFeeToken: boolean
  maxTimeVariation: Loose<MaxTimeVariation>
  isDelayBufferable: boolean
  bufferConfig: {
    // in blocks, seconds follow at SECONDS_PER_BLOCK
    max: number
    threshold: number
    replenishRateInBasis: number
  }
}

export type DeployParams = {
  maxTimeVariation: Loose<MaxTimeVariation>
  replenishRate: ReplenishRate
  delayConfig: DelayConfig
  maxDataSize: number
  isUsingFeeToken: boolean
}

const isConfigName = (name: string): name is keyof typeof configs =>
  Object.prototype.hasOwnProperty.call(configs, name)

export const getConfig = (configName: string): InboxConfig => {
  if (!isConfigName(configName)) {
    throw new Error(`config ${configName} not found`)
  }
  const config = { ...configs[configName] }
  if (process.env.MAX_DATA_SIZE) {
    console.log('Using MAX_DATA_SIZE from env:', process.env.MAX_DATA_SIZE)
    config.maxDataSize = Number(process.env.MAX_DATA_SIZE)
  }
  validateConfig(config)
  return config
}

export const validateConfig = (config: InboxConfig) => {
  if (!Number.isInteger(config.maxDataSize) || config.maxDataSize <= 0) {
    throw new Error('maxDataSize must be a positive integer')
  }

  // check delaybuffer settings
  if (config.isDelayBufferable) {
    if (config.bufferConfig.max === 0) {
      throw new Error('bufferConfig.max is 0')
    }
    if (config.bufferConfig.threshold === 0) {
      throw new Error('bufferConfig.threshold is 0')
    }
    if (config.bufferConfig.replenishRateInBasis === 0) {
      throw new Error('bufferConfig.replenishRateInBasis is 0')
    }
    const delayBlocks = BigNumber.from(config.maxTimeVariation.delayBlocks)
    if (delayBlocks.gt(config.bufferConfig.max)) {
      throw new Error('bufferConfig.max is below maxTimeVariation.delayBlocks')
    }
  }
}

const gcd = (a: number, b: number): number => (b === 0 ? a : gcd(b, a % b))

export const toDeployParams = (config: InboxConfig): DeployParams => {
  const { max, threshold, replenishRateInBasis } = config.bufferConfig
  const divisor = gcd(replenishRateInBasis, BASIS)
  const amountPerPeriod = replenishRateInBasis / divisor
  const period = BASIS / divisor
  return {
    maxTimeVariation: config.maxTimeVariation,
    replenishRate: {
      blocksPerPeriod: BigNumber.from(amountPerPeriod),
      periodBlocks: BigNumber.from(period),
      secondsPerPeriod: BigNumber.from(amountPerPeriod),
      periodSeconds: BigNumber.from(period),
    },
    delayConfig: config.isDelayBufferable
      ? {
          thresholdBlocks: BigNumber.from(threshold),
          thresholdSeconds: BigNumber.from(threshold * SECONDS_PER_BLOCK),
          maxBufferBlocks: BigNumber.from(max),
          maxBufferSeconds: BigNumber.from(max * SECONDS_PER_BLOCK),
        }
      : NOT_DELAY_BUFFERABLE,
    maxDataSize: config.maxDataSize,
    isUsingFeeToken: config.isUsingFeeToken,
  }
}
