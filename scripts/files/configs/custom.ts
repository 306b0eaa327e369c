import { InboxConfig } from '../../config'
import { hoursToBlocks } from './utils'

export const custom: InboxConfig = {
  chainId: 42161, // child chain id
  maxDataSize: 117964, // max size of a batch including its header
  isUsingFeeToken: false, // true when the chain pays fees in an ERC20, which skips spending reports
  maxTimeVariation: {
    delayBlocks: hoursToBlocks(24), // how long a delayed message may wait before it can be force included
    futureBlocks: 64,
    delaySeconds: 24 * 60 * 60,
    futureSeconds: 60 * 60,
  },
  isDelayBufferable: false, // set to true to enable the delay buffer
  bufferConfig: {
    max: hoursToBlocks(48), // must be at least maxTimeVariation.delayBlocks
    threshold: hoursToBlocks(1), // must exceed the posting interval
    replenishRateInBasis: 500, // 5% replenishment rate
  },
}
