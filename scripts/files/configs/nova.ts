import { InboxConfig } from '../../config'
import { hoursToBlocks } from './utils'

export const nova: InboxConfig = {
  chainId: 42170,
  maxDataSize: 117964,
  isUsingFeeToken: false,
  maxTimeVariation: {
    delayBlocks: hoursToBlocks(24),
    futureBlocks: 64,
    delaySeconds: 24 * 60 * 60,
    futureSeconds: 60 * 60,
  },
  isDelayBufferable: true,
  bufferConfig: {
    max: hoursToBlocks(48), // 2 days
    threshold: hoursToBlocks(0.5), // 30 minutes
    replenishRateInBasis: 500, // 5% replenishment rate
  },
}
