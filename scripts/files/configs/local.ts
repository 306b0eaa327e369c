import { InboxConfig } from '../../config'

export const local: InboxConfig = {
  chainId: 412346,
  maxDataSize: 117964,
  isUsingFeeToken: false,
  maxTimeVariation: {
    delayBlocks: 100,
    futureBlocks: 12,
    delaySeconds: 1200,
    futureSeconds: 144,
  },
  isDelayBufferable: true,
  bufferConfig: {
    max: 200,
    threshold: 10,
    replenishRateInBasis: 500,
  },
}
