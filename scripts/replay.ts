import { BigNumber } from 'ethers'
import fs from 'fs'
import {
  Bridge,
  DelayedMessage,
  delayedMessageFromEvent,
  delayProofFor,
  getEvents,
  HostChain,
  Inbox,
  Receipt,
  RollupMock,
  SequencerInbox,
} from '../src'
import { DeployParams } from './config'

export const ROLLUP_OWNER = '0x1000000000000000000000000000000000000001'
export const BATCH_POSTER = '0x2000000000000000000000000000000000000002'

const L2_GAS_LIMIT = 100000
const L2_MAX_FEE_PER_GAS = 1000000000

export type ScenarioStep =
  | {
      action: 'sendDelayed'
      from: string
      to: string
      value: string
      data: string
    }
  | { action: 'mine'; blocks: number; secondsPerBlock?: number }
  | { action: 'postBatch'; data: string; subMessages: number }
  | { action: 'forceInclude' }

export type Scenario = {
  description: string
  steps: ScenarioStep[]
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const stringField = (record: Record<string, unknown>, key: string): string => {
  const value = record[key]
  if (typeof value !== 'string') throw new Error(`${key} must be a string`)
  return value
}

const numberField = (record: Record<string, unknown>, key: string): number => {
  const value = record[key]
  if (typeof value !== 'number') throw new Error(`${key} must be a number`)
  return value
}

const parseStep = (step: unknown, index: number): ScenarioStep => {
  if (!isRecord(step)) throw new Error(`step ${index} is not an object`)
  switch (step.action) {
    case 'sendDelayed':
      return {
        action: 'sendDelayed',
        from: stringField(step, 'from'),
        to: stringField(step, 'to'),
        value: stringField(step, 'value'),
        data: stringField(step, 'data'),
      }
    case 'mine':
      return {
        action: 'mine',
        blocks: numberField(step, 'blocks'),
        secondsPerBlock:
          step.secondsPerBlock === undefined
            ? undefined
            : numberField(step, 'secondsPerBlock'),
      }
    case 'postBatch':
      return {
        action: 'postBatch',
        data: stringField(step, 'data'),
        subMessages: numberField(step, 'subMessages'),
      }
    case 'forceInclude':
      return { action: 'forceInclude' }
    default:
      throw new Error(`step ${index} has unknown action ${String(step.action)}`)
  }
}

export const parseScenario = (json: unknown): Scenario => {
  if (!isRecord(json) || !Array.isArray(json.steps)) {
    throw new Error('scenario must have a steps array')
  }
  return {
    description: stringField(json, 'description'),
    steps: json.steps.map(parseStep),
  }
}

export const loadScenario = (fileLocation: string): Scenario =>
  parseScenario(JSON.parse(fs.readFileSync(fileLocation).toString()))

export const deployInbox = (chainId: number, params: DeployParams) => {
  const chain = new HostChain({ chainId })
  const rollup = new RollupMock(chain, ROLLUP_OWNER)
  const bridge = new Bridge(chain, rollup)
  const inbox = new Inbox(chain, bridge)
  const sequencerInbox = SequencerInbox.deploy(
    chain,
    bridge,
    params.maxTimeVariation,
    params.replenishRate,
    params.delayConfig,
    params.maxDataSize,
    params.isUsingFeeToken
  )
  bridge.setDelayedInbox(ROLLUP_OWNER, inbox.address, true)
  bridge.setSequencerInbox(ROLLUP_OWNER, sequencerInbox.address)
  sequencerInbox.connect(ROLLUP_OWNER).setIsBatchPoster(BATCH_POSTER, true)
  return { chain, rollup, bridge, inbox, sequencerInbox }
}

/**
 * Runs the steps against a fresh deployment. Batches read every delayed
 * message sent so far and carry a delay proof whenever the poster is not
 * synced.
 */
export const replayScenario = (
  scenario: Scenario,
  chainId: number,
  params: DeployParams,
  log: (message: string) => void = console.log
) => {
  const deployment = deployInbox(chainId, params)
  const { chain, bridge, inbox, sequencerInbox } = deployment
  const poster = sequencerInbox.connect(BATCH_POSTER)
  const delayedMessages: DelayedMessage[] = []
  let nonce = 0

  const record = (receipt: Receipt) => {
    getEvents(receipt, 'MessageDelivered').forEach(event =>
      delayedMessages.push(delayedMessageFromEvent(event))
    )
    return receipt
  }

  scenario.steps.forEach((step, i) => {
    switch (step.action) {
      case 'sendDelayed': {
        record(
          inbox.sendUnsignedTransaction(
            step.from,
            L2_GAS_LIMIT,
            L2_MAX_FEE_PER_GAS,
            nonce++,
            step.to,
            step.value,
            step.data
          )
        )
        log(`Step ${i}: delayed message ${delayedMessages.length - 1} sent`)
        break
      }
      case 'mine': {
        chain.mineBlocks(step.blocks, step.secondsPerBlock)
        log(`Step ${i}: mined to block ${chain.blockNumber}`)
        break
      }
      case 'postBatch': {
        const totalRead = poster.totalDelayedMessagesRead()
        const afterRead = bridge.delayedMessageCount()
        const prevCount = bridge.sequencerReportedSubMessageCount()
        const newCount = prevCount.add(step.subMessages)
        const sequenceNumber = poster.batchCount()
        const needsProof =
          poster.isDelayBufferable &&
          afterRead.gt(totalRead) &&
          !poster.isSynced()
        const receipt = record(
          needsProof
            ? poster.addSequencerL2BatchFromOriginDelayProof(
                sequenceNumber,
                step.data,
                afterRead,
                prevCount,
                newCount,
                delayProofFor(bridge, delayedMessages[totalRead.toNumber()])
              )
            : poster.addSequencerL2BatchFromOrigin(
                sequenceNumber,
                step.data,
                afterRead,
                prevCount,
                newCount
              )
        )
        const [delivered] = getEvents(receipt, 'SequencerBatchDelivered')
        log(
          `Step ${i}: batch ${delivered.batchSequenceNumber.toString()} posted${
            needsProof ? ' with a delay proof' : ''
          }, acc ${delivered.afterAcc}`
        )
        break
      }
      case 'forceInclude': {
        const message = delayedMessages[delayedMessages.length - 1]
        if (message === undefined) {
          throw new Error('No delayed message to include')
        }
        const index = BigNumber.from(message.inboxSeqNum)
        const receipt = sequencerInbox.forceInclusion(
          index.add(1),
          message.kind,
          [message.blockNumber, message.timestamp],
          message.baseFeeL1,
          message.sender,
          message.messageDataHash
        )
        const [delivered] = getEvents(receipt, 'SequencerBatchDelivered')
        log(
          `Step ${i}: force included up to delayed message ${index.toString()} as batch ${delivered.batchSequenceNumber.toString()}`
        )
        break
      }
    }
  })

  return { ...deployment, delayedMessages }
}
