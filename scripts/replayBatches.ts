import dotenv from 'dotenv'
import path from 'path'
import { getConfig, toDeployParams } from './config'
import { loadScenario, replayScenario } from './replay'

dotenv.config()

async function main() {
  const configName = process.env.INBOX_CONFIG ?? 'local'
  const config = getConfig(configName)

  const scenarioFile =
    process.env.SCENARIO_FILE ??
    path.join(__dirname, 'files', 'scenarios', 'forceInclusion.json')
  const scenario = loadScenario(scenarioFile)
  console.log(`Replaying "${scenario.description}" on the ${configName} config`)

  const { bridge, sequencerInbox } = replayScenario(
    scenario,
    config.chainId,
    toDeployParams(config)
  )
  console.log(
    `Batches: ${sequencerInbox.batchCount().toString()}, delayed messages read: ${sequencerInbox
      .totalDelayedMessagesRead()
      .toString()} of ${bridge.delayedMessageCount().toString()}`
  )
}

main()
  .then(() => console.log('Done.'))
  .catch(error => {
    console.error('Error:', error)
    process.exit(1)
  })
