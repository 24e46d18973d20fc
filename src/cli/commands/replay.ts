import * as fs from 'fs'
import { Command } from 'commander'
import { ConfigurationError } from '../../lambda/runtime/errors'
import { Logger, resolveLogLevel } from '../../lambda/runtime/logger'
import { execTest } from '../../lambda/runtime/test-runtime'
import { loadRunner } from '../load-runner'

interface ReplayOptions {
  logLevel?: string
}

export async function replay(
  runnerPath: string,
  testDataPath: string,
  logger?: Logger,
): Promise<unknown[]> {
  let document: string
  try {
    document = fs.readFileSync(testDataPath, 'utf-8')
  } catch (e) {
    throw new ConfigurationError(`Unable to read test data from ${testDataPath}`, {
      cause: e,
    })
  }

  const runner = await loadRunner(runnerPath)
  return execTest(runner, document, { logger })
}

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description(
      'Replay the invocations of a local test document through a runner, without a deadline',
    )
    .argument('<runner>', 'Module exporting the runner (default or "runner" export)')
    .argument('<test-data>', 'JSON document: { "region": string, "invocations": [...] }')
    .option('--log-level <level>', 'debug, info, warn or error')
    .action(async (runnerPath: string, testDataPath: string, opts: ReplayOptions) => {
      const logger = new Logger('lambda-test-runtime', resolveLogLevel(opts.logLevel))
      const results = await replay(runnerPath, testDataPath, logger)

      console.log(`\nReplayed ${results.length} invocation(s):`)
      results.forEach((result, index) => {
        console.log(`  ${index}: ${JSON.stringify(result) ?? 'undefined'}`)
      })
    })
}
