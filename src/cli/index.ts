#!/usr/bin/env node
import { Command } from 'commander'
import { registerReplayCommand } from './commands/replay'
import { registerStagesCommand } from './commands/stages'

const program = new Command()

program
  .name('lrk')
  .description(
    'lambda-runner-kit CLI -- replay runner invocations locally and inspect secret rotation state',
  )
  .version('0.1.0')

registerReplayCommand(program)
registerStagesCommand(program)

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e)
  process.exit(1)
})
