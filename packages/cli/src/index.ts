#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerPublishCommand} from './commands/publish.js'

async function main() {
  const program = new Command()

  program
    .name('hoist')
    .description('Publish connector images, specs and metadata')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs and reports')
    .option('--no-color', 'Disable colored output')
    .option('--log-level <level>', 'Log level (default: HOIST_LOG_LEVEL or info)', process.env.HOIST_LOG_LEVEL)

  registerPublishCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exitCode = 1
}
