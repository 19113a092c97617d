#!/usr/bin/env node

import { Command } from 'commander'
import {
  ingestCommand,
  recallCommand,
  sweepCommand,
  statsCommand,
  showCommand,
  configCommand
} from './cli/commands.js'
import type { IngestOptions, RecallOptions } from './cli/commands.js'

const program = new Command()

program
  .name('keepsake')
  .description('Long-term, per-user memory for conversational agents')
  .version('1.0.0')

program
  .command('ingest')
  .description('Record a conversation turn and extract memories from it')
  .requiredOption('--user <id>', 'User id')
  .requiredOption('--conversation <id>', 'Conversation id')
  .requiredOption('--turn <number>', 'Turn number within the conversation')
  .requiredOption('--user-message <text>', 'What the user said')
  .requiredOption('--assistant-message <text>', 'What the assistant answered')
  .action(async (options: IngestOptions) => {
    await ingestCommand(options)
  })

program
  .command('recall')
  .description('Retrieve ranked memories for a query')
  .argument('<query>', 'Query text')
  .requiredOption('--user <id>', 'User id')
  .option('--turn <number>', 'Turn number of the query')
  .option('--intent <intent>', 'Force GREETING, BROAD or SPECIFIC')
  .option('--context', 'Print the formatted prompt block instead of scores')
  .action(async (query: string, options: RecallOptions) => {
    await recallCommand(query, options)
  })

program
  .command('sweep')
  .description('Run one reconciliation sweep')
  .action(async () => {
    await sweepCommand()
  })

program
  .command('stats')
  .description('Show memory statistics for a user')
  .requiredOption('--user <id>', 'User id')
  .action(async (options: { user: string }) => {
    await statsCommand(options)
  })

program
  .command('show')
  .description('Inspect a single memory by id')
  .argument('<id>', 'Memory id')
  .action(async (id: string) => {
    await showCommand(id)
  })

program
  .command('config')
  .description('Print the config, or set a value with dot notation')
  .argument('[action]', 'set')
  .argument('[key]', 'e.g. memory.duplicateThreshold')
  .argument('[value]', 'JSON or plain string')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
