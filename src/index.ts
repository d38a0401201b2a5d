#!/usr/bin/env node

import { Command } from 'commander'
import { userInfo } from 'node:os'
import {
  wakeCommand,
  sleepCommand,
  statusCommand,
  chatCommand,
  settingsCommand,
  summaryCommand,
  expireCommand,
  memoryCommand,
  logsCommand,
  configCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('attune')
  .description('Trait-aware conversational guide with session memory and long-term summaries')
  .version('0.1.0')
  .option('-u, --user <id>', 'User id', userInfo().username)
  .option('-n, --name <name>', 'Name the assistant addresses you by')
  .option('--full-name <name>', 'Full name')
  .option('-t, --traits <file>', 'JSON file of trait scores (0-10)')
  .option('-s, --session <id>', 'Resume a session id')
  .action(async (options: { user: string; name?: string; fullName?: string; traits?: string; session?: string }) => {
    await chatCommand(options)
  })

program
  .command('wake')
  .description('Start the daemon as a detached background process')
  .option('--foreground', 'Run the daemon in this process')
  .action(async (options: { foreground?: boolean }) => {
    await wakeCommand(options)
  })

program
  .command('sleep')
  .description('Send shutdown signal to daemon')
  .action(async () => {
    await sleepCommand()
  })

program
  .command('status')
  .description('Query daemon for status')
  .action(async () => {
    await statusCommand()
  })

program
  .command('settings [action] [file]')
  .description('Show, replace (from a JSON file) or reset the runtime generation settings')
  .option('--expected-version <n>', 'Only replace if the stored version matches')
  .option('--by <name>', 'Recorded as the author of the change')
  .action(async (action: string | undefined, file: string | undefined, options: { expectedVersion?: string; by?: string }) => {
    await settingsCommand(action, file, options)
  })

program
  .command('summary <userId>')
  .description('Show the long-term summary stored for a user')
  .action(async (userId: string) => {
    await summaryCommand(userId)
  })

program
  .command('expire <sessionId>')
  .description('Summarize a session into long-term memory and close it')
  .action(async (sessionId: string) => {
    await expireCommand(sessionId)
  })

program
  .command('memory <userId>')
  .description('Show memory statistics for a user')
  .action(async (userId: string) => {
    await memoryCommand(userId)
  })

program
  .command('logs <userId>')
  .description('Show recent interaction logs for a user, newest first')
  .option('--limit <n>', 'How many to show', '20')
  .action(async (userId: string, options: { limit?: string }) => {
    await logsCommand(userId, options)
  })

program
  .command('config [action] [key] [value]')
  .description('Show the service config, or set a value with dot notation')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
