import { fork } from 'node:child_process'
import { fileURLToPath } from 'node:url'
import { existsSync, readFileSync, unlinkSync } from 'node:fs'
import path from 'node:path'
import { DaemonClient, DaemonRequestError } from '../daemon/client.js'
import { loadConfig, patchFromPath, saveConfig, validateConfig } from '../config.js'
import { errorMessage } from '../errors.js'
import { startChat, type ChatOptions } from './chat.js'
import { getPidPath } from '../daemon/protocol.js'

const NOT_RUNNING = 'Daemon is not running. Run \'attune wake\' first.'

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000)
  const minutes = Math.floor(seconds / 60)
  const hours = Math.floor(minutes / 60)
  const days = Math.floor(hours / 24)

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`
  }
  return `${seconds}s`
}

function isDaemonRunning(): boolean {
  const pidFile = getPidPath()
  if (!existsSync(pidFile)) {
    return false
  }
  const pid = parseInt(readFileSync(pidFile, 'utf-8').trim(), 10)
  try {
    // Signal 0 checks the process exists without signalling it
    process.kill(pid, 0)
    return true
  } catch {
    // Stale pid file
    unlinkSync(pidFile)
    return false
  }
}

/** Connects, runs `fn`, disconnects. Prints daemon errors instead of throwing. */
async function withClient(fn: (client: DaemonClient) => Promise<void>): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
  } catch {
    console.log(NOT_RUNNING)
    return
  }

  try {
    await fn(client)
  } catch (e) {
    if (e instanceof DaemonRequestError) {
      console.error(`Error (${e.code}): ${e.message}`)
    } else {
      console.error(`Error: ${errorMessage(e, 'request failed')}`)
    }
    process.exitCode = 1
  } finally {
    await client.disconnect()
  }
}

function readJsonFile(file: string): unknown {
  try {
    return JSON.parse(readFileSync(file, 'utf-8'))
  } catch (e) {
    throw new Error(`Could not read JSON from ${file}: ${errorMessage(e, 'unknown error')}`)
  }
}

export async function wakeCommand(options: { foreground?: boolean }): Promise<void> {
  if (isDaemonRunning()) {
    console.log('Daemon is already running.')
    return
  }

  // Validate before forking so errors reach the terminal
  const config = loadConfig()
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot start daemon, configuration is incomplete:\n')
    for (const err of errors) {
      console.error(`  ${err.message}\n`)
    }
    process.exit(1)
  }

  if (options.foreground) {
    console.log(`Daemon starting in foreground (PID: ${process.pid})\n`)
    await import('../daemon/entry.js')
    return
  }

  const here = path.dirname(fileURLToPath(import.meta.url))
  const fromSource = import.meta.url.endsWith('.ts')
  const daemonEntry = path.resolve(here, fromSource ? '../daemon/entry.ts' : '../daemon/entry.js')

  const child = fork(daemonEntry, [], {
    detached: true,
    stdio: 'ignore',
    execArgv: fromSource ? ['--import', 'tsx'] : []
  })

  child.unref()

  console.log(`Daemon waking up (PID: ${child.pid})`)
}

export async function sleepCommand(): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
    await client.shutdown()
    await client.disconnect()
    console.log('Daemon is shutting down...')
  } catch {
    const pidFile = getPidPath()
    if (existsSync(pidFile)) {
      unlinkSync(pidFile)
    }
    console.log('Daemon is not running.')
  }
}

export async function statusCommand(): Promise<void> {
  await withClient(async (client) => {
    const status = await client.status()
    console.log('')
    console.log('  Attune Daemon Status')
    console.log('  --------------------')
    console.log(`  Uptime:            ${formatUptime(status.uptime)}`)
    console.log(`  Config version:    ${status.configVersion}`)
    console.log(`  Active sessions:   ${status.activeSessions}`)
    console.log(`  Last idle sweep:   ${status.lastIdleSweep ?? 'never'}`)
    console.log('')
  })
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  await startChat(options)
}

export async function settingsCommand(action?: string, file?: string, options: { expectedVersion?: string; by?: string } = {}): Promise<void> {
  await withClient(async (client) => {
    if (!action || action === 'show') {
      const view = await client.getConfig()
      console.log(`# version ${view.version}, updated ${view.updatedAt}${view.updatedBy ? ` by ${view.updatedBy}` : ''}`)
      console.log(JSON.stringify(view.config, null, 2))
      return
    }

    if (action === 'replace') {
      if (!file) {
        console.log('Usage: attune settings replace <file.json> [--expected-version <n>]')
        return
      }
      const expectedVersion = options.expectedVersion !== undefined ? parseInt(options.expectedVersion, 10) : undefined
      const view = await client.replaceConfig(readJsonFile(file), { updatedBy: options.by, expectedVersion })
      console.log(`Runtime settings replaced (version ${view.version}).`)
      return
    }

    if (action === 'reset') {
      const view = await client.resetConfig(options.by)
      console.log(`Runtime settings reset to defaults (version ${view.version}).`)
      return
    }

    console.log('Usage: attune settings [show | replace <file.json> | reset]')
  })
}

export async function summaryCommand(userId: string): Promise<void> {
  await withClient(async (client) => {
    const summary = await client.getSummary(userId)
    if (summary.summaryText === null) {
      console.log(`No summary stored for ${userId}.`)
      return
    }
    console.log(`\n  Summary for ${userId} (${summary.createdAt}, from ${summary.transcriptLength} exchanges)\n`)
    console.log(summary.summaryText)
    console.log('')
  })
}

export async function expireCommand(sessionId: string): Promise<void> {
  await withClient(async (client) => {
    const outcome = await client.expireSession(sessionId)
    switch (outcome.status) {
      case 'compacted':
        console.log(`Session ${sessionId} summarized (event ${outcome.eventId}) and closed.`)
        break
      case 'skipped':
        console.log(`Session ${sessionId}: nothing to do (${outcome.skipped}).`)
        break
      case 'failed':
        console.error(`Session ${sessionId} could not be summarized: ${outcome.error}. Memory was kept.`)
        process.exitCode = 1
        break
    }
  })
}

export async function memoryCommand(userId: string): Promise<void> {
  await withClient(async (client) => {
    const stats = await client.memoryStats(userId)
    console.log('')
    console.log(`  Memory for ${stats.userId}`)
    console.log('  ' + '-'.repeat(40))
    console.log(`  Summary:        ${stats.summaryChars} chars${stats.summaryUpdatedAt ? ` (updated ${stats.summaryUpdatedAt})` : ''}`)
    console.log(`  Summarizations: ${stats.events.length}`)
    if (stats.sessions.length > 0) {
      console.log('\n  Sessions:')
      for (const s of stats.sessions) {
        console.log(`    ${s.sessionId}  ${s.status.padEnd(10)} ${s.size.messageCount} msgs, ${s.size.charCount} chars, updated ${s.updatedAt}`)
      }
    }
    console.log('')
  })
}

function clip(text: string, max: number): string {
  const line = text.replace(/\s+/g, ' ').trim()
  return line.length > max ? `${line.slice(0, max - 3)}...` : line
}

export async function logsCommand(userId: string, options: { limit?: string } = {}): Promise<void> {
  await withClient(async (client) => {
    const limit = options.limit !== undefined ? parseInt(options.limit, 10) : undefined
    const logs = await client.interactionLogs(userId, limit)
    if (logs.length === 0) {
      console.log(`No interactions logged for ${userId}.`)
      return
    }
    console.log('')
    for (const log of logs) {
      console.log(`  ${log.createdAt}  ${log.sessionId}  ${log.status.padEnd(8)} ${log.timings.totalMs}ms (model ${log.timings.modelMs}ms), ` +
        `${log.modelParams.model}, config v${log.configVersion}, prompt ${log.promptMetrics.total} chars, ${log.sources.length} sources`)
      console.log(`    > ${clip(log.userMessage, 100)}`)
      console.log(log.status === 'answered' ? `    < ${clip(log.answer ?? '', 100)}` : `    ! ${log.error ?? 'unknown error'}`)
    }
    console.log('')
  })
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    const config = loadConfig()
    console.log(JSON.stringify({ ...config, llm: { ...config.llm, apiKey: config.llm.apiKey ? '***' : undefined } }, null, 2))
    return
  }

  if (action === 'set' && key && value !== undefined) {
    // Numbers and booleans arrive as JSON
    let parsed: unknown
    try {
      parsed = JSON.parse(value)
    } catch {
      parsed = value
    }
    try {
      saveConfig(patchFromPath(key, parsed))
      console.log(`Set ${key} = ${value}`)
    } catch (e) {
      console.error(errorMessage(e, 'Could not save config'))
      process.exitCode = 1
    }
    return
  }

  console.log('Usage: attune config [set <key> <value>]')
}
