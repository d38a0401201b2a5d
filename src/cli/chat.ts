import * as readline from 'node:readline'
import { readFileSync } from 'node:fs'
import { nanoid } from 'nanoid'
import { z } from 'zod'
import { DaemonClient, DaemonRequestError } from '../daemon/client.js'
import { errorMessage } from '../errors.js'
import type { TraitProfile } from '../memory/types.js'

// ANSI color codes
const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const ITALIC = '\x1b[3m'
const CYAN = '\x1b[36m'
const GREEN = '\x1b[32m'
const YELLOW = '\x1b[33m'
const MAGENTA = '\x1b[35m'
const GRAY = '\x1b[90m'

const HELP_TEXT = `
${BOLD}Commands:${RESET}
  ${CYAN}/sources${RESET}   Show the reference material used for the last answer
  ${CYAN}/summary${RESET}   Show what is remembered from earlier sessions
  ${CYAN}/memory${RESET}    Show memory statistics
  ${CYAN}/end${RESET}       Summarize and close this session
  ${CYAN}/help${RESET}      Show this help
`

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const traitFileSchema = z.record(z.string(), z.number())

export interface ChatOptions {
  user: string
  name?: string
  fullName?: string
  /** Path to a JSON object of trait name to score. */
  traits?: string
  session?: string
}

class Spinner {
  private frameIndex = 0
  private interval: NodeJS.Timeout | null = null
  private message: string

  constructor(message: string = 'thinking') {
    this.message = message
  }

  start(): void {
    this.frameIndex = 0
    process.stdout.write('\n')
    this.render()
    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length
      this.render()
    }, 80)
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frameIndex]
    process.stdout.write(`\r${DIM}${frame} ${this.message}...${RESET}\x1b[K`)
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    process.stdout.write('\r\x1b[K')
  }
}

/**
 * Minimal markdown for the terminal: bold, italic, inline code, fenced
 * code, headers and lists.
 */
export function renderMarkdown(text: string): string {
  let result = text

  // Code blocks first so nothing inside them is touched
  result = result.replace(/```[\w]*\n([\s\S]*?)```/g, (_, code: string) => {
    const lines = code.trim().split('\n')
    const formatted = lines.map(line => `  ${GRAY}${line}${RESET}`).join('\n')
    return `\n${formatted}\n`
  })

  result = result.replace(/`([^`]+)`/g, `${GRAY}$1${RESET}`)

  result = result.replace(/\*\*([^*]+)\*\*/g, `${BOLD}$1${RESET}`)
  result = result.replace(/__([^_]+)__/g, `${BOLD}$1${RESET}`)

  result = result.replace(/(?<!\*)\*([^*]+)\*(?!\*)/g, `${ITALIC}$1${RESET}`)
  result = result.replace(/(?<!_)_([^_]+)_(?!_)/g, `${ITALIC}$1${RESET}`)

  result = result.replace(/^#{3,4} (.+)$/gm, `${BOLD}$1${RESET}`)
  result = result.replace(/^#{1,2} (.+)$/gm, `${BOLD}${CYAN}$1${RESET}`)

  result = result.replace(/^[-*] (.+)$/gm, `  ${CYAN}•${RESET} $1`)
  result = result.replace(/^(\d+)\. (.+)$/gm, `  ${CYAN}$1.${RESET} $2`)

  return result
}

export function loadTraits(file?: string): TraitProfile {
  if (!file) return {}
  const parsed = traitFileSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')))
  if (!parsed.success) {
    throw new Error(`${file} must be a JSON object of trait names to numeric scores`)
  }
  return parsed.data
}

function describeError(e: unknown): string {
  if (e instanceof DaemonRequestError) return `${e.message} (${e.code})`
  return errorMessage(e, 'Unknown error')
}

export async function startChat(options: ChatOptions): Promise<void> {
  let traitScores: TraitProfile
  try {
    traitScores = loadTraits(options.traits)
  } catch (e) {
    console.log(`${YELLOW}${errorMessage(e, 'Could not load traits')}${RESET}`)
    process.exit(1)
  }

  const client = new DaemonClient()

  try {
    await client.connect()
  } catch {
    console.log(`${YELLOW}Could not connect to daemon. Run "attune wake" first.${RESET}`)
    process.exit(1)
  }

  const sessionId = options.session ?? nanoid()
  const username = options.name ?? options.user
  let lastSources: { text: string; metadata: { topic: string; score: number; rank: number } }[] = []

  console.log(`${GREEN}Connected.${RESET} Session ${DIM}${sessionId}${RESET}. Type your message and press Enter. ${DIM}Ctrl+C to exit.${RESET}`)
  console.log(`${DIM}Type /help for commands.${RESET}\n`)

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: `${CYAN}>${RESET} `
  })

  rl.prompt()

  const handleLine = async (line: string): Promise<void> => {
    const message = line.trim()
    if (!message) return

    if (message.startsWith('/')) {
      await handleCommand(message, client, {
        userId: options.user,
        sessionId,
        lastSources: () => lastSources
      })
      return
    }

    const spinner = new Spinner('thinking')
    spinner.start()

    try {
      const result = await client.chat({
        userId: options.user,
        username,
        fullName: options.fullName ?? null,
        sessionId,
        traitScores,
        message
      })
      spinner.stop()
      lastSources = result.sources
      process.stdout.write(`\n${MAGENTA}Guide:${RESET} ${renderMarkdown(result.answer)}`)
      if (result.sources.length > 0) {
        process.stdout.write(`\n${DIM}(${result.sources.length} sources, /sources to list)${RESET}`)
      }
    } catch (e) {
      spinner.stop()
      console.error(`\n${YELLOW}Error: ${describeError(e)}${RESET}`)
    }

    process.stdout.write('\n\n')
  }

  rl.on('line', (line: string) => {
    handleLine(line)
      .catch((e: unknown) => console.error(`${YELLOW}Error: ${describeError(e)}${RESET}`))
      .finally(() => rl.prompt())
  })

  rl.on('close', () => {
    console.log(`\n${DIM}Goodbye.${RESET}`)
    client.disconnect()
      .catch((e: unknown) => console.error(describeError(e)))
      .finally(() => process.exit(0))
  })
}

async function handleCommand(
  input: string,
  client: DaemonClient,
  ctx: {
    userId: string
    sessionId: string
    lastSources: () => { text: string; metadata: { topic: string; score: number; rank: number } }[]
  }
): Promise<void> {
  const cmd = input.slice(1).split(/\s+/)[0]?.toLowerCase()

  switch (cmd) {
    case 'help':
      console.log(HELP_TEXT)
      break

    case 'sources': {
      const sources = ctx.lastSources()
      if (sources.length === 0) {
        console.log(`\n${DIM}No reference material was used.${RESET}\n`)
        break
      }
      console.log('')
      for (const s of sources) {
        console.log(`  ${CYAN}[${s.metadata.rank}]${RESET} ${s.metadata.topic} ${DIM}(${s.metadata.score.toFixed(2)})${RESET}`)
        console.log(`    ${s.text.length > 160 ? s.text.slice(0, 160) + '...' : s.text}`)
      }
      console.log('')
      break
    }

    case 'summary':
      try {
        const summary = await client.getSummary(ctx.userId)
        console.log(summary.summaryText ? `\n${summary.summaryText}\n` : `\n${DIM}Nothing remembered yet.${RESET}\n`)
      } catch (e) {
        console.error(`${YELLOW}Failed to get summary:${RESET} ${describeError(e)}`)
      }
      break

    case 'memory':
      try {
        const stats = await client.memoryStats(ctx.userId)
        console.log('')
        console.log(`  ${DIM}Summary:${RESET}         ${stats.summaryChars} chars`)
        console.log(`  ${DIM}Summarizations:${RESET}  ${stats.events.length}`)
        console.log(`  ${DIM}Sessions:${RESET}        ${stats.sessions.length}`)
        console.log('')
      } catch (e) {
        console.error(`${YELLOW}Failed to get memory stats:${RESET} ${describeError(e)}`)
      }
      break

    case 'end':
      try {
        const outcome = await client.expireSession(ctx.sessionId)
        if (outcome.status === 'failed') {
          console.log(`${YELLOW}Could not summarize the session: ${outcome.error}${RESET}`)
        } else {
          console.log(`${GREEN}Session closed.${RESET} Start a new chat to continue.`)
        }
      } catch (e) {
        console.error(`${YELLOW}Failed to end session:${RESET} ${describeError(e)}`)
      }
      break

    default:
      console.log(`${YELLOW}Unknown command: /${cmd}${RESET}`)
      console.log(`${DIM}Type /help for available commands.${RESET}`)
  }
}
