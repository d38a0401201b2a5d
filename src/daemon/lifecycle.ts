import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { Database } from '../storage/database.js'
import { SessionMemoryStore } from '../memory/session-store.js'
import { PersistentSummaryStore } from '../memory/summary-store.js'
import { MemoryLifecycleManager } from '../consolidation/manager.js'
import { RuntimeConfigStore } from '../settings/runtime-config.js'
import { expandHome, loadConfig, validateConfig } from '../config.js'
import type { AttuneConfig } from '../config.js'
import { AiSdkLanguageModel, createCondenser, createLLMProvider } from '../providers/llm.js'
import type { LanguageModelClient } from '../providers/llm.js'
import { createKnowledgeRetrieval } from '../providers/retrieval.js'
import type { KnowledgeRetrieval } from '../providers/retrieval.js'
import { ChatOrchestrator } from './orchestrator.js'
import { InteractionLogStore } from '../logging/interaction-log.js'
import { ConfigurationError } from '../errors.js'

export interface WakeOptions {
  config?: AttuneConfig
  /** Replaces the ai-sdk client, for tests and offline runs. */
  model?: LanguageModelClient
  retrieval?: KnowledgeRetrieval
}

export class DaemonLifecycle {
  public db!: Database
  public config!: AttuneConfig
  public sessions!: SessionMemoryStore
  public summaries!: PersistentSummaryStore
  public runtimeConfig!: RuntimeConfigStore
  public interactions!: InteractionLogStore
  public lifecycle!: MemoryLifecycleManager
  public orchestrator!: ChatOrchestrator

  private expiryTimer: NodeJS.Timeout | null = null
  private sweeping: boolean = false
  private onSweep: ((at: Date) => void) | null = null

  async wake(options: WakeOptions = {}): Promise<void> {
    // 1. Load config
    this.config = options.config ?? loadConfig()

    // 1b. Validate; a supplied model client needs no API key
    const configErrors = validateConfig(this.config, { requireApiKey: options.model === undefined })
    if (configErrors.length > 0) {
      const details = configErrors.map(e => e.message).join('\n')
      throw new ConfigurationError(`Invalid configuration:\n${details}`)
    }

    // 2. Open database
    const dbPath = this.config.storage.dbPath === ':memory:' ? ':memory:' : expandHome(this.config.storage.dbPath)
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true })
    }
    this.db = new Database(dbPath)

    // 3. Stores
    this.sessions = new SessionMemoryStore(this.db, {
      appendRetries: this.config.memory.appendRetries,
      appendBackoffMs: this.config.memory.appendBackoffMs
    })
    this.summaries = new PersistentSummaryStore(this.db)
    this.runtimeConfig = new RuntimeConfigStore(this.db)
    this.interactions = new InteractionLogStore(this.db)

    const snapshot = this.runtimeConfig.snapshot()
    console.log(`[startup] Database: ${dbPath}`)
    console.log(`[startup] Runtime config v${snapshot.version}: model ${snapshot.config.model.name}, style ${snapshot.config.promptStyle}`)
    console.log(`[startup] ${this.sessions.countActive()} active sessions`)

    // 4. Providers
    const model = options.model ?? new AiSdkLanguageModel(createLLMProvider(this.config.llm))
    const retrieval = options.retrieval ?? createKnowledgeRetrieval(this.config.retrieval)
    if (!this.config.retrieval.enabled) {
      console.log('[startup] Knowledge retrieval disabled')
    }

    // 5. Lifecycle manager
    this.lifecycle = new MemoryLifecycleManager({
      sessions: this.sessions,
      summaries: this.summaries,
      condense: createCondenser(model, this.config.llm.summaryModel),
      thresholds: {
        maxMessages: this.config.memory.sessionMessageLimit,
        maxChars: this.config.memory.sessionCharLimit
      },
      timeoutMs: this.config.llm.summaryTimeoutMs
    })
    this.sessions.setLifecycle(this.lifecycle)

    // 6. Orchestrator
    this.orchestrator = new ChatOrchestrator({
      runtimeConfig: this.runtimeConfig,
      sessions: this.sessions,
      summaries: this.summaries,
      lifecycle: this.lifecycle,
      retrieval,
      model,
      timeouts: {
        retrievalMs: this.config.retrieval.timeoutMs,
        modelMs: this.config.llm.requestTimeoutMs
      },
      interactions: this.interactions
    })

    // 7. Schedule idle-session expiry
    this.scheduleExpiry()
  }

  setSweepListener(listener: (at: Date) => void): void {
    this.onSweep = listener
  }

  async sleep(): Promise<void> {
    if (this.expiryTimer) {
      clearInterval(this.expiryTimer)
      this.expiryTimer = null
    }
    this.db.close()
  }

  /** Expires sessions idle longer than `memory.sessionIdleMinutes`. */
  async expireIdleSessions(now: Date = new Date()): Promise<number> {
    if (this.sweeping) return 0
    this.sweeping = true
    try {
      const cutoff = new Date(now.getTime() - this.config.memory.sessionIdleMinutes * 60_000)
      const outcomes = await this.lifecycle.expireIdle(cutoff)
      const closed = outcomes.filter(o => o.status !== 'failed').length
      if (outcomes.length > 0) {
        console.log(`[expiry] Expired ${closed} of ${outcomes.length} idle sessions`)
      }
      this.onSweep?.(now)
      return closed
    } finally {
      this.sweeping = false
    }
  }

  private scheduleExpiry(): void {
    const intervalMs = this.config.memory.expiryCheckIntervalMinutes * 60_000
    this.expiryTimer = setInterval(() => {
      this.expireIdleSessions().catch((e: unknown) => {
        console.error('[expiry] Idle sweep failed:', e)
      })
    }, intervalMs)
    this.expiryTimer.unref()
  }
}
