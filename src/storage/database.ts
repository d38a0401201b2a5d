import BetterSqlite3 from 'better-sqlite3'
import { z } from 'zod'
import { ConcurrencyConflict } from '../errors.js'
import type {
  Exchange,
  ExchangeRole,
  PersistentSummary,
  SessionRecord,
  SessionSize,
  SessionStatus,
  SummarizationEvent,
  TriggerReason
} from '../memory/types.js'
import type { InteractionLog, InteractionStatus } from '../logging/interaction-log.js'

interface SessionRow {
  session_id: string
  user_id: string
  status: string
  created_at: string
  updated_at: string
}

interface ExchangeRow {
  seq: number
  role: string
  content: string
  timestamp: string
}

interface SummaryRow {
  user_id: string
  summary_text: string
  transcript_snapshot: string
  event_id: number
  created_at: string
}

interface EventRow {
  id: number
  user_id: string
  session_id: string
  trigger_reason: string
  exchange_count: number
  chars_before: number
  summary_length: number
  created_at: string
}

interface InteractionLogRow {
  id: number
  user_id: string
  session_id: string
  status: string
  user_message: string
  answer: string | null
  error: string | null
  system_prompt: string
  summary_text: string | null
  history_count: number
  sources: string
  model_params: string
  prompt_metrics: string
  timings: string
  config_version: number
  created_at: string
}

interface RuntimeConfigRow {
  version: number
  config: string
  updated_by: string | null
  updated_at: string
}

export interface StoredRuntimeConfig {
  version: number
  config: unknown
  updatedBy: string | null
  updatedAt: Date
}

const snapshotSchema = z.array(z.object({
  seq: z.number().int(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string()
}))

const sourcesSchema = z.array(z.object({
  topic: z.string(),
  score: z.number(),
  rank: z.number().int()
}))

const modelParamsSchema = z.object({
  model: z.string(),
  temperature: z.number(),
  maxTokens: z.number(),
  presencePenalty: z.number(),
  frequencyPenalty: z.number()
})

const promptMetricsSchema = z.object({
  base: z.number(),
  traits: z.number(),
  summary: z.number(),
  history: z.number(),
  reference: z.number(),
  total: z.number(),
  droppedHistory: z.number(),
  droppedChunks: z.number()
})

const timingsSchema = z.object({
  retrievalMs: z.number(),
  modelMs: z.number(),
  totalMs: z.number()
})

const ROLES: readonly ExchangeRole[] = ['user', 'assistant']
const STATUSES: readonly SessionStatus[] = ['active', 'terminated']
const TRIGGER_REASONS: readonly TriggerReason[] = ['size_threshold', 'expire', 'idle_expiry']
const INTERACTION_STATUSES: readonly InteractionStatus[] = ['answered', 'failed']

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find(a => a === value)
  if (match === undefined) {
    throw new Error(`Unexpected value "${value}" in column ${column}`)
  }
  return match
}

function isWriteConflict(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false
  return err.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
    err.code === 'SQLITE_BUSY'
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('foreign_keys = ON')
    this.db.pragma('busy_timeout = 2000')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'terminated')),
        created_at DATETIME NOT NULL,
        updated_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);

      CREATE TABLE IF NOT EXISTS session_exchanges (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES sessions(session_id),
        seq INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        timestamp DATETIME NOT NULL,
        UNIQUE (session_id, seq)
      );

      CREATE TABLE IF NOT EXISTS summarization_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        trigger_reason TEXT NOT NULL,
        exchange_count INTEGER NOT NULL,
        chars_before INTEGER NOT NULL,
        summary_length INTEGER NOT NULL,
        created_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_summarization_events_user ON summarization_events(user_id);

      CREATE TABLE IF NOT EXISTS persistent_summaries (
        user_id TEXT PRIMARY KEY,
        summary_text TEXT NOT NULL,
        transcript_snapshot JSON NOT NULL,
        event_id INTEGER NOT NULL REFERENCES summarization_events(id),
        created_at DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS interaction_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('answered', 'failed')),
        user_message TEXT NOT NULL,
        answer TEXT,
        error TEXT,
        system_prompt TEXT NOT NULL,
        summary_text TEXT,
        history_count INTEGER NOT NULL,
        sources JSON NOT NULL,
        model_params JSON NOT NULL,
        prompt_metrics JSON NOT NULL,
        timings JSON NOT NULL,
        config_version INTEGER NOT NULL,
        created_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_interaction_logs_user ON interaction_logs(user_id, id);

      CREATE TABLE IF NOT EXISTS runtime_config (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        version INTEGER NOT NULL,
        config JSON NOT NULL,
        updated_by TEXT,
        updated_at DATETIME NOT NULL
      );
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all()
    return rows.map(r => r.name)
  }

  /** Runs `fn` in one SQLite transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  // --- Sessions ---

  getSession(sessionId: string): SessionRecord | null {
    const row = this.db.prepare<[string], SessionRow>(
      'SELECT * FROM sessions WHERE session_id = ?'
    ).get(sessionId)
    return row ? this.deserializeSession(row) : null
  }

  insertSession(session: SessionRecord): void {
    this.db.prepare(`
      INSERT INTO sessions (session_id, user_id, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(
      session.sessionId,
      session.userId,
      session.status,
      session.createdAt.toISOString(),
      session.updatedAt.toISOString()
    )
  }

  touchSession(sessionId: string, updatedAt: Date): void {
    this.db.prepare('UPDATE sessions SET updated_at = ? WHERE session_id = ?')
      .run(updatedAt.toISOString(), sessionId)
  }

  terminateSession(sessionId: string, at: Date): void {
    this.db.prepare("UPDATE sessions SET status = 'terminated', updated_at = ? WHERE session_id = ?")
      .run(at.toISOString(), sessionId)
  }

  listSessions(filter: { status?: SessionStatus; userId?: string; updatedBefore?: Date }): SessionRecord[] {
    const clauses: string[] = []
    const params: string[] = []

    if (filter.status !== undefined) {
      clauses.push('status = ?')
      params.push(filter.status)
    }
    if (filter.userId !== undefined) {
      clauses.push('user_id = ?')
      params.push(filter.userId)
    }
    if (filter.updatedBefore !== undefined) {
      clauses.push('updated_at < ?')
      params.push(filter.updatedBefore.toISOString())
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : ''
    const rows = this.db.prepare<string[], SessionRow>(
      `SELECT * FROM sessions${where} ORDER BY updated_at ASC`
    ).all(...params)
    return rows.map(row => this.deserializeSession(row))
  }

  private deserializeSession(row: SessionRow): SessionRecord {
    return {
      sessionId: row.session_id,
      userId: row.user_id,
      status: oneOf(STATUSES, row.status, 'sessions.status'),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    }
  }

  // --- Exchanges ---

  getExchanges(sessionId: string): Exchange[] {
    const rows = this.db.prepare<[string], ExchangeRow>(
      'SELECT seq, role, content, timestamp FROM session_exchanges WHERE session_id = ? ORDER BY seq ASC'
    ).all(sessionId)
    return rows.map(row => ({
      seq: row.seq,
      role: oneOf(ROLES, row.role, 'session_exchanges.role'),
      content: row.content,
      timestamp: new Date(row.timestamp)
    }))
  }

  maxSeq(sessionId: string): number {
    const row = this.db.prepare<[string], { max_seq: number | null }>(
      'SELECT MAX(seq) AS max_seq FROM session_exchanges WHERE session_id = ?'
    ).get(sessionId)
    return row?.max_seq ?? 0
  }

  /**
   * Inserts exchanges that already carry their sequence numbers. A clash on
   * (session_id, seq) means another writer got there first.
   */
  insertExchanges(sessionId: string, exchanges: Exchange[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO session_exchanges (session_id, seq, role, content, timestamp)
      VALUES (?, ?, ?, ?, ?)
    `)
    try {
      for (const ex of exchanges) {
        stmt.run(sessionId, ex.seq, ex.role, ex.content, ex.timestamp.toISOString())
      }
    } catch (e) {
      if (isWriteConflict(e)) {
        throw new ConcurrencyConflict(`Sequence conflict appending to session ${sessionId}`, { cause: e })
      }
      throw e
    }
  }

  deleteExchangesThrough(sessionId: string, seq: number): number {
    const result = this.db.prepare('DELETE FROM session_exchanges WHERE session_id = ? AND seq <= ?')
      .run(sessionId, seq)
    return result.changes
  }

  sessionSize(sessionId: string): SessionSize {
    const row = this.db.prepare<[string], { message_count: number; char_count: number }>(`
      SELECT COUNT(*) AS message_count, COALESCE(SUM(LENGTH(content)), 0) AS char_count
      FROM session_exchanges WHERE session_id = ?
    `).get(sessionId)
    return {
      messageCount: row?.message_count ?? 0,
      charCount: row?.char_count ?? 0
    }
  }

  // --- Summaries ---

  getSummary(userId: string): PersistentSummary | null {
    const row = this.db.prepare<[string], SummaryRow>(
      'SELECT * FROM persistent_summaries WHERE user_id = ?'
    ).get(userId)
    if (!row) return null

    const snapshot = snapshotSchema.parse(JSON.parse(row.transcript_snapshot))
    return {
      kind: 'summary',
      userId: row.user_id,
      summaryText: row.summary_text,
      transcriptSnapshot: snapshot.map(ex => ({ ...ex, timestamp: new Date(ex.timestamp) })),
      eventId: row.event_id,
      createdAt: new Date(row.created_at)
    }
  }

  upsertSummary(summary: Omit<PersistentSummary, 'kind'>): void {
    this.db.prepare(`
      INSERT INTO persistent_summaries (user_id, summary_text, transcript_snapshot, event_id, created_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(user_id) DO UPDATE SET
        summary_text = excluded.summary_text,
        transcript_snapshot = excluded.transcript_snapshot,
        event_id = excluded.event_id,
        created_at = excluded.created_at
    `).run(
      summary.userId,
      summary.summaryText,
      JSON.stringify(summary.transcriptSnapshot.map(ex => ({ ...ex, timestamp: ex.timestamp.toISOString() }))),
      summary.eventId,
      summary.createdAt.toISOString()
    )
  }

  deleteSummary(userId: string): boolean {
    return this.db.prepare('DELETE FROM persistent_summaries WHERE user_id = ?').run(userId).changes > 0
  }

  // --- Summarization Events ---

  insertSummarizationEvent(event: Omit<SummarizationEvent, 'id'>): number {
    const result = this.db.prepare(`
      INSERT INTO summarization_events (user_id, session_id, trigger_reason, exchange_count, chars_before, summary_length, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.userId,
      event.sessionId,
      event.triggerReason,
      event.exchangeCount,
      event.charsBefore,
      event.summaryLength,
      event.createdAt.toISOString()
    )
    return Number(result.lastInsertRowid)
  }

  getSummarizationEvents(filter: { userId?: string; sessionId?: string }): SummarizationEvent[] {
    const clauses: string[] = []
    const params: string[] = []
    if (filter.userId !== undefined) {
      clauses.push('user_id = ?')
      params.push(filter.userId)
    }
    if (filter.sessionId !== undefined) {
      clauses.push('session_id = ?')
      params.push(filter.sessionId)
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : ''
    const rows = this.db.prepare<string[], EventRow>(
      `SELECT * FROM summarization_events${where} ORDER BY id DESC`
    ).all(...params)

    return rows.map(row => ({
      id: row.id,
      userId: row.user_id,
      sessionId: row.session_id,
      triggerReason: oneOf(TRIGGER_REASONS, row.trigger_reason, 'summarization_events.trigger_reason'),
      exchangeCount: row.exchange_count,
      charsBefore: row.chars_before,
      summaryLength: row.summary_length,
      createdAt: new Date(row.created_at)
    }))
  }

  // --- Interaction Logs ---

  insertInteractionLog(log: Omit<InteractionLog, 'id'>): number {
    const result = this.db.prepare(`
      INSERT INTO interaction_logs (
        user_id, session_id, status, user_message, answer, error, system_prompt, summary_text,
        history_count, sources, model_params, prompt_metrics, timings, config_version, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      log.userId,
      log.sessionId,
      log.status,
      log.userMessage,
      log.answer,
      log.error,
      log.systemPrompt,
      log.summaryText,
      log.historyCount,
      JSON.stringify(log.sources),
      JSON.stringify(log.modelParams),
      JSON.stringify(log.promptMetrics),
      JSON.stringify(log.timings),
      log.configVersion,
      log.createdAt.toISOString()
    )
    return Number(result.lastInsertRowid)
  }

  getInteractionLogs(filter: { userId: string; limit: number }): InteractionLog[] {
    const rows = this.db.prepare<[string, number], InteractionLogRow>(
      'SELECT * FROM interaction_logs WHERE user_id = ? ORDER BY id DESC LIMIT ?'
    ).all(filter.userId, filter.limit)

    return rows.map(row => ({
      id: row.id,
      userId: row.user_id,
      sessionId: row.session_id,
      status: oneOf(INTERACTION_STATUSES, row.status, 'interaction_logs.status'),
      userMessage: row.user_message,
      answer: row.answer,
      error: row.error,
      systemPrompt: row.system_prompt,
      summaryText: row.summary_text,
      historyCount: row.history_count,
      sources: sourcesSchema.parse(JSON.parse(row.sources)),
      modelParams: modelParamsSchema.parse(JSON.parse(row.model_params)),
      promptMetrics: promptMetricsSchema.parse(JSON.parse(row.prompt_metrics)),
      timings: timingsSchema.parse(JSON.parse(row.timings)),
      configVersion: row.config_version,
      createdAt: new Date(row.created_at)
    }))
  }

  // --- Runtime Config ---

  loadRuntimeConfig(): StoredRuntimeConfig | null {
    const row = this.db.prepare<[], RuntimeConfigRow>(
      'SELECT version, config, updated_by, updated_at FROM runtime_config WHERE id = 1'
    ).get()
    if (!row) return null

    const config: unknown = JSON.parse(row.config)
    return {
      version: row.version,
      config,
      updatedBy: row.updated_by,
      updatedAt: new Date(row.updated_at)
    }
  }

  saveRuntimeConfig(record: { version: number; config: unknown; updatedBy: string | null; updatedAt: Date }): void {
    this.db.prepare(`
      INSERT INTO runtime_config (id, version, config, updated_by, updated_at)
      VALUES (1, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        version = excluded.version,
        config = excluded.config,
        updated_by = excluded.updated_by,
        updated_at = excluded.updated_at
    `).run(
      record.version,
      JSON.stringify(record.config),
      record.updatedBy,
      record.updatedAt.toISOString()
    )
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
