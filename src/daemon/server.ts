import net from 'node:net'
import { unlinkSync, existsSync } from 'node:fs'
import {
  getSocketPath,
  daemonRequestSchema,
  toConfigView,
  toEventView,
  toInteractionLogView,
  toOutcomeView,
  toSummaryView
} from './protocol.js'
import type { DaemonRequest, DaemonResponse, DaemonStatus, MemoryStats } from './protocol.js'
import { AttuneError } from '../errors.js'
import { charLength } from '../utils/text.js'
import type { ChatOrchestrator } from './orchestrator.js'
import type { MemoryLifecycleManager } from '../consolidation/manager.js'
import type { SessionMemoryStore } from '../memory/session-store.js'
import type { PersistentSummaryStore } from '../memory/summary-store.js'
import type { RuntimeConfigStore } from '../settings/runtime-config.js'
import type { InteractionLogStore } from '../logging/interaction-log.js'

interface DaemonServices {
  orchestrator: ChatOrchestrator
  runtimeConfig: RuntimeConfigStore
  sessions: SessionMemoryStore
  summaries: PersistentSummaryStore
  lifecycle: MemoryLifecycleManager
  interactions: InteractionLogStore
}

export function toErrorResponse(e: unknown): DaemonResponse {
  if (e instanceof AttuneError) {
    return { type: 'error', code: e.code, message: e.message }
  }
  console.error('[daemon] Unhandled error:', e)
  return { type: 'error', code: 'internal', message: e instanceof Error ? e.message : 'Internal error' }
}

export class DaemonServer {
  private server: net.Server | null = null
  private connections: Set<net.Socket> = new Set()
  private startTime: number = 0
  private services: DaemonServices | null = null
  private lastIdleSweep: Date | null = null
  private onShutdown: (() => Promise<void>) | null = null

  init(services: DaemonServices): void {
    this.services = services
  }

  /** Called after a `shutdown` request has been answered. Defaults to stopping the server. */
  setShutdownHandler(handler: () => Promise<void>): void {
    this.onShutdown = handler
  }

  recordIdleSweep(at: Date): void {
    this.lastIdleSweep = at
  }

  async start(socketPath: string = getSocketPath()): Promise<void> {
    if (existsSync(socketPath)) {
      unlinkSync(socketPath)
    }

    this.startTime = Date.now()

    return new Promise((resolve, reject) => {
      const MAX_BUFFER_SIZE = 1024 * 1024 // 1MB

      this.server = net.createServer((socket) => {
        this.connections.add(socket)
        let buffer = ''

        socket.on('data', (data) => {
          buffer += data.toString()

          if (buffer.length > MAX_BUFFER_SIZE) {
            this.sendResponse(socket, { type: 'error', code: 'invalid_request', message: 'Message too large' })
            buffer = ''
            return
          }

          const lines = buffer.split('\n')
          // Keep the last (possibly incomplete) chunk in the buffer
          buffer = lines.pop() ?? ''

          for (const line of lines) {
            if (line.trim() === '') continue
            let raw: unknown
            try {
              raw = JSON.parse(line)
            } catch {
              this.sendResponse(socket, { type: 'error', code: 'invalid_request', message: 'Invalid JSON' })
              continue
            }

            const parsed = daemonRequestSchema.safeParse(raw)
            if (!parsed.success) {
              const requestId = requestIdOf(raw)
              this.sendResponse(socket, {
                type: 'error',
                code: 'invalid_request',
                message: `Invalid request: ${parsed.error.issues[0]?.message ?? 'malformed'}`
              }, requestId)
              continue
            }

            this.handleRequest(parsed.data, socket).catch((e: unknown) => {
              this.sendResponse(socket, toErrorResponse(e), parsed.data.requestId)
            })
          }
        })

        socket.on('close', () => {
          this.connections.delete(socket)
        })

        socket.on('error', () => {
          this.connections.delete(socket)
        })
      })

      this.server.on('error', reject)

      this.server.listen(socketPath, () => {
        resolve()
      })
    })
  }

  async stop(): Promise<void> {
    for (const socket of this.connections) {
      socket.destroy()
    }
    this.connections.clear()

    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve()
        return
      }
      this.server.close((err) => {
        if (err) {
          reject(err)
        } else {
          this.server = null
          resolve()
        }
      })
    })
  }

  private async handleRequest(request: DaemonRequest, socket: net.Socket): Promise<void> {
    const requestId = request.requestId

    if (request.type === 'status') {
      this.sendResponse(socket, { type: 'status', data: this.getStatus() }, requestId)
      return
    }
    if (request.type === 'shutdown') {
      this.handleShutdown(socket, requestId)
      return
    }

    const services = this.services
    if (!services) {
      this.sendResponse(socket, { type: 'error', code: 'internal', message: 'Daemon not initialized' }, requestId)
      return
    }

    switch (request.type) {
      case 'chat': {
        const data = await services.orchestrator.handleTurn(request.turn)
        this.sendResponse(socket, { type: 'chat-result', data }, requestId)
        break
      }
      case 'config-get':
        this.sendResponse(socket, { type: 'config', data: toConfigView(services.runtimeConfig.snapshot()) }, requestId)
        break
      case 'config-replace': {
        const snapshot = services.runtimeConfig.replace(request.config, {
          updatedBy: request.updatedBy,
          expectedVersion: request.expectedVersion
        })
        this.sendResponse(socket, { type: 'config', data: toConfigView(snapshot) }, requestId)
        break
      }
      case 'config-reset':
        this.sendResponse(socket, {
          type: 'config',
          data: toConfigView(services.runtimeConfig.resetToDefaults(request.updatedBy))
        }, requestId)
        break
      case 'summary-get':
        this.sendResponse(socket, { type: 'summary', data: toSummaryView(services.summaries.get(request.userId)) }, requestId)
        break
      case 'session-expire': {
        const outcome = await services.sessions.expire(request.sessionId)
        this.sendResponse(socket, { type: 'expire-result', data: toOutcomeView(outcome) }, requestId)
        break
      }
      case 'memory-stats':
        this.sendResponse(socket, { type: 'memory-stats', data: this.getMemoryStats(services, request.userId) }, requestId)
        break
      case 'interaction-logs':
        this.sendResponse(socket, {
          type: 'interaction-logs',
          data: services.interactions.list(request.userId, request.limit).map(toInteractionLogView)
        }, requestId)
        break
    }
  }

  private getStatus(): DaemonStatus {
    return {
      uptime: Date.now() - this.startTime,
      configVersion: this.services?.runtimeConfig.snapshot().version ?? 0,
      activeSessions: this.services?.sessions.countActive() ?? 0,
      lastIdleSweep: this.lastIdleSweep?.toISOString() ?? null
    }
  }

  private getMemoryStats(services: DaemonServices, userId: string): MemoryStats {
    const summary = services.summaries.get(userId)
    return {
      userId,
      summaryChars: summary.kind === 'summary' ? charLength(summary.summaryText) : 0,
      summaryUpdatedAt: summary.kind === 'summary' ? summary.createdAt.toISOString() : null,
      events: services.summaries.events(userId).map(toEventView),
      sessions: services.sessions.listForUser(userId).map(session => ({
        sessionId: session.sessionId,
        status: session.status,
        updatedAt: session.updatedAt.toISOString(),
        size: services.sessions.sizeOf(session.sessionId)
      }))
    }
  }

  private handleShutdown(socket: net.Socket, requestId?: string): void {
    this.sendResponse(socket, { type: 'ok' }, requestId)
    // Defer so the response can be flushed
    setImmediate(() => {
      const stop = this.onShutdown ?? (() => this.stop())
      stop().catch((e: unknown) => {
        console.error('[daemon] Shutdown failed:', e)
      })
    })
  }

  private sendResponse(socket: net.Socket, response: DaemonResponse, requestId?: string): void {
    if (!socket.destroyed) {
      const payload = requestId ? { ...response, requestId } : response
      socket.write(JSON.stringify(payload) + '\n')
    }
  }
}

function requestIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'requestId' in raw && typeof raw.requestId === 'string') {
    return raw.requestId
  }
  return undefined
}
