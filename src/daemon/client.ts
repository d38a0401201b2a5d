import net from 'node:net'
import { getSocketPath } from './protocol.js'
import type {
  CompactionOutcomeView,
  DaemonRequest,
  DaemonResponse,
  DaemonStatus,
  InteractionLogView,
  MemoryStats,
  RuntimeConfigView,
  SummaryView
} from './protocol.js'
import type { TurnRequest, TurnResult } from './orchestrator.js'

/** An `error` response from the daemon, with its code preserved. */
export class DaemonRequestError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = 'DaemonRequestError'
    this.code = code
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

type RequestBody = DistributiveOmit<DaemonRequest, 'requestId'>

function isDaemonResponse(value: unknown): value is DaemonResponse {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string'
}

export class DaemonClient {
  private socket: net.Socket | null = null
  private buffer: string = ''
  private handlers: Map<string, (response: DaemonResponse) => void> = new Map()
  private nextRequestId: number = 1

  private generateRequestId(): string {
    return String(this.nextRequestId++)
  }

  async connect(socketPath: string = getSocketPath()): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.connect(socketPath, () => {
        resolve()
      })
      this.socket = socket

      socket.on('data', (data) => {
        this.buffer += data.toString()
        const lines = this.buffer.split('\n')
        this.buffer = lines.pop() ?? ''

        for (const line of lines) {
          if (line.trim() === '') continue
          let response: unknown
          try {
            response = JSON.parse(line)
          } catch {
            console.error('[client] Ignoring malformed response from daemon')
            continue
          }
          if (!isDaemonResponse(response)) continue

          const handler = response.requestId ? this.handlers.get(response.requestId) : undefined
          if (handler) {
            handler(response)
          }
        }
      })

      socket.on('error', (err) => {
        this.failPending(err.message)
        reject(err)
      })

      socket.on('close', () => {
        this.failPending('Connection to daemon closed')
      })
    })
  }

  async disconnect(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket
      if (!socket || socket.destroyed) {
        this.socket = null
        resolve()
        return
      }
      socket.on('close', () => {
        this.socket = null
        resolve()
      })
      socket.end()
    })
  }

  private failPending(message: string): void {
    for (const handler of [...this.handlers.values()]) {
      handler({ type: 'error', code: 'internal', message })
    }
  }

  async send(request: RequestBody): Promise<DaemonResponse> {
    return new Promise((resolve, reject) => {
      const socket = this.socket
      if (!socket || socket.destroyed) {
        reject(new Error('Not connected'))
        return
      }

      const requestId = this.generateRequestId()

      this.handlers.set(requestId, (response: DaemonResponse) => {
        this.handlers.delete(requestId)
        resolve(response)
      })

      socket.write(JSON.stringify({ ...request, requestId }) + '\n')
    })
  }

  private async expect<T extends DaemonResponse['type']>(
    request: RequestBody,
    type: T
  ): Promise<Extract<DaemonResponse, { type: T }>> {
    const response = await this.send(request)
    if (response.type === 'error') {
      throw new DaemonRequestError(response.code, response.message)
    }
    if (!isResponseOfType(response, type)) {
      throw new Error(`Unexpected response type: ${response.type}`)
    }
    return response
  }

  async status(): Promise<DaemonStatus> {
    return (await this.expect({ type: 'status' }, 'status')).data
  }

  async shutdown(): Promise<void> {
    await this.expect({ type: 'shutdown' }, 'ok')
  }

  async chat(turn: TurnRequest): Promise<TurnResult> {
    return (await this.expect({ type: 'chat', turn }, 'chat-result')).data
  }

  async getConfig(): Promise<RuntimeConfigView> {
    return (await this.expect({ type: 'config-get' }, 'config')).data
  }

  async replaceConfig(config: unknown, options: { updatedBy?: string; expectedVersion?: number } = {}): Promise<RuntimeConfigView> {
    return (await this.expect({ type: 'config-replace', config, ...options }, 'config')).data
  }

  async resetConfig(updatedBy?: string): Promise<RuntimeConfigView> {
    return (await this.expect({ type: 'config-reset', updatedBy }, 'config')).data
  }

  async getSummary(userId: string): Promise<SummaryView> {
    return (await this.expect({ type: 'summary-get', userId }, 'summary')).data
  }

  async expireSession(sessionId: string): Promise<CompactionOutcomeView> {
    return (await this.expect({ type: 'session-expire', sessionId }, 'expire-result')).data
  }

  async memoryStats(userId: string): Promise<MemoryStats> {
    return (await this.expect({ type: 'memory-stats', userId }, 'memory-stats')).data
  }

  async interactionLogs(userId: string, limit?: number): Promise<InteractionLogView[]> {
    return (await this.expect({ type: 'interaction-logs', userId, limit }, 'interaction-logs')).data
  }
}

function isResponseOfType<T extends DaemonResponse['type']>(
  response: DaemonResponse,
  type: T
): response is Extract<DaemonResponse, { type: T }> {
  return response.type === type
}
