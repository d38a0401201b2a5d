import { DaemonServer } from './server.js'
import { DaemonLifecycle } from './lifecycle.js'
import { writeFileSync, unlinkSync, existsSync } from 'node:fs'
import { getPidPath } from './protocol.js'

const PID_FILE = getPidPath()

function cleanupPidFile(): void {
  try {
    if (existsSync(PID_FILE)) unlinkSync(PID_FILE)
  } catch (e) {
    console.error('[daemon] Could not remove pid file:', e)
  }
}

process.on('uncaughtException', (err) => {
  console.error('[daemon] Uncaught exception:', err)
  cleanupPidFile()
  process.exit(1)
})

process.on('unhandledRejection', (err) => {
  console.error('[daemon] Unhandled rejection:', err)
  cleanupPidFile()
  process.exit(1)
})

async function main(): Promise<void> {
  const lifecycle = new DaemonLifecycle()
  await lifecycle.wake()

  const server = new DaemonServer()
  server.init({
    orchestrator: lifecycle.orchestrator,
    runtimeConfig: lifecycle.runtimeConfig,
    sessions: lifecycle.sessions,
    summaries: lifecycle.summaries,
    lifecycle: lifecycle.lifecycle,
    interactions: lifecycle.interactions
  })
  lifecycle.setSweepListener(at => server.recordIdleSweep(at))

  const shutdown = async () => {
    await server.stop()
    await lifecycle.sleep()
    cleanupPidFile()
    process.exit(0)
  }
  server.setShutdownHandler(shutdown)

  await server.start()
  writeFileSync(PID_FILE, process.pid.toString())
  console.log(`[startup] Daemon listening (pid ${process.pid})`)

  process.on('SIGTERM', () => {
    shutdown().catch(() => { cleanupPidFile(); process.exit(1) })
  })

  process.on('SIGINT', () => {
    shutdown().catch(() => { cleanupPidFile(); process.exit(1) })
  })

  process.on('exit', cleanupPidFile)
}

main().catch((err) => {
  console.error('[daemon] Failed to start:', err)
  process.exit(1)
})
