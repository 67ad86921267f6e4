import { getDatabase } from './database/connection'
import { getAppSetting } from './database/repositories/settings.repo'
import { registerAllHandlers } from './ipc'
import { startIpcServer } from './ipc/server'
import { ensureSettingsTab } from './sheets/repositories/passwords.repo'
import { initializeStorage } from './storage/paths'

async function main(): Promise<void> {
  initializeStorage()
  getDatabase()
  registerAllHandlers()

  // Login needs the settings tab; an unreachable spreadsheet only delays it
  await ensureSettingsTab()

  const port = Number.parseInt(getAppSetting('port'), 10)
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid port "${getAppSetting('port')}"`)
  }
  await startIpcServer(port)
  console.log('[Startup] Minutes desk ready')
}

main().catch((err) => {
  console.error('[Startup] Failed to start:', err)
  process.exitCode = 1
})
