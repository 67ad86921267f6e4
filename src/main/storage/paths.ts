import { mkdirSync } from 'fs'
import { homedir } from 'os'
import { isAbsolute, join, resolve } from 'path'

const MEMORY_DATABASE = ':memory:'

export function getDataDir(): string {
  return process.env['MINUTES_DESK_DATA_DIR'] || join(homedir(), '.minutes-desk')
}

export function getDatabasePath(): string {
  const override = process.env['MINUTES_DESK_DB']
  if (override) return override
  return join(getDataDir(), 'minutes-desk.db')
}

export function initializeStorage(): void {
  if (getDatabasePath() === MEMORY_DATABASE) return
  mkdirSync(getDataDir(), { recursive: true })
}

/** Resolve a configured asset path against the working directory; null when none is set. */
export function resolveAssetPath(path: string): string | null {
  if (!path.trim()) return null
  return isAbsolute(path) ? path : resolve(process.cwd(), path)
}
