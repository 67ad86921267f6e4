import { getDatabase } from '../connection'
import type { SettingsRow } from '../schema'
import { DEFAULT_SETTINGS, SETTING_ENV_VARS, type AppSettings, type SettingKey } from '../../../shared/types/settings'

export function getSetting(key: string): string | null {
  const db = getDatabase()
  const row = db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as
    | Pick<SettingsRow, 'value'>
    | undefined
  return row ? row.value : null
}

export function setSetting(key: string, value: string): void {
  const db = getDatabase()
  db.prepare(
    `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, datetime('now'))
     ON CONFLICT(key) DO UPDATE SET value = ?, updated_at = datetime('now')`
  ).run(key, value, value)
}

/**
 * Effective value of an app setting: environment variable, then the stored
 * value, then the built-in default.
 */
export function getAppSetting<K extends SettingKey>(key: K): string {
  const fromEnv = process.env[SETTING_ENV_VARS[key]]
  if (fromEnv) return fromEnv
  return getSetting(key) || DEFAULT_SETTINGS[key]
}

export function getAppSettings(): AppSettings {
  const llmProvider = getAppSetting('llmProvider') === 'ollama' ? 'ollama' : 'claude'
  return {
    spreadsheetId: getAppSetting('spreadsheetId'),
    spreadsheetName: getAppSetting('spreadsheetName'),
    llmProvider,
    claudeModel: getAppSetting('claudeModel'),
    ollamaHost: getAppSetting('ollamaHost'),
    ollamaModel: getAppSetting('ollamaModel'),
    signatureFontPath: getAppSetting('signatureFontPath'),
    defaultPlace: getAppSetting('defaultPlace'),
    defaultAdminPassword: getAppSetting('defaultAdminPassword'),
    defaultUserPassword: getAppSetting('defaultUserPassword'),
    port: getAppSetting('port')
  }
}
