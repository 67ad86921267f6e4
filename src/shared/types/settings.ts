export type LlmProvider = 'claude' | 'ollama'

export interface AppSettings {
  spreadsheetId: string
  spreadsheetName: string
  llmProvider: LlmProvider
  claudeModel: string
  ollamaHost: string
  ollamaModel: string
  signatureFontPath: string
  defaultPlace: string
  defaultAdminPassword: string
  defaultUserPassword: string
  port: string
}

export type SettingKey = keyof AppSettings

export const DEFAULT_SETTINGS: AppSettings = {
  spreadsheetId: '',
  spreadsheetName: '교수학습공동체_DB',
  llmProvider: 'claude',
  claudeModel: 'claude-3-5-haiku-latest',
  ollamaHost: 'http://127.0.0.1:11434',
  ollamaModel: 'llama3.1',
  signatureFontPath: '',
  defaultPlace: '경기캠퍼스 인문사회관 210호',
  defaultAdminPassword: 'change-me-admin',
  defaultUserPassword: 'change-me-user',
  port: '4310'
}

export const SETTING_ENV_VARS: Record<SettingKey, string> = {
  spreadsheetId: 'MINUTES_DESK_SPREADSHEET_ID',
  spreadsheetName: 'MINUTES_DESK_SPREADSHEET_NAME',
  llmProvider: 'MINUTES_DESK_LLM_PROVIDER',
  claudeModel: 'MINUTES_DESK_CLAUDE_MODEL',
  ollamaHost: 'MINUTES_DESK_OLLAMA_HOST',
  ollamaModel: 'MINUTES_DESK_OLLAMA_MODEL',
  signatureFontPath: 'MINUTES_DESK_FONT_PATH',
  defaultPlace: 'MINUTES_DESK_DEFAULT_PLACE',
  defaultAdminPassword: 'MINUTES_DESK_ADMIN_PASSWORD',
  defaultUserPassword: 'MINUTES_DESK_USER_PASSWORD',
  port: 'MINUTES_DESK_PORT'
}

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key)
}
