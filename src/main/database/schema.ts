// Raw database row types (snake_case matching SQLite columns)

export interface SettingsRow {
  key: string
  value: string
  updated_at: string
}

export interface AuditRow {
  id: string
  actor: string | null
  entity_type: string
  entity_id: string
  action: string
  changes_json: string | null
  created_at: string
}
