import { randomUUID } from 'crypto'
import { getDatabase } from '../connection'
import type { AuditRow } from '../schema'

export type AuditAction = 'create' | 'update' | 'delete'
export type AuditEntity = 'minutes' | 'faculty' | 'settings'

export interface AuditEntry {
  id: string
  actor: string | null
  entityType: string
  entityId: string
  action: string
  changes: unknown
  createdAt: string
}

export function logAudit(
  actor: string | null,
  entityType: AuditEntity,
  entityId: string,
  action: AuditAction,
  changes: unknown = null
): void {
  const db = getDatabase()
  db.prepare(`
    INSERT INTO audit_log (
      id, actor, entity_type, entity_id, action, changes_json, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, datetime('now'))
  `).run(
    randomUUID(),
    actor,
    entityType,
    entityId,
    action,
    changes == null ? null : JSON.stringify(changes)
  )
}

export function listAudit(entityType: AuditEntity, entityId: string): AuditEntry[] {
  const db = getDatabase()
  const rows = db
    .prepare('SELECT * FROM audit_log WHERE entity_type = ? AND entity_id = ? ORDER BY rowid ASC')
    .all(entityType, entityId) as AuditRow[]
  return rows.map((row) => ({
    id: row.id,
    actor: row.actor,
    entityType: row.entity_type,
    entityId: row.entity_id,
    action: row.action,
    changes: row.changes_json ? JSON.parse(row.changes_json) : null,
    createdAt: row.created_at
  }))
}
