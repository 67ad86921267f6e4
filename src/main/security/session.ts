import { v4 as uuidv4 } from 'uuid'
import type { Session, UserRole } from '../../shared/types/user'

export const SESSION_MAX_AGE_MS = 12 * 60 * 60 * 1000

const sessions = new Map<string, Session>()

function isExpired(session: Session, now: number): boolean {
  return now - Date.parse(session.createdAt) >= SESSION_MAX_AGE_MS
}

function pruneExpired(now: number): void {
  for (const [token, session] of sessions) {
    if (isExpired(session, now)) sessions.delete(token)
  }
}

export function createSession(role: UserRole): Session {
  const now = Date.now()
  pruneExpired(now)
  const session: Session = { token: uuidv4(), role, createdAt: new Date(now).toISOString() }
  sessions.set(session.token, session)
  return session
}

/** Live session for a token; sessions older than `SESSION_MAX_AGE_MS` are dropped. */
export function getSession(token: string | null | undefined): Session | null {
  if (!token) return null
  const session = sessions.get(token)
  if (!session) return null
  if (isExpired(session, Date.now())) {
    sessions.delete(token)
    return null
  }
  return session
}

export function endSession(token: string): boolean {
  return sessions.delete(token)
}

export function clearSessions(): void {
  sessions.clear()
}
