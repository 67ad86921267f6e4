import { timingSafeEqual } from 'crypto'
import { createSession } from './session'
import { getPasswords, setPassword } from '../sheets/repositories/passwords.repo'
import { logAudit } from '../database/repositories/audit.repo'
import type { OperationResult } from '../../shared/types/meeting'
import type { Session, UserRole } from '../../shared/types/user'

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf8')
  const b = Buffer.from(expected, 'utf8')
  return a.length === b.length && timingSafeEqual(a, b)
}

export type LoginResult =
  | { status: 'signed_in'; session: Session }
  | { status: 'rejected' }
  | { status: 'unavailable' }

/** Check the password for the chosen role; a session is opened only on a match. */
export async function login(role: UserRole, password: string): Promise<LoginResult> {
  const passwords = await getPasswords()
  if (!passwords) {
    console.warn(`[Auth] Cannot check ${role} login, settings tab unreachable`)
    return { status: 'unavailable' }
  }
  if (!sameSecret(password, passwords[role])) {
    console.warn(`[Auth] Rejected ${role} login`)
    return { status: 'rejected' }
  }
  console.log(`[Auth] ${role} signed in`)
  return { status: 'signed_in', session: createSession(role) }
}

export async function changePassword(
  role: UserRole,
  password: string,
  actor: string | null
): Promise<OperationResult> {
  if (!password.trim()) return { success: false, message: 'Password must not be empty' }

  const saved = await setPassword(role, password)
  if (!saved) return { success: false, message: 'Spreadsheet unavailable, please try again shortly' }

  logAudit(actor, 'settings', `${role}_pw`, 'update')
  return { success: true, message: `${role} password changed` }
}
