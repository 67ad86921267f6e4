import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { changePassword, login, type LoginResult } from './auth'
import { clearSessions, createSession, endSession, getSession, SESSION_MAX_AGE_MS } from './session'
import { setSheetBackend } from '../sheets/connection'
import { closeDatabase } from '../database/connection'
import { listAudit } from '../database/repositories/audit.repo'
import { MemoryBackend } from '../../test/memory-backend'
import type { Session } from '../../shared/types/user'

function sessionOf(result: LoginResult): Session | null {
  return result.status === 'signed_in' ? result.session : null
}

describe('login gate', () => {
  let backend: MemoryBackend

  beforeEach(() => {
    backend = new MemoryBackend()
    setSheetBackend(backend)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.useRealTimers()
    setSheetBackend(null)
    clearSessions()
    closeDatabase()
    vi.restoreAllMocks()
  })

  it('accepts the default password when the settings tab is new', async () => {
    const session = sessionOf(await login('admin', 'change-me-admin'))

    expect(session?.role).toBe('admin')
    expect(backend.rows('설정')).toEqual([['Key', 'Value']])
  })

  it('rebuilds a settings tab whose header is wrong', async () => {
    backend.seed('설정', [['Name', 'Secret'], ['admin_pw', 'old']])

    await login('user', 'change-me-user')

    expect(backend.rows('설정')).toEqual([
      ['Key', 'Value'],
      ['admin_pw', 'change-me-admin'],
      ['user_pw', 'change-me-user']
    ])
  })

  it('checks the stored password for the chosen role', async () => {
    backend.seed('설정', [['Key', 'Value'], ['admin_pw', 'test-secret'], ['user_pw', 1234]])

    expect(await login('admin', 'change-me-admin')).toEqual({ status: 'rejected' })
    expect((await login('admin', 'test-secret')).status).toBe('signed_in')
    expect(await login('user', 'test-secret')).toEqual({ status: 'rejected' })
    expect(sessionOf(await login('user', '1234'))?.role).toBe('user')
  })

  it('opens no session when the settings tab is unreachable', async () => {
    backend.seed('설정', [['Key', 'Value'], ['admin_pw', 'test-secret'], ['user_pw', 'test-user']])
    backend.offline = true

    expect(await login('admin', 'change-me-admin')).toEqual({ status: 'unavailable' })
    expect(await login('admin', 'test-secret')).toEqual({ status: 'unavailable' })
  })

  it('tracks sessions until logout', async () => {
    const session = sessionOf(await login('admin', 'change-me-admin'))
    const token = session?.token ?? ''

    expect(getSession(token)).toEqual(session)
    expect(endSession(token)).toBe(true)
    expect(getSession(token)).toBeNull()
    expect(getSession(null)).toBeNull()
  })

  it('expires a session once it reaches the age limit', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-03-10T09:00:00Z'))
    const session = createSession('user')

    vi.setSystemTime(new Date(Date.parse('2024-03-10T09:00:00Z') + SESSION_MAX_AGE_MS - 1))
    expect(getSession(session.token)).toEqual(session)

    vi.setSystemTime(new Date(Date.parse('2024-03-10T09:00:00Z') + SESSION_MAX_AGE_MS))
    expect(getSession(session.token)).toBeNull()
    expect(endSession(session.token)).toBe(false)
  })

  it('rewrites an existing password row', async () => {
    backend.seed('설정', [['Key', 'Value'], ['admin_pw', 'test-secret'], ['user_pw', 'test-user']])

    const result = await changePassword('user', 'test-changed', 'admin')

    expect(result).toEqual({ success: true, message: 'user password changed' })
    expect(backend.rows('설정')[2]).toEqual(['user_pw', 'test-changed'])
    expect(listAudit('settings', 'user_pw').map((entry) => entry.actor)).toEqual(['admin'])
  })

  it('appends a password row that is missing', async () => {
    backend.seed('설정', [['Key', 'Value'], ['admin_pw', 'test-secret']])

    await changePassword('user', 'test-user', 'admin')

    expect(backend.rows('설정')).toEqual([['Key', 'Value'], ['admin_pw', 'test-secret'], ['user_pw', 'test-user']])
  })

  it('refuses a blank password', async () => {
    expect(await changePassword('admin', '  ', 'admin')).toEqual({
      success: false,
      message: 'Password must not be empty'
    })
  })
})
