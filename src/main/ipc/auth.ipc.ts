import { IPC_CHANNELS } from '../../shared/constants/channels'
import { handle, IpcError } from './registry'
import { readObject, readOneOf, readString } from './payload'
import { login } from '../security/auth'
import { endSession } from '../security/session'
import type { UserRole } from '../../shared/types/user'

const ROLES: readonly UserRole[] = ['admin', 'user']

export function registerAuthHandlers(): void {
  handle(IPC_CHANNELS.AUTH_LOGIN, 'public', async (payload) => {
    const input = readObject(payload)
    const result = await login(readOneOf(input, 'role', ROLES), readString(input, 'password'))
    if (result.status === 'unavailable') {
      throw new IpcError('Spreadsheet unavailable, please try again shortly', 503)
    }
    if (result.status === 'rejected') throw new IpcError('Incorrect password', 401)
    return { token: result.session.token, role: result.session.role }
  })

  handle(IPC_CHANNELS.AUTH_LOGOUT, 'public', (_payload, context) => {
    if (!context.session) return false
    return endSession(context.session.token)
  })
}
