import type { Session, UserRole } from './user'

export type ChannelAccess = 'public' | UserRole

export interface IpcContext {
  session: Session | null
}

export type IpcHandler = (payload: unknown, context: IpcContext) => unknown | Promise<unknown>

export type IpcResponse =
  | { ok: true; result: unknown }
  | { ok: false; error: string }
