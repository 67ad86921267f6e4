import type { IpcChannel } from '../../shared/constants/channels'
import type { ChannelAccess, IpcContext, IpcHandler } from '../../shared/types/ipc'
import type { Session } from '../../shared/types/user'

/** A handler failure the bridge reports with its own HTTP status. */
export class IpcError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message)
    this.name = 'IpcError'
  }
}

interface Registration {
  access: ChannelAccess
  handler: IpcHandler
}

const registrations = new Map<string, Registration>()

export function handle(channel: IpcChannel, access: ChannelAccess, handler: IpcHandler): void {
  if (registrations.has(channel)) {
    throw new Error(`Handler already registered for ${channel}`)
  }
  registrations.set(channel, { access, handler })
}

export function clearHandlers(): void {
  registrations.clear()
}

function authorize(channel: string, access: ChannelAccess, session: Session | null): void {
  if (access === 'public') return
  if (!session) throw new IpcError('Login required', 401)
  // Admin sessions may call every channel
  if (access === 'admin' && session.role !== 'admin') {
    throw new IpcError(`${channel} requires the admin role`, 403)
  }
}

export async function dispatch(channel: string, payload: unknown, session: Session | null): Promise<unknown> {
  const registration = registrations.get(channel)
  if (!registration) throw new IpcError(`Unknown channel ${channel}`, 404)

  authorize(channel, registration.access, session)
  const context: IpcContext = { session }
  return registration.handler(payload, context)
}

export function actorOf(context: IpcContext): string | null {
  return context.session?.role ?? null
}
