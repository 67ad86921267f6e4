import { IPC_CHANNELS } from '../../shared/constants/channels'
import { handle, IpcError } from './registry'
import { readObject, readString } from './payload'
import { draftMinutes } from '../llm/drafter'

export function registerDraftHandlers(): void {
  handle(IPC_CHANNELS.DRAFT_GENERATE, 'admin', async (payload) => {
    const input = readObject(payload)
    const topic = readString(input, 'topic').trim()
    const keywords = readString(input, 'keywords').trim()
    if (!topic || !keywords) throw new IpcError('Topic and keywords are required for a draft', 400)
    return { content: await draftMinutes(topic, keywords) }
  })
}
