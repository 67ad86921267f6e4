import { IPC_CHANNELS } from '../../shared/constants/channels'
import { actorOf, handle, IpcError } from './registry'
import {
  SAVE_CHOICES,
  readBoolean,
  readMinutesForm,
  readObject,
  readOneOf,
  readSaveState,
  readString
} from './payload'
import * as minutesRepo from '../sheets/repositories/minutes.repo'
import { getAppSetting } from '../database/repositories/settings.repo'
import { listFacultyOptions } from '../services/faculty.service'
import { buildOverview, listNewestFirst, SEARCH_FIELDS, searchMinutes } from '../services/minutes-query'
import {
  checkPendingRecord,
  createBlankForm,
  deleteMinutes,
  finishSave,
  getMinutesDetail,
  resolveSave,
  submitMinutes,
  updateMinutes
} from '../services/minutes.service'
import { INITIAL_SAVE_STATE } from '../services/save-wizard'

export function registerMinutesHandlers(): void {
  handle(IPC_CHANNELS.MINUTES_OVERVIEW, 'user', async () => {
    return buildOverview(await minutesRepo.listMinutes())
  })

  handle(IPC_CHANNELS.MINUTES_SEARCH, 'user', async (payload) => {
    const input = readObject(payload)
    return searchMinutes(await minutesRepo.listMinutes(), {
      field: readOneOf(input, 'field', SEARCH_FIELDS),
      term: readString(input, 'term')
    })
  })

  handle(IPC_CHANNELS.MINUTES_LIST, 'admin', async () => {
    return listNewestFirst(await minutesRepo.listMinutes())
  })

  handle(IPC_CHANNELS.MINUTES_GET, 'admin', async (payload) => {
    const id = readString(readObject(payload), 'id')
    const detail = await getMinutesDetail(id, await listFacultyOptions())
    if (!detail) throw new IpcError(`Minutes ${id} not found`, 404)
    return detail
  })

  handle(IPC_CHANNELS.MINUTES_NEW_FORM, 'admin', () => {
    return {
      state: INITIAL_SAVE_STATE,
      form: createBlankForm(new Date(), getAppSetting('defaultPlace'))
    }
  })

  handle(IPC_CHANNELS.MINUTES_SUBMIT, 'admin', (payload) => {
    const input = readObject(payload)
    const state = input['state'] === undefined ? INITIAL_SAVE_STATE : readSaveState(input['state'])
    return submitMinutes(state, readMinutesForm(input['form']))
  })

  handle(IPC_CHANNELS.MINUTES_RESOLVE, 'admin', (payload, context) => {
    const input = readObject(payload)
    const state = readSaveState(input['state'])
    const choice = readOneOf(input, 'choice', SAVE_CHOICES)
    if (state.pending && choice !== 'cancel') {
      const problem = checkPendingRecord(state.pending)
      if (problem) throw new IpcError(problem, 400)
    }
    return resolveSave(state, choice, actorOf(context))
  })

  handle(IPC_CHANNELS.MINUTES_FINISH, 'admin', (payload) => {
    const input = readObject(payload)
    return finishSave(
      readSaveState(input['state']),
      readMinutesForm(input['form']),
      readBoolean(input, 'reset', false),
      getAppSetting('defaultPlace')
    )
  })

  handle(IPC_CHANNELS.MINUTES_UPDATE, 'admin', (payload, context) => {
    const input = readObject(payload)
    return updateMinutes(readString(input, 'id'), readMinutesForm(input['form']), actorOf(context))
  })

  handle(IPC_CHANNELS.MINUTES_DELETE, 'admin', (payload, context) => {
    return deleteMinutes(readString(readObject(payload), 'id'), actorOf(context))
  })
}
