import { IPC_CHANNELS } from '../../shared/constants/channels'
import { handle, IpcError } from './registry'
import { readObject, readStringArray } from './payload'
import * as minutesRepo from '../sheets/repositories/minutes.repo'
import { getAppSetting } from '../database/repositories/settings.repo'
import { resolveAssetPath } from '../storage/paths'
import { listExportDates, selectForExport } from '../services/minutes-query'
import { renderCsv } from '../export/csv-export'
import { renderSignatureSheet } from '../export/signature-sheet'
import type { MinutesRecord } from '../../shared/types/meeting'

async function selectedMeetings(payload: unknown): Promise<MinutesRecord[]> {
  const dates = readStringArray(readObject(payload), 'dates')
  if (dates.length === 0) throw new IpcError('Select at least one meeting date', 400)

  const records = selectForExport(await minutesRepo.listMinutes(), dates)
  if (records.length === 0) throw new IpcError('No minutes recorded on the selected dates', 404)
  return records
}

export function registerExportHandlers(): void {
  handle(IPC_CHANNELS.EXPORT_DATES, 'admin', async () => {
    return listExportDates(await minutesRepo.listMinutes())
  })

  handle(IPC_CHANNELS.EXPORT_CSV, 'admin', async (payload) => {
    return renderCsv(await selectedMeetings(payload))
  })

  handle(IPC_CHANNELS.EXPORT_PDF, 'admin', async (payload) => {
    const records = await selectedMeetings(payload)
    return renderSignatureSheet(records, resolveAssetPath(getAppSetting('signatureFontPath')))
  })
}
