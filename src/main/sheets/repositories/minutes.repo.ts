import { getSheetGateway } from '../connection'
import { loadMinutes, minutesToRow } from '../record-mapper'
import { MINUTES_DATE_COLUMN, MINUTES_ID_COLUMN, TAB_NAMES } from '../schema'
import type { MinutesRecord, OperationResult } from '../../../shared/types/meeting'

const STORE_UNAVAILABLE = 'Spreadsheet unavailable, please try again shortly'

export function listMinutes(): Promise<MinutesRecord[]> {
  return loadMinutes(getSheetGateway())
}

export async function getMinutes(id: string): Promise<MinutesRecord | null> {
  const records = await listMinutes()
  return records.find((record) => record.id === id) ?? null
}

export async function appendMinutes(record: MinutesRecord): Promise<boolean> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
  if (!tab) return false
  return gateway.appendRow(tab, minutesToRow(record))
}

export async function updateMinutesById(id: string, record: MinutesRecord): Promise<OperationResult> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
  if (!tab) return { success: false, message: STORE_UNAVAILABLE }

  const row = await gateway.findRowByKey(tab, id, MINUTES_ID_COLUMN)
  if (row === null) return { success: false, message: `Minutes ${id} not found` }

  const written = await gateway.updateRow(tab, row, minutesToRow(record))
  return written ? { success: true, message: 'Updated' } : { success: false, message: STORE_UNAVAILABLE }
}

/** Overwrite the first record stored under `date`. */
export async function updateMinutesByDate(date: string, record: MinutesRecord): Promise<boolean> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
  if (!tab) return false

  const row = await gateway.findRowByKey(tab, date, MINUTES_DATE_COLUMN)
  if (row === null) return false
  return gateway.updateRow(tab, row, minutesToRow(record))
}

export async function deleteMinutes(id: string): Promise<boolean> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
  if (!tab) return false

  const row = await gateway.findRowByKey(tab, id, MINUTES_ID_COLUMN)
  if (row === null) return false
  return gateway.deleteRow(tab, row)
}
