import type { SheetGateway } from './gateway'
import {
  FACULTY_COLUMNS,
  MINUTES_COLUMNS,
  TAB_HEADERS,
  TAB_NAMES,
  type SheetCell,
  type SheetRecord,
  type SheetValue,
  type TabName
} from './schema'
import type { FacultyMember } from '../../shared/types/faculty'
import type { MinutesRecord } from '../../shared/types/meeting'

export function cellText(value: SheetCell | undefined): string {
  if (value === undefined) return ''
  return typeof value === 'string' ? value : String(value)
}

export function cellInt(value: SheetCell | undefined): number {
  if (typeof value === 'number') return Math.trunc(value)
  const parsed = parseInt(cellText(value).trim(), 10)
  return Number.isNaN(parsed) ? 0 : parsed
}

export function rowToFaculty(record: SheetRecord): FacultyMember {
  return {
    no: cellInt(record[FACULTY_COLUMNS.no]),
    department: cellText(record[FACULTY_COLUMNS.department]),
    rank: cellText(record[FACULTY_COLUMNS.rank]),
    name: cellText(record[FACULTY_COLUMNS.name])
  }
}

export function facultyToRow(member: FacultyMember): SheetValue[] {
  return [member.no, member.department, member.rank, member.name]
}

export function rowToMinutes(record: SheetRecord): MinutesRecord {
  return {
    id: cellText(record[MINUTES_COLUMNS.id]),
    no: cellInt(record[MINUTES_COLUMNS.no]),
    date: cellText(record[MINUTES_COLUMNS.date]),
    time: cellText(record[MINUTES_COLUMNS.time]),
    place: cellText(record[MINUTES_COLUMNS.place]),
    topic: cellText(record[MINUTES_COLUMNS.topic]),
    attendeeText: cellText(record[MINUTES_COLUMNS.attendeeText]),
    attendeesJson: cellText(record[MINUTES_COLUMNS.attendeesJson]),
    content: cellText(record[MINUTES_COLUMNS.content]),
    keywords: cellText(record[MINUTES_COLUMNS.keywords])
  }
}

export function minutesToRow(record: MinutesRecord): SheetValue[] {
  return [
    record.id,
    record.no,
    record.date,
    record.time,
    record.place,
    record.topic,
    record.attendeeText,
    record.attendeesJson,
    record.content,
    record.keywords
  ]
}

/** Give every record the tab's canonical columns, blank where the sheet had none. */
export function backfillColumns(records: SheetRecord[], columns: string[]): SheetRecord[] {
  return records.map((record) => {
    const filled: SheetRecord = { ...record }
    for (const column of columns) {
      if (!(column in filled)) filled[column] = ''
    }
    return filled
  })
}

/**
 * Load a tab as header-keyed records. Unreachable store, empty sheet and a
 * minutes sheet without its ID column all come back as an empty list.
 */
export async function loadRecords(gateway: SheetGateway, name: TabName): Promise<SheetRecord[]> {
  const tab = await gateway.getOrCreateTab(name)
  if (!tab) return []

  const table = await gateway.readTable(tab)
  if (!table || table.records.length === 0) return []

  if (name === TAB_NAMES.minutes && !table.header.includes(MINUTES_COLUMNS.id)) {
    console.warn(`[Sheets] "${name}" has no ${MINUTES_COLUMNS.id} column; check the header row`)
    return []
  }

  return backfillColumns(table.records, TAB_HEADERS[name])
}

export async function loadFaculty(gateway: SheetGateway): Promise<FacultyMember[]> {
  const records = await loadRecords(gateway, TAB_NAMES.faculty)
  return records.map(rowToFaculty)
}

export async function loadMinutes(gateway: SheetGateway): Promise<MinutesRecord[]> {
  const records = await loadRecords(gateway, TAB_NAMES.minutes)
  return records.map(rowToMinutes)
}
