import type {
  MinutesOverviewRow,
  MinutesRecord,
  MinutesSearchParams,
  SearchField
} from '../../shared/types/meeting'

export const SEARCH_FIELDS: SearchField[] = ['all', 'name', 'department', 'topic', 'content']

export function isSearchField(value: string): value is SearchField {
  return SEARCH_FIELDS.some((field) => field === value)
}

function byDateDescending(a: MinutesRecord, b: MinutesRecord): number {
  if (a.date === b.date) return 0
  return a.date < b.date ? 1 : -1
}

function byDateAscending(a: MinutesRecord, b: MinutesRecord): number {
  return byDateDescending(b, a)
}

export function listNewestFirst(records: MinutesRecord[]): MinutesRecord[] {
  return [...records].sort(byDateDescending)
}

export function buildOverview(records: MinutesRecord[]): MinutesOverviewRow[] {
  return listNewestFirst(records).map((record) => ({
    id: record.id,
    date: record.date,
    time: record.time,
    topic: record.topic,
    attendeeText: record.attendeeText
  }))
}

function searchTargets(record: MinutesRecord, field: SearchField): string[] {
  switch (field) {
    case 'all':
      return [record.topic, record.attendeeText, record.content]
    // Names and departments both live in the attendee display text
    case 'name':
    case 'department':
      return [record.attendeeText]
    case 'topic':
      return [record.topic]
    case 'content':
      return [record.content]
  }
}

/** Case-sensitive substring search, newest first. A blank term matches nothing. */
export function searchMinutes(records: MinutesRecord[], params: MinutesSearchParams): MinutesRecord[] {
  const term = params.term.trim()
  if (!term) return []
  return records
    .filter((record) => searchTargets(record, params.field).some((value) => value.includes(term)))
    .sort(byDateDescending)
}

/** Distinct meeting dates, newest first. */
export function listExportDates(records: MinutesRecord[]): string[] {
  return [...new Set(records.map((record) => record.date))].sort().reverse()
}

/** Records held under any of `dates`, oldest first. */
export function selectForExport(records: MinutesRecord[], dates: string[]): MinutesRecord[] {
  const wanted = new Set(dates)
  return records.filter((record) => wanted.has(record.date)).sort(byDateAscending)
}
