import type { Attendee, ManualAttendee } from '../types/meeting'
import type { FacultyMember } from '../types/faculty'

export interface EncodedAttendees {
  attendees: Attendee[]
  text: string
  json: string
}

const LEGACY_KEYS = { name: '이름', department: '학과', rank: '직급' } as const

/** Selector label for a faculty member: `Name (Department/Rank)`. */
export function formatFacultyLabel(member: Pick<FacultyMember, 'name' | 'department' | 'rank'>): string {
  return `${member.name} (${member.department}/${member.rank})`
}

export function formatAttendeeText(attendee: Attendee): string {
  return `${attendee.name}(${attendee.department})`
}

/**
 * Parse a selector label back into an attendee.
 * Returns null for anything that is not `Name (Department/Rank)`.
 */
export function parseAttendeeLabel(label: string): Attendee | null {
  const open = label.indexOf(' (')
  if (open <= 0 || !label.endsWith(')')) return null

  const name = label.slice(0, open)
  const info = label.slice(open + 2, -1)
  const parts = info.split('/')
  if (parts.length !== 2) return null

  const [department, rank] = parts
  return { name, department, rank }
}

/**
 * Build both stored attendee columns from one selection.
 * Malformed labels are skipped; the manual attendee is appended when it has a name
 * and is marked for inclusion.
 */
export function encodeAttendees(labels: string[], manual?: ManualAttendee | null): EncodedAttendees {
  const attendees: Attendee[] = []
  for (const label of labels) {
    const attendee = parseAttendeeLabel(label)
    if (attendee) attendees.push(attendee)
  }

  if (manual && manual.include && manual.name.trim()) {
    attendees.push({
      name: manual.name.trim(),
      department: manual.department.trim(),
      rank: manual.rank.trim()
    })
  }

  return encodeAttendeeList(attendees)
}

/** Both stored attendee columns for an attendee list. */
export function encodeAttendeeList(attendees: Attendee[]): EncodedAttendees {
  return {
    attendees,
    text: attendees.map(formatAttendeeText).join(', '),
    json: JSON.stringify(attendees)
  }
}

function readField(entry: Record<string, unknown>, key: keyof Attendee): string {
  const value = entry[key] ?? entry[LEGACY_KEYS[key]]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return ''
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function decodeAttendees(json: string | null | undefined): Attendee[] {
  if (!json) return []
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    return []
  }
  if (!Array.isArray(parsed)) return []

  return parsed.filter(isRecord).map((entry) => ({
    name: readField(entry, 'name'),
    department: readField(entry, 'department'),
    rank: readField(entry, 'rank')
  }))
}

/** Selector labels to pre-select on an edit form, matched by `Name (Department` prefix. */
export function preselectLabels(attendees: Attendee[], options: string[]): string[] {
  const selected: string[] = []
  for (const person of attendees) {
    const prefix = `${person.name} (${person.department}`
    const match = options.find((option) => option.startsWith(prefix))
    if (match) selected.push(match)
  }
  return selected
}
