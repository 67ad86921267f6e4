import { format, isMatch } from 'date-fns'
import * as minutesRepo from '../sheets/repositories/minutes.repo'
import { logAudit } from '../database/repositories/audit.repo'
import {
  allowedChoices,
  transition,
  type SaveChoice,
  type SaveWizardState
} from './save-wizard'
import {
  decodeAttendees,
  encodeAttendeeList,
  encodeAttendees,
  preselectLabels,
  type EncodedAttendees
} from '../../shared/utils/attendee-codec'
import { formatTimeRange, isValidTime, parseTimeRange } from '../../shared/utils/time-range'
import type {
  Attendee,
  MinutesDetail,
  MinutesForm,
  MinutesRecord,
  OperationResult
} from '../../shared/types/meeting'

const DEFAULT_START_TIME = '12:00'
const DEFAULT_END_TIME = '13:00'
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

function isValidDate(date: string): boolean {
  return DATE_PATTERN.test(date) && isMatch(date, 'yyyy-MM-dd')
}

/** Timestamp identifier, suffixed when another record already holds the same second. */
export function generateMinutesId(now: Date, existingIds: Iterable<string>): string {
  const base = format(now, 'yyyyMMddHHmmss')
  const taken = new Set(existingIds)
  if (!taken.has(base)) return base
  let suffix = 2
  while (taken.has(`${base}-${suffix}`)) suffix++
  return `${base}-${suffix}`
}

export function createBlankForm(today: Date, defaultPlace: string): MinutesForm {
  return {
    date: format(today, 'yyyy-MM-dd'),
    startTime: DEFAULT_START_TIME,
    endTime: DEFAULT_END_TIME,
    place: defaultPlace,
    topic: '',
    selectedLabels: [],
    manualAttendee: null,
    keywords: '',
    content: ''
  }
}

/** Form fields cleared after a save; date and time stay for the next entry. */
export function clearForm(form: MinutesForm, defaultPlace: string): MinutesForm {
  return {
    ...form,
    place: defaultPlace,
    topic: '',
    selectedLabels: [],
    manualAttendee: null,
    keywords: '',
    content: ''
  }
}

function validateForm(form: MinutesForm, encoded: EncodedAttendees): string | null {
  if (!isValidDate(form.date)) return `Invalid date "${form.date}", expected YYYY-MM-DD`
  if (!isValidTime(form.startTime) || !isValidTime(form.endTime)) {
    return 'Start and end time must be HH:MM'
  }
  if (!form.topic.trim() || !form.place.trim() || !form.content.trim()) {
    return 'Topic, place and content are required'
  }
  if (encoded.attendees.length === 0) return 'Select at least one attendee'
  return null
}

export function buildNewRecord(
  form: MinutesForm,
  encoded: EncodedAttendees,
  existing: MinutesRecord[],
  now: Date
): MinutesRecord {
  return {
    id: generateMinutesId(now, existing.map((record) => record.id)),
    no: existing.length + 1,
    date: form.date,
    time: formatTimeRange(form.startTime, form.endTime),
    place: form.place.trim(),
    topic: form.topic.trim(),
    attendeeText: encoded.text,
    attendeesJson: encoded.json,
    content: form.content,
    keywords: form.keywords ?? ''
  }
}

/** Validate the form, build the pending record and route to duplicate check or confirmation. */
export async function submitMinutes(
  state: SaveWizardState,
  form: MinutesForm,
  now: Date = new Date()
): Promise<SaveWizardState> {
  if (state.step !== 'input') return state

  const encoded = encodeAttendees(form.selectedLabels, form.manualAttendee)
  const problem = validateForm(form, encoded)
  if (problem) return transition(state, { type: 'rejected', message: problem })

  const existing = await minutesRepo.listMinutes()
  const record = buildNewRecord(form, encoded, existing, now)
  const duplicate = existing.some((item) => item.date === record.date)

  return transition(state, { type: 'submitted', record, duplicate })
}

/** Reason a pending record cannot be written, or null when it can. */
export function checkPendingRecord(record: MinutesRecord): string | null {
  if (!record.id.trim()) return 'Pending minutes have no identifier'
  if (!isValidDate(record.date)) return `Invalid date "${record.date}", expected YYYY-MM-DD`
  if (!parseTimeRange(record.time)) return 'Start and end time must be HH:MM'
  if (!record.topic.trim() || !record.place.trim() || !record.content.trim()) {
    return 'Topic, place and content are required'
  }
  if (namedAttendees(record).length === 0) return 'Select at least one attendee'
  return null
}

function namedAttendees(record: MinutesRecord): Attendee[] {
  return decodeAttendees(record.attendeesJson).filter((attendee) => attendee.name.trim())
}

/** Both attendee columns rebuilt from the attendee JSON. */
function normalizePendingRecord(record: MinutesRecord): MinutesRecord {
  const encoded = encodeAttendeeList(namedAttendees(record))
  return { ...record, attendeeText: encoded.text, attendeesJson: encoded.json }
}

function sameContent(a: MinutesRecord, b: MinutesRecord): boolean {
  return (
    a.date === b.date &&
    a.time === b.time &&
    a.place === b.place &&
    a.topic === b.topic &&
    a.attendeesJson === b.attendeesJson &&
    a.content === b.content &&
    a.keywords === b.keywords
  )
}

export async function resolveSave(
  state: SaveWizardState,
  choice: SaveChoice,
  actor: string | null,
  now: Date = new Date()
): Promise<SaveWizardState> {
  const pending = state.pending
  if (!pending || !allowedChoices(state.step).includes(choice)) return state

  if (choice === 'cancel') return transition(state, { type: 'cancelled' })

  const problem = checkPendingRecord(pending)
  if (problem) return transition(state, { type: 'write_failed', message: problem })

  const normalized = normalizePendingRecord(pending)
  const existing = await minutesRepo.listMinutes()

  if (choice === 'overwrite') {
    // The overwritten record keeps its own identifier and sequence number.
    const target = existing.find((record) => record.date === normalized.date)
    const record = target ? { ...normalized, id: target.id, no: target.no } : normalized
    const written = await minutesRepo.updateMinutesByDate(normalized.date, record)
    if (!written) {
      return transition(state, { type: 'write_failed', message: 'Overwrite failed, please try again' })
    }
    logAudit(actor, 'minutes', record.id, 'update', { reason: 'duplicate-date overwrite', date: record.date })
    return transition(state, { type: 'written', outcome: 'overwritten' })
  }

  const stored = existing.find((record) => record.id === normalized.id)
  if (stored && sameContent(stored, normalized)) {
    console.log(`[Sheets] Minutes ${stored.id} already saved, skipping repeated append`)
    return transition(state, { type: 'written', outcome: 'appended' })
  }

  const record: MinutesRecord = {
    ...normalized,
    id: stored ? generateMinutesId(now, existing.map((item) => item.id)) : normalized.id,
    no: existing.length + 1
  }
  const written = await minutesRepo.appendMinutes(record)
  if (!written) {
    return transition(state, { type: 'write_failed', message: 'Save failed, please try again' })
  }
  logAudit(actor, 'minutes', record.id, 'create', { date: record.date })
  return transition(state, { type: 'written', outcome: 'appended' })
}

export function finishSave(
  state: SaveWizardState,
  form: MinutesForm,
  reset: boolean,
  defaultPlace: string
): { state: SaveWizardState; form: MinutesForm } {
  const next = transition(state, { type: 'finished' })
  if (next === state) return { state, form }
  return { state: next, form: reset ? clearForm(form, defaultPlace) : form }
}

/** Pre-filled edit form for a stored record. */
export function buildEditForm(record: MinutesRecord, facultyOptions: string[], today: Date = new Date()): MinutesForm {
  const range = parseTimeRange(record.time)
  return {
    date: isValidDate(record.date) ? record.date : format(today, 'yyyy-MM-dd'),
    startTime: range?.start ?? DEFAULT_START_TIME,
    endTime: range?.end ?? DEFAULT_END_TIME,
    place: record.place,
    topic: record.topic,
    selectedLabels: preselectLabels(decodeAttendees(record.attendeesJson), facultyOptions),
    manualAttendee: null,
    keywords: record.keywords,
    content: record.content
  }
}

export async function getMinutesDetail(id: string, facultyOptions: string[]): Promise<MinutesDetail | null> {
  const record = await minutesRepo.getMinutes(id)
  if (!record) return null
  const attendees = decodeAttendees(record.attendeesJson)
  return {
    record,
    attendees,
    preselectedLabels: preselectLabels(attendees, facultyOptions),
    form: buildEditForm(record, facultyOptions)
  }
}

/**
 * Apply an edit by identifier. Columns the edit does not supply carry forward:
 * keywords when the form leaves them out, and both attendee columns when the
 * selection parses to nobody.
 */
export async function updateMinutes(
  id: string,
  form: MinutesForm,
  actor: string | null
): Promise<OperationResult & { record: MinutesRecord | null }> {
  const current = await minutesRepo.getMinutes(id)
  if (!current) return { success: false, message: `Minutes ${id} not found`, record: null }

  if (!isValidDate(form.date)) {
    return { success: false, message: `Invalid date "${form.date}", expected YYYY-MM-DD`, record: null }
  }
  if (!isValidTime(form.startTime) || !isValidTime(form.endTime)) {
    return { success: false, message: 'Start and end time must be HH:MM', record: null }
  }

  const encoded = encodeAttendees(form.selectedLabels, form.manualAttendee)
  const keepAttendees = encoded.attendees.length === 0

  const record: MinutesRecord = {
    id: current.id,
    no: current.no,
    date: form.date,
    time: formatTimeRange(form.startTime, form.endTime),
    place: form.place,
    topic: form.topic,
    attendeeText: keepAttendees ? current.attendeeText : encoded.text,
    attendeesJson: keepAttendees ? current.attendeesJson : encoded.json,
    content: form.content,
    keywords: form.keywords ?? current.keywords
  }

  const result = await minutesRepo.updateMinutesById(id, record)
  if (!result.success) return { ...result, record: null }

  logAudit(actor, 'minutes', id, 'update', { keptAttendees: keepAttendees })
  return { ...result, record }
}

export async function deleteMinutes(id: string, actor: string | null): Promise<OperationResult> {
  const deleted = await minutesRepo.deleteMinutes(id)
  if (!deleted) return { success: false, message: `Minutes ${id} could not be deleted` }
  logAudit(actor, 'minutes', id, 'delete')
  return { success: true, message: 'Deleted' }
}
