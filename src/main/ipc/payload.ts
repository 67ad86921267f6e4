import { IpcError } from './registry'
import type { ManualAttendee, MinutesForm, MinutesRecord } from '../../shared/types/meeting'
import type { SaveChoice, SaveOutcome, SaveStep, SaveWizardState } from '../services/save-wizard'

export type PayloadObject = Record<string, unknown>

const SAVE_STEPS: readonly SaveStep[] = ['input', 'check_duplicate', 'confirm', 'success']
const SAVE_OUTCOMES: readonly SaveOutcome[] = ['overwritten', 'appended']
export const SAVE_CHOICES: readonly SaveChoice[] = ['overwrite', 'append', 'cancel']

function invalid(message: string): IpcError {
  return new IpcError(message, 400)
}

export function readObject(value: unknown, what = 'payload'): PayloadObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid(`${what} must be an object`)
  }
  return Object.fromEntries(Object.entries(value))
}

export function readString(source: PayloadObject, key: string): string {
  const value = source[key]
  if (typeof value !== 'string') throw invalid(`${key} must be a string`)
  return value
}

export function readOptionalString(source: PayloadObject, key: string): string | undefined {
  return source[key] === undefined ? undefined : readString(source, key)
}

function readNullableString(source: PayloadObject, key: string): string | null {
  return source[key] === null || source[key] === undefined ? null : readString(source, key)
}

export function readInteger(source: PayloadObject, key: string): number {
  const value = source[key]
  if (typeof value !== 'number' || !Number.isInteger(value)) throw invalid(`${key} must be an integer`)
  return value
}

export function readOptionalInteger(source: PayloadObject, key: string): number | undefined {
  return source[key] === undefined ? undefined : readInteger(source, key)
}

export function readBoolean(source: PayloadObject, key: string, fallback: boolean): boolean {
  const value = source[key]
  if (value === undefined) return fallback
  if (typeof value !== 'boolean') throw invalid(`${key} must be a boolean`)
  return value
}

export function readStringArray(source: PayloadObject, key: string): string[] {
  const value = source[key]
  if (!Array.isArray(value)) throw invalid(`${key} must be a list of strings`)
  return value.map((item) => {
    if (typeof item !== 'string') throw invalid(`${key} must be a list of strings`)
    return item
  })
}

export function readOneOf<T extends string>(source: PayloadObject, key: string, allowed: readonly T[]): T {
  const value = source[key]
  const match = allowed.find((option) => option === value)
  if (match === undefined) throw invalid(`${key} must be one of: ${allowed.join(', ')}`)
  return match
}

function readManualAttendee(value: unknown): ManualAttendee | null {
  if (value === null || value === undefined) return null
  const source = readObject(value, 'manualAttendee')
  return {
    name: readString(source, 'name'),
    department: readString(source, 'department'),
    rank: readString(source, 'rank'),
    include: readBoolean(source, 'include', false)
  }
}

export function readMinutesForm(value: unknown): MinutesForm {
  const source = readObject(value, 'form')
  const form: MinutesForm = {
    date: readString(source, 'date'),
    startTime: readString(source, 'startTime'),
    endTime: readString(source, 'endTime'),
    place: readString(source, 'place'),
    topic: readString(source, 'topic'),
    selectedLabels: readStringArray(source, 'selectedLabels'),
    manualAttendee: readManualAttendee(source['manualAttendee']),
    content: readString(source, 'content')
  }
  const keywords = readOptionalString(source, 'keywords')
  if (keywords !== undefined) form.keywords = keywords
  return form
}

function readMinutesRecord(value: unknown): MinutesRecord {
  const source = readObject(value, 'pending')
  return {
    id: readString(source, 'id'),
    no: readInteger(source, 'no'),
    date: readString(source, 'date'),
    time: readString(source, 'time'),
    place: readString(source, 'place'),
    topic: readString(source, 'topic'),
    attendeeText: readString(source, 'attendeeText'),
    attendeesJson: readString(source, 'attendeesJson'),
    content: readString(source, 'content'),
    keywords: readString(source, 'keywords')
  }
}

export function readSaveState(value: unknown): SaveWizardState {
  const source = readObject(value, 'state')
  return {
    step: readOneOf(source, 'step', SAVE_STEPS),
    pending: source['pending'] === null || source['pending'] === undefined ? null : readMinutesRecord(source['pending']),
    outcome:
      source['outcome'] === null || source['outcome'] === undefined ? null : readOneOf(source, 'outcome', SAVE_OUTCOMES),
    message: readNullableString(source, 'message')
  }
}
