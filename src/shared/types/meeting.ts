export interface Attendee {
  name: string
  department: string
  rank: string
}

export interface MinutesRecord {
  id: string
  no: number
  date: string // YYYY-MM-DD
  time: string // HH:MM ~ HH:MM
  place: string
  topic: string
  attendeeText: string
  attendeesJson: string
  content: string
  keywords: string
}

export interface ManualAttendee {
  name: string
  department: string
  rank: string
  include: boolean
}

/**
 * Serializable form state for the minutes input and edit screens.
 * `keywords` is optional on edits: leaving it out carries the stored value forward.
 */
export interface MinutesForm {
  date: string
  startTime: string
  endTime: string
  place: string
  topic: string
  selectedLabels: string[]
  manualAttendee: ManualAttendee | null
  keywords?: string
  content: string
}

export interface MinutesOverviewRow {
  id: string
  date: string
  time: string
  topic: string
  attendeeText: string
}

export type SearchField = 'all' | 'name' | 'department' | 'topic' | 'content'

export interface MinutesSearchParams {
  field: SearchField
  term: string
}

export interface MinutesDetail {
  record: MinutesRecord
  attendees: Attendee[]
  preselectedLabels: string[]
  form: MinutesForm
}

export interface OperationResult {
  success: boolean
  message: string
}
