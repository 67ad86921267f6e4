// Tab layouts as they appear in the spreadsheet (header row = column order)

export type SheetCell = string | number | boolean
export type SheetRecord = Record<string, SheetCell>
export type SheetValue = SheetCell | bigint | null | undefined

export const FACULTY_COLUMNS = {
  no: '연번',
  department: '학과',
  rank: '직급',
  name: '이름'
} as const

export const MINUTES_COLUMNS = {
  id: 'ID',
  no: '연번',
  date: '날짜',
  time: '시간',
  place: '장소',
  topic: '주제',
  attendeeText: '참석자_텍스트',
  attendeesJson: '참석자_JSON',
  content: '내용',
  keywords: '키워드'
} as const

export const SETTINGS_COLUMNS = {
  key: 'Key',
  value: 'Value'
} as const

export const TAB_NAMES = {
  faculty: '재직교수',
  minutes: '회의록',
  settings: '설정'
} as const

export type TabKey = keyof typeof TAB_NAMES
export type TabName = (typeof TAB_NAMES)[TabKey]

export const TAB_HEADERS: Record<TabName, string[]> = {
  [TAB_NAMES.faculty]: Object.values(FACULTY_COLUMNS),
  [TAB_NAMES.minutes]: Object.values(MINUTES_COLUMNS),
  [TAB_NAMES.settings]: Object.values(SETTINGS_COLUMNS)
}

// 1-based column positions used for keyed lookups
export const MINUTES_ID_COLUMN = 1
export const MINUTES_DATE_COLUMN = 3
export const FACULTY_NO_COLUMN = 1
export const SETTINGS_KEY_COLUMN = 1

export const NEW_TAB_ROWS = 100
export const NEW_TAB_COLUMNS = 10
