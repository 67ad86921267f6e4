export const IPC_CHANNELS = {
  // Auth
  AUTH_LOGIN: 'auth:login',
  AUTH_LOGOUT: 'auth:logout',

  // Minutes
  MINUTES_OVERVIEW: 'minutes:overview',
  MINUTES_SEARCH: 'minutes:search',
  MINUTES_LIST: 'minutes:list',
  MINUTES_GET: 'minutes:get',
  MINUTES_NEW_FORM: 'minutes:new-form',
  MINUTES_SUBMIT: 'minutes:submit',
  MINUTES_RESOLVE: 'minutes:resolve',
  MINUTES_FINISH: 'minutes:finish',
  MINUTES_UPDATE: 'minutes:update',
  MINUTES_DELETE: 'minutes:delete',

  // Draft
  DRAFT_GENERATE: 'draft:generate',

  // Faculty roster
  FACULTY_LIST: 'faculty:list',
  FACULTY_OPTIONS: 'faculty:options',
  FACULTY_ADD: 'faculty:add',
  FACULTY_UPDATE: 'faculty:update',
  FACULTY_DELETE: 'faculty:delete',

  // Export
  EXPORT_DATES: 'export:dates',
  EXPORT_CSV: 'export:csv',
  EXPORT_PDF: 'export:pdf',

  // Settings
  SETTINGS_GET_ALL: 'settings:get-all',
  SETTINGS_SET: 'settings:set',
  SETTINGS_CHANGE_PASSWORD: 'settings:change-password',
  SHEETS_URL: 'sheets:url'
} as const

export type IpcChannel = (typeof IPC_CHANNELS)[keyof typeof IPC_CHANNELS]
