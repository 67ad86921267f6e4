import { registerAuthHandlers } from './auth.ipc'
import { registerMinutesHandlers } from './minutes.ipc'
import { registerDraftHandlers } from './draft.ipc'
import { registerFacultyHandlers } from './faculty.ipc'
import { registerExportHandlers } from './export.ipc'
import { registerSettingsHandlers } from './settings.ipc'

export function registerAllHandlers(): void {
  registerAuthHandlers()
  registerMinutesHandlers()
  registerDraftHandlers()
  registerFacultyHandlers()
  registerExportHandlers()
  registerSettingsHandlers()
}
