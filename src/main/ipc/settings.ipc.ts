import { IPC_CHANNELS } from '../../shared/constants/channels'
import { actorOf, handle, IpcError } from './registry'
import { readObject, readOneOf, readString } from './payload'
import * as settingsRepo from '../database/repositories/settings.repo'
import { logAudit } from '../database/repositories/audit.repo'
import { getCredential, isCredentialKey, storeCredential } from '../security/credentials'
import { changePassword } from '../security/auth'
import { getSheetGateway } from '../sheets/connection'
import { isSettingKey, type LlmProvider } from '../../shared/types/settings'
import type { UserRole } from '../../shared/types/user'

const ROLES: readonly UserRole[] = ['admin', 'user']
const PROVIDERS: readonly LlmProvider[] = ['claude', 'ollama']

export function registerSettingsHandlers(): void {
  handle(IPC_CHANNELS.SETTINGS_GET_ALL, 'admin', () => {
    const settings = settingsRepo.getAppSettings()
    return {
      spreadsheetId: settings.spreadsheetId,
      spreadsheetName: settings.spreadsheetName,
      llmProvider: settings.llmProvider,
      claudeModel: settings.claudeModel,
      ollamaHost: settings.ollamaHost,
      ollamaModel: settings.ollamaModel,
      signatureFontPath: settings.signatureFontPath,
      defaultPlace: settings.defaultPlace,
      port: settings.port,
      claudeApiKeySet: getCredential('claudeApiKey') !== null,
      googleServiceAccountSet: getCredential('googleServiceAccount') !== null
    }
  })

  handle(IPC_CHANNELS.SETTINGS_SET, 'admin', (payload, context) => {
    const input = readObject(payload)
    const key = readString(input, 'key')

    if (isCredentialKey(key)) {
      storeCredential(key, readString(input, 'value'))
    } else if (key === 'llmProvider') {
      settingsRepo.setSetting(key, readOneOf(input, 'value', PROVIDERS))
    } else if (isSettingKey(key)) {
      settingsRepo.setSetting(key, readString(input, 'value'))
    } else {
      throw new IpcError(`Unknown setting ${key}`, 400)
    }

    logAudit(actorOf(context), 'settings', key, 'update')
    return true
  })

  handle(IPC_CHANNELS.SETTINGS_CHANGE_PASSWORD, 'admin', (payload, context) => {
    const input = readObject(payload)
    return changePassword(readOneOf(input, 'role', ROLES), readString(input, 'password'), actorOf(context))
  })

  handle(IPC_CHANNELS.SHEETS_URL, 'admin', async () => {
    const url = await getSheetGateway().getUrl()
    if (!url) throw new IpcError('Spreadsheet unavailable, please try again shortly', 503)
    return { url }
  })
}
