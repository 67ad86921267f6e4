import { getSheetGateway } from '../connection'
import { cellText } from '../record-mapper'
import { SETTINGS_COLUMNS, SETTINGS_KEY_COLUMN, TAB_HEADERS, TAB_NAMES } from '../schema'
import { getAppSetting } from '../../database/repositories/settings.repo'
import type { UserRole } from '../../../shared/types/user'

export type Passwords = Record<UserRole, string>

function passwordKey(role: UserRole): string {
  return `${role}_pw`
}

export function getDefaultPasswords(): Passwords {
  return {
    admin: getAppSetting('defaultAdminPassword'),
    user: getAppSetting('defaultUserPassword')
  }
}

function headerMatches(header: string[]): boolean {
  const expected = TAB_HEADERS[TAB_NAMES.settings]
  return header.length >= expected.length && expected.every((column, index) => header[index] === column)
}

/** Rebuild the settings tab with default passwords when its header is missing or wrong. */
export async function ensureSettingsTab(): Promise<void> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.settings)
  if (!tab) return

  const header = await gateway.readHeader(tab)
  if (header === null || headerMatches(header)) return

  const defaults = getDefaultPasswords()
  console.log('[Sheets] Initialising settings tab with default passwords')
  await gateway.resetTab(tab, [
    TAB_HEADERS[TAB_NAMES.settings],
    [passwordKey('admin'), defaults.admin],
    [passwordKey('user'), defaults.user]
  ])
}

/**
 * Stored passwords, falling back to the process-wide defaults for a role with no row.
 * Null when the settings tab cannot be read.
 */
export async function getPasswords(): Promise<Passwords | null> {
  await ensureSettingsTab()

  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.settings)
  if (!tab) return null
  const table = await gateway.readTable(tab)
  if (!table) return null

  const passwords = getDefaultPasswords()
  for (const record of table.records) {
    const key = cellText(record[SETTINGS_COLUMNS.key])
    const value = cellText(record[SETTINGS_COLUMNS.value])
    if (key === passwordKey('admin')) passwords.admin = value
    else if (key === passwordKey('user')) passwords.user = value
  }
  return passwords
}

export async function setPassword(role: UserRole, password: string): Promise<boolean> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.settings)
  if (!tab) return false

  const row = await gateway.findRowByKey(tab, passwordKey(role), SETTINGS_KEY_COLUMN)
  if (row === null) {
    return gateway.appendRow(tab, [passwordKey(role), password])
  }
  return gateway.updateRow(tab, row, [password], SETTINGS_KEY_COLUMN + 1)
}
