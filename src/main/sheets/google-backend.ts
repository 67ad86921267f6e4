import { google, type sheets_v4, type Auth } from 'googleapis'
import type { SpreadsheetBackend, TabInfo } from './backend'
import type { SheetCell } from './schema'
import { getCredential } from '../security/credentials'
import { getAppSetting } from '../database/repositories/settings.repo'

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive.readonly'
]
const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet'

type SheetsClient = sheets_v4.Sheets
type GoogleAuthClient = Auth.GoogleAuth

interface ServiceAccountKey {
  client_email: string
  private_key: string
}

function parseServiceAccount(json: string): ServiceAccountKey {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    throw new Error('Stored Google service account is not valid JSON')
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('Stored Google service account is not a JSON object')
  }
  const clientEmail: unknown = Reflect.get(parsed, 'client_email')
  const privateKey: unknown = Reflect.get(parsed, 'private_key')
  if (typeof clientEmail !== 'string' || typeof privateKey !== 'string') {
    throw new Error('Google service account must contain client_email and private_key')
  }
  return { client_email: clientEmail, private_key: privateKey }
}

function createAuth(): GoogleAuthClient {
  const serviceAccount = getCredential('googleServiceAccount')
  if (serviceAccount) {
    return new google.auth.GoogleAuth({
      credentials: parseServiceAccount(serviceAccount),
      scopes: SCOPES
    })
  }
  // Falls back to Application Default Credentials (GOOGLE_APPLICATION_CREDENTIALS)
  return new google.auth.GoogleAuth({ scopes: SCOPES })
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")
}

async function findSpreadsheetByName(auth: GoogleAuthClient, name: string): Promise<string> {
  const drive = google.drive({ version: 'v3', auth })
  console.log(`[Sheets] Looking up spreadsheet "${name}"...`)

  const res = await drive.files.list({
    q: `name = '${escapeQueryValue(name)}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
    fields: 'files(id)',
    spaces: 'drive',
    pageSize: 1
  })

  const id = res.data.files?.[0]?.id
  if (!id) {
    throw new Error(`Spreadsheet "${name}" not found or not shared with the service account`)
  }
  console.log(`[Sheets] Found spreadsheet "${name}": ${id}`)
  return id
}

export function quoteTabTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`
}

/** 1 -> A, 26 -> Z, 27 -> AA */
export function columnLetter(column: number): string {
  let n = column
  let letters = ''
  while (n > 0) {
    const rem = (n - 1) % 26
    letters = String.fromCharCode(65 + rem) + letters
    n = Math.floor((n - 1) / 26)
  }
  return letters
}

function toCell(value: unknown): SheetCell {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  return value == null ? '' : String(value)
}

export class GoogleSheetsBackend implements SpreadsheetBackend {
  constructor(
    private readonly sheets: SheetsClient,
    private readonly spreadsheetId: string
  ) {}

  async listTabs(): Promise<TabInfo[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties(sheetId,title)'
    })
    const tabs: TabInfo[] = []
    for (const sheet of res.data.sheets ?? []) {
      const props = sheet.properties
      if (props?.sheetId == null || !props.title) continue
      tabs.push({ sheetId: props.sheetId, title: props.title })
    }
    return tabs
  }

  async addTab(title: string, rows: number, columns: number): Promise<TabInfo> {
    console.log(`[Sheets] Creating tab "${title}"...`)
    const res = await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: { title, gridProperties: { rowCount: rows, columnCount: columns } }
            }
          }
        ]
      }
    })
    const sheetId = res.data.replies?.[0]?.addSheet?.properties?.sheetId
    if (sheetId == null) throw new Error(`Tab "${title}" was not created`)
    return { sheetId, title }
  }

  async getValues(title: string): Promise<SheetCell[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteTabTitle(title),
      valueRenderOption: 'FORMATTED_VALUE'
    })
    const rows: unknown[][] = res.data.values ?? []
    return rows.map((row) => row.map(toCell))
  }

  async appendRow(title: string, values: SheetCell[]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTabTitle(title)}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: [values] }
    })
  }

  async updateRange(title: string, row: number, startColumn: number, values: SheetCell[]): Promise<void> {
    const endColumn = startColumn + values.length - 1
    const range = `${quoteTabTitle(title)}!${columnLetter(startColumn)}${row}:${columnLetter(endColumn)}${row}`
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values: [values] }
    })
  }

  async deleteRow(tab: TabInfo, row: number): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            deleteDimension: {
              range: { sheetId: tab.sheetId, dimension: 'ROWS', startIndex: row - 1, endIndex: row }
            }
          }
        ]
      }
    })
  }

  async clear(title: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: quoteTabTitle(title)
    })
  }

  getUrl(): string {
    return `https://docs.google.com/spreadsheets/d/${this.spreadsheetId}/edit`
  }
}

/** Open the configured spreadsheet, by ID when set, otherwise by its Drive file name. */
export async function openGoogleSpreadsheet(): Promise<SpreadsheetBackend> {
  const auth = createAuth()
  const spreadsheetId =
    getAppSetting('spreadsheetId') || (await findSpreadsheetByName(auth, getAppSetting('spreadsheetName')))
  const sheets = google.sheets({ version: 'v4', auth })
  return new GoogleSheetsBackend(sheets, spreadsheetId)
}
