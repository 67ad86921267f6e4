import type { SpreadsheetBackend, TabInfo } from './backend'
import {
  NEW_TAB_COLUMNS,
  NEW_TAB_ROWS,
  TAB_HEADERS,
  type SheetCell,
  type SheetRecord,
  type SheetValue,
  type TabName
} from './schema'

export type TabHandle = TabInfo

export interface SheetTable {
  header: string[]
  records: SheetRecord[]
}

type BackendSource = () => Promise<SpreadsheetBackend>

/** Plain cell values only: the API client rejects bigint and null. */
export function normalizeValue(value: SheetValue): SheetCell {
  if (typeof value === 'bigint') return Number(value)
  if (value === null || value === undefined) return ''
  if (typeof value === 'number' && !Number.isFinite(value)) return ''
  return value
}

function isBlankRow(row: SheetCell[]): boolean {
  return row.every((cell) => String(cell).trim() === '')
}

/**
 * Spreadsheet access with a no-throw policy: every backend failure is logged
 * as a warning and reported as null / false / an empty list, so callers can
 * treat it as "nothing happened, retry later".
 */
export class SheetGateway {
  private backend: Promise<SpreadsheetBackend> | null = null

  constructor(private readonly openBackend: BackendSource) {}

  private getBackend(): Promise<SpreadsheetBackend> {
    if (!this.backend) {
      this.backend = this.openBackend().catch((err: unknown) => {
        this.backend = null
        throw err
      })
    }
    return this.backend
  }

  private async attempt<T>(action: string, fallback: T, run: (backend: SpreadsheetBackend) => Promise<T>): Promise<T> {
    try {
      const backend = await this.getBackend()
      return await run(backend)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.warn(`[Sheets] ${action} failed, try again shortly: ${message}`)
      return fallback
    }
  }

  async getOrCreateTab(name: TabName): Promise<TabHandle | null> {
    return this.attempt<TabHandle | null>(`Opening tab "${name}"`, null, async (backend) => {
      const tabs = await backend.listTabs()
      const existing = tabs.find((tab) => tab.title === name)
      if (existing) return existing

      const created = await backend.addTab(name, NEW_TAB_ROWS, NEW_TAB_COLUMNS)
      await backend.appendRow(name, TAB_HEADERS[name])
      return created
    })
  }

  async readHeader(tab: TabHandle): Promise<string[] | null> {
    return this.attempt<string[] | null>(`Reading header of "${tab.title}"`, null, async (backend) => {
      const rows = await backend.getValues(tab.title)
      return (rows[0] ?? []).map((cell) => String(cell).trim())
    })
  }

  /** Header plus header-keyed records; fully blank rows are skipped. */
  async readTable(tab: TabHandle): Promise<SheetTable | null> {
    return this.attempt<SheetTable | null>(`Reading "${tab.title}"`, null, async (backend) => {
      const rows = await backend.getValues(tab.title)
      if (rows.length === 0) return { header: [], records: [] }

      const header = rows[0].map((cell) => String(cell).trim())
      const records: SheetRecord[] = []
      for (const row of rows.slice(1)) {
        if (isBlankRow(row)) continue
        const record: SheetRecord = {}
        header.forEach((column, index) => {
          if (!column) return
          record[column] = row[index] ?? ''
        })
        records.push(record)
      }
      return { header, records }
    })
  }

  async readAll(tab: TabHandle): Promise<SheetRecord[]> {
    const table = await this.readTable(tab)
    return table ? table.records : []
  }

  async appendRow(tab: TabHandle, values: SheetValue[]): Promise<boolean> {
    return this.attempt<boolean>(`Appending to "${tab.title}"`, false, async (backend) => {
      await backend.appendRow(tab.title, values.map(normalizeValue))
      return true
    })
  }

  /** 1-based row number of the first data row whose `column` equals `key`. */
  async findRowByKey(tab: TabHandle, key: string, column: number): Promise<number | null> {
    return this.attempt<number | null>(`Searching "${tab.title}"`, null, async (backend) => {
      const rows = await backend.getValues(tab.title)
      for (let index = 1; index < rows.length; index++) {
        const cell = rows[index][column - 1]
        if (cell !== undefined && String(cell) === key) return index + 1
      }
      return null
    })
  }

  async updateRow(tab: TabHandle, row: number, values: SheetValue[], startColumn = 1): Promise<boolean> {
    return this.attempt<boolean>(`Updating row ${row} of "${tab.title}"`, false, async (backend) => {
      await backend.updateRange(tab.title, row, startColumn, values.map(normalizeValue))
      return true
    })
  }

  async deleteRow(tab: TabHandle, row: number): Promise<boolean> {
    return this.attempt<boolean>(`Deleting row ${row} of "${tab.title}"`, false, async (backend) => {
      await backend.deleteRow(tab, row)
      return true
    })
  }

  /** Clear the tab and write `rows` from the top. */
  async resetTab(tab: TabHandle, rows: SheetValue[][]): Promise<boolean> {
    return this.attempt<boolean>(`Resetting "${tab.title}"`, false, async (backend) => {
      await backend.clear(tab.title)
      for (const row of rows) {
        await backend.appendRow(tab.title, row.map(normalizeValue))
      }
      return true
    })
  }

  async getUrl(): Promise<string | null> {
    return this.attempt<string | null>('Resolving spreadsheet URL', null, async (backend) => backend.getUrl())
  }
}
