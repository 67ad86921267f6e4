import type { SheetCell } from './schema'

export interface TabInfo {
  sheetId: number
  title: string
}

/**
 * Raw spreadsheet operations. Implementations may throw; the gateway owns
 * the failure policy.
 */
export interface SpreadsheetBackend {
  listTabs(): Promise<TabInfo[]>
  addTab(title: string, rows: number, columns: number): Promise<TabInfo>
  /** All rows of a tab, header included. */
  getValues(title: string): Promise<SheetCell[][]>
  appendRow(title: string, values: SheetCell[]): Promise<void>
  /** Overwrite `values.length` cells of `row` starting at `startColumn` (both 1-based). */
  updateRange(title: string, row: number, startColumn: number, values: SheetCell[]): Promise<void>
  deleteRow(tab: TabInfo, row: number): Promise<void>
  clear(title: string): Promise<void>
  getUrl(): string
}
