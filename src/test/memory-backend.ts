import type { SpreadsheetBackend, TabInfo } from '../main/sheets/backend'
import type { SheetCell } from '../main/sheets/schema'

interface MemoryTab {
  info: TabInfo
  rows: SheetCell[][]
}

/** In-process stand-in for a Google spreadsheet. */
export class MemoryBackend implements SpreadsheetBackend {
  private readonly tabs = new Map<string, MemoryTab>()
  private nextSheetId = 1
  offline = false

  private check(): void {
    if (this.offline) throw new Error('network unreachable')
  }

  private tab(title: string): MemoryTab {
    const tab = this.tabs.get(title)
    if (!tab) throw new Error(`Unable to parse range: ${title}`)
    return tab
  }

  /** Seed a tab directly, header row first. */
  seed(title: string, rows: SheetCell[][]): void {
    const existing = this.tabs.get(title)
    if (existing) {
      existing.rows = rows.map((row) => [...row])
      return
    }
    this.tabs.set(title, { info: { sheetId: this.nextSheetId++, title }, rows: rows.map((row) => [...row]) })
  }

  rows(title: string): SheetCell[][] {
    return this.tabs.get(title)?.rows ?? []
  }

  hasTab(title: string): boolean {
    return this.tabs.has(title)
  }

  async listTabs(): Promise<TabInfo[]> {
    this.check()
    return [...this.tabs.values()].map((tab) => tab.info)
  }

  async addTab(title: string): Promise<TabInfo> {
    this.check()
    if (this.tabs.has(title)) throw new Error(`A sheet with the name "${title}" already exists`)
    const info = { sheetId: this.nextSheetId++, title }
    this.tabs.set(title, { info, rows: [] })
    return info
  }

  async getValues(title: string): Promise<SheetCell[][]> {
    this.check()
    return this.tab(title).rows.map((row) => [...row])
  }

  async appendRow(title: string, values: SheetCell[]): Promise<void> {
    this.check()
    this.tab(title).rows.push([...values])
  }

  async updateRange(title: string, row: number, startColumn: number, values: SheetCell[]): Promise<void> {
    this.check()
    const rows = this.tab(title).rows
    while (rows.length < row) rows.push([])
    const target = rows[row - 1]
    values.forEach((value, offset) => {
      const index = startColumn - 1 + offset
      while (target.length < index) target.push('')
      target[index] = value
    })
  }

  async deleteRow(tab: TabInfo, row: number): Promise<void> {
    this.check()
    this.tab(tab.title).rows.splice(row - 1, 1)
  }

  async clear(title: string): Promise<void> {
    this.check()
    this.tab(title).rows = []
  }

  getUrl(): string {
    return 'https://sheets.test/minutes'
  }
}
