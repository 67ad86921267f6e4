import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { SheetGateway, normalizeValue } from './gateway'
import { TAB_HEADERS, TAB_NAMES } from './schema'
import { columnLetter, quoteTabTitle } from './google-backend'
import { MemoryBackend } from '../../test/memory-backend'

describe('SheetGateway', () => {
  let backend: MemoryBackend
  let gateway: SheetGateway

  beforeEach(() => {
    backend = new MemoryBackend()
    gateway = new SheetGateway(async () => backend)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('creates a missing tab with its header row', async () => {
    const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)

    expect(tab?.title).toBe('회의록')
    expect(backend.rows('회의록')).toEqual([TAB_HEADERS['회의록']])
  })

  it('reuses an existing tab without touching its rows', async () => {
    backend.seed('재직교수', [['연번', '학과', '직급', '이름'], [1, 'Education', '교수', 'Kim Minji']])

    await gateway.getOrCreateTab(TAB_NAMES.faculty)

    expect(backend.rows('재직교수')).toHaveLength(2)
  })

  it('reads header-keyed records and skips blank rows', async () => {
    backend.seed('재직교수', [
      ['연번', '학과', '직급', '이름'],
      ['1', 'Education', '교수', 'Kim Minji'],
      ['', '', '', ''],
      ['2', 'History']
    ])
    const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
    if (!tab) throw new Error('tab expected')

    const records = await gateway.readAll(tab)

    expect(records).toEqual([
      { 연번: '1', 학과: 'Education', 직급: '교수', 이름: 'Kim Minji' },
      { 연번: '2', 학과: 'History', 직급: '', 이름: '' }
    ])
  })

  it('finds rows by key in a given column, skipping the header', async () => {
    backend.seed('회의록', [
      TAB_HEADERS['회의록'],
      ['20240310120000', 1, '2024-03-10'],
      ['20240317120000', 2, '2024-03-17']
    ])
    const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
    if (!tab) throw new Error('tab expected')

    expect(await gateway.findRowByKey(tab, '2024-03-17', 3)).toBe(3)
    expect(await gateway.findRowByKey(tab, '2', 2)).toBe(3)
    expect(await gateway.findRowByKey(tab, 'ID', 1)).toBeNull()
    expect(await gateway.findRowByKey(tab, '2024-03-24', 3)).toBeNull()
  })

  it('normalizes bigint and empty values before writing', async () => {
    const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
    if (!tab) throw new Error('tab expected')

    await gateway.appendRow(tab, [BigInt(7), null, undefined, 'Kim Minji'])

    expect(backend.rows('재직교수')[1]).toEqual([7, '', '', 'Kim Minji'])
  })

  it('updates part of a row from a start column', async () => {
    backend.seed('재직교수', [['연번', '학과', '직급', '이름'], [1, 'Education', '교수', 'Kim Minji']])
    const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
    if (!tab) throw new Error('tab expected')

    await gateway.updateRow(tab, 2, ['History', '강사'], 2)

    expect(backend.rows('재직교수')[1]).toEqual([1, 'History', '강사', 'Kim Minji'])
  })

  it('turns backend failures into warnings and fallbacks', async () => {
    backend.seed('회의록', [TAB_HEADERS['회의록']])
    const tab = await gateway.getOrCreateTab(TAB_NAMES.minutes)
    if (!tab) throw new Error('tab expected')
    backend.offline = true

    expect(await gateway.getOrCreateTab(TAB_NAMES.minutes)).toBeNull()
    expect(await gateway.readAll(tab)).toEqual([])
    expect(await gateway.appendRow(tab, ['x'])).toBe(false)
    expect(await gateway.deleteRow(tab, 2)).toBe(false)
    expect(console.warn).toHaveBeenCalledTimes(4)
  })

  it('retries opening the spreadsheet after a failed attempt', async () => {
    const open = vi
      .fn<() => Promise<MemoryBackend>>()
      .mockRejectedValueOnce(new Error('auth failed'))
      .mockResolvedValue(backend)
    const retrying = new SheetGateway(open)

    expect(await retrying.getUrl()).toBeNull()
    expect(await retrying.getUrl()).toBe('https://sheets.test/minutes')
    expect(open).toHaveBeenCalledTimes(2)
  })
})

describe('normalizeValue', () => {
  it('keeps plain cells and blanks non-finite numbers', () => {
    expect(normalizeValue('a')).toBe('a')
    expect(normalizeValue(3)).toBe(3)
    expect(normalizeValue(false)).toBe(false)
    expect(normalizeValue(Number.NaN)).toBe('')
  })
})

describe('A1 helpers', () => {
  it('converts column numbers to letters', () => {
    expect(columnLetter(1)).toBe('A')
    expect(columnLetter(10)).toBe('J')
    expect(columnLetter(26)).toBe('Z')
    expect(columnLetter(27)).toBe('AA')
  })

  it('quotes tab titles', () => {
    expect(quoteTabTitle('회의록')).toBe("'회의록'")
    expect(quoteTabTitle("Bob's")).toBe("'Bob''s'")
  })
})
