import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { buildSignatureRows, renderSignatureSheet } from './signature-sheet'
import type { MinutesRecord } from '../../shared/types/meeting'

const record: MinutesRecord = {
  id: '20240310093000',
  no: 1,
  date: '2024-03-10',
  time: '12:00 ~ 13:00',
  place: 'Room 210',
  topic: 'Course redesign',
  attendeeText: 'Kim Minji(Education), Lee Jun(History)',
  attendeesJson:
    '[{"name":"Kim Minji","department":"Education","rank":"교수"},{"이름":"Lee Jun","학과":"History","직급":"강사"}]',
  content: 'Notes',
  keywords: ''
}

function countPages(pdf: Buffer): number {
  return pdf.toString('latin1').match(/\/Type \/Page(?!s)/g)?.length ?? 0
}

describe('signature sheet', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('lists attendees under the header and pads to eleven rows', () => {
    const rows = buildSignatureRows(record)

    expect(rows).toHaveLength(11)
    expect(rows[0]).toEqual(['연번', '소속학과명', '직급', '성명', '자필서명\n(도장날인X)', '비고'])
    expect(rows[1]).toEqual(['1', 'Education', '교수', 'Kim Minji', '', ''])
    expect(rows[2]).toEqual(['2', 'History', '강사', 'Lee Jun', '', ''])
    expect(rows[10]).toEqual(['', '', '', '', '', ''])
  })

  it('keeps an empty table when the attendee column is unreadable', () => {
    const rows = buildSignatureRows({ ...record, attendeesJson: 'not json' })
    expect(rows.slice(1).every((row) => row.every((cell) => cell === ''))).toBe(true)
  })

  it('renders one page per meeting with the fallback font', async () => {
    const file = await renderSignatureSheet([record, { ...record, id: '20240317093000', date: '2024-03-17' }], null)

    expect(file.filename).toBe('서명부.pdf')
    expect(file.mimeType).toBe('application/pdf')
    expect(file.data.subarray(0, 5).toString('latin1')).toBe('%PDF-')
    expect(countPages(file.data)).toBe(2)
    expect(console.warn).toHaveBeenCalledWith('[Export] Font not found at (unset), using Helvetica')
  })

  it('falls back to Helvetica when the font file cannot be loaded', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'minutes-desk-font-'))
    const fontPath = join(dir, 'broken.ttf')
    writeFileSync(fontPath, 'not a font')

    try {
      const file = await renderSignatureSheet([record], fontPath)

      expect(file.data.subarray(0, 5).toString('latin1')).toBe('%PDF-')
      expect(countPages(file.data)).toBe(1)
      expect(console.warn).toHaveBeenCalledWith(
        `[Export] Could not load font ${fontPath}, using Helvetica:`,
        expect.any(Error)
      )
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })

  it('refuses an empty selection', async () => {
    await expect(renderSignatureSheet([], null)).rejects.toThrow('No meetings selected for the signature sheet')
  })
})
