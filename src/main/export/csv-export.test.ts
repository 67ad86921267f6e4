import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { protectContent, renderCsv, toCsvRow } from './csv-export'
import type { MinutesRecord } from '../../shared/types/meeting'

const record: MinutesRecord = {
  id: '20240310093000',
  no: 1,
  date: '2024-03-10',
  time: '12:00 ~ 13:00',
  place: 'Room 210',
  topic: 'Course redesign',
  attendeeText: 'Kim Minji(Education), Lee Jun(History)',
  attendeesJson: '[]',
  content: '- Reviewed the syllabus',
  keywords: ''
}

describe('csv export', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('maps a record to the report row', () => {
    expect(toCsvRow(record)).toEqual({
      when: '24.3.10.(일), 12:00 ~ 13:00',
      place: 'Room 210',
      topic: 'Course redesign',
      attendees: 'Kim Minji(Education)\nLee Jun(History)',
      content: "'- Reviewed the syllabus",
      evidence: '서명부\n첨부'
    })
  })

  it('quotes content that would read as a formula', () => {
    expect(protectContent('  =SUM(A1)')).toBe("'  =SUM(A1)")
    expect(protectContent('+1 agenda')).toBe("'+1 agenda")
    expect(protectContent('Agreed on goals')).toBe('Agreed on goals')
    expect(protectContent('')).toBe('')
  })

  it('writes a UTF-8 file with a byte order mark and the report header', () => {
    const file = renderCsv([{ ...record, content: 'Plain notes', attendeeText: 'Kim Minji(Education)' }])
    const text = file.data.toString('utf8')

    expect(file.filename).toBe('회의록.csv')
    expect(file.mimeType).toBe('text/csv')
    expect([...file.data.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf])
    expect(text.slice(1)).toBe(
      '일시,장소,주제,참석자(3명 이상),"회의 내용(2줄 이상, 구체적으로 작성)",증빙자료\n' +
        '"24.3.10.(일), 12:00 ~ 13:00",Room 210,Course redesign,Kim Minji(Education),Plain notes,"서명부\n첨부"\n'
    )
  })
})
