import { stringify } from 'csv-stringify/sync'
import { formatReportWhen } from './date-format'
import type { CsvExportRow, ExportFile } from '../../shared/types/export'
import type { MinutesRecord } from '../../shared/types/meeting'

export const CSV_FILENAME = '회의록.csv'

const CSV_COLUMNS: { key: keyof CsvExportRow; header: string }[] = [
  { key: 'when', header: '일시' },
  { key: 'place', header: '장소' },
  { key: 'topic', header: '주제' },
  { key: 'attendees', header: '참석자(3명 이상)' },
  { key: 'content', header: '회의 내용(2줄 이상, 구체적으로 작성)' },
  { key: 'evidence', header: '증빙자료' }
]

const FORMULA_PREFIXES = ['-', '=', '+']

/** Quote content a spreadsheet would otherwise read as a formula. */
export function protectContent(content: string): string {
  const leading = content.trimStart()
  return FORMULA_PREFIXES.some((prefix) => leading.startsWith(prefix)) ? `'${content}` : content
}

export function toCsvRow(record: MinutesRecord): CsvExportRow {
  return {
    when: formatReportWhen(record.date, record.time),
    place: record.place,
    topic: record.topic,
    attendees: record.attendeeText.replace(/, /g, '\n').replace(/,/g, '\n'),
    content: protectContent(record.content),
    evidence: '서명부\n첨부'
  }
}

export function renderCsv(records: MinutesRecord[]): ExportFile {
  const text = stringify(records.map(toCsvRow), {
    bom: true,
    header: true,
    columns: CSV_COLUMNS
  })
  console.log(`[Export] CSV with ${records.length} meeting(s)`)
  return { filename: CSV_FILENAME, mimeType: 'text/csv', data: Buffer.from(text, 'utf8') }
}
