import { existsSync } from 'fs'
import PDFDocument from 'pdfkit'
import { formatSignatureWhen } from './date-format'
import { decodeAttendees } from '../../shared/utils/attendee-codec'
import type { ExportFile } from '../../shared/types/export'
import type { MinutesRecord } from '../../shared/types/meeting'

export const PDF_FILENAME = '서명부.pdf'

const MM = 72 / 25.4
const FALLBACK_FONT = 'Helvetica'
const CUSTOM_FONT = 'SignatureBody'

const TABLE_HEADER = ['연번', '소속학과명', '직급', '성명', '자필서명\n(도장날인X)', '비고']
const COLUMN_WIDTHS_MM = [15, 40, 30, 30, 45, 20]
const ROW_HEIGHT_MM = 13
const TABLE_ROWS = 11
const HEADER_FILL = '#d3d3d3'

function mm(value: number): number {
  return value * MM
}

export function buildSignatureRows(record: MinutesRecord): string[][] {
  const rows = [TABLE_HEADER]
  decodeAttendees(record.attendeesJson).forEach((person, index) => {
    rows.push([String(index + 1), person.department, person.rank, person.name, '', ''])
  })
  while (rows.length < TABLE_ROWS) rows.push(['', '', '', '', '', ''])
  return rows
}

function selectFont(doc: PDFKit.PDFDocument, fontPath: string | null): string {
  if (!fontPath || !existsSync(fontPath)) {
    console.warn(`[Export] Font not found at ${fontPath ?? '(unset)'}, using ${FALLBACK_FONT}`)
    return FALLBACK_FONT
  }
  try {
    doc.registerFont(CUSTOM_FONT, fontPath)
    doc.font(CUSTOM_FONT)
    return CUSTOM_FONT
  } catch (err) {
    console.warn(`[Export] Could not load font ${fontPath}, using ${FALLBACK_FONT}:`, err)
    return FALLBACK_FONT
  }
}

function drawTable(doc: PDFKit.PDFDocument, rows: string[][], font: string): void {
  const height = mm(ROW_HEIGHT_MM)
  doc.font(font).fontSize(10).lineWidth(0.5)

  rows.forEach((row, rowIndex) => {
    const y = mm(90) + rowIndex * height
    let x = mm(20)
    row.forEach((value, columnIndex) => {
      const width = mm(COLUMN_WIDTHS_MM[columnIndex])
      if (rowIndex === 0) {
        doc.rect(x, y, width, height).fillAndStroke(HEADER_FILL, '#000000')
        doc.fillColor('#000000')
      } else {
        doc.rect(x, y, width, height).stroke()
      }
      if (value) {
        const textHeight = doc.heightOfString(value, { width })
        doc.text(value, x, y + (height - textHeight) / 2, { width, align: 'center' })
      }
      x += width
    })
  })
}

function drawPage(doc: PDFKit.PDFDocument, record: MinutesRecord, font: string): void {
  doc.addPage({ size: 'A4', margin: 0 })
  const pageWidth = doc.page.width

  doc.font(font).fontSize(14).text('<교수학습방법개선 공동체 운영>', mm(20), mm(25), { lineBreak: false })
  doc.fontSize(20).text('회의참석자 서명부', 0, mm(45), { width: pageWidth, align: 'center' })
  doc.fontSize(11)
  doc.text(`■ 일시: ${formatSignatureWhen(record.date, record.time)}`, mm(25), mm(65), { lineBreak: false })
  doc.text(`■ 장소: ${record.place}`, mm(25), mm(73), { lineBreak: false })

  drawTable(doc, buildSignatureRows(record), font)
}

/** One A4 signature page per meeting, in the order given. */
export function renderSignatureSheet(records: MinutesRecord[], fontPath: string | null): Promise<ExportFile> {
  if (records.length === 0) {
    return Promise.reject(new Error('No meetings selected for the signature sheet'))
  }

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ autoFirstPage: false, size: 'A4', margin: 0 })
    const chunks: Buffer[] = []
    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    doc.on('error', reject)
    doc.on('end', () => {
      console.log(`[Export] Signature sheet with ${records.length} page(s)`)
      resolve({ filename: PDF_FILENAME, mimeType: 'application/pdf', data: Buffer.concat(chunks) })
    })

    try {
      const font = selectFont(doc, fontPath)
      for (const record of records) drawPage(doc, record, font)
      doc.end()
    } catch (err) {
      reject(err)
    }
  })
}
