export interface ExportFile {
  filename: string
  mimeType: string
  data: Buffer
}

export interface CsvExportRow {
  when: string
  place: string
  topic: string
  attendees: string
  content: string
  evidence: string
}
