import type { SpreadsheetBackend } from './backend'
import { SheetGateway } from './gateway'
import { openGoogleSpreadsheet } from './google-backend'

let gateway: SheetGateway | null = null

export function getSheetGateway(): SheetGateway {
  if (!gateway) {
    gateway = new SheetGateway(openGoogleSpreadsheet)
  }
  return gateway
}

/** Point the gateway at another backend; `null` goes back to Google Sheets on next use. */
export function setSheetBackend(backend: SpreadsheetBackend | null): void {
  gateway = backend ? new SheetGateway(async () => backend) : null
}
