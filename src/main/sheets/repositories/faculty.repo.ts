import { getSheetGateway } from '../connection'
import { facultyToRow, loadFaculty } from '../record-mapper'
import { FACULTY_NO_COLUMN, TAB_NAMES } from '../schema'
import type { FacultyMember } from '../../../shared/types/faculty'
import type { OperationResult } from '../../../shared/types/meeting'

const STORE_UNAVAILABLE = 'Spreadsheet unavailable, please try again shortly'

function notFound(no: number): string {
  return `No faculty member with sequence number ${no}`
}

export function listFaculty(): Promise<FacultyMember[]> {
  return loadFaculty(getSheetGateway())
}

export async function getFaculty(no: number): Promise<FacultyMember | null> {
  const members = await listFaculty()
  return members.find((member) => member.no === no) ?? null
}

export async function appendFaculty(member: FacultyMember): Promise<boolean> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
  if (!tab) return false
  return gateway.appendRow(tab, facultyToRow(member))
}

/** Rewrites department, rank and name; the sequence number never changes. */
export async function updateFaculty(
  no: number,
  data: Pick<FacultyMember, 'department' | 'rank' | 'name'>
): Promise<OperationResult> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
  if (!tab) return { success: false, message: STORE_UNAVAILABLE }

  const row = await gateway.findRowByKey(tab, String(no), FACULTY_NO_COLUMN)
  if (row === null) return { success: false, message: notFound(no) }

  const written = await gateway.updateRow(tab, row, [data.department, data.rank, data.name], FACULTY_NO_COLUMN + 1)
  return written ? { success: true, message: 'Updated' } : { success: false, message: STORE_UNAVAILABLE }
}

export async function deleteFaculty(no: number): Promise<OperationResult> {
  const gateway = getSheetGateway()
  const tab = await gateway.getOrCreateTab(TAB_NAMES.faculty)
  if (!tab) return { success: false, message: STORE_UNAVAILABLE }

  const row = await gateway.findRowByKey(tab, String(no), FACULTY_NO_COLUMN)
  if (row === null) return { success: false, message: notFound(no) }

  const deleted = await gateway.deleteRow(tab, row)
  return deleted ? { success: true, message: 'Deleted' } : { success: false, message: STORE_UNAVAILABLE }
}
