import * as facultyRepo from '../sheets/repositories/faculty.repo'
import { logAudit } from '../database/repositories/audit.repo'
import { isRankLabel, RANK_OPTIONS } from '../../shared/constants/ranks'
import { formatFacultyLabel } from '../../shared/utils/attendee-codec'
import type { FacultyInput, FacultyMember } from '../../shared/types/faculty'
import type { OperationResult } from '../../shared/types/meeting'

function validate(input: Pick<FacultyInput, 'department' | 'rank' | 'name'>): string | null {
  if (!input.name.trim() || !input.department.trim()) return 'Name and department are required'
  if (!isRankLabel(input.rank)) return `Rank must be one of: ${RANK_OPTIONS.join(', ')}`
  return null
}

export function nextFacultyNo(members: FacultyMember[]): number {
  return members.reduce((max, member) => Math.max(max, member.no), 0) + 1
}

export function buildFacultyOptions(members: FacultyMember[]): string[] {
  return members.filter((member) => member.name.trim()).map(formatFacultyLabel)
}

export async function listFacultyOptions(): Promise<string[]> {
  return buildFacultyOptions(await facultyRepo.listFaculty())
}

export async function addFaculty(
  input: FacultyInput,
  actor: string | null
): Promise<OperationResult & { member: FacultyMember | null }> {
  const problem = validate(input)
  if (problem) return { success: false, message: problem, member: null }

  const members = await facultyRepo.listFaculty()
  const no = input.no ?? nextFacultyNo(members)
  if (!Number.isInteger(no) || no < 1) {
    return { success: false, message: 'Sequence number must be a positive integer', member: null }
  }
  if (members.some((member) => member.no === no)) {
    return { success: false, message: `Sequence number ${no} is already in use`, member: null }
  }

  const member: FacultyMember = {
    no,
    department: input.department.trim(),
    rank: input.rank,
    name: input.name.trim()
  }
  if (!(await facultyRepo.appendFaculty(member))) {
    return { success: false, message: 'Spreadsheet unavailable, please try again shortly', member: null }
  }
  logAudit(actor, 'faculty', String(no), 'create', member)
  return { success: true, message: 'Added', member }
}

export async function updateFaculty(
  no: number,
  data: Pick<FacultyMember, 'department' | 'rank' | 'name'>,
  actor: string | null
): Promise<OperationResult> {
  const problem = validate(data)
  if (problem) return { success: false, message: problem }

  const cleaned = { department: data.department.trim(), rank: data.rank, name: data.name.trim() }
  const result = await facultyRepo.updateFaculty(no, cleaned)
  if (!result.success) return result
  logAudit(actor, 'faculty', String(no), 'update', cleaned)
  return result
}

/** Historical minutes keep their attendee entries. */
export async function deleteFaculty(no: number, actor: string | null): Promise<OperationResult> {
  const result = await facultyRepo.deleteFaculty(no)
  if (!result.success) return result
  logAudit(actor, 'faculty', String(no), 'delete')
  return result
}
