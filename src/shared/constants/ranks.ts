import type { FacultyRank } from '../types/faculty'

export const RANK_LABELS: Record<FacultyRank, string> = {
  professor: '교수',
  associate_professor: '부교수',
  assistant_professor: '조교수',
  lecturer: '강사'
}

export const RANK_OPTIONS: string[] = Object.values(RANK_LABELS)

export function isRankLabel(value: string): boolean {
  return RANK_OPTIONS.includes(value)
}
