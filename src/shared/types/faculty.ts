export type FacultyRank = 'professor' | 'associate_professor' | 'assistant_professor' | 'lecturer'

export interface FacultyMember {
  no: number
  department: string
  rank: string // stored label, see RANK_LABELS
  name: string
}

export interface FacultyInput {
  no?: number
  department: string
  rank: string
  name: string
}
