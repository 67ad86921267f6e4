export type UserRole = 'admin' | 'user'

export interface Session {
  token: string
  role: UserRole
  createdAt: string
}
