import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { addFaculty, buildFacultyOptions, deleteFaculty, listFacultyOptions, nextFacultyNo, updateFaculty } from './faculty.service'
import { setSheetBackend } from '../sheets/connection'
import { closeDatabase } from '../database/connection'
import { MemoryBackend } from '../../test/memory-backend'

describe('faculty roster', () => {
  let backend: MemoryBackend

  beforeEach(() => {
    backend = new MemoryBackend()
    setSheetBackend(backend)
    backend.seed('재직교수', [
      ['연번', '학과', '직급', '이름'],
      [1, 'Education', '교수', 'Kim Minji'],
      [4, 'History', '강사', 'Lee Jun']
    ])
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    setSheetBackend(null)
    closeDatabase()
    vi.restoreAllMocks()
  })

  it('numbers new members after the highest sequence number', async () => {
    const result = await addFaculty({ department: 'Korean Literature', rank: '부교수', name: ' Park Sora ' }, 'admin')

    expect(result.member).toEqual({ no: 5, department: 'Korean Literature', rank: '부교수', name: 'Park Sora' })
    expect(backend.rows('재직교수')[3]).toEqual([5, 'Korean Literature', '부교수', 'Park Sora'])
  })

  it('rejects a sequence number already in use', async () => {
    const result = await addFaculty({ no: 4, department: 'Music', rank: '교수', name: 'Choi Yuna' }, 'admin')

    expect(result).toEqual({ success: false, message: 'Sequence number 4 is already in use', member: null })
  })

  it('rejects an unknown rank', async () => {
    const result = await addFaculty({ department: 'Music', rank: 'Dean', name: 'Choi Yuna' }, 'admin')

    expect(result.message).toBe('Rank must be one of: 교수, 부교수, 조교수, 강사')
  })

  it('updates everything but the sequence number', async () => {
    const result = await updateFaculty(4, { department: 'World History', rank: '조교수', name: 'Lee Jun' }, 'admin')

    expect(result.success).toBe(true)
    expect(backend.rows('재직교수')[2]).toEqual([4, 'World History', '조교수', 'Lee Jun'])
  })

  it('reports an unknown member on update and delete', async () => {
    expect(await updateFaculty(9, { department: 'Music', rank: '교수', name: 'Choi Yuna' }, 'admin')).toEqual({
      success: false,
      message: 'No faculty member with sequence number 9'
    })
    expect(await deleteFaculty(9, 'admin')).toEqual({
      success: false,
      message: 'No faculty member with sequence number 9'
    })
  })

  it('reports an unreachable spreadsheet separately from an unknown member', async () => {
    backend.offline = true

    expect(await deleteFaculty(1, 'admin')).toEqual({
      success: false,
      message: 'Spreadsheet unavailable, please try again shortly'
    })
    expect(await updateFaculty(1, { department: 'Music', rank: '교수', name: 'Kim Minji' }, 'admin')).toEqual({
      success: false,
      message: 'Spreadsheet unavailable, please try again shortly'
    })
  })

  it('deletes a member by sequence number', async () => {
    expect((await deleteFaculty(1, 'admin')).success).toBe(true)
    expect(await listFacultyOptions()).toEqual(['Lee Jun (History/강사)'])
  })

  it('builds selector labels and skips nameless rows', () => {
    const options = buildFacultyOptions([
      { no: 1, department: 'Education', rank: '교수', name: 'Kim Minji' },
      { no: 2, department: 'Education', rank: '강사', name: ' ' }
    ])

    expect(options).toEqual(['Kim Minji (Education/교수)'])
    expect(nextFacultyNo([])).toBe(1)
  })
})
