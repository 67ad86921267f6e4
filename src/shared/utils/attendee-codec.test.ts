import { describe, expect, it } from 'vitest'
import {
  decodeAttendees,
  encodeAttendees,
  formatFacultyLabel,
  parseAttendeeLabel,
  preselectLabels
} from './attendee-codec'

describe('parseAttendeeLabel', () => {
  it('splits name, department and rank', () => {
    expect(parseAttendeeLabel('Kim Minji (Education/교수)')).toEqual({
      name: 'Kim Minji',
      department: 'Education',
      rank: '교수'
    })
  })

  it('rejects labels without the department block', () => {
    expect(parseAttendeeLabel('Kim Minji')).toBeNull()
    expect(parseAttendeeLabel('Kim Minji (Education)')).toBeNull()
    expect(parseAttendeeLabel('Kim Minji (Education/교수/extra)')).toBeNull()
    expect(parseAttendeeLabel(' (Education/교수)')).toBeNull()
  })
})

describe('encodeAttendees', () => {
  it('writes display text and JSON from the same selection', () => {
    const encoded = encodeAttendees(['Kim Minji (Education/교수)', 'Lee Jun (History/강사)'])

    expect(encoded.text).toBe('Kim Minji(Education), Lee Jun(History)')
    expect(JSON.parse(encoded.json)).toEqual([
      { name: 'Kim Minji', department: 'Education', rank: '교수' },
      { name: 'Lee Jun', department: 'History', rank: '강사' }
    ])
  })

  it('skips malformed labels without dropping the others', () => {
    const encoded = encodeAttendees([
      'Kim Minji (Education/교수)',
      'broken label',
      'Lee Jun (History/강사)'
    ])

    expect(encoded.attendees.map((a) => a.name)).toEqual(['Kim Minji', 'Lee Jun'])
    expect(encoded.text).toBe('Kim Minji(Education), Lee Jun(History)')
  })

  it('appends an included manual attendee', () => {
    const encoded = encodeAttendees(['Kim Minji (Education/교수)'], {
      name: ' Guest ',
      department: 'External',
      rank: 'Visitor',
      include: true
    })

    expect(encoded.text).toBe('Kim Minji(Education), Guest(External)')
    expect(encoded.attendees[1]).toEqual({ name: 'Guest', department: 'External', rank: 'Visitor' })
  })

  it('ignores a manual attendee that is not included or has no name', () => {
    expect(
      encodeAttendees([], { name: 'Guest', department: 'External', rank: '', include: false }).attendees
    ).toEqual([])
    expect(
      encodeAttendees([], { name: '  ', department: 'External', rank: '', include: true }).attendees
    ).toEqual([])
  })

  it('round-trips through the JSON column', () => {
    const labels = ['Kim Minji (Education/교수)', 'Park Sora (Korean Literature/부교수)']
    const encoded = encodeAttendees(labels)
    expect(decodeAttendees(encoded.json)).toEqual(encoded.attendees)
  })
})

describe('decodeAttendees', () => {
  it('reads legacy Korean keys', () => {
    const json = JSON.stringify([{ 이름: 'Kim Minji', 학과: 'Education', 직급: '교수' }])
    expect(decodeAttendees(json)).toEqual([{ name: 'Kim Minji', department: 'Education', rank: '교수' }])
  })

  it('returns an empty list for unreadable JSON', () => {
    expect(decodeAttendees('not json')).toEqual([])
    expect(decodeAttendees('{"name":"x"}')).toEqual([])
    expect(decodeAttendees('')).toEqual([])
    expect(decodeAttendees(null)).toEqual([])
  })
})

describe('preselectLabels', () => {
  it('matches stored attendees to selector options by name and department', () => {
    const options = [
      formatFacultyLabel({ name: 'Kim Minji', department: 'Education', rank: '부교수' }),
      formatFacultyLabel({ name: 'Lee Jun', department: 'History', rank: '강사' })
    ]
    const attendees = [
      { name: 'Kim Minji', department: 'Education', rank: '교수' },
      { name: 'Guest', department: 'External', rank: '' }
    ]

    expect(preselectLabels(attendees, options)).toEqual(['Kim Minji (Education/부교수)'])
  })
})
