import { getDay, isMatch, parse } from 'date-fns'

const WEEKDAYS = ['일', '월', '화', '수', '목', '금', '토']

function parseMeetingDate(date: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || !isMatch(date, 'yyyy-MM-dd')) return null
  return parse(date, 'yyyy-MM-dd', new Date())
}

function koreanClock(time: string): string {
  return `${time.trim().replace(':', '시 ')}분`
}

/** `2024년 3월 10일(일요일) 12시 00분 - 13시 00분`, or the raw values when either part is unreadable. */
export function formatSignatureWhen(date: string, time: string): string {
  const parsed = parseMeetingDate(date)
  const [start, end] = time.split('~')
  if (!parsed || start === undefined || end === undefined) return `${date} ${time}`

  const weekday = WEEKDAYS[getDay(parsed)]
  return (
    `${parsed.getFullYear()}년 ${parsed.getMonth() + 1}월 ${parsed.getDate()}일(${weekday}요일) ` +
    `${koreanClock(start)} - ${koreanClock(end)}`
  )
}

/** `24.3.10.(일), 12:00 ~ 13:00`, or `{date}, {time}` when the date is unreadable. */
export function formatReportWhen(date: string, time: string): string {
  const parsed = parseMeetingDate(date)
  if (!parsed) return `${date}, ${time}`

  const shortYear = parsed.getFullYear() % 100
  const range = time.replace(/ /g, '').replace(/~/g, ' ~ ')
  return `${shortYear}.${parsed.getMonth() + 1}.${parsed.getDate()}.(${WEEKDAYS[getDay(parsed)]}), ${range}`
}
