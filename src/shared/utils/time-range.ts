const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/

export function isValidTime(value: string): boolean {
  return TIME_PATTERN.test(value)
}

export function formatTimeRange(start: string, end: string): string {
  return `${start} ~ ${end}`
}

/** Split a stored `HH:MM ~ HH:MM` range; null unless both ends are valid times. */
export function parseTimeRange(time: string): { start: string; end: string } | null {
  const parts = time.split('~').map((part) => part.trim())
  if (parts.length !== 2) return null
  const [start, end] = parts
  if (!isValidTime(start) || !isValidTime(end)) return null
  return { start, end }
}
