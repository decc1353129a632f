import { format } from 'date-fns'
import type { NmeaDate, NmeaTime } from '../parser/primitives.js'

// HH:mm:ss.SSS; sub-millisecond digits are truncated
export function formatTime(time: NmeaTime): string {
  const millis = Math.floor(time.nanoseconds / 1e6)
  return format(new Date(2000, 0, 1, time.hours, time.minutes, time.seconds, millis), 'HH:mm:ss.SSS')
}

export function formatDate(date: NmeaDate): string {
  return `${pad(date.day)}.${pad(date.month)}.${pad(date.year)}`
}

// Combines a fix date and time into a UTC instant. The two-digit year is
// ambiguous on the wire, so the caller names the century (e.g. 2000).
export function toUtcDate(date: NmeaDate, time: NmeaTime, century: number): Date | null {
  const year = century + date.year
  const millis = Math.floor(time.nanoseconds / 1e6)
  const utc = new Date(Date.UTC(year, date.month - 1, date.day, time.hours, time.minutes, time.seconds, millis))
  // Date.UTC rolls 31.02 over into March
  if (utc.getUTCDate() !== date.day || utc.getUTCMonth() !== date.month - 1) return null
  return utc
}

function pad(n: number): string {
  return n.toString().padStart(2, '0')
}
