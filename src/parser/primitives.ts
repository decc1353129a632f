// ── Primitive field decoders ──────────────────────────────────────────────────
// Empty fields decode to null ("no data"); a present field that does not fit
// its grammar raises an NmeaDecodeError naming the field.

import { raise } from './errors.js'

export interface NmeaTime {
  hours: number
  minutes: number
  seconds: number
  nanoseconds: number
}

// Two-digit year as transmitted, no century applied
export interface NmeaDate {
  day: number
  month: number
  year: number
}

export interface Position {
  latitude: number
  longitude: number
}

export const TEXT_PARAMETER_MAX_LEN = 64

const UNSIGNED = /^\d+$/
const SIGNED = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/
const HEX = /^[0-9A-Fa-f]+$/
const HMS = /^(\d{2})(\d{2})(\d{2})(?:\.(\d*))?$/
const DMY = /^(\d{2})(\d{2})(\d{2})$/

// ── Numbers ───────────────────────────────────────────────────────────────────

export function parseInteger(value: string, field: string): number {
  if (!UNSIGNED.test(value)) raise({ kind: 'NumericFormat', field, value })
  const n = Number(value)
  if (!Number.isSafeInteger(n)) raise({ kind: 'NumericFormat', field, value })
  return n
}

export function parseSignedInteger(value: string, field: string): number {
  if (!SIGNED.test(value)) raise({ kind: 'NumericFormat', field, value })
  const n = Number(value)
  if (!Number.isSafeInteger(n)) raise({ kind: 'NumericFormat', field, value })
  return n
}

export function parseDecimal(value: string, field: string): number {
  if (!DECIMAL.test(value)) raise({ kind: 'NumericFormat', field, value })
  const n = Number(value)
  if (!Number.isFinite(n)) raise({ kind: 'NumericFormat', field, value })
  return n
}

export function parseBoundedInteger(value: string, field: string, min: number, max: number): number {
  const n = min < 0 ? parseSignedInteger(value, field) : parseInteger(value, field)
  return checkRange(n, field, min, max)
}

export function checkRange(n: number, field: string, min: number, max: number): number {
  if (n < min || n > max) raise({ kind: 'RangeViolation', field, value: n, min, max })
  return n
}

// Unsigned hex number of at most `bits` bits (almanac words)
export function parseHexInteger(value: string, field: string, bits: number): number {
  if (!HEX.test(value)) raise({ kind: 'NumericFormat', field, value })
  const n = parseInt(value, 16)
  return checkRange(n, field, 0, 2 ** bits - 1)
}

// ── Text ──────────────────────────────────────────────────────────────────────

export function parseText(value: string, field: string, maxLength: number): string {
  if (value.length > maxLength) {
    raise({ kind: 'FieldTooLong', field, maxLength, length: value.length })
  }
  return value
}

export function parseCode<T extends string>(value: string, field: string, codes: readonly T[]): T {
  const code = codes.find(c => c === value)
  if (code === undefined) raise({ kind: 'InvalidEnumeration', field, value })
  return code
}

// ── Time and date ─────────────────────────────────────────────────────────────

function splitHms(value: string, field: string): { h: number; m: number; s: number; fraction: string } {
  const match = HMS.exec(value)
  if (!match) raise({ kind: 'NumericFormat', field, value })
  const [, hh, mm, ss, fraction = ''] = match
  return { h: Number(hh), m: Number(mm), s: Number(ss), fraction }
}

// digits past nanosecond resolution are dropped
function fractionToNanos(fraction: string): number {
  return Number(fraction.substring(0, 9).padEnd(9, '0'))
}

// HHMMSS[.SS] → time of day. Hour < 24, minute < 60, second < 60.
export function parseTime(value: string, field: string): NmeaTime {
  const { h, m, s, fraction } = splitHms(value, field)
  checkRange(h, `${field} hours`, 0, 23)
  checkRange(m, `${field} minutes`, 0, 59)
  checkRange(s, `${field} seconds`, 0, 59)
  return { hours: h, minutes: m, seconds: s, nanoseconds: fractionToNanos(fraction) }
}

// HHMMSS[.SS] elapsed time → milliseconds
export function parseDurationHms(value: string, field: string): number {
  const { h, m, s, fraction } = splitHms(value, field)
  checkRange(h, `${field} hours`, 0, 99)
  checkRange(m, `${field} minutes`, 0, 59)
  checkRange(s, `${field} seconds`, 0, 59)
  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0
  return ((h * 60 + m) * 60 + s) * 1000 + millis
}

// DDMMYY
export function parseDate(value: string, field: string): NmeaDate {
  const match = DMY.exec(value)
  if (!match) raise({ kind: 'NumericFormat', field, value })
  const [, dd, mm, yy] = match
  const day = checkRange(Number(dd), `${field} day`, 1, 31)
  const month = checkRange(Number(mm), `${field} month`, 1, 12)
  return { day, month, year: Number(yy) }
}

export function timeEquals(a: NmeaTime, b: NmeaTime): boolean {
  return a.hours === b.hours && a.minutes === b.minutes &&
    a.seconds === b.seconds && a.nanoseconds === b.nanoseconds
}

// ── Coordinates ───────────────────────────────────────────────────────────────

// DDMM.MMMM (latitude, 2 degree digits) or DDDMM.MMMM (longitude, 3 digits)
function parseCoordinate(value: string, field: string, degreeDigits: number): number {
  const degrees = value.substring(0, degreeDigits)
  const minutes = value.substring(degreeDigits)
  if (degrees.length !== degreeDigits || !UNSIGNED.test(degrees) || !minutes || minutes.startsWith('-') || minutes.startsWith('+')) {
    raise({ kind: 'NumericFormat', field, value })
  }
  return Number(degrees) + parseDecimal(minutes, field) / 60
}

export function parseLatitude(value: string, hemisphere: string): number {
  const decimal = parseCoordinate(value, 'latitude', 2)
  const dir = parseCode(hemisphere, 'latitude hemisphere', ['N', 'S'] as const)
  return dir === 'S' ? -decimal : decimal
}

export function parseLongitude(value: string, hemisphere: string): number {
  const decimal = parseCoordinate(value, 'longitude', 3)
  const dir = parseCode(hemisphere, 'longitude hemisphere', ['E', 'W'] as const)
  return dir === 'W' ? -decimal : decimal
}

// Four fields lat,N/S,lon,E/W. All four empty means the receiver has no fix.
export function parseLatLon(lat: string, ns: string, lon: string, ew: string): Position | null {
  if (!lat && !ns && !lon && !ew) return null
  if (!lat || !lon) raise({ kind: 'ParsingError', reason: 'incomplete latitude/longitude block' })
  return { latitude: parseLatitude(lat, ns), longitude: parseLongitude(lon, ew) }
}

// Degrees with E/W; west is negative
export function parseMagneticVariation(value: string, direction: string): number | null {
  if (!value) return null
  const degrees = parseDecimal(value, 'magnetic variation')
  const dir = parseCode(direction, 'magnetic variation direction', ['E', 'W'] as const)
  return dir === 'W' ? -degrees : degrees
}

// ── Field cursor ──────────────────────────────────────────────────────────────

export class FieldReader {
  private readonly fields: string[]
  private position = 0

  constructor(data: string) {
    this.fields = data.split(',')
  }

  get done(): boolean {
    return this.position >= this.fields.length
  }

  get remaining(): number {
    return this.fields.length - this.position
  }

  next(field: string): string {
    if (this.done) raise({ kind: 'ParsingError', reason: `missing ${field}` })
    return this.fields[this.position++]
  }

  // Trailing fields added in later protocol revisions may be missing entirely
  trailing(): string | null {
    return this.done ? null : this.fields[this.position++]
  }

  skip(count = 1): void {
    this.position = Math.min(this.fields.length, this.position + count)
  }

  integer(field: string): number | null {
    const value = this.next(field)
    return value ? parseInteger(value, field) : null
  }

  requiredInteger(field: string): number {
    return parseInteger(this.required(field), field)
  }

  signedInteger(field: string): number | null {
    const value = this.next(field)
    return value ? parseSignedInteger(value, field) : null
  }

  bounded(field: string, min: number, max: number): number | null {
    const value = this.next(field)
    return value ? parseBoundedInteger(value, field, min, max) : null
  }

  requiredBounded(field: string, min: number, max: number): number {
    return parseBoundedInteger(this.required(field), field, min, max)
  }

  decimal(field: string): number | null {
    const value = this.next(field)
    return value ? parseDecimal(value, field) : null
  }

  requiredDecimal(field: string): number {
    return parseDecimal(this.required(field), field)
  }

  hex(field: string, bits: number): number | null {
    const value = this.next(field)
    return value ? parseHexInteger(value, field, bits) : null
  }

  code<T extends string>(field: string, codes: readonly T[]): T | null {
    const value = this.next(field)
    return value ? parseCode(value, field, codes) : null
  }

  requiredCode<T extends string>(field: string, codes: readonly T[]): T {
    return parseCode(this.required(field), field, codes)
  }

  // Unit marker such as 'M' or 'T'; empty is tolerated unless required
  unit(field: string, marker: string, required = false): void {
    const value = required ? this.required(field) : this.next(field)
    if (value && value !== marker) raise({ kind: 'InvalidEnumeration', field, value })
  }

  text(field: string, maxLength = TEXT_PARAMETER_MAX_LEN): string | null {
    const value = this.next(field)
    return value ? parseText(value, field, maxLength) : null
  }

  time(field: string): NmeaTime | null {
    const value = this.next(field)
    return value ? parseTime(value, field) : null
  }

  requiredTime(field: string): NmeaTime {
    return parseTime(this.required(field), field)
  }

  duration(field: string): number | null {
    const value = this.next(field)
    return value ? parseDurationHms(value, field) : null
  }

  date(field: string): NmeaDate | null {
    const value = this.next(field)
    return value ? parseDate(value, field) : null
  }

  latLon(): Position | null {
    const lat = this.next('latitude')
    const ns = this.next('latitude hemisphere')
    const lon = this.next('longitude')
    const ew = this.next('longitude hemisphere')
    return parseLatLon(lat, ns, lon, ew)
  }

  private required(field: string): string {
    const value = this.next(field)
    if (!value) raise({ kind: 'ParsingError', reason: `${field} is required` })
    return value
  }
}
