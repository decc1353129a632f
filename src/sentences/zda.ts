// $--ZDA,hhmmss.ss,dd,mm,yyyy,zh,zm*hh  time, date and local zone

import { attempt, raise, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { checkRange, parseBoundedInteger, parseInteger, type NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface ZdaData {
  type: 'ZDA'
  utcTime: NmeaTime | null
  day: number | null
  month: number | null
  // four digits on the wire
  year: number | null
  localZoneHours: number | null
  localZoneMinutes: number | null
}

const YEAR = /^\d{4}$/

export function parseZda(envelope: NmeaEnvelope): DecodeResult<ZdaData> {
  return attempt((): ZdaData => {
    const f = fieldsFor(envelope, 'ZDA')
    const utcTime = f.time('utc time')
    const day = f.bounded('day', 1, 31)
    const month = f.bounded('month', 1, 12)
    const yearField = f.next('year')
    if (yearField && !YEAR.test(yearField)) raise({ kind: 'NumericFormat', field: 'year', value: yearField })

    // A leading '-' on the hours applies to the minutes as well
    const zoneField = f.next('local zone hours')
    const sign = zoneField.startsWith('-') ? -1 : 1
    const zoneDigits = zoneField.startsWith('-') || zoneField.startsWith('+') ? zoneField.substring(1) : zoneField
    const localZoneHours = zoneDigits
      ? sign * checkRange(parseInteger(zoneDigits, 'local zone hours'), 'local zone hours', 0, 13)
      : null
    const minutesField = f.next('local zone minutes')
    const localZoneMinutes = minutesField
      ? sign * parseBoundedInteger(minutesField, 'local zone minutes', -59, 59)
      : null

    return {
      type: 'ZDA',
      utcTime,
      day,
      month,
      year: yearField ? Number(yearField) : null,
      localZoneHours: localZoneHours === 0 ? 0 : localZoneHours,
      localZoneMinutes: localZoneMinutes === 0 ? 0 : localZoneMinutes,
    }
  })
}
