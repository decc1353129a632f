// $--RMC,hhmmss.ss,A,llll.ll,a,yyyyy.yy,a,x.x,x.x,ddmmyy,x.x,a,m,s*hh
// The FAA mode (NMEA 2.3) and navigation status (NMEA 4.1) are optional.

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseCode, parseMagneticVariation, type NmeaDate, type NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { parseFaaMode, type FaaMode } from './faa-mode.js'
import type { FixType } from './fix-type.js'
import { NAV_STATUS_CODES, navigationStatus, type NavigationStatus } from './gns.js'

export type RmcStatus = 'Autonomous' | 'Differential' | 'Invalid'

const STATUS: Record<'A' | 'D' | 'V', RmcStatus> = {
  A: 'Autonomous',
  D: 'Differential',
  V: 'Invalid',
}

export interface RmcData {
  type: 'RMC'
  fixTime: NmeaTime | null
  fixDate: NmeaDate | null
  status: RmcStatus
  latitude: number | null
  longitude: number | null
  speedOverGround: number | null
  trueCourse: number | null
  magneticVariation: number | null
  faaMode: FaaMode | null
  navigationStatus: NavigationStatus | null
}

export function rmcFixType(status: RmcStatus): FixType {
  switch (status) {
    case 'Autonomous': return 'Gps'
    case 'Differential': return 'DGps'
    default: return 'Invalid'
  }
}

export function parseRmc(envelope: NmeaEnvelope): DecodeResult<RmcData> {
  return attempt((): RmcData => {
    const f = fieldsFor(envelope, 'RMC')
    const fixTime = f.time('fix time')
    const status = STATUS[f.requiredCode('status', ['A', 'D', 'V'] as const)]
    const position = f.latLon()
    const speedOverGround = f.decimal('speed over ground')
    const trueCourse = f.decimal('true course')
    const fixDate = f.date('fix date')
    // older receivers end the sentence anywhere after the date
    const variation = f.trailing() ?? ''
    const variationDirection = f.trailing() ?? ''
    const magneticVariation = parseMagneticVariation(variation, variationDirection)
    const faa = f.trailing()
    const nav = f.trailing()
    return {
      type: 'RMC',
      fixTime,
      fixDate,
      status,
      latitude: position?.latitude ?? null,
      longitude: position?.longitude ?? null,
      speedOverGround,
      trueCourse,
      magneticVariation,
      faaMode: faa ? parseFaaMode(faa) : null,
      navigationStatus: navigationStatus(nav ? parseCode(nav, 'navigation status', NAV_STATUS_CODES) : null),
    }
  })
}
