// $--GNS,hhmmss.ss,llll.ll,a,yyyyy.yy,a,mm,ss,h.h,a.a,g.g,age,station,s*hh

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseCode, type NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { parseFaaModes, type FaaMode } from './faa-mode.js'

export type NavigationStatus = 'Safe' | 'Caution' | 'Unsafe' | 'NotValidForNavigation'

const NAV_STATUS: Record<'S' | 'C' | 'U' | 'V', NavigationStatus> = {
  S: 'Safe',
  C: 'Caution',
  U: 'Unsafe',
  V: 'NotValidForNavigation',
}

export const NAV_STATUS_CODES = ['S', 'C', 'U', 'V'] as const

export function navigationStatus(code: 'S' | 'C' | 'U' | 'V' | null): NavigationStatus | null {
  return code === null ? null : NAV_STATUS[code]
}

export interface GnsData {
  type: 'GNS'
  fixTime: NmeaTime | null
  latitude: number | null
  longitude: number | null
  faaModes: FaaMode[]
  fixSatellites: number
  hdop: number | null
  altitude: number | null
  geoidSeparation: number | null
  ageOfDifferentialData: number | null
  stationId: string | null
  navigationStatus: NavigationStatus | null
}

export function parseGns(envelope: NmeaEnvelope): DecodeResult<GnsData> {
  return attempt((): GnsData => {
    const f = fieldsFor(envelope, 'GNS')
    const fixTime = f.time('fix time')
    const position = f.latLon()
    const faaModes = parseFaaModes(f.next('faa modes'))
    const fixSatellites = f.requiredInteger('satellites')
    const hdop = f.decimal('hdop')
    const altitude = f.decimal('altitude')
    const geoidSeparation = f.decimal('geoid separation')
    const ageOfDifferentialData = f.done ? null : f.decimal('age of differential data')
    const stationId = f.done ? null : f.text('station id')
    const status = f.trailing()
    return {
      type: 'GNS',
      fixTime,
      latitude: position?.latitude ?? null,
      longitude: position?.longitude ?? null,
      faaModes,
      fixSatellites,
      hdop,
      altitude,
      geoidSeparation,
      ageOfDifferentialData,
      stationId,
      navigationStatus: navigationStatus(status ? parseCode(status, 'navigation status', NAV_STATUS_CODES) : null),
    }
  })
}
