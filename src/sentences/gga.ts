// $--GGA,hhmmss.ss,llll.ll,a,yyyyy.yy,a,q,nn,h.h,a.a,M,g.g,M,age,station*hh

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { fixTypeFromQuality, type FixType } from './fix-type.js'

export interface GgaData {
  type: 'GGA'
  fixTime: NmeaTime | null
  fixType: FixType | null
  latitude: number | null
  longitude: number | null
  fixSatellites: number | null
  hdop: number | null
  altitude: number | null
  geoidSeparation: number | null
}

export function parseGga(envelope: NmeaEnvelope): DecodeResult<GgaData> {
  return attempt((): GgaData => {
    const f = fieldsFor(envelope, 'GGA')
    const fixTime = f.time('fix time')
    const position = f.latLon()
    const quality = f.next('fix quality')
    const fixSatellites = f.integer('satellites')
    const hdop = f.decimal('hdop')
    const altitude = f.decimal('altitude')
    f.unit('altitude units', 'M')
    const geoidSeparation = f.decimal('geoid separation')
    f.unit('geoid separation units', 'M')
    return {
      type: 'GGA',
      fixTime,
      fixType: quality ? fixTypeFromQuality(quality) : null,
      latitude: position?.latitude ?? null,
      longitude: position?.longitude ?? null,
      fixSatellites,
      hdop,
      altitude,
      geoidSeparation,
    }
  })
}
