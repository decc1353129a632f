// $--BWC,hhmmss.ss,llll.ll,a,yyyyy.yy,a,x.x,T,x.x,M,x.x,N,c--c,m*hh
// Bearing and distance to waypoint along the great circle

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { parseFaaMode, type FaaMode } from './faa-mode.js'

export interface BwcData {
  type: 'BWC'
  fixTime: NmeaTime | null
  latitude: number | null
  longitude: number | null
  bearingTrue: number | null
  bearingMagnetic: number | null
  distance: number | null
  waypointId: string | null
  faaMode: FaaMode | null
}

export function parseBwc(envelope: NmeaEnvelope): DecodeResult<BwcData> {
  return attempt((): BwcData => {
    const f = fieldsFor(envelope, 'BWC')
    const fixTime = f.time('fix time')
    const position = f.latLon()
    const bearingTrue = f.decimal('true bearing')
    f.unit('true bearing reference', 'T')
    const bearingMagnetic = f.decimal('magnetic bearing')
    f.unit('magnetic bearing reference', 'M')
    const distance = f.decimal('distance')
    f.unit('distance units', 'N')
    const waypointId = f.text('waypoint id')
    const faa = f.trailing()
    return {
      type: 'BWC',
      fixTime,
      latitude: position?.latitude ?? null,
      longitude: position?.longitude ?? null,
      bearingTrue,
      bearingMagnetic,
      distance,
      waypointId,
      faaMode: faa ? parseFaaMode(faa) : null,
    }
  })
}
