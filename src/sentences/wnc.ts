// $--WNC,x.x,N,x.x,K,c--c,c--c*hh  distance waypoint to waypoint

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface WncData {
  type: 'WNC'
  distanceNauticalMiles: number | null
  distanceKilometers: number | null
  toWaypoint: string | null
  fromWaypoint: string | null
}

export function parseWnc(envelope: NmeaEnvelope): DecodeResult<WncData> {
  return attempt((): WncData => {
    const f = fieldsFor(envelope, 'WNC')
    const distanceNauticalMiles = f.decimal('distance nautical miles')
    f.unit('distance nautical miles units', 'N')
    const distanceKilometers = f.decimal('distance kilometers')
    f.unit('distance kilometers units', 'K')
    return {
      type: 'WNC',
      distanceNauticalMiles,
      distanceKilometers,
      toWaypoint: f.text('to waypoint'),
      fromWaypoint: f.text('from waypoint'),
    }
  })
}
