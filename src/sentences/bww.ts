// $--BWW,x.x,T,x.x,M,c--c,c--c*hh  bearing waypoint to waypoint

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface BwwData {
  type: 'BWW'
  bearingTrue: number | null
  bearingMagnetic: number | null
  toWaypoint: string | null
  fromWaypoint: string | null
}

export function parseBww(envelope: NmeaEnvelope): DecodeResult<BwwData> {
  return attempt((): BwwData => {
    const f = fieldsFor(envelope, 'BWW')
    const bearingTrue = f.decimal('true bearing')
    f.unit('true bearing reference', 'T')
    const bearingMagnetic = f.decimal('magnetic bearing')
    f.unit('magnetic bearing reference', 'M')
    return {
      type: 'BWW',
      bearingTrue,
      bearingMagnetic,
      toWaypoint: f.text('to waypoint'),
      fromWaypoint: f.text('from waypoint'),
    }
  })
}
