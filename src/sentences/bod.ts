// $--BOD,x.x,T,x.x,M,c--c,c--c*hh  bearing origin to destination

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseText, TEXT_PARAMETER_MAX_LEN } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface BodData {
  type: 'BOD'
  bearingTrue: number | null
  bearingMagnetic: number | null
  toWaypoint: string | null
  fromWaypoint: string | null
}

export function parseBod(envelope: NmeaEnvelope): DecodeResult<BodData> {
  return attempt((): BodData => {
    const f = fieldsFor(envelope, 'BOD')
    const bearingTrue = f.decimal('true bearing')
    f.unit('true bearing reference', 'T', true)
    const bearingMagnetic = f.decimal('magnetic bearing')
    f.unit('magnetic bearing reference', 'M', true)
    const toWaypoint = f.text('to waypoint')
    // origin is omitted while navigating a route
    const from = f.trailing()
    return {
      type: 'BOD',
      bearingTrue,
      bearingMagnetic,
      toWaypoint,
      fromWaypoint: from ? parseText(from, 'from waypoint', TEXT_PARAMETER_MAX_LEN) : null,
    }
  })
}
