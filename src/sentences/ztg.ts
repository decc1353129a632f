// $--ZTG,hhmmss.ss,hhmmss.ss,c--c*hh  UTC and time to destination waypoint

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface ZtgData {
  type: 'ZTG'
  fixTime: NmeaTime | null
  timeToGoMs: number | null
  waypointId: string | null
}

export function parseZtg(envelope: NmeaEnvelope): DecodeResult<ZtgData> {
  return attempt((): ZtgData => {
    const f = fieldsFor(envelope, 'ZTG')
    return {
      type: 'ZTG',
      fixTime: f.time('fix time'),
      timeToGoMs: f.duration('time to go'),
      waypointId: f.text('destination waypoint id'),
    }
  })
}
