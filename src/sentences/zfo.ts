// $--ZFO,hhmmss.ss,hhmmss.ss,c--c*hh  UTC and time from origin waypoint

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface ZfoData {
  type: 'ZFO'
  fixTime: NmeaTime | null
  elapsedMs: number | null
  waypointId: string | null
}

export function parseZfo(envelope: NmeaEnvelope): DecodeResult<ZfoData> {
  return attempt((): ZfoData => {
    const f = fieldsFor(envelope, 'ZFO')
    return {
      type: 'ZFO',
      fixTime: f.time('fix time'),
      elapsedMs: f.duration('elapsed time'),
      waypointId: f.text('origin waypoint id'),
    }
  })
}
