// $--GST,hhmmss.ss,x.x,x.x,x.x,x.x,x.x,x.x,x.x*hh  pseudorange noise statistics

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface GstData {
  type: 'GST'
  fixTime: NmeaTime | null
  rmsStandardDeviation: number | null
  semiMajorError: number | null
  semiMinorError: number | null
  // degrees from true north
  semiMajorOrientation: number | null
  latitudeError: number | null
  longitudeError: number | null
  altitudeError: number | null
}

export function parseGst(envelope: NmeaEnvelope): DecodeResult<GstData> {
  return attempt((): GstData => {
    const f = fieldsFor(envelope, 'GST')
    return {
      type: 'GST',
      fixTime: f.time('fix time'),
      rmsStandardDeviation: f.decimal('rms standard deviation'),
      semiMajorError: f.decimal('semi-major error'),
      semiMinorError: f.decimal('semi-minor error'),
      semiMajorOrientation: f.decimal('semi-major orientation'),
      latitudeError: f.decimal('latitude error'),
      longitudeError: f.decimal('longitude error'),
      altitudeError: f.decimal('altitude error'),
    }
  })
}
