// $--GBS,hhmmss.ss,x.x,x.x,x.x,xx,x.x,x.x,x.x*hh  GNSS satellite fault detection

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface GbsData {
  type: 'GBS'
  fixTime: NmeaTime | null
  // expected 1-sigma errors in meters
  latitudeError: number | null
  longitudeError: number | null
  altitudeError: number | null
  mostLikelyFailedSatellite: number | null
  missedDetectionProbability: number | null
  biasEstimate: number | null
  biasStandardDeviation: number | null
}

export function parseGbs(envelope: NmeaEnvelope): DecodeResult<GbsData> {
  return attempt((): GbsData => {
    const f = fieldsFor(envelope, 'GBS')
    return {
      type: 'GBS',
      fixTime: f.time('fix time'),
      latitudeError: f.decimal('latitude error'),
      longitudeError: f.decimal('longitude error'),
      altitudeError: f.decimal('altitude error'),
      mostLikelyFailedSatellite: f.integer('failed satellite'),
      missedDetectionProbability: f.decimal('missed detection probability'),
      biasEstimate: f.decimal('bias estimate'),
      biasStandardDeviation: f.decimal('bias standard deviation'),
    }
  })
}
