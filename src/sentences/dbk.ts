// $--DBK,x.x,f,x.x,M,x.x,F*hh  depth below keel

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'
import { readDepthReadings, type DepthReadings } from './depth.js'

export interface DbkData extends DepthReadings {
  type: 'DBK'
}

export function parseDbk(envelope: NmeaEnvelope): DecodeResult<DbkData> {
  return attempt((): DbkData => {
    const f = fieldsFor(envelope, 'DBK')
    return { type: 'DBK', ...readDepthReadings(f) }
  })
}
