// $--DBT,x.x,f,x.x,M,x.x,F*hh  depth below transducer

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'
import { readDepthReadings, type DepthReadings } from './depth.js'

export interface DbtData extends DepthReadings {
  type: 'DBT'
}

export function parseDbt(envelope: NmeaEnvelope): DecodeResult<DbtData> {
  return attempt((): DbtData => {
    const f = fieldsFor(envelope, 'DBT')
    return { type: 'DBT', ...readDepthReadings(f) }
  })
}
