// $--DBS,x.x,f,x.x,M,x.x,F*hh  depth below surface

import { attempt, raise, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'
import { readDepthReadings, type DepthReadings } from './depth.js'

export interface DbsData extends DepthReadings {
  type: 'DBS'
}

export function parseDbs(envelope: NmeaEnvelope): DecodeResult<DbsData> {
  return attempt((): DbsData => {
    const f = fieldsFor(envelope, 'DBS')
    const readings = readDepthReadings(f)
    if (readings.depthFeet === null && readings.depthMeters === null && readings.depthFathoms === null) {
      raise({ kind: 'ParsingError', reason: 'DBS carries no depth' })
    }
    return { type: 'DBS', ...readings }
  })
}
