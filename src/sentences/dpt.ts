// $--DPT,x.x,x.x,x.x*hh  depth relative to the transducer, offset, range scale

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseDecimal } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface DptData {
  type: 'DPT'
  waterDepth: number | null
  // positive: transducer to waterline, negative: transducer to keel
  offset: number | null
  maxRangeScale: number | null
}

export function parseDpt(envelope: NmeaEnvelope): DecodeResult<DptData> {
  return attempt((): DptData => {
    const f = fieldsFor(envelope, 'DPT')
    const waterDepth = f.decimal('water depth')
    const offset = f.decimal('offset')
    // added in NMEA 3.0
    const range = f.trailing()
    return {
      type: 'DPT',
      waterDepth,
      offset,
      maxRangeScale: range ? parseDecimal(range, 'max range scale') : null,
    }
  })
}
