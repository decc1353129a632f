// $--MTW,x.x,C*hh  mean water temperature

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface MtwData {
  type: 'MTW'
  // degrees Celsius
  temperature: number | null
}

export function parseMtw(envelope: NmeaEnvelope): DecodeResult<MtwData> {
  return attempt((): MtwData => {
    const f = fieldsFor(envelope, 'MTW')
    const temperature = f.decimal('temperature')
    f.unit('temperature units', 'C', true)
    return { type: 'MTW', temperature }
  })
}
