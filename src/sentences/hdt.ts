// $--HDT,x.x,T*hh  true heading

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface HdtData {
  type: 'HDT'
  heading: number | null
}

export function parseHdt(envelope: NmeaEnvelope): DecodeResult<HdtData> {
  return attempt((): HdtData => {
    const f = fieldsFor(envelope, 'HDT')
    const heading = f.decimal('heading')
    f.unit('heading reference', 'T', true)
    return { type: 'HDT', heading }
  })
}
