// $--TXT,xx,xx,xx,c--c*hh

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseText, TEXT_PARAMETER_MAX_LEN } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export interface TxtData {
  type: 'TXT'
  count: number
  sequence: number
  textIdentifier: number
  text: string
}

export function parseTxt(envelope: NmeaEnvelope): DecodeResult<TxtData> {
  return attempt((): TxtData => {
    const f = fieldsFor(envelope, 'TXT')
    const count = f.requiredInteger('total messages')
    const sequence = f.requiredInteger('message number')
    const textIdentifier = f.requiredInteger('text identifier')
    const parts: string[] = []
    while (!f.done) parts.push(f.next('text'))
    return {
      type: 'TXT',
      count,
      sequence,
      textIdentifier,
      text: parseText(parts.join(','), 'text', TEXT_PARAMETER_MAX_LEN),
    }
  })
}
