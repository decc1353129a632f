// $PGRMZ,x,f,x*hh  Garmin proprietary altitude (feet)

import { attempt, raise, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseSignedInteger } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export type RmzFixType = 'NoFix' | 'Fix2D' | 'Fix3D'

export interface RmzData {
  type: 'RMZ'
  altitudeFeet: number
  fixType: RmzFixType
}

export function parseRmz(envelope: NmeaEnvelope): DecodeResult<RmzData> {
  return attempt((): RmzData => {
    const f = fieldsFor(envelope, 'RMZ')
    if (envelope.talkerId !== 'PG') raise({ kind: 'UnknownTalkerId', expected: 'PG', found: envelope.talkerId })
    const altitude = f.next('altitude')
    if (!altitude) raise({ kind: 'ParsingError', reason: 'altitude is required' })
    const altitudeFeet = parseSignedInteger(altitude, 'altitude')
    f.unit('altitude units', 'f', true)
    const fix = f.requiredCode('fix type', ['1', '2', '3'] as const)
    return {
      type: 'RMZ',
      altitudeFeet,
      fixType: fix === '1' ? 'NoFix' : fix === '2' ? 'Fix2D' : 'Fix3D',
    }
  })
}
