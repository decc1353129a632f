// $--MWD,x.x,T,x.x,M,x.x,N,x.x,M*hh  wind direction and speed

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface MwdData {
  type: 'MWD'
  windDirectionTrue: number | null
  windDirectionMagnetic: number | null
  windSpeedKnots: number | null
  windSpeedMs: number | null
}

export function parseMwd(envelope: NmeaEnvelope): DecodeResult<MwdData> {
  return attempt((): MwdData => {
    const f = fieldsFor(envelope, 'MWD')
    const windDirectionTrue = f.decimal('wind direction true')
    f.unit('wind direction true reference', 'T')
    const windDirectionMagnetic = f.decimal('wind direction magnetic')
    f.unit('wind direction magnetic reference', 'M')
    const windSpeedKnots = f.decimal('wind speed knots')
    f.unit('wind speed knots units', 'N')
    const windSpeedMs = f.decimal('wind speed m/s')
    f.unit('wind speed m/s units', 'M')
    return { type: 'MWD', windDirectionTrue, windDirectionMagnetic, windSpeedKnots, windSpeedMs }
  })
}
