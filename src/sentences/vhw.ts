// $--VHW,x.x,T,x.x,M,x.x,N,x.x,K*hh  water speed and heading

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface VhwData {
  type: 'VHW'
  headingTrue: number | null
  headingMagnetic: number | null
  relativeSpeedKnots: number | null
  relativeSpeedKmh: number | null
}

export function parseVhw(envelope: NmeaEnvelope): DecodeResult<VhwData> {
  return attempt((): VhwData => {
    const f = fieldsFor(envelope, 'VHW')
    const headingTrue = f.decimal('heading true')
    f.unit('heading true reference', 'T')
    const headingMagnetic = f.decimal('heading magnetic')
    f.unit('heading magnetic reference', 'M')
    const relativeSpeedKnots = f.decimal('speed knots')
    f.unit('speed knots units', 'N')
    const relativeSpeedKmh = f.decimal('speed km/h')
    f.unit('speed km/h units', 'K')
    return { type: 'VHW', headingTrue, headingMagnetic, relativeSpeedKnots, relativeSpeedKmh }
  })
}
