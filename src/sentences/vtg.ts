// $--VTG,x.x,T,x.x,M,x.x,N,x.x,K,m*hh

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { kmhToKts } from '../utils/units.js'
import { fieldsFor } from './common.js'
import { parseFaaMode, type FaaMode } from './faa-mode.js'

export interface VtgData {
  type: 'VTG'
  trueCourse: number | null
  magneticCourse: number | null
  // knots; derived from km/h when the knots field is empty
  speedOverGround: number | null
  faaMode: FaaMode | null
}

export function parseVtg(envelope: NmeaEnvelope): DecodeResult<VtgData> {
  return attempt((): VtgData => {
    const f = fieldsFor(envelope, 'VTG')
    const trueCourse = f.decimal('true course')
    f.unit('true course reference', 'T')
    const magneticCourse = f.decimal('magnetic course')
    f.unit('magnetic course reference', 'M')
    const knots = f.decimal('speed knots')
    f.unit('speed knots units', 'N')
    const kmh = f.decimal('speed km/h')
    f.unit('speed km/h units', 'K')
    const faa = f.trailing()
    return {
      type: 'VTG',
      trueCourse,
      magneticCourse,
      speedOverGround: knots ?? (kmh === null ? null : kmhToKts(kmh)),
      faaMode: faa ? parseFaaMode(faa) : null,
    }
  })
}
