// $--MDA,x.x,I,x.x,B,x.x,C,x.x,C,x.x,x.x,x.x,C,x.x,T,x.x,M,x.x,N,x.x,M*hh
// Meteorological composite

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface MdaData {
  type: 'MDA'
  pressureInHg: number | null
  pressureBar: number | null
  airTemperature: number | null
  waterTemperature: number | null
  relativeHumidity: number | null
  absoluteHumidity: number | null
  dewPoint: number | null
  windDirectionTrue: number | null
  windDirectionMagnetic: number | null
  windSpeedKnots: number | null
  windSpeedMs: number | null
}

export function parseMda(envelope: NmeaEnvelope): DecodeResult<MdaData> {
  return attempt((): MdaData => {
    const f = fieldsFor(envelope, 'MDA')
    const pressureInHg = f.decimal('pressure inHg')
    f.unit('pressure inHg units', 'I')
    const pressureBar = f.decimal('pressure bar')
    f.unit('pressure bar units', 'B')
    const airTemperature = f.decimal('air temperature')
    f.unit('air temperature units', 'C')
    const waterTemperature = f.decimal('water temperature')
    f.unit('water temperature units', 'C')
    const relativeHumidity = f.decimal('relative humidity')
    const absoluteHumidity = f.decimal('absolute humidity')
    const dewPoint = f.decimal('dew point')
    f.unit('dew point units', 'C')
    const windDirectionTrue = f.decimal('wind direction true')
    f.unit('wind direction true reference', 'T')
    const windDirectionMagnetic = f.decimal('wind direction magnetic')
    f.unit('wind direction magnetic reference', 'M')
    const windSpeedKnots = f.decimal('wind speed knots')
    f.unit('wind speed knots units', 'N')
    const windSpeedMs = f.decimal('wind speed m/s')
    f.unit('wind speed m/s units', 'M')
    return {
      type: 'MDA',
      pressureInHg,
      pressureBar,
      airTemperature,
      waterTemperature,
      relativeHumidity,
      absoluteHumidity,
      dewPoint,
      windDirectionTrue,
      windDirectionMagnetic,
      windSpeedKnots,
      windSpeedMs,
    }
  })
}
