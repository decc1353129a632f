// $--MWV,x.x,a,x.x,a,A*hh  wind speed and angle

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export type MwvReference = 'Relative' | 'Theoretical'
export type MwvWindSpeedUnits = 'KilometersPerHour' | 'MetersPerSecond' | 'Knots' | 'MilesPerHour'

const SPEED_UNITS: Record<'K' | 'M' | 'N' | 'S', MwvWindSpeedUnits> = {
  K: 'KilometersPerHour',
  M: 'MetersPerSecond',
  N: 'Knots',
  S: 'MilesPerHour',
}

export interface MwvData {
  type: 'MWV'
  windDirection: number | null
  reference: MwvReference | null
  windSpeed: number | null
  windSpeedUnits: MwvWindSpeedUnits | null
  dataValid: boolean
}

export function parseMwv(envelope: NmeaEnvelope): DecodeResult<MwvData> {
  return attempt((): MwvData => {
    const f = fieldsFor(envelope, 'MWV')
    const windDirection = f.decimal('wind angle')
    const reference = f.code('reference', ['R', 'T'] as const)
    const windSpeed = f.decimal('wind speed')
    const units = f.code('wind speed units', ['K', 'M', 'N', 'S'] as const)
    const status = f.requiredCode('status', ['A', 'V'] as const)
    return {
      type: 'MWV',
      windDirection,
      reference: reference === null ? null : reference === 'R' ? 'Relative' : 'Theoretical',
      windSpeed,
      windSpeedUnits: units === null ? null : SPEED_UNITS[units],
      dataValid: status === 'A',
    }
  })
}
