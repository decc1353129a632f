// $--GLL,llll.ll,a,yyyyy.yy,a,hhmmss.ss,A,m*hh

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import type { NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { faaModeToFixType, parseFaaMode, type FaaMode } from './faa-mode.js'
import type { FixType } from './fix-type.js'

export interface GllData {
  type: 'GLL'
  latitude: number | null
  longitude: number | null
  fixTime: NmeaTime
  valid: boolean
  faaMode: FaaMode | null
}

// The FAA mode, when sent, takes precedence over the A/V flag
export function gllFixType(data: GllData): FixType {
  if (data.faaMode !== null) return faaModeToFixType(data.faaMode)
  return data.valid ? 'Gps' : 'Invalid'
}

export function parseGll(envelope: NmeaEnvelope): DecodeResult<GllData> {
  return attempt((): GllData => {
    const f = fieldsFor(envelope, 'GLL')
    const position = f.latLon()
    const fixTime = f.requiredTime('fix time')
    const valid = f.requiredCode('status', ['A', 'V'] as const) === 'A'
    const faa = f.trailing()
    return {
      type: 'GLL',
      latitude: position?.latitude ?? null,
      longitude: position?.longitude ?? null,
      fixTime,
      valid,
      faaMode: faa ? parseFaaMode(faa) : null,
    }
  })
}
