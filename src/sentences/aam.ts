// $--AAM,A,A,x.x,N,c--c*hh  waypoint arrival alarm

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor, statusFlag } from './common.js'

export interface AamData {
  type: 'AAM'
  arrivalCircleEntered: boolean | null
  perpendicularPassed: boolean | null
  arrivalCircleRadius: number | null
  radiusUnits: string | null
  waypointId: string | null
}

export function parseAam(envelope: NmeaEnvelope): DecodeResult<AamData> {
  return attempt((): AamData => {
    const f = fieldsFor(envelope, 'AAM')
    return {
      type: 'AAM',
      arrivalCircleEntered: statusFlag(f.code('arrival circle status', ['A', 'V'] as const)),
      perpendicularPassed: statusFlag(f.code('perpendicular status', ['A', 'V'] as const)),
      arrivalCircleRadius: f.decimal('arrival circle radius'),
      radiusUnits: f.text('radius units', 1),
      waypointId: f.text('waypoint id'),
    }
  })
}
