// $--APA,A,A,x.x,L,N,A,A,xxx,M,c--c*hh  autopilot sentence A

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor, statusFlag } from './common.js'

export type SteerDirection = 'Left' | 'Right'
export type BearingReference = 'True' | 'Magnetic'

export interface ApaData {
  type: 'APA'
  // false on Loran-C blink or SNR warning
  signalValid: boolean | null
  // false on Loran-C cycle lock warning
  cycleLockValid: boolean | null
  crossTrackError: number | null
  steerDirection: SteerDirection | null
  crossTrackUnits: 'N' | 'K' | null
  arrivalCircleEntered: boolean | null
  perpendicularPassed: boolean | null
  bearingOriginToDestination: number | null
  bearingReference: BearingReference | null
  destinationWaypointId: string | null
}

export function parseApa(envelope: NmeaEnvelope): DecodeResult<ApaData> {
  return attempt((): ApaData => {
    const f = fieldsFor(envelope, 'APA')
    const signalValid = statusFlag(f.code('signal status', ['A', 'V'] as const))
    const cycleLockValid = statusFlag(f.code('cycle lock status', ['A', 'V'] as const))
    const crossTrackError = f.decimal('cross track error')
    const steer = f.code('steer direction', ['L', 'R'] as const)
    const crossTrackUnits = f.code('cross track units', ['N', 'K'] as const)
    const arrivalCircleEntered = statusFlag(f.code('arrival circle status', ['A', 'V'] as const))
    const perpendicularPassed = statusFlag(f.code('perpendicular status', ['A', 'V'] as const))
    const bearingOriginToDestination = f.decimal('bearing origin to destination')
    const reference = f.code('bearing reference', ['M', 'T'] as const)
    const destinationWaypointId = f.text('destination waypoint id')
    return {
      type: 'APA',
      signalValid,
      cycleLockValid,
      crossTrackError,
      steerDirection: steer === null ? null : steer === 'L' ? 'Left' : 'Right',
      crossTrackUnits,
      arrivalCircleEntered,
      perpendicularPassed,
      bearingOriginToDestination,
      bearingReference: reference === null ? null : reference === 'T' ? 'True' : 'Magnetic',
      destinationWaypointId,
    }
  })
}
