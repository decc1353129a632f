// $--TTM,xx,x.x,x.x,a,x.x,x.x,a,x.x,x.x,a,c--c,a,a,hhmmss.ss,a*hh
// Tracked target from radar/ARPA

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseCode, type NmeaTime } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export const TTM_TARGET_NAME_MAX_LEN = 32

export type TtmReference = 'True' | 'Relative'
export type TtmDistanceUnit = 'Kilometers' | 'NauticalMiles' | 'StatuteMiles'
export type TtmStatus = 'Lost' | 'Query' | 'Tracking'
export type TtmAcquisition = 'Automatic' | 'Manual' | 'Reported'

export interface TtmAngle {
  angle: number
  reference: TtmReference
}

export interface TtmData {
  type: 'TTM'
  targetNumber: number | null
  targetDistance: number | null
  bearingFromOwnShip: TtmAngle | null
  targetSpeed: number | null
  targetCourse: TtmAngle | null
  closestPointOfApproach: number | null
  // minutes; negative once the target has passed
  timeToCpa: number | null
  units: TtmDistanceUnit | null
  targetName: string | null
  targetStatus: TtmStatus | null
  isReferenceTarget: boolean
  timeOfData: NmeaTime | null
  typeOfAcquisition: TtmAcquisition | null
}

const UNITS: Record<'K' | 'N' | 'S', TtmDistanceUnit> = {
  K: 'Kilometers',
  N: 'NauticalMiles',
  S: 'StatuteMiles',
}

const STATUS: Record<'L' | 'Q' | 'T', TtmStatus> = {
  L: 'Lost',
  Q: 'Query',
  T: 'Tracking',
}

const ACQUISITION: Record<'A' | 'M' | 'R', TtmAcquisition> = {
  A: 'Automatic',
  M: 'Manual',
  R: 'Reported',
}

function angle(value: number | null, reference: 'T' | 'R' | null): TtmAngle | null {
  if (value === null) return null
  return { angle: value, reference: reference === 'R' ? 'Relative' : 'True' }
}

export function parseTtm(envelope: NmeaEnvelope): DecodeResult<TtmData> {
  return attempt((): TtmData => {
    const f = fieldsFor(envelope, 'TTM')
    const targetNumber = f.bounded('target number', 0, 99)
    const targetDistance = f.decimal('target distance')
    const bearing = f.decimal('bearing from own ship')
    const bearingRef = f.code('bearing reference', ['T', 'R'] as const)
    const targetSpeed = f.decimal('target speed')
    const course = f.decimal('target course')
    const courseRef = f.code('course reference', ['T', 'R'] as const)
    const closestPointOfApproach = f.decimal('closest point of approach')
    const timeToCpa = f.decimal('time to cpa')
    const units = f.code('speed/distance units', ['K', 'N', 'S'] as const)
    const targetName = f.text('target name', TTM_TARGET_NAME_MAX_LEN)
    const status = f.code('target status', ['L', 'Q', 'T'] as const)
    const reference = f.code('reference target', ['R'] as const)
    const timeOfData = f.done ? null : f.time('time of data')
    const acquisition = f.trailing()
    return {
      type: 'TTM',
      targetNumber,
      targetDistance,
      bearingFromOwnShip: angle(bearing, bearingRef),
      targetSpeed,
      targetCourse: angle(course, courseRef),
      closestPointOfApproach,
      timeToCpa,
      units: units === null ? null : UNITS[units],
      targetName,
      targetStatus: status === null ? null : STATUS[status],
      isReferenceTarget: reference === 'R',
      timeOfData,
      typeOfAcquisition: acquisition
        ? ACQUISITION[parseCode(acquisition, 'type of acquisition', ['A', 'M', 'R'] as const)]
        : null,
    }
  })
}
