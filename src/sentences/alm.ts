// $--ALM,n,m,prn,week,health,e,toa,i,omegadot,sqrtA,omega,omega0,M0,af0,af1*hh
// GPS almanac. Orbital parameters are raw hex words, not scaled.

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface AlmData {
  type: 'ALM'
  totalMessages: number | null
  messageNumber: number | null
  satellitePrn: number | null
  gpsWeek: number | null
  svHealth: number | null
  eccentricity: number | null
  almanacReferenceTime: number | null
  inclinationAngle: number | null
  rateOfRightAscension: number | null
  rootOfSemiMajorAxis: number | null
  argumentOfPerigee: number | null
  longitudeOfAscensionNode: number | null
  meanAnomaly: number | null
  f0ClockParameter: number | null
  f1ClockParameter: number | null
}

// Week number as broadcast in the 10-bit navigation message field
export function almGpsWeek10Bit(data: AlmData): number | null {
  return data.gpsWeek === null ? null : data.gpsWeek % 1024
}

export function parseAlm(envelope: NmeaEnvelope): DecodeResult<AlmData> {
  return attempt((): AlmData => {
    const f = fieldsFor(envelope, 'ALM')
    return {
      type: 'ALM',
      totalMessages: f.integer('total messages'),
      messageNumber: f.integer('message number'),
      satellitePrn: f.bounded('satellite prn', 1, 32),
      gpsWeek: f.bounded('gps week', 0, 8191),
      svHealth: f.hex('sv health', 8),
      eccentricity: f.hex('eccentricity', 16),
      almanacReferenceTime: f.hex('almanac reference time', 8),
      inclinationAngle: f.hex('inclination angle', 16),
      rateOfRightAscension: f.hex('rate of right ascension', 16),
      rootOfSemiMajorAxis: f.hex('root of semi-major axis', 32),
      argumentOfPerigee: f.hex('argument of perigee', 32),
      longitudeOfAscensionNode: f.hex('longitude of ascension node', 32),
      meanAnomaly: f.hex('mean anomaly', 32),
      f0ClockParameter: f.hex('f0 clock parameter', 16),
      f1ClockParameter: f.hex('f1 clock parameter', 16),
    }
  })
}
