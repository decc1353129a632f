import { describe, it, expect } from 'vitest'
import { envelopeOf, unwrap } from '../testing.js'
import { withChecksum } from '../parser/envelope.js'
import { parseAam } from './aam.js'
import { almGpsWeek10Bit, parseAlm } from './alm.js'
import { parseApa } from './apa.js'
import { parseBod } from './bod.js'
import { parseBwc } from './bwc.js'
import { parseBww } from './bww.js'
import { parseWnc } from './wnc.js'
import { parseZfo } from './zfo.js'
import { parseZtg } from './ztg.js'

describe('parseAam', () => {
  it('decodes an arrival alarm', () => {
    expect(parseAam(envelopeOf('$GPAAM,A,A,0.10,N,WPTNME*32'))).toEqual({
      ok: true,
      value: {
        type: 'AAM',
        arrivalCircleEntered: true,
        perpendicularPassed: true,
        arrivalCircleRadius: 0.1,
        radiusUnits: 'N',
        waypointId: 'WPTNME',
      },
    })
  })

  it('decodes empty fields as null', () => {
    const aam = unwrap(parseAam(envelopeOf(withChecksum('GPAAM,,,,,'))))
    expect(aam.arrivalCircleEntered).toBeNull()
    expect(aam.waypointId).toBeNull()
  })

  it('rejects an unknown status code', () => {
    expect(parseAam(envelopeOf(withChecksum('GPAAM,X,A,0.10,N,WPTNME')))).toEqual({
      ok: false,
      error: { kind: 'InvalidEnumeration', field: 'arrival circle status', value: 'X' },
    })
  })
})

describe('parseAlm', () => {
  it('decodes the almanac words', () => {
    const alm = unwrap(parseAlm(envelopeOf(
      '$GPALM,1,1,15,1159,00,441D,4E,16BE,FD5E,A10C9F,4A2DA4,686E81,58CBE1,0A4,001*77',
    )))
    expect(alm).toEqual({
      type: 'ALM',
      totalMessages: 1,
      messageNumber: 1,
      satellitePrn: 15,
      gpsWeek: 1159,
      svHealth: 0,
      eccentricity: 17437,
      almanacReferenceTime: 78,
      inclinationAngle: 5822,
      rateOfRightAscension: 64862,
      rootOfSemiMajorAxis: 10554527,
      argumentOfPerigee: 4861348,
      longitudeOfAscensionNode: 6844033,
      meanAnomaly: 5819361,
      f0ClockParameter: 164,
      f1ClockParameter: 1,
    })
    expect(almGpsWeek10Bit(alm)).toBe(135)
  })

  it('rejects a PRN outside 1..32', () => {
    expect(parseAlm(envelopeOf(withChecksum('GPALM,1,1,33,1159,00,441D,4E,16BE,FD5E,A10C9F,4A2DA4,686E81,58CBE1,0A4,001')))).toEqual({
      ok: false,
      error: { kind: 'RangeViolation', field: 'satellite prn', value: 33, min: 1, max: 32 },
    })
  })
})

describe('parseApa', () => {
  it('decodes steering data', () => {
    expect(parseApa(envelopeOf('$GPAPA,A,A,0.10,R,N,V,V,011,M,DEST*3F'))).toEqual({
      ok: true,
      value: {
        type: 'APA',
        signalValid: true,
        cycleLockValid: true,
        crossTrackError: 0.1,
        steerDirection: 'Right',
        crossTrackUnits: 'N',
        arrivalCircleEntered: false,
        perpendicularPassed: false,
        bearingOriginToDestination: 11,
        bearingReference: 'Magnetic',
        destinationWaypointId: 'DEST',
      },
    })
  })
})

describe('parseBod', () => {
  it('decodes both waypoints', () => {
    expect(parseBod(envelopeOf('$GPBOD,097.0,T,103.2,M,POINTB,POINTA*4A'))).toEqual({
      ok: true,
      value: { type: 'BOD', bearingTrue: 97, bearingMagnetic: 103.2, toWaypoint: 'POINTB', fromWaypoint: 'POINTA' },
    })
  })

  it('leaves the origin empty while on a route', () => {
    const bod = unwrap(parseBod(envelopeOf('$GPBOD,099.3,T,105.6,M,POINTB,*48')))
    expect(bod.fromWaypoint).toBeNull()
  })

  it('requires the reference markers', () => {
    expect(parseBod(envelopeOf(withChecksum('GPBOD,097.0,,103.2,M,POINTB,POINTA')))).toEqual({
      ok: false,
      error: { kind: 'ParsingError', reason: 'true bearing reference is required' },
    })
  })
})

describe('parseBwc', () => {
  it('decodes bearing and distance to a waypoint', () => {
    const bwc = unwrap(parseBwc(envelopeOf('$GPBWC,220516,5130.02,N,00046.34,W,213.8,T,218.0,M,0004.6,N,EGLM*21')))
    expect(bwc.fixTime).toEqual({ hours: 22, minutes: 5, seconds: 16, nanoseconds: 0 })
    expect(bwc.latitude).toBeCloseTo(51.500333, 6)
    expect(bwc.longitude).toBeCloseTo(-0.772333, 6)
    expect(bwc.bearingTrue).toBe(213.8)
    expect(bwc.bearingMagnetic).toBe(218)
    expect(bwc.distance).toBe(4.6)
    expect(bwc.waypointId).toBe('EGLM')
    expect(bwc.faaMode).toBeNull()
  })
})

describe('parseBww', () => {
  it('decodes the leg bearing', () => {
    expect(parseBww(envelopeOf('$GPBWW,213.8,T,218.0,M,TOWPT,FROMWPT*42'))).toEqual({
      ok: true,
      value: { type: 'BWW', bearingTrue: 213.8, bearingMagnetic: 218, toWaypoint: 'TOWPT', fromWaypoint: 'FROMWPT' },
    })
  })
})

describe('parseWnc', () => {
  it('decodes the leg distance', () => {
    expect(parseWnc(envelopeOf('$GPWNC,200.00,N,370.40,K,Dest,Origin*58'))).toEqual({
      ok: true,
      value: { type: 'WNC', distanceNauticalMiles: 200, distanceKilometers: 370.4, toWaypoint: 'Dest', fromWaypoint: 'Origin' },
    })
  })
})

describe('parseZfo / parseZtg', () => {
  it('decodes elapsed time from origin', () => {
    expect(parseZfo(envelopeOf('$GPZFO,145832.12,042359.17,WPT*3E'))).toEqual({
      ok: true,
      value: {
        type: 'ZFO',
        fixTime: { hours: 14, minutes: 58, seconds: 32, nanoseconds: 120_000_000 },
        elapsedMs: 15_839_170,
        waypointId: 'WPT',
      },
    })
  })

  it('decodes time to go', () => {
    const ztg = unwrap(parseZtg(envelopeOf('$GPZTG,145832.12,042359.17,WPT*24')))
    expect(ztg.timeToGoMs).toBe(15_839_170)
    expect(ztg.waypointId).toBe('WPT')
  })
})
