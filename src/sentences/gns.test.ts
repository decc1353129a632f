import { describe, it, expect } from 'vitest'
import { envelopeOf, unwrap } from '../testing.js'
import { withChecksum } from '../parser/envelope.js'
import { faaModesToFixType } from './faa-mode.js'
import { parseGns } from './gns.js'

describe('parseGns', () => {
  it('decodes every field', () => {
    const gns = unwrap(parseGns(envelopeOf(
      '$GPGNS,224749.00,3333.4268304,N,11153.3538273,W,D,19,0.6,406.110,-26.294,6.0,0138,S,*46',
    )))
    expect(gns.fixTime).toEqual({ hours: 22, minutes: 47, seconds: 49, nanoseconds: 0 })
    expect(gns.latitude).toBeCloseTo(33.55711384, 8)
    expect(gns.longitude).toBeCloseTo(-111.889230455, 8)
    expect(gns.faaModes).toEqual(['Differential'])
    expect(gns.fixSatellites).toBe(19)
    expect(gns.hdop).toBe(0.6)
    expect(gns.altitude).toBe(406.11)
    expect(gns.geoidSeparation).toBe(-26.294)
    expect(gns.ageOfDifferentialData).toBe(6)
    expect(gns.stationId).toBe('0138')
    expect(gns.navigationStatus).toBe('Safe')
  })

  it('reads one mode per constellation', () => {
    const gns = unwrap(parseGns(envelopeOf('$GPGNS,101500.4,4807.0410,N,01131.0030,E,AN,09,0.9,545.6,46.9,,,S*01')))
    expect(gns.faaModes).toEqual(['Autonomous', 'DataNotValid'])
    expect(faaModesToFixType(gns.faaModes)).toBe('Gps')
    expect(gns.ageOfDifferentialData).toBeNull()
    expect(gns.stationId).toBeNull()
  })

  it('reports no fix when no constellation has one', () => {
    const gns = unwrap(parseGns(envelopeOf('$GPGNS,101500.5,4807.0420,N,01131.0040,E,NN,09,0.9,545.7,46.9,,,V*0F')))
    expect(faaModesToFixType(gns.faaModes)).toBe('Invalid')
    expect(gns.navigationStatus).toBe('NotValidForNavigation')
  })

  it('accepts sentences before NMEA 4.1', () => {
    const gns = unwrap(parseGns(envelopeOf(withChecksum('GPGNS,101500.4,4807.0410,N,01131.0030,E,A,09,0.9,545.6,46.9'))))
    expect(gns.ageOfDifferentialData).toBeNull()
    expect(gns.navigationStatus).toBeNull()
  })

  it('rejects more modes than constellations', () => {
    expect(parseGns(envelopeOf(withChecksum('GPGNS,101500.4,4807.0410,N,01131.0030,E,AAAAAAA,09,0.9,545.6,46.9,,,S')))).toEqual({
      ok: false,
      error: { kind: 'FieldTooLong', field: 'faa modes', maxLength: 6, length: 7 },
    })
  })

  it('requires the satellite count', () => {
    expect(parseGns(envelopeOf(withChecksum('GPGNS,101500.4,4807.0410,N,01131.0030,E,A,,0.9,545.6,46.9,,,S')))).toEqual({
      ok: false,
      error: { kind: 'ParsingError', reason: 'satellites is required' },
    })
  })
})
