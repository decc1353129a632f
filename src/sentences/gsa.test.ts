import { describe, it, expect } from 'vitest'
import { envelopeOf, unwrap } from '../testing.js'
import { withChecksum } from '../parser/envelope.js'
import { parseGsa } from './gsa.js'

describe('parseGsa', () => {
  it('collects the PRNs used in the fix', () => {
    expect(parseGsa(envelopeOf('$GPGSA,A,3,10,07,05,02,29,04,08,13,,,,,1.72,1.03,1.38*0A'))).toEqual({
      ok: true,
      value: {
        type: 'GSA',
        mode1: 'Automatic',
        mode2: 'Fix3D',
        fixSatellitesPrns: [10, 7, 5, 2, 29, 4, 8, 13],
        pdop: 1.72,
        hdop: 1.03,
        vdop: 1.38,
      },
    })
  })

  it('skips empty PRN slots anywhere', () => {
    const gsa = unwrap(parseGsa(envelopeOf('$GPGSA,A,3,,,,,,16,18,,22,24,,,3.6,2.1,2.2*3C')))
    expect(gsa.fixSatellitesPrns).toEqual([16, 18, 22, 24])
    expect(gsa.pdop).toBe(3.6)
    expect(gsa.hdop).toBe(2.1)
    expect(gsa.vdop).toBe(2.2)
  })

  it('accepts a truncated sentence without fix', () => {
    expect(parseGsa(envelopeOf('$GPGSA,A,1,,,,*32'))).toEqual({
      ok: true,
      value: { type: 'GSA', mode1: 'Automatic', mode2: 'NoFix', fixSatellitesPrns: [], pdop: null, hdop: null, vdop: null },
    })
  })

  it('ignores the NMEA 4.11 system id', () => {
    const gsa = unwrap(parseGsa(envelopeOf('$GNGSA,A,3,10,07,05,02,29,04,08,13,,,,,1.72,1.03,1.38,1*09')))
    expect(gsa.fixSatellitesPrns).toEqual([10, 7, 5, 2, 29, 4, 8, 13])
    expect(gsa.vdop).toBe(1.38)
  })

  it('keeps DOP values without PRNs', () => {
    const gsa = unwrap(parseGsa(envelopeOf('$GNGSA,A,1,,,,,,,,,,,,,99.99,99.99,99.99*2E')))
    expect(gsa.fixSatellitesPrns).toEqual([])
    expect(gsa.pdop).toBe(99.99)
  })

  it('accepts up to 18 PRNs', () => {
    const prns = Array.from({ length: 18 }, (_, i) => i + 1)
    const gsa = unwrap(parseGsa(envelopeOf(withChecksum(`GPGSA,M,2,${prns.join(',')},1.0,1.0,1.0`))))
    expect(gsa.mode1).toBe('Manual')
    expect(gsa.mode2).toBe('Fix2D')
    expect(gsa.fixSatellitesPrns).toEqual(prns)
  })

  it('rejects more than 18 PRNs', () => {
    const prns = Array.from({ length: 19 }, (_, i) => i + 1)
    expect(parseGsa(envelopeOf(withChecksum(`GPGSA,A,3,${prns.join(',')},1.0,1.0,1.0`)))).toEqual({
      ok: false,
      error: { kind: 'FieldTooLong', field: 'prns', maxLength: 18, length: 19 },
    })
  })

  it('rejects a sentence without DOP fields', () => {
    expect(parseGsa(envelopeOf(withChecksum('GPGSA,A,3,10,07')))).toEqual({
      ok: false,
      error: { kind: 'ParsingError', reason: 'missing DOP fields' },
    })
  })
})
