import { describe, it, expect } from 'vitest'
import { envelopeOf, unwrap } from '../testing.js'
import { withChecksum } from '../parser/envelope.js'
import { parseGsv } from './gsv.js'

describe('parseGsv', () => {
  it('decodes four satellites', () => {
    const gsv = unwrap(parseGsv(envelopeOf('$GPGSV,3,1,11,10,63,137,17,07,61,098,15,05,59,290,20,08,54,157,30*70')))
    expect(gsv.gnssType).toBe('Gps')
    expect(gsv.numberOfSentences).toBe(3)
    expect(gsv.sentenceNum).toBe(1)
    expect(gsv.satsInView).toBe(11)
    expect(gsv.satellites.map(s => s.prn)).toEqual([10, 7, 5, 8])
    expect(gsv.satellites[0]).toEqual({ gnssType: 'Gps', prn: 10, elevation: 63, azimuth: 137, snr: 17 })
  })

  it('decodes a short last sentence with empty values', () => {
    const gsv = unwrap(parseGsv(envelopeOf('$GPGSV,3,3,11,29,09,301,24,16,09,020,,36,,,*76')))
    expect(gsv.satellites).toEqual([
      { gnssType: 'Gps', prn: 29, elevation: 9, azimuth: 301, snr: 24 },
      { gnssType: 'Gps', prn: 16, elevation: 9, azimuth: 20, snr: null },
      { gnssType: 'Gps', prn: 36, elevation: null, azimuth: null, snr: null },
    ])
  })

  it('accepts negative elevation', () => {
    const gsv = unwrap(parseGsv(envelopeOf('$GPGSV,1,1,02,31,-05,045,,32,12,310,22*50')))
    expect(gsv.satellites[0]).toEqual({ gnssType: 'Gps', prn: 31, elevation: -5, azimuth: 45, snr: null })
  })

  it('ignores the signal id', () => {
    const gsv = unwrap(parseGsv(envelopeOf(withChecksum('GLGSV,1,1,01,65,20,045,30,1'))))
    expect(gsv.gnssType).toBe('Glonass')
    expect(gsv.satellites).toEqual([{ gnssType: 'Glonass', prn: 65, elevation: 20, azimuth: 45, snr: 30 }])
  })

  it('skips slots without a PRN', () => {
    const gsv = unwrap(parseGsv(envelopeOf(withChecksum('GAGSV,1,1,01,,,,,12,34,056,41'))))
    expect(gsv.satellites).toEqual([{ gnssType: 'Galileo', prn: 12, elevation: 34, azimuth: 56, snr: 41 }])
  })

  it('rejects a combined-constellation talker', () => {
    expect(parseGsv(envelopeOf('$GNGSV,1,1,01,10,63,137,17*51'))).toEqual({
      ok: false,
      error: { kind: 'UnknownGnssType', talkerId: 'GN' },
    })
  })
})
