// $--GSV,n,m,ss,prn,el,az,snr,...(up to 4 satellites)[,signal]*hh
// The talker decides the constellation, so GN (combined) sentences are rejected.

import { attempt, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseInteger, parseSignedInteger } from '../parser/primitives.js'
import { fieldsFor } from './common.js'
import { gnssTypeFromTalker, type GnssType } from './gnss-type.js'

export const GSV_MAX_SATELLITES = 4

export interface Satellite {
  gnssType: GnssType
  prn: number
  elevation: number | null
  azimuth: number | null
  snr: number | null
}

export interface GsvData {
  type: 'GSV'
  gnssType: GnssType
  numberOfSentences: number
  sentenceNum: number
  satsInView: number
  satellites: Satellite[]
}

export function parseGsv(envelope: NmeaEnvelope): DecodeResult<GsvData> {
  return attempt((): GsvData => {
    const f = fieldsFor(envelope, 'GSV')
    const gnssType = gnssTypeFromTalker(envelope.talkerId)
    const numberOfSentences = f.requiredInteger('number of sentences')
    const sentenceNum = f.requiredInteger('sentence number')
    const satsInView = f.requiredInteger('satellites in view')

    const satellites: Satellite[] = []
    // a group shorter than four fields is the NMEA 4.10 signal id
    for (let slot = 0; slot < GSV_MAX_SATELLITES && f.remaining >= 4; slot++) {
      const prn = f.next('prn')
      const elevation = f.next('elevation')
      const azimuth = f.next('azimuth')
      const snr = f.next('snr')
      if (!prn) continue
      satellites.push({
        gnssType,
        prn: parseInteger(prn, 'prn'),
        elevation: elevation ? parseSignedInteger(elevation, 'elevation') : null,
        azimuth: azimuth ? parseInteger(azimuth, 'azimuth') : null,
        snr: snr ? parseInteger(snr, 'snr') : null,
      })
    }

    return { type: 'GSV', gnssType, numberOfSentences, sentenceNum, satsInView, satellites }
  })
}
