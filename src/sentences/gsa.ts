// $--GSA,a,x,p1,...,p12,p.p,h.h,v.v[,sys]*hh
// Some receivers send more than twelve PRN slots; up to 18 are accepted.

import { attempt, raise, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { parseDecimal, parseInteger } from '../parser/primitives.js'
import { fieldsFor } from './common.js'

export type GsaMode1 = 'Manual' | 'Automatic'
export type GsaMode2 = 'NoFix' | 'Fix2D' | 'Fix3D'

export const GSA_MAX_PRNS = 18

export interface GsaData {
  type: 'GSA'
  mode1: GsaMode1
  mode2: GsaMode2
  fixSatellitesPrns: number[]
  pdop: number | null
  hdop: number | null
  vdop: number | null
}

const PRN_FIELD = /^\d*$/

function optionalDecimal(value: string | undefined, field: string): number | null {
  return value ? parseDecimal(value, field) : null
}

export function parseGsa(envelope: NmeaEnvelope): DecodeResult<GsaData> {
  return attempt((): GsaData => {
    const f = fieldsFor(envelope, 'GSA')
    const mode1: GsaMode1 = f.requiredCode('mode 1', ['M', 'A'] as const) === 'M' ? 'Manual' : 'Automatic'
    const mode2Code = f.requiredCode('mode 2', ['1', '2', '3'] as const)
    const mode2: GsaMode2 = mode2Code === '1' ? 'NoFix' : mode2Code === '2' ? 'Fix2D' : 'Fix3D'

    const tail: string[] = []
    while (!f.done) tail.push(f.next('tail'))

    // Receivers without a fix may send nothing but separators
    if (tail.every(v => v === '')) {
      return { type: 'GSA', mode1, mode2, fixSatellitesPrns: [], pdop: null, hdop: null, vdop: null }
    }

    // PRN slots run until the three DOP fields
    let end = 0
    while (end < tail.length - 3 && PRN_FIELD.test(tail[end])) end++
    if (tail.length - end < 3) raise({ kind: 'ParsingError', reason: 'missing DOP fields' })

    const fixSatellitesPrns = tail
      .slice(0, end)
      .filter(v => v !== '')
      .map(v => parseInteger(v, 'prn'))
    if (fixSatellitesPrns.length > GSA_MAX_PRNS) {
      raise({ kind: 'FieldTooLong', field: 'prns', maxLength: GSA_MAX_PRNS, length: fixSatellitesPrns.length })
    }

    return {
      type: 'GSA',
      mode1,
      mode2,
      fixSatellitesPrns,
      pdop: optionalDecimal(tail[end], 'pdop'),
      hdop: optionalDecimal(tail[end + 1], 'hdop'),
      vdop: optionalDecimal(tail[end + 2], 'vdop'),
    }
  })
}
