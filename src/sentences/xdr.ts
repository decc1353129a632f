// $--XDR,a,x.x,a,c--c[,a,x.x,a,c--c...]*hh  transducer measurements

import { attempt, raise, type DecodeResult } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { fieldsFor } from './common.js'

export interface XdrMeasurement {
  // e.g. 'C' temperature, 'P' pressure, 'A' angle, 'H' humidity
  transducerType: string
  value: number | null
  unit: string | null
  name: string | null
}

export interface XdrData {
  type: 'XDR'
  measurements: XdrMeasurement[]
}

export function parseXdr(envelope: NmeaEnvelope): DecodeResult<XdrData> {
  return attempt((): XdrData => {
    const f = fieldsFor(envelope, 'XDR')
    const measurements: XdrMeasurement[] = []
    while (!f.done) {
      const transducerType = f.next('transducer type')
      if (transducerType.length !== 1) {
        raise({ kind: 'InvalidEnumeration', field: 'transducer type', value: transducerType })
      }
      measurements.push({
        transducerType,
        value: f.decimal('measurement'),
        unit: f.text('units', 1),
        name: f.text('transducer name'),
      })
    }
    return { type: 'XDR', measurements }
  })
}
