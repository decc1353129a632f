// Helpers shared by the test suites

import { describeError, type DecodeResult } from './parser/errors.js'
import { parseEnvelope, type NmeaEnvelope } from './parser/envelope.js'

export function unwrap<T>(result: DecodeResult<T>): T {
  if (!result.ok) throw new Error(describeError(result.error))
  return result.value
}

export function envelopeOf(line: string): NmeaEnvelope {
  return unwrap(parseEnvelope(line))
}
