// ── Decode errors ─────────────────────────────────────────────────────────────
// Every public entry point returns a DecodeResult. Inside a decoder, a field
// failure is thrown as NmeaDecodeError and turned into a result by attempt().

import type { SentenceType } from './sentence-type.js'

export type NmeaError =
  | { kind: 'Utf8Decoding' }
  | { kind: 'Ascii'; position: number }
  | { kind: 'SentenceLength'; length: number; maxLength: number }
  | { kind: 'MalformedEnvelope'; reason: string }
  | { kind: 'ChecksumMismatch'; calculated: number; found: number }
  | { kind: 'WrongSentenceHeader'; expected: SentenceType; found: string }
  | { kind: 'Unknown'; messageId: string }
  | { kind: 'Unsupported'; sentenceType: SentenceType }
  | { kind: 'NumericFormat'; field: string; value: string }
  | { kind: 'RangeViolation'; field: string; value: number; min: number; max: number }
  | { kind: 'FieldTooLong'; field: string; maxLength: number; length: number }
  | { kind: 'InvalidEnumeration'; field: string; value: string }
  | { kind: 'ParsingError'; reason: string }
  | { kind: 'UnknownGnssType'; talkerId: string }
  | { kind: 'UnknownTalkerId'; expected: string; found: string }
  | { kind: 'EmptyNavConfig' }
  | { kind: 'InvalidConfig'; issues: string[] }
  | { kind: 'InvalidGsvSentenceNum'; sentenceNum: number; numberOfSentences: number }

export type NmeaErrorKind = NmeaError['kind']

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: NmeaError }

export class NmeaDecodeError extends Error {
  readonly error: NmeaError

  constructor(error: NmeaError) {
    super(describeError(error))
    this.name = 'NmeaDecodeError'
    this.error = error
  }
}

export function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value }
}

export function fail(error: NmeaError): DecodeResult<never> {
  return { ok: false, error }
}

export function raise(error: NmeaError): never {
  throw new NmeaDecodeError(error)
}

// Runs a throwing decoder and captures NmeaDecodeError. Anything else is a bug
// and keeps propagating.
export function attempt<T>(decode: () => T): DecodeResult<T> {
  try {
    return ok(decode())
  } catch (e) {
    if (e instanceof NmeaDecodeError) return fail(e.error)
    throw e
  }
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0')
}

export function describeError(error: NmeaError): string {
  switch (error.kind) {
    case 'Utf8Decoding':
      return 'sentence is not valid UTF-8'
    case 'Ascii':
      return `non-ASCII character at position ${error.position}`
    case 'SentenceLength':
      return `sentence is ${error.length} characters long, maximum is ${error.maxLength}`
    case 'MalformedEnvelope':
      return `malformed sentence: ${error.reason}`
    case 'ChecksumMismatch':
      return `checksum mismatch: calculated ${hex(error.calculated)}, found ${hex(error.found)}`
    case 'WrongSentenceHeader':
      return `expected ${error.expected} sentence, found ${error.found}`
    case 'Unknown':
      return `unknown sentence type ${error.messageId}`
    case 'Unsupported':
      return `sentence type ${error.sentenceType} is not supported`
    case 'NumericFormat':
      return `${error.field}: "${error.value}" is not a valid number`
    case 'RangeViolation':
      return `${error.field}: ${error.value} is outside ${error.min}..${error.max}`
    case 'FieldTooLong':
      return `${error.field}: ${error.length} characters exceed the maximum of ${error.maxLength}`
    case 'InvalidEnumeration':
      return `${error.field}: unexpected code "${error.value}"`
    case 'ParsingError':
      return `parse error: ${error.reason}`
    case 'UnknownGnssType':
      return `talker ${error.talkerId} does not identify a GNSS constellation`
    case 'UnknownTalkerId':
      return `expected talker ${error.expected}, found ${error.found}`
    case 'EmptyNavConfig':
      return 'at least one sentence type is required for navigation'
    case 'InvalidConfig':
      return `invalid configuration: ${error.issues.join('; ')}`
    case 'InvalidGsvSentenceNum':
      return `GSV sentence ${error.sentenceNum} of ${error.numberOfSentences} is out of range`
  }
}
