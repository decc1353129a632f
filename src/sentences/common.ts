import { raise } from '../parser/errors.js'
import type { NmeaEnvelope } from '../parser/envelope.js'
import { FieldReader } from '../parser/primitives.js'
import type { SentenceType } from '../parser/sentence-type.js'

// Guards a decoder against being handed another sentence type
export function fieldsFor(envelope: NmeaEnvelope, expected: SentenceType): FieldReader {
  if (envelope.messageId !== expected) {
    raise({ kind: 'WrongSentenceHeader', expected, found: envelope.messageId })
  }
  return new FieldReader(envelope.data)
}

export function statusFlag(code: 'A' | 'V' | null): boolean | null {
  return code === null ? null : code === 'A'
}
