// ── Sentence envelope ─────────────────────────────────────────────────────────
// $<talker:2><message:3>,<data>*<checksum:2 hex>[\r\n]

import { attempt, raise, type DecodeResult } from './errors.js'

export const SENTENCE_MAX_LEN = 102

export interface NmeaEnvelope {
  talkerId: string
  messageId: string
  data: string
  checksum: number
}

const HEADER = /^[A-Z0-9]{5}$/
const CHECKSUM = /^[0-9A-Fa-f]{2}$/

// XOR of every character between '$' and '*'
export function checksum(body: string): number {
  let xor = 0
  for (let i = 0; i < body.length; i++) xor ^= body.charCodeAt(i)
  return xor
}

// Appends '*hh' to a sentence body, adding the leading '$' if absent
export function withChecksum(body: string): string {
  const bare = body.startsWith('$') ? body.substring(1) : body
  return `$${bare}*${checksum(bare).toString(16).toUpperCase().padStart(2, '0')}`
}

// a byte-order mark is kept so it fails the ASCII check like any other byte
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

function toText(input: string | Uint8Array): string {
  if (typeof input === 'string') return input
  try {
    return utf8.decode(input)
  } catch {
    return raise({ kind: 'Utf8Decoding' })
  }
}

function readEnvelope(input: string | Uint8Array): NmeaEnvelope {
  const line = toText(input).replace(/\r?\n?$/, '')

  if (line.length > SENTENCE_MAX_LEN) {
    raise({ kind: 'SentenceLength', length: line.length, maxLength: SENTENCE_MAX_LEN })
  }
  for (let i = 0; i < line.length; i++) {
    if (line.charCodeAt(i) > 0x7f) raise({ kind: 'Ascii', position: i })
  }
  if (!line.startsWith('$')) raise({ kind: 'MalformedEnvelope', reason: "missing '$'" })

  const star = line.indexOf('*')
  if (star < 0) raise({ kind: 'MalformedEnvelope', reason: "missing '*'" })
  const found = line.substring(star + 1)
  if (!CHECKSUM.test(found)) raise({ kind: 'MalformedEnvelope', reason: `bad checksum "${found}"` })

  const body = line.substring(1, star)
  const comma = body.indexOf(',')
  if (comma < 0) raise({ kind: 'MalformedEnvelope', reason: 'missing field separator' })
  const header = body.substring(0, comma)
  if (!HEADER.test(header)) raise({ kind: 'MalformedEnvelope', reason: `bad header "${header}"` })

  const calculated = checksum(body)
  const declared = parseInt(found, 16)
  if (calculated !== declared) raise({ kind: 'ChecksumMismatch', calculated, found: declared })

  return {
    talkerId: header.substring(0, 2),
    messageId: header.substring(2),
    data: body.substring(comma + 1),
    checksum: declared,
  }
}

export function parseEnvelope(input: string | Uint8Array): DecodeResult<NmeaEnvelope> {
  return attempt(() => readEnvelope(input))
}
