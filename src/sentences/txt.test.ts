import { describe, it, expect } from 'vitest'
import { envelopeOf } from '../testing.js'
import { withChecksum } from '../parser/envelope.js'
import { parseTxt } from './txt.js'

describe('parseTxt', () => {
  it('decodes a message', () => {
    expect(parseTxt(envelopeOf(withChecksum('GPTXT,01,01,02,ANTENNA OK')))).toEqual({
      ok: true,
      value: { type: 'TXT', count: 1, sequence: 1, textIdentifier: 2, text: 'ANTENNA OK' },
    })
  })

  it('keeps commas inside the text', () => {
    const result = parseTxt(envelopeOf('$GPTXT,01,01,02,ANTENNA OK,PATCH*54'))
    expect(result.ok && result.value.text).toBe('ANTENNA OK,PATCH')
  })

  it('rejects text over 64 characters', () => {
    expect(parseTxt(envelopeOf(withChecksum(`GPTXT,01,01,02,${'x'.repeat(65)}`)))).toEqual({
      ok: false,
      error: { kind: 'FieldTooLong', field: 'text', maxLength: 64, length: 65 },
    })
  })
})
