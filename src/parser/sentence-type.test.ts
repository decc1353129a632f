import { describe, it, expect } from 'vitest'
import { classifySentenceType, isSentenceType, isSupported, SUPPORTED_SENTENCE_TYPES } from './sentence-type.js'

describe('classifySentenceType', () => {
  it('knows standard message ids', () => {
    expect(classifySentenceType('GGA')).toEqual({ known: true, type: 'GGA' })
  })

  it('keeps the id of an unknown message', () => {
    expect(classifySentenceType('XYZ')).toEqual({ known: false, messageId: 'XYZ' })
  })

  it('is case sensitive', () => {
    expect(isSentenceType('gga')).toBe(false)
  })
})

describe('isSupported', () => {
  it('accepts types with a decoder', () => {
    expect(isSupported('RMC')).toBe(true)
    expect(isSupported('RMZ')).toBe(true)
  })

  it('rejects known types without a decoder', () => {
    expect(isSupported('APB')).toBe(false)
    expect(isSupported('HDG')).toBe(false)
  })

  it('lists 33 decoders, all known', () => {
    expect(SUPPORTED_SENTENCE_TYPES).toHaveLength(33)
    expect(SUPPORTED_SENTENCE_TYPES.every(isSentenceType)).toBe(true)
  })
})
