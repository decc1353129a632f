import { describe, it, expect } from 'vitest'
import { attempt, describeError, fail, NmeaDecodeError, ok, raise } from './errors.js'

describe('attempt', () => {
  it('wraps a returned value', () => {
    expect(attempt(() => 42)).toEqual({ ok: true, value: 42 })
  })

  it('captures a raised decode error', () => {
    const result = attempt(() => raise({ kind: 'ParsingError', reason: 'missing fix time' }))
    expect(result).toEqual({ ok: false, error: { kind: 'ParsingError', reason: 'missing fix time' } })
  })

  it('lets other exceptions through', () => {
    expect(() => attempt(() => { throw new TypeError('boom') })).toThrow(TypeError)
  })
})

describe('NmeaDecodeError', () => {
  it('carries the error and its description', () => {
    const err = new NmeaDecodeError({ kind: 'Unknown', messageId: 'XYZ' })
    expect(err.name).toBe('NmeaDecodeError')
    expect(err.message).toBe('unknown sentence type XYZ')
    expect(err.error).toEqual({ kind: 'Unknown', messageId: 'XYZ' })
  })
})

describe('describeError', () => {
  it('prints checksums as two uppercase hex digits', () => {
    expect(describeError({ kind: 'ChecksumMismatch', calculated: 0x77, found: 0x0a }))
      .toBe('checksum mismatch: calculated 77, found 0A')
  })

  it('names the expected and found header', () => {
    expect(describeError({ kind: 'WrongSentenceHeader', expected: 'GGA', found: 'AAM' }))
      .toBe('expected GGA sentence, found AAM')
  })

  it('describes a range violation', () => {
    expect(describeError({ kind: 'RangeViolation', field: 'fix time hours', value: 24, min: 0, max: 23 }))
      .toBe('fix time hours: 24 is outside 0..23')
  })

  it('joins configuration issues', () => {
    expect(describeError({ kind: 'InvalidConfig', issues: ['0: bad', '1: worse'] }))
      .toBe('invalid configuration: 0: bad; 1: worse')
  })

  it('describes an empty navigation config', () => {
    expect(describeError({ kind: 'EmptyNavConfig' })).toBe('at least one sentence type is required for navigation')
  })
})

describe('ok / fail', () => {
  it('build the two result shapes', () => {
    expect(ok('x')).toEqual({ ok: true, value: 'x' })
    expect(fail({ kind: 'Utf8Decoding' })).toEqual({ ok: false, error: { kind: 'Utf8Decoding' } })
  })
})
