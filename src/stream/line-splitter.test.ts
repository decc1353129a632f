import { describe, it, expect } from 'vitest'
import { LineSplitter } from './line-splitter.js'

describe('LineSplitter', () => {
  it('holds a partial sentence until it completes', () => {
    const splitter = new LineSplitter()
    expect(splitter.push('$GPHDT,274.07,T*03\r\n$INMTW')).toEqual(['$GPHDT,274.07,T*03'])
    expect(splitter.pending).toBe(6)
    expect(splitter.push(',17.9,C*1B\r\n')).toEqual(['$INMTW,17.9,C*1B'])
    expect(splitter.pending).toBe(0)
  })

  it('joins a delimiter split across chunks', () => {
    const splitter = new LineSplitter()
    expect(splitter.push('abc\r')).toEqual([])
    expect(splitter.push('\ndef\r\n')).toEqual(['abc', 'def'])
  })

  it('skips empty lines', () => {
    expect(new LineSplitter().push('\r\n\r\nabc\r\n')).toEqual(['abc'])
  })

  it('accepts bytes', () => {
    const splitter = new LineSplitter()
    expect(splitter.push(new TextEncoder().encode('x\r\ny'))).toEqual(['x'])
    expect(splitter.flush()).toBe('y')
    expect(splitter.pending).toBe(0)
  })

  it('keeps non-ASCII bytes one character each', () => {
    expect(new LineSplitter().push(new Uint8Array([0xe9, 0x0d, 0x0a]))).toEqual(['é'])
  })
})
