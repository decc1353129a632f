import { describe, it, expect } from 'vitest'
import { SentenceMask } from './sentence-mask.js'

describe('SentenceMask', () => {
  it('tracks inserted types', () => {
    const mask = new SentenceMask(['RMC'])
    mask.insert('GGA')
    mask.insert('RMC')
    expect(mask.size).toBe(2)
    expect(mask.contains('GGA')).toBe(true)
    expect(mask.contains('VTG')).toBe(false)
    expect(mask.toArray()).toEqual(['RMC', 'GGA'])
  })

  it('checks subsets', () => {
    const required = new SentenceMask(['RMC', 'GGA'])
    const seen = new SentenceMask(['GGA'])
    expect(required.isSubsetOf(seen)).toBe(false)
    seen.insert('RMC')
    seen.insert('VTG')
    expect(required.isSubsetOf(seen)).toBe(true)
    expect(new SentenceMask().isSubsetOf(seen)).toBe(true)
  })

  it('clears', () => {
    const mask = new SentenceMask(['GSA'])
    mask.clear()
    expect(mask.size).toBe(0)
  })
})
