import { describe, it, expect } from 'vitest'
import { ktsToKmh, kmhToKts, formatSpeed, formatHeading } from './units.js'

describe('speed conversions', () => {
  it('converts 1 kt to 1.852 km/h', () => {
    expect(ktsToKmh(1)).toBeCloseTo(1.852, 6)
  })

  it('converts 10.2 km/h to knots', () => {
    expect(kmhToKts(10.2)).toBeCloseTo(5.50756, 4)
  })

  it('round-trips kts → km/h → kts', () => {
    expect(kmhToKts(ktsToKmh(12.5))).toBeCloseTo(12.5, 9)
  })

  it('formatSpeed prints one decimal', () => {
    expect(formatSpeed(0.48)).toBe('0.5 kts')
  })
})

describe('formatHeading', () => {
  it('pads to three digits', () => {
    expect(formatHeading(54.7)).toBe('055°')
  })

  it('keeps three-digit headings', () => {
    expect(formatHeading(190.2)).toBe('190°')
  })
})
