import { describe, it, expect } from 'vitest'
import { attempt } from '../parser/errors.js'
import type { GsvData, Satellite } from '../sentences/gsv.js'
import { checkGsvPack, SatelliteScan } from './satellite-scan.js'

function pack(sentenceNum: number, numberOfSentences: number, prns: number[], snr: number | null = null): GsvData {
  return {
    type: 'GSV',
    gnssType: 'Gps',
    numberOfSentences,
    sentenceNum,
    satsInView: prns.length,
    satellites: prns.map((prn): Satellite => ({ gnssType: 'Gps', prn, elevation: null, azimuth: null, snr })),
  }
}

describe('SatelliteScan', () => {
  it('keeps one pack per sentence number', () => {
    const scan = new SatelliteScan()
    scan.merge(pack(2, 3, [5, 6]))
    scan.merge(pack(3, 3, [9]))
    scan.merge(pack(1, 3, [1, 2]))
    expect(scan.packCount).toBe(3)
    expect([...scan.satellites()].map(s => s.prn)).toEqual([1, 2, 9, 5, 6])
  })

  it('replaces a repeated sentence number', () => {
    const scan = new SatelliteScan()
    scan.merge(pack(1, 2, [1]))
    scan.merge(pack(2, 2, [2]))
    scan.merge(pack(1, 2, [3]))
    expect(scan.packCount).toBe(2)
    expect([...scan.satellites()].map(s => s.prn)).toEqual([3, 2])
  })

  it('yields the newest report first', () => {
    const scan = new SatelliteScan()
    scan.merge(pack(2, 2, [10], 30))
    scan.merge(pack(1, 2, [10], 35))
    expect([...scan.satellites()].map(s => s.snr)).toEqual([35, 30])
  })

  it('keeps the tail of a longer earlier scan', () => {
    const scan = new SatelliteScan()
    scan.merge(pack(1, 3, [1]))
    scan.merge(pack(2, 3, [2]))
    scan.merge(pack(3, 3, [3]))
    scan.merge(pack(1, 2, [4]))
    scan.merge(pack(2, 2, [5]))
    expect(scan.packCount).toBe(3)
    expect([...scan.satellites()].map(s => s.prn)).toEqual([5, 4, 3])
  })
})

describe('checkGsvPack', () => {
  it('rejects a sentence number past the count', () => {
    expect(attempt(() => checkGsvPack(pack(4, 3, [])))).toEqual({
      ok: false,
      error: { kind: 'InvalidGsvSentenceNum', sentenceNum: 4, numberOfSentences: 3 },
    })
  })

  it('rejects sentence number 0', () => {
    expect(attempt(() => checkGsvPack(pack(0, 3, []))).ok).toBe(false)
  })

  it('rejects scans longer than 15 sentences', () => {
    expect(attempt(() => checkGsvPack(pack(1, 16, []))).ok).toBe(false)
    expect(attempt(() => checkGsvPack(pack(15, 15, []))).ok).toBe(true)
  })
})
