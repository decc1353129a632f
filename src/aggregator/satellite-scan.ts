// ── Satellites-in-view buffer ─────────────────────────────────────────────────
// One scan per constellation. GSV packs are kept tagged by their sentence
// number, newest last. Sentence numbers never exceed the declared count, so the
// buffer holds at most as many packs as the largest scan seen.

import { raise } from '../parser/errors.js'
import type { GsvData, Satellite } from '../sentences/gsv.js'

// four satellites per sentence, so at most 60 per constellation
export const GSV_MAX_PACKS = 15

interface SatellitePack {
  sentenceNum: number
  satellites: Satellite[]
}

// Throws before touching any buffer, so a rejected pack leaves state as it was
export function checkGsvPack(data: GsvData): void {
  const { sentenceNum, numberOfSentences } = data
  if (sentenceNum < 1 || sentenceNum > numberOfSentences || numberOfSentences > GSV_MAX_PACKS) {
    raise({ kind: 'InvalidGsvSentenceNum', sentenceNum, numberOfSentences })
  }
}

export class SatelliteScan {
  private packs: SatellitePack[] = []

  merge(data: GsvData): void {
    checkGsvPack(data)
    // a repeated sentence number replaces the older pack
    this.packs = this.packs.filter(p => p.sentenceNum !== data.sentenceNum)
    this.packs.push({ sentenceNum: data.sentenceNum, satellites: data.satellites })
  }

  // Newest pack first, so the latest report of a PRN wins
  *satellites(): Generator<Satellite> {
    for (let i = this.packs.length - 1; i >= 0; i--) {
      yield* this.packs[i].satellites
    }
  }

  get packCount(): number {
    return this.packs.length
  }
}
