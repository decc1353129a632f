// ── Log replay ────────────────────────────────────────────────────────────────
// Runs recorded sentences through an aggregator and tallies the outcome.

import type { NmeaAggregator } from './aggregator/aggregator.js'
import type { NmeaErrorKind } from './parser/errors.js'
import type { NmeaTime } from './parser/primitives.js'
import type { FixType } from './sentences/fix-type.js'

export interface FixReport {
  // 1-based position in the input
  line: number
  fixType: FixType
  fixTime: NmeaTime | null
  latitude: number | null
  longitude: number | null
}

export interface ReplaySummary {
  sentences: number
  fixes: FixReport[]
  errors: Partial<Record<NmeaErrorKind, number>>
}

export function replayLines(
  lines: Iterable<string>,
  aggregator: NmeaAggregator,
  onFix?: (fix: FixReport) => void,
): ReplaySummary {
  const summary: ReplaySummary = { sentences: 0, fixes: [], errors: {} }
  let line = 0
  for (const raw of lines) {
    line++
    const sentence = raw.trim()
    if (!sentence) continue
    summary.sentences++
    const result = aggregator.ingestForFix(sentence)
    if (!result.ok) {
      const { kind } = result.error
      summary.errors[kind] = (summary.errors[kind] ?? 0) + 1
      continue
    }
    if (result.value === 'Invalid') continue
    const fix: FixReport = {
      line,
      fixType: result.value,
      fixTime: aggregator.fixTime,
      latitude: aggregator.latitude,
      longitude: aggregator.longitude,
    }
    summary.fixes.push(fix)
    onFix?.(fix)
  }
  return summary
}
