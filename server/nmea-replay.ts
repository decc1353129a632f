/**
 * NMEA Log Replay
 * ───────────────
 * Feeds a recorded NMEA log through the fix aggregator and prints every
 * valid fix plus a summary of rejected sentences.
 *
 * Configuration: edit server/config.json
 * Start:         npm run replay [-- path/to/log.nmea]
 */

import { readFileSync, existsSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join, resolve } from 'node:path'
import { z } from 'zod'
import { NmeaAggregator } from '../src/aggregator/aggregator.js'
import { aggregatorConfigSchema } from '../src/aggregator/config.js'
import { describeError } from '../src/parser/errors.js'
import { replayLines, type FixReport } from '../src/replay.js'
import { LineSplitter } from '../src/stream/line-splitter.js'
import { formatCoordinate } from '../src/utils/geo.js'
import { formatTime } from '../src/utils/time.js'

// ── Config ────────────────────────────────────────────────────────────────────

const __dir = dirname(fileURLToPath(import.meta.url))
const configPath = join(__dir, 'config.json')

const configSchema = aggregatorConfigSchema.extend({
  logFile: z.string().min(1),
})

type Config = z.infer<typeof configSchema>

const DEFAULT_CONFIG: Config = {
  logFile: 'sample.nmea',
  requiredSentences: ['RMC', 'GGA'],
}

function loadConfig(): Config {
  if (!existsSync(configPath)) {
    console.warn('[nmea] config.json not found, using defaults')
    return DEFAULT_CONFIG
  }
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'))
  } catch {
    console.warn('[nmea] Failed to parse config.json, using defaults')
    return DEFAULT_CONFIG
  }
  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    console.warn(`[nmea] Invalid config.json (${parsed.error.issues.map(i => i.message).join('; ')}), using defaults`)
    return DEFAULT_CONFIG
  }
  return parsed.data
}

const cfg = loadConfig()
const logPath = process.argv[2] ? resolve(process.argv[2]) : join(__dir, cfg.logFile)

// ── Replay ────────────────────────────────────────────────────────────────────

function logFix(fix: FixReport): void {
  const time = fix.fixTime ? formatTime(fix.fixTime) : '--:--:--'
  const lat = fix.latitude !== null ? formatCoordinate(fix.latitude, true) : '-'
  const lon = fix.longitude !== null ? formatCoordinate(fix.longitude, false) : '-'
  console.log(`[nmea] ${time} ${fix.fixType} ${lat} ${lon} (line ${fix.line})`)
}

const created = NmeaAggregator.create(cfg.requiredSentences)
if (!created.ok) {
  console.error(`[nmea] ${describeError(created.error)}`)
  process.exit(1)
}

if (!existsSync(logPath)) {
  console.error(`[nmea] Log file not found: ${logPath}`)
  process.exit(1)
}

console.log(`[nmea] Replaying ${logPath}, required: ${cfg.requiredSentences.join(', ')}`)

const splitter = new LineSplitter()
// logs saved on Unix lose the CR
const lines = splitter.push(readFileSync(logPath, 'latin1').replace(/\r?\n/g, '\r\n'))
const rest = splitter.flush()
if (rest) lines.push(rest)

const summary = replayLines(lines, created.value, logFix)

console.log(`[nmea] ${summary.sentences} sentences, ${summary.fixes.length} fixes`)
for (const [kind, count] of Object.entries(summary.errors)) {
  console.warn(`[nmea] ${count} × ${kind}`)
}
