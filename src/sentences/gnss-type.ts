// ── GNSS constellations ───────────────────────────────────────────────────────

import { raise } from '../parser/errors.js'

// Declaration order is the satellite sort order
export const GNSS_TYPES = ['Beidou', 'Galileo', 'Gps', 'Glonass', 'NavIC', 'Qzss'] as const

export type GnssType = typeof GNSS_TYPES[number]

const TALKERS: Record<string, GnssType> = {
  BD: 'Beidou',
  GB: 'Beidou',
  GA: 'Galileo',
  GP: 'Gps',
  GL: 'Glonass',
  GI: 'NavIC',
  GQ: 'Qzss',
  PQ: 'Qzss',
  QZ: 'Qzss',
}

// Mixed-constellation talkers (GN) cannot be attributed and are rejected
export function gnssTypeFromTalker(talkerId: string): GnssType {
  const gnss = Object.hasOwn(TALKERS, talkerId) ? TALKERS[talkerId] : undefined
  if (gnss === undefined) raise({ kind: 'UnknownGnssType', talkerId })
  return gnss
}

export function gnssOrdinal(gnss: GnssType): number {
  return GNSS_TYPES.indexOf(gnss)
}
