// ── FAA mode indicator ────────────────────────────────────────────────────────
// Single character added in NMEA 2.3. GNS carries one character per
// constellation, so modes arrive as a short string.

import { raise } from '../parser/errors.js'
import { isValidFix, type FixType } from './fix-type.js'

export type FaaMode =
  | 'Autonomous'
  | 'Caution'
  | 'Differential'
  | 'Estimated'
  | 'FloatRtk'
  | 'Manual'
  | 'DataNotValid'
  | 'Precise'
  | 'FixedRtk'
  | 'Simulator'
  | 'Unsafe'

const FAA_CODES: Record<string, FaaMode> = {
  A: 'Autonomous',
  C: 'Caution',
  D: 'Differential',
  E: 'Estimated',
  F: 'FloatRtk',
  M: 'Manual',
  N: 'DataNotValid',
  P: 'Precise',
  R: 'FixedRtk',
  S: 'Simulator',
  U: 'Unsafe',
}

const FAA_FIX: Record<FaaMode, FixType> = {
  Autonomous: 'Gps',
  Caution: 'Invalid',
  Differential: 'DGps',
  Estimated: 'Estimated',
  FloatRtk: 'FloatRtk',
  Manual: 'Manual',
  DataNotValid: 'Invalid',
  Precise: 'DGps',
  FixedRtk: 'Rtk',
  Simulator: 'Simulation',
  Unsafe: 'Invalid',
}

export const FAA_MODES_MAX_LEN = 6

export function parseFaaMode(value: string, field = 'faa mode'): FaaMode {
  const mode = value.length === 1 ? FAA_CODES[value] : undefined
  if (mode === undefined) raise({ kind: 'InvalidEnumeration', field, value })
  return mode
}

export function parseFaaModes(value: string, field = 'faa modes'): FaaMode[] {
  if (!value) raise({ kind: 'ParsingError', reason: `${field} is required` })
  if (value.length > FAA_MODES_MAX_LEN) {
    raise({ kind: 'FieldTooLong', field, maxLength: FAA_MODES_MAX_LEN, length: value.length })
  }
  return value.split('').map(c => parseFaaMode(c, field))
}

export function faaModeToFixType(mode: FaaMode): FixType {
  return FAA_FIX[mode]
}

// First mode giving a usable fix wins; otherwise the first mode decides
export function faaModesToFixType(modes: readonly FaaMode[]): FixType {
  for (const mode of modes) {
    const fixType = FAA_FIX[mode]
    if (isValidFix(fixType)) return fixType
  }
  return modes.length > 0 ? FAA_FIX[modes[0]] : 'Invalid'
}
