// ── Fix quality ───────────────────────────────────────────────────────────────

export type FixType =
  | 'Invalid'
  | 'Gps'
  | 'DGps'
  | 'Pps' // precise positioning service
  | 'Rtk'
  | 'FloatRtk'
  | 'Estimated'
  | 'Manual'
  | 'Simulation'

// GGA quality indicator, index = code digit
const QUALITY_CODES: readonly FixType[] = [
  'Invalid', 'Gps', 'DGps', 'Pps', 'Rtk', 'FloatRtk', 'Estimated', 'Manual', 'Simulation',
]

// Unrecognized codes mean no usable fix, not a decode error
export function fixTypeFromQuality(code: string): FixType {
  if (code.length !== 1) return 'Invalid'
  const index = code.charCodeAt(0) - 48
  return QUALITY_CODES[index] ?? 'Invalid'
}

export function isValidFix(fixType: FixType): boolean {
  switch (fixType) {
    case 'Gps':
    case 'DGps':
    case 'Pps':
    case 'Rtk':
    case 'FloatRtk':
      return true
    default:
      return false
  }
}
