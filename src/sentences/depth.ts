// Shared layout of DBK, DBS and DBT: x.x,f,x.x,M,x.x,F

import type { FieldReader } from '../parser/primitives.js'

export interface DepthReadings {
  depthFeet: number | null
  depthMeters: number | null
  depthFathoms: number | null
}

export function readDepthReadings(f: FieldReader): DepthReadings {
  const depthFeet = f.decimal('depth feet')
  f.unit('feet units', 'f', true)
  const depthMeters = f.decimal('depth meters')
  f.unit('meters units', 'M', true)
  const depthFathoms = f.decimal('depth fathoms')
  f.unit('fathoms units', 'F', true)
  return { depthFeet, depthMeters, depthFathoms }
}
