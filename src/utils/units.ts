// Speed conversions
export function ktsToKmh(kts: number): number { return kts * 1.852 }
export function kmhToKts(kmh: number): number { return kmh / 1.852 }

export function formatSpeed(kts: number): string {
  return `${kts.toFixed(1)} kts`
}

// Format heading/course
export function formatHeading(degrees: number): string {
  return `${Math.round(degrees).toString().padStart(3, '0')}°`
}
