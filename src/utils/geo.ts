// Split decimal degrees into whole degrees and minutes with a hemisphere
export function decimalToCoord(decimal: number, isLat: boolean): {
  degrees: number
  minutes: number
  direction: 'N' | 'S' | 'E' | 'W'
} {
  const abs = Math.abs(decimal)
  const degrees = Math.floor(abs)
  const minutes = (abs - degrees) * 60
  let direction: 'N' | 'S' | 'E' | 'W'
  if (isLat) {
    direction = decimal >= 0 ? 'N' : 'S'
  } else {
    direction = decimal >= 0 ? 'E' : 'W'
  }
  return { degrees, minutes, direction }
}

// Encode decimal degrees as an NMEA field pair, e.g. 53.361337 → ['5321.68022', 'N']
export function toNmeaCoordinate(decimal: number, isLat: boolean, precision = 7): [string, string] {
  const coord = decimalToCoord(decimal, isLat)
  let degrees = coord.degrees
  let minutes = coord.minutes.toFixed(precision)
  // 59.99999999 rounds up to a full degree
  if (Number(minutes) >= 60) {
    degrees += 1
    minutes = (0).toFixed(precision)
  }
  const degStr = degrees.toString().padStart(isLat ? 2 : 3, '0')
  const [whole, fraction] = minutes.split('.')
  const minStr = fraction === undefined ? whole.padStart(2, '0') : `${whole.padStart(2, '0')}.${fraction}`
  return [`${degStr}${minStr}`, coord.direction]
}

// Format for logs (e.g., "53°21.680'N")
export function formatCoordinate(decimal: number, isLat: boolean): string {
  const coord = decimalToCoord(decimal, isLat)
  const minStr = coord.minutes.toFixed(3).padStart(6, '0')
  return `${coord.degrees}°${minStr}'${coord.direction}`
}
