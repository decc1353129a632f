// ── Fix aggregator ────────────────────────────────────────────────────────────
// Merges a stream of sentences into one navigation snapshot. A "tick" is the
// set of sentences sharing one fix timestamp; a fix is reported only once every
// required sentence type has contributed to the current tick.

import { attempt, ok, raise, type DecodeResult } from '../parser/errors.js'
import { parseEnvelope } from '../parser/envelope.js'
import { timeEquals, type NmeaDate, type NmeaTime } from '../parser/primitives.js'
import type { SentenceType } from '../parser/sentence-type.js'
import { decodeEnvelope, type DecodedSentence } from '../decode.js'
import { faaModesToFixType } from '../sentences/faa-mode.js'
import { isValidFix, type FixType } from '../sentences/fix-type.js'
import type { GgaData } from '../sentences/gga.js'
import { gllFixType, type GllData } from '../sentences/gll.js'
import type { GnsData } from '../sentences/gns.js'
import type { GsaData } from '../sentences/gsa.js'
import type { GsvData, Satellite } from '../sentences/gsv.js'
import { GNSS_TYPES, gnssOrdinal, type GnssType } from '../sentences/gnss-type.js'
import { rmcFixType, type RmcData } from '../sentences/rmc.js'
import type { TxtData } from '../sentences/txt.js'
import type { VtgData } from '../sentences/vtg.js'
import { formatTime } from '../utils/time.js'
import { validateRequiredSentences } from './config.js'
import { checkGsvPack, SatelliteScan } from './satellite-scan.js'
import { SentenceMask } from './sentence-mask.js'

// Values reset at every tick boundary
interface TickState {
  fixTime: NmeaTime | null
  fixDate: NmeaDate | null
  fixType: FixType | null
  latitude: number | null
  longitude: number | null
  altitude: number | null
  speedOverGround: number | null
  trueCourse: number | null
  fixSatellites: number | null
  hdop: number | null
  vdop: number | null
  pdop: number | null
  geoidSeparation: number | null
  fixSatellitesPrns: number[] | null
  lastTxt: TxtData | null
}

function emptyTick(): TickState {
  return {
    fixTime: null,
    fixDate: null,
    fixType: null,
    latitude: null,
    longitude: null,
    altitude: null,
    speedOverGround: null,
    trueCourse: null,
    fixSatellites: null,
    hdop: null,
    vdop: null,
    pdop: null,
    geoidSeparation: null,
    fixSatellitesPrns: null,
    lastTxt: null,
  }
}

export class NmeaAggregator {
  private state: TickState = emptyTick()
  private readonly seenThisTick = new SentenceMask()
  // survive tick boundaries
  private readonly scans = new Map<GnssType, SatelliteScan>()
  private readonly required: SentenceMask
  private lastFixTime: NmeaTime | null = null

  // An aggregator with no required types, for plain ingest()
  constructor(required: Iterable<SentenceType> = []) {
    this.required = new SentenceMask(required)
  }

  // Aggregator for ingestForFix(); the required set must not be empty
  static create(requiredSentences: readonly string[]): DecodeResult<NmeaAggregator> {
    const validated = validateRequiredSentences(requiredSentences)
    if (!validated.ok) return validated
    return ok(new NmeaAggregator(validated.value))
  }

  // ── Accessors ───────────────────────────────────────────────────────────────

  // records are handed out as copies so callers cannot edit the snapshot
  get fixTime(): NmeaTime | null { return this.state.fixTime && { ...this.state.fixTime } }
  get fixDate(): NmeaDate | null { return this.state.fixDate && { ...this.state.fixDate } }
  get fixType(): FixType | null { return this.state.fixType }
  get latitude(): number | null { return this.state.latitude }
  get longitude(): number | null { return this.state.longitude }
  // meters above the WGS-84 ellipsoid
  get altitude(): number | null { return this.state.altitude }
  get speedOverGround(): number | null { return this.state.speedOverGround }
  get trueCourse(): number | null { return this.state.trueCourse }
  get fixSatellites(): number | null { return this.state.fixSatellites }
  get hdop(): number | null { return this.state.hdop }
  get vdop(): number | null { return this.state.vdop }
  get pdop(): number | null { return this.state.pdop }
  get geoidSeparation(): number | null { return this.state.geoidSeparation }
  get fixSatellitesPrns(): number[] | null { return this.state.fixSatellitesPrns && [...this.state.fixSatellitesPrns] }
  get lastTxt(): TxtData | null { return this.state.lastTxt && { ...this.state.lastTxt } }
  get requiredSentences(): SentenceType[] { return this.required.toArray() }

  // meters above mean sea level
  get geoidAltitude(): number | null {
    const { altitude, geoidSeparation } = this.state
    return altitude !== null && geoidSeparation !== null ? altitude + geoidSeparation : null
  }

  // Union of every buffered scan, sorted by constellation then PRN
  satellites(): Satellite[] {
    const byKey = new Map<string, Satellite>()
    for (const gnss of GNSS_TYPES) {
      const scan = this.scans.get(gnss)
      if (!scan) continue
      for (const sat of scan.satellites()) {
        const key = `${gnss}:${sat.prn}`
        if (!byKey.has(key)) byKey.set(key, { ...sat })
      }
    }
    return [...byKey.values()].sort((a, b) =>
      gnssOrdinal(a.gnssType) - gnssOrdinal(b.gnssType) || a.prn - b.prn)
  }

  // ── Ingestion ───────────────────────────────────────────────────────────────

  // Decodes and merges any sentence. Types without a merge rule are rejected
  // as unsupported and leave the snapshot untouched.
  ingest(line: string | Uint8Array): DecodeResult<SentenceType> {
    const decoded = this.decode(line)
    if (!decoded.ok) return decoded
    const sentence = decoded.value
    return attempt((): SentenceType => {
      switch (sentence.type) {
        case 'GGA': this.mergeGga(sentence); break
        case 'GLL': this.mergeGll(sentence); break
        case 'GNS': this.mergeGns(sentence); break
        case 'GSA': this.mergeGsa(sentence); break
        case 'GSV': this.mergeGsv(sentence); break
        case 'RMC': this.mergeRmc(sentence); break
        case 'TXT': this.mergeTxt(sentence); break
        case 'VTG': this.mergeVtg(sentence); break
        default: raise({ kind: 'Unsupported', sentenceType: sentence.type })
      }
      return sentence.type
    })
  }

  // Decodes, merges and reports the fix type once every required sentence
  // has contributed to the current tick; Invalid otherwise.
  ingestForFix(line: string | Uint8Array): DecodeResult<FixType> {
    const decoded = this.decode(line)
    // known sentences without a decoder carry nothing for the fix
    if (!decoded.ok) return decoded.error.kind === 'Unsupported' ? ok<FixType>('Invalid') : decoded
    return attempt(() => this.applyForFix(decoded.value))
  }

  // Drops the per-tick snapshot; scans, required types and the last fix time stay
  resetTick(): void {
    this.state = emptyTick()
    this.seenThisTick.clear()
  }

  // Forgets the last fix time as well, so the next timestamp starts a fresh tick
  clearPositionInfo(): void {
    this.lastFixTime = null
    this.resetTick()
  }

  toString(): string {
    const time = this.state.fixTime ? formatTime(this.state.fixTime) : '-'
    const sats = this.satellites().map(s => `${s.gnssType}:${s.prn}`).join(' ')
    return `${time}: lat: ${this.state.latitude ?? '-'} lon: ${this.state.longitude ?? '-'} ` +
      `alt: ${this.state.altitude ?? '-'} sats: [${sats}]`
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private decode(line: string | Uint8Array): DecodeResult<DecodedSentence> {
    const envelope = parseEnvelope(line)
    if (!envelope.ok) return envelope
    return decodeEnvelope(envelope.value)
  }

  private applyForFix(sentence: DecodedSentence): FixType {
    switch (sentence.type) {
      case 'GSA':
        this.mergeGsa(sentence)
        return 'Invalid'
      case 'GSV':
        this.mergeGsv(sentence)
        return 'Invalid'
      case 'TXT':
        this.mergeTxt(sentence)
        return 'Invalid'
      case 'VTG':
        // no timestamp of its own, so it only counts when asked for
        if (!this.required.contains('VTG')) return 'Invalid'
        if (sentence.trueCourse === null || sentence.speedOverGround === null) {
          this.clearPositionInfo()
          return 'Invalid'
        }
        this.mergeVtg(sentence)
        this.seenThisTick.insert('VTG')
        break
      case 'RMC':
        if (sentence.status === 'Invalid') {
          this.clearPositionInfo()
          return 'Invalid'
        }
        if (!this.updateFixTime(sentence.fixTime)) return 'Invalid'
        this.mergeRmc(sentence)
        this.seenThisTick.insert('RMC')
        break
      case 'GNS':
        if (!isValidFix(faaModesToFixType(sentence.faaModes))) {
          this.clearPositionInfo()
          return 'Invalid'
        }
        if (!this.updateFixTime(sentence.fixTime)) return 'Invalid'
        this.mergeGns(sentence)
        this.seenThisTick.insert('GNS')
        break
      case 'GGA':
        if (sentence.fixType === null || sentence.fixType === 'Invalid') {
          this.clearPositionInfo()
          return 'Invalid'
        }
        if (!this.updateFixTime(sentence.fixTime)) return 'Invalid'
        this.mergeGga(sentence)
        this.seenThisTick.insert('GGA')
        break
      case 'GLL':
        // merged for position, but never completes a fix
        if (this.updateFixTime(sentence.fixTime)) this.mergeGll(sentence)
        return 'Invalid'
      default:
        return 'Invalid'
    }

    const { fixType } = this.state
    if (fixType === null || fixType === 'Invalid') return 'Invalid'
    return this.required.isSubsetOf(this.seenThisTick) ? fixType : 'Invalid'
  }

  // Starts a new tick when the timestamp moves. A sentence without a
  // timestamp cannot be placed in any tick and invalidates the position.
  private updateFixTime(fixTime: NmeaTime | null): boolean {
    if (fixTime === null) {
      this.clearPositionInfo()
      return false
    }
    if (this.lastFixTime !== null && !timeEquals(this.lastFixTime, fixTime)) {
      this.resetTick()
    }
    this.lastFixTime = { ...fixTime }
    return true
  }

  private mergeGga(gga: GgaData): void {
    this.state.fixTime = gga.fixTime
    this.state.latitude = gga.latitude
    this.state.longitude = gga.longitude
    this.state.fixType = gga.fixType
    this.state.fixSatellites = gga.fixSatellites
    this.state.hdop = gga.hdop
    this.state.altitude = gga.altitude
    this.state.geoidSeparation = gga.geoidSeparation
  }

  private mergeRmc(rmc: RmcData): void {
    this.state.fixTime = rmc.fixTime
    this.state.fixDate = rmc.fixDate
    this.state.fixType = rmcFixType(rmc.status)
    this.state.latitude = rmc.latitude
    this.state.longitude = rmc.longitude
    this.state.speedOverGround = rmc.speedOverGround
    this.state.trueCourse = rmc.trueCourse
  }

  private mergeGns(gns: GnsData): void {
    this.state.fixTime = gns.fixTime
    this.state.fixType = faaModesToFixType(gns.faaModes)
    this.state.latitude = gns.latitude
    this.state.longitude = gns.longitude
    this.state.altitude = gns.altitude
    this.state.hdop = gns.hdop
    this.state.geoidSeparation = gns.geoidSeparation
  }

  private mergeGsa(gsa: GsaData): void {
    this.state.fixSatellitesPrns = gsa.fixSatellitesPrns
    this.state.hdop = gsa.hdop
    this.state.vdop = gsa.vdop
    this.state.pdop = gsa.pdop
  }

  private mergeVtg(vtg: VtgData): void {
    this.state.speedOverGround = vtg.speedOverGround
    this.state.trueCourse = vtg.trueCourse
  }

  private mergeGll(gll: GllData): void {
    this.state.latitude = gll.latitude
    this.state.longitude = gll.longitude
    this.state.fixTime = gll.fixTime
    this.state.fixType = gllFixType(gll)
  }

  private mergeGsv(gsv: GsvData): void {
    checkGsvPack(gsv)
    let scan = this.scans.get(gsv.gnssType)
    if (!scan) {
      scan = new SatelliteScan()
      this.scans.set(gsv.gnssType, scan)
    }
    scan.merge(gsv)
  }

  private mergeTxt(txt: TxtData): void {
    this.state.lastTxt = txt
  }
}
