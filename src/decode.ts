// ── Stateless decoding ────────────────────────────────────────────────────────
// line → envelope (checksum) → classifier → per-type decoder

import { fail, type DecodeResult } from './parser/errors.js'
import { parseEnvelope, type NmeaEnvelope } from './parser/envelope.js'
import { classifySentenceType, isSupported, type SupportedSentenceType } from './parser/sentence-type.js'
import { parseAam, type AamData } from './sentences/aam.js'
import { parseAlm, type AlmData } from './sentences/alm.js'
import { parseApa, type ApaData } from './sentences/apa.js'
import { parseBod, type BodData } from './sentences/bod.js'
import { parseBwc, type BwcData } from './sentences/bwc.js'
import { parseBww, type BwwData } from './sentences/bww.js'
import { parseDbk, type DbkData } from './sentences/dbk.js'
import { parseDbs, type DbsData } from './sentences/dbs.js'
import { parseDbt, type DbtData } from './sentences/dbt.js'
import { parseDpt, type DptData } from './sentences/dpt.js'
import { parseGbs, type GbsData } from './sentences/gbs.js'
import { parseGga, type GgaData } from './sentences/gga.js'
import { parseGll, type GllData } from './sentences/gll.js'
import { parseGns, type GnsData } from './sentences/gns.js'
import { parseGsa, type GsaData } from './sentences/gsa.js'
import { parseGst, type GstData } from './sentences/gst.js'
import { parseGsv, type GsvData } from './sentences/gsv.js'
import { parseHdt, type HdtData } from './sentences/hdt.js'
import { parseMda, type MdaData } from './sentences/mda.js'
import { parseMtw, type MtwData } from './sentences/mtw.js'
import { parseMwd, type MwdData } from './sentences/mwd.js'
import { parseMwv, type MwvData } from './sentences/mwv.js'
import { parseRmc, type RmcData } from './sentences/rmc.js'
import { parseRmz, type RmzData } from './sentences/rmz.js'
import { parseTtm, type TtmData } from './sentences/ttm.js'
import { parseTxt, type TxtData } from './sentences/txt.js'
import { parseVhw, type VhwData } from './sentences/vhw.js'
import { parseVtg, type VtgData } from './sentences/vtg.js'
import { parseWnc, type WncData } from './sentences/wnc.js'
import { parseXdr, type XdrData } from './sentences/xdr.js'
import { parseZda, type ZdaData } from './sentences/zda.js'
import { parseZfo, type ZfoData } from './sentences/zfo.js'
import { parseZtg, type ZtgData } from './sentences/ztg.js'

export type DecodedSentence =
  | AamData | AlmData | ApaData | BodData | BwcData | BwwData | DbkData
  | DbsData | DbtData | DptData | GbsData | GgaData | GllData | GnsData
  | GsaData | GstData | GsvData | HdtData | MdaData | MtwData | MwdData
  | MwvData | RmcData | RmzData | TtmData | TxtData | VhwData | VtgData
  | WncData | XdrData | ZdaData | ZfoData | ZtgData

type Decoders = {
  [K in SupportedSentenceType]: (envelope: NmeaEnvelope) => DecodeResult<Extract<DecodedSentence, { type: K }>>
}

const DECODERS: Decoders = {
  AAM: parseAam,
  ALM: parseAlm,
  APA: parseApa,
  BOD: parseBod,
  BWC: parseBwc,
  BWW: parseBww,
  DBK: parseDbk,
  DBS: parseDbs,
  DBT: parseDbt,
  DPT: parseDpt,
  GBS: parseGbs,
  GGA: parseGga,
  GLL: parseGll,
  GNS: parseGns,
  GSA: parseGsa,
  GST: parseGst,
  GSV: parseGsv,
  HDT: parseHdt,
  MDA: parseMda,
  MTW: parseMtw,
  MWD: parseMwd,
  MWV: parseMwv,
  RMC: parseRmc,
  RMZ: parseRmz,
  TTM: parseTtm,
  TXT: parseTxt,
  VHW: parseVhw,
  VTG: parseVtg,
  WNC: parseWnc,
  XDR: parseXdr,
  ZDA: parseZda,
  ZFO: parseZfo,
  ZTG: parseZtg,
}

export function decodeEnvelope(envelope: NmeaEnvelope): DecodeResult<DecodedSentence> {
  const classified = classifySentenceType(envelope.messageId)
  if (!classified.known) return fail({ kind: 'Unknown', messageId: classified.messageId })
  const { type } = classified
  if (!isSupported(type)) return fail({ kind: 'Unsupported', sentenceType: type })
  return DECODERS[type](envelope)
}

export function decodeSentence(line: string | Uint8Array): DecodeResult<DecodedSentence> {
  const envelope = parseEnvelope(line)
  if (!envelope.ok) return envelope
  return decodeEnvelope(envelope.value)
}
