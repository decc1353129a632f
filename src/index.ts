export { decodeSentence, decodeEnvelope, type DecodedSentence } from './decode.js'
export {
  describeError,
  NmeaDecodeError,
  type DecodeResult,
  type NmeaError,
  type NmeaErrorKind,
} from './parser/errors.js'
export { parseEnvelope, checksum, withChecksum, SENTENCE_MAX_LEN, type NmeaEnvelope } from './parser/envelope.js'
export {
  classifySentenceType,
  isSupported,
  SENTENCE_TYPES,
  SUPPORTED_SENTENCE_TYPES,
  type Classification,
  type SentenceType,
  type SupportedSentenceType,
} from './parser/sentence-type.js'
export {
  TEXT_PARAMETER_MAX_LEN,
  type NmeaDate,
  type NmeaTime,
  type Position,
} from './parser/primitives.js'
export { NmeaAggregator } from './aggregator/aggregator.js'
export { aggregatorConfigSchema, validateRequiredSentences, type AggregatorConfig } from './aggregator/config.js'
export { LineSplitter } from './stream/line-splitter.js'
export { replayLines, type FixReport, type ReplaySummary } from './replay.js'
export { formatTime, formatDate, toUtcDate } from './utils/time.js'
export { toNmeaCoordinate, formatCoordinate } from './utils/geo.js'
export { ktsToKmh, kmhToKts, formatSpeed, formatHeading } from './utils/units.js'

export { isValidFix, fixTypeFromQuality, type FixType } from './sentences/fix-type.js'
export { faaModesToFixType, type FaaMode } from './sentences/faa-mode.js'
export { GNSS_TYPES, type GnssType } from './sentences/gnss-type.js'
export { parseAam, type AamData } from './sentences/aam.js'
export { parseAlm, almGpsWeek10Bit, type AlmData } from './sentences/alm.js'
export { parseApa, type ApaData, type SteerDirection, type BearingReference } from './sentences/apa.js'
export { parseBod, type BodData } from './sentences/bod.js'
export { parseBwc, type BwcData } from './sentences/bwc.js'
export { parseBww, type BwwData } from './sentences/bww.js'
export { parseDbk, type DbkData } from './sentences/dbk.js'
export { parseDbs, type DbsData } from './sentences/dbs.js'
export { parseDbt, type DbtData } from './sentences/dbt.js'
export { parseDpt, type DptData } from './sentences/dpt.js'
export { parseGbs, type GbsData } from './sentences/gbs.js'
export { parseGga, type GgaData } from './sentences/gga.js'
export { parseGll, gllFixType, type GllData } from './sentences/gll.js'
export { parseGns, type GnsData, type NavigationStatus } from './sentences/gns.js'
export { parseGsa, type GsaData, type GsaMode1, type GsaMode2 } from './sentences/gsa.js'
export { parseGst, type GstData } from './sentences/gst.js'
export { parseGsv, type GsvData, type Satellite } from './sentences/gsv.js'
export { parseHdt, type HdtData } from './sentences/hdt.js'
export { parseMda, type MdaData } from './sentences/mda.js'
export { parseMtw, type MtwData } from './sentences/mtw.js'
export { parseMwd, type MwdData } from './sentences/mwd.js'
export { parseMwv, type MwvData, type MwvReference, type MwvWindSpeedUnits } from './sentences/mwv.js'
export { parseRmc, rmcFixType, type RmcData, type RmcStatus } from './sentences/rmc.js'
export { parseRmz, type RmzData, type RmzFixType } from './sentences/rmz.js'
export { parseTtm, type TtmData, type TtmAngle, type TtmStatus } from './sentences/ttm.js'
export { parseTxt, type TxtData } from './sentences/txt.js'
export { parseVhw, type VhwData } from './sentences/vhw.js'
export { parseVtg, type VtgData } from './sentences/vtg.js'
export { parseWnc, type WncData } from './sentences/wnc.js'
export { parseXdr, type XdrData, type XdrMeasurement } from './sentences/xdr.js'
export { parseZda, type ZdaData } from './sentences/zda.js'
export { parseZfo, type ZfoData } from './sentences/zfo.js'
export { parseZtg, type ZtgData } from './sentences/ztg.js'
