// ── Sentence types ────────────────────────────────────────────────────────────
// Closed list of NMEA 0183 message ids. Ids outside this list are "unknown";
// ids in it without a decoder are "unsupported".

export const SENTENCE_TYPES = [
  'AAM', 'ABK', 'ACA', 'ACK', 'ACS', 'AIR', 'ALM', 'ALR', 'APA', 'APB',
  'ASD', 'BEC', 'BOD', 'BWC', 'BWR', 'BWW', 'CUR', 'DBK', 'DBS', 'DBT',
  'DCN', 'DPT', 'DSC', 'DSE', 'DSI', 'DSR', 'DTM', 'FSI', 'GBS', 'GGA',
  'GLC', 'GLL', 'GMP', 'GNS', 'GRS', 'GSA', 'GST', 'GSV', 'GTD', 'GXA',
  'HDG', 'HDM', 'HDT', 'HMR', 'HMS', 'HSC', 'HTC', 'HTD', 'LCD', 'LRF',
  'LRI', 'LR1', 'LR2', 'LR3', 'MDA', 'MLA', 'MSK', 'MSS', 'MTW', 'MWD',
  'MWV', 'OLN', 'OSD', 'RMA', 'RMB', 'RMC', 'RMZ', 'ROO', 'ROT', 'RPM',
  'RSA', 'RSD', 'RTE', 'SFI', 'SSD', 'STN', 'TLB', 'TLL', 'TRF', 'TTM',
  'TUT', 'TXT', 'VBW', 'VDM', 'VDO', 'VDR', 'VHW', 'VLW', 'VPW', 'VSD',
  'VTG', 'VWR', 'WCV', 'WNC', 'WPL', 'XDR', 'XTE', 'XTR', 'ZDA', 'ZDL',
  'ZFO', 'ZTG',
] as const

export type SentenceType = typeof SENTENCE_TYPES[number]

export const SUPPORTED_SENTENCE_TYPES = [
  'AAM', 'ALM', 'APA', 'BOD', 'BWC', 'BWW', 'DBK', 'DBS', 'DBT', 'DPT',
  'GBS', 'GGA', 'GLL', 'GNS', 'GSA', 'GST', 'GSV', 'HDT', 'MDA', 'MTW',
  'MWD', 'MWV', 'RMC', 'RMZ', 'TTM', 'TXT', 'VHW', 'VTG', 'WNC', 'XDR',
  'ZDA', 'ZFO', 'ZTG',
] as const satisfies readonly SentenceType[]

export type SupportedSentenceType = typeof SUPPORTED_SENTENCE_TYPES[number]

export type Classification =
  | { known: true; type: SentenceType }
  | { known: false; messageId: string }

const known = new Set<string>(SENTENCE_TYPES)
const supported = new Set<string>(SUPPORTED_SENTENCE_TYPES)

export function isSentenceType(id: string): id is SentenceType {
  return known.has(id)
}

export function isSupported(type: SentenceType): type is SupportedSentenceType {
  return supported.has(type)
}

export function classifySentenceType(messageId: string): Classification {
  if (isSentenceType(messageId)) return { known: true, type: messageId }
  return { known: false, messageId }
}
