/**
 * JPEG 2000 codestream marker codes (ISO/IEC 15444-1 Table A.2)
 */
export const MarkerCode = {
  SOC: 0xff4f,
  SOT: 0xff90,
  SOD: 0xff93,
  EOC: 0xffd9,
  SIZ: 0xff51,
  COD: 0xff52,
  COC: 0xff53,
  RGN: 0xff5e,
  QCD: 0xff5c,
  QCC: 0xff5d,
  POC: 0xff5f,
  TLM: 0xff55,
  PLM: 0xff57,
  PLT: 0xff58,
  PPM: 0xff60,
  PPT: 0xff61,
  SOP: 0xff91,
  EPH: 0xff92,
  CRG: 0xff63,
  COM: 0xff64
} as const;

export type MarkerName = keyof typeof MarkerCode;

const NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(MarkerCode).map(([name, code]): [number, string] => [code, name])
);

/**
 * Mnemonic for a marker code, or 'unknown'
 */
export function markerName(code: number): string {
  return NAMES.get(code) ?? 'unknown';
}

/**
 * Markers that consist of the two code bytes only
 */
export function isDelimiter(code: number): boolean {
  return code === MarkerCode.SOC || code === MarkerCode.SOD || code === MarkerCode.EOC || code === MarkerCode.EPH;
}

/**
 * 0xFF30..0xFF3F are reserved without a marker segment
 */
export function isSegmentless(code: number): boolean {
  return isDelimiter(code) || (code >= 0xff30 && code <= 0xff3f);
}

/** Allowed in the main header only */
export const MAIN_ONLY: ReadonlySet<number> = new Set([
  MarkerCode.SIZ,
  MarkerCode.TLM,
  MarkerCode.PLM,
  MarkerCode.PPM,
  MarkerCode.CRG
]);

/** Allowed in tile-part headers only */
export const TILE_ONLY: ReadonlySet<number> = new Set([MarkerCode.PLT, MarkerCode.PPT]);

/** Tile-part header markers restricted to the first tile-part of a tile */
export const FIRST_TILE_PART_ONLY: ReadonlySet<number> = new Set([
  MarkerCode.COD,
  MarkerCode.COC,
  MarkerCode.QCD,
  MarkerCode.QCC,
  MarkerCode.RGN
]);

/** Only meaningful inside packet data */
export const IN_BIT_STREAM: ReadonlySet<number> = new Set([MarkerCode.SOP, MarkerCode.EPH]);
