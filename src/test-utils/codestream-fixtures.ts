/**
 * Test Fixture Builders
 *
 * Synthesises JP2 boxes and codestream marker segments in memory so tests can
 * state exact offsets without binary files on disk.
 */

import type { ParseLogger } from '../types.js';

export function u8(value: number): Uint8Array {
  return new Uint8Array([value & 0xff]);
}

export function u16(value: number): Uint8Array {
  return new Uint8Array([(value >>> 8) & 0xff, value & 0xff]);
}

export function u32(value: number): Uint8Array {
  return new Uint8Array([(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff]);
}

export function u64(value: number): Uint8Array {
  return concat(u32(Math.floor(value / 0x100000000)), u32(value >>> 0));
}

/** ASCII bytes */
export function str(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) out[i] = text.charCodeAt(i) & 0xff;
  return out;
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Boxes
// ---------------------------------------------------------------------------

export function box(type: string, ...payload: Uint8Array[]): Uint8Array {
  const body = concat(...payload);
  return concat(u32(8 + body.length), str(type), body);
}

/** LBox = 1 with a 64-bit XLBox */
export function extendedBox(type: string, ...payload: Uint8Array[]): Uint8Array {
  const body = concat(...payload);
  return concat(u32(1), str(type), u64(16 + body.length), body);
}

/** LBox = 0: runs to the end of the enclosing scope */
export function toEndBox(type: string, ...payload: Uint8Array[]): Uint8Array {
  return concat(u32(0), str(type), ...payload);
}

export const signatureBox = (): Uint8Array => box('jP  ', bytes(0x0d, 0x0a, 0x87, 0x0a));

export function fileTypeBox(brand = 'jp2 ', compatibility: string[] = ['jp2 ']): Uint8Array {
  return box('ftyp', str(brand), u32(0), ...compatibility.map(str));
}

export interface ImageHeaderSpec {
  width?: number;
  height?: number;
  components?: number;
  bpc?: number;
}

export function imageHeaderBox(spec: ImageHeaderSpec = {}): Uint8Array {
  return box(
    'ihdr',
    u32(spec.height ?? 1),
    u32(spec.width ?? 1),
    u16(spec.components ?? 1),
    u8(spec.bpc ?? 7),
    u8(7),
    u8(0),
    u8(0)
  );
}

export function enumeratedColourBox(enumCS = 16): Uint8Array {
  return box('colr', u8(1), u8(0), u8(0), u32(enumCS));
}

// ---------------------------------------------------------------------------
// Codestream
// ---------------------------------------------------------------------------

/** Delimiting marker: the two code bytes only */
export function marker(code: number): Uint8Array {
  return u16(code);
}

/** Marker code, Lxxx = 2 + body length, body */
export function segment(code: number, ...body: Uint8Array[]): Uint8Array {
  const payload = concat(...body);
  return concat(u16(code), u16(2 + payload.length), payload);
}

export interface SizSpec {
  width?: number;
  height?: number;
  tileWidth?: number;
  tileHeight?: number;
  components?: number;
  /** Ssiz byte (precision - 1, high bit for signed) */
  ssiz?: number;
}

export function sizSegment(spec: SizSpec = {}): Uint8Array {
  const width = spec.width ?? 1;
  const height = spec.height ?? 1;
  const components = spec.components ?? 1;
  const perComponent: Uint8Array[] = [];
  for (let i = 0; i < components; i++) {
    perComponent.push(bytes(spec.ssiz ?? 7, 1, 1));
  }
  return segment(
    0xff51,
    u16(0),
    u32(width),
    u32(height),
    u32(0),
    u32(0),
    u32(spec.tileWidth ?? width),
    u32(spec.tileHeight ?? height),
    u32(0),
    u32(0),
    u16(components),
    ...perComponent
  );
}

export interface CodSpec {
  levels?: number;
  scod?: number;
  layers?: number;
  mct?: number;
  precincts?: number[];
}

export function codSegment(spec: CodSpec = {}): Uint8Array {
  const precincts = spec.precincts ?? [];
  const scod = spec.scod ?? (precincts.length > 0 ? 1 : 0);
  return segment(
    0xff52,
    u8(scod),
    u8(0),
    u16(spec.layers ?? 1),
    u8(spec.mct ?? 0),
    bytes(spec.levels ?? 0, 4, 4, 0, 1),
    bytes(...precincts)
  );
}

export function cocSegment(component: number, levels: number): Uint8Array {
  return segment(0xff53, u8(component), u8(0), bytes(levels, 4, 4, 0, 1));
}

export interface QuantizationSpec {
  /** 0 none, 1 scalar derived, 2 scalar expounded */
  style?: number;
  steps?: number;
  guardBits?: number;
}

function quantizationBody(spec: QuantizationSpec): Uint8Array {
  const style = spec.style ?? 0;
  const steps = spec.steps ?? 1;
  const parts: Uint8Array[] = [u8(((spec.guardBits ?? 2) << 5) | style)];
  for (let i = 0; i < steps; i++) {
    parts.push(style === 0 ? u8(0x48) : u16(0x4800));
  }
  return concat(...parts);
}

export function qcdSegment(spec: QuantizationSpec = {}): Uint8Array {
  return segment(0xff5c, quantizationBody(spec));
}

export function qccSegment(component: number, spec: QuantizationSpec = {}): Uint8Array {
  return segment(0xff5d, u8(component), quantizationBody(spec));
}

export interface SotSpec {
  tile?: number;
  psot: number;
  tpsot?: number;
  tnsot?: number;
}

export function sotSegment(spec: SotSpec): Uint8Array {
  return segment(0xff90, u16(spec.tile ?? 0), u32(spec.psot), u8(spec.tpsot ?? 0), u8(spec.tnsot ?? 1));
}

export interface TilePartSpec {
  tile?: number;
  tpsot?: number;
  tnsot?: number;
  /** Marker segments between SOT and SOD */
  header?: Uint8Array[];
  data?: Uint8Array;
  /** Write Psot = 0 instead of the real length */
  psotZero?: boolean;
}

/** SOT, header segments, SOD and data, with Psot computed */
export function tilePart(spec: TilePartSpec = {}): Uint8Array {
  const header = concat(...(spec.header ?? []));
  const data = spec.data ?? new Uint8Array(0);
  const psot = spec.psotZero ? 0 : 12 + header.length + 2 + data.length;
  return concat(
    sotSegment({ tile: spec.tile, psot, tpsot: spec.tpsot, tnsot: spec.tnsot }),
    header,
    marker(0xff93),
    data
  );
}

export interface CodestreamSpec {
  siz?: SizSpec;
  cod?: CodSpec;
  /** Main header segments after SIZ; replaces the default COD when given */
  main?: Uint8Array[];
  tileParts?: TilePartSpec[];
  eoc?: boolean;
}

/**
 * SOC, SIZ, COD (0 levels), one empty tile-part, EOC: 75 bytes.
 *
 * Offsets: SOC 0, SIZ 2, COD 45, SOT 59, SOD 71, EOC 73.
 */
export function minimalCodestream(spec: CodestreamSpec = {}): Uint8Array {
  const main = spec.main ?? [codSegment(spec.cod)];
  const parts = (spec.tileParts ?? [{}]).map((part) => tilePart(part));
  return concat(
    marker(0xff4f),
    sizSegment(spec.siz),
    ...main,
    ...parts,
    spec.eoc === false ? new Uint8Array(0) : marker(0xffd9)
  );
}

/**
 * Signature, file type, jp2h { ihdr 1x1 }, jp2c { codestream }.
 *
 * Offsets: jP 0 (12), ftyp 12 (20), jp2h 32 (30), jp2c 62; the codestream
 * starts at 70.
 */
export function minimalJp2(codestream: Uint8Array = minimalCodestream(), headerBoxes: Uint8Array[] = []): Uint8Array {
  return concat(
    signatureBox(),
    fileTypeBox(),
    box('jp2h', imageHeaderBox(), ...headerBoxes),
    box('jp2c', codestream)
  );
}

/**
 * Logger that records instead of printing
 */
export function recordingLogger(): ParseLogger & { warnings: string[]; debugLines: string[] } {
  const warnings: string[] = [];
  const debugLines: string[] = [];
  return {
    warnings,
    debugLines,
    warn: (message: string) => {
      warnings.push(message);
    },
    debug: (message: string) => {
      debugLines.push(message);
    }
  };
}
