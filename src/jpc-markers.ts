import type { ByteCursor } from './byte-cursor.js';
import { inconsistency } from './errors.js';
import type {
  CocFields,
  CodFields,
  CodingStyleParameters,
  ComFields,
  CrgFields,
  PlmFields,
  PltFields,
  PocFields,
  PpmFields,
  PptFields,
  ProgressionChange,
  QccFields,
  QcdFields,
  QuantizationParameters,
  QuantizationStep,
  RgnFields,
  SizComponent,
  SizFields,
  SotFields,
  TileLength,
  TlmFields
} from './types.js';

/**
 * What a segment decoder needs besides its own bytes
 */
export interface SegmentContext {
  /** Offset of the marker code */
  readonly offset: number;
  /** Csiz from SIZ; selects the width of component indices */
  readonly components: number;
}

export const MAX_COMPONENTS = 16384;
export const MAX_DECOMPOSITION_LEVELS = 32;
export const MAX_PRECISION = 38;
export const MAX_PROGRESSION_ORDER = 4;

const latin1 = new TextDecoder('latin1');

/**
 * Component indices are one byte when Csiz < 257, two otherwise
 */
export function componentIndexWidth(components: number): 1 | 2 {
  return components < 257 ? 1 : 2;
}

function readComponentIndex(cursor: ByteCursor, components: number): number {
  return componentIndexWidth(components) === 1 ? cursor.readU8() : cursor.readU16();
}

function checkComponent(component: number, ctx: SegmentContext, node: string): void {
  if (component >= ctx.components) {
    throw inconsistency(`component index ${component} is not below Csiz ${ctx.components}`, ctx.offset, node);
  }
}

export function decodeSiz(cursor: ByteCursor, ctx: SegmentContext): SizFields {
  const rsiz = cursor.readU16();
  const xsiz = cursor.readU32();
  const ysiz = cursor.readU32();
  const xOsiz = cursor.readU32();
  const yOsiz = cursor.readU32();
  const xTsiz = cursor.readU32();
  const yTsiz = cursor.readU32();
  const xTOsiz = cursor.readU32();
  const yTOsiz = cursor.readU32();
  const csiz = cursor.readU16();

  if (csiz < 1 || csiz > MAX_COMPONENTS) {
    throw inconsistency(`Csiz ${csiz} outside 1..${MAX_COMPONENTS}`, ctx.offset, 'SIZ');
  }
  if (cursor.remaining() !== 3 * csiz) {
    throw inconsistency(
      `Lsiz leaves ${cursor.remaining()} byte(s) for ${csiz} component(s), expected ${3 * csiz}`,
      ctx.offset,
      'SIZ'
    );
  }
  if (xTsiz === 0 || yTsiz === 0) {
    throw inconsistency(`tile size ${xTsiz}x${yTsiz} is empty`, ctx.offset, 'SIZ');
  }
  if (xsiz <= xOsiz || ysiz <= yOsiz) {
    throw inconsistency(`image area ${xOsiz},${yOsiz}..${xsiz},${ysiz} is empty`, ctx.offset, 'SIZ');
  }
  if (xTOsiz > xOsiz || yTOsiz > yOsiz || xOsiz >= xTOsiz + xTsiz || yOsiz >= yTOsiz + yTsiz) {
    throw inconsistency('first tile does not overlap the image area', ctx.offset, 'SIZ');
  }

  const components: SizComponent[] = [];
  for (let i = 0; i < csiz; i++) {
    const ssiz = cursor.readU8();
    const xRsiz = cursor.readU8();
    const yRsiz = cursor.readU8();
    const precision = (ssiz & 0x7f) + 1;
    if (precision > MAX_PRECISION) {
      throw inconsistency(`component ${i} precision ${precision} exceeds ${MAX_PRECISION}`, ctx.offset, 'SIZ');
    }
    if (xRsiz === 0 || yRsiz === 0) {
      throw inconsistency(`component ${i} has a zero subsampling factor`, ctx.offset, 'SIZ');
    }
    components.push({ ssiz, precision, signed: (ssiz & 0x80) !== 0, xRsiz, yRsiz });
  }

  return {
    type: 'SIZ',
    rsiz,
    xsiz,
    ysiz,
    xOsiz,
    yOsiz,
    xTsiz,
    yTsiz,
    xTOsiz,
    yTOsiz,
    csiz,
    components,
    tilesX: Math.ceil((xsiz - xTOsiz) / xTsiz),
    tilesY: Math.ceil((ysiz - yTOsiz) / yTsiz)
  };
}

/**
 * SPcod / SPcoc; precinct sizes follow when bit 0 of Scod/Scoc is set
 */
function decodeCodingStyleParameters(
  cursor: ByteCursor,
  withPrecincts: boolean,
  ctx: SegmentContext,
  node: string
): CodingStyleParameters {
  const decompositionLevels = cursor.readU8();
  const codeBlockWidthExponent = cursor.readU8();
  const codeBlockHeightExponent = cursor.readU8();
  const codeBlockStyle = cursor.readU8();
  const transformation = cursor.readU8();

  if (decompositionLevels > MAX_DECOMPOSITION_LEVELS) {
    throw inconsistency(
      `${decompositionLevels} decomposition levels exceed ${MAX_DECOMPOSITION_LEVELS}`,
      ctx.offset,
      node
    );
  }
  if (codeBlockWidthExponent > 8 || codeBlockHeightExponent > 8 || codeBlockWidthExponent + codeBlockHeightExponent > 8) {
    throw inconsistency(
      `code-block exponents xcb=${codeBlockWidthExponent} ycb=${codeBlockHeightExponent} are out of range`,
      ctx.offset,
      node
    );
  }

  if (!withPrecincts) {
    return { decompositionLevels, codeBlockWidthExponent, codeBlockHeightExponent, codeBlockStyle, transformation };
  }
  const precincts: number[] = [];
  for (let r = 0; r <= decompositionLevels; r++) {
    precincts.push(cursor.readU8());
  }
  return {
    decompositionLevels,
    codeBlockWidthExponent,
    codeBlockHeightExponent,
    codeBlockStyle,
    transformation,
    precincts
  };
}

export function decodeCod(cursor: ByteCursor, ctx: SegmentContext): CodFields {
  const scod = cursor.readU8();
  const progressionOrder = cursor.readU8();
  const layers = cursor.readU16();
  const multipleComponentTransform = cursor.readU8();

  if (progressionOrder > MAX_PROGRESSION_ORDER) {
    throw inconsistency(`unknown progression order ${progressionOrder}`, ctx.offset, 'COD');
  }
  if (layers === 0) {
    throw inconsistency('number of layers is zero', ctx.offset, 'COD');
  }
  if (multipleComponentTransform > 1) {
    throw inconsistency(`unknown multiple component transform ${multipleComponentTransform}`, ctx.offset, 'COD');
  }
  if (multipleComponentTransform === 1 && ctx.components < 3) {
    throw inconsistency(
      `multiple component transform needs 3 components, image has ${ctx.components}`,
      ctx.offset,
      'COD'
    );
  }

  const parameters = decodeCodingStyleParameters(cursor, (scod & 0x01) !== 0, ctx, 'COD');
  return { type: 'COD', scod, progressionOrder, layers, multipleComponentTransform, parameters };
}

export function decodeCoc(cursor: ByteCursor, ctx: SegmentContext): CocFields {
  const component = readComponentIndex(cursor, ctx.components);
  checkComponent(component, ctx, 'COC');
  const scoc = cursor.readU8();
  const parameters = decodeCodingStyleParameters(cursor, (scoc & 0x01) !== 0, ctx, 'COC');
  return { type: 'COC', component, scoc, parameters };
}

/**
 * Sqcd/Sqcc followed by SPqcd/SPqcc; the step count is checked against the
 * governing decomposition levels once the header is complete
 */
function decodeQuantization(cursor: ByteCursor, ctx: SegmentContext, node: string): QuantizationParameters {
  const sq = cursor.readU8();
  const guardBits = sq >> 5;
  const style = sq & 0x1f;
  const steps: QuantizationStep[] = [];

  if (style === 0) {
    while (!cursor.atEnd()) {
      const raw = cursor.readU8();
      steps.push({ raw, exponent: raw >> 3 });
    }
  } else if (style === 1 || style === 2) {
    if (cursor.remaining() % 2 !== 0) {
      throw inconsistency(`odd number of bytes (${cursor.remaining()}) for 16-bit step sizes`, ctx.offset, node);
    }
    while (!cursor.atEnd()) {
      const raw = cursor.readU16();
      steps.push({ raw, exponent: raw >> 11, mantissa: raw & 0x7ff });
    }
  } else {
    throw inconsistency(`unknown quantization style ${style}`, ctx.offset, node);
  }

  if (steps.length === 0) {
    throw inconsistency('no quantization step sizes', ctx.offset, node);
  }
  return { sq, guardBits, style, steps };
}

export function decodeQcd(cursor: ByteCursor, ctx: SegmentContext): QcdFields {
  return { type: 'QCD', quantization: decodeQuantization(cursor, ctx, 'QCD') };
}

export function decodeQcc(cursor: ByteCursor, ctx: SegmentContext): QccFields {
  const component = readComponentIndex(cursor, ctx.components);
  checkComponent(component, ctx, 'QCC');
  return { type: 'QCC', component, quantization: decodeQuantization(cursor, ctx, 'QCC') };
}

export function decodeRgn(cursor: ByteCursor, ctx: SegmentContext): RgnFields {
  const component = readComponentIndex(cursor, ctx.components);
  checkComponent(component, ctx, 'RGN');
  const style = cursor.readU8();
  const shift = cursor.readU8();
  if (style !== 0) {
    throw inconsistency(`unknown region-of-interest style ${style}`, ctx.offset, 'RGN');
  }
  return { type: 'RGN', component, style, shift };
}

export function decodePoc(cursor: ByteCursor, ctx: SegmentContext): PocFields {
  const width = componentIndexWidth(ctx.components);
  const entrySize = 5 + 2 * width;
  if (cursor.remaining() === 0 || cursor.remaining() % entrySize !== 0) {
    throw inconsistency(
      `${cursor.remaining()} byte(s) are not a whole number of ${entrySize}-byte progression changes`,
      ctx.offset,
      'POC'
    );
  }

  const changes: ProgressionChange[] = [];
  while (!cursor.atEnd()) {
    const resolutionStart = cursor.readU8();
    const componentStart = readComponentIndex(cursor, ctx.components);
    const layerEnd = cursor.readU16();
    const resolutionEnd = cursor.readU8();
    const rawComponentEnd = readComponentIndex(cursor, ctx.components);
    const progressionOrder = cursor.readU8();
    // CEpoc = 0 stands for 256 when indices are one byte
    const componentEnd = width === 1 && rawComponentEnd === 0 ? 256 : rawComponentEnd;

    const index = changes.length;
    if (resolutionStart >= resolutionEnd || resolutionEnd > MAX_DECOMPOSITION_LEVELS + 1) {
      throw inconsistency(`progression change ${index} has resolutions ${resolutionStart}..${resolutionEnd}`, ctx.offset, 'POC');
    }
    if (componentStart >= componentEnd || componentStart >= ctx.components) {
      throw inconsistency(`progression change ${index} has components ${componentStart}..${componentEnd}`, ctx.offset, 'POC');
    }
    if (progressionOrder > MAX_PROGRESSION_ORDER) {
      throw inconsistency(`progression change ${index} has unknown order ${progressionOrder}`, ctx.offset, 'POC');
    }
    changes.push({ resolutionStart, componentStart, layerEnd, resolutionEnd, componentEnd, progressionOrder });
  }
  return { type: 'POC', changes };
}

export function decodeTlm(cursor: ByteCursor, ctx: SegmentContext): TlmFields {
  const index = cursor.readU8();
  const stlm = cursor.readU8();
  const tileBytes = (stlm >> 4) & 0x03;
  const lengthBytes = (stlm & 0x40) !== 0 ? 4 : 2;
  if (tileBytes === 3) {
    throw inconsistency('reserved tile index size ST = 3', ctx.offset, 'TLM');
  }
  const entrySize = tileBytes + lengthBytes;
  if (cursor.remaining() % entrySize !== 0) {
    throw inconsistency(
      `${cursor.remaining()} byte(s) are not a whole number of ${entrySize}-byte entries`,
      ctx.offset,
      'TLM'
    );
  }

  const entries: TileLength[] = [];
  while (!cursor.atEnd()) {
    let tile: number | undefined;
    if (tileBytes === 1) tile = cursor.readU8();
    else if (tileBytes === 2) tile = cursor.readU16();
    const length = lengthBytes === 4 ? cursor.readU32() : cursor.readU16();
    entries.push(tile === undefined ? { length } : { tile, length });
  }
  return { type: 'TLM', index, stlm, entries };
}

/**
 * Packet lengths are written seven bits per byte, most significant first,
 * with bit 7 set on every byte but the last.
 */
export function readPacketLengths(cursor: ByteCursor, offset: number, node: string): number[] {
  const lengths: number[] = [];
  let value = 0;
  let pending = false;
  while (!cursor.atEnd()) {
    const byte = cursor.readU8();
    value = value * 128 + (byte & 0x7f);
    pending = (byte & 0x80) !== 0;
    if (!pending) {
      lengths.push(value);
      value = 0;
    }
  }
  if (pending) {
    throw inconsistency('last packet length is unterminated', offset, node);
  }
  return lengths;
}

export function decodePlm(cursor: ByteCursor, ctx: SegmentContext): PlmFields {
  const index = cursor.readU8();
  const runs: number[][] = [];
  while (!cursor.atEnd()) {
    const count = cursor.readU8();
    runs.push(readPacketLengths(cursor.subCursor(cursor.position, count), ctx.offset, 'PLM'));
    cursor.skip(count);
  }
  return { type: 'PLM', index, runs };
}

export function decodePlt(cursor: ByteCursor, ctx: SegmentContext): PltFields {
  const index = cursor.readU8();
  return { type: 'PLT', index, packetLengths: readPacketLengths(cursor, ctx.offset, 'PLT') };
}

export function decodePpm(cursor: ByteCursor): PpmFields {
  const index = cursor.readU8();
  const start = cursor.position;
  cursor.skip(cursor.remaining());
  return { type: 'PPM', index, data: cursor.spanFrom(start) };
}

export function decodePpt(cursor: ByteCursor): PptFields {
  const index = cursor.readU8();
  const start = cursor.position;
  cursor.skip(cursor.remaining());
  return { type: 'PPT', index, data: cursor.spanFrom(start) };
}

export function decodeCrg(cursor: ByteCursor, ctx: SegmentContext): CrgFields {
  if (cursor.remaining() !== 4 * ctx.components) {
    throw inconsistency(
      `${cursor.remaining()} byte(s) for ${ctx.components} component offset(s), expected ${4 * ctx.components}`,
      ctx.offset,
      'CRG'
    );
  }
  const offsets: { x: number; y: number }[] = [];
  for (let i = 0; i < ctx.components; i++) {
    offsets.push({ x: cursor.readU16(), y: cursor.readU16() });
  }
  return { type: 'CRG', offsets };
}

export function decodeCom(cursor: ByteCursor): ComFields {
  const registration = cursor.readU16();
  const start = cursor.position;
  const bytes = cursor.readBytes(cursor.remaining());
  const data = cursor.spanFrom(start);
  return registration === 1
    ? { type: 'COM', registration, text: latin1.decode(bytes), data }
    : { type: 'COM', registration, data };
}

export function decodeSot(cursor: ByteCursor): SotFields {
  return {
    type: 'SOT',
    tileIndex: cursor.readU16(),
    tilePartLength: cursor.readU32(),
    tilePartIndex: cursor.readU8(),
    tilePartCount: cursor.readU8()
  };
}
