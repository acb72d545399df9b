import type { ByteCursor } from './byte-cursor.js';
import {
  BoxType,
  BRAND_JP2,
  COMPRESSION_TYPE_WAVELET,
  ENUMERATED_COLOURSPACES,
  ENUM_CS_CIEJAB,
  ENUM_CS_CIELAB
} from './box-types.js';
import { inconsistency } from './errors.js';
import type {
  BitDepth,
  BitsPerComponentRecord,
  ChannelDefinition,
  ChannelDefinitionRecord,
  ColourMethod,
  ColourSpecificationRecord,
  ComponentMapping,
  ComponentMappingRecord,
  DataEntryUrlRecord,
  FileTypeRecord,
  ImageHeaderRecord,
  PaletteRecord,
  ParseLogger,
  ResolutionRecord,
  SignatureRecord,
  TextRecord,
  UuidListRecord,
  UuidRecord
} from './types.js';
import { bytesToHex, decodeBitDepth, fourCCToString, JP2_SIGNATURE_MAGIC } from './utils.js';

/**
 * What a leaf decoder needs to know about its surroundings
 */
export interface BoxDecodeContext {
  readonly logger: ParseLogger;
  /** Offset of the whole box, for diagnostics */
  readonly boxOffset: number;
  /** Image header of the enclosing jp2h, once seen */
  readonly imageHeader?: ImageHeaderRecord;
}

const utf8 = new TextDecoder('utf-8');

function formatUuid(bytes: Uint8Array): string {
  const hex = bytesToHex(bytes);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export function decodeSignature(cursor: ByteCursor, ctx: BoxDecodeContext): SignatureRecord {
  const signature = cursor.readU32();
  if (signature !== JP2_SIGNATURE_MAGIC) {
    throw inconsistency(
      `signature box contents 0x${signature.toString(16).padStart(8, '0')} are not 0x0d0a870a`,
      ctx.boxOffset,
      BoxType.SIGNATURE
    );
  }
  return { box: 'jP  ', signature };
}

export function decodeFileType(cursor: ByteCursor, ctx: BoxDecodeContext): FileTypeRecord {
  const brand = fourCCToString(cursor.readU32());
  const minorVersion = cursor.readU32();
  if (cursor.remaining() % 4 !== 0) {
    throw inconsistency(
      `compatibility list of ${cursor.remaining()} byte(s) is not a whole number of entries`,
      ctx.boxOffset,
      BoxType.FILE_TYPE
    );
  }
  const compatibility: string[] = [];
  while (!cursor.atEnd()) {
    compatibility.push(fourCCToString(cursor.readU32()));
  }
  if (!compatibility.includes(BRAND_JP2)) {
    ctx.logger.warn(`File type box at offset ${ctx.boxOffset} does not list 'jp2 ' as compatible`);
  }
  return { box: 'ftyp', brand, minorVersion, compatibility };
}

export function decodeImageHeader(cursor: ByteCursor, ctx: BoxDecodeContext): ImageHeaderRecord {
  if (cursor.remaining() !== 14) {
    throw inconsistency(
      `image header payload is ${cursor.remaining()} byte(s), expected 14`,
      ctx.boxOffset,
      BoxType.IMAGE_HEADER
    );
  }
  const height = cursor.readU32();
  const width = cursor.readU32();
  const components = cursor.readU16();
  const bitsPerComponent = cursor.readU8();
  const compressionType = cursor.readU8();
  const colourspaceUnknown = cursor.readU8();
  const intellectualProperty = cursor.readU8();

  if (components === 0) {
    throw inconsistency('image header declares zero components', ctx.boxOffset, BoxType.IMAGE_HEADER);
  }
  if (compressionType !== COMPRESSION_TYPE_WAVELET) {
    ctx.logger.warn(`Image header at offset ${ctx.boxOffset} has compression type ${compressionType}, expected 7`);
  }

  return {
    box: 'ihdr',
    height,
    width,
    components,
    bitsPerComponent,
    depth: bitsPerComponent === 0xff ? undefined : decodeBitDepth(bitsPerComponent),
    compressionType,
    colourspaceUnknown,
    intellectualProperty
  };
}

export function decodeBitsPerComponent(cursor: ByteCursor, ctx: BoxDecodeContext): BitsPerComponentRecord {
  const header = ctx.imageHeader;
  if (header && cursor.remaining() !== header.components) {
    throw inconsistency(
      `bits per component box lists ${cursor.remaining()} component(s), image header declares ${header.components}`,
      ctx.boxOffset,
      BoxType.BITS_PER_COMPONENT
    );
  }
  if (header && header.bitsPerComponent !== 0xff) {
    ctx.logger.warn(`Bits per component box at offset ${ctx.boxOffset} present although image header BPC is not 255`);
  }
  const depths: BitDepth[] = [];
  while (!cursor.atEnd()) {
    depths.push(decodeBitDepth(cursor.readU8()));
  }
  return { box: 'bpcc', depths };
}

function decodeColourMethod(meth: number, cursor: ByteCursor, ctx: BoxDecodeContext): ColourMethod {
  switch (meth) {
    case 1: {
      const enumCS = cursor.readU32();
      const parameters: number[] = [];
      const expected = enumCS === ENUM_CS_CIELAB ? 7 : enumCS === ENUM_CS_CIEJAB ? 6 : 0;
      if (cursor.remaining() !== 0 && cursor.remaining() !== expected * 4) {
        throw inconsistency(
          `enumerated colourspace ${enumCS} followed by ${cursor.remaining()} unexpected byte(s)`,
          ctx.boxOffset,
          BoxType.COLOUR_SPECIFICATION
        );
      }
      while (!cursor.atEnd()) {
        parameters.push(cursor.readU32());
      }
      return { method: 'enumerated', enumCS, name: ENUMERATED_COLOURSPACES.get(enumCS), parameters };
    }
    case 2:
    case 3: {
      const start = cursor.position;
      cursor.skip(cursor.remaining());
      return { method: meth === 2 ? 'restricted-icc' : 'any-icc', profile: cursor.spanFrom(start) };
    }
    case 4: {
      const vendorCode = formatUuid(cursor.readBytes(16));
      const start = cursor.position;
      cursor.skip(cursor.remaining());
      return { method: 'vendor', vendorCode, parameters: cursor.spanFrom(start) };
    }
    case 5: {
      const colourPrimaries = cursor.readU16();
      const transferCharacteristics = cursor.readU16();
      const matrixCoefficients = cursor.readU16();
      const flags = cursor.readU8();
      return {
        method: 'parameterized',
        colourPrimaries,
        transferCharacteristics,
        matrixCoefficients,
        videoFullRange: (flags & 0x80) !== 0
      };
    }
    default: {
      const start = cursor.position;
      cursor.skip(cursor.remaining());
      return { method: 'reserved', data: cursor.spanFrom(start) };
    }
  }
}

export function decodeColourSpecification(cursor: ByteCursor, ctx: BoxDecodeContext): ColourSpecificationRecord {
  const meth = cursor.readU8();
  const precedence = cursor.readI8();
  const approximation = cursor.readU8();
  if (precedence !== 0) {
    ctx.logger.warn(`Colour specification at offset ${ctx.boxOffset} has precedence ${precedence}, expected 0`);
  }
  if (approximation !== 0) {
    ctx.logger.warn(`Colour specification at offset ${ctx.boxOffset} has approximation ${approximation}, expected 0`);
  }
  const colour = decodeColourMethod(meth, cursor, ctx);
  return { box: 'colr', meth, precedence, approximation, colour };
}

/**
 * Read an unsigned big-endian value of 1 to 5 bytes
 */
function readVariableWidth(cursor: ByteCursor, bytes: number): number {
  let value = 0;
  for (let i = 0; i < bytes; i++) {
    value = value * 256 + cursor.readU8();
  }
  return value;
}

export function decodePalette(cursor: ByteCursor, ctx: BoxDecodeContext): PaletteRecord {
  const entryCount = cursor.readU16();
  const columnCount = cursor.readU8();
  if (entryCount < 1 || entryCount > 1024) {
    throw inconsistency(`palette declares ${entryCount} entries, expected 1 to 1024`, ctx.boxOffset, BoxType.PALETTE);
  }
  if (columnCount < 1) {
    throw inconsistency('palette declares zero columns', ctx.boxOffset, BoxType.PALETTE);
  }
  const depths: BitDepth[] = [];
  for (let i = 0; i < columnCount; i++) {
    depths.push(decodeBitDepth(cursor.readU8()));
  }
  const entries: number[][] = [];
  for (let e = 0; e < entryCount; e++) {
    const row: number[] = [];
    for (const depth of depths) {
      row.push(readVariableWidth(cursor, Math.ceil(depth.bits / 8)));
    }
    entries.push(row);
  }
  return { box: 'pclr', entryCount, columnCount, depths, entries };
}

export function decodeComponentMapping(cursor: ByteCursor, ctx: BoxDecodeContext): ComponentMappingRecord {
  if (cursor.remaining() % 4 !== 0) {
    throw inconsistency(
      `component mapping payload of ${cursor.remaining()} byte(s) is not a multiple of 4`,
      ctx.boxOffset,
      BoxType.COMPONENT_MAPPING
    );
  }
  const mappings: ComponentMapping[] = [];
  while (!cursor.atEnd()) {
    mappings.push({
      component: cursor.readU16(),
      mappingType: cursor.readU8(),
      paletteColumn: cursor.readU8()
    });
  }
  return { box: 'cmap', mappings };
}

export function decodeChannelDefinition(cursor: ByteCursor, ctx: BoxDecodeContext): ChannelDefinitionRecord {
  const count = cursor.readU16();
  if (cursor.remaining() !== count * 6) {
    throw inconsistency(
      `channel definition declares ${count} channel(s) but carries ${cursor.remaining()} byte(s)`,
      ctx.boxOffset,
      BoxType.CHANNEL_DEFINITION
    );
  }
  const channels: ChannelDefinition[] = [];
  for (let i = 0; i < count; i++) {
    channels.push({
      channel: cursor.readU16(),
      type: cursor.readU16(),
      association: cursor.readU16()
    });
  }
  return { box: 'cdef', channels };
}

export function decodeResolution(
  box: 'resc' | 'resd',
  cursor: ByteCursor,
  ctx: BoxDecodeContext
): ResolutionRecord {
  if (cursor.remaining() !== 10) {
    throw inconsistency(`resolution payload is ${cursor.remaining()} byte(s), expected 10`, ctx.boxOffset, box);
  }
  const verticalNumerator = cursor.readU16();
  const verticalDenominator = cursor.readU16();
  const horizontalNumerator = cursor.readU16();
  const horizontalDenominator = cursor.readU16();
  const verticalExponent = cursor.readI8();
  const horizontalExponent = cursor.readI8();
  if (verticalDenominator === 0 || horizontalDenominator === 0) {
    throw inconsistency('resolution denominator is zero', ctx.boxOffset, box);
  }
  return {
    box,
    verticalNumerator,
    verticalDenominator,
    horizontalNumerator,
    horizontalDenominator,
    verticalExponent,
    horizontalExponent,
    vertical: (verticalNumerator / verticalDenominator) * Math.pow(10, verticalExponent),
    horizontal: (horizontalNumerator / horizontalDenominator) * Math.pow(10, horizontalExponent)
  };
}

export function decodeText(box: 'xml ' | 'jp2i', cursor: ByteCursor): TextRecord {
  return { box, text: utf8.decode(cursor.readBytes(cursor.remaining())) };
}

export function decodeUuid(cursor: ByteCursor): UuidRecord {
  const uuid = formatUuid(cursor.readBytes(16));
  const start = cursor.position;
  cursor.skip(cursor.remaining());
  return { box: 'uuid', uuid, data: cursor.spanFrom(start) };
}

export function decodeUuidList(cursor: ByteCursor, ctx: BoxDecodeContext): UuidListRecord {
  const count = cursor.readU16();
  if (cursor.remaining() !== count * 16) {
    throw inconsistency(
      `UUID list declares ${count} ID(s) but carries ${cursor.remaining()} byte(s)`,
      ctx.boxOffset,
      BoxType.UUID_LIST
    );
  }
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(formatUuid(cursor.readBytes(16)));
  }
  return { box: 'ulst', ids };
}

export function decodeDataEntryUrl(cursor: ByteCursor, ctx: BoxDecodeContext): DataEntryUrlRecord {
  const version = cursor.readU8();
  const flags = cursor.readU24();
  const bytes = cursor.readBytes(cursor.remaining());
  const terminator = bytes.indexOf(0);
  if (terminator === -1) {
    ctx.logger.warn(`Data entry URL at offset ${ctx.boxOffset} is not null-terminated`);
  }
  const location = utf8.decode(terminator === -1 ? bytes : bytes.subarray(0, terminator));
  return { box: 'url ', version, flags, location };
}
