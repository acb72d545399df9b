import { ByteCursor } from './byte-cursor.js';
import { BoxType, SUPERBOX_TYPES } from './box-types.js';
import { inconsistency, isStructuralError, missing } from './errors.js';
import {
  decodeBitsPerComponent,
  decodeChannelDefinition,
  decodeColourSpecification,
  decodeComponentMapping,
  decodeDataEntryUrl,
  decodeFileType,
  decodeImageHeader,
  decodePalette,
  decodeResolution,
  decodeSignature,
  decodeText,
  decodeUuid,
  decodeUuidList,
  type BoxDecodeContext
} from './jp2-boxes.js';
import { JpcParser } from './jpc-parser.js';
import type {
  Box,
  BoxLengthField,
  BoxRecord,
  ByteInput,
  ImageHeaderRecord,
  ParseOptions,
  ParseTree
} from './types.js';
import { debug, fourCCToString, readUInt32BE, resolveParseOptions, toBytes } from './utils.js';

/**
 * Decoded LBox/TBox/XLBox header
 */
interface BoxHeader {
  offset: number;
  type: string;
  typeCode: number;
  length: number;
  headerLength: 8 | 16;
  lengthField: BoxLengthField;
}

/**
 * Per-scope state while walking one box sequence
 */
interface ScopeState {
  /** Type of the enclosing box, or null at the top level */
  container: string | null;
  depth: number;
  seen: Map<string, number>;
  imageHeader?: ImageHeaderRecord;
}

/**
 * Boxes that may appear at most once inside their container
 */
const UNIQUE_CHILDREN: Readonly<Record<string, readonly string[]>> = {
  [BoxType.JP2_HEADER]: [
    BoxType.IMAGE_HEADER,
    BoxType.BITS_PER_COMPONENT,
    BoxType.PALETTE,
    BoxType.COMPONENT_MAPPING,
    BoxType.CHANNEL_DEFINITION,
    BoxType.RESOLUTION
  ],
  [BoxType.RESOLUTION]: [BoxType.CAPTURE_RESOLUTION, BoxType.DISPLAY_RESOLUTION],
  [BoxType.UUID_INFO]: [BoxType.UUID_LIST, BoxType.DATA_ENTRY_URL]
};

const TOP_LEVEL_UNIQUE: readonly string[] = [BoxType.SIGNATURE, BoxType.FILE_TYPE, BoxType.JP2_HEADER];

/**
 * Recursive-descent parser for the JP2 box container.
 *
 * Each box is parsed through a sub-cursor bounded by its declared length, so a
 * decoder can never read into its sibling. Contiguous codestream boxes are
 * handed to {@link JpcParser}; unrecognised types are kept as opaque boxes.
 */
export class Jp2Parser {
  private readonly data: Uint8Array;
  private readonly options: Required<ParseOptions>;

  constructor(data: Uint8Array, options: ParseOptions = {}) {
    this.data = data;
    this.options = resolveParseOptions(options);
  }

  /**
   * Parse the whole buffer as a JP2 file
   */
  parse(): ParseTree {
    const cursor = new ByteCursor(this.data);
    const boxes = this.parseSequence(cursor, { container: null, depth: 0, seen: new Map() });
    return { format: 'jp2', span: { offset: 0, length: this.data.length }, boxes };
  }

  /**
   * Parse boxes until the cursor's scope is exhausted
   */
  parseSequence(cursor: ByteCursor, scope: ScopeState): Box[] {
    if (scope.depth > this.options.maxDepth) {
      throw inconsistency(
        `box nesting deeper than ${this.options.maxDepth} levels`,
        cursor.start,
        scope.container ?? undefined
      );
    }

    const boxes: Box[] = [];
    while (!cursor.atEnd()) {
      this.checkLeadingBox(cursor, scope, boxes.length);
      const header = this.readHeader(cursor);
      this.checkPlacement(header, scope, boxes.length);
      const box = this.parseBox(cursor, header, scope);
      boxes.push(box);
      cursor.seek(box.span.offset + box.span.length);
    }

    this.checkScopeComplete(cursor, scope, boxes);
    return boxes;
  }

  /**
   * The signature and file type boxes identify the file; fail fast without them
   */
  private checkLeadingBox(cursor: ByteCursor, scope: ScopeState, index: number): void {
    if (scope.container !== null || index > 1) return;
    const expected = index === 0 ? BoxType.SIGNATURE : BoxType.FILE_TYPE;
    const found = cursor.remaining() >= 8
      ? fourCCToString(readUInt32BE(cursor.peek(8), 4))
      : null;
    if (found !== expected) {
      const what = found === null ? 'end of data' : `box ${JSON.stringify(found)}`;
      throw missing(
        `${index === 0 ? 'signature' : 'file type'} box must be box ${index + 1}, found ${what}`,
        cursor.position,
        expected
      );
    }
  }

  private readHeader(cursor: ByteCursor): BoxHeader {
    const offset = cursor.position;
    const lbox = cursor.readU32();
    const typeCode = cursor.readU32();
    const type = fourCCToString(typeCode);
    const available = cursor.end - offset;

    if (lbox === 1) {
      const xlbox = cursor.readU64();
      if (xlbox < 16n) {
        throw inconsistency(`extended box length ${xlbox} is smaller than its 16-byte header`, offset, type);
      }
      if (xlbox > BigInt(available)) {
        throw inconsistency(
          `extended box length ${xlbox} exceeds the ${available} byte(s) left in scope`,
          offset,
          type
        );
      }
      return { offset, type, typeCode, length: Number(xlbox), headerLength: 16, lengthField: 'extended' };
    }

    if (lbox === 0) {
      return { offset, type, typeCode, length: available, headerLength: 8, lengthField: 'to-end' };
    }

    if (lbox < 8) {
      throw inconsistency(`reserved box length ${lbox}`, offset, type);
    }
    if (lbox > available) {
      throw inconsistency(`box length ${lbox} exceeds the ${available} byte(s) left in scope`, offset, type);
    }
    return { offset, type, typeCode, length: lbox, headerLength: 8, lengthField: 'explicit' };
  }

  /**
   * Ordering and uniqueness rules of the enclosing scope
   */
  private checkPlacement(header: BoxHeader, scope: ScopeState, index: number): void {
    const { type, offset } = header;
    const unique = scope.container === null ? TOP_LEVEL_UNIQUE : UNIQUE_CHILDREN[scope.container];
    const previous = scope.seen.get(type);
    if (previous !== undefined && unique?.includes(type)) {
      throw inconsistency(`duplicate box, first seen at offset ${previous}`, offset, type);
    }
    if (previous === undefined) {
      scope.seen.set(type, offset);
    }

    if (scope.container === BoxType.JP2_HEADER && index === 0 && type !== BoxType.IMAGE_HEADER) {
      throw missing(`JP2 header must open with an image header box, found ${JSON.stringify(type)}`, offset, BoxType.IMAGE_HEADER);
    }
    if (scope.container === null && type === BoxType.CONTIGUOUS_CODESTREAM && !scope.seen.has(BoxType.JP2_HEADER)) {
      throw missing('JP2 header box must precede the first contiguous codestream box', offset, BoxType.JP2_HEADER);
    }
  }

  private checkScopeComplete(cursor: ByteCursor, scope: ScopeState, boxes: Box[]): void {
    switch (scope.container) {
      case null:
        if (boxes.length < 2) {
          this.checkLeadingBox(cursor, scope, boxes.length);
        }
        if (!scope.seen.has(BoxType.JP2_HEADER)) {
          throw missing('file has no JP2 header box', cursor.end, BoxType.JP2_HEADER);
        }
        if (!scope.seen.has(BoxType.CONTIGUOUS_CODESTREAM)) {
          throw missing('file has no contiguous codestream box', cursor.end, BoxType.CONTIGUOUS_CODESTREAM);
        }
        break;
      case BoxType.JP2_HEADER: {
        if (boxes.length === 0) {
          throw missing('JP2 header box is empty', cursor.start, BoxType.IMAGE_HEADER);
        }
        const { logger } = this.options;
        if (!scope.seen.has(BoxType.COLOUR_SPECIFICATION)) {
          logger.warn(`JP2 header at offset ${cursor.start} has no colour specification box`);
        }
        if (scope.seen.has(BoxType.PALETTE) !== scope.seen.has(BoxType.COMPONENT_MAPPING)) {
          logger.warn(`JP2 header at offset ${cursor.start} has a palette or component mapping box without the other`);
        }
        break;
      }
      case BoxType.RESOLUTION:
        if (boxes.length === 0) {
          throw missing('resolution box contains neither capture nor display resolution', cursor.start, BoxType.CAPTURE_RESOLUTION);
        }
        break;
      default:
        break;
    }
  }

  private parseBox(scopeCursor: ByteCursor, header: BoxHeader, scope: ScopeState): Box {
    const span = { offset: header.offset, length: header.length };
    const payloadSpan = { offset: header.offset + header.headerLength, length: header.length - header.headerLength };
    const payload = scopeCursor.subCursor(payloadSpan.offset, payloadSpan.length);
    const base = {
      type: header.type,
      typeCode: header.typeCode,
      lengthField: header.lengthField,
      headerLength: header.headerLength,
      span,
      payloadSpan
    };
    const { logger } = this.options;

    debug(logger, `${JSON.stringify(header.type)} box start at ${header.offset}, length ${header.length}`);

    let box: Box;
    if (SUPERBOX_TYPES.has(header.type)) {
      const children = this.parseSequence(payload, {
        container: header.type,
        depth: scope.depth + 1,
        seen: new Map()
      });
      box = { ...base, content: { kind: 'superbox', children } };
    } else if (header.type === BoxType.CONTIGUOUS_CODESTREAM) {
      const codestream = new JpcParser(this.data, this.options).parseCodestream(payload);
      box = { ...base, content: { kind: 'codestream', codestream } };
    } else {
      const record = this.decodeLeaf(header, payload, scope);
      if (record === null) {
        box = { ...base, content: { kind: 'opaque' } };
      } else {
        if (record.box === 'ihdr' && scope.container === BoxType.JP2_HEADER) {
          scope.imageHeader = record;
        }
        box = { ...base, content: { kind: 'record', record } };
      }
    }

    debug(logger, `${JSON.stringify(header.type)} box finish at ${header.offset + header.length}`);
    return box;
  }

  /**
   * Decode a leaf box with a known layout; null for unknown types
   */
  private decodeLeaf(header: BoxHeader, cursor: ByteCursor, scope: ScopeState): BoxRecord | null {
    const ctx: BoxDecodeContext = {
      logger: this.options.logger,
      boxOffset: header.offset,
      imageHeader: scope.imageHeader
    };

    let record: BoxRecord | null;
    try {
      record = this.dispatchLeaf(header.type, cursor, ctx);
    } catch (err) {
      if (isStructuralError(err) && err.kind === 'UnexpectedEof') {
        throw inconsistency(
          `box length ${header.length} is too short for its fields (read of ${err.requested ?? 0} byte(s) at ${err.offset})`,
          header.offset,
          header.type
        );
      }
      throw err;
    }

    if (record !== null && !cursor.atEnd()) {
      throw inconsistency(`${cursor.remaining()} byte(s) left over after the box fields`, header.offset, header.type);
    }
    return record;
  }

  private dispatchLeaf(type: string, cursor: ByteCursor, ctx: BoxDecodeContext): BoxRecord | null {
    switch (type) {
      case BoxType.SIGNATURE:
        return decodeSignature(cursor, ctx);
      case BoxType.FILE_TYPE:
        return decodeFileType(cursor, ctx);
      case BoxType.IMAGE_HEADER:
        return decodeImageHeader(cursor, ctx);
      case BoxType.BITS_PER_COMPONENT:
        return decodeBitsPerComponent(cursor, ctx);
      case BoxType.COLOUR_SPECIFICATION:
        return decodeColourSpecification(cursor, ctx);
      case BoxType.PALETTE:
        return decodePalette(cursor, ctx);
      case BoxType.COMPONENT_MAPPING:
        return decodeComponentMapping(cursor, ctx);
      case BoxType.CHANNEL_DEFINITION:
        return decodeChannelDefinition(cursor, ctx);
      case BoxType.CAPTURE_RESOLUTION:
      case BoxType.DISPLAY_RESOLUTION:
        return decodeResolution(type === BoxType.CAPTURE_RESOLUTION ? 'resc' : 'resd', cursor, ctx);
      case BoxType.XML:
      case BoxType.INTELLECTUAL_PROPERTY:
        return decodeText(type === BoxType.XML ? 'xml ' : 'jp2i', cursor);
      case BoxType.UUID:
        return decodeUuid(cursor);
      case BoxType.UUID_LIST:
        return decodeUuidList(cursor, ctx);
      case BoxType.DATA_ENTRY_URL:
        return decodeDataEntryUrl(cursor, ctx);
      default:
        return null;
    }
  }
}

/**
 * Parse a JP2 file into its box tree
 */
export function parseJp2(bytes: ByteInput, options?: ParseOptions): ParseTree {
  return new Jp2Parser(toBytes(bytes), options).parse();
}
