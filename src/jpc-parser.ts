import { ByteCursor } from './byte-cursor.js';
import { CodingParameters } from './coding-parameters.js';
import { inconsistency, isStructuralError, missing, outOfScope } from './errors.js';
import {
  decodeCoc,
  decodeCod,
  decodeCom,
  decodeCrg,
  decodePlm,
  decodePlt,
  decodePoc,
  decodePpm,
  decodePpt,
  decodeQcc,
  decodeQcd,
  decodeRgn,
  decodeSiz,
  decodeSot,
  decodeTlm,
  type SegmentContext
} from './jpc-markers.js';
import {
  FIRST_TILE_PART_ONLY,
  IN_BIT_STREAM,
  isSegmentless,
  MAIN_ONLY,
  MarkerCode,
  markerName,
  TILE_ONLY
} from './marker-codes.js';
import { probePackets, type PacketProbeResult } from './packet-probe.js';
import { packetLayouts, type PacketLayout } from './tile-geometry.js';
import type {
  ByteInput,
  ByteSpan,
  Codestream,
  Marker,
  MarkerFields,
  MarkerScope,
  ParseOptions,
  ParseTree,
  SotFields
} from './types.js';
import { debug, formatMarkerCode, resolveParseOptions, toBytes } from './utils.js';

/** Lsot is fixed */
const SOT_SEGMENT_LENGTH = 10;
/** SOT marker segment plus SOD: the smallest non-zero Psot */
const MIN_TILE_PART_LENGTH = 14;

/**
 * State of one tile-part while its header is read
 */
interface TilePart {
  readonly sot: SotFields;
  readonly offset: number;
  /** Offset just past the tile-part, or undefined when Psot = 0 */
  readonly end?: number;
  readonly packetLengths: number[];
}

/**
 * Single-pass parser for a JPEG 2000 codestream (ISO/IEC 15444-1 Annex A).
 *
 * Walks Main Header, then (Tile-Part Header, Tile-Part Data)+ until EOC,
 * enforcing marker placement and cross-checking segment fields against SIZ
 * and the coding parameters in force. One instance parses one codestream.
 */
export class JpcParser {
  private readonly data: Uint8Array;
  private readonly options: Required<ParseOptions>;

  private markers: Marker[] = [];
  private params?: CodingParameters;
  private mainSeen = new Set<number>();
  private tilePartCounts = new Map<number, number>();
  private tilesWithPpt = new Set<number>();
  private tilesWithPoc = new Set<number>();
  /** Remaining packets of each tile, while their precinct layout is known */
  private tileLayouts = new Map<number, Iterator<PacketLayout>>();

  constructor(data: Uint8Array, options: ParseOptions = {}) {
    this.data = data;
    this.options = resolveParseOptions(options);
  }

  /**
   * Parse the codestream occupying the cursor's whole scope
   */
  parseCodestream(cursor: ByteCursor): Codestream {
    this.markers = [];
    this.params = undefined;
    this.mainSeen = new Set();
    this.tilePartCounts = new Map();
    this.tilesWithPpt = new Set();
    this.tilesWithPoc = new Set();
    this.tileLayouts = new Map();

    const span: ByteSpan = { offset: cursor.start, length: cursor.end - cursor.start };
    debug(this.options.logger, `codestream start at ${span.offset}, length ${span.length}`);

    this.parseMainHeader(cursor);

    let code: number = MarkerCode.SOT;
    while (code === MarkerCode.SOT) {
      this.parseTilePart(cursor);
      code = this.nextMarker(cursor);
      if (code !== MarkerCode.SOT && code !== MarkerCode.EOC) {
        throw outOfScope(
          `${describe(code)} after tile-part data; only SOT or EOC may follow`,
          cursor.position - 2,
          markerName(code)
        );
      }
    }

    this.push(MarkerCode.EOC, 'end', { offset: cursor.position - 2, length: 2 }, { type: 'EOC' });

    let trailing: ByteSpan | undefined;
    if (!cursor.atEnd()) {
      trailing = { offset: cursor.position, length: cursor.remaining() };
      this.options.logger.warn(
        `${trailing.length} byte(s) after EOC at offset ${trailing.offset - 2} are ignored`
      );
    }

    debug(this.options.logger, `codestream finish at ${cursor.end}, ${this.markers.length} markers`);
    const markers = this.markers;
    return trailing ? { span, markers, trailing } : { span, markers };
  }

  private parseMainHeader(cursor: ByteCursor): void {
    if (cursor.remaining() < 2 || cursor.peekU16() !== MarkerCode.SOC) {
      throw missing('codestream does not start with SOC', cursor.position, 'SOC');
    }
    cursor.skip(2);
    this.push(MarkerCode.SOC, 'main', { offset: cursor.position - 2, length: 2 }, { type: 'SOC' });

    let code = this.nextMarker(cursor);
    if (code !== MarkerCode.SIZ) {
      throw missing(`SIZ must directly follow SOC, found ${describe(code)}`, cursor.position - 2, 'SIZ');
    }
    const sizMarker = this.parseSegment(cursor, code, 'main');
    if (sizMarker.fields.type !== 'SIZ') {
      throw inconsistency('SIZ segment did not decode as SIZ', sizMarker.span.offset, 'SIZ');
    }
    const params = new CodingParameters(sizMarker.fields);
    this.params = params;
    this.mainSeen.add(MarkerCode.SIZ);

    for (;;) {
      code = this.nextMarker(cursor);
      const offset = cursor.position - 2;
      if (code === MarkerCode.SOT) break;
      if (code === MarkerCode.EOC) {
        throw missing('codestream ends before its first tile-part', offset, 'SOT');
      }
      this.checkMainHeaderMarker(code, offset);
      this.parseSegment(cursor, code, 'main');
    }

    if (!params.hasMainCod) {
      throw missing('main header has no COD', cursor.position - 2, 'COD');
    }
    if (!params.hasMainQcd) {
      this.options.logger.warn(`main header ending at offset ${cursor.position - 2} has no QCD`);
    }
    params.validateQuantization();
  }

  private checkMainHeaderMarker(code: number, offset: number): void {
    const name = markerName(code);
    if (code === MarkerCode.SOC || code === MarkerCode.SOD) {
      throw outOfScope(`${name} inside the main header`, offset, name);
    }
    if (TILE_ONLY.has(code)) {
      throw outOfScope(`${name} is only allowed in a tile-part header`, offset, name);
    }
    if (IN_BIT_STREAM.has(code)) {
      throw outOfScope(`${name} is only allowed inside packet data`, offset, name);
    }
    if ((code === MarkerCode.SIZ || code === MarkerCode.CRG) && this.mainSeen.has(code)) {
      throw inconsistency(`duplicate ${name} in the main header`, offset, name);
    }
    this.mainSeen.add(code);
  }

  /**
   * Tile-part header and data; the cursor sits just after the SOT code
   */
  private parseTilePart(cursor: ByteCursor): void {
    const params = this.requireParams(cursor.position - 2);
    const sotMarker = this.parseSegment(cursor, MarkerCode.SOT, 'tile-part-header');
    if (sotMarker.fields.type !== 'SOT') {
      throw inconsistency('SOT segment did not decode as SOT', sotMarker.span.offset, 'SOT');
    }
    const tilePart = this.checkSot(sotMarker, sotMarker.fields, params, cursor);
    const { tileIndex } = tilePart.sot;
    const firstPart = tilePart.sot.tilePartIndex === 0;

    for (;;) {
      const code = this.nextMarker(cursor);
      const offset = cursor.position - 2;
      const name = markerName(code);
      if (code === MarkerCode.SOD) break;
      if (code === MarkerCode.SOC) {
        throw outOfScope('SOC is only allowed at the start of the codestream', offset, name);
      }
      if (code === MarkerCode.SOT || code === MarkerCode.EOC) {
        throw missing(`tile-part header at offset ${tilePart.offset} ends at ${name} without SOD`, offset, 'SOD');
      }
      if (MAIN_ONLY.has(code)) {
        throw outOfScope(`${name} is only allowed in the main header`, offset, name);
      }
      if (IN_BIT_STREAM.has(code)) {
        throw outOfScope(`${name} is only allowed inside packet data`, offset, name);
      }
      if (!firstPart && FIRST_TILE_PART_ONLY.has(code)) {
        throw outOfScope(
          `${name} is only allowed in the first tile-part of a tile (this is tile-part ${tilePart.sot.tilePartIndex})`,
          offset,
          name
        );
      }

      const marker = this.parseSegment(cursor, code, 'tile-part-header', tileIndex);
      if (tilePart.end !== undefined && cursor.position > tilePart.end) {
        throw inconsistency('tile-part header runs past Psot', tilePart.offset, 'SOT');
      }
      if (marker.fields.type === 'PLT') {
        tilePart.packetLengths.push(...marker.fields.packetLengths);
      } else if (marker.fields.type === 'PPT') {
        this.tilesWithPpt.add(tileIndex);
      } else if (marker.fields.type === 'POC') {
        this.tilesWithPoc.add(tileIndex);
      }
    }

    if (firstPart) {
      params.validateQuantization(tileIndex);
      const style = params.tileCodingStyle(tileIndex);
      const layouts = style && packetLayouts(params.siz, tileIndex, style);
      if (layouts) {
        this.tileLayouts.set(tileIndex, layouts);
      }
    }
    this.parseTilePartData(cursor, tilePart);
  }

  private checkSot(marker: Marker, sot: SotFields, params: CodingParameters, cursor: ByteCursor): TilePart {
    const offset = marker.span.offset;
    if (marker.segmentLength !== SOT_SEGMENT_LENGTH) {
      throw inconsistency(`Lsot is ${marker.segmentLength ?? 0}, expected ${SOT_SEGMENT_LENGTH}`, offset, 'SOT');
    }
    if (sot.tileIndex >= params.tileCount) {
      throw inconsistency(`tile index ${sot.tileIndex} is not below the tile count ${params.tileCount}`, offset, 'SOT');
    }
    const earlier = this.tilePartCounts.get(sot.tileIndex) ?? 0;
    if (sot.tilePartIndex !== earlier) {
      throw inconsistency(
        `tile ${sot.tileIndex} part index ${sot.tilePartIndex} follows ${earlier} earlier part(s)`,
        offset,
        'SOT'
      );
    }
    if (sot.tilePartCount !== 0 && sot.tilePartIndex >= sot.tilePartCount) {
      throw inconsistency(
        `tile-part index ${sot.tilePartIndex} is not below the declared count ${sot.tilePartCount}`,
        offset,
        'SOT'
      );
    }
    if (sot.tilePartLength !== 0 && sot.tilePartLength < MIN_TILE_PART_LENGTH) {
      throw inconsistency(`Psot ${sot.tilePartLength} is smaller than ${MIN_TILE_PART_LENGTH}`, offset, 'SOT');
    }
    if (sot.tilePartLength !== 0 && offset + sot.tilePartLength > cursor.end) {
      throw inconsistency(
        `tile-part of ${sot.tilePartLength} byte(s) runs past the codestream end at ${cursor.end}`,
        offset,
        'SOT'
      );
    }
    this.tilePartCounts.set(sot.tileIndex, earlier + 1);

    return {
      sot,
      offset,
      end: sot.tilePartLength === 0 ? undefined : offset + sot.tilePartLength,
      packetLengths: []
    };
  }

  /**
   * The cursor sits just after SOD. With Psot = 0 the data runs to the EOC
   * that ends the codestream.
   */
  private parseTilePartData(cursor: ByteCursor, tilePart: TilePart): void {
    const sodOffset = cursor.position - 2;
    const dataStart = cursor.position;
    let dataEnd: number;

    if (tilePart.end !== undefined) {
      if (tilePart.end < dataStart) {
        throw inconsistency(`Psot ends the tile-part before its SOD at ${sodOffset}`, tilePart.offset, 'SOT');
      }
      dataEnd = tilePart.end;
    } else {
      // entropy-coded data never holds 0xFF followed by a byte above 0x8F
      const eoc = cursor.indexOfU16(MarkerCode.EOC);
      if (eoc < 0) {
        throw missing('codestream ends without EOC', cursor.end, 'EOC');
      }
      dataEnd = eoc;
    }

    const { tileIndex } = tilePart.sot;
    const dataSpan: ByteSpan = { offset: dataStart, length: dataEnd - dataStart };
    const headersInStream = !this.mainSeen.has(MarkerCode.PPM) && !this.tilesWithPpt.has(tileIndex);
    const ordered = !this.mainSeen.has(MarkerCode.POC) && !this.tilesWithPoc.has(tileIndex);
    const split: PacketProbeResult = this.options.probePackets
      ? probePackets({
          data: this.data,
          region: dataSpan,
          packetLengths: tilePart.packetLengths,
          headersInStream,
          layouts: ordered ? this.tileLayouts.get(tileIndex) : undefined
        })
      : { source: 'none', packets: [] };
    if (split.source === 'none' && dataSpan.length > 0) {
      // packets of this tile can no longer be counted
      this.tileLayouts.delete(tileIndex);
    }

    this.push(MarkerCode.SOD, 'tile-part-data', { offset: sodOffset, length: 2 }, {
      type: 'SOD',
      dataSpan,
      packetSource: split.source,
      packets: split.packets
    });
    cursor.seek(dataEnd);
  }

  /**
   * Read the next marker code. Running out of bytes here means the
   * codestream was never terminated.
   */
  private nextMarker(cursor: ByteCursor): number {
    if (cursor.atEnd()) {
      throw missing('codestream ends without EOC', cursor.position, 'EOC');
    }
    const offset = cursor.position;
    const code = cursor.readU16();
    if (code < 0xff01) {
      throw inconsistency(`expected a marker, found ${formatMarkerCode(code)}`, offset);
    }
    return code;
  }

  /**
   * Decode the marker segment whose code was just read
   */
  private parseSegment(cursor: ByteCursor, code: number, scope: MarkerScope, tile?: number): Marker {
    const offset = cursor.position - 2;
    const name = markerName(code);

    if (isSegmentless(code)) {
      return this.push(code, scope, { offset, length: 2 }, { type: 'unknown' });
    }

    const segmentLength = cursor.readU16();
    if (segmentLength < 2) {
      throw inconsistency(`segment length ${segmentLength} is below 2`, offset, name);
    }
    const body = cursor.subCursor(cursor.position, segmentLength - 2);
    const ctx: SegmentContext = { offset, components: this.params?.siz.csiz ?? 0 };

    let fields: MarkerFields;
    try {
      fields = this.decodeSegment(code, body, ctx);
    } catch (err) {
      if (isStructuralError(err) && err.kind === 'UnexpectedEof') {
        throw inconsistency(`segment length ${segmentLength} is too short for its fields`, offset, name);
      }
      throw err;
    }
    if (!body.atEnd()) {
      throw inconsistency(`${body.remaining()} byte(s) left over after the segment fields`, offset, name);
    }
    cursor.seek(body.end);

    const marker = this.push(code, scope, { offset, length: segmentLength + 2 }, fields, segmentLength);
    if (tile !== undefined || scope === 'main') {
      this.recordParameters(marker, tile);
    }
    return marker;
  }

  private decodeSegment(code: number, body: ByteCursor, ctx: SegmentContext): MarkerFields {
    switch (code) {
      case MarkerCode.SIZ:
        return decodeSiz(body, ctx);
      case MarkerCode.COD:
        return decodeCod(body, ctx);
      case MarkerCode.COC:
        return decodeCoc(body, ctx);
      case MarkerCode.QCD:
        return decodeQcd(body, ctx);
      case MarkerCode.QCC:
        return decodeQcc(body, ctx);
      case MarkerCode.RGN:
        return decodeRgn(body, ctx);
      case MarkerCode.POC:
        return decodePoc(body, ctx);
      case MarkerCode.TLM:
        return decodeTlm(body, ctx);
      case MarkerCode.PLM:
        return decodePlm(body, ctx);
      case MarkerCode.PLT:
        return decodePlt(body, ctx);
      case MarkerCode.PPM:
        return decodePpm(body);
      case MarkerCode.PPT:
        return decodePpt(body);
      case MarkerCode.CRG:
        return decodeCrg(body, ctx);
      case MarkerCode.COM:
        return decodeCom(body);
      case MarkerCode.SOT:
        return decodeSot(body);
      default: {
        const start = body.position;
        body.skip(body.remaining());
        return { type: 'unknown', data: body.spanFrom(start) };
      }
    }
  }

  private recordParameters(marker: Marker, tile?: number): void {
    const { fields } = marker;
    switch (fields.type) {
      case 'COD':
      case 'COC':
      case 'QCD':
      case 'QCC':
      case 'RGN':
        this.requireParams(marker.span.offset).record(fields, marker.span.offset, tile);
        break;
      default:
        break;
    }
  }

  private requireParams(offset: number): CodingParameters {
    if (!this.params) {
      throw missing('no SIZ seen before this marker', offset, 'SIZ');
    }
    return this.params;
  }

  private push(
    code: number,
    scope: MarkerScope,
    span: ByteSpan,
    fields: MarkerFields,
    segmentLength?: number
  ): Marker {
    const name = markerName(code);
    const marker: Marker = segmentLength === undefined
      ? { code, name, scope, span, fields }
      : { code, name, scope, segmentLength, span, fields };
    this.markers.push(marker);
    debug(this.options.logger, `${name} (${formatMarkerCode(code)}) at ${span.offset}, length ${span.length}`);
    return marker;
  }

}

function describe(code: number): string {
  const name = markerName(code);
  return name === 'unknown' ? `marker ${formatMarkerCode(code)}` : name;
}

/**
 * Parse a bare JPC codestream
 */
export function parseJpc(bytes: ByteInput, options?: ParseOptions): ParseTree {
  const data = toBytes(bytes);
  const codestream = new JpcParser(data, options).parseCodestream(new ByteCursor(data));
  return { format: 'jpc', span: { offset: 0, length: data.length }, codestream };
}
