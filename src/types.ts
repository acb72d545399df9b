/**
 * Structural model shared by the JP2 box parser, the JPC codestream parser and
 * the XML encoder.
 *
 * Nodes reference the caller's buffer by span only; the only values copied out
 * of the input are decoded integers and strings. Every type is readonly: a tree
 * is built in one forward pass and never mutated afterwards.
 */

/**
 * Location of a structural unit in the source buffer
 */
export interface ByteSpan {
  readonly offset: number;
  readonly length: number;
}

// ---------------------------------------------------------------------------
// JP2 boxes
// ---------------------------------------------------------------------------

/**
 * How the box length was written: a 32-bit LBox, LBox = 1 with a 64-bit
 * XLBox, or LBox = 0 (box runs to the end of its enclosing scope)
 */
export type BoxLengthField = 'explicit' | 'extended' | 'to-end';

export interface BoxBase {
  /** Four-character type code as text (may contain non-printable characters) */
  readonly type: string;
  /** Four-character type code as a 32-bit integer */
  readonly typeCode: number;
  readonly lengthField: BoxLengthField;
  readonly headerLength: 8 | 16;
  /** Whole box, header included */
  readonly span: ByteSpan;
  /** Box contents after the header */
  readonly payloadSpan: ByteSpan;
}

export interface OpaqueBox extends BoxBase {
  readonly content: { readonly kind: 'opaque' };
}

export interface SuperBox extends BoxBase {
  readonly content: { readonly kind: 'superbox'; readonly children: readonly Box[] };
}

export interface RecordBox extends BoxBase {
  readonly content: { readonly kind: 'record'; readonly record: BoxRecord };
}

export interface CodestreamBox extends BoxBase {
  readonly content: { readonly kind: 'codestream'; readonly codestream: Codestream };
}

export type Box = OpaqueBox | SuperBox | RecordBox | CodestreamBox;

/**
 * Component bit depth as encoded in ihdr BPC, bpcc and pclr: the low seven
 * bits hold depth - 1, the high bit the signedness.
 */
export interface BitDepth {
  readonly raw: number;
  readonly bits: number;
  readonly signed: boolean;
}

export interface SignatureRecord {
  readonly box: 'jP  ';
  readonly signature: number;
}

export interface FileTypeRecord {
  readonly box: 'ftyp';
  readonly brand: string;
  readonly minorVersion: number;
  readonly compatibility: readonly string[];
}

export interface ImageHeaderRecord {
  readonly box: 'ihdr';
  readonly height: number;
  readonly width: number;
  readonly components: number;
  /** Raw BPC byte; 255 means depths vary and are given by bpcc */
  readonly bitsPerComponent: number;
  /** Decoded BPC, absent when BPC is 255 */
  readonly depth?: BitDepth;
  readonly compressionType: number;
  readonly colourspaceUnknown: number;
  readonly intellectualProperty: number;
}

export interface BitsPerComponentRecord {
  readonly box: 'bpcc';
  readonly depths: readonly BitDepth[];
}

export type ColourMethod =
  | { readonly method: 'enumerated'; readonly enumCS: number; readonly name?: string; readonly parameters: readonly number[] }
  | { readonly method: 'restricted-icc' | 'any-icc'; readonly profile: ByteSpan }
  | { readonly method: 'vendor'; readonly vendorCode: string; readonly parameters: ByteSpan }
  | {
      readonly method: 'parameterized';
      readonly colourPrimaries: number;
      readonly transferCharacteristics: number;
      readonly matrixCoefficients: number;
      readonly videoFullRange: boolean;
    }
  | { readonly method: 'reserved'; readonly data: ByteSpan };

export interface ColourSpecificationRecord {
  readonly box: 'colr';
  readonly meth: number;
  readonly precedence: number;
  readonly approximation: number;
  readonly colour: ColourMethod;
}

export interface PaletteRecord {
  readonly box: 'pclr';
  readonly entryCount: number;
  readonly columnCount: number;
  readonly depths: readonly BitDepth[];
  /** entries[entry][column] */
  readonly entries: readonly (readonly number[])[];
}

export interface ComponentMapping {
  readonly component: number;
  readonly mappingType: number;
  readonly paletteColumn: number;
}

export interface ComponentMappingRecord {
  readonly box: 'cmap';
  readonly mappings: readonly ComponentMapping[];
}

export interface ChannelDefinition {
  readonly channel: number;
  readonly type: number;
  readonly association: number;
}

export interface ChannelDefinitionRecord {
  readonly box: 'cdef';
  readonly channels: readonly ChannelDefinition[];
}

export interface ResolutionRecord {
  readonly box: 'resc' | 'resd';
  readonly verticalNumerator: number;
  readonly verticalDenominator: number;
  readonly horizontalNumerator: number;
  readonly horizontalDenominator: number;
  readonly verticalExponent: number;
  readonly horizontalExponent: number;
  /** Grid points per metre, vertical then horizontal */
  readonly vertical: number;
  readonly horizontal: number;
}

export interface TextRecord {
  readonly box: 'xml ' | 'jp2i';
  readonly text: string;
}

export interface UuidRecord {
  readonly box: 'uuid';
  readonly uuid: string;
  readonly data: ByteSpan;
}

export interface UuidListRecord {
  readonly box: 'ulst';
  readonly ids: readonly string[];
}

export interface DataEntryUrlRecord {
  readonly box: 'url ';
  readonly version: number;
  readonly flags: number;
  readonly location: string;
}

export type BoxRecord =
  | SignatureRecord
  | FileTypeRecord
  | ImageHeaderRecord
  | BitsPerComponentRecord
  | ColourSpecificationRecord
  | PaletteRecord
  | ComponentMappingRecord
  | ChannelDefinitionRecord
  | ResolutionRecord
  | TextRecord
  | UuidRecord
  | UuidListRecord
  | DataEntryUrlRecord;

// ---------------------------------------------------------------------------
// JPC codestream
// ---------------------------------------------------------------------------

/**
 * Where in the codestream a marker was found
 */
export type MarkerScope = 'main' | 'tile-part-header' | 'tile-part-data' | 'end';

export interface SizComponent {
  /** Raw Ssiz byte */
  readonly ssiz: number;
  readonly precision: number;
  readonly signed: boolean;
  readonly xRsiz: number;
  readonly yRsiz: number;
}

export interface SizFields {
  readonly type: 'SIZ';
  readonly rsiz: number;
  readonly xsiz: number;
  readonly ysiz: number;
  readonly xOsiz: number;
  readonly yOsiz: number;
  readonly xTsiz: number;
  readonly yTsiz: number;
  readonly xTOsiz: number;
  readonly yTOsiz: number;
  readonly csiz: number;
  readonly components: readonly SizComponent[];
  /** Derived tile grid */
  readonly tilesX: number;
  readonly tilesY: number;
}

/**
 * Decomposition and code-block parameters shared by COD (SPcod) and COC (SPcoc)
 */
export interface CodingStyleParameters {
  readonly decompositionLevels: number;
  /** xcb and ycb as written; the code-block is 2^(xcb + 2) by 2^(ycb + 2) */
  readonly codeBlockWidthExponent: number;
  readonly codeBlockHeightExponent: number;
  readonly codeBlockStyle: number;
  readonly transformation: number;
  /** Raw precinct bytes (PPx in the low nibble, PPy in the high), one per resolution level */
  readonly precincts?: readonly number[];
}

export interface CodFields {
  readonly type: 'COD';
  readonly scod: number;
  readonly progressionOrder: number;
  readonly layers: number;
  readonly multipleComponentTransform: number;
  readonly parameters: CodingStyleParameters;
}

export interface CocFields {
  readonly type: 'COC';
  readonly component: number;
  readonly scoc: number;
  readonly parameters: CodingStyleParameters;
}

export interface QuantizationStep {
  /** Raw value: an 8-bit exponent (style 0) or a 16-bit exponent/mantissa pair */
  readonly raw: number;
  readonly exponent: number;
  readonly mantissa?: number;
}

export interface QuantizationParameters {
  readonly sq: number;
  readonly guardBits: number;
  /** 0 none, 1 scalar derived, 2 scalar expounded */
  readonly style: number;
  readonly steps: readonly QuantizationStep[];
}

export interface QcdFields {
  readonly type: 'QCD';
  readonly quantization: QuantizationParameters;
}

export interface QccFields {
  readonly type: 'QCC';
  readonly component: number;
  readonly quantization: QuantizationParameters;
}

export interface RgnFields {
  readonly type: 'RGN';
  readonly component: number;
  readonly style: number;
  readonly shift: number;
}

export interface ProgressionChange {
  readonly resolutionStart: number;
  readonly componentStart: number;
  readonly layerEnd: number;
  readonly resolutionEnd: number;
  readonly componentEnd: number;
  readonly progressionOrder: number;
}

export interface PocFields {
  readonly type: 'POC';
  readonly changes: readonly ProgressionChange[];
}

export interface TileLength {
  readonly tile?: number;
  readonly length: number;
}

export interface TlmFields {
  readonly type: 'TLM';
  readonly index: number;
  readonly stlm: number;
  readonly entries: readonly TileLength[];
}

export interface PlmFields {
  readonly type: 'PLM';
  readonly index: number;
  /** One list of packet lengths per Nplm run */
  readonly runs: readonly (readonly number[])[];
}

export interface PltFields {
  readonly type: 'PLT';
  readonly index: number;
  readonly packetLengths: readonly number[];
}

export interface PpmFields {
  readonly type: 'PPM';
  readonly index: number;
  readonly data: ByteSpan;
}

export interface PptFields {
  readonly type: 'PPT';
  readonly index: number;
  readonly data: ByteSpan;
}

export interface CrgFields {
  readonly type: 'CRG';
  readonly offsets: readonly { readonly x: number; readonly y: number }[];
}

export interface ComFields {
  readonly type: 'COM';
  readonly registration: number;
  /** Decoded text when Rcom is 1 (ISO 8859-15) */
  readonly text?: string;
  readonly data: ByteSpan;
}

export interface SotFields {
  readonly type: 'SOT';
  readonly tileIndex: number;
  readonly tilePartLength: number;
  readonly tilePartIndex: number;
  readonly tilePartCount: number;
}

export type SubbandOrientation = 'LL' | 'HL' | 'LH' | 'HH';

/**
 * What a packet header declares about one code-block of its precinct
 */
export interface CodeBlockContribution {
  readonly subband: SubbandOrientation;
  /** Column and row of the code-block within the precinct */
  readonly x: number;
  readonly y: number;
  readonly included: boolean;
  /** Missing most significant bit-planes, signalled on first inclusion */
  readonly zeroBitplanes?: number;
  readonly codingPasses?: number;
  /** Bytes of code-block data in the packet body */
  readonly length?: number;
}

/**
 * Decoded packet header of a first-layer packet
 */
export interface PacketHeader {
  readonly layer: number;
  readonly resolution: number;
  readonly component: number;
  /** Subbands with at least one included code-block */
  readonly includedSubbands: number;
  /** Raster order per subband; empty for a zero-length packet */
  readonly codeBlocks: readonly CodeBlockContribution[];
  /** Bit-coded header bytes, EPH excluded */
  readonly headerLength: number;
  /** Sum of the code-block lengths */
  readonly bodyLength: number;
}

/**
 * One packet found in tile-part data
 */
export interface PacketInfo {
  readonly index: number;
  readonly span: ByteSpan;
  /** Nsop of the SOP marker opening the packet */
  readonly sequence?: number;
  /** Packet header up to and including EPH, when EPH is present */
  readonly headerSpan?: ByteSpan;
  /** Zero-length packet flag, when the header is in-stream */
  readonly empty?: boolean;
  /** Inclusion and bit-plane metadata, when the packet's precinct layout is known */
  readonly header?: PacketHeader;
}

export type PacketSource = 'plt' | 'sop' | 'none';

export interface SodFields {
  readonly type: 'SOD';
  readonly dataSpan: ByteSpan;
  readonly packetSource: PacketSource;
  readonly packets: readonly PacketInfo[];
}

export interface DelimiterFields {
  readonly type: 'SOC' | 'EOC';
}

export interface UnknownMarkerFields {
  readonly type: 'unknown';
  /** Segment contents after Lxxx, absent for segment-less codes */
  readonly data?: ByteSpan;
}

export type MarkerFields =
  | DelimiterFields
  | SizFields
  | CodFields
  | CocFields
  | QcdFields
  | QccFields
  | RgnFields
  | PocFields
  | TlmFields
  | PlmFields
  | PltFields
  | PpmFields
  | PptFields
  | CrgFields
  | ComFields
  | SotFields
  | SodFields
  | UnknownMarkerFields;

export interface Marker {
  readonly code: number;
  /** Mnemonic (SIZ, COD, ...) or 'unknown' */
  readonly name: string;
  readonly scope: MarkerScope;
  /** Lxxx, absent for delimiting markers */
  readonly segmentLength?: number;
  /** Marker code plus segment; for SOD, only the marker itself */
  readonly span: ByteSpan;
  readonly fields: MarkerFields;
}

export interface Codestream {
  readonly span: ByteSpan;
  readonly markers: readonly Marker[];
  /** Bytes after EOC inside the codestream region */
  readonly trailing?: ByteSpan;
}

// ---------------------------------------------------------------------------
// Parse tree
// ---------------------------------------------------------------------------

export type ParseTree =
  | { readonly format: 'jp2'; readonly span: ByteSpan; readonly boxes: readonly Box[] }
  | { readonly format: 'jpc'; readonly span: ByteSpan; readonly codestream: Codestream };

export type InputFormat = 'jp2' | 'jpc' | 'unknown';

export type ByteInput = Uint8Array | ArrayBuffer;

/**
 * Sink for non-fatal diagnostics
 */
export interface ParseLogger {
  warn(message: string): void;
  debug?(message: string): void;
}

/**
 * Options shared by every parse entry point
 */
export interface ParseOptions {
  /** Receives tolerated non-conformances (default: console.warn) */
  logger?: ParseLogger;
  /** Maximum superbox nesting depth (default: 32) */
  maxDepth?: number;
  /** Split tile-part data into packets and read their zero-length flag (default: true) */
  probePackets?: boolean;
}
