/**
 * JPEG 2000 structure to XML
 *
 * Decodes the box tree of a JP2 file and the marker segments of a JPC
 * codestream into an immutable, span-annotated parse tree, and renders that
 * tree as XML with ISO/IEC 15444-14 element names. Pixels are never decoded.
 *
 * @example
 * import { readFileSync } from 'node:fs';
 * import { parseAuto, encodeTree, writeXml } from 'jp2xml';
 *
 * const bytes = readFileSync('image.jp2');
 * const tree = parseAuto(bytes);
 * process.stdout.write(writeXml(encodeTree(tree, bytes)));
 */

// Parsing
export { parseJp2, Jp2Parser } from './jp2-parser.js';
export { parseJpc, JpcParser } from './jpc-parser.js';
export { detectFormat, parseAuto, validateFormat } from './format-detection.js';
export { ByteCursor } from './byte-cursor.js';
export { BitReader } from './bit-reader.js';

// Packet headers
export { TagTree } from './tag-tree.js';
export { decodePacketHeader } from './packet-header.js';
export { packetLayouts, tileBounds, ProgressionOrder } from './tile-geometry.js';
export type { Bounds, PacketLayout, SubbandLayout, TileCodingStyle } from './tile-geometry.js';

// Errors
export { StructuralError, isStructuralError } from './errors.js';
export type { StructuralErrorKind, StructuralErrorDetails } from './errors.js';

// Codes
export { BoxType, SUPERBOX_TYPES, ENUMERATED_COLOURSPACES } from './box-types.js';
export type { KnownBoxType } from './box-types.js';
export { MarkerCode, markerName } from './marker-codes.js';
export type { MarkerName } from './marker-codes.js';

// Tree helpers
export { boxChildren, codestreamOf, collectSpans, findBoxes, markersNamed, spansTile } from './tree.js';

// XML rendering
export { element, encodeTree, escapeXml, field, writeXml } from './xml/index.js';
export type { BinaryEncoding, XmlElement, XmlEncodeOptions, XmlValue, XmlWriteOptions } from './xml/index.js';

// Utilities
export { bytesToHex, decodeBitDepth, fourCCToString, formatMarkerCode, stringToFourCC } from './utils.js';

// Model
export type * from './types.js';
