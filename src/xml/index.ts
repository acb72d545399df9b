export { element, field, isXmlName } from './element.js';
export type { XmlElement, XmlValue } from './element.js';
export { encodeTree } from './encoder.js';
export type { BinaryEncoding, XmlEncodeOptions } from './encoder.js';
export { escapeXml, writeXml } from './writer.js';
export type { XmlWriteOptions } from './writer.js';
