import type { BitDepth, ParseLogger, ParseOptions } from './types.js';

/**
 * JP2 signature box: length 12, type 'jP  ', contents <CR><LF><0x87><LF>
 */
export const JP2_SIGNATURE = new Uint8Array([
  0x00, 0x00, 0x00, 0x0c, 0x6a, 0x50, 0x20, 0x20, 0x0d, 0x0a, 0x87, 0x0a
]);

/**
 * Contents of the signature box
 */
export const JP2_SIGNATURE_MAGIC = 0x0d0a870a;

/**
 * SOC marker code, the first two bytes of every codestream
 */
export const JPC_SIGNATURE = new Uint8Array([0xff, 0x4f]);

export const DEFAULT_MAX_DEPTH = 32;

/**
 * Verify the JP2 signature box at the start of a buffer
 */
export function isJp2Signature(data: Uint8Array): boolean {
  if (data.length < JP2_SIGNATURE.length) return false;
  for (let i = 0; i < JP2_SIGNATURE.length; i++) {
    if (data[i] !== JP2_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Verify SOC at the start of a buffer. Whether SIZ follows is for the
 * codestream parser to report.
 */
export function isJpcSignature(data: Uint8Array): boolean {
  if (data.length < JPC_SIGNATURE.length) return false;
  for (let i = 0; i < JPC_SIGNATURE.length; i++) {
    if (data[i] !== JPC_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Four-character code to text (one char per byte)
 */
export function fourCCToString(code: number): string {
  return String.fromCharCode((code >>> 24) & 0xff, (code >>> 16) & 0xff, (code >>> 8) & 0xff, code & 0xff);
}

/**
 * Text to four-character code
 */
export function stringToFourCC(type: string): number {
  if (type.length !== 4) {
    throw new Error(`Box type must be exactly 4 characters: ${JSON.stringify(type)}`);
  }
  return ((type.charCodeAt(0) << 24) | (type.charCodeAt(1) << 16) | (type.charCodeAt(2) << 8) | type.charCodeAt(3)) >>> 0;
}

export function bytesToHex(bytes: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0');
  }
  return hex;
}

export function formatMarkerCode(code: number): string {
  return `0x${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Decode a BPC / bpcc / pclr depth byte
 */
export function decodeBitDepth(raw: number): BitDepth {
  return { raw, bits: (raw & 0x7f) + 1, signed: (raw & 0x80) !== 0 };
}

export function toBytes(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

const consoleLogger: ParseLogger = {
  warn: (message: string) => console.warn(message)
};

/**
 * Fill in option defaults
 */
export function resolveParseOptions(options: ParseOptions = {}): Required<ParseOptions> {
  return {
    logger: options.logger ?? consoleLogger,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    probePackets: options.probePackets ?? true
  };
}

/**
 * Emit a debug line if the logger accepts them
 */
export function debug(logger: ParseLogger, message: string): void {
  if (logger.debug) {
    logger.debug(message);
  }
}
