import { missing } from './errors.js';
import { parseJp2 } from './jp2-parser.js';
import { parseJpc } from './jpc-parser.js';
import type { ByteInput, InputFormat, ParseOptions, ParseTree } from './types.js';
import { isJp2Signature, isJpcSignature, toBytes } from './utils.js';

/**
 * Detect the container from its leading bytes
 *
 * @param bytes - Input data (the first 12 bytes are enough)
 * @returns 'jp2' for a JP2 signature box, 'jpc' for SOC, else 'unknown'
 */
export function detectFormat(bytes: ByteInput): InputFormat {
  const data = toBytes(bytes);

  // 00 00 00 0C 'jP  ' 0D 0A 87 0A
  if (isJp2Signature(data)) {
    return 'jp2';
  }

  // FF 4F
  if (isJpcSignature(data)) {
    return 'jpc';
  }

  return 'unknown';
}

/**
 * Validate that a format can be parsed
 *
 * @throws StructuralError (MissingMandatoryElement) for 'unknown'
 */
export function validateFormat(format: InputFormat): asserts format is Exclude<InputFormat, 'unknown'> {
  if (format === 'unknown') {
    throw missing('input starts with neither a JP2 signature box nor SOC', 0, 'SOC');
  }
}

/**
 * Parse a JP2 file or bare codestream, whichever the leading bytes announce
 */
export function parseAuto(bytes: ByteInput, options?: ParseOptions): ParseTree {
  const data = toBytes(bytes);
  const format = detectFormat(data);
  validateFormat(format);
  return format === 'jp2' ? parseJp2(data, options) : parseJpc(data, options);
}
