import { describe, test } from 'node:test';
import assert from 'node:assert';
import { detectFormat, parseAuto, validateFormat } from '../../src/format-detection.js';
import { isStructuralError } from '../../src/errors.js';
import { bytes, minimalCodestream, minimalJp2, recordingLogger } from '../../src/test-utils/codestream-fixtures.js';

describe('Format Detection', () => {
  test('detects a JP2 signature box', () => {
    assert.strictEqual(detectFormat(minimalJp2()), 'jp2');
  });

  test('detects a bare codestream', () => {
    assert.strictEqual(detectFormat(minimalCodestream()), 'jpc');
  });

  test('accepts an ArrayBuffer', () => {
    const data = minimalCodestream();
    const buffer = new ArrayBuffer(data.length);
    new Uint8Array(buffer).set(data);
    assert.strictEqual(detectFormat(buffer), 'jpc');
  });

  test('a leading SOC is a codestream even without SIZ', () => {
    assert.strictEqual(detectFormat(bytes(0xff, 0x4f, 0xff, 0x52)), 'jpc');
  });

  test('parseAuto reports the missing SIZ after SOC', () => {
    assert.throws(
      () => parseAuto(bytes(0xff, 0x4f, 0xff, 0x52, 0x00, 0x0c)),
      (err: unknown) =>
        isStructuralError(err) && err.kind === 'MissingMandatoryElement' && err.offset === 2 && err.node === 'SIZ'
    );
  });

  test('short or foreign input is unknown', () => {
    assert.strictEqual(detectFormat(bytes()), 'unknown');
    assert.strictEqual(detectFormat(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)), 'unknown');
  });

  test('validateFormat rejects unknown input', () => {
    assert.doesNotThrow(() => validateFormat('jp2'));
    assert.throws(
      () => validateFormat('unknown'),
      (err: unknown) => isStructuralError(err) && err.kind === 'MissingMandatoryElement' && err.offset === 0
    );
  });

  test('parseAuto dispatches on the detected format', () => {
    const logger = recordingLogger();
    assert.strictEqual(parseAuto(minimalJp2(), { logger }).format, 'jp2');
    assert.strictEqual(parseAuto(minimalCodestream(), { logger }).format, 'jpc');
  });

  test('parseAuto fails on unknown input', () => {
    assert.throws(() => parseAuto(bytes(0, 0)), (err: unknown) => isStructuralError(err));
  });
});
