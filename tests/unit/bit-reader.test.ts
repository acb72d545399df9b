import { describe, test } from 'node:test';
import assert from 'node:assert';
import { BitReader } from '../../src/bit-reader.js';
import { isStructuralError } from '../../src/errors.js';

describe('BitReader', () => {
  test('reads most significant bit first', () => {
    const reader = new BitReader(new Uint8Array([0b10110000]));
    assert.strictEqual(reader.readBit(), 1);
    assert.strictEqual(reader.readBit(), 0);
    assert.strictEqual(reader.readBits(2), 0b11);
    assert.strictEqual(reader.position, 1);
  });

  test('a byte after 0xFF carries seven bits', () => {
    const reader = new BitReader(new Uint8Array([0xff, 0x7f, 0x80]));
    assert.strictEqual(reader.readBits(8), 0xff);
    assert.strictEqual(reader.readBits(7), 0x7f);
    assert.strictEqual(reader.readBit(), 1);
    assert.strictEqual(reader.position, 3);
  });

  test('alignToByte skips to the next byte', () => {
    const reader = new BitReader(new Uint8Array([0b11100000, 0b01000000]));
    reader.readBits(3);
    reader.alignToByte();
    assert.strictEqual(reader.position, 1);
    assert.strictEqual(reader.readBits(2), 0b01);
  });

  test('alignToByte after 0xFF also takes the stuffed byte', () => {
    const reader = new BitReader(new Uint8Array([0xff, 0x00, 0xa0]));
    assert.strictEqual(reader.readBits(8), 0xff);
    reader.alignToByte();
    assert.strictEqual(reader.position, 2);
    assert.strictEqual(reader.readBits(3), 0b101);
  });

  test('readBits keeps values wider than 31 bits positive', () => {
    const reader = new BitReader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff]));
    assert.strictEqual(reader.readBits(8 + 7 * 4), 2 ** 36 - 1);
  });

  test('starts at an offset and stops at the end bound', () => {
    const reader = new BitReader(new Uint8Array([0x00, 0xaa, 0x55]), 1, 2);
    assert.strictEqual(reader.readBits(8), 0xaa);
    assert.throws(
      () => reader.readBit(),
      (err: unknown) => isStructuralError(err) && err.kind === 'UnexpectedEof' && err.offset === 2
    );
  });
});
