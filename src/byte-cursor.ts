import { StructuralError } from './errors.js';
import type { ByteSpan } from './types.js';

/**
 * Bounds-checked, big-endian reader over a region of an immutable buffer.
 *
 * Offsets are always absolute in the original buffer, so spans taken from a
 * sub-cursor can be reported without translation. A cursor never reads past
 * its own `end`; nested regions (a box payload, a marker segment) get their
 * own sub-cursor instead of ad hoc length checks.
 */
export class ByteCursor {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private pos: number;
  readonly start: number;
  readonly end: number;

  constructor(data: Uint8Array, start = 0, end = data.length) {
    if (start < 0 || end > data.length || start > end) {
      throw new StructuralError('UnexpectedEof', 'cursor region lies outside the buffer', {
        offset: start,
        requested: end - start
      });
    }
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.start = start;
    this.end = end;
    this.pos = start;
  }

  get position(): number {
    return this.pos;
  }

  remaining(): number {
    return this.end - this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.end;
  }

  private require(n: number): void {
    if (n < 0 || this.pos + n > this.end) {
      throw new StructuralError(
        'UnexpectedEof',
        `read of ${n} byte(s) with ${this.end - this.pos} remaining in scope`,
        { offset: this.pos, requested: n }
      );
    }
  }

  readU8(): number {
    this.require(1);
    return this.data[this.pos++];
  }

  readI8(): number {
    this.require(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readU16(): number {
    this.require(2);
    const value = this.view.getUint16(this.pos, false);
    this.pos += 2;
    return value;
  }

  readU24(): number {
    this.require(3);
    const value = (this.data[this.pos] << 16) | (this.data[this.pos + 1] << 8) | this.data[this.pos + 2];
    this.pos += 3;
    return value;
  }

  readU32(): number {
    this.require(4);
    const value = this.view.getUint32(this.pos, false);
    this.pos += 4;
    return value;
  }

  readU64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.pos, false);
    this.pos += 8;
    return value;
  }

  /**
   * Read n bytes as a view onto the original buffer (no copy)
   */
  readBytes(n: number): Uint8Array {
    this.require(n);
    const bytes = this.data.subarray(this.pos, this.pos + n);
    this.pos += n;
    return bytes;
  }

  /**
   * Look at the next n bytes without advancing
   */
  peek(n: number): Uint8Array {
    this.require(n);
    return this.data.subarray(this.pos, this.pos + n);
  }

  peekU16(): number {
    this.require(2);
    return this.view.getUint16(this.pos, false);
  }

  skip(n: number): void {
    this.require(n);
    this.pos += n;
  }

  seek(offset: number): void {
    if (offset < this.start || offset > this.end) {
      throw new StructuralError('UnexpectedEof', `seek to ${offset} outside scope ${this.start}..${this.end}`, {
        offset,
        requested: 0
      });
    }
    this.pos = offset;
  }

  /**
   * Bounded view over [offset, offset + length) for recursive descent.
   * The region must lie inside this cursor's scope.
   */
  subCursor(offset: number, length: number): ByteCursor {
    if (offset < this.start || length < 0 || offset + length > this.end) {
      throw new StructuralError(
        'UnexpectedEof',
        `region of ${length} byte(s) at ${offset} exceeds scope ending at ${this.end}`,
        { offset, requested: length }
      );
    }
    return new ByteCursor(this.data, offset, offset + length);
  }

  /**
   * Span from `offset` up to the current position
   */
  spanFrom(offset: number): ByteSpan {
    return { offset, length: this.pos - offset };
  }

  /**
   * Search forward from the current position for a 16-bit big-endian value.
   * Returns the absolute offset or -1. Does not advance.
   */
  indexOfU16(value: number, from = this.pos): number {
    const hi = (value >>> 8) & 0xff;
    const lo = value & 0xff;
    for (let i = from; i + 1 < this.end; i++) {
      if (this.data[i] === hi && this.data[i + 1] === lo) {
        return i;
      }
    }
    return -1;
  }
}
