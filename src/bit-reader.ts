import { StructuralError } from './errors.js';

/**
 * MSB-first bit reader for packet headers.
 *
 * Applies the packet header bit-stuffing rule: after a 0xFF byte, the next
 * byte carries only seven bits (its most significant bit is a stuffed zero).
 */
export class BitReader {
  private readonly data: Uint8Array;
  private readonly end: number;
  private pos: number;
  private current = 0;
  private available = 0;
  private previous = 0;

  constructor(data: Uint8Array, offset = 0, end = data.length) {
    this.data = data;
    this.pos = offset;
    this.end = end;
  }

  /** Offset of the next byte not yet loaded */
  get position(): number {
    return this.pos;
  }

  readBit(): number {
    if (this.available === 0) {
      this.load();
    }
    this.available--;
    return (this.current >> this.available) & 1;
  }

  readBits(n: number): number {
    let value = 0;
    for (let i = 0; i < n; i++) {
      value = value * 2 + this.readBit();
    }
    return value;
  }

  /**
   * End a packet header: drop the rest of the current byte. A header never
   * ends on 0xFF, so the stuffed byte after one still belongs to it.
   */
  alignToByte(): void {
    this.available = 0;
    if (this.previous === 0xff) {
      this.load();
      this.available = 0;
    }
  }

  private load(): void {
    if (this.pos >= this.end) {
      throw new StructuralError('UnexpectedEof', 'packet header ends inside a bit field', {
        offset: this.pos,
        requested: 1
      });
    }
    const byte = this.data[this.pos++];
    this.available = this.previous === 0xff ? 7 : 8;
    this.current = this.available === 7 ? byte & 0x7f : byte;
    this.previous = byte;
  }
}
