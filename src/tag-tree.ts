import type { BitReader } from './bit-reader.js';

interface TagTreeLevel {
  readonly width: number;
  /** Value of each node, Infinity until decoded */
  readonly value: number[];
  /** Lower bound established so far for each node */
  readonly low: number[];
}

/**
 * Tag tree of ISO/IEC 15444-1 B.10.2: a two-dimensional array of
 * non-negative integers coded as a quad tree of minima. Values are decoded
 * lazily; each call reads only the bits it needs.
 */
export class TagTree {
  readonly width: number;
  readonly height: number;
  /** Leaves first, the single root last */
  private readonly levels: TagTreeLevel[] = [];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    let w = width;
    let h = height;
    for (;;) {
      const size = w * h;
      this.levels.push({ width: w, value: new Array<number>(size).fill(Infinity), low: new Array<number>(size).fill(0) });
      if (w <= 1 && h <= 1) break;
      w = Math.ceil(w / 2);
      h = Math.ceil(h / 2);
    }
  }

  /**
   * Decode until the value of leaf (x, y) is known to be below `threshold`
   * or not. Returns true when it is below.
   */
  decode(x: number, y: number, threshold: number, reader: BitReader): boolean {
    let low = 0;
    for (let depth = this.levels.length - 1; depth >= 0; depth--) {
      const level = this.levels[depth];
      const i = (y >> depth) * level.width + (x >> depth);
      if (low > level.low[i]) {
        level.low[i] = low;
      } else {
        low = level.low[i];
      }
      while (low < threshold && low < level.value[i]) {
        if (reader.readBit() === 1) {
          level.value[i] = low;
        } else {
          low++;
        }
      }
      level.low[i] = low;
    }
    return this.levels[0].value[y * this.width + x] < threshold;
  }

  /**
   * Decode the full value of leaf (x, y)
   */
  read(x: number, y: number, reader: BitReader): number {
    this.decode(x, y, Infinity, reader);
    return this.levels[0].value[y * this.width + x];
  }
}
