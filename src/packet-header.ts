import { BitReader } from './bit-reader.js';
import { TagTree } from './tag-tree.js';
import type { PacketLayout } from './tile-geometry.js';
import type { CodeBlockContribution, PacketHeader } from './types.js';

/** Selective arithmetic coding bypass and termination on each pass split a contribution into several segments */
const MULTI_SEGMENT_STYLES = 0x01 | 0x04;
/** Initial Lblock of every code-block */
const LBLOCK_START = 3;

/**
 * Number of coding passes (ISO/IEC 15444-1 Table B.4)
 */
function readCodingPasses(reader: BitReader): number {
  if (reader.readBit() === 0) return 1;
  if (reader.readBit() === 0) return 2;
  const two = reader.readBits(2);
  if (two < 3) return 3 + two;
  const five = reader.readBits(5);
  if (five < 31) return 6 + five;
  return 37 + reader.readBits(7);
}

const floorLog2 = (value: number): number => 31 - Math.clz32(value);

/**
 * Decode the header of the first packet of a precinct.
 *
 * Reads the zero-length bit, then for every code-block in subband raster
 * order its inclusion, zero bit-planes, coding passes and length. Returns
 * undefined for later layers, whose headers depend on every earlier packet
 * of the precinct, and for code-block styles with several codeword segments.
 */
export function decodePacketHeader(
  data: Uint8Array,
  offset: number,
  end: number,
  layout: PacketLayout
): PacketHeader | undefined {
  if (layout.layer !== 0 || (layout.codeBlockStyle & MULTI_SEGMENT_STYLES) !== 0) {
    return undefined;
  }

  const reader = new BitReader(data, offset, end);
  const { layer, resolution, component } = layout;
  const codeBlocks: CodeBlockContribution[] = [];
  let includedSubbands = 0;
  let bodyLength = 0;

  if (reader.readBit() === 1) {
    for (const band of layout.subbands) {
      const width = band.codeBlocksWide;
      const height = band.codeBlocksHigh;
      if (width === 0 || height === 0) continue;

      const inclusion = new TagTree(width, height);
      const zeroBitplanes = new TagTree(width, height);
      let anyIncluded = false;
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          if (!inclusion.decode(x, y, layer + 1, reader)) {
            codeBlocks.push({ subband: band.orientation, x, y, included: false });
            continue;
          }
          const missing = zeroBitplanes.read(x, y, reader);
          const codingPasses = readCodingPasses(reader);
          let lblock = LBLOCK_START;
          while (reader.readBit() === 1) lblock++;
          const length = reader.readBits(lblock + floorLog2(codingPasses));
          codeBlocks.push({
            subband: band.orientation,
            x,
            y,
            included: true,
            zeroBitplanes: missing,
            codingPasses,
            length
          });
          bodyLength += length;
          anyIncluded = true;
        }
      }
      if (anyIncluded) includedSubbands++;
    }
  }

  reader.alignToByte();
  return {
    layer,
    resolution,
    component,
    includedSubbands,
    codeBlocks,
    headerLength: reader.position - offset,
    bodyLength
  };
}
