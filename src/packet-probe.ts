import { BitReader } from './bit-reader.js';
import { inconsistency, isStructuralError } from './errors.js';
import { MarkerCode } from './marker-codes.js';
import { decodePacketHeader } from './packet-header.js';
import type { PacketLayout } from './tile-geometry.js';
import type { ByteSpan, PacketHeader, PacketInfo, PacketSource } from './types.js';

/** SOP is FF91, Lsop = 4, then a 16-bit Nsop */
const SOP_SEGMENT_LENGTH = 6;
const EPH_LENGTH = 2;

export interface PacketProbeInput {
  /** Whole buffer; spans are absolute */
  readonly data: Uint8Array;
  /** Tile-part data region, between SOD and the end of the tile-part */
  readonly region: ByteSpan;
  /** PLT packet lengths signalled in the same tile-part header */
  readonly packetLengths: readonly number[];
  /** False when PPM or PPT carry the packet headers */
  readonly headersInStream: boolean;
  /** Precincts of the packets in progression order, from this tile-part's first packet */
  readonly layouts?: Iterator<PacketLayout>;
}

export interface PacketProbeResult {
  readonly source: PacketSource;
  readonly packets: PacketInfo[];
}

function isSop(data: Uint8Array, at: number, end: number): boolean {
  return (
    at + SOP_SEGMENT_LENGTH <= end &&
    data[at] === 0xff &&
    data[at + 1] === (MarkerCode.SOP & 0xff) &&
    data[at + 2] === 0x00 &&
    data[at + 3] === 0x04
  );
}

/**
 * Offsets of every SOP marker segment in the region. FF91 cannot occur
 * inside entropy-coded data, which never has 0xFF followed by a byte above
 * 0x8F.
 */
function findSops(data: Uint8Array, region: ByteSpan): number[] {
  const end = region.offset + region.length;
  const found: number[] = [];
  for (let i = region.offset; i + 1 < end; i++) {
    if (isSop(data, i, end)) {
      found.push(i);
      i += SOP_SEGMENT_LENGTH - 1;
    }
  }
  return found;
}

function findEph(data: Uint8Array, from: number, end: number): number {
  for (let i = from; i + 1 < end; i++) {
    if (data[i] === 0xff && data[i + 1] === (MarkerCode.EPH & 0xff)) {
      return i;
    }
  }
  return -1;
}

function nextLayout(input: PacketProbeInput): PacketLayout | undefined {
  if (!input.layouts) return undefined;
  const next = input.layouts.next();
  return next.done ? undefined : next.value;
}

/**
 * Describe one packet. The first header bit tells a zero-length packet;
 * the rest of the header is decoded only when its precinct layout is known.
 */
function describePacket(input: PacketProbeInput, index: number, span: ByteSpan): PacketInfo {
  const { data } = input;
  const end = span.offset + span.length;
  const layout = nextLayout(input);
  let headerStart = span.offset;
  let sequence: number | undefined;

  if (isSop(data, span.offset, end)) {
    sequence = (data[span.offset + 4] << 8) | data[span.offset + 5];
    headerStart += SOP_SEGMENT_LENGTH;
  }

  let info: PacketInfo = sequence === undefined ? { index, span } : { index, span, sequence };
  if (!input.headersInStream || headerStart >= end) {
    return info;
  }

  const eph = findEph(data, headerStart, end);
  if (eph >= 0) {
    info = { ...info, headerSpan: { offset: headerStart, length: eph + EPH_LENGTH - headerStart } };
  }
  const empty = new BitReader(data, headerStart, end).readBit() === 0;
  if (!layout) {
    return { ...info, empty };
  }

  const header = readHeader(data, headerStart, span, layout, index);
  return header ? { ...info, empty, header } : { ...info, empty };
}

function readHeader(
  data: Uint8Array,
  headerStart: number,
  span: ByteSpan,
  layout: PacketLayout,
  index: number
): PacketHeader | undefined {
  const end = span.offset + span.length;
  try {
    return decodePacketHeader(data, headerStart, end, layout);
  } catch (err) {
    if (isStructuralError(err) && err.kind === 'UnexpectedEof') {
      throw inconsistency(`header of packet ${index} runs past the packet end at ${end}`, span.offset, 'SOD');
    }
    throw err;
  }
}

function fromLengths(input: PacketProbeInput): PacketInfo[] {
  const packets: PacketInfo[] = [];
  let offset = input.region.offset;
  for (const length of input.packetLengths) {
    packets.push(describePacket(input, packets.length, { offset, length }));
    offset += length;
  }
  return packets;
}

function fromSops(input: PacketProbeInput, sops: readonly number[]): PacketInfo[] {
  const { region } = input;
  const end = region.offset + region.length;
  const starts = sops[0] > region.offset ? [region.offset, ...sops] : [...sops];
  return starts.map((start, i) => {
    const next = i + 1 < starts.length ? starts[i + 1] : end;
    return describePacket(input, i, { offset: start, length: next - start });
  });
}

/**
 * Split tile-part data into packets without decoding them.
 *
 * PLT lengths are used when they add up to the region exactly, otherwise SOP
 * markers delimit the packets; with neither the region stays whole.
 */
export function probePackets(input: PacketProbeInput): PacketProbeResult {
  const { packetLengths, region } = input;
  if (region.length === 0) {
    return { source: 'none', packets: [] };
  }

  const signalled = packetLengths.reduce((sum, length) => sum + length, 0);
  if (packetLengths.length > 0 && signalled === region.length) {
    return { source: 'plt', packets: fromLengths(input) };
  }

  const sops = findSops(input.data, region);
  if (sops.length > 0) {
    return { source: 'sop', packets: fromSops(input, sops) };
  }
  return { source: 'none', packets: [] };
}
