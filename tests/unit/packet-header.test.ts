import { describe, test } from 'node:test';
import assert from 'node:assert';
import { BitReader } from '../../src/bit-reader.js';
import { isStructuralError } from '../../src/errors.js';
import { decodePacketHeader } from '../../src/packet-header.js';
import { TagTree } from '../../src/tag-tree.js';
import { packetLayouts, ProgressionOrder, tileBounds, type PacketLayout } from '../../src/tile-geometry.js';
import type { CodingStyleParameters, SizFields } from '../../src/types.js';
import { bytes } from '../../src/test-utils/codestream-fixtures.js';

function siz(width: number, height: number, components = 1, tileWidth = width): SizFields {
  return {
    type: 'SIZ',
    rsiz: 0,
    xsiz: width,
    ysiz: height,
    xOsiz: 0,
    yOsiz: 0,
    xTsiz: tileWidth,
    yTsiz: height,
    xTOsiz: 0,
    yTOsiz: 0,
    csiz: components,
    components: Array.from({ length: components }, () => ({ ssiz: 7, precision: 8, signed: false, xRsiz: 1, yRsiz: 1 })),
    tilesX: Math.ceil(width / tileWidth),
    tilesY: 1
  };
}

function style(levels: number, extra: Partial<CodingStyleParameters> = {}): CodingStyleParameters {
  return {
    decompositionLevels: levels,
    codeBlockWidthExponent: 0,
    codeBlockHeightExponent: 0,
    codeBlockStyle: 0,
    transformation: 1,
    ...extra
  };
}

function layout(subbands: PacketLayout['subbands'], extra: Partial<PacketLayout> = {}): PacketLayout {
  return { layer: 0, resolution: 0, component: 0, codeBlockStyle: 0, subbands, ...extra };
}

describe('TagTree', () => {
  test('reads leaves through their shared root', () => {
    // root 1 (bits 0 1), leaf 0 = 1 (bit 1), leaf 1 = 2 (bits 0 1)
    const reader = new BitReader(bytes(0b01101000));
    const tree = new TagTree(2, 1);
    assert.strictEqual(tree.read(0, 0, reader), 1);
    assert.strictEqual(tree.read(1, 0, reader), 2);
    assert.strictEqual(reader.position, 1);
  });

  test('decode stops at the threshold and resumes later', () => {
    const reader = new BitReader(bytes(0b01000000));
    const tree = new TagTree(1, 1);
    assert.strictEqual(tree.decode(0, 0, 1, reader), false);
    assert.strictEqual(tree.decode(0, 0, 2, reader), true);
    assert.strictEqual(tree.read(0, 0, reader), 1);
  });
});

describe('decodePacketHeader', () => {
  test('a zero-length packet has no code-blocks', () => {
    const header = decodePacketHeader(bytes(0x00), 0, 1, layout([{ orientation: 'LL', codeBlocksWide: 1, codeBlocksHigh: 1 }]));
    assert.deepStrictEqual(header, {
      layer: 0,
      resolution: 0,
      component: 0,
      includedSubbands: 0,
      codeBlocks: [],
      headerLength: 1,
      bodyLength: 0
    });
  });

  test('reads inclusion, zero bit-planes, passes and length per code-block', () => {
    // 1 | incl 1 1 | zero 1 1 | passes 1100 | Lblock 0 | length 0101 | incl 0
    const header = decodePacketHeader(
      bytes(0xfe, 0x14, 0x99),
      0,
      3,
      layout([{ orientation: 'LL', codeBlocksWide: 2, codeBlocksHigh: 1 }])
    );
    assert.deepStrictEqual(header, {
      layer: 0,
      resolution: 0,
      component: 0,
      includedSubbands: 1,
      codeBlocks: [
        { subband: 'LL', x: 0, y: 0, included: true, zeroBitplanes: 0, codingPasses: 3, length: 5 },
        { subband: 'LL', x: 1, y: 0, included: false }
      ],
      headerLength: 2,
      bodyLength: 5
    });
  });

  test('walks the subbands in order and skips empty ones', () => {
    // 1 | HL incl 0 | LH incl 1, zero 001, passes 0, Lblock 110, length 10100
    const header = decodePacketHeader(
      bytes(0xa5, 0xa8),
      0,
      2,
      layout(
        [
          { orientation: 'HL', codeBlocksWide: 1, codeBlocksHigh: 1 },
          { orientation: 'LH', codeBlocksWide: 1, codeBlocksHigh: 1 },
          { orientation: 'HH', codeBlocksWide: 0, codeBlocksHigh: 0 }
        ],
        { resolution: 1 }
      )
    );
    assert.ok(header !== undefined);
    assert.strictEqual(header.includedSubbands, 1);
    assert.deepStrictEqual(header.codeBlocks, [
      { subband: 'HL', x: 0, y: 0, included: false },
      { subband: 'LH', x: 0, y: 0, included: true, zeroBitplanes: 2, codingPasses: 1, length: 20 }
    ]);
    assert.strictEqual(header.headerLength, 2);
    assert.strictEqual(header.bodyLength, 20);
  });

  test('long pass counts and bit stuffing after 0xFF', () => {
    const header = decodePacketHeader(
      bytes(0xff, 0x78, 0x04, 0x08),
      0,
      4,
      layout([{ orientation: 'LL', codeBlocksWide: 1, codeBlocksHigh: 1 }])
    );
    assert.ok(header !== undefined);
    assert.deepStrictEqual(header.codeBlocks, [
      { subband: 'LL', x: 0, y: 0, included: true, zeroBitplanes: 0, codingPasses: 37, length: 129 }
    ]);
    assert.strictEqual(header.headerLength, 4);
  });

  test('later layers and multi-segment code-block styles are not decoded', () => {
    const bands = [{ orientation: 'LL' as const, codeBlocksWide: 1, codeBlocksHigh: 1 }];
    assert.strictEqual(decodePacketHeader(bytes(0x80), 0, 1, layout(bands, { layer: 1 })), undefined);
    assert.strictEqual(decodePacketHeader(bytes(0x80), 0, 1, layout(bands, { codeBlockStyle: 0x04 })), undefined);
  });

  test('a header cut short is an unexpected end', () => {
    assert.throws(
      () => decodePacketHeader(bytes(0xc0), 0, 1, layout([{ orientation: 'LL', codeBlocksWide: 1, codeBlocksHigh: 1 }])),
      (err: unknown) => isStructuralError(err) && err.kind === 'UnexpectedEof' && err.offset === 1
    );
  });
});

describe('packetLayouts', () => {
  test('tile bounds are clipped to the image', () => {
    assert.deepStrictEqual(tileBounds(siz(12, 4, 1, 8), 1), { x0: 8, y0: 0, x1: 12, y1: 4 });
  });

  test('code-block grids of each resolution level', () => {
    const layouts = packetLayouts(siz(16, 8), 0, {
      progressionOrder: ProgressionOrder.LRCP,
      layers: 1,
      components: [style(1)]
    });
    assert.ok(layouts !== undefined);
    assert.deepStrictEqual([...layouts], [
      { layer: 0, resolution: 0, component: 0, codeBlockStyle: 0, subbands: [{ orientation: 'LL', codeBlocksWide: 2, codeBlocksHigh: 1 }] },
      {
        layer: 0,
        resolution: 1,
        component: 0,
        codeBlockStyle: 0,
        subbands: [
          { orientation: 'HL', codeBlocksWide: 2, codeBlocksHigh: 1 },
          { orientation: 'LH', codeBlocksWide: 2, codeBlocksHigh: 1 },
          { orientation: 'HH', codeBlocksWide: 2, codeBlocksHigh: 1 }
        ]
      }
    ]);
  });

  test('RLCP nests layers inside resolutions and skips missing levels', () => {
    const layouts = packetLayouts(siz(16, 8, 2), 0, {
      progressionOrder: ProgressionOrder.RLCP,
      layers: 2,
      components: [style(1), style(0)]
    });
    assert.ok(layouts !== undefined);
    assert.deepStrictEqual(
      [...layouts].map(({ layer, resolution, component }) => [layer, resolution, component]),
      [[0, 0, 0], [0, 0, 1], [1, 0, 0], [1, 0, 1], [0, 1, 0], [1, 1, 0]]
    );
  });

  test('several precincts per resolution leave the layout unknown', () => {
    const layouts = packetLayouts(siz(16, 8), 0, {
      progressionOrder: ProgressionOrder.LRCP,
      layers: 1,
      components: [style(0, { precincts: [0x22] })]
    });
    assert.strictEqual(layouts, undefined);
  });

  test('position-driven orders need a tile at the origin', () => {
    const image = siz(16, 8, 1, 8);
    const components = [style(0)];
    assert.strictEqual(packetLayouts(image, 1, { progressionOrder: ProgressionOrder.RPCL, layers: 1, components }), undefined);
    assert.notStrictEqual(packetLayouts(image, 0, { progressionOrder: ProgressionOrder.RPCL, layers: 1, components }), undefined);
    assert.notStrictEqual(packetLayouts(image, 1, { progressionOrder: ProgressionOrder.LRCP, layers: 1, components }), undefined);
  });
});
