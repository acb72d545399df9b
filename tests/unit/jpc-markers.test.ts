import { describe, test } from 'node:test';
import assert from 'node:assert';
import { ByteCursor } from '../../src/byte-cursor.js';
import {
  componentIndexWidth,
  decodeCoc,
  decodeCod,
  decodeCom,
  decodeCrg,
  decodePlm,
  decodePlt,
  decodePoc,
  decodePpm,
  decodeQcd,
  decodeRgn,
  decodeSiz,
  decodeSot,
  decodeTlm,
  readPacketLengths,
  type SegmentContext
} from '../../src/jpc-markers.js';
import { isStructuralError } from '../../src/errors.js';
import { bytes, codSegment, concat, sizSegment, u16, u32, u8 } from '../../src/test-utils/codestream-fixtures.js';

const ctx = (components = 1): SegmentContext => ({ offset: 10, components });

/** Segment body: everything after the marker code and Lxxx */
const bodyOf = (segment: Uint8Array): ByteCursor => new ByteCursor(segment.subarray(4));

function inconsistentAt(node: string) {
  return (err: unknown): boolean =>
    isStructuralError(err) && err.kind === 'StructuralInconsistency' && err.offset === 10 && err.node === node;
}

describe('SIZ', () => {
  test('decodes component precision and signedness', () => {
    const siz = decodeSiz(bodyOf(sizSegment({ width: 640, height: 480, components: 2, ssiz: 0x8b })), ctx());
    assert.strictEqual(siz.csiz, 2);
    assert.strictEqual(siz.xsiz, 640);
    assert.strictEqual(siz.tilesX, 1);
    assert.deepStrictEqual(siz.components[1], { ssiz: 0x8b, precision: 12, signed: true, xRsiz: 1, yRsiz: 1 });
  });

  test('rejects zero components', () => {
    assert.throws(() => decodeSiz(bodyOf(sizSegment({ components: 0 })), ctx()), inconsistentAt('SIZ'));
  });

  test('rejects an empty tile size', () => {
    assert.throws(() => decodeSiz(bodyOf(sizSegment({ tileWidth: 0 })), ctx()), inconsistentAt('SIZ'));
  });

  test('rejects precision above 38 bits', () => {
    assert.throws(() => decodeSiz(bodyOf(sizSegment({ ssiz: 38 })), ctx()), inconsistentAt('SIZ'));
  });

  test('component bytes must match Csiz', () => {
    const body = sizSegment({ components: 2 }).subarray(4, -3);
    assert.throws(() => decodeSiz(new ByteCursor(body), ctx()), inconsistentAt('SIZ'));
  });
});

describe('COD and COC', () => {
  test('decodes precinct sizes when Scod asks for them', () => {
    const cod = decodeCod(bodyOf(codSegment({ levels: 1, precincts: [0x77, 0x88] })), ctx());
    assert.strictEqual(cod.scod, 1);
    assert.deepStrictEqual(cod.parameters, {
      decompositionLevels: 1,
      codeBlockWidthExponent: 4,
      codeBlockHeightExponent: 4,
      codeBlockStyle: 0,
      transformation: 1,
      precincts: [0x77, 0x88]
    });
  });

  test('rejects an unknown progression order', () => {
    const body = concat(u8(0), u8(5), u16(1), u8(0), bytes(0, 4, 4, 0, 1));
    assert.throws(() => decodeCod(new ByteCursor(body), ctx()), inconsistentAt('COD'));
  });

  test('multiple component transform needs three components', () => {
    assert.throws(() => decodeCod(bodyOf(codSegment({ mct: 1 })), ctx(1)), inconsistentAt('COD'));
    assert.strictEqual(decodeCod(bodyOf(codSegment({ mct: 1 })), ctx(3)).multipleComponentTransform, 1);
  });

  test('code-block exponents are bounded', () => {
    const body = concat(u8(0), u8(0), u16(1), u8(0), bytes(0, 5, 4, 0, 1));
    assert.throws(() => decodeCod(new ByteCursor(body), ctx()), inconsistentAt('COD'));
  });

  test('decomposition levels are bounded', () => {
    assert.throws(() => decodeCod(bodyOf(codSegment({ levels: 33 })), ctx()), inconsistentAt('COD'));
  });

  test('COC component index widens past 256 components', () => {
    assert.strictEqual(componentIndexWidth(256), 1);
    assert.strictEqual(componentIndexWidth(257), 2);
    const coc = decodeCoc(new ByteCursor(concat(u16(299), u8(0), bytes(1, 4, 4, 0, 1))), ctx(300));
    assert.strictEqual(coc.component, 299);
    assert.strictEqual(coc.parameters.decompositionLevels, 1);
  });

  test('COC component must exist', () => {
    assert.throws(
      () => decodeCoc(new ByteCursor(concat(u8(1), u8(0), bytes(1, 4, 4, 0, 1))), ctx(1)),
      inconsistentAt('COC')
    );
  });
});

describe('QCD, QCC and RGN', () => {
  test('no quantization steps are 8-bit exponents', () => {
    const qcd = decodeQcd(new ByteCursor(bytes(0x40, 0x48, 0x50)), ctx());
    assert.deepStrictEqual(qcd.quantization, {
      sq: 0x40,
      guardBits: 2,
      style: 0,
      steps: [
        { raw: 0x48, exponent: 9 },
        { raw: 0x50, exponent: 10 }
      ]
    });
  });

  test('scalar steps split into exponent and mantissa', () => {
    const qcd = decodeQcd(new ByteCursor(concat(u8(0x22), u16(0x4801))), ctx());
    assert.strictEqual(qcd.quantization.guardBits, 1);
    assert.deepStrictEqual(qcd.quantization.steps, [{ raw: 0x4801, exponent: 9, mantissa: 1 }]);
  });

  test('scalar steps need an even byte count', () => {
    assert.throws(() => decodeQcd(new ByteCursor(bytes(0x42, 1, 2, 3)), ctx()), inconsistentAt('QCD'));
  });

  test('rejects an unknown quantization style', () => {
    assert.throws(() => decodeQcd(new ByteCursor(bytes(0x43, 1, 2)), ctx()), inconsistentAt('QCD'));
  });

  test('at least one step is required', () => {
    assert.throws(() => decodeQcd(new ByteCursor(bytes(0x40)), ctx()), inconsistentAt('QCD'));
  });

  test('RGN supports the implicit style only', () => {
    assert.deepStrictEqual(decodeRgn(new ByteCursor(bytes(0, 0, 5)), ctx()), {
      type: 'RGN',
      component: 0,
      style: 0,
      shift: 5
    });
    assert.throws(() => decodeRgn(new ByteCursor(bytes(0, 1, 5)), ctx()), inconsistentAt('RGN'));
  });
});

describe('POC', () => {
  test('CEpoc 0 stands for 256', () => {
    const poc = decodePoc(new ByteCursor(concat(u8(0), u8(0), u16(1), u8(1), u8(0), u8(0))), ctx(3));
    assert.deepStrictEqual(poc.changes, [
      { resolutionStart: 0, componentStart: 0, layerEnd: 1, resolutionEnd: 1, componentEnd: 256, progressionOrder: 0 }
    ]);
  });

  test('entries are seven bytes with one-byte component indices', () => {
    assert.throws(() => decodePoc(new ByteCursor(bytes(0, 0, 0, 1, 1, 0)), ctx(3)), inconsistentAt('POC'));
  });

  test('resolution range must be increasing', () => {
    const body = concat(u8(2), u8(0), u16(1), u8(2), u8(1), u8(0));
    assert.throws(() => decodePoc(new ByteCursor(body), ctx(3)), inconsistentAt('POC'));
  });
});

describe('TLM, PLM and PLT', () => {
  test('TLM with one-byte tile indices and 32-bit lengths', () => {
    const tlm = decodeTlm(new ByteCursor(concat(u8(0), u8(0x50), u8(0), u32(100), u8(1), u32(200))), ctx());
    assert.deepStrictEqual(tlm.entries, [
      { tile: 0, length: 100 },
      { tile: 1, length: 200 }
    ]);
  });

  test('TLM without tile indices', () => {
    const tlm = decodeTlm(new ByteCursor(concat(u8(3), u8(0x00), u16(14))), ctx());
    assert.strictEqual(tlm.index, 3);
    assert.deepStrictEqual(tlm.entries, [{ length: 14 }]);
  });

  test('TLM tile index size 3 is reserved', () => {
    assert.throws(() => decodeTlm(new ByteCursor(bytes(0, 0x30)), ctx()), inconsistentAt('TLM'));
  });

  test('packet lengths are seven bits per byte', () => {
    assert.deepStrictEqual(readPacketLengths(new ByteCursor(bytes(0x81, 0x00, 0x05)), 10, 'PLT'), [128, 5]);
  });

  test('an unterminated packet length is inconsistent', () => {
    assert.throws(() => readPacketLengths(new ByteCursor(bytes(0x05, 0x81)), 10, 'PLT'), inconsistentAt('PLT'));
  });

  test('PLM groups lengths by run', () => {
    const plm = decodePlm(new ByteCursor(concat(u8(0), u8(2), bytes(0x81, 0x00), u8(1), bytes(0x07))), ctx());
    assert.deepStrictEqual(plm.runs, [[128], [7]]);
  });

  test('PLT lists the lengths of one tile-part', () => {
    assert.deepStrictEqual(decodePlt(new ByteCursor(bytes(0, 3, 2)), ctx()), {
      type: 'PLT',
      index: 0,
      packetLengths: [3, 2]
    });
  });
});

describe('PPM, CRG, COM and SOT', () => {
  test('PPM keeps its headers by span', () => {
    assert.deepStrictEqual(decodePpm(new ByteCursor(bytes(0, 1, 2, 3))), {
      type: 'PPM',
      index: 0,
      data: { offset: 1, length: 3 }
    });
  });

  test('CRG has one offset pair per component', () => {
    const crg = decodeCrg(new ByteCursor(concat(u16(1), u16(2), u16(3), u16(4))), ctx(2));
    assert.deepStrictEqual(crg.offsets, [
      { x: 1, y: 2 },
      { x: 3, y: 4 }
    ]);
    assert.throws(() => decodeCrg(new ByteCursor(concat(u16(1), u16(2))), ctx(2)), inconsistentAt('CRG'));
  });

  test('COM text is decoded for Latin registration', () => {
    const com = decodeCom(new ByteCursor(concat(u16(1), bytes(0x63, 0x61, 0x66, 0xe9))));
    assert.deepStrictEqual(com, { type: 'COM', registration: 1, text: 'café', data: { offset: 2, length: 4 } });
  });

  test('binary COM keeps only the span', () => {
    const com = decodeCom(new ByteCursor(concat(u16(0), bytes(1, 2))));
    assert.deepStrictEqual(com, { type: 'COM', registration: 0, data: { offset: 2, length: 2 } });
  });

  test('SOT fields', () => {
    assert.deepStrictEqual(decodeSot(new ByteCursor(concat(u16(3), u32(1000), u8(1), u8(2)))), {
      type: 'SOT',
      tileIndex: 3,
      tilePartLength: 1000,
      tilePartIndex: 1,
      tilePartCount: 2
    });
  });
});
