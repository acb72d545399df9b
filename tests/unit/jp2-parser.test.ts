import { describe, test } from 'node:test';
import assert from 'node:assert';
import { parseJp2 } from '../../src/jp2-parser.js';
import { StructuralError, type StructuralErrorKind } from '../../src/errors.js';
import type { Box, ParseTree } from '../../src/types.js';
import {
  box,
  bytes,
  concat,
  enumeratedColourBox,
  extendedBox,
  fileTypeBox,
  imageHeaderBox,
  minimalCodestream,
  minimalJp2,
  recordingLogger,
  signatureBox,
  str,
  toEndBox,
  u32
} from '../../src/test-utils/codestream-fixtures.js';

function boxesOf(tree: ParseTree): readonly Box[] {
  assert.strictEqual(tree.format, 'jp2');
  return tree.format === 'jp2' ? tree.boxes : [];
}

function fails(kind: StructuralErrorKind, offset: number, node?: string) {
  return (err: unknown): boolean => {
    assert.ok(err instanceof StructuralError, `expected a StructuralError, got ${String(err)}`);
    assert.strictEqual(err.kind, kind, err.message);
    assert.strictEqual(err.offset, offset, err.message);
    assert.strictEqual(err.node, node, err.message);
    return true;
  };
}

describe('parseJp2', () => {
  test('parses the minimal file into four top-level boxes', () => {
    const data = minimalJp2();
    const logger = recordingLogger();
    const tree = parseJp2(data, { logger });
    const boxes = boxesOf(tree);

    assert.deepStrictEqual(tree.span, { offset: 0, length: 145 });
    assert.deepStrictEqual(boxes.map((b) => b.type), ['jP  ', 'ftyp', 'jp2h', 'jp2c']);
    assert.deepStrictEqual(boxes.map((b) => b.span), [
      { offset: 0, length: 12 },
      { offset: 12, length: 20 },
      { offset: 32, length: 30 },
      { offset: 62, length: 83 }
    ]);

    const jp2c = boxes[3];
    assert.deepStrictEqual(jp2c.payloadSpan, { offset: 70, length: 75 });
    assert.strictEqual(jp2c.content.kind, 'codestream');
    if (jp2c.content.kind === 'codestream') {
      assert.deepStrictEqual(
        jp2c.content.codestream.markers.map((m) => m.name),
        ['SOC', 'SIZ', 'COD', 'SOT', 'SOD', 'EOC']
      );
      assert.strictEqual(jp2c.content.codestream.markers[0].span.offset, 70);
    }

    assert.strictEqual(logger.warnings.length, 2);
    assert.match(logger.warnings[0], /no colour specification box/);
    assert.match(logger.warnings[1], /no QCD/);
  });

  test('decodes the image header inside jp2h', () => {
    const boxes = boxesOf(parseJp2(minimalJp2(), { logger: recordingLogger() }));
    const jp2h = boxes[2];
    assert.strictEqual(jp2h.content.kind, 'superbox');
    if (jp2h.content.kind !== 'superbox') return;

    const ihdr = jp2h.content.children[0];
    assert.deepStrictEqual(ihdr.span, { offset: 40, length: 22 });
    assert.deepStrictEqual(ihdr.content, {
      kind: 'record',
      record: {
        box: 'ihdr',
        height: 1,
        width: 1,
        components: 1,
        bitsPerComponent: 7,
        depth: { raw: 7, bits: 8, signed: false },
        compressionType: 7,
        colourspaceUnknown: 0,
        intellectualProperty: 0
      }
    });
  });

  test('keeps an unknown box between known boxes as opaque', () => {
    const data = concat(
      signatureBox(),
      fileTypeBox(),
      box('abcd', bytes(1, 2, 3)),
      box('jp2h', imageHeaderBox(), enumeratedColourBox()),
      box('jp2c', minimalCodestream())
    );
    const boxes = boxesOf(parseJp2(data, { logger: recordingLogger() }));

    assert.deepStrictEqual(boxes.map((b) => b.type), ['jP  ', 'ftyp', 'abcd', 'jp2h', 'jp2c']);
    const unknown = boxes[2];
    assert.deepStrictEqual(unknown.span, { offset: 32, length: 11 });
    assert.deepStrictEqual(unknown.payloadSpan, { offset: 40, length: 3 });
    assert.deepStrictEqual(unknown.content, { kind: 'opaque' });
    assert.strictEqual(boxes[3].span.offset, 43);
  });

  test('reads extended box lengths', () => {
    const data = concat(
      signatureBox(),
      fileTypeBox(),
      box('jp2h', imageHeaderBox()),
      extendedBox('jp2c', minimalCodestream())
    );
    const jp2c = boxesOf(parseJp2(data, { logger: recordingLogger() }))[3];
    assert.strictEqual(jp2c.lengthField, 'extended');
    assert.strictEqual(jp2c.headerLength, 16);
    assert.deepStrictEqual(jp2c.span, { offset: 62, length: 91 });
    assert.deepStrictEqual(jp2c.payloadSpan, { offset: 78, length: 75 });
  });

  test('a zero length runs to the end of the file', () => {
    const data = concat(signatureBox(), fileTypeBox(), box('jp2h', imageHeaderBox()), toEndBox('jp2c', minimalCodestream()));
    const jp2c = boxesOf(parseJp2(data, { logger: recordingLogger() }))[3];
    assert.strictEqual(jp2c.lengthField, 'to-end');
    assert.deepStrictEqual(jp2c.span, { offset: 62, length: 83 });
  });

  test('requires the signature box first', () => {
    const data = concat(fileTypeBox(), box('jp2h', imageHeaderBox()), box('jp2c', minimalCodestream()));
    assert.throws(() => parseJp2(data), fails('MissingMandatoryElement', 0, 'jP  '));
  });

  test('requires the file type box second', () => {
    const data = concat(signatureBox(), box('jp2h', imageHeaderBox()), box('jp2c', minimalCodestream()));
    assert.throws(() => parseJp2(data), fails('MissingMandatoryElement', 12, 'ftyp'));
  });

  test('a file of only the signature box is missing its file type box', () => {
    assert.throws(() => parseJp2(signatureBox()), fails('MissingMandatoryElement', 12, 'ftyp'));
  });

  test('requires jp2h before jp2c', () => {
    const data = concat(signatureBox(), fileTypeBox(), box('jp2c', minimalCodestream()), box('jp2h', imageHeaderBox()));
    assert.throws(() => parseJp2(data), fails('MissingMandatoryElement', 32, 'jp2h'));
  });

  test('requires a codestream box', () => {
    const data = concat(signatureBox(), fileTypeBox(), box('jp2h', imageHeaderBox()));
    assert.throws(() => parseJp2(data, { logger: recordingLogger() }), fails('MissingMandatoryElement', 62, 'jp2c'));
  });

  test('jp2h must open with the image header', () => {
    const data = minimalJp2(minimalCodestream(), []);
    data.set(str('colr'), 44);
    assert.throws(() => parseJp2(data), fails('MissingMandatoryElement', 40, 'ihdr'));
  });

  test('rejects a second image header', () => {
    const data = minimalJp2(minimalCodestream(), [imageHeaderBox()]);
    assert.throws(() => parseJp2(data), fails('StructuralInconsistency', 62, 'ihdr'));
  });

  test('rejects an empty jp2h', () => {
    const data = concat(signatureBox(), fileTypeBox(), box('jp2h'), box('jp2c', minimalCodestream()));
    assert.throws(() => parseJp2(data), fails('MissingMandatoryElement', 40, 'ihdr'));
  });

  test('rejects a box longer than its scope', () => {
    const data = minimalJp2();
    assert.throws(
      () => parseJp2(data.subarray(0, data.length - 1), { logger: recordingLogger() }),
      fails('StructuralInconsistency', 62, 'jp2c')
    );
  });

  test('rejects the reserved lengths 2 to 7', () => {
    const data = concat(signatureBox(), fileTypeBox(), u32(4), str('abcd'));
    assert.throws(() => parseJp2(data), fails('StructuralInconsistency', 32, 'abcd'));
  });

  test('a leaf box too short for its fields is inconsistent', () => {
    const data = concat(
      signatureBox(),
      fileTypeBox(),
      box('jp2h', box('ihdr', u32(1), u32(1))),
      box('jp2c', minimalCodestream())
    );
    assert.throws(() => parseJp2(data), fails('StructuralInconsistency', 40, 'ihdr'));
  });

  test('a compatibility list with a partial entry is inconsistent', () => {
    const data = concat(
      signatureBox(),
      box('ftyp', str('jp2 '), u32(0), str('jp2 '), bytes(0, 0, 0)),
      box('jp2h', imageHeaderBox()),
      box('jp2c', minimalCodestream())
    );
    assert.throws(() => parseJp2(data), fails('StructuralInconsistency', 12, 'ftyp'));
  });

  test('enforces the nesting limit', () => {
    assert.throws(() => parseJp2(minimalJp2(), { maxDepth: 0 }), fails('StructuralInconsistency', 40, 'jp2h'));
  });

  test('codestream errors surface with absolute offsets', () => {
    const data = minimalJp2(minimalCodestream({ eoc: false }));
    assert.throws(() => parseJp2(data, { logger: recordingLogger() }), fails('MissingMandatoryElement', 143, 'EOC'));
  });

  test('traces box boundaries through the debug logger', () => {
    const logger = recordingLogger();
    parseJp2(minimalJp2(), { logger });
    assert.strictEqual(logger.debugLines[0], '"jP  " box start at 0, length 12');
    assert.strictEqual(logger.debugLines[1], '"jP  " box finish at 12');
  });
});
