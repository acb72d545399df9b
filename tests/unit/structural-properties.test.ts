import { describe, test } from 'node:test';
import assert from 'node:assert';
import { parseJp2 } from '../../src/jp2-parser.js';
import { parseJpc } from '../../src/jpc-parser.js';
import { isStructuralError } from '../../src/errors.js';
import { boxChildren, codestreamOf, collectSpans, findBoxes, markersNamed, spansTile } from '../../src/tree.js';
import type { ByteSpan, Codestream } from '../../src/types.js';
import {
  box,
  bytes,
  concat,
  enumeratedColourBox,
  minimalCodestream,
  minimalJp2,
  recordingLogger,
  segment,
  u8
} from '../../src/test-utils/codestream-fixtures.js';

/** Marker spans with each SOD followed by its data span */
function codestreamSpans(codestream: Codestream): ByteSpan[] {
  const spans: ByteSpan[] = [];
  for (const marker of codestream.markers) {
    spans.push(marker.span);
    if (marker.fields.type === 'SOD') spans.push(marker.fields.dataSpan);
  }
  if (codestream.trailing) spans.push(codestream.trailing);
  return spans;
}

const richCodestream = (): Uint8Array =>
  minimalCodestream({
    siz: { width: 2, height: 1, tileWidth: 1, tileHeight: 1 },
    tileParts: [
      { tile: 0, header: [segment(0xff58, u8(0), bytes(2))], data: bytes(0x80, 0x00) },
      { tile: 1, data: bytes(1, 2, 3) }
    ]
  });

describe('structural properties', () => {
  test('top-level boxes tile the file and children tile their payload', () => {
    const data = minimalJp2(richCodestream(), [enumeratedColourBox()]);
    const tree = parseJp2(data, { logger: recordingLogger() });
    assert.ok(tree.format === 'jp2');
    assert.ok(spansTile(collectSpans(tree.boxes), tree.span));
    for (const parent of findBoxes(tree.boxes, 'jp2h')) {
      assert.ok(spansTile(collectSpans(boxChildren(parent)), parent.payloadSpan));
    }
  });

  test('markers and tile-part data tile the codestream', () => {
    const codestream = codestreamOf(parseJp2(minimalJp2(richCodestream()), { logger: recordingLogger() }));
    assert.ok(codestream !== undefined);
    assert.ok(spansTile(codestreamSpans(codestream), codestream.span));
  });

  test('trailing bytes complete the tiling', () => {
    const tree = parseJpc(concat(minimalCodestream(), bytes(9)), { logger: recordingLogger() });
    const codestream = codestreamOf(tree);
    assert.ok(codestream !== undefined);
    assert.ok(spansTile(codestreamSpans(codestream), codestream.span));
  });

  test('every SOT is followed by its SOD before the next SOT', () => {
    const codestream = codestreamOf(parseJpc(richCodestream(), { logger: recordingLogger() }));
    assert.ok(codestream !== undefined);
    const names = codestream.markers.map((m) => m.name).filter((n) => n === 'SOT' || n === 'SOD');
    assert.deepStrictEqual(names, ['SOT', 'SOD', 'SOT', 'SOD']);
    assert.strictEqual(markersNamed(codestream, 'SOT').length, 2);
  });

  test('parsing the same bytes twice gives equal trees', () => {
    const data = minimalJp2(richCodestream(), [enumeratedColourBox()]);
    const first = parseJp2(data, { logger: recordingLogger() });
    const second = parseJp2(data, { logger: recordingLogger() });
    assert.deepStrictEqual(first, second);
  });

  test('every truncation of a JP2 file fails structurally', () => {
    const data = minimalJp2();
    for (let length = 0; length < data.length; length++) {
      assert.throws(
        () => parseJp2(data.subarray(0, length), { logger: recordingLogger() }),
        (err: unknown) => isStructuralError(err),
        `prefix of ${length} byte(s)`
      );
    }
  });

  test('every truncation of a codestream fails structurally', () => {
    const data = richCodestream();
    for (let length = 0; length < data.length; length++) {
      assert.throws(
        () => parseJpc(data.subarray(0, length), { logger: recordingLogger() }),
        (err: unknown) => isStructuralError(err),
        `prefix of ${length} byte(s)`
      );
    }
  });

  test('unknown boxes do not disturb the tiling', () => {
    const data = concat(minimalJp2(), box('zzzz', bytes(1)));
    const tree = parseJp2(data, { logger: recordingLogger() });
    assert.ok(tree.format === 'jp2');
    assert.strictEqual(tree.boxes[4].content.kind, 'opaque');
    assert.ok(spansTile(collectSpans(tree.boxes), tree.span));
  });
});
