/**
 * Basic usage example for jp2xml
 *
 * Parses a JPEG 2000 file, lists its boxes and markers, and writes the XML
 * rendering next to it.
 *
 * Run with: tsx examples/basic-usage.ts image.jp2
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { codestreamOf, encodeTree, isStructuralError, parseAuto, writeXml } from '../src/index.js';

const path = process.argv[2];
if (!path) {
  console.error('Usage: tsx examples/basic-usage.ts <file>');
  process.exit(64);
}

const bytes = readFileSync(path);

try {
  const tree = parseAuto(bytes, {
    logger: { warn: (message: string) => console.warn(`warning: ${message}`) }
  });

  if (tree.format === 'jp2') {
    console.log('Boxes:');
    for (const box of tree.boxes) {
      console.log(`  ${JSON.stringify(box.type)} at ${box.span.offset}, ${box.span.length} bytes`);
    }
  }

  const codestream = codestreamOf(tree);
  if (codestream) {
    console.log(`Codestream: ${codestream.markers.length} markers`);
    for (const marker of codestream.markers) {
      console.log(`  ${marker.name} at ${marker.span.offset} (${marker.scope})`);
    }
  }

  writeFileSync(`${path}.xml`, writeXml(encodeTree(tree, bytes)));
  console.log(`Wrote ${path}.xml`);
} catch (err) {
  if (isStructuralError(err)) {
    console.error(`${err.kind} at offset ${err.offset}: ${err.message}`);
    process.exit(65);
  }
  throw err;
}
