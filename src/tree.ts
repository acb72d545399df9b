import type { Box, ByteSpan, Codestream, Marker, ParseTree } from './types.js';

/**
 * Children of a superbox; empty for every other box
 */
export function boxChildren(box: Box): readonly Box[] {
  return box.content.kind === 'superbox' ? box.content.children : [];
}

/**
 * Depth-first, document-order search for boxes of one type
 */
export function findBoxes(boxes: readonly Box[], type: string): Box[] {
  const found: Box[] = [];
  const visit = (list: readonly Box[]): void => {
    for (const box of list) {
      if (box.type === type) found.push(box);
      visit(boxChildren(box));
    }
  };
  visit(boxes);
  return found;
}

/**
 * The codestream of a bare JPC tree, or of the first jp2c box
 */
export function codestreamOf(tree: ParseTree): Codestream | undefined {
  if (tree.format === 'jpc') {
    return tree.codestream;
  }
  for (const box of findBoxes(tree.boxes, 'jp2c')) {
    if (box.content.kind === 'codestream') {
      return box.content.codestream;
    }
  }
  return undefined;
}

export function markersNamed(codestream: Codestream, name: string): Marker[] {
  return codestream.markers.filter((marker) => marker.name === name);
}

/**
 * Spans of a box sequence's direct members, in order
 */
export function collectSpans(nodes: readonly { readonly span: ByteSpan }[]): ByteSpan[] {
  return nodes.map((node) => node.span);
}

/**
 * True when the spans cover `region` contiguously with no gap or overlap
 */
export function spansTile(spans: readonly ByteSpan[], region: ByteSpan): boolean {
  let offset = region.offset;
  for (const span of spans) {
    if (span.offset !== offset) return false;
    offset += span.length;
  }
  return offset === region.offset + region.length;
}
