import type { XmlElement } from './element.js';

export interface XmlWriteOptions {
  /** Indentation per nesting level (default: two spaces) */
  indent?: string;
  /** Emit the `<?xml ...?>` declaration (default: true) */
  declaration?: boolean;
}

/** Characters XML 1.0 cannot carry, not even as references */
const ILLEGAL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\ufffe\uffff]/g;

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export function escapeXml(value: string): string {
  return value.replace(ILLEGAL_CHARS, '\ufffd').replace(/[&<>"']/g, (c) => ESCAPES[c]);
}

function writeElement(node: XmlElement, indent: string, depth: number, lines: string[]): void {
  const pad = indent.repeat(depth);
  let open = `<${node.name}`;
  for (const [key, value] of Object.entries(node.attributes)) {
    open += ` ${key}="${escapeXml(value)}"`;
  }

  if (node.children.length === 0) {
    if (node.text === undefined || node.text === '') {
      lines.push(`${pad}${open}/>`);
    } else {
      lines.push(`${pad}${open}>${escapeXml(node.text)}</${node.name}>`);
    }
    return;
  }

  lines.push(`${pad}${open}>`);
  if (node.text !== undefined && node.text !== '') {
    lines.push(`${pad}${indent}${escapeXml(node.text)}`);
  }
  for (const child of node.children) {
    writeElement(child, indent, depth + 1, lines);
  }
  lines.push(`${pad}</${node.name}>`);
}

/**
 * Render an element tree as an XML document
 */
export function writeXml(root: XmlElement, options: XmlWriteOptions = {}): string {
  const lines: string[] = [];
  if (options.declaration ?? true) {
    lines.push('<?xml version="1.0" encoding="UTF-8"?>');
  }
  writeElement(root, options.indent ?? '  ', 0, lines);
  return `${lines.join('\n')}\n`;
}
