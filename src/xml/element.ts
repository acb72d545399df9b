/**
 * Ordered, text-ready XML tree produced by the encoder and consumed by the writer
 */
export interface XmlElement {
  name: string;
  /** Insertion order is output order */
  attributes: Record<string, string>;
  children: XmlElement[];
  text?: string;
}

export type XmlValue = string | number | boolean;

export function element(
  name: string,
  attributes: Record<string, XmlValue> = {},
  children: XmlElement[] = []
): XmlElement {
  const attrs: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    attrs[key] = String(value);
  }
  return { name, attributes: attrs, children };
}

/**
 * Leaf element holding a single value
 */
export function field(name: string, value: XmlValue, attributes: Record<string, XmlValue> = {}): XmlElement {
  return { ...element(name, attributes), text: String(value) };
}

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function isXmlName(name: string): boolean {
  return XML_NAME.test(name);
}
