/**
 * Minimal XML element tree.
 *
 * Numbers stay typed until serialization so that formatting (decimal places,
 * separator) is decided in one place.
 */

export type XmlNumber =
  | { kind: 'decimal'; value: number }
  | { kind: 'integer'; value: number };

export type XmlValue = string | XmlNumber;

export interface XmlElement {
  name: string;
  /** Insertion order is output order. */
  attributes: Array<[string, XmlValue]>;
  children: XmlElement[];
  text?: XmlValue;
}

export function decimal(value: number): XmlNumber {
  return { kind: 'decimal', value };
}

export function integer(value: number): XmlNumber {
  return { kind: 'integer', value };
}

export function element(
  name: string,
  attributes: Record<string, XmlValue | undefined> = {},
  content: XmlElement[] | XmlValue = []
): XmlElement {
  const attrs = Object.entries(attributes).filter(
    (entry): entry is [string, XmlValue] => entry[1] !== undefined
  );
  if (Array.isArray(content)) {
    return { name, attributes: attrs, children: content };
  }
  return { name, attributes: attrs, children: [], text: content };
}

export function findChild(parent: XmlElement, name: string): XmlElement | undefined {
  return parent.children.find((child) => child.name === name);
}

export function findChildren(parent: XmlElement, name: string): XmlElement[] {
  return parent.children.filter((child) => child.name === name);
}

export function attribute(el: XmlElement, name: string): XmlValue | undefined {
  return el.attributes.find(([key]) => key === name)?.[1];
}
