/**
 * XML Serializer
 *
 * Renders an element tree as an indented, UTF-8 declared XML document.
 */

import { escapeAttribute, escapeText, formatValue } from './format';
import type { XmlElement } from './tree';

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const INDENT = '  ';
const NAME_RE = /^[A-Za-z_][\w.\-]*(?::[A-Za-z_][\w.\-]*)?$/;

function assertName(name: string): void {
  if (!NAME_RE.test(name)) {
    throw new Error(`Invalid XML name "${name}"`);
  }
}

function renderElement(el: XmlElement, depth: number, lines: string[]): void {
  assertName(el.name);
  const pad = INDENT.repeat(depth);
  const attrs = el.attributes
    .map(([key, value]) => {
      assertName(key);
      return ` ${key}="${escapeAttribute(formatValue(value))}"`;
    })
    .join('');

  if (el.children.length) {
    lines.push(`${pad}<${el.name}${attrs}>`);
    for (const child of el.children) {
      renderElement(child, depth + 1, lines);
    }
    lines.push(`${pad}</${el.name}>`);
  } else if (el.text !== undefined) {
    lines.push(`${pad}<${el.name}${attrs}>${escapeText(formatValue(el.text))}</${el.name}>`);
  } else {
    lines.push(`${pad}<${el.name}${attrs} />`);
  }
}

export function serialize(root: XmlElement): string {
  const lines = [XML_DECLARATION];
  renderElement(root, 0, lines);
  return lines.join('\n') + '\n';
}

export function serializeToBytes(root: XmlElement): Buffer {
  return Buffer.from(serialize(root), 'utf-8');
}
