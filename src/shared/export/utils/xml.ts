import { XMLBuilder } from 'fast-xml-parser';
import { isPlainObject } from '@/shared/lib/util';

export type XmlNode = string | XmlNode[] | { [element: string]: XmlNode };

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
export const LIST_ITEM_ELEMENT = 'item';

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

/**
 * Maps an arbitrary key to a legal element name: whitespace and other
 * illegal characters become `_`, and names that cannot start an element
 * get a leading `_`.
 */
export function sanitizeElementName(key: string): string {
  const name = key
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(name) ? name : `_${name}`;
}

function uniqueName(taken: Record<string, XmlNode>, name: string): string {
  if (!(name in taken)) {
    return name;
  }
  let suffix = 2;
  while (`${name}_${suffix}` in taken) {
    suffix++;
  }
  return `${name}_${suffix}`;
}

/**
 * Converts a JSON-like value into the node shape XMLBuilder expects: list
 * elements become repeated `item` children and scalars become text.
 */
export function toXmlNode(value: unknown): XmlNode {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return { [LIST_ITEM_ELEMENT]: value.map(toXmlNode) };
  }
  if (isPlainObject(value)) {
    const node: Record<string, XmlNode> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) continue;
      node[uniqueName(node, sanitizeElementName(key))] = toXmlNode(child);
    }
    return node;
  }
  return String(value);
}

export function buildXmlDocument(rootElement: string, value: unknown): string {
  const body: string = builder.build({
    [sanitizeElementName(rootElement)]: toXmlNode(value),
  });
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}
