/**
 * Markup parsing.
 *
 * Turns XML text into a {@link ParsedTree} with fast-xml-parser's
 * order-preserving output, so repeated children keep their document order.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MarkupSyntaxError } from '@plenar/shared';
import { DOCUMENT_NODE_NAME, type ParsedTree, type XmlElement, type XmlNode } from './tree.js';

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

export interface ParseMarkupOptions {
  /**
   * Lower-case every element name.
   * The published roster spells its elements in upper case (`<MDB>`,
   * `<NACHNAME>`) while the record schemas use lower case.
   * @default true
   */
  lowercaseNames?: boolean;
}

/**
 * Parse XML into a tree.
 *
 * @throws MarkupSyntaxError when the input is not well-formed
 */
export function parseMarkup(markup: string | Buffer, options: ParseMarkupOptions = {}): ParsedTree {
  const xml = typeof markup === 'string' ? markup : markup.toString('utf-8');
  const lowercaseNames = options.lowercaseNames ?? true;

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MarkupSyntaxError(msg, { line, column: col });
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    // Character references (&#252; &#xE4;) are only decoded with htmlEntities
    htmlEntities: true,
    // Mixed content keeps the whitespace between its parts; textOf() trims the result
    trimValues: false,
    transformTagName: (tagName) => (lowercaseNames ? tagName.toLowerCase() : tagName),
  });

  const parsed: unknown = parser.parse(xml);

  return {
    document: {
      kind: 'element',
      name: DOCUMENT_NODE_NAME,
      attributes: {},
      children: toNodes(parsed),
    },
  };
}

/**
 * Convert fast-xml-parser's preserveOrder output:
 * `[{ tag: [...children], ':@': { attr: 'value' } }, { '#text': 'text' }]`
 */
function toNodes(items: unknown): XmlNode[] {
  if (!Array.isArray(items)) {
    return [];
  }

  const list: unknown[] = items;
  const nodes: XmlNode[] = [];

  for (const item of list) {
    if (typeof item !== 'object' || item === null) {
      continue;
    }

    const entries: [string, unknown][] = Object.entries(item);
    const attributeEntry = entries.find(([key]) => key === ATTRIBUTES_KEY);
    const attributes = toAttributes(attributeEntry?.[1]);

    for (const [key, value] of entries) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?') || key.startsWith('!')) {
        continue;
      }

      if (key === TEXT_KEY) {
        const text = typeof value === 'string' ? value : String(value);
        if (text.length > 0) {
          nodes.push({ kind: 'text', text });
        }
        continue;
      }

      const element: XmlElement = {
        kind: 'element',
        name: key,
        attributes,
        children: toNodes(value),
      };
      nodes.push(element);
    }
  }

  return nodes;
}

function toAttributes(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null) {
    return {};
  }

  const attributes: Record<string, string> = {};
  for (const [key, attr] of Object.entries(value)) {
    attributes[key] = typeof attr === 'string' ? attr : String(attr);
  }
  return attributes;
}
