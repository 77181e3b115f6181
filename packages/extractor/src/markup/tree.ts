/**
 * Parsed markup tree.
 *
 * The extractor only ever walks this structure; where the markup came from
 * (a file, an archive entry, a byte stream) does not reach it.
 */

export interface XmlText {
  readonly kind: 'text';
  readonly text: string;
}

export interface XmlElement {
  readonly kind: 'element';
  /** Local element name (namespace prefix dropped) */
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

/**
 * A parsed markup document.
 * `document` is a synthetic element whose children are the top-level nodes.
 */
export interface ParsedTree {
  readonly document: XmlElement;
}

export const DOCUMENT_NODE_NAME = '#document';

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === 'element';
}
