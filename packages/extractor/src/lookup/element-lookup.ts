/**
 * Element lookup over a parsed tree.
 *
 * Matching is by exact local element name. Searches cover all descendants
 * of the root (not just direct children) in depth-first document order.
 */

import { isElement, type ParsedTree, type XmlElement } from '../markup/tree.js';

/**
 * Walk the descendants of `root` in document order.
 */
export function* descendants(root: XmlElement): Generator<XmlElement> {
  const stack: XmlElement[] = root.children.filter(isElement).reverse();

  let element = stack.pop();
  while (element !== undefined) {
    yield element;
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child !== undefined && isElement(child)) {
        stack.push(child);
      }
    }
    element = stack.pop();
  }
}

/**
 * First descendant named `name` under `root` (or the whole tree).
 */
export function findOne(tree: ParsedTree, name: string, root?: XmlElement): XmlElement | undefined {
  for (const element of descendants(root ?? tree.document)) {
    if (element.name === name) {
      return element;
    }
  }
  return undefined;
}

/**
 * Every descendant named `name` under `root` (or the whole tree), in document order.
 */
export function findAll(tree: ParsedTree, name: string, root?: XmlElement): XmlElement[] {
  const matches: XmlElement[] = [];
  for (const element of descendants(root ?? tree.document)) {
    if (element.name === name) {
      matches.push(element);
    }
  }
  return matches;
}

/**
 * Text content of an element and all its descendants, in document order,
 * with leading and trailing whitespace removed.
 */
export function textOf(element: XmlElement): string {
  return collectText(element).trim();
}

function collectText(element: XmlElement): string {
  let text = '';
  for (const child of element.children) {
    text += child.kind === 'text' ? child.text : collectText(child);
  }
  return text;
}
