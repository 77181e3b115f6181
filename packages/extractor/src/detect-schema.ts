/**
 * Schema detection.
 *
 * Detection rules:
 * 1. printed-matter: the tree has a `dokument` element
 * 2. member-roster: the tree has an `mdb` or a `version` element
 * 3. unknown: neither
 */

import type { DetectedSchema } from '@plenar/contracts';
import type { ParsedTree } from './markup/tree.js';
import { findOne } from './lookup/element-lookup.js';
import {
  MEMBER_ELEMENT,
  PRINTED_MATTER_ELEMENT,
  VERSION_ELEMENT,
} from './stream/document-stream.js';

export function detectSchema(tree: ParsedTree): DetectedSchema {
  if (findOne(tree, PRINTED_MATTER_ELEMENT)) {
    return 'printed-matter';
  }
  if (findOne(tree, MEMBER_ELEMENT) || findOne(tree, VERSION_ELEMENT)) {
    return 'member-roster';
  }
  return 'unknown';
}
