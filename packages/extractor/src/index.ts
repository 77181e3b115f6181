/**
 * @plenar/extractor
 *
 * Record extraction for Bundestag XML.
 *
 * This package provides:
 * - Markup parsing into an order-preserving tree
 * - Element lookup (first match / all matches in document order)
 * - DD.MM.YYYY date normalization
 * - Schema-driven record builders for the member roster and printed matter
 * - Lazy, single-use document streams
 *
 * Extraction is synchronous and side-effect free.
 *
 * @packageDocumentation
 */

// Markup
export { parseMarkup, type ParseMarkupOptions } from './markup/parse-markup.js';
export {
  DOCUMENT_NODE_NAME,
  isElement,
  type ParsedTree,
  type XmlElement,
  type XmlNode,
  type XmlText,
} from './markup/tree.js';

// Lookup
export { findOne, findAll, textOf, descendants } from './lookup/element-lookup.js';

// Dates and lists
export { normalizeDate, toCalendarDate } from './dates/normalize-date.js';
export { splitList } from './records/split-list.js';

// Record shapes
export {
  defineRecord,
  type RecordShape,
  type RecordSchema,
  type FieldFor,
  type SingleMultiplicity,
  type TextField,
  type DateField,
  type ListField,
  type TextsField,
  type ManyField,
  type NestedField,
} from './records/define-record.js';
export {
  nameRecord,
  biographyRecord,
  institutionRecord,
  termOfOfficeRecord,
  memberRecord,
} from './records/member-records.js';
export { printedMatterRecord } from './records/printed-matter-record.js';

// Streams
export {
  DocumentStream,
  memberStream,
  printedMatterStream,
  readSchemaVersion,
  MEMBER_ELEMENT,
  PRINTED_MATTER_ELEMENT,
  VERSION_ELEMENT,
  type ExtractionOutcome,
} from './stream/document-stream.js';
export { detectSchema } from './detect-schema.js';
