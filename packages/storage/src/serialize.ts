/**
 * JSON serialization shared by the record stores.
 *
 * Records are stored as JSON documents: dates become ISO-8601 strings,
 * frozen arrays and objects become plain ones.
 */

export function serializeRecord(record: object): string {
  return JSON.stringify(record);
}

/**
 * Serialize and read back, yielding the document a JSON store would hold.
 */
export function toDocument(record: object): Record<string, unknown> {
  const parsed: unknown = JSON.parse(serializeRecord(record));
  if (!isPlainObject(parsed)) {
    throw new TypeError('Record must serialize to a JSON object');
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON containment with the semantics of PostgreSQL's `jsonb @>`:
 * objects contain every key of the filter, arrays contain every filter
 * element somewhere, scalars compare equal.
 */
export function containsJson(document: unknown, filter: unknown): boolean {
  if (Array.isArray(filter)) {
    return (
      Array.isArray(document) &&
      filter.every((wanted: unknown) => document.some((item: unknown) => containsJson(item, wanted)))
    );
  }
  if (isPlainObject(filter)) {
    return (
      isPlainObject(document) &&
      Object.entries(filter).every(
        ([key, wanted]) => key in document && containsJson(document[key], wanted),
      )
    );
  }
  return document === filter;
}
