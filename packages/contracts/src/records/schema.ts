/**
 * Input schemas the extractor understands.
 *
 * - member-roster: `version` plus repeated `mdb` elements
 * - printed-matter: a single `dokument` element
 */
export type SchemaKind = 'member-roster' | 'printed-matter';

/**
 * Result of schema detection on a parsed tree.
 */
export type DetectedSchema = SchemaKind | 'unknown';

/**
 * Version string of a member roster, read once per tree.
 */
export type SchemaVersion = string;
