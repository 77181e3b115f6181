/**
 * Document streams.
 *
 * A stream builds one record per top-level element, lazily and in
 * document order. A top-level element that fails to build is reported at
 * its position instead of being skipped; the consumer decides whether to
 * abort the file or carry on.
 */

import type { Member, PrintedMatter, SchemaVersion } from '@plenar/contracts';
import { EmptyInputError, RequiredElementMissingError, StreamConsumedError } from '@plenar/shared';
import type { ParsedTree, XmlElement } from '../markup/tree.js';
import { findAll, findOne, textOf } from '../lookup/element-lookup.js';
import type { RecordShape } from '../records/define-record.js';
import { memberRecord } from '../records/member-records.js';
import { printedMatterRecord } from '../records/printed-matter-record.js';

export const MEMBER_ELEMENT = 'mdb';
export const PRINTED_MATTER_ELEMENT = 'dokument';
export const VERSION_ELEMENT = 'version';

/**
 * Result of building one top-level element.
 */
export type ExtractionOutcome<T> =
  | { readonly ok: true; readonly position: number; readonly record: T }
  | { readonly ok: false; readonly position: number; readonly error: Error };

/**
 * Lazy, finite, single-use sequence of extraction outcomes.
 */
export class DocumentStream<T> implements Iterable<ExtractionOutcome<T>> {
  private readonly tree: ParsedTree;
  private readonly elements: readonly XmlElement[];
  private readonly shape: RecordShape<T>;
  private consumed = false;

  constructor(tree: ParsedTree, elements: readonly XmlElement[], shape: RecordShape<T>) {
    this.tree = tree;
    this.elements = elements;
    this.shape = shape;
  }

  /**
   * Number of top-level elements the stream will visit.
   */
  get size(): number {
    return this.elements.length;
  }

  /**
   * Record name of the elements this stream builds.
   */
  get recordName(): string {
    return this.shape.name;
  }

  [Symbol.iterator](): Iterator<ExtractionOutcome<T>> {
    if (this.consumed) {
      throw new StreamConsumedError();
    }
    this.consumed = true;
    return this.outcomes();
  }

  /**
   * Records only; throws the first extraction failure.
   */
  *records(): Generator<T> {
    for (const outcome of this) {
      if (!outcome.ok) {
        throw outcome.error;
      }
      yield outcome.record;
    }
  }

  private *outcomes(): Generator<ExtractionOutcome<T>> {
    for (const [position, element] of this.elements.entries()) {
      let outcome: ExtractionOutcome<T>;
      try {
        outcome = { ok: true, position, record: this.shape.build(this.tree, element) };
      } catch (error) {
        outcome = {
          ok: false,
          position,
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }
      yield outcome;
    }
  }
}

/**
 * One Member per `mdb` element; empty when the roster has none.
 */
export function memberStream(tree: ParsedTree): DocumentStream<Member> {
  return new DocumentStream(tree, findAll(tree, MEMBER_ELEMENT), memberRecord);
}

/**
 * Exactly one PrintedMatter per tree.
 *
 * @throws EmptyInputError when the tree has no `dokument` element
 */
export function printedMatterStream(tree: ParsedTree): DocumentStream<PrintedMatter> {
  const element = findOne(tree, PRINTED_MATTER_ELEMENT);
  if (!element) {
    throw new EmptyInputError(PRINTED_MATTER_ELEMENT);
  }
  return new DocumentStream(tree, [element], printedMatterRecord);
}

/**
 * Roster version, read once per tree.
 *
 * @throws RequiredElementMissingError when the tree has no `version` element
 */
export function readSchemaVersion(tree: ParsedTree): SchemaVersion {
  const element = findOne(tree, VERSION_ELEMENT);
  if (!element) {
    throw new RequiredElementMissingError(VERSION_ELEMENT, 'document');
  }
  return textOf(element);
}
