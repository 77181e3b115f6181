/**
 * Schema-driven record extraction.
 *
 * A record shape lists, for every property of the record type, the element
 * it is read from and that element's multiplicity:
 *
 * - `exactly-one`: the element must exist, else RequiredElementMissingError
 * - `zero-or-one`: an absent element yields the field's default
 * - zero-or-many (`many`, `texts`): every match in document order; an
 *   absent container yields an empty list
 *
 * The field map is checked against the record type at compile time, so a
 * text property cannot be declared as a list and a nested record cannot be
 * declared as a date.
 */

import { RequiredElementMissingError } from '@plenar/shared';
import type { CalendarDate } from '@plenar/contracts';
import type { ParsedTree, XmlElement } from '../markup/tree.js';
import { findAll, findOne, textOf } from '../lookup/element-lookup.js';
import { toCalendarDate } from '../dates/normalize-date.js';
import { splitList } from './split-list.js';

export type SingleMultiplicity = 'exactly-one' | 'zero-or-one';

/**
 * Builds one record from its element.
 */
export interface RecordShape<T> {
  /** Record name used in error messages */
  readonly name: string;
  build(tree: ParsedTree, element: XmlElement): T;
}

/** Text content; default `''` */
export interface TextField {
  readonly kind: 'text';
  readonly multiplicity: SingleMultiplicity;
  /** Element name, when it differs from the property name */
  readonly element?: string;
}

/** `DD.MM.YYYY` date; default `null` */
export interface DateField {
  readonly kind: 'date';
  readonly multiplicity: SingleMultiplicity;
  readonly element?: string;
}

/** Comma-separated text; default `[]` */
export interface ListField {
  readonly kind: 'list';
  readonly multiplicity: SingleMultiplicity;
  readonly element?: string;
}

/** Text of every matching element (zero-or-many) */
export interface TextsField {
  readonly kind: 'texts';
  readonly element?: string;
  /** Element wrapping the repeated elements */
  readonly container?: string;
}

/** Nested record for every matching element (zero-or-many) */
export interface ManyField<U> {
  readonly kind: 'many';
  readonly element: string;
  readonly container?: string;
  readonly shape: RecordShape<U>;
}

/** Nested record; a zero-or-one field names its default */
export type NestedField<U> =
  | {
      readonly kind: 'nested';
      readonly multiplicity: 'exactly-one';
      readonly element?: string;
      readonly shape: RecordShape<U>;
    }
  | {
      readonly kind: 'nested';
      readonly multiplicity: 'zero-or-one';
      readonly element?: string;
      readonly shape: RecordShape<U>;
      readonly fallback: U;
    };

/**
 * Field declarations allowed for a property of type V.
 */
export type FieldFor<V> = [V] extends [string]
  ? TextField
  : [V] extends [CalendarDate]
    ? DateField
    : [V] extends [readonly string[]]
      ? ListField | TextsField
      : [V] extends [readonly (infer U)[]]
        ? ManyField<U>
        : NestedField<V>;

type AnyField =
  | TextField
  | DateField
  | ListField
  | TextsField
  | ManyField<unknown>
  | NestedField<unknown>;

export type RecordSchema<T> = { readonly [K in keyof T]-?: FieldFor<T[K]> & AnyField };

/**
 * Define how a record type is read from its element.
 *
 * Properties are extracted in declaration order; the first failure aborts
 * the record. Built records and their lists are frozen.
 *
 * @example
 * ```typescript
 * const authorRecord = defineRecord<Author>('author', {
 *   name: { kind: 'text', multiplicity: 'exactly-one' },
 *   born: { kind: 'date', multiplicity: 'zero-or-one', element: 'geburtsdatum' },
 * });
 * ```
 */
export function defineRecord<T extends object>(name: string, schema: RecordSchema<T>): RecordShape<T> {
  const fields = fieldEntries<T>(schema);

  return {
    name,
    build(tree: ParsedTree, element: XmlElement): T {
      const record: Record<string, unknown> = {};
      for (const [property, field] of fields) {
        record[property] = extractField(tree, element, name, property, field);
      }
      const built: unknown = Object.freeze(record);
      return built as T;
    },
  };
}

function fieldEntries<T>(schema: RecordSchema<T>): [string, AnyField][] {
  const entries: [string, AnyField][] = [];
  for (const property in schema) {
    entries.push([property, schema[property]]);
  }
  return entries;
}

function extractField(
  tree: ParsedTree,
  root: XmlElement,
  recordName: string,
  property: string,
  field: AnyField,
): unknown {
  switch (field.kind) {
    case 'text': {
      const found = locate(tree, root, recordName, field.element ?? property, field.multiplicity);
      return found ? textOf(found) : '';
    }

    case 'date': {
      const found = locate(tree, root, recordName, field.element ?? property, field.multiplicity);
      return found ? toCalendarDate(textOf(found)) : null;
    }

    case 'list': {
      const found = locate(tree, root, recordName, field.element ?? property, field.multiplicity);
      return Object.freeze(found ? splitList(textOf(found)) : []);
    }

    case 'texts': {
      const scope = field.container === undefined ? root : findOne(tree, field.container, root);
      const matches = scope ? findAll(tree, field.element ?? property, scope) : [];
      return Object.freeze(matches.map(textOf));
    }

    case 'many': {
      const scope = field.container === undefined ? root : findOne(tree, field.container, root);
      const matches = scope ? findAll(tree, field.element, scope) : [];
      const { shape } = field;
      return Object.freeze(matches.map((match) => shape.build(tree, match)));
    }

    case 'nested': {
      const found = locate(tree, root, recordName, field.element ?? property, field.multiplicity);
      if (found) {
        return field.shape.build(tree, found);
      }
      // locate() has thrown for an absent exactly-one element
      return field.multiplicity === 'zero-or-one' ? field.fallback : undefined;
    }
  }
}

function locate(
  tree: ParsedTree,
  root: XmlElement,
  recordName: string,
  elementName: string,
  multiplicity: SingleMultiplicity,
): XmlElement | undefined {
  const found = findOne(tree, elementName, root);
  if (!found && multiplicity === 'exactly-one') {
    throw new RequiredElementMissingError(elementName, recordName);
  }
  return found;
}
