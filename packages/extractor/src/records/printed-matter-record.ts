import type { PrintedMatter } from '@plenar/contracts';
import { defineRecord } from './define-record.js';

/**
 * Printed matter, read from the single `dokument` element.
 */
export const printedMatterRecord = defineRecord<PrintedMatter>('dokument', {
  wahlperiode: { kind: 'text', multiplicity: 'exactly-one' },
  dokumentart: { kind: 'text', multiplicity: 'exactly-one' },
  drucksachetyp: { kind: 'text', multiplicity: 'zero-or-one' },
  nr: { kind: 'text', multiplicity: 'exactly-one' },
  datum: { kind: 'date', multiplicity: 'exactly-one' },
  titel: { kind: 'text', multiplicity: 'zero-or-one' },
  urheber: { kind: 'texts' },
  autor: { kind: 'texts' },
  text: { kind: 'text', multiplicity: 'exactly-one' },
});
