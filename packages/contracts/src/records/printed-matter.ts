import type { CalendarDate } from './member.js';

/**
 * Parliamentary printed matter (Drucksache): bill, motion, report.
 */
export interface PrintedMatter {
  /** Electoral term */
  readonly wahlperiode: string;
  /** Document type */
  readonly dokumentart: string;
  /** Sub-type, empty when the source names none */
  readonly drucksachetyp: string;
  /** Printed-matter number within the electoral term */
  readonly nr: string;
  readonly datum: CalendarDate;
  /** Title, empty when the source names none */
  readonly titel: string;
  /** Corporate authors in document order */
  readonly urheber: readonly string[];
  /** Personal authors in document order */
  readonly autor: readonly string[];
  /** Full text */
  readonly text: string;
}
