/**
 * Member roster records (MdB-Stammdaten).
 *
 * Field names follow the roster's element names so that stored records
 * line up with the published data. Text fields are plain strings and may
 * be empty; date fields are UTC-midnight dates or null when the source
 * element is empty or absent.
 */

/**
 * Calendar date at UTC midnight, or null when the source carried no date.
 */
export type CalendarDate = Date | null;

/**
 * One entry of a member's name history.
 * A member has one entry per name change, in document order.
 */
export interface Name {
  readonly nachname: string;
  readonly vorname: string;
  /** Locality suffix used to tell members with equal names apart */
  readonly ortszusatz: string;
  /** Nobility particle */
  readonly adel: string;
  readonly praefix: string;
  /** Salutation title */
  readonly anrede_titel: string;
  /** Academic title */
  readonly akad_titel: string;
  /** Start of this name's validity */
  readonly historie_von: CalendarDate;
  /** End of this name's validity, null while current */
  readonly historie_bis: CalendarDate;
}

/**
 * Biographical data of a member.
 */
export interface Biography {
  readonly geburtsdatum: CalendarDate;
  readonly geburtsort: string;
  readonly geburtsland: string;
  readonly sterbedatum: CalendarDate;
  readonly geschlecht: string;
  /** Marital status, split on commas */
  readonly familienstand: readonly string[];
  readonly religion: string;
  /** Professions, split on commas */
  readonly beruf: readonly string[];
  /** Party abbreviation */
  readonly partei_kurz: string;
  /** Short biography text */
  readonly vita_kurz: string;
  /** Disclosure-obligation flag text */
  readonly veroeffentlichungspflichtiges: string;
}

/**
 * Organizational role held during a term of office.
 */
export interface Institution {
  /** Institution type */
  readonly insart_lang: string;
  /** Institution name */
  readonly ins_lang: string;
  readonly mdbins_von: CalendarDate;
  readonly mdbins_bis: CalendarDate;
  /** Function name */
  readonly fkt_lang: string;
  readonly fktins_von: CalendarDate;
  readonly fktins_bis: CalendarDate;
}

/**
 * One electoral term served by a member.
 */
export interface TermOfOffice {
  /** Electoral term identifier */
  readonly wp: string;
  readonly mdbwp_von: CalendarDate;
  readonly mdbwp_bis: CalendarDate;
  /** Constituency number */
  readonly wkr_nummer: string;
  readonly wkr_name: string;
  /** Constituency state */
  readonly wkr_land: string;
  /** List type */
  readonly liste: string;
  /** Mandate type */
  readonly mandatsart: string;
  readonly institutionen: readonly Institution[];
}

/**
 * Member of the German Bundestag.
 */
export interface Member {
  readonly id: string;
  readonly namen: readonly Name[];
  readonly biografische_angaben: Biography;
  readonly wahlperioden: readonly TermOfOffice[];
}

/**
 * Biography used when a member carries no biographical block.
 */
export const EMPTY_BIOGRAPHY: Biography = Object.freeze({
  geburtsdatum: null,
  geburtsort: '',
  geburtsland: '',
  sterbedatum: null,
  geschlecht: '',
  familienstand: Object.freeze([]),
  religion: '',
  beruf: Object.freeze([]),
  partei_kurz: '',
  vita_kurz: '',
  veroeffentlichungspflichtiges: '',
});
