/**
 * Record shapes of the member roster.
 *
 * Roster layout, per member:
 *
 * ```
 * mdb
 * ├── id
 * ├── namen/name*                 (name history)
 * ├── biografische_angaben?
 * └── wahlperioden/wahlperiode*
 *     └── institutionen/institution*
 * ```
 */

import {
  EMPTY_BIOGRAPHY,
  type Biography,
  type Institution,
  type Member,
  type Name,
  type TermOfOffice,
} from '@plenar/contracts';
import { defineRecord } from './define-record.js';

export const nameRecord = defineRecord<Name>('name', {
  nachname: { kind: 'text', multiplicity: 'exactly-one' },
  vorname: { kind: 'text', multiplicity: 'exactly-one' },
  ortszusatz: { kind: 'text', multiplicity: 'zero-or-one' },
  adel: { kind: 'text', multiplicity: 'zero-or-one' },
  praefix: { kind: 'text', multiplicity: 'zero-or-one' },
  anrede_titel: { kind: 'text', multiplicity: 'zero-or-one' },
  akad_titel: { kind: 'text', multiplicity: 'zero-or-one' },
  historie_von: { kind: 'date', multiplicity: 'exactly-one' },
  historie_bis: { kind: 'date', multiplicity: 'zero-or-one' },
});

export const biographyRecord = defineRecord<Biography>('biografische_angaben', {
  geburtsdatum: { kind: 'date', multiplicity: 'zero-or-one' },
  geburtsort: { kind: 'text', multiplicity: 'zero-or-one' },
  geburtsland: { kind: 'text', multiplicity: 'zero-or-one' },
  sterbedatum: { kind: 'date', multiplicity: 'zero-or-one' },
  geschlecht: { kind: 'text', multiplicity: 'zero-or-one' },
  familienstand: { kind: 'list', multiplicity: 'zero-or-one' },
  religion: { kind: 'text', multiplicity: 'zero-or-one' },
  beruf: { kind: 'list', multiplicity: 'zero-or-one' },
  partei_kurz: { kind: 'text', multiplicity: 'zero-or-one' },
  vita_kurz: { kind: 'text', multiplicity: 'zero-or-one' },
  veroeffentlichungspflichtiges: { kind: 'text', multiplicity: 'zero-or-one' },
});

export const institutionRecord = defineRecord<Institution>('institution', {
  insart_lang: { kind: 'text', multiplicity: 'exactly-one' },
  ins_lang: { kind: 'text', multiplicity: 'exactly-one' },
  mdbins_von: { kind: 'date', multiplicity: 'zero-or-one' },
  mdbins_bis: { kind: 'date', multiplicity: 'zero-or-one' },
  fkt_lang: { kind: 'text', multiplicity: 'zero-or-one' },
  fktins_von: { kind: 'date', multiplicity: 'zero-or-one' },
  fktins_bis: { kind: 'date', multiplicity: 'zero-or-one' },
});

export const termOfOfficeRecord = defineRecord<TermOfOffice>('wahlperiode', {
  wp: { kind: 'text', multiplicity: 'exactly-one' },
  mdbwp_von: { kind: 'date', multiplicity: 'exactly-one' },
  mdbwp_bis: { kind: 'date', multiplicity: 'zero-or-one' },
  wkr_nummer: { kind: 'text', multiplicity: 'zero-or-one' },
  wkr_name: { kind: 'text', multiplicity: 'zero-or-one' },
  wkr_land: { kind: 'text', multiplicity: 'zero-or-one' },
  liste: { kind: 'text', multiplicity: 'zero-or-one' },
  mandatsart: { kind: 'text', multiplicity: 'zero-or-one' },
  institutionen: {
    kind: 'many',
    container: 'institutionen',
    element: 'institution',
    shape: institutionRecord,
  },
});

export const memberRecord = defineRecord<Member>('mdb', {
  id: { kind: 'text', multiplicity: 'exactly-one' },
  namen: { kind: 'many', container: 'namen', element: 'name', shape: nameRecord },
  biografische_angaben: {
    kind: 'nested',
    multiplicity: 'zero-or-one',
    shape: biographyRecord,
    fallback: EMPTY_BIOGRAPHY,
  },
  wahlperioden: {
    kind: 'many',
    container: 'wahlperioden',
    element: 'wahlperiode',
    shape: termOfOfficeRecord,
  },
});
