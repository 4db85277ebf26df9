/**
 * Lookup tables
 * =============
 * Abbreviation, direction and state tables, read once from `data/` and frozen.
 * Patterns built from them are compiled here too so that every caller shares
 * one immutable copy.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '@addrkit/utils';

const abbreviationTableSchema = z.record(z.string().regex(/^[A-Z]+$/), z.string().min(1));

const streetTypesSchema = z.object({
  abbreviations: abbreviationTableSchema,
  standalone: z.array(z.string().regex(/^[A-Z]+$/)),
});

const stateTableSchema = z.record(z.string().min(1), z.string().regex(/^[A-Z]{2}$/));

function loadTable<T>(fileName: string, schema: z.ZodType<T>): T {
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  const parsed = schema.safeParse(JSON.parse(readFileSync(url, 'utf-8')));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid lookup table ${fileName}`, fileName, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

const streetTypes = loadTable('street-types.json', streetTypesSchema);

function freezeMap(entries: Record<string, string>): ReadonlyMap<string, string> {
  return Object.freeze(new Map(Object.entries(entries)));
}

/** Street type abbreviation → full word, upper case (`BLVD` → `BOULEVARD`) */
export const STREET_EXPAND = freezeMap(streetTypes.abbreviations);

/** General word abbreviation → full word, upper case (`INTL` → `INTERNATIONAL`) */
export const NAME_EXPAND = freezeMap(loadTable('name-abbreviations.json', abbreviationTableSchema));

/** Combined lookup used by the expansion pass; street types win on a shared key */
export const NAME_STREET_EXPAND: ReadonlyMap<string, string> = Object.freeze(
  new Map([...NAME_EXPAND, ...STREET_EXPAND])
);

/** Full street type words, upper case */
export const STREET_TYPE_WORDS: ReadonlySet<string> = Object.freeze(
  new Set([...STREET_EXPAND.values(), ...streetTypes.standalone])
);

export const DIRECTION_EXPAND: ReadonlyMap<string, string> = Object.freeze(
  new Map([
    ['N', 'NORTH'],
    ['S', 'SOUTH'],
    ['E', 'EAST'],
    ['W', 'WEST'],
    ['NE', 'NORTHEAST'],
    ['NW', 'NORTHWEST'],
    ['SE', 'SOUTHEAST'],
    ['SW', 'SOUTHWEST'],
  ])
);

/** State, territory and province names (full and short forms) → 2-letter code */
export const STATE_EXPAND = freezeMap(loadTable('states.json', stateTableSchema));

export const STATE_CODES: ReadonlySet<string> = Object.freeze(new Set(STATE_EXPAND.values()));

export function titleWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function alternation(words: Iterable<string>): string {
  // Longest first so that alternation never stops at a shorter prefix
  return Array.from(new Set(words))
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .join('|');
}

const directionWords = [...DIRECTION_EXPAND.values()].map(titleWord);
const streetTypeWordsTitle = [...STREET_TYPE_WORDS].map(titleWord);

/** `St`/`St.` before a capitalized word that is not a street type or direction */
export const SAINT_PATTERN = new RegExp(
  `\\bSt\\.?(?= (?!(?:${alternation([
    ...[...STREET_EXPAND.keys()].map(titleWord),
    ...streetTypeWordsTitle,
    ...directionWords,
  ])})\\b)[A-Z][a-z])`,
  'g'
);

/** Whole-word, case-insensitive abbreviation with an optional trailing period */
export const NAME_STREET_PATTERN = new RegExp(
  `\\b(${alternation(NAME_STREET_EXPAND.keys())})\\b\\.?`,
  'gi'
);

/**
 * Upper-case direction abbreviation, dotted or not (`N`, `NE`, `N.E.`), standing
 * alone and not directly ahead of a street type word (`E Street` stays).
 */
export const DIRECTION_PATTERN = new RegExp(
  `(?<![\\w.'-])(N\\.?E|N\\.?W|S\\.?E|S\\.?W|[NSEW])\\.?(?![\\w'-])(?! (?:${alternation(
    streetTypeWordsTitle
  )})\\b)`,
  'g'
);

/** Any full street type word, as produced by the expansion pass */
export const STREET_TYPE_WORD_PATTERN = new RegExp(`\\b(?:${alternation(streetTypeWordsTitle)})\\b`);
