/**
 * Abbreviation Passes
 * ===================
 * The ordered rewrite cascade applied to one field value. Order matters:
 * `saint` must run before `street-and-name` expands `St` to `Street`, and
 * `state-route` checks for street type words the expansion produced.
 */

import {
  DIRECTION_EXPAND,
  DIRECTION_PATTERN,
  NAME_STREET_EXPAND,
  NAME_STREET_PATTERN,
  SAINT_PATTERN,
  STREET_TYPE_WORD_PATTERN,
  titleWord,
} from '../resources/index.js';
import {
  US_PATTERN,
  isAllCapsIgnoringAcronyms,
  mcReplace,
  ordReplace,
  titleCase,
} from './rewrites.js';

export interface AbbreviationOptions {
  /** Title-case a lone ALL-CAPS word too (city names) */
  singleWord?: boolean;
}

export type PassName =
  | 'title-case'
  | 'mc-prefix'
  | 'us-normalize'
  | 'ordinal-suffix'
  | 'saint'
  | 'street-and-name'
  | 'directional'
  | 'us-renormalize'
  | 'acronym-case'
  | 'abbreviation-periods'
  | 'state-route'
  | 'trim';

export type Replacer = (match: string, ...groups: string[]) => string;

export interface AbbreviationPass {
  readonly name: PassName;
  readonly match: RegExp;
  readonly rewrite: string | Replacer;
  /** Pass is skipped unless this holds for the current value */
  readonly when?: (value: string, options: AbbreviationOptions) => boolean;
}

export const ABBREVIATION_PASSES: readonly AbbreviationPass[] = Object.freeze([
  {
    name: 'title-case',
    match: /^[\s\S]+$/,
    rewrite: (value: string) => titleCase(value),
    when: (value: string, options: AbbreviationOptions) =>
      isAllCapsIgnoringAcronyms(value) && (value.includes(' ') || options.singleWord === true),
  },
  {
    name: 'mc-prefix',
    match: /^[\s\S]+$/,
    rewrite: (value: string) => mcReplace(value),
  },
  {
    name: 'us-normalize',
    match: US_PATTERN,
    rewrite: 'US',
  },
  {
    name: 'ordinal-suffix',
    match: /^[\s\S]+$/,
    rewrite: (value: string) => ordReplace(value),
  },
  {
    name: 'saint',
    match: SAINT_PATTERN,
    rewrite: 'Saint',
  },
  {
    name: 'street-and-name',
    match: NAME_STREET_PATTERN,
    rewrite: (match: string, key: string) => {
      const expanded = NAME_STREET_EXPAND.get(key.toUpperCase());
      return expanded ? titleCase(expanded) : match;
    },
  },
  {
    name: 'directional',
    match: DIRECTION_PATTERN,
    rewrite: (match: string, direction: string) => {
      const expanded = DIRECTION_EXPAND.get(direction.replace(/\./g, ''));
      return expanded ? titleWord(expanded) : match;
    },
  },
  {
    name: 'us-renormalize',
    match: US_PATTERN,
    rewrite: 'US',
  },
  {
    name: 'acronym-case',
    match: /\b(C[rh]|S[rh]|[FR]m|Us)\b\.?/g,
    rewrite: (_match: string, acronym: string) => acronym.toUpperCase(),
  },
  {
    name: 'abbreviation-periods',
    match: /([a-zA-Z]{2,})\.+/g,
    rewrite: '$1',
  },
  {
    name: 'state-route',
    match: /\bSR\b/g,
    rewrite: 'State Route',
    when: (value: string) => !STREET_TYPE_WORD_PATTERN.test(value),
  },
  {
    name: 'trim',
    match: /^[\s.,]+|[\s.,]+$/g,
    rewrite: '',
  },
] satisfies AbbreviationPass[]);

/**
 * Apply one pass to a value. Unmatched text passes through unchanged.
 */
export function applyPass(
  pass: AbbreviationPass,
  value: string,
  options: AbbreviationOptions = {}
): string {
  if (pass.when && !pass.when(value, options)) {
    return value;
  }
  return replaceWith(value, pass.match, pass.rewrite);
}

function replaceWith(value: string, match: RegExp, rewrite: string | Replacer): string {
  // String.replace has no overload taking the union
  return typeof rewrite === 'string' ? value.replace(match, rewrite) : value.replace(match, rewrite);
}

export function getPass(name: PassName): AbbreviationPass {
  const pass = ABBREVIATION_PASSES.find((p) => p.name === name);
  if (!pass) {
    throw new Error(`Unknown abbreviation pass '${name}'`);
  }
  return pass;
}
