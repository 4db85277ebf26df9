/**
 * Casing helpers shared by the abbreviation passes
 */

const WORD_RE = /[A-Za-z]+/g;
const ORDINAL_RE = /\b\d+[SNRT][tTdDhH]\b/g;
export const US_PATTERN = /U\.S\.|U\. S\.|U S(?= )/g;
const ACRONYM_RE = /\b(?:C[RH]|S[RH]|[FR]M|US)\b/gi;

/**
 * Upper-case the first letter of every letter run and lower-case the rest.
 * Digits do not start a word, so `4TH` becomes `4Th` (fixed by `ordReplace`).
 */
export function titleCase(value: string): string {
  return value
    .replace(WORD_RE, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .replace(/'S\b/g, "'s");
}

/**
 * True when the value has letters and none of them are lower case
 */
export function isAllCaps(value: string): boolean {
  return /[A-Z]/.test(value) && !/[a-z]/.test(value);
}

/**
 * `isAllCaps` over the value with route acronyms (`US`, `CR`, `FM`, ...) left
 * out, since the acronym pass upper-cases those in any value.
 */
export function isAllCapsIgnoringAcronyms(value: string): boolean {
  return isAllCaps(value.replace(ACRONYM_RE, ''));
}

/**
 * Fix an ALL-CAPS string.
 *
 * @example
 * ```typescript
 * getTitle('PALM BEACH'); // 'Palm Beach'
 * getTitle('BOSTON'); // 'BOSTON'
 * getTitle('BOSTON', true); // 'Boston'
 * ```
 */
export function getTitle(value: string, singleWord: boolean = false): string {
  if (isAllCaps(value) && (value.includes(' ') || singleWord)) {
    return mcReplace(titleCase(value));
  }
  return value;
}

function mcWord(word: string): string {
  const index = word.indexOf('Mc');
  if (index === -1) {
    return word;
  }
  const rest = word.slice(index + 2);
  return word.slice(0, index + 2) + rest.charAt(0).toUpperCase() + rest.slice(1).toLowerCase();
}

/**
 * Capitalize the letter after a `Mc` prefix: `Fort Mchenry` → `Fort McHenry`.
 */
export function mcReplace(value: string): string {
  return value.replace(/\S*Mc\S*/g, mcWord);
}

/**
 * `U.S.`, `U. S.` and `U S ` → `US`
 */
export function usReplace(value: string): string {
  return value.replace(US_PATTERN, 'US');
}

/**
 * Lower-case a miscapitalized ordinal: `3Rd St. NW` → `3rd St. NW`.
 */
export function ordReplace(value: string): string {
  return value.replace(ORDINAL_RE, (match) => match.toLowerCase());
}
