/**
 * Pre-tagging text cleanup
 *
 * Pure string transforms run on the raw input before it reaches the tagger.
 * `cleanAddress(cleanAddress(x)) === cleanAddress(x)` for every input.
 */

const BR_RE = /<br\s*\/?>/gi;
const NON_ASCII_RE = /[^\x20-\x7E\t\n\r]/g;
const LEADING_MARKER_RE =
  /^(?:[\s,.]*(?:(?:mailing|physical|street|postal|site|property)\s+)?(?:address|location)\s*:)+/i;
const TRAILING_COUNTRY_RE =
  /(?:[\s,.]*[\s,](?:U\.?S\.?A|United States(?: of America)?)\.?)+$/i;
const PAREN_RE = /\s*\([^()]*\)/g;
const GRID_RE = /\b[NSEW]\d+ ?[NSEW]\d+\b/gi;
const MULTI_SPACE_RE = /[ \t]+/g;
const EDGE_RE = /^[\s,.]+|[\s,.]+$/g;

/**
 * Replace line-break markup with commas and drop anything outside printable ASCII.
 *
 * @example
 * ```typescript
 * removeBrUnicode('Hello<br/>World—Café'); // 'Hello,WorldCaf'
 * ```
 */
export function removeBrUnicode(value: string): string {
  return value.replace(NON_ASCII_RE, '').replace(BR_RE, ',');
}

/**
 * Surveyor grid addresses (`N65w25055`, `N65 W25055`) lose internal spaces and
 * are upper-cased so the leading direction letter is not read as a word.
 */
export function normalizeGridAddresses(value: string): string {
  return value.replace(GRID_RE, (match) => match.replace(' ', '').toUpperCase());
}

/**
 * Remove parenthetical asides, innermost first, until none are left.
 */
export function removeParentheticals(value: string): string {
  let previous = value;
  let next = value.replace(PAREN_RE, '');
  while (next !== previous) {
    previous = next;
    next = next.replace(PAREN_RE, '');
  }
  return next;
}

function collapseWhitespace(value: string): string {
  return value.replace(MULTI_SPACE_RE, ' ').replace(EDGE_RE, '');
}

/**
 * Clean an address string before sending it to the tagger.
 *
 * @example
 * ```typescript
 * cleanAddress('Address: 345 Maple Rd (rear entrance), Countryside, PA<br>USA');
 * // '345 Maple Rd, Countryside, PA'
 * ```
 */
export function cleanAddress(address: string): string {
  // Removing an aside can close up a `<b(...)r>` into a fresh line break
  let value = removeBrUnicode(removeParentheticals(removeBrUnicode(address)));
  value = collapseWhitespace(value);
  value = collapseWhitespace(value.replace(LEADING_MARKER_RE, ''));
  value = value.replace(TRAILING_COUNTRY_RE, '');
  value = normalizeGridAddresses(value);
  return collapseWhitespace(value);
}
