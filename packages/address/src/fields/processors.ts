/**
 * Field Processors
 * ================
 * Per-field finalization run after tagging and before validation.
 */

import { abbrs } from '../abbreviations/index.js';
import { STATE_CODES, STATE_EXPAND } from '../resources/index.js';
import type { AddressFields, FieldKey } from '../types.js';

const ALPHA_RE = /[A-Za-z]/;
const LEADING_DIGITS_RE = /^\d+/;
const GRID_RE = /^[NSEW]\d+[NSEW]\d+$/;
const UNIT_SEPARATORS_RE = /^[ \-,/]+/;
const BARE_ST_RE = /\bSt\b/g;
const ZERO_PLUS_FOUR_RE = /^(\d{5})[- ]?0{4}$/;

export interface HousenumberParts {
  housenumber: string;
  unit?: string;
}

/**
 * Split a unit designator off a house number.
 *
 * @example
 * ```typescript
 * processHousenumber('123A'); // { housenumber: '123', unit: 'A' }
 * processHousenumber('12-B'); // { housenumber: '12', unit: 'B' }
 * processHousenumber('1200-29'); // { housenumber: '1200-29' }
 * ```
 */
export function processHousenumber(value: string): HousenumberParts {
  const trimmed = value.trim();
  const digits = LEADING_DIGITS_RE.exec(trimmed)?.[0];

  if (!ALPHA_RE.test(trimmed) || !digits || GRID_RE.test(trimmed)) {
    return { housenumber: trimmed };
  }

  const unit = trimmed.slice(digits.length).replace(UNIT_SEPARATORS_RE, '');
  return unit ? { housenumber: digits, unit } : { housenumber: digits };
}

export function processStreet(value: string): string {
  return abbrs(value).replace(BARE_ST_RE, 'Street').replace(/\.+$/, '');
}

export function processCity(value: string): string {
  return abbrs(value, { singleWord: true });
}

/**
 * Canonicalize a state to its 2-letter code. Values that are neither a known
 * name nor a known code are returned without periods, for the validator to
 * judge.
 */
export function processState(value: string): string {
  const stripped = value.replace(/\./g, '').trim();
  const upper = stripped.toUpperCase();

  const code = STATE_EXPAND.get(upper);
  if (code) {
    return code;
  }
  if (upper.length === 2 && STATE_CODES.has(upper)) {
    return upper;
  }
  return stripped;
}

export function processUnit(value: string): string {
  const withoutSpace = value.startsWith('Space') ? value.slice('Space'.length) : value;
  return withoutSpace.replace(/^[ #.]+|[ #.]+$/g, '');
}

export function processPostcode(value: string): string {
  return value.trim().replace(ZERO_PLUS_FOUR_RE, '$1').replace(/ /g, '-');
}

/**
 * Run every field processor over a field map. A unit split off the house
 * number replaces any tagged unit, unless `addr:unit` was already voided.
 */
export function applyFieldProcessors(
  fields: AddressFields,
  removed: readonly FieldKey[] = []
): AddressFields {
  const result: AddressFields = { ...fields };

  if (result['addr:housenumber'] !== undefined) {
    const { housenumber, unit } = processHousenumber(result['addr:housenumber']);
    result['addr:housenumber'] = housenumber;
    if (unit && !removed.includes('addr:unit')) {
      result['addr:unit'] = unit;
    }
  }
  if (result['addr:street'] !== undefined) {
    result['addr:street'] = processStreet(result['addr:street']);
  }
  if (result['addr:city'] !== undefined) {
    result['addr:city'] = processCity(result['addr:city']);
  }
  if (result['addr:state'] !== undefined) {
    result['addr:state'] = processState(result['addr:state']);
  }
  if (result['addr:unit'] !== undefined) {
    result['addr:unit'] = processUnit(result['addr:unit']);
  }
  if (result['addr:postcode'] !== undefined) {
    result['addr:postcode'] = processPostcode(result['addr:postcode']);
  }

  return result;
}
