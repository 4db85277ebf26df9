/**
 * Rule Tagger
 * ===========
 * Deterministic address token classifier used when no other tagger is
 * supplied. It labels tokens with the same vocabulary a statistical tagger
 * emits and follows the same contract: a field map when every label forms a
 * single run, `AmbiguousTaggingError` with the full token sequence otherwise.
 *
 * Layout rules, in the order they are applied:
 * - trailing ZIP / ZIP+4 tokens
 * - state name or code just ahead of the ZIP (or closing its own segment)
 * - a recipient line with no digits ahead of a street line
 * - the street line: PO box, house number, street parts, occupancy
 * - remaining segments: occupancy, building, or place name
 */

import { AmbiguousTaggingError, type RawTaggedToken } from '@addrkit/utils';
import type { LabelFieldMap, TaggerLabel } from '../labels.js';
import {
  DIRECTION_EXPAND,
  STATE_CODES,
  STATE_EXPAND,
  STREET_EXPAND,
  STREET_TYPE_WORDS,
} from '../resources/index.js';
import type { AddressFields } from '../types.js';
import type { AddressTagger } from './types.js';

export interface Token {
  readonly text: string;
  /** Upper case, periods removed */
  readonly key: string;
  readonly segment: number;
  label: TaggerLabel | undefined;
}

const SEGMENT_SPLIT_RE = /[,;\n]+/;
const TRAILING_PUNCTUATION_RE = /[:!?]+$/;
const ZIP_RE = /^\d{5}(?:-\d{4})?$/;
const ZIP_PART_RE = /^\d{4,5}(?:-\d{4})?$/;
const LEADING_DIGIT_RE = /^\d/;
const FRACTION_RE = /^\d+\/\d+$/;
const GRID_RE = /^[NSEW]\d+[NSEW]\d+$/;
const MAX_STATE_WORDS = 3;

const OCCUPANCY_TYPES: ReadonlySet<string> = new Set([
  '#',
  'APT',
  'APARTMENT',
  'SUITE',
  'STE',
  'UNIT',
  'RM',
  'ROOM',
  'FL',
  'FLOOR',
  'SPACE',
  'SPC',
  'LOT',
  'TRLR',
  'DEPT',
]);

const SUBADDRESS_TYPES: ReadonlySet<string> = new Set(['BLDG', 'BUILDING', 'WING', 'TOWER', 'PIER']);

const BOX_WORDS: ReadonlySet<string> = new Set(['BOX', 'POBOX']);

const PRE_TYPES: ReadonlySet<string> = new Set([
  'HIGHWAY',
  'HWY',
  'ROUTE',
  'RTE',
  'ROAD',
  'SR',
  'US',
  'CR',
  'FM',
  'INTERSTATE',
  'I',
]);

const PRE_TYPE_QUALIFIERS: ReadonlySet<string> = new Set(['STATE', 'COUNTY', 'US']);

const POST_MODIFIERS: ReadonlySet<string> = new Set(['EXT', 'EXTENSION']);

const SEPARATORS: ReadonlySet<string> = new Set(['&', 'AND', '@']);

const DIRECTIONS: ReadonlySet<string> = new Set([
  ...DIRECTION_EXPAND.keys(),
  ...DIRECTION_EXPAND.values(),
]);

function isStreetType(token: Token): boolean {
  return STREET_EXPAND.has(token.key) || STREET_TYPE_WORDS.has(token.key);
}

function isDirection(token: Token): boolean {
  return DIRECTIONS.has(token.key);
}

function startsWithDigit(token: Token | undefined): boolean {
  return token !== undefined && LEADING_DIGIT_RE.test(token.text);
}

function isOccupancy(token: Token): boolean {
  return OCCUPANCY_TYPES.has(token.key) || token.text.startsWith('#');
}

function label(tokens: readonly Token[], value: TaggerLabel): void {
  for (const token of tokens) {
    token.label = value;
  }
}

export function tokenize(text: string): Token[] {
  return text
    .split(SEGMENT_SPLIT_RE)
    .map((segment) => segment.trim())
    .filter(Boolean)
    .flatMap((segment, index) =>
      segment
        .split(/\s+/)
        .map((word) => word.replace(TRAILING_PUNCTUATION_RE, ''))
        .filter(Boolean)
        .map((word) => ({
          text: word,
          key: word.toUpperCase().replace(/\./g, ''),
          segment: index,
          label: undefined,
        }))
    );
}

/**
 * True when some label reappears after a run of a different label.
 */
export function hasRepeatedLabel(tokens: readonly RawTaggedToken[]): boolean {
  const closed = new Set<string>();
  let previous: string | undefined;

  for (const { label: current } of tokens) {
    if (current !== previous) {
      if (closed.has(current)) {
        return true;
      }
      if (previous !== undefined) {
        closed.add(previous);
      }
      previous = current;
    }
  }
  return false;
}

export class RuleTagger implements AddressTagger {
  tag(text: string, mapping: LabelFieldMap): AddressFields {
    const tagged = this.classify(text);

    if (hasRepeatedLabel(tagged)) {
      throw new AmbiguousTaggingError(tagged, { input: text });
    }

    const fields: AddressFields = {};
    for (const token of tagged) {
      const field = mapping[token.label];
      if (field) {
        const existing = fields[field];
        fields[field] = existing ? `${existing} ${token.text}` : token.text;
      }
    }
    return fields;
  }

  /**
   * Label every token of the text, in text order.
   */
  classify(text: string): Array<{ text: string; label: TaggerLabel }> {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return [];
    }

    const segmentCount = (tokens[tokens.length - 1]?.segment ?? 0) + 1;
    const zipFound = this.tagZip(tokens);
    const stateSegment = this.tagState(tokens, zipFound, segmentCount);
    const streetSegment = this.tagRecipient(tokens, segmentCount);

    const closingSegment = zipFound
      ? (tokens.find((t) => t.label === 'ZipCode')?.segment ?? stateSegment)
      : stateSegment;
    const cityInStreetLine = closingSegment === streetSegment;

    this.tagStreetLine(tokens, streetSegment, cityInStreetLine);

    for (let segment = streetSegment + 1; segment < segmentCount; segment++) {
      this.tagTrailingSegment(tokens.filter((t) => t.segment === segment && !t.label));
    }

    return tokens.map((token) => ({ text: token.text, label: token.label ?? 'NotAddress' }));
  }

  /**
   * Label the trailing ZIP (and a split ZIP+4) of the last segment.
   */
  private tagZip(tokens: Token[]): boolean {
    const lastSegment = tokens[tokens.length - 1]?.segment;
    const collected: Token[] = [];

    for (let i = tokens.length - 1; i > 0 && collected.length < 2; i--) {
      const token = tokens[i];
      const previous = tokens[i - 1];
      if (
        !token ||
        token.segment !== lastSegment ||
        !ZIP_PART_RE.test(token.text) ||
        (previous && BOX_WORDS.has(previous.key))
      ) {
        break;
      }
      collected.unshift(token);
    }

    while (collected.length > 0 && !ZIP_RE.test(collected[0]?.text ?? '')) {
      collected.shift();
    }

    label(collected, 'ZipCode');
    return collected.length > 0;
  }

  /**
   * Label a state name (up to three words) or code ending just before the
   * ZIP. Without a ZIP, only a segment other than the first may hold a state.
   * Returns the segment the state was found in.
   */
  private tagState(tokens: Token[], zipFound: boolean, segmentCount: number): number | undefined {
    const firstZip = tokens.findIndex((t) => t.label === 'ZipCode');
    const end = firstZip === -1 ? tokens.length : firstZip;
    const segment = tokens[end - 1]?.segment;

    if (segment === undefined || (!zipFound && (segmentCount === 1 || segment === 0))) {
      return undefined;
    }

    for (let size = MAX_STATE_WORDS; size >= 1; size--) {
      const start = end - size;
      const window = tokens.slice(Math.max(start, 0), end);
      if (start < 1 || window.some((t) => t.segment !== segment)) {
        continue;
      }
      if (this.isState(window, segment)) {
        label(window, 'StateName');
        return segment;
      }
    }
    return undefined;
  }

  private isState(window: readonly Token[], segment: number): boolean {
    const name = window.map((t) => t.key).join(' ');
    const [single] = window;

    if (segment === 0 && window.length === 1 && single && isStreetType(single)) {
      return false;
    }
    if (STATE_EXPAND.has(name)) {
      return true;
    }
    return (
      window.length === 1 &&
      single !== undefined &&
      STATE_CODES.has(single.key) &&
      (segment > 0 || single.text === single.key)
    );
  }

  /**
   * A first segment without digits followed by one starting with a digit is
   * a recipient line. Returns the segment holding the street line.
   */
  private tagRecipient(tokens: Token[], segmentCount: number): number {
    if (segmentCount < 2) {
      return 0;
    }
    const first = tokens.filter((t) => t.segment === 0);
    const second = tokens.find((t) => t.segment === 1);

    if (first.some((t) => /\d/.test(t.text)) || !startsWithDigit(second)) {
      return 0;
    }
    label(first, 'Recipient');
    return 1;
  }

  private tagStreetLine(tokens: Token[], segment: number, cityInStreetLine: boolean): void {
    const line: Token[] = [];
    for (const token of tokens) {
      if (token.segment === segment) {
        if (token.label) break;
        line.push(token);
      }
    }

    let index = 0;
    const first = line[0];
    const second = line[1];

    if (first?.key === 'PO' && second?.key === 'BOX') {
      label([first, second], 'USPSBoxType');
      index = 2;
    } else if (first && BOX_WORDS.has(first.key)) {
      label([first], 'USPSBoxType');
      index = 1;
    }
    if (index > 0) {
      const id = line[index];
      if (id) {
        label([id], 'USPSBoxID');
      }
      label(line.slice(index + 1), 'PlaceName');
      return;
    }

    if (first && (startsWithDigit(first) || GRID_RE.test(first.key))) {
      label([first], 'AddressNumber');
      index = 1;
      const suffix = line[1];
      if (suffix && FRACTION_RE.test(suffix.text)) {
        label([suffix], 'AddressNumberSuffix');
        index = 2;
      }
    }

    const body = line.slice(index);
    const occupancyAt = body.findIndex((t, i) => i > 0 && isOccupancy(t));
    const streetPart = occupancyAt === -1 ? body : body.slice(0, occupancyAt);

    let partStart = 0;
    streetPart.forEach((token, i) => {
      if (SEPARATORS.has(token.key)) {
        this.tagStreet(streetPart.slice(partStart, i), cityInStreetLine);
        label([token], 'IntersectionSeparator');
        partStart = i + 1;
      }
    });
    this.tagStreet(streetPart.slice(partStart), cityInStreetLine);

    if (occupancyAt !== -1) {
      this.tagOccupancy(body.slice(occupancyAt), cityInStreetLine);
    }
  }

  /**
   * Label one street: pre-type route (`Highway 61`, `County Road 5`) or
   * `[PreDirectional] Name PostType [PostDirectional] [PostModifier]`.
   * Words after the street type become the place name when the city shares
   * the street line.
   */
  private tagStreet(part: Token[], cityInStreetLine: boolean): void {
    if (part.length === 0) {
      return;
    }

    const preTypeLength = this.preTypeLength(part);
    if (preTypeLength > 0) {
      label(part.slice(0, preTypeLength), 'StreetNamePreType');
      label(part.slice(preTypeLength, preTypeLength + 1), 'StreetName');
      this.tagStreetTail(part.slice(preTypeLength + 1), cityInStreetLine);
      return;
    }

    let start = 0;
    const [head] = part;
    if (head && part.length > 1 && isDirection(head)) {
      label([head], 'StreetNamePreDirectional');
      start = 1;
    }

    const rest = part.slice(start);
    const typeIndexes = rest.flatMap((t, i) => (i > 0 && isStreetType(t) ? [i] : []));
    const typeAt = cityInStreetLine ? typeIndexes[0] : typeIndexes[typeIndexes.length - 1];

    if (typeAt === undefined) {
      const last = rest[rest.length - 1];
      if (last && rest.length > 1 && (isDirection(last) || POST_MODIFIERS.has(last.key))) {
        label(rest.slice(0, -1), 'StreetName');
        label([last], isDirection(last) ? 'StreetNamePostDirectional' : 'StreetNamePostModifier');
      } else {
        label(rest, 'StreetName');
      }
      return;
    }

    label(rest.slice(0, typeAt), 'StreetName');
    label(rest.slice(typeAt, typeAt + 1), 'StreetNamePostType');
    this.tagStreetTail(rest.slice(typeAt + 1), cityInStreetLine);
  }

  private tagStreetTail(tail: Token[], cityInStreetLine: boolean): void {
    let index = 0;
    const next = tail[0];
    if (next && isDirection(next)) {
      label([next], 'StreetNamePostDirectional');
      index = 1;
    }
    const modifier = tail[index];
    if (modifier && POST_MODIFIERS.has(modifier.key)) {
      label([modifier], 'StreetNamePostModifier');
      index += 1;
    }
    label(tail.slice(index), cityInStreetLine ? 'PlaceName' : 'StreetNamePostModifier');
  }

  private preTypeLength(part: readonly Token[]): number {
    const [first, second, third] = part;
    if (
      first &&
      second &&
      PRE_TYPE_QUALIFIERS.has(first.key) &&
      PRE_TYPES.has(second.key) &&
      startsWithDigit(third)
    ) {
      return 2;
    }
    if (first && PRE_TYPES.has(first.key) && startsWithDigit(second)) {
      return 1;
    }
    return 0;
  }

  /**
   * `Apt 4`, `Suite A Unit B`, `#12`. One identifier follows each type; any
   * further words are the place name when the city shares the line.
   */
  private tagOccupancy(tokens: Token[], cityInStreetLine: boolean): void {
    let expectIdentifier = false;

    tokens.forEach((token, i) => {
      if (OCCUPANCY_TYPES.has(token.key)) {
        label([token], 'OccupancyType');
        expectIdentifier = true;
      } else if (expectIdentifier || token.text.startsWith('#') || i === 0) {
        label([token], 'OccupancyIdentifier');
        expectIdentifier = false;
      } else {
        label([token], cityInStreetLine ? 'PlaceName' : 'OccupancyIdentifier');
      }
    });
  }

  private tagTrailingSegment(tokens: Token[]): void {
    const [first] = tokens;
    if (!first) {
      return;
    }
    if (isOccupancy(first)) {
      this.tagOccupancy(tokens, false);
    } else if (SUBADDRESS_TYPES.has(first.key)) {
      label([first], 'SubaddressType');
      label(tokens.slice(1), 'SubaddressIdentifier');
    } else {
      label(tokens, 'PlaceName');
    }
  }
}
