/**
 * Tagger label vocabulary
 *
 * Every label a tagger may emit, and the canonical field each one feeds.
 * A `null` entry marks a noise label that never becomes a field.
 */

import { UnknownLabelError } from '@addrkit/utils';
import type { FieldKey } from './types.js';

export const TAGGER_LABELS = [
  'AddressNumberPrefix',
  'AddressNumber',
  'AddressNumberSuffix',
  'StreetNamePreModifier',
  'StreetNamePreDirectional',
  'StreetNamePreType',
  'StreetName',
  'StreetNamePostType',
  'StreetNamePostDirectional',
  'StreetNamePostModifier',
  'OccupancyType',
  'OccupancyIdentifier',
  'SubaddressType',
  'SubaddressIdentifier',
  'BuildingName',
  'CornerOf',
  'LandmarkName',
  'PlaceName',
  'StateName',
  'ZipCode',
  'USPSBoxType',
  'USPSBoxID',
  'USPSBoxGroupType',
  'USPSBoxGroupID',
  'IntersectionSeparator',
  'Recipient',
  'NotAddress',
] as const;

export type TaggerLabel = (typeof TAGGER_LABELS)[number];

const LABEL_SET: ReadonlySet<string> = new Set(TAGGER_LABELS);

export interface TaggedToken {
  text: string;
  label: TaggerLabel;
}

export type LabelFieldMap = Readonly<Record<TaggerLabel, FieldKey | null>>;

export const LABEL_FIELD_MAP: LabelFieldMap = Object.freeze({
  AddressNumberPrefix: 'addr:housenumber',
  AddressNumber: 'addr:housenumber',
  AddressNumberSuffix: 'addr:housenumber',
  StreetNamePreModifier: 'addr:street',
  StreetNamePreDirectional: 'addr:street',
  StreetNamePreType: 'addr:street',
  StreetName: 'addr:street',
  StreetNamePostType: 'addr:street',
  StreetNamePostDirectional: 'addr:street',
  StreetNamePostModifier: 'addr:street',
  OccupancyType: null,
  OccupancyIdentifier: 'addr:unit',
  SubaddressType: null,
  SubaddressIdentifier: null,
  BuildingName: null,
  CornerOf: null,
  LandmarkName: null,
  PlaceName: 'addr:city',
  StateName: 'addr:state',
  ZipCode: 'addr:postcode',
  USPSBoxType: null,
  USPSBoxID: null,
  USPSBoxGroupType: null,
  USPSBoxGroupID: null,
  IntersectionSeparator: null,
  Recipient: null,
  NotAddress: null,
} satisfies Record<TaggerLabel, FieldKey | null>);

/** Street components, in the order they are joined */
export const STREET_LABELS: readonly TaggerLabel[] = [
  'StreetNamePreDirectional',
  'StreetNamePreModifier',
  'StreetNamePreType',
  'StreetName',
  'StreetNamePostType',
  'StreetNamePostDirectional',
  'StreetNamePostModifier',
];

/** House number components, in the order they are joined */
export const HOUSENUMBER_LABELS: readonly TaggerLabel[] = [
  'AddressNumberPrefix',
  'AddressNumber',
  'AddressNumberSuffix',
];

export function isTaggerLabel(value: string): value is TaggerLabel {
  return LABEL_SET.has(value);
}

export function isNoiseLabel(label: TaggerLabel): boolean {
  return LABEL_FIELD_MAP[label] === null;
}

/**
 * Narrow a raw label string to the vocabulary.
 *
 * @throws UnknownLabelError for a label outside the vocabulary
 */
export function parseLabel(label: string): TaggerLabel {
  if (!isTaggerLabel(label)) {
    throw new UnknownLabelError(label);
  }
  return label;
}
