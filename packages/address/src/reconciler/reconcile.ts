/**
 * Reconciler
 * ==========
 * Turns the token sequence of an ambiguous tagging into canonical fields.
 *
 * All-or-nothing: a label seen in more than one run voids every field it
 * feeds, and that field key goes to `removed`. No partial value is kept.
 */

import {
  HOUSENUMBER_LABELS,
  LABEL_FIELD_MAP,
  STREET_LABELS,
  isNoiseLabel,
  type TaggedToken,
  type TaggerLabel,
} from '../labels.js';
import type { AddressFields, FieldKey, ReconciliationResult } from '../types.js';

/**
 * Collapse consecutive tokens sharing a label into one, joining text with a
 * single space. Non-adjacent runs of the same label stay separate.
 */
export function mergeAdjacentRuns(tokens: readonly TaggedToken[]): TaggedToken[] {
  const merged: TaggedToken[] = [];

  for (const token of tokens) {
    const last = merged[merged.length - 1];
    if (last && last.label === token.label) {
      merged[merged.length - 1] = {
        text: [last.text, token.text].filter(Boolean).join(' '),
        label: last.label,
      };
    } else {
      merged.push({ ...token });
    }
  }

  return merged;
}

/**
 * Occurrence count per label, in first-seen order
 */
export function countLabels(tokens: readonly TaggedToken[]): Map<TaggerLabel, number> {
  const counts = new Map<TaggerLabel, number>();
  for (const { label } of tokens) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

/**
 * Space-join the values of whichever labels are present, in the given order.
 */
export function joinLabels(
  values: ReadonlyMap<TaggerLabel, string>,
  order: readonly TaggerLabel[]
): string {
  return order
    .map((label) => values.get(label))
    .filter((value): value is string => Boolean(value))
    .join(' ');
}

export function reconcile(tokens: readonly TaggedToken[]): ReconciliationResult {
  const kept = mergeAdjacentRuns(tokens).filter((token) => !isNoiseLabel(token.label));
  const counts = countLabels(kept);

  const removed: FieldKey[] = [];
  for (const [label, count] of counts) {
    const field = LABEL_FIELD_MAP[label];
    if (count > 1 && field) {
      removed.push(field);
    }
  }

  const single = new Map<TaggerLabel, string>();
  for (const token of kept) {
    if (counts.get(token.label) === 1) {
      single.set(token.label, token.text);
    }
  }

  const candidates: Array<[FieldKey, string | undefined]> = [
    ['addr:street', joinLabels(single, STREET_LABELS)],
    ['addr:housenumber', joinLabels(single, HOUSENUMBER_LABELS)],
    ['addr:unit', single.get('OccupancyIdentifier')],
    ['addr:city', single.get('PlaceName')],
    ['addr:state', single.get('StateName')],
    ['addr:postcode', single.get('ZipCode')],
  ];

  const fields: AddressFields = {};
  for (const [key, value] of candidates) {
    if (!removed.includes(key) && value) {
      fields[key] = value;
    }
  }

  return { fields, removed };
}
