/**
 * Property Tests for the Reconciler ambiguity rule
 *
 * A label that appears in two separate runs voids its field, whatever else
 * the sequence holds.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  LABEL_FIELD_MAP,
  TAGGER_LABELS,
  isNoiseLabel,
  type TaggedToken,
  type TaggerLabel,
} from '../../src/labels.js';
import { reconcile } from '../../src/reconciler/reconcile.js';

const fieldLabels = TAGGER_LABELS.filter((label) => !isNoiseLabel(label));
const noiseLabels = TAGGER_LABELS.filter((label) => isNoiseLabel(label));
const tokenText = fc.constantFrom('12', 'Main', 'A', 'Springfield', 'PA', '24680');

const scenario = fc
  .constantFrom(...fieldLabels)
  .chain((repeated) => {
    const field = LABEL_FIELD_MAP[repeated];
    const others = fieldLabels.filter(
      (label) => label !== repeated && LABEL_FIELD_MAP[label] !== field
    );
    return fc.record({
      repeated: fc.constant(repeated),
      separator: fc.constantFrom(...noiseLabels),
      others: fc.shuffledSubarray(others),
      first: tokenText,
      second: tokenText,
    });
  });

describe('Reconciler - Property Tests', () => {
  it('a repeated label voids its field and reports it once', () => {
    fc.assert(
      fc.property(scenario, ({ repeated, separator, others, first, second }) => {
        const tokens: TaggedToken[] = [
          { text: first, label: repeated },
          { text: 'x', label: separator },
          ...others.map((label: TaggerLabel) => ({ text: 'y', label })),
          { text: second, label: repeated },
        ];
        const field = LABEL_FIELD_MAP[repeated];

        const result = reconcile(tokens);

        expect(field).not.toBeNull();
        if (field) {
          expect(result.fields[field]).toBeUndefined();
          expect(result.removed).toEqual([field]);
        }
      }),
      { numRuns: 200 }
    );
  });

  it('no key is both kept and removed', () => {
    const anyTokens = fc.array(
      fc.record({ text: tokenText, label: fc.constantFrom(...TAGGER_LABELS) }),
      { maxLength: 12 }
    );

    fc.assert(
      fc.property(anyTokens, (tokens) => {
        const { fields, removed } = reconcile(tokens);
        for (const key of removed) {
          expect(fields[key]).toBeUndefined();
        }
      }),
      { numRuns: 200 }
    );
  });
});
