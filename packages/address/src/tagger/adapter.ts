/**
 * Tagger Adapter
 *
 * Separates the tagger's success path from its ambiguous-result path and
 * routes the latter through the reconciler.
 */

import {
  AmbiguousTaggingError,
  LogHelpers,
  createPackageLogger,
  isOperationalError,
  type Logger,
  type RawTaggedToken,
} from '@addrkit/utils';
import { LABEL_FIELD_MAP, parseLabel, type TaggedToken } from '../labels.js';
import { reconcile } from '../reconciler/reconcile.js';
import type { ReconciliationResult } from '../types.js';
import type { AddressTagger } from './types.js';

const defaultLogger = createPackageLogger('@addrkit/address');

const TOKEN_EDGE_RE = /^[ .,#]+|[ .,#]+$/g;

/**
 * Trim ` .,#` from token text and check every label against the vocabulary.
 *
 * @throws UnknownLabelError
 */
export function normalizeTokens(tokens: readonly RawTaggedToken[]): TaggedToken[] {
  return tokens.map((token) => ({
    text: token.text.replace(TOKEN_EDGE_RE, ''),
    label: parseLabel(token.label),
  }));
}

/**
 * Drop exact repeats of a `(text, label)` pair, keeping first-seen order.
 *
 * @example
 * ```typescript
 * collapseDuplicates([a, b, a]); // [a, b]
 * ```
 */
export function collapseDuplicates(tokens: readonly TaggedToken[]): TaggedToken[] {
  const seen = new Set<string>();
  return tokens.filter((token) => {
    const key = `${token.label}\u0000${token.text}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

export function tagAddress(
  cleaned: string,
  tagger: AddressTagger,
  logger: Logger = defaultLogger
): ReconciliationResult {
  try {
    return { fields: tagger.tag(cleaned, LABEL_FIELD_MAP), removed: [] };
  } catch (error) {
    if (!(error instanceof AmbiguousTaggingError)) {
      if (!(error instanceof Error) || !isOperationalError(error)) {
        logger.error('Tagger failed', error, { input: cleaned });
      }
      throw error;
    }

    const result = reconcile(collapseDuplicates(normalizeTokens(error.tokens)));
    LogHelpers.droppedFields(logger, 'reconcile', result.removed, { input: cleaned });
    return result;
  }
}
