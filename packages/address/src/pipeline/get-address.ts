/**
 * Address Pipeline
 * ================
 * clean → tag (reconciling an ambiguous tagging) → finalize fields → validate
 *
 * @example
 * ```typescript
 * getAddress('345 MAPLE RD, COUNTRYSIDE, PA 24680-0198');
 * // {
 * //   fields: {
 * //     'addr:housenumber': '345',
 * //     'addr:street': 'Maple Road',
 * //     'addr:city': 'Countryside',
 * //     'addr:state': 'PA',
 * //     'addr:postcode': '24680-0198',
 * //   },
 * //   removed: [],
 * // }
 * ```
 */

import { LogHelpers, createPackageLogger, type Logger } from '@addrkit/utils';
import { cleanAddress } from '../cleaner/clean-address.js';
import { applyFieldProcessors } from '../fields/processors.js';
import { tagAddress } from '../tagger/adapter.js';
import { RuleTagger } from '../tagger/rule-tagger.js';
import type { AddressTagger } from '../tagger/types.js';
import type { AddressResult } from '../types.js';
import { validateAndClean } from '../validation/address-schema.js';

export interface GetAddressOptions {
  /** Token classifier; defaults to the bundled rule tagger */
  tagger?: AddressTagger;
  logger?: Logger;
}

const defaultTagger = new RuleTagger();
const defaultLogger = createPackageLogger('@addrkit/address');

export function getAddress(text: string, options: GetAddressOptions = {}): AddressResult {
  const { tagger = defaultTagger, logger = defaultLogger } = options;
  const startTime = Date.now();

  const cleaned = cleanAddress(text);
  const tagged = tagAddress(cleaned, tagger, logger);
  const result = validateAndClean(
    applyFieldProcessors(tagged.fields, tagged.removed),
    tagged.removed,
    logger
  );

  LogHelpers.performance(logger, 'getAddress', Date.now() - startTime, true, {
    fields: Object.keys(result.fields).length,
    removed: result.removed.length,
  });
  return result;
}
