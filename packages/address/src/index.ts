/**
 * @addrkit/address - Address and phone normalization
 *
 * Public API exports for the address package:
 * - Pipeline entry points (getAddress, getPhone)
 * - Pipeline stages (cleaner, tagger adapter, reconciler, processors, validator)
 * - Abbreviation engine
 * - Label vocabulary and lookup tables
 */

// Entry points
export { getAddress } from './pipeline/get-address.js';
export type { GetAddressOptions } from './pipeline/get-address.js';
export { getPhone } from './phone/get-phone.js';

// Pipeline stages
export * from './cleaner/clean-address.js';
export { tagAddress, normalizeTokens, collapseDuplicates } from './tagger/adapter.js';
export { RuleTagger, tokenize, hasRepeatedLabel } from './tagger/rule-tagger.js';
export type { Token } from './tagger/rule-tagger.js';
export type { AddressTagger } from './tagger/types.js';
export * from './reconciler/reconcile.js';
export * from './fields/processors.js';
export * from './validation/address-schema.js';

// Abbreviation engine
export * from './abbreviations/index.js';

// Vocabulary, types and tables
export * from './labels.js';
export * from './types.js';
export * from './resources/index.js';
