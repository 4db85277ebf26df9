/**
 * Abbreviation Engine
 *
 * Runs the ordered pass list over one field value.
 *
 * @example
 * ```typescript
 * abbrs('St. Francis'); // 'Saint Francis'
 * abbrs('E St.'); // 'E Street'
 * abbrs('E Sewell St'); // 'East Sewell Street'
 * ```
 */

import { ABBREVIATION_PASSES, applyPass, type AbbreviationOptions } from './passes.js';

export function abbrs(value: string, options: AbbreviationOptions = {}): string {
  return ABBREVIATION_PASSES.reduce((current, pass) => applyPass(pass, current, options), value);
}

export * from './passes.js';
export * from './rewrites.js';
