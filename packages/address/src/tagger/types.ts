import type { LabelFieldMap } from '../labels.js';
import type { AddressFields } from '../types.js';

/**
 * Token classifier contract.
 *
 * `tag` returns the field map built through `mapping` when every label is
 * unique, and throws `AmbiguousTaggingError` carrying the ordered
 * `(text, label)` tokens otherwise.
 */
export interface AddressTagger {
  tag(text: string, mapping: LabelFieldMap): AddressFields;
}
