/**
 * Address Schema Validation
 * =========================
 * Per-field patterns for the finalized address. A failing field is dropped
 * and reported through `removed`; validation itself never throws.
 */

import { z } from 'zod';
import { LogHelpers, createPackageLogger, type Logger } from '@addrkit/utils';
import { FIELD_KEYS, isFieldKey, type AddressFields, type AddressResult, type FieldKey } from '../types.js';

const defaultLogger = createPackageLogger('@addrkit/address');

export const STATE_PATTERN = /^[A-Z]{2}$/;
export const POSTCODE_PATTERN = /^\d{5}(?:-\d{4})?$/;

export const AddressSchema = z.object({
  'addr:housenumber': z.string().optional(),
  'addr:street': z.string().min(1).optional(),
  'addr:unit': z.string().min(1).optional(),
  'addr:city': z.string().min(1).optional(),
  'addr:state': z.string().regex(STATE_PATTERN, 'State must be a 2-letter code').optional(),
  'addr:postcode': z.string().regex(POSTCODE_PATTERN, 'Postcode must be NNNNN or NNNNN-NNNN').optional(),
});

export type ValidatedAddress = z.infer<typeof AddressSchema>;

/**
 * Field keys that fail the schema, in issue order, each listed once.
 */
export function invalidFields(fields: AddressFields): FieldKey[] {
  const parsed = AddressSchema.safeParse(fields);
  if (parsed.success) {
    return [];
  }

  const keys = parsed.error.issues
    .map((issue) => issue.path[0])
    .filter((key): key is FieldKey => typeof key === 'string' && isFieldKey(key));
  return Array.from(new Set(keys));
}

/**
 * Drop invalid fields and append their keys to `removed`. Output fields are
 * ordered housenumber, street, unit, city, state, postcode.
 */
export function validateAndClean(
  fields: AddressFields,
  removed: readonly FieldKey[] = [],
  logger: Logger = defaultLogger
): AddressResult {
  const invalid = invalidFields(fields);

  const cleaned: AddressFields = {};
  for (const key of FIELD_KEYS) {
    const value = fields[key];
    if (value !== undefined && !invalid.includes(key)) {
      cleaned[key] = value;
    }
  }

  LogHelpers.droppedFields(logger, 'validate', invalid);
  return { fields: cleaned, removed: [...removed, ...invalid] };
}
