/**
 * Core address types
 */

export const CANONICAL_FIELDS = ['housenumber', 'street', 'unit', 'city', 'state', 'postcode'] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * Output key of a canonical field, e.g. `addr:street`
 */
export type FieldKey = `addr:${CanonicalField}`;

export const FIELD_KEYS: readonly FieldKey[] = CANONICAL_FIELDS.map(toFieldKey);

export function toFieldKey(field: CanonicalField): FieldKey {
  return `addr:${field}`;
}

const FIELD_KEY_SET: ReadonlySet<string> = new Set(FIELD_KEYS);

export function isFieldKey(value: string): value is FieldKey {
  return FIELD_KEY_SET.has(value);
}

/**
 * Present fields only; an absent field has no entry
 */
export type AddressFields = Partial<Record<FieldKey, string>>;

export interface ReconciliationResult {
  fields: AddressFields;
  /** Field keys dropped for ambiguity or failed validation, in the order they were dropped */
  removed: FieldKey[];
}

export type AddressResult = ReconciliationResult;
