/**
 * Address validation tests
 */

import { createLogger } from '@addrkit/utils';
import { invalidFields, validateAndClean } from '../../src/validation/address-schema.js';

describe('invalidFields', () => {
  it('should accept a complete address', () => {
    expect(
      invalidFields({
        'addr:housenumber': '345',
        'addr:street': 'Maple Road',
        'addr:unit': 'B',
        'addr:city': 'Countryside',
        'addr:state': 'PA',
        'addr:postcode': '24680-0198',
      })
    ).toEqual([]);
  });

  it('should report failing fields in schema order', () => {
    expect(invalidFields({ 'addr:postcode': '1', 'addr:state': 'pa' })).toEqual([
      'addr:state',
      'addr:postcode',
    ]);
  });

  it('should reject empty text fields', () => {
    expect(invalidFields({ 'addr:unit': '', 'addr:housenumber': '' })).toEqual(['addr:unit']);
  });
});

describe('validateAndClean', () => {
  const logger = createLogger('@addrkit/test');

  it('should drop an invalid postcode and report it', () => {
    expect(
      validateAndClean(
        {
          'addr:housenumber': '158',
          'addr:street': 'South Thomas Court',
          'addr:postcode': '30008-90210',
        },
        [],
        logger
      )
    ).toEqual({
      fields: { 'addr:housenumber': '158', 'addr:street': 'South Thomas Court' },
      removed: ['addr:postcode'],
    });
  });

  it('should append to fields already removed', () => {
    const removed = ['addr:unit' as const];
    const result = validateAndClean({ 'addr:state': 'Narnia' }, removed, logger);

    expect(result.removed).toEqual(['addr:unit', 'addr:state']);
    expect(removed).toEqual(['addr:unit']);
  });

  it('should allow a key to be removed twice', () => {
    expect(validateAndClean({ 'addr:postcode': '123' }, ['addr:postcode'], logger).removed).toEqual([
      'addr:postcode',
      'addr:postcode',
    ]);
  });

  it('should order output fields canonically', () => {
    const result = validateAndClean(
      { 'addr:city': 'Springfield', 'addr:housenumber': '12', 'addr:street': 'Elm Street' },
      [],
      logger
    );

    expect(Object.keys(result.fields)).toEqual(['addr:housenumber', 'addr:street', 'addr:city']);
  });

  it('should log dropped fields', () => {
    const debug = vi.spyOn(logger, 'debug');

    validateAndClean({ 'addr:state': 'Pa' }, [], logger);

    expect(debug).toHaveBeenCalledWith('Dropped address fields', {
      stage: 'validate',
      fields: ['addr:state'],
    });
  });
});
