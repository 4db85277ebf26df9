/**
 * Phone formatting tests
 */

import { InvalidPhoneNumberError } from '@addrkit/utils';
import { getPhone } from '../../src/phone/get-phone.js';

describe('getPhone', () => {
  it.each([
    ['(202) 900-9019', '+1 202-900-9019'],
    ['2029009019', '+1 202-900-9019'],
    ['202.900.9019', '+1 202-900-9019'],
    ['+1 202 900 9019', '+1 202-900-9019'],
    ['1-202-900-9019', '+1 202-900-9019'],
    ['+1 (202) 900-9019', '+1 202-900-9019'],
  ])('getPhone(%j) should be %j', (input, expected) => {
    expect(getPhone(input)).toBe(expected);
  });

  it('should reject a short number', () => {
    expect(() => getPhone('202-900-901')).toThrow(InvalidPhoneNumberError);
    expect(() => getPhone('202-900-901')).toThrow('Invalid phone number: 202-900-901');
  });

  it('should reject text around the number', () => {
    expect(() => getPhone('call 202-900-9019')).toThrow(InvalidPhoneNumberError);
  });

  it('should carry the original text', () => {
    try {
      getPhone('555-1234');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPhoneNumberError);
      if (error instanceof InvalidPhoneNumberError) {
        expect(error.phone).toBe('555-1234');
      }
    }
    expect.assertions(2);
  });
});
