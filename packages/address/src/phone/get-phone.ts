import { InvalidPhoneNumberError } from '@addrkit/utils';

// Optional +1 country code, area code with optional parentheses, then exchange
// and line number with space, dash, dot or similar separators.
const PHONE_RE = /^\(?(?:\+? ?1?[ -.]*)?(?:\(?(\d{3})\)?[ -.]*)(\d{3})[ -.]*(\d{4})$/;

/**
 * Format a US or Canadian phone number as `+1 AAA-EEE-LLLL`.
 *
 * @example
 * ```typescript
 * getPhone('(202) 900-9019'); // '+1 202-900-9019'
 * getPhone('202-900-901'); // throws InvalidPhoneNumberError
 * ```
 *
 * @throws InvalidPhoneNumberError when the text does not match
 */
export function getPhone(phone: string): string {
  const match = PHONE_RE.exec(phone);
  if (!match) {
    throw new InvalidPhoneNumberError(phone);
  }
  const [, area, exchange, line] = match;
  return `+1 ${area}-${exchange}-${line}`;
}
