/**
 * Text cleaner tests
 */

import {
  cleanAddress,
  normalizeGridAddresses,
  removeBrUnicode,
  removeParentheticals,
} from '../../src/cleaner/clean-address.js';

describe('removeBrUnicode', () => {
  it('should replace line breaks with commas', () => {
    expect(removeBrUnicode('1 Main St<br>Springfield')).toBe('1 Main St,Springfield');
    expect(removeBrUnicode('1 Main St<br/>Springfield')).toBe('1 Main St,Springfield');
    expect(removeBrUnicode('1 Main St<BR />Springfield')).toBe('1 Main St,Springfield');
  });

  it('should strip characters outside printable ASCII', () => {
    expect(removeBrUnicode('Hello<br/>World—Café')).toBe('Hello,WorldCaf');
  });

  it('should keep tabs and newlines', () => {
    expect(removeBrUnicode('a\tb\nc\r')).toBe('a\tb\nc\r');
  });
});

describe('removeParentheticals', () => {
  it('should remove asides with their leading space', () => {
    expect(removeParentheticals('345 Maple Rd (rear entrance), Countryside')).toBe(
      '345 Maple Rd, Countryside'
    );
  });

  it('should remove nested asides', () => {
    expect(removeParentheticals('Main St (north (rear) side)')).toBe('Main St');
  });
});

describe('normalizeGridAddresses', () => {
  it('should upper-case grid addresses and close internal spaces', () => {
    expect(normalizeGridAddresses('N65w25055 Main St')).toBe('N65W25055 Main St');
    expect(normalizeGridAddresses('n65 w25055 Main St')).toBe('N65W25055 Main St');
  });

  it('should leave ordinary numbers alone', () => {
    expect(normalizeGridAddresses('65 W Main St')).toBe('65 W Main St');
  });
});

describe('cleanAddress', () => {
  it('should run every cleanup step', () => {
    expect(cleanAddress('Address: 345 Maple Rd (rear entrance), Countryside, PA<br>USA')).toBe(
      '345 Maple Rd, Countryside, PA'
    );
  });

  it('should strip leading markers', () => {
    expect(cleanAddress('Mailing Address: 10 Elm St')).toBe('10 Elm St');
    expect(cleanAddress('location : 10 Elm St')).toBe('10 Elm St');
  });

  it('should strip a trailing country', () => {
    expect(cleanAddress('10 Elm St, Springfield, IL 62701, United States of America')).toBe(
      '10 Elm St, Springfield, IL 62701'
    );
    expect(cleanAddress('10 Elm St, Springfield, IL 62701 U.S.A.')).toBe(
      '10 Elm St, Springfield, IL 62701'
    );
  });

  it('should collapse spaces and trim edge punctuation', () => {
    expect(cleanAddress('  ,123  Main \t St.,  ')).toBe('123 Main St');
  });

  it('should normalize grid addresses', () => {
    expect(cleanAddress('n65 w25055  Main St')).toBe('N65W25055 Main St');
  });

  it('should keep a street line untouched', () => {
    expect(cleanAddress('158 S. Thomas Court 30008 90210')).toBe('158 S. Thomas Court 30008 90210');
  });

  it('should be idempotent on a messy input', () => {
    const once = cleanAddress('Address:  Address: 1 Main St (x)<br> USA');
    expect(once).toBe('1 Main St');
    expect(cleanAddress(once)).toBe(once);
  });
});
