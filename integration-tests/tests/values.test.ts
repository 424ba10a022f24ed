/**
 * Value Parsing Tests
 */

import { isPresent, isValidDateFormat, parseDate, parseDateWithFormat, parseNumericValue } from '@fieldsense/core';

describe('parseNumericValue', () => {
  it('should ignore currency symbols and thousands separators', () => {
    expect(parseNumericValue('$250,000')).toBe(250000);
    expect(parseNumericValue('1,234.56')).toBe(1234.56);
    expect(parseNumericValue(' 42 ')).toBe(42);
  });

  it('should keep the sign of a negative amount', () => {
    expect(parseNumericValue('-$5')).toBe(-5);
  });

  it('should return null for non-numeric text', () => {
    expect(parseNumericValue('abc')).toBeNull();
    expect(parseNumericValue('')).toBeNull();
    expect(parseNumericValue('12 apples')).toBeNull();
  });
});

describe('parseDate', () => {
  it('should parse the default formats', () => {
    expect(parseDate('2024-01-15')).toEqual(new Date(Date.UTC(2024, 0, 15)));
    expect(parseDate('1/5/2024')).toEqual(new Date(Date.UTC(2024, 0, 5)));
    expect(parseDate('January 15, 2024')).toEqual(new Date(Date.UTC(2024, 0, 15)));
    expect(parseDate('Sep. 5, 2024')).toEqual(new Date(Date.UTC(2024, 8, 5)));
    expect(parseDate('15 March 2024')).toEqual(new Date(Date.UTC(2024, 2, 15)));
  });

  it('should reject impossible calendar days', () => {
    expect(parseDate('02/29/2023')).toBeNull();
    expect(parseDate('2024-13-01')).toBeNull();
  });

  it('should accept a leap day', () => {
    expect(parseDate('02/29/2024')).toEqual(new Date(Date.UTC(2024, 1, 29)));
  });

  it('should honour an explicit format list', () => {
    expect(parseDate('2024-01-15', ['MM/DD/YYYY'])).toBeNull();
    expect(parseDateWithFormat('01/15/2024', 'MM/DD/YYYY')).toEqual(new Date(Date.UTC(2024, 0, 15)));
  });
});

describe('isValidDateFormat', () => {
  it('should require a year, a month and a day', () => {
    expect(isValidDateFormat('MM/DD/YYYY')).toBe(true);
    expect(isValidDateFormat('MMMM D, YYYY')).toBe(true);
    expect(isValidDateFormat('YYYY-MM')).toBe(false);
    expect(isValidDateFormat('YYYY-MM-DD YYYY')).toBe(false);
  });
});

describe('isPresent', () => {
  it('should treat blank values as absent', () => {
    expect(isPresent('x')).toBe(true);
    expect(isPresent('   ')).toBe(false);
    expect(isPresent(null)).toBe(false);
    expect(isPresent(undefined)).toBe(false);
  });
});
