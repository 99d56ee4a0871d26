import { describe, it, expect } from 'vitest';
import { resolveWindowDays, UPCOMING_DAYS_ENV } from '../src/config';
import { ValidationError } from '../src/errors';

describe('resolveWindowDays', () => {
  it('defaults to 7', () => {
    expect(resolveWindowDays(undefined, {})).toBe(7);
    expect(resolveWindowDays(undefined, { [UPCOMING_DAYS_ENV]: '  ' })).toBe(7);
  });

  it('reads the environment', () => {
    expect(resolveWindowDays(undefined, { CONTACTS_UPCOMING_DAYS: '14' })).toBe(14);
  });

  it('prefers the explicit option', () => {
    expect(resolveWindowDays('3', { CONTACTS_UPCOMING_DAYS: '14' })).toBe(3);
    expect(resolveWindowDays('-2', {})).toBe(-2);
  });

  it('rejects values that are not whole numbers', () => {
    expect(() => resolveWindowDays('abc', {})).toThrowError(
      new ValidationError("Invalid --window: 'abc'. Expected a whole number of days.")
    );
    expect(() => resolveWindowDays(undefined, { CONTACTS_UPCOMING_DAYS: '1.5' })).toThrowError(
      "Invalid CONTACTS_UPCOMING_DAYS: '1.5'. Expected a whole number of days."
    );
  });
});
