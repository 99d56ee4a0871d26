import { DEFAULT_UPCOMING_DAYS } from './book';
import { ValidationError } from './errors';

export const UPCOMING_DAYS_ENV = 'CONTACTS_UPCOMING_DAYS';

export function parseWindowDays(input: string, source: string): number {
  const v = input.trim();
  if (!/^-?\d+$/.test(v)) {
    throw new ValidationError(`Invalid ${source}: '${input}'. Expected a whole number of days.`, { value: input });
  }
  return parseInt(v, 10);
}

// Explicit option wins over the environment; both fall back to the library default.
export function resolveWindowDays(option?: string, env: NodeJS.ProcessEnv = process.env): number {
  if (option !== undefined) return parseWindowDays(option, '--window');
  const fromEnv = env[UPCOMING_DAYS_ENV];
  if (fromEnv && fromEnv.trim().length > 0) return parseWindowDays(fromEnv, UPCOMING_DAYS_ENV);
  return DEFAULT_UPCOMING_DAYS;
}
