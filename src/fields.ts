import type { DateTime } from 'luxon';
import { ValidationError } from './errors';
import { formatDate, parseDate } from './dates';

export const PHONE_LENGTH = 10;

/**
 * Field
 * A single scalar attribute of a contact record
 */
export abstract class Field<T> {
  protected constructor(readonly value: T) {}

  toString(): string {
    return String(this.value);
  }
}

export class Name extends Field<string> {
  constructor(name: string) {
    super(name);
  }
}

export class Phone extends Field<string> {
  constructor(raw: string) {
    super(Phone.validate(raw));
  }

  static validate(raw: string): string {
    // Counted in code points so an astral character is one character.
    if (Array.from(raw).length !== PHONE_LENGTH) {
      throw new ValidationError(`The phone number must contain ${PHONE_LENGTH} digits`, { value: raw });
    }
    if (!/^[0-9]+$/.test(raw)) {
      throw new ValidationError('The phone number must contain only numbers', { value: raw });
    }
    return raw;
  }
}

export class Birthday extends Field<DateTime> {
  constructor(raw: string) {
    super(Birthday.parse(raw));
  }

  static parse(raw: string): DateTime {
    const date = parseDate(raw);
    if (!date) {
      throw new ValidationError('Invalid date format. Use DD.MM.YYYY', { value: raw });
    }
    return date;
  }

  toString(): string {
    return formatDate(this.value);
  }
}
