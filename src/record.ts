import type { DateTime } from 'luxon';
import { NotFoundError } from './errors';
import { Birthday, Name, Phone } from './fields';
import { currentDay, daysBetween, nextAnniversary } from './dates';

export interface ContactRecordJSON {
  name: string;
  phones: string[];
  birthday: string | null;
}

/**
 * ContactRecord
 * One contact: an immutable name, phones in insertion order and an optional birthday.
 * Every mutation validates its input before touching state, so a failed call
 * leaves the record as it was.
 */
export class ContactRecord {
  readonly name: Name;
  private readonly phoneList: Phone[] = [];
  private birthdayField: Birthday | null = null;

  constructor(name: string) {
    this.name = new Name(name);
  }

  get phones(): readonly Phone[] {
    return this.phoneList;
  }

  get birthday(): Birthday | null {
    return this.birthdayField;
  }

  // Duplicates are accepted.
  addPhone(raw: string): void {
    this.phoneList.push(new Phone(raw));
  }

  removePhone(raw: string): void {
    this.phoneList.splice(this.indexOfPhone(raw), 1);
  }

  editPhone(oldRaw: string, newRaw: string): void {
    const index = this.indexOfPhone(oldRaw);
    const replacement = new Phone(newRaw);
    this.phoneList[index] = replacement;
  }

  findPhone(raw: string): Phone {
    return this.phoneList[this.indexOfPhone(raw)];
  }

  addBirthday(raw: string): void {
    this.birthdayField = new Birthday(raw);
  }

  /**
   * Whole days from `today` until the next occurrence of the birthday,
   * 0 when it is today, null when no birthday is set.
   */
  daysToNextBirthday(today: DateTime = currentDay()): number | null {
    if (!this.birthdayField) return null;
    const from = currentDay(today);
    return daysBetween(from, nextAnniversary(this.birthdayField.value, from));
  }

  toString(): string {
    const phones = this.phoneList.map((p) => p.value).join('; ');
    const birthday = this.birthdayField ? this.birthdayField.toString() : 'No birthday';
    return `Contact name: ${this.name.value}, phones: ${phones}, birthday: ${birthday}`;
  }

  toJSON(): ContactRecordJSON {
    return {
      name: this.name.value,
      phones: this.phoneList.map((p) => p.value),
      birthday: this.birthdayField ? this.birthdayField.toString() : null,
    };
  }

  private indexOfPhone(raw: string): number {
    const index = this.phoneList.findIndex((p) => p.value === raw);
    if (index === -1) throw new NotFoundError('Phone number not found.', raw);
    return index;
  }
}
