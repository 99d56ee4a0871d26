import type { DateTime } from 'luxon';
import { AlreadyExistsError, NotFoundError } from './errors';
import { ContactRecord } from './record';
import { currentDay } from './dates';

export const DEFAULT_UPCOMING_DAYS = 7;

export interface AddRecordOptions {
  failIfExists?: boolean;
}

/**
 * AddressBook
 * Records keyed by contact name, iterated in insertion order.
 * Not synchronised: one caller at a time.
 */
export class AddressBook implements Iterable<ContactRecord> {
  private readonly data = new Map<string, ContactRecord>();

  get size(): number {
    return this.data.size;
  }

  // Overwrites an existing record with the same name unless failIfExists is set.
  addRecord(record: ContactRecord, opts?: AddRecordOptions): void {
    const key = record.name.value;
    if (opts?.failIfExists && this.data.has(key)) {
      throw new AlreadyExistsError('Record already exists.', key);
    }
    this.data.set(key, record);
  }

  has(name: string): boolean {
    return this.data.has(name);
  }

  find(name: string): ContactRecord {
    const record = this.data.get(name);
    if (!record) throw new NotFoundError('Record not found.', name);
    return record;
  }

  delete(name: string): void {
    if (!this.data.delete(name)) throw new NotFoundError('Record not found.', name);
  }

  names(): string[] {
    return Array.from(this.data.keys());
  }

  records(): ContactRecord[] {
    return Array.from(this.data.values());
  }

  [Symbol.iterator](): Iterator<ContactRecord> {
    return this.data.values();
  }

  /**
   * Records whose next birthday is at most `windowDays` away (inclusive),
   * in insertion order. A negative window matches nothing.
   */
  upcomingBirthdays(windowDays: number = DEFAULT_UPCOMING_DAYS, today: DateTime = currentDay()): ContactRecord[] {
    const upcoming: ContactRecord[] = [];
    for (const record of this.data.values()) {
      const days = record.daysToNextBirthday(today);
      if (days !== null && days <= windowDays) upcoming.push(record);
    }
    return upcoming;
  }
}
