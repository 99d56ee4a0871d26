import { describe, it, expect, beforeEach } from 'vitest';
import { AddressBook } from '../src/book';
import { ContactRecord } from '../src/record';
import { AlreadyExistsError, NotFoundError } from '../src/errors';
import { calendarDay } from '../src/dates';

const TODAY = calendarDay(2026, 10, 18);

function record(name: string, birthday?: string): ContactRecord {
  const r = new ContactRecord(name);
  if (birthday) r.addBirthday(birthday);
  return r;
}

describe('AddressBook add/find/delete', () => {
  let book: AddressBook;

  beforeEach(() => {
    book = new AddressBook();
    book.addRecord(record('John'));
    book.addRecord(record('Jane'));
  });

  it('finds records by exact name', () => {
    expect(book.find('John').name.value).toBe('John');
    expect(() => book.find('john')).toThrowError(new NotFoundError('Record not found.'));
  });

  it('delete then find fails', () => {
    book.delete('Jane');
    expect(() => book.find('Jane')).toThrowError(NotFoundError);
    expect(Array.from(book).map((r) => r.name.value)).toEqual(['John']);
    expect(book.size).toBe(1);
  });

  it('delete of a missing name fails and leaves the book usable', () => {
    expect(() => book.delete('Nobody')).toThrowError('Record not found.');
    expect(book.names()).toEqual(['John', 'Jane']);
    book.addRecord(record('Nobody'));
    expect(book.has('Nobody')).toBe(true);
  });

  it('overwrites a record under an existing name by default', () => {
    const replacement = record('John', '01.01.1990');
    book.addRecord(replacement);
    expect(book.size).toBe(2);
    expect(book.find('John')).toBe(replacement);
    expect(book.names()).toEqual(['John', 'Jane']);
  });

  it('failIfExists rejects an existing name', () => {
    const original = book.find('John');
    expect(() => book.addRecord(record('John'), { failIfExists: true })).toThrowError(AlreadyExistsError);
    expect(book.find('John')).toBe(original);
    book.addRecord(record('Zed'), { failIfExists: true });
    expect(book.records().map((r) => r.name.value)).toEqual(['John', 'Jane', 'Zed']);
  });
});

describe('AddressBook upcomingBirthdays', () => {
  let book: AddressBook;

  beforeEach(() => {
    book = new AddressBook();
    book.addRecord(record('Seven', '25.10.1990'));
    book.addRecord(record('Eight', '26.10.1985'));
    book.addRecord(record('None'));
    book.addRecord(record('Today', '18.10.2000'));
    book.addRecord(record('Passed', '17.10.1970'));
  });

  it('includes the window boundary and keeps insertion order', () => {
    expect(book.upcomingBirthdays(7, TODAY).map((r) => r.name.value)).toEqual(['Seven', 'Today']);
  });

  it('widens with the window', () => {
    expect(book.upcomingBirthdays(8, TODAY).map((r) => r.name.value)).toEqual(['Seven', 'Eight', 'Today']);
    expect(book.upcomingBirthdays(364, TODAY).map((r) => r.name.value)).toEqual([
      'Seven',
      'Eight',
      'Today',
      'Passed',
    ]);
  });

  it('zero window matches only today, negative matches nothing', () => {
    expect(book.upcomingBirthdays(0, TODAY).map((r) => r.name.value)).toEqual(['Today']);
    expect(book.upcomingBirthdays(-1, TODAY)).toEqual([]);
  });

  it('defaults to a 7 day window', () => {
    expect(book.upcomingBirthdays(undefined, TODAY).map((r) => r.name.value)).toEqual(['Seven', 'Today']);
  });
});
