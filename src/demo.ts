import type { DateTime } from 'luxon';
import { AddressBook, DEFAULT_UPCOMING_DAYS } from './book';
import { ContactRecord, ContactRecordJSON } from './record';
import { currentDay } from './dates';

export interface DemoReport {
  initial: ContactRecordJSON[];
  edited: ContactRecordJSON;
  foundPhone: { name: string; phone: string };
  afterDelete: ContactRecordJSON[];
  upcoming: ContactRecordJSON[];
  windowDays: number;
  lines: string[];
}

/**
 * Sample session: two contacts, a phone edit and lookup, a delete, then an
 * upcoming-birthdays query after a third contact joins.
 */
export function runDemo(windowDays: number = DEFAULT_UPCOMING_DAYS, today: DateTime = currentDay()): DemoReport {
  const book = new AddressBook();

  const john = new ContactRecord('John');
  john.addPhone('0937777777');
  john.addPhone('5555555555');
  john.addBirthday('25.12.1990');
  book.addRecord(john);

  const jane = new ContactRecord('Jane');
  jane.addPhone('9876543210');
  jane.addBirthday('01.01.1995');
  book.addRecord(jane);

  const lines: string[] = book.records().map((r) => r.toString());
  const initial = book.records().map((r) => r.toJSON());

  book.find('John').editPhone('0937777777', '0936666666');
  const edited = john.toJSON();
  const found = john.findPhone('5555555555');
  lines.push(john.toString(), `${john.name}: ${found}`);

  book.delete('Jane');
  const afterDelete = book.records().map((r) => r.toJSON());
  lines.push("Jane's record deleted.", ...book.records().map((r) => r.toString()));

  const vovan = new ContactRecord('Vovan');
  vovan.addPhone('0934563292');
  vovan.addBirthday('31.07.1992');
  book.addRecord(vovan);

  const upcoming = book.upcomingBirthdays(windowDays, today);
  if (upcoming.length === 0) {
    lines.push(`No birthdays in the next ${windowDays} days.`);
  } else {
    lines.push(...upcoming.map((r) => `Upcoming birthday: ${r}`));
  }

  return {
    initial,
    edited,
    foundPhone: { name: john.name.value, phone: found.value },
    afterDelete,
    upcoming: upcoming.map((r) => r.toJSON()),
    windowDays,
    lines,
  };
}
