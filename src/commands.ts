import type { DateTime } from 'luxon';
import { AddressBook } from './book';
import { ContactRecord } from './record';
import { parseWindowDays } from './config';
import { currentDay } from './dates';
import { isContactsError } from './errors';

export interface ShellContext {
  book: AddressBook;
  windowDays: number;
  today?: () => DateTime;
}

export interface CommandResult {
  reply: string;
  exit?: boolean;
}

interface CommandSpec {
  usage: string;
  minArgs: number;
  maxArgs: number;
  run: (ctx: ShellContext, args: string[]) => string;
}

export function parseInput(line: string): { command: string; args: string[] } {
  const [command = '', ...args] = line.trim().split(/\s+/).filter((s) => s.length > 0);
  return { command: command.toLowerCase(), args };
}

function todayOf(ctx: ShellContext): DateTime {
  return ctx.today ? ctx.today() : currentDay();
}

function describeUpcoming(record: ContactRecord, today: DateTime): string {
  const days = record.daysToNextBirthday(today);
  const when = days === 0 ? 'today' : days === 1 ? 'tomorrow' : `in ${days} days`;
  return `${record.name.value}: ${record.birthday?.toString() ?? ''} (${when})`;
}

const COMMANDS: Record<string, CommandSpec> = {
  hello: {
    usage: 'hello',
    minArgs: 0,
    maxArgs: 0,
    run: () => 'How can I help you?',
  },
  add: {
    usage: 'add <name> <phone>',
    minArgs: 2,
    maxArgs: 2,
    run: ({ book }, [name, phone]) => {
      if (book.has(name)) {
        book.find(name).addPhone(phone);
        return 'Contact updated.';
      }
      const record = new ContactRecord(name);
      record.addPhone(phone);
      book.addRecord(record);
      return 'Contact added.';
    },
  },
  change: {
    usage: 'change <name> <old phone> <new phone>',
    minArgs: 3,
    maxArgs: 3,
    run: ({ book }, [name, oldPhone, newPhone]) => {
      book.find(name).editPhone(oldPhone, newPhone);
      return 'Contact updated.';
    },
  },
  phone: {
    usage: 'phone <name>',
    minArgs: 1,
    maxArgs: 1,
    run: ({ book }, [name]) => {
      const phones = book.find(name).phones.map((p) => p.value);
      return phones.length > 0 ? phones.join('; ') : 'No phones.';
    },
  },
  'remove-phone': {
    usage: 'remove-phone <name> <phone>',
    minArgs: 2,
    maxArgs: 2,
    run: ({ book }, [name, phone]) => {
      book.find(name).removePhone(phone);
      return 'Phone removed.';
    },
  },
  'add-birthday': {
    usage: 'add-birthday <name> <DD.MM.YYYY>',
    minArgs: 2,
    maxArgs: 2,
    run: ({ book }, [name, birthday]) => {
      book.find(name).addBirthday(birthday);
      return 'Birthday added.';
    },
  },
  'show-birthday': {
    usage: 'show-birthday <name>',
    minArgs: 1,
    maxArgs: 1,
    run: ({ book }, [name]) => book.find(name).birthday?.toString() ?? 'No birthday set.',
  },
  birthdays: {
    usage: 'birthdays [days]',
    minArgs: 0,
    maxArgs: 1,
    run: (ctx, [days]) => {
      const windowDays = days === undefined ? ctx.windowDays : parseWindowDays(days, 'days');
      const today = todayOf(ctx);
      const upcoming = ctx.book.upcomingBirthdays(windowDays, today);
      if (upcoming.length === 0) return 'No upcoming birthdays.';
      return upcoming.map((r) => describeUpcoming(r, today)).join('\n');
    },
  },
  delete: {
    usage: 'delete <name>',
    minArgs: 1,
    maxArgs: 1,
    run: ({ book }, [name]) => {
      book.delete(name);
      return 'Contact deleted.';
    },
  },
  all: {
    usage: 'all',
    minArgs: 0,
    maxArgs: 0,
    run: ({ book }) => (book.size > 0 ? book.records().map((r) => r.toString()).join('\n') : 'No contacts.'),
  },
  help: {
    usage: 'help',
    minArgs: 0,
    maxArgs: 0,
    run: () => ['Commands:', ...Object.values(COMMANDS).map((c) => `  ${c.usage}`), '  close | exit'].join('\n'),
  },
};

const EXIT_COMMANDS = new Set(['close', 'exit']);

/**
 * Run one shell line against the book. Validation, lookup and conflict
 * failures become the reply; anything else propagates.
 */
export function executeLine(ctx: ShellContext, line: string): CommandResult {
  const { command, args } = parseInput(line);
  if (!command) return { reply: '' };
  if (EXIT_COMMANDS.has(command)) return { reply: 'Good bye!', exit: true };

  const spec = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!spec) return { reply: 'Invalid command.' };
  if (args.length < spec.minArgs || args.length > spec.maxArgs) {
    return { reply: `Usage: ${spec.usage}` };
  }

  try {
    return { reply: spec.run(ctx, args) };
  } catch (err) {
    if (isContactsError(err)) return { reply: err.message };
    throw err;
  }
}
