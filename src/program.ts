import { Command, CommanderError } from 'commander';
import type { DateTime } from 'luxon';
import { AddressBook } from './book';
import { resolveWindowDays } from './config';
import { currentDay } from './dates';
import { runDemo } from './demo';
import { isContactsError } from './errors';
import { Birthday, Phone } from './fields';
import { runShell } from './shell';

type OutputMode = 'text' | 'json';

interface CommonOpts {
  json?: boolean;
  window?: string;
}

export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  today?: () => DateTime;
  stdin?: NodeJS.ReadableStream;
}

export const FAILED = 'contacts.failed';

function toOutputMode(opts: { json?: boolean }): OutputMode {
  return opts.json ? 'json' : 'text';
}

function printResult(mode: OutputMode, payload: unknown, text: string) {
  if (mode === 'json') {
    process.stdout.write(JSON.stringify(payload) + '\n');
  } else {
    process.stdout.write(text + '\n');
  }
}

// The message is already on stderr; the entry point only has to exit with the code.
function fail(message: string): never {
  process.stderr.write(message + '\n');
  throw new CommanderError(1, FAILED, message);
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const today = () => (deps.today ? deps.today() : currentDay());

  const program = new Command();
  program
    .name('contacts')
    .description('In-memory contact book: phones, birthdays and upcoming birthdays.')
    .version('0.1.0', '-v, --version', 'Show version')
    .helpOption('-h, --help', 'Show help')
    .showHelpAfterError()
    .option('-j, --json', 'Output JSON', false)
    .option('-w, --window <days>', 'Upcoming birthdays window in days (default: $CONTACTS_UPCOMING_DAYS or 7)');

  function ensureWindowDays(): number {
    try {
      return resolveWindowDays(program.opts<CommonOpts>().window, env);
    } catch (e) {
      if (isContactsError(e)) fail(e.message);
      throw e;
    }
  }

  program
    .command('shell', { isDefault: true })
    .description('Read commands from stdin, one per line (type "help" for the list).')
    .action(async () => {
      const windowDays = ensureWindowDays();
      await runShell({ book: new AddressBook(), windowDays, today }, deps.stdin ?? process.stdin, process.stdout);
    });

  program
    .command('demo')
    .description('Run the sample session and print each step.')
    .action(() => {
      const report = runDemo(ensureWindowDays(), today());
      printResult(toOutputMode(program.opts<CommonOpts>()), report, report.lines.join('\n'));
    });

  const check = program.command('check').description('Validate a single field value.');

  check
    .command('phone')
    .description('Check that a phone number is exactly 10 digits.')
    .argument('<raw>', 'Phone number')
    .action((raw: string) => {
      const mode = toOutputMode(program.opts<CommonOpts>());
      try {
        const phone = new Phone(raw);
        printResult(mode, { phone: phone.value, valid: true }, phone.value);
      } catch (e) {
        if (!isContactsError(e)) throw e;
        if (mode === 'json') printResult(mode, { phone: raw, valid: false, error: e.message }, e.message);
        fail(e.message);
      }
    });

  check
    .command('birthday')
    .description('Check that a birthday is a real date in DD.MM.YYYY form.')
    .argument('<raw>', 'Birthday, DD.MM.YYYY')
    .action((raw: string) => {
      const mode = toOutputMode(program.opts<CommonOpts>());
      try {
        const birthday = new Birthday(raw);
        printResult(mode, { birthday: birthday.toString(), iso: birthday.value.toISODate(), valid: true }, birthday.toString());
      } catch (e) {
        if (!isContactsError(e)) throw e;
        if (mode === 'json') printResult(mode, { birthday: raw, valid: false, error: e.message }, e.message);
        fail(e.message);
      }
    });

  return program;
}
