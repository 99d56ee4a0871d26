export { AddressBook, DEFAULT_UPCOMING_DAYS } from './book';
export type { AddRecordOptions } from './book';
export { ContactRecord } from './record';
export type { ContactRecordJSON } from './record';
export { Field, Name, Phone, Birthday, PHONE_LENGTH } from './fields';
export { ValidationError, NotFoundError, AlreadyExistsError, isContactsError } from './errors';
export type { ContactsError } from './errors';
export { DATE_FORMAT, parseDate, formatDate, currentDay } from './dates';
export { resolveWindowDays, UPCOMING_DAYS_ENV } from './config';
export { executeLine } from './commands';
export type { ShellContext, CommandResult } from './commands';
export { runShell } from './shell';
export { buildProgram } from './program';
export type { ProgramDeps } from './program';
