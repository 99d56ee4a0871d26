#!/usr/bin/env node
import { CommanderError } from 'commander';
import { buildProgram } from './program';

buildProgram()
  .parseAsync()
  .catch((err) => {
    if (err instanceof CommanderError) process.exit(err.exitCode);
    process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
    process.exit(1);
  });
