#!/usr/bin/env -S npx tsx
import { CommanderError } from 'commander';
import { AppError, ConfigError, UsageError, errorMessage } from '@pacup/shared';
import { createProgram } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed its message
      process.exit(e.exitCode === 0 ? 0 : 2);
    }
    console.error(`❌ Error: ${errorMessage(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    const opts = program.opts<{ verbose?: boolean; debug?: boolean }>();
    if ((opts.verbose || opts.debug) && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }

    process.exit(e instanceof ConfigError || e instanceof UsageError ? 2 : 1);
  }
}

void main();
