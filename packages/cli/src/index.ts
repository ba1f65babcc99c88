#!/usr/bin/env tsx
import { AppError, isUserCorrectable } from '@shellgate/shared';
import type { GlobalOptions } from './context';
import { createProgram } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts<GlobalOptions>();

    if (opts.json) {
      if (e instanceof AppError) {
        console.log(
          JSON.stringify({
            error: {
              code: e.code,
              message: e.message,
              details: e.details,
            },
          }),
        );
      } else {
        console.log(
          JSON.stringify({
            error: {
              code: 'UnknownError',
              message: e instanceof Error ? e.message : String(e),
            },
          }),
        );
      }
    } else {
      // Human-readable output
      console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    process.exit(isUserCorrectable(e) ? 2 : 1);
  }
}

void main();
