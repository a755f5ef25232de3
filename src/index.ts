#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { warn } from './output/logger';
import { DOTENV_FILENAMES, VERSION } from './config/constants';
import { registerVerifyCommand } from './cli/commands';
import { registerAggregateCommand } from './cli/aggregate-command';
import { EXIT_CANCELLED } from './cli/types';

/*
 * Loads KEY=value pairs from the first .env file found. Variables already
 * set in the environment win.
 */
function loadDotEnv(): void {
  for (const filename of DOTENV_FILENAMES) {
    const full = path.resolve(process.cwd(), filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || !match[2]) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
      break; // stop after first found
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Loading .env file');
      warn(err.message);
    }
  }
}

loadDotEnv();

// First Ctrl-C cancels in-flight scans; a second one exits at once.
const shutdown = new AbortController();
process.on('SIGINT', () => {
  if (shutdown.signal.aborted) {
    process.exit(EXIT_CANCELLED);
  }
  warn('Interrupted; cancelling in-flight scans');
  shutdown.abort();
});

program
  .name('factledger')
  .description('Cross-source corroboration of biographical claims')
  .version(VERSION);

registerVerifyCommand(program, shutdown.signal);
registerAggregateCommand(program);

program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
