#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { error, warn } from './output/logger';
import { ENV_FILENAME } from './cli/init-command';
import { createProgram } from './cli/program';
import { EXIT_INTERRUPTED } from './cli/types';

/*
 * Best-effort .env loader.
 * Loads environment variables from the first of .env, .env.local or the
 * file `memoforge init` writes; variables already set in the environment win.
 */
function loadDotEnv(): void {
  const candidates = ['.env', '.env.local', ENV_FILENAME];
  for (const filename of candidates) {
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
      // rely on the existing environment
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`[memoforge] Warning: ${err.message}`);
    }
  }
}

loadDotEnv();

// First Ctrl-C stops the run after the in-flight call; a second exits at once.
const interrupt = new AbortController();
process.on('SIGINT', () => {
  if (interrupt.signal.aborted) {
    process.exit(EXIT_INTERRUPTED);
  }
  error('\nInterrupt received, stopping...');
  interrupt.abort();
});

createProgram({ signal: interrupt.signal }, program);

program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  error(`Error: ${err.message}`);
  process.exit(1);
});
