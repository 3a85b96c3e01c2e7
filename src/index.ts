#!/usr/bin/env node
import { program } from 'commander';
import { createRequire } from 'node:module';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { handleUnknownError } from './errors/index';
import { LOG_PREFIX, warn } from './output/logger';
import { registerExtractCommand } from './cli/extract-command';
import { registerExhibitsCommand } from './cli/exhibits-command';
import { registerValidateCommand } from './cli/validate-command';

const REQUIRE = createRequire(import.meta.url);
const PKG = z.object({ version: z.string() }).parse(REQUIRE('../package.json'));

/*
 * Best-effort .env loader without external dependencies.
 * Loads environment variables from .env or .env.local files; variables
 * already set in the environment win.
 */
function loadDotEnv(): void {
  const candidates = ['.env', '.env.local'];
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
      // A broken .env file leaves the existing environment in place
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`${LOG_PREFIX} Warning: ${err.message}`);
    }
  }
}

// Load environment variables at startup
loadDotEnv();

// Set up Commander program
program
  .name('claimtrace')
  .description('Source-grounded claim extraction for Medicaid procurement documents')
  .version(PKG.version);

// Register commands
registerExtractCommand(program);
registerExhibitsCommand(program);
registerValidateCommand(program);

// Parse command line arguments
await program.parseAsync();
