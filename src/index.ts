/**
 * Page URL Resolver
 *
 * Entry point: loads .env configuration, runs one resolution for the
 * process arguments and exits with its status.
 *
 * CRITICAL: NEVER use console.log() for diagnostics - stdout carries the
 * resolved ids or URLs. Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. PAGE_RESOLVER_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.PAGE_RESOLVER_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string' && p.length > 0);

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { main } from './cli/main.js';

process.exitCode = main(process.argv.slice(2));
