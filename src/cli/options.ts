/**
 * Command-line option parsing
 *
 * @module cli/options
 */

import { parseArgs } from 'util';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { CliOptionsInput, validateInput, type CliOptions } from '../utils/validation.js';

export const USAGE = `Usage: page-url-resolver --dsn <database> [options]

Resolve page ids into site URLs.

Options:
  --dsn <path>       SQLite database (path, sqlite:path or file:path).
                     Defaults to PAGE_RESOLVER_DSN.
  --pid <id>         Page id to resolve
  --query <sql>      A select that yields a list of page ids
  --nfields <n>      Number of fields selected by --query besides the page id
  --children         Select children pages
  --roots            Select root pages
  --csv              Print the selected ids as a comma-separated list
  --verbose          Log diagnostics to stderr
  --help             Show this help
`;

/**
 * Parse and validate command-line arguments (without the node/script prefix)
 *
 * @throws ValidationError on unknown flags, missing values or invalid numbers
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: [...args],
      strict: true,
      allowPositionals: false,
      options: {
        dsn: { type: 'string' },
        pid: { type: 'string' },
        query: { type: 'string' },
        nfields: { type: 'string' },
        children: { type: 'boolean' },
        roots: { type: 'boolean' },
        csv: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (error) {
    throw new ValidationError(errorMessage(error));
  }

  return validateInput(CliOptionsInput, values);
}
