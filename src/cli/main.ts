/**
 * Command-line run
 *
 * Stdout carries only resolver output. Diagnostics and errors go to stderr.
 *
 * @module cli/main
 */

import { loadConfig } from '../utils/config.js';
import { ResolverError, formatErrorMessage } from '../utils/errors.js';
import { runResolver, type DiagnosticLog } from '../services/resolver.js';
import { USAGE, parseCliArgs } from './options.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Run the resolver for one set of arguments
 *
 * @returns process exit code: 0 on success, 1 on any failure
 */
export function main(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO
): number {
  // Verbosity is known only after parsing succeeds.
  let verbose = false;
  try {
    const options = parseCliArgs(args);
    verbose = options.verbose;
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = loadConfig(env);
    const log: DiagnosticLog = verbose ? (message) => io.stderr(`${message}\n`) : () => undefined;

    const { lines } = runResolver(
      {
        dsn: options.dsn,
        pid: options.pid,
        query: options.query,
        nfields: options.nfields,
        children: options.children,
        roots: options.roots,
        mode: options.csv ? 'id-list' : 'urls',
      },
      config,
      log
    );

    if (lines.length > 0) {
      io.stdout(`${lines.join('\n')}\n`);
    }
    return 0;
  } catch (error) {
    const resolverError = ResolverError.fromUnknown(error);
    io.stderr(`${formatErrorMessage(resolverError, verbose)}\n`);
    return 1;
  }
}
