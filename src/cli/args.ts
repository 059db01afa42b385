/**
 * @fileoverview Shared argument parsing for CLI commands
 */

import { CliError } from './errors.js';

/** Options every command accepts alongside its own. */
export const GLOBAL_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  workspace: { type: 'string', short: 'w' },
  verbose: { type: 'boolean' },
  json: { type: 'boolean' },
} as const;

/**
 * Run a strict `parseArgs` call, turning its TypeError into a CliError so an
 * unknown or incomplete flag exits with the invalid-argument code.
 */
export function parseCommandArgs<T>(command: string, parse: () => T): T {
  try {
    return parse();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new CliError(message, 'INVALID_ARGUMENT', `Run \`tactician help ${command}\` for usage information.`);
  }
}
