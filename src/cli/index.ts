#!/usr/bin/env node
/**
 * @fileoverview Tactician CLI
 *
 * Commands:
 *   tactician analyze   - Check the workspace against the rule catalog
 *   tactician scan      - Print the type descriptors found in the workspace
 *   tactician rules     - List the rule catalog
 *   tactician help      - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import * as path from 'node:path';
import { setLogLevel } from '../telemetry/logger.js';
import { showHelp } from './help.js';
import { analyzeCommand } from './commands/analyze.js';
import { rulesCommand } from './commands/rules.js';
import { scanCommand } from './commands/scan.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'analyze' | 'scan' | 'rules' | 'help';

type CommandHandler = (options: { workspace: string; rawArgs: string[] }) => Promise<void>;

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  analyze: {
    description: 'Check the workspace against the rule catalog',
    usage: 'tactician analyze [--descriptors <file>] [--format text|markdown|json] [--output <file>] [--fail-on <severity>]',
  },
  scan: {
    description: 'Print the type descriptors found in the workspace',
    usage: 'tactician scan [--config <file>] [--output <file>]',
  },
  rules: {
    description: 'List the rule catalog',
    usage: 'tactician rules [--category <category>] [--format text|json]',
  },
  help: {
    description: 'Show help information',
    usage: 'tactician help [command]',
  },
};

const HANDLERS: Record<Exclude<Command, 'help'>, CommandHandler> = {
  analyze: analyzeCommand,
  scan: scanCommand,
  rules: rulesCommand,
};

function isRunnableCommand(value: string): value is keyof typeof HANDLERS {
  return value in HANDLERS;
}

/**
 * Print an error with recovery hints, or as a JSON envelope under `--json`.
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Command-specific flags are parsed by each command.
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      verbose: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    const { TACTICIAN_VERSION } = await import('../index.js');
    console.log(`tactician ${TACTICIAN_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  const workspace = path.resolve(typeof values.workspace === 'string' ? values.workspace : process.cwd());
  const jsonMode = values.json === true;

  if (values.verbose === true) {
    setLogLevel('debug');
  }

  if (values.help === true || command === undefined || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  if (!isRunnableCommand(command)) {
    const envelope = createErrorEnvelope('EUNKNOWN_COMMAND', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'tactician help' for usage information`,
        ...Object.values(COMMANDS).map((entry) => `${entry.usage}  ${entry.description}`),
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  try {
    await HANDLERS[command]({ workspace, rawArgs: args });
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context = { ...envelope.context, command };
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main().catch((error) => {
  const envelope = classifyError(error);
  outputStructuredError(envelope, process.argv.includes('--json'));
  process.exitCode = getExitCode(envelope);
});
