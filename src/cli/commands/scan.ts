/**
 * @fileoverview Scan Command
 *
 * Prints the type descriptors the scanner builds for the workspace, in the
 * file format `tactician analyze --descriptors` reads.
 *
 * Usage:
 *   tactician scan [--config <file>] [--output <file>]
 */

import { parseArgs } from 'node:util';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from '../../config/tactician_config.js';
import { serializeDescriptors } from '../../descriptors/loader.js';
import { scanWorkspace } from '../../scanner/ts_scanner.js';
import { logInfo } from '../../telemetry/logger.js';
import { GLOBAL_OPTIONS, parseCommandArgs } from '../args.js';
import { CliError } from '../errors.js';

export interface ScanCommandOptions {
  workspace: string;
  rawArgs: string[];
}

export async function scanCommand(options: ScanCommandOptions): Promise<void> {
  const { workspace, rawArgs } = options;

  const { values } = parseCommandArgs('scan', () =>
    parseArgs({
      args: rawArgs,
      options: {
        ...GLOBAL_OPTIONS,
        config: { type: 'string' },
        output: { type: 'string', short: 'o' },
      },
      allowPositionals: true,
      strict: true,
    }),
  );

  const { config } = await loadConfig(workspace, values.config);
  const descriptors = await scanWorkspace(workspace, config);
  const text = `${serializeDescriptors(descriptors)}\n`;

  if (values.output === undefined) {
    process.stdout.write(text);
    return;
  }

  const destination = path.resolve(workspace, values.output);
  try {
    await fs.writeFile(destination, text, 'utf-8');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new CliError(`Cannot write ${destination}: ${message}`, 'OUTPUT_FAILED');
  }
  logInfo('Descriptors written', { path: destination, types: descriptors.length });
}
