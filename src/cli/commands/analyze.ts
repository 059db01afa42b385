/**
 * @fileoverview Analyze Command
 *
 * Scans the workspace (or reads a descriptor file), evaluates the rule
 * catalog and prints the compliance report.
 *
 * Usage:
 *   tactician analyze [--descriptors <file>] [--config <file>]
 *                     [--format text|markdown|json] [--output <file>]
 *                     [--fail-on critical|high|medium|low|none]
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { blockingActionItems, runAnalysis } from '../../api/analyze.js';
import { FailOnSchema, loadConfig, type FailOn } from '../../config/tactician_config.js';
import { loadDescriptorFile } from '../../descriptors/loader.js';
import type { TypeDescriptor } from '../../descriptors/types.js';
import { formatReport, isReportFormat, REPORT_FORMATS, type ReportFormat } from '../../report/formatters.js';
import { scanWorkspace } from '../../scanner/ts_scanner.js';
import { logInfo } from '../../telemetry/logger.js';
import { GLOBAL_OPTIONS, parseCommandArgs } from '../args.js';
import { CliError, ExitCodes } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeCommandOptions {
  workspace: string;
  rawArgs: string[];
}

// ============================================================================
// Argument validation
// ============================================================================

function resolveFormat(value: string): ReportFormat {
  if (!isReportFormat(value)) {
    throw new CliError(
      `Unknown report format: ${value}`,
      'INVALID_ARGUMENT',
      `Use one of: ${REPORT_FORMATS.join(', ')}`,
    );
  }
  return value;
}

function resolveFailOn(value: string | undefined, fallback: FailOn): FailOn {
  if (value === undefined) return fallback;
  const parsed = FailOnSchema.safeParse(value);
  if (!parsed.success) {
    throw new CliError(
      `Invalid --fail-on value: ${value}`,
      'INVALID_ARGUMENT',
      'Use one of: critical, high, medium, low, none',
    );
  }
  return parsed.data;
}

async function writeOutput(destination: string, text: string): Promise<void> {
  try {
    await fs.writeFile(destination, text, 'utf-8');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new CliError(`Cannot write ${destination}: ${message}`, 'OUTPUT_FAILED');
  }
}

// ============================================================================
// Command
// ============================================================================

export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<void> {
  const { workspace, rawArgs } = options;

  const { values } = parseCommandArgs('analyze', () =>
    parseArgs({
      args: rawArgs,
      options: {
        ...GLOBAL_OPTIONS,
        descriptors: { type: 'string' },
        config: { type: 'string' },
        format: { type: 'string', default: 'text' },
        output: { type: 'string', short: 'o' },
        'fail-on': { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    }),
  );

  const format = resolveFormat(values.format);
  const { config } = await loadConfig(workspace, values.config);
  const failOn = resolveFailOn(values['fail-on'], config.failOn);

  let descriptors: TypeDescriptor[];
  if (values.descriptors !== undefined) {
    descriptors = await loadDescriptorFile(path.resolve(workspace, values.descriptors));
  } else {
    descriptors = await scanWorkspace(workspace, config);
  }

  const { report } = runAnalysis(descriptors, { config });
  const text = formatReport(report, format);

  if (values.output !== undefined) {
    const destination = path.resolve(workspace, values.output);
    await writeOutput(destination, text);
    logInfo('Report written', { path: destination, actionItems: report.actionItems.length });
  } else {
    process.stdout.write(text);
  }

  const blocking = blockingActionItems(report, failOn);
  if (blocking.length > 0) {
    logInfo(`${blocking.length} action item(s) at or above ${failOn} severity`);
    process.exitCode = ExitCodes.VIOLATIONS;
  }
}
