/**
 * @fileoverview Tactician configuration
 *
 * Looks for a config file at the workspace root (or an explicit path), parses
 * it as YAML (JSON is valid YAML) and validates it. Every key has a default,
 * so a workspace without a config file analyzes with the built-in settings.
 */

import * as path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { Errors } from '../core/errors.js';
import { safeReadOptionalFile } from '../core/result.js';
import { SEVERITIES } from '../rules/types.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const CONFIG_FILE_NAMES = [
  'tactician.config.yaml',
  'tactician.config.yml',
  '.tactician.yaml',
  'tactician.config.json',
] as const;

export const DEFAULT_INCLUDE = ['src/**/*.ts'];

export const DEFAULT_EXCLUDE = [
  '**/node_modules/**',
  '**/dist/**',
  '**/*.d.ts',
  '**/*.test.ts',
  '**/*.spec.ts',
  '**/__tests__/**',
];

export const FailOnSchema = z.union([z.enum(SEVERITIES), z.literal('none')]);

export const TacticianConfigSchema = z.object({
  include: z.array(z.string().min(1)).default(DEFAULT_INCLUDE),
  exclude: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE),
  identityFieldNames: z.array(z.string().min(1)).default([]),
  clusterStrategy: z.enum(['directory', 'none']).default('directory'),
  irregularPastTense: z.array(z.string().min(1)).default([]),
  rules: z.object({
    disable: z.array(z.string()).default([]),
    severity: z.record(z.enum(SEVERITIES)).default({}),
  }).strict().default({}),
  failOn: FailOnSchema.default('high'),
}).strict();

export type TacticianConfig = z.infer<typeof TacticianConfigSchema>;
export type TacticianConfigInput = z.input<typeof TacticianConfigSchema>;
export type FailOn = z.infer<typeof FailOnSchema>;

export interface LoadedConfig {
  config: TacticianConfig;
  /** Absolute path of the file read, or null when defaults were used */
  source: string | null;
}

// ============================================================================
// LOADING
// ============================================================================

function describeIssues(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw config data. `null` (an empty file) means defaults.
 */
export function parseConfig(raw: unknown, source = '<config>'): TacticianConfig {
  const parsed = TacticianConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw Errors.config(source, describeIssues(parsed.error));
  }
  return parsed.data;
}

function parseConfigText(text: string, source: string): TacticianConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw Errors.config(source, `cannot parse file: ${message}`);
  }
  return parseConfig(raw, source);
}

export function defaultConfig(): TacticianConfig {
  return parseConfig({});
}

/**
 * Load the workspace configuration. An explicit path must exist; otherwise
 * the first of `CONFIG_FILE_NAMES` found at the root wins.
 */
export async function loadConfig(workspace: string, explicitPath?: string): Promise<LoadedConfig> {
  const candidates = explicitPath
    ? [path.resolve(workspace, explicitPath)]
    : CONFIG_FILE_NAMES.map((name) => path.join(workspace, name));

  for (const candidate of candidates) {
    const read = await safeReadOptionalFile(candidate);
    if (!read.ok) {
      throw Errors.config(candidate, `cannot read file: ${read.error.message}`);
    }
    if (read.value === null) continue;

    logDebug('Loaded configuration', { source: candidate });
    return { config: parseConfigText(read.value, candidate), source: candidate };
  }

  if (explicitPath) {
    throw Errors.config(explicitPath, 'file not found');
  }
  return { config: defaultConfig(), source: null };
}
