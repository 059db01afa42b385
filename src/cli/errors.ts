/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure leaving the CLI is converted to an ErrorEnvelope: a stable
 * machine-readable code, a message, recovery hints and an exit code. Under
 * `--json` the envelope is printed as JSON on stderr.
 */

import {
  CatalogLoadError,
  ConfigurationError,
  DescriptorValidationError,
  MalformedTypeDescriptorError,
  ScanError,
  isTacticianError,
} from '../core/errors.js';

// ============================================================================
// EXIT CODES
// ============================================================================

export const ExitCodes = {
  OK: 0,
  VIOLATIONS: 1,
  INVALID_ARGUMENT: 2,
  CONFIGURATION: 3,
  CATALOG: 4,
  UNEXPECTED: 70,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

// ============================================================================
// ERROR CODES
// ============================================================================

export type ErrorCode =
  | 'EINVALID_ARGUMENT'
  | 'EUNKNOWN_COMMAND'
  | 'ECONFIG_INVALID'
  | 'EDESCRIPTORS_INVALID'
  | 'ESCAN_FAILED'
  | 'ECATALOG_INVALID'
  | 'EOUTPUT_FAILED'
  | 'EUNKNOWN';

interface ErrorCodeMetadata {
  exitCode: ExitCode;
  recoveryHints: string[];
}

export const ErrorMetadata: Record<ErrorCode, ErrorCodeMetadata> = {
  EINVALID_ARGUMENT: {
    exitCode: ExitCodes.INVALID_ARGUMENT,
    recoveryHints: ['Run `tactician help <command>` for usage information.'],
  },
  EUNKNOWN_COMMAND: {
    exitCode: ExitCodes.INVALID_ARGUMENT,
    recoveryHints: ['Run `tactician help` to list the available commands.'],
  },
  ECONFIG_INVALID: {
    exitCode: ExitCodes.CONFIGURATION,
    recoveryHints: [
      'Check tactician.config.yaml against the documented keys.',
      'Rule ids under rules.disable and rules.severity must exist; run `tactician rules`.',
    ],
  },
  EDESCRIPTORS_INVALID: {
    exitCode: ExitCodes.CONFIGURATION,
    recoveryHints: ['Regenerate the descriptor file with `tactician scan --output <file>`.'],
  },
  ESCAN_FAILED: {
    exitCode: ExitCodes.CONFIGURATION,
    recoveryHints: ['Check the --workspace path and the include/exclude patterns.'],
  },
  ECATALOG_INVALID: {
    exitCode: ExitCodes.CATALOG,
    recoveryHints: ['Every rule needs a unique, non-empty identifier.'],
  },
  EOUTPUT_FAILED: {
    exitCode: ExitCodes.UNEXPECTED,
    recoveryHints: ['Check that the --output directory exists and is writable.'],
  },
  EUNKNOWN: {
    exitCode: ExitCodes.UNEXPECTED,
    recoveryHints: ['Re-run with --verbose for more detail.'],
  },
};

function isErrorCode(value: string): value is ErrorCode {
  return value in ErrorMetadata;
}

// ============================================================================
// ENVELOPE
// ============================================================================

export interface ErrorEnvelope {
  code: string;
  message: string;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    code,
    message,
    recoveryHints: overrides.recoveryHints ?? [...ErrorMetadata[code].recoveryHints],
  };
  if (overrides.context) envelope.context = overrides.context;
  return envelope;
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

// ============================================================================
// CLI ERRORS
// ============================================================================

export type CliErrorCode = 'INVALID_ARGUMENT' | 'UNKNOWN_COMMAND' | 'OUTPUT_FAILED';

const CLI_ERROR_CODES: Record<CliErrorCode, ErrorCode> = {
  INVALID_ARGUMENT: 'EINVALID_ARGUMENT',
  UNKNOWN_COMMAND: 'EUNKNOWN_COMMAND',
  OUTPUT_FAILED: 'EOUTPUT_FAILED',
};

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, undefined, details);
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

function tacticianErrorCode(error: Error): ErrorCode {
  if (error instanceof CatalogLoadError) return 'ECATALOG_INVALID';
  if (error instanceof ConfigurationError) return 'ECONFIG_INVALID';
  if (error instanceof DescriptorValidationError) return 'EDESCRIPTORS_INVALID';
  if (error instanceof MalformedTypeDescriptorError) return 'EDESCRIPTORS_INVALID';
  if (error instanceof ScanError) return 'ESCAN_FAILED';
  return 'EUNKNOWN';
}

/**
 * Convert anything thrown into an envelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) return error;

  if (error instanceof CliError) {
    const code = CLI_ERROR_CODES[error.code];
    return createErrorEnvelope(code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : [...ErrorMetadata[code].recoveryHints],
      context: error.details,
    });
  }

  if (isTacticianError(error)) {
    const details = error.toJSON().details;
    return createErrorEnvelope(tacticianErrorCode(error), error.message, {
      context: { errorCode: error.code, ...details },
    });
  }

  if (error instanceof Error) {
    return createErrorEnvelope('EUNKNOWN', error.message);
  }
  return createErrorEnvelope('EUNKNOWN', String(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return isErrorCode(envelope.code) ? ErrorMetadata[envelope.code].exitCode : ExitCodes.UNEXPECTED;
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
