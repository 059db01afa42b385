/**
 * @fileoverview Tactician error hierarchy
 *
 * Fatal errors abort a run before any report exists. Per-type problems
 * (`MalformedTypeDescriptorError`) are absorbed into the compliance report as
 * not-applicable verdicts.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  fatal: boolean;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class TacticianError extends Error {
  abstract readonly code: string;
  abstract readonly fatal: boolean;

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CATALOG ERRORS
// ============================================================================

export type CatalogLoadReason = 'duplicate_id' | 'empty_id' | 'missing_targets';

export class CatalogLoadError extends TacticianError {
  readonly code = 'CATALOG_LOAD_ERROR';
  readonly fatal = true;

  constructor(
    readonly reason: CatalogLoadReason,
    readonly ruleIds: string[],
    message: string,
  ) {
    super(`Rule catalog failed to load (${reason}): ${message}`);
    this.name = 'CatalogLoadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        ruleIds: this.ruleIds,
      },
    };
  }
}

// ============================================================================
// DESCRIPTOR ERRORS
// ============================================================================

export class MalformedTypeDescriptorError extends TacticianError {
  readonly code = 'MALFORMED_TYPE_DESCRIPTOR';
  readonly fatal = false;

  constructor(
    readonly typeName: string,
    readonly missing: string,
    message?: string,
  ) {
    super(message ?? `Type ${typeName} is missing ${missing}`);
    this.name = 'MalformedTypeDescriptorError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        typeName: this.typeName,
        missing: this.missing,
      },
    };
  }
}

export class DescriptorValidationError extends TacticianError {
  readonly code = 'DESCRIPTOR_VALIDATION_ERROR';
  readonly fatal = true;

  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Invalid type descriptors in ${source}: ${issues.join('; ')}`);
    this.name = 'DescriptorValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends TacticianError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly fatal = true;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// SCAN ERRORS
// ============================================================================

export class ScanError extends TacticianError {
  readonly code = 'SCAN_ERROR';
  readonly fatal = true;

  constructor(
    readonly root: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Scan of ${root} failed: ${message}`);
    this.name = 'ScanError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        root: this.root,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isTacticianError(error: unknown): error is TacticianError {
  return error instanceof TacticianError;
}

export function isCatalogLoadError(error: unknown): error is CatalogLoadError {
  return error instanceof CatalogLoadError;
}

export function isMalformedTypeDescriptorError(error: unknown): error is MalformedTypeDescriptorError {
  return error instanceof MalformedTypeDescriptorError;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  catalog: (reason: CatalogLoadReason, ruleIds: string[], message: string) =>
    new CatalogLoadError(reason, ruleIds, message),

  malformed: (typeName: string, missing: string, message?: string) =>
    new MalformedTypeDescriptorError(typeName, missing, message),

  descriptors: (source: string, issues: string[]) =>
    new DescriptorValidationError(source, issues),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),

  scan: (root: string, message: string, cause?: Error) =>
    new ScanError(root, message, cause),
};
