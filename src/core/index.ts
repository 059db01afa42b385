/**
 * @fileoverview Core tactician infrastructure
 *
 * Result types and the typed error hierarchy shared by every module.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeSync,
  safeReadOptionalFile,
  safeJsonParse,
} from './result.js';

// Errors
export {
  type ErrorJSON,
  type CatalogLoadReason,
  TacticianError,
  CatalogLoadError,
  MalformedTypeDescriptorError,
  DescriptorValidationError,
  ConfigurationError,
  ScanError,
  isTacticianError,
  isCatalogLoadError,
  isMalformedTypeDescriptorError,
  Errors,
} from './errors.js';
