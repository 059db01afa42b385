/**
 * @fileoverview Tactician - DDD tactical pattern compliance checker
 *
 * Classifies the types of a TypeScript codebase into DDD building blocks
 * (entities, value objects, aggregates, repositories, domain services,
 * domain events) and checks each against a catalog of tactical rules.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadConfig, scanWorkspace, runAnalysis, formatReport } from 'tactician';
 *
 * const { config } = await loadConfig(workspace);
 * const descriptors = await scanWorkspace(workspace, config);
 * const { report } = runAnalysis(descriptors, { config });
 * process.stdout.write(formatReport(report, 'markdown'));
 * ```
 *
 * Descriptors can also come from any other source; `parseDescriptors`
 * validates plain JSON into `TypeDescriptor[]`.
 *
 * @packageDocumentation
 */

// ============================================================================
// PUBLIC API SURFACE
// ============================================================================

export { runAnalysis, blockingActionItems, type AnalysisOptions, type AnalysisResult } from './api/analyze.js';

export * from './core/index.js';
export * from './config/index.js';
export * from './descriptors/index.js';
export * from './rules/index.js';
export * from './matcher/index.js';
export * from './report/index.js';
export * from './scanner/index.js';

export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

/**
 * Current tactician version. The descriptor file format is versioned
 * separately by `DESCRIPTOR_SCHEMA_VERSION`.
 */
export const TACTICIAN_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;
