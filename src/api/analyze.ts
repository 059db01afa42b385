/**
 * @fileoverview Analysis pipeline
 *
 * catalog -> matcher -> generator. A run is atomic: it returns a complete
 * report or throws before any partial output exists.
 */

import { defaultConfig, type FailOn, type TacticianConfig } from '../config/tactician_config.js';
import { discover, type TypeDescriptor } from '../descriptors/types.js';
import { PatternMatcher } from '../matcher/matcher.js';
import type { ActionItem, ComplianceReport } from '../report/types.js';
import { ReportGenerator } from '../report/generator.js';
import { createDefaultCatalog, type RuleCatalog } from '../rules/catalog.js';
import { SEVERITY_RANK } from '../rules/types.js';
import { logDebug } from '../telemetry/logger.js';

export interface AnalysisOptions {
  config?: TacticianConfig;
  /** Replaces the built-in catalog; rule settings from `config` are not applied to it */
  catalog?: RuleCatalog;
}

export interface AnalysisResult {
  report: ComplianceReport;
  catalog: RuleCatalog;
}

export function runAnalysis(descriptors: readonly TypeDescriptor[], options: AnalysisOptions = {}): AnalysisResult {
  const config = options.config ?? defaultConfig();
  const catalog = options.catalog ?? createDefaultCatalog(config.rules);

  const matcher = new PatternMatcher(catalog, {
    identityFieldNames: config.identityFieldNames,
    irregularPastTense: config.irregularPastTense,
  });
  const { verdicts, classified, unclassified } = matcher.evaluateAll(discover(descriptors));
  logDebug('Evaluated rules', {
    types: descriptors.length,
    verdicts: verdicts.length,
    unclassified: unclassified.length,
  });

  return { report: new ReportGenerator(catalog).generate(verdicts, unclassified, classified), catalog };
}

/** Action items at or above the fail-on threshold; `none` never blocks. */
export function blockingActionItems(report: ComplianceReport, failOn: FailOn): ActionItem[] {
  if (failOn === 'none') return [];
  const threshold = SEVERITY_RANK[failOn];
  return report.actionItems.filter((item) => SEVERITY_RANK[item.severity] >= threshold);
}
