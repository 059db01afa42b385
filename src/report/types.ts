/**
 * @fileoverview Compliance report shape
 *
 * Reports are plain data: no rule predicates, no timestamps. The same
 * verdicts always serialize to the same bytes.
 */

import type { TypeCategory, SourceLocation } from '../descriptors/types.js';
import type { VerdictOutcome } from '../matcher/matcher.js';
import type { RuleCategory, Severity } from '../rules/types.js';

export interface ReportEntry {
  ruleId: string;
  ruleTitle: string;
  ruleCategory: RuleCategory;
  severity: Severity;
  heuristic: boolean;
  typeName: string;
  category: TypeCategory;
  outcome: VerdictOutcome;
  evidence: string[];
  note?: string;
  location?: SourceLocation;
}

export interface OutcomeCounts {
  passed: number;
  failed: number;
  notApplicable: number;
}

export interface CategoryGroup extends OutcomeCounts {
  category: TypeCategory;
  /** Ordered by type declaration order, then rule declaration order */
  entries: ReportEntry[];
}

export interface ActionItem {
  priority: number;
  ruleId: string;
  severity: Severity;
  heuristic: boolean;
  typeName: string;
  category: TypeCategory;
  message: string;
  fixSuggestion: string;
  reference: string;
  evidence: string[];
  location?: SourceLocation;
}

export interface CoverageGap {
  typeName: string;
  reason: 'unknown-category';
  location?: SourceLocation;
}

export interface RuleCoverage extends OutcomeCounts {
  ruleId: string;
  title: string;
  severity: Severity;
  evaluated: number;
}

export interface ReportSummary extends OutcomeCounts {
  types: number;
  classified: number;
  unclassified: number;
  verdicts: number;
  failedBySeverity: Record<Severity, number>;
  /** passed / (passed + failed) as a percentage, null when neither occurred */
  complianceRate: number | null;
}

export interface ComplianceReport {
  summary: ReportSummary;
  groups: CategoryGroup[];
  actionItems: ActionItem[];
  coverageGaps: CoverageGap[];
  ruleCoverage: RuleCoverage[];
}
