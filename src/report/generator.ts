/**
 * @fileoverview Report Generator
 *
 * Turns a verdict sequence into a ComplianceReport. Every ordering in the
 * report is derived from severity, catalog order and type declaration order,
 * never from the order verdicts arrive in.
 */

import {
  compareDeclarationOrder,
  TYPE_CATEGORIES,
  type DiscoveredType,
} from '../descriptors/types.js';
import type { Verdict } from '../matcher/matcher.js';
import type { RuleCatalog } from '../rules/catalog.js';
import { renderTemplate, SEVERITY_RANK, type Severity } from '../rules/types.js';
import type {
  ActionItem,
  CategoryGroup,
  ComplianceReport,
  CoverageGap,
  OutcomeCounts,
  ReportEntry,
  RuleCoverage,
} from './types.js';

function countOutcomes(verdicts: readonly Verdict[]): OutcomeCounts {
  const counts: OutcomeCounts = { passed: 0, failed: 0, notApplicable: 0 };
  for (const verdict of verdicts) {
    if (verdict.outcome === 'pass') counts.passed++;
    else if (verdict.outcome === 'fail') counts.failed++;
    else counts.notApplicable++;
  }
  return counts;
}

/** Freezes the report and everything it reaches; reports are plain data. */
function freezeDeep<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) freezeDeep(child);
    Object.freeze(value);
  }
  return value;
}

function toEntry(verdict: Verdict): ReportEntry {
  const { rule, type } = verdict;
  const entry: ReportEntry = {
    ruleId: rule.id,
    ruleTitle: rule.title,
    ruleCategory: rule.category,
    severity: rule.severity,
    heuristic: rule.heuristic,
    typeName: type.descriptor.name,
    category: verdict.category,
    outcome: verdict.outcome,
    evidence: [...verdict.evidence],
  };
  if (verdict.note !== undefined) entry.note = verdict.note;
  if (type.descriptor.location !== undefined) entry.location = { ...type.descriptor.location };
  return entry;
}

export class ReportGenerator {
  constructor(private readonly catalog: RuleCatalog) {}

  /**
   * Build the report. Empty input yields zero counts and no action items.
   * `classified` lists types that got a category; a type every rule was
   * disabled for has no verdicts but still counts as classified. The
   * returned report is frozen.
   */
  generate(
    verdicts: readonly Verdict[],
    unclassified: readonly DiscoveredType[] = [],
    classifiedTypes: readonly DiscoveredType[] = [],
  ): ComplianceReport {
    const byTypeThenRule = [...verdicts].sort(
      (a, b) => compareDeclarationOrder(a.type, b.type) || this.compareRules(a, b),
    );
    const failing = byTypeThenRule.filter((verdict) => verdict.outcome === 'fail');
    const counts = countOutcomes(verdicts);
    const classified = new Set([...classifiedTypes, ...verdicts.map((verdict) => verdict.type)]).size;

    const failedBySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
    for (const verdict of failing) {
      failedBySeverity[verdict.rule.severity]++;
    }

    const decided = counts.passed + counts.failed;

    return freezeDeep<ComplianceReport>({
      summary: {
        types: classified + unclassified.length,
        classified,
        unclassified: unclassified.length,
        verdicts: verdicts.length,
        ...counts,
        failedBySeverity,
        complianceRate: decided === 0 ? null : Math.round((counts.passed / decided) * 1000) / 10,
      },
      groups: this.groupByCategory(byTypeThenRule),
      actionItems: this.prioritize(failing),
      coverageGaps: this.coverageGaps(unclassified),
      ruleCoverage: this.ruleCoverage(verdicts),
    });
  }

  private compareRules(a: Verdict, b: Verdict): number {
    return this.catalog.declarationIndex(a.rule.id) - this.catalog.declarationIndex(b.rule.id);
  }

  private groupByCategory(ordered: readonly Verdict[]): CategoryGroup[] {
    const groups: CategoryGroup[] = [];
    for (const category of TYPE_CATEGORIES) {
      const members = ordered.filter((verdict) => verdict.category === category);
      if (members.length === 0) continue;
      groups.push({ category, ...countOutcomes(members), entries: members.map(toEntry) });
    }
    return groups;
  }

  /** Sort key: severity desc, rule declaration order asc, type declaration order asc. */
  private prioritize(failing: readonly Verdict[]): ActionItem[] {
    const ordered = [...failing].sort(
      (a, b) =>
        SEVERITY_RANK[b.rule.severity] - SEVERITY_RANK[a.rule.severity] ||
        this.compareRules(a, b) ||
        compareDeclarationOrder(a.type, b.type),
    );

    return ordered.map((verdict, position) => {
      const { rule, type } = verdict;
      const item: ActionItem = {
        priority: position + 1,
        ruleId: rule.id,
        severity: rule.severity,
        heuristic: rule.heuristic,
        typeName: type.descriptor.name,
        category: verdict.category,
        message: renderTemplate(rule.message, type.descriptor.name),
        fixSuggestion: renderTemplate(rule.fixSuggestion, type.descriptor.name),
        reference: rule.reference,
        evidence: [...verdict.evidence],
      };
      if (type.descriptor.location !== undefined) item.location = { ...type.descriptor.location };
      return item;
    });
  }

  private coverageGaps(unclassified: readonly DiscoveredType[]): CoverageGap[] {
    return [...unclassified].sort(compareDeclarationOrder).map((type) => {
      const gap: CoverageGap = { typeName: type.descriptor.name, reason: 'unknown-category' };
      if (type.descriptor.location !== undefined) gap.location = { ...type.descriptor.location };
      return gap;
    });
  }

  private ruleCoverage(verdicts: readonly Verdict[]): RuleCoverage[] {
    return this.catalog.allRules().map((rule) => {
      const counts = countOutcomes(verdicts.filter((verdict) => verdict.rule.id === rule.id));
      return {
        ruleId: rule.id,
        title: rule.title,
        severity: rule.severity,
        evaluated: counts.passed + counts.failed + counts.notApplicable,
        ...counts,
      };
    });
  }
}
