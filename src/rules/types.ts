/**
 * @fileoverview Rule types for the tactical-pattern catalog
 */

import type { Classification, DiscoveredType, TypeCategory, TypeDescriptor } from '../descriptors/types.js';

// ============================================================================
// SEVERITY
// ============================================================================

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

// ============================================================================
// OUTCOMES
// ============================================================================

export type RuleOutcome =
  | { status: 'pass' }
  | { status: 'fail'; evidence: string[] }
  | { status: 'not-applicable'; note: string };

export const pass = (): RuleOutcome => ({ status: 'pass' });
export const fail = (evidence: string[]): RuleOutcome => ({ status: 'fail', evidence });
export const notApplicable = (note: string): RuleOutcome => ({ status: 'not-applicable', note });

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * Read-only view of the whole run, for rules that look across types
 * (aggregate clusters, repository targets).
 */
export interface RuleContext {
  readonly types: readonly DiscoveredType[];
  classificationOf(type: DiscoveredType): Classification;
  identityFieldsOf(descriptor: TypeDescriptor): string[];
  isPastTense(word: string): boolean;
}

export type RulePredicate = (type: DiscoveredType, context: RuleContext) => RuleOutcome;

// ============================================================================
// RULES
// ============================================================================

export interface RuleBase {
  id: string;
  title: string;
  severity: Severity;
  /** Shown when the rule fails; `{type}` is replaced by the type name */
  message: string;
  fixSuggestion: string;
  reference: string;
  /** May produce false positives */
  heuristic: boolean;
  check: RulePredicate;
}

export interface CategoryRule extends RuleBase {
  category: TypeCategory;
}

export interface NamingRule extends RuleBase {
  category: 'naming';
  appliesTo: readonly TypeCategory[];
}

export type Rule = CategoryRule | NamingRule;

export type RuleCategory = Rule['category'];

export function ruleAppliesTo(rule: Rule, category: TypeCategory): boolean {
  return rule.category === 'naming' ? rule.appliesTo.includes(category) : rule.category === category;
}

export function renderTemplate(template: string, typeName: string): string {
  return template.split('{type}').join(typeName);
}
