/**
 * @fileoverview Rule Catalog
 *
 * An explicitly constructed, frozen table of rules. One catalog is built per
 * run and handed to the matcher; nothing reads it through module state.
 */

import { Errors } from '../core/errors.js';
import { BUILTIN_RULES } from './builtin.js';
import { isSeverity, type Rule, type RuleCategory, type Severity } from './types.js';

// ============================================================================
// SETTINGS
// ============================================================================

export interface RuleSettings {
  /** Rule ids to leave out of the catalog */
  disable?: readonly string[];
  /** Severity overrides keyed by rule id */
  severity?: Readonly<Record<string, Severity>>;
}

/**
 * Apply config-level rule settings to a rule list. Unknown rule ids are a
 * configuration error rather than a silent no-op.
 */
export function applyRuleSettings(rules: readonly Rule[], settings: RuleSettings = {}): Rule[] {
  const known = new Set(rules.map((rule) => rule.id));
  const disabled = new Set(settings.disable ?? []);
  const overrides = settings.severity ?? {};

  for (const id of disabled) {
    if (!known.has(id)) {
      throw Errors.config('rules.disable', `unknown rule id "${id}"`);
    }
  }
  for (const [id, severity] of Object.entries(overrides)) {
    if (!known.has(id)) {
      throw Errors.config('rules.severity', `unknown rule id "${id}"`);
    }
    if (!isSeverity(severity)) {
      throw Errors.config('rules.severity', `invalid severity "${String(severity)}" for ${id}`);
    }
  }

  return rules
    .filter((rule) => !disabled.has(rule.id))
    .map((rule) => {
      const severity = overrides[rule.id];
      return severity === undefined ? rule : { ...rule, severity };
    });
}

// ============================================================================
// CATALOG
// ============================================================================

export class RuleCatalog {
  private readonly rules: readonly Rule[];
  private readonly order: ReadonlyMap<string, number>;

  private constructor(rules: readonly Rule[]) {
    this.rules = Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
    this.order = new Map(this.rules.map((rule, index) => [rule.id, index]));
  }

  /**
   * Validate and freeze a rule list. Throws `CatalogLoadError` on duplicate
   * or empty ids and on naming rules that target no category.
   */
  static load(rules: readonly Rule[]): RuleCatalog {
    const seen = new Set<string>();
    const duplicates = new Set<string>();

    for (const rule of rules) {
      if (rule.id.trim().length === 0) {
        throw Errors.catalog('empty_id', [], `rule "${rule.title}" has an empty identifier`);
      }
      if (rule.category === 'naming' && rule.appliesTo.length === 0) {
        throw Errors.catalog('missing_targets', [rule.id], `naming rule ${rule.id} applies to no category`);
      }
      if (seen.has(rule.id)) {
        duplicates.add(rule.id);
      }
      seen.add(rule.id);
    }

    if (duplicates.size > 0) {
      const ids = [...duplicates];
      throw Errors.catalog('duplicate_id', ids, `duplicate rule identifiers: ${ids.join(', ')}`);
    }
    return new RuleCatalog(rules);
  }

  /** Rules of one category in declaration order; unknown categories yield none. */
  rulesFor(category: RuleCategory | (string & {})): readonly Rule[] {
    return this.rules.filter((rule) => rule.category === category);
  }

  allRules(): readonly Rule[] {
    return this.rules;
  }

  getRule(id: string): Rule | undefined {
    const index = this.order.get(id);
    return index === undefined ? undefined : this.rules[index];
  }

  /** Position in the catalog; rules outside it sort last. */
  declarationIndex(ruleId: string): number {
    return this.order.get(ruleId) ?? Number.MAX_SAFE_INTEGER;
  }

  get size(): number {
    return this.rules.length;
  }
}

export function createDefaultCatalog(settings: RuleSettings = {}): RuleCatalog {
  return RuleCatalog.load(applyRuleSettings(BUILTIN_RULES, settings));
}
