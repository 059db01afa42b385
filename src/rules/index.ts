/**
 * @fileoverview Rule Catalog
 *
 * - `types`: rule shape, severities and outcome helpers
 * - `builtin`: the built-in tactical pattern rules
 * - `catalog`: validated, immutable rule lookup
 * - `past_tense`: event naming heuristic
 */

export {
  SEVERITIES,
  SEVERITY_RANK,
  isSeverity,
  pass,
  fail,
  notApplicable,
  ruleAppliesTo,
  renderTemplate,
  type Severity,
  type RuleOutcome,
  type RuleContext,
  type RulePredicate,
  type RuleBase,
  type CategoryRule,
  type NamingRule,
  type Rule,
  type RuleCategory,
} from './types.js';

export { BUILTIN_RULES } from './builtin.js';

export {
  RuleCatalog,
  applyRuleSettings,
  createDefaultCatalog,
  type RuleSettings,
} from './catalog.js';

export {
  loadIrregularPastTense,
  splitIdentifier,
  eventBaseName,
  createPastTenseCheck,
} from './past_tense.js';
