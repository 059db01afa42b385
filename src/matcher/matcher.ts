/**
 * @fileoverview Pattern Matcher
 *
 * Classifies discovered types and evaluates the catalog rules of each type's
 * category. Every predicate runs in isolation: a predicate that throws yields a
 * not-applicable verdict for that (rule, type) pair and the run continues.
 *
 * @packageDocumentation
 */

import { isMalformedTypeDescriptorError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import type { Classification, DiscoveredType, TypeCategory, TypeDescriptor } from '../descriptors/types.js';
import type { RuleCatalog } from '../rules/catalog.js';
import { createPastTenseCheck } from '../rules/past_tense.js';
import { ruleAppliesTo, type Rule, type RuleContext } from '../rules/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { classify, type IdentityResolver } from './classifier.js';
import { createIdentityResolver, DEFAULT_IDENTITY_FIELD_NAMES } from './identity.js';

// ============================================================================
// TYPES
// ============================================================================

export type VerdictOutcome = 'pass' | 'fail' | 'not-applicable';

export interface Verdict {
  readonly rule: Rule;
  readonly type: DiscoveredType;
  readonly category: TypeCategory;
  readonly outcome: VerdictOutcome;
  /** Field, method or type names implicated by a failure */
  readonly evidence: readonly string[];
  readonly note?: string;
}

export interface MatcherOptions {
  /** Field names treated as persistent identity in addition to the defaults */
  identityFieldNames?: readonly string[];
  /** Extra words accepted as past tense by the event naming rule */
  irregularPastTense?: readonly string[];
}

export interface MatchResult {
  verdicts: Verdict[];
  /** Types with a category, in discovery order, including those every rule was disabled for */
  classified: DiscoveredType[];
  /** Types no category fits, in discovery order */
  unclassified: DiscoveredType[];
}

// ============================================================================
// MATCHER
// ============================================================================

export class PatternMatcher {
  private readonly identityFieldsOf: IdentityResolver;
  private readonly isPastTense: (word: string) => boolean;

  constructor(
    private readonly catalog: RuleCatalog,
    options: MatcherOptions = {},
  ) {
    this.identityFieldsOf = createIdentityResolver([
      ...DEFAULT_IDENTITY_FIELD_NAMES,
      ...(options.identityFieldNames ?? []),
    ]);
    this.isPastTense = createPastTenseCheck(options.irregularPastTense ?? []);
  }

  classify(descriptor: TypeDescriptor): Classification {
    return classify(descriptor, this.identityFieldsOf);
  }

  /**
   * Build the cross-type view rules read. Classifications are computed once
   * per run.
   */
  createContext(types: readonly DiscoveredType[]): RuleContext {
    const classifications = new Map<DiscoveredType, Classification>();
    for (const type of types) {
      classifications.set(type, this.classify(type.descriptor));
    }
    return {
      types,
      classificationOf: (type) => classifications.get(type) ?? this.classify(type.descriptor),
      identityFieldsOf: this.identityFieldsOf,
      isPastTense: this.isPastTense,
    };
  }

  /** Rules that apply to a category, category rules before naming rules. */
  rulesFor(category: TypeCategory): Rule[] {
    return [
      ...this.catalog.rulesFor(category),
      ...this.catalog.rulesFor('naming').filter((rule) => ruleAppliesTo(rule, category)),
    ];
  }

  /**
   * Evaluate every applicable rule against one type. Unknown types get no
   * verdicts.
   */
  evaluate(type: DiscoveredType, context: RuleContext = this.createContext([type])): Verdict[] {
    const category = context.classificationOf(type);
    if (category === 'unknown') return [];

    return this.rulesFor(category).map((rule) => this.evaluateRule(rule, type, category, context));
  }

  evaluateAll(types: readonly DiscoveredType[]): MatchResult {
    const context = this.createContext(types);
    const verdicts: Verdict[] = [];
    const classified: DiscoveredType[] = [];
    const unclassified: DiscoveredType[] = [];

    for (const type of types) {
      if (context.classificationOf(type) === 'unknown') {
        unclassified.push(type);
        continue;
      }
      classified.push(type);
      verdicts.push(...this.evaluate(type, context));
    }
    return { verdicts, classified, unclassified };
  }

  private evaluateRule(rule: Rule, type: DiscoveredType, category: TypeCategory, context: RuleContext): Verdict {
    const result = safeSync(() => rule.check(type, context));

    if (!result.ok) {
      const { error } = result;
      const log = isMalformedTypeDescriptorError(error) ? logDebug : logWarning;
      log('Rule predicate failed', {
        ruleId: rule.id,
        typeName: type.descriptor.name,
        error: error.message,
      });
      return {
        rule,
        type,
        category,
        outcome: 'not-applicable',
        evidence: [],
        note: `Rule could not be evaluated: ${error.message}`,
      };
    }

    const outcome = result.value;
    switch (outcome.status) {
      case 'pass':
        return { rule, type, category, outcome: 'pass', evidence: [] };
      case 'fail':
        return { rule, type, category, outcome: 'fail', evidence: outcome.evidence };
      case 'not-applicable':
        return { rule, type, category, outcome: 'not-applicable', evidence: [], note: outcome.note };
    }
  }
}
