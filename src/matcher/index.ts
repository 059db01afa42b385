/**
 * @fileoverview Pattern Matcher
 */

export { classify, type IdentityResolver } from './classifier.js';
export { createIdentityResolver, DEFAULT_IDENTITY_FIELD_NAMES } from './identity.js';
export {
  PatternMatcher,
  type Verdict,
  type VerdictOutcome,
  type MatcherOptions,
  type MatchResult,
} from './matcher.js';
