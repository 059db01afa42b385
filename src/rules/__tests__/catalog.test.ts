import { describe, it, expect } from 'vitest';
import { CatalogLoadError, ConfigurationError } from '../../core/errors.js';
import { BUILTIN_RULES } from '../builtin.js';
import { applyRuleSettings, createDefaultCatalog, RuleCatalog } from '../catalog.js';
import { pass, type CategoryRule, type NamingRule } from '../types.js';

const sampleRule: CategoryRule = {
  id: 'X-001',
  category: 'entity',
  title: 'Sample rule',
  severity: 'low',
  message: '{type} failed',
  fixSuggestion: 'Fix {type}',
  reference: 'n/a',
  heuristic: false,
  check: () => pass(),
};

describe('RuleCatalog.load', () => {
  it('loads a catalog whose ids are unique', () => {
    const catalog = RuleCatalog.load([sampleRule, { ...sampleRule, id: 'X-002' }]);

    expect(catalog.size).toBe(2);
    expect(catalog.allRules().map((rule) => rule.id)).toEqual(['X-001', 'X-002']);
  });

  it('fails with duplicate_id when two rules share an id', () => {
    let thrown: unknown;
    try {
      RuleCatalog.load([sampleRule, { ...sampleRule, title: 'Copy' }]);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(CatalogLoadError);
    if (thrown instanceof CatalogLoadError) {
      expect(thrown.reason).toBe('duplicate_id');
      expect(thrown.ruleIds).toEqual(['X-001']);
      expect(thrown.message).toBe('Rule catalog failed to load (duplicate_id): duplicate rule identifiers: X-001');
    }
  });

  it('rejects empty identifiers', () => {
    expect(() => RuleCatalog.load([{ ...sampleRule, id: '  ' }])).toThrow(
      'Rule catalog failed to load (empty_id): rule "Sample rule" has an empty identifier',
    );
  });

  it('rejects naming rules that target no category', () => {
    const naming: NamingRule = { ...sampleRule, id: 'N-001', category: 'naming', appliesTo: [] };

    expect(() => RuleCatalog.load([naming])).toThrow(CatalogLoadError);
  });

  it('freezes the rule table', () => {
    const catalog = RuleCatalog.load([sampleRule]);

    expect(Object.isFrozen(catalog.allRules())).toBe(true);
    expect(Object.isFrozen(catalog.allRules()[0])).toBe(true);
  });
});

describe('default catalog', () => {
  const catalog = createDefaultCatalog();

  it('contains every built-in rule with unique ids', () => {
    const ids = catalog.allRules().map((rule) => rule.id);

    expect(catalog.size).toBe(BUILTIN_RULES.length);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('returns the rules of a category in declaration order', () => {
    expect(catalog.rulesFor('entity').map((rule) => rule.id)).toEqual(['ENT-001', 'ENT-002', 'ENT-003']);
    expect(catalog.rulesFor('aggregate').map((rule) => rule.id)).toEqual(['AGG-001', 'AGG-002', 'AGG-003', 'AGG-004']);
    expect(catalog.rulesFor('naming').map((rule) => rule.id)).toEqual(['NAM-001', 'NAM-002']);
  });

  it('returns no rules for an unknown category', () => {
    expect(catalog.rulesFor('saga')).toEqual([]);
  });

  it('looks rules up by id', () => {
    expect(catalog.getRule('VO-001')?.severity).toBe('critical');
    expect(catalog.getRule('VO-999')).toBeUndefined();
    expect(catalog.declarationIndex('ENT-001')).toBe(0);
    expect(catalog.declarationIndex('VO-999')).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe('applyRuleSettings', () => {
  it('drops disabled rules and overrides severities', () => {
    const rules = applyRuleSettings(BUILTIN_RULES, {
      disable: ['NAM-001'],
      severity: { 'EVT-001': 'high' },
    });

    expect(rules.map((rule) => rule.id)).not.toContain('NAM-001');
    expect(rules).toHaveLength(BUILTIN_RULES.length - 1);
    expect(rules.find((rule) => rule.id === 'EVT-001')?.severity).toBe('high');
  });

  it('leaves the input rules untouched', () => {
    applyRuleSettings(BUILTIN_RULES, { severity: { 'EVT-001': 'critical' } });

    expect(BUILTIN_RULES.find((rule) => rule.id === 'EVT-001')?.severity).toBe('low');
  });

  it('rejects unknown rule ids', () => {
    let thrown: unknown;
    try {
      applyRuleSettings(BUILTIN_RULES, { disable: ['NOPE-1'] });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (thrown instanceof ConfigurationError) {
      expect(thrown.configKey).toBe('rules.disable');
      expect(thrown.message).toBe('Configuration error for rules.disable: unknown rule id "NOPE-1"');
    }
  });
});
