/**
 * @fileoverview Rules Command
 *
 * Lists the rule catalog after the workspace's rule settings are applied.
 *
 * Usage:
 *   tactician rules [--category <category>] [--format text|json] [--config <file>]
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../../config/tactician_config.js';
import { TYPE_CATEGORIES } from '../../descriptors/types.js';
import { createDefaultCatalog } from '../../rules/catalog.js';
import type { Rule } from '../../rules/types.js';
import { GLOBAL_OPTIONS, parseCommandArgs } from '../args.js';
import { CliError } from '../errors.js';

export interface RulesCommandOptions {
  workspace: string;
  rawArgs: string[];
}

const RULE_CATEGORIES: readonly string[] = [...TYPE_CATEGORIES, 'naming'];

interface RuleListing {
  id: string;
  title: string;
  category: string;
  appliesTo?: string[];
  severity: string;
  heuristic: boolean;
  reference: string;
}

function toListing(rule: Rule): RuleListing {
  const listing: RuleListing = {
    id: rule.id,
    title: rule.title,
    category: rule.category,
    severity: rule.severity,
    heuristic: rule.heuristic,
    reference: rule.reference,
  };
  if (rule.category === 'naming') listing.appliesTo = [...rule.appliesTo];
  return listing;
}

export function formatRuleLine(rule: Rule): string {
  const heuristic = rule.heuristic ? ' (heuristic)' : '';
  return `${rule.id.padEnd(8)} ${rule.severity.padEnd(8)} ${rule.category.padEnd(14)} ${rule.title}${heuristic}`;
}

export async function rulesCommand(options: RulesCommandOptions): Promise<void> {
  const { workspace, rawArgs } = options;

  const { values } = parseCommandArgs('rules', () =>
    parseArgs({
      args: rawArgs,
      options: {
        ...GLOBAL_OPTIONS,
        category: { type: 'string' },
        config: { type: 'string' },
        format: { type: 'string', default: 'text' },
      },
      allowPositionals: true,
      strict: true,
    }),
  );

  if (values.format !== 'text' && values.format !== 'json') {
    throw new CliError(`Unknown format: ${values.format}`, 'INVALID_ARGUMENT', 'Use one of: text, json');
  }
  if (values.category !== undefined && !RULE_CATEGORIES.includes(values.category)) {
    throw new CliError(
      `Unknown rule category: ${values.category}`,
      'INVALID_ARGUMENT',
      `Use one of: ${RULE_CATEGORIES.join(', ')}`,
    );
  }

  const { config } = await loadConfig(workspace, values.config);
  const catalog = createDefaultCatalog(config.rules);
  const rules = values.category === undefined ? catalog.allRules() : catalog.rulesFor(values.category);

  if (values.format === 'json') {
    console.log(JSON.stringify(rules.map(toListing), null, 2));
    return;
  }

  for (const rule of rules) {
    console.log(formatRuleLine(rule));
  }
}
