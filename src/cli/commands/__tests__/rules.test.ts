import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { CliError } from '../../errors.js';
import { formatRuleLine, rulesCommand } from '../rules.js';

describe('rulesCommand', () => {
  let workspace: string;
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, ReturnType<typeof console.log>>;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'tactician-rules-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await fs.rm(workspace, { recursive: true, force: true });
  });

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  it('lists the rules of one category as aligned text', async () => {
    await rulesCommand({ workspace, rawArgs: ['rules', '--category', 'entity'] });

    expect(printed()).toEqual([
      'ENT-001  high     entity         Identity-based equality',
      'ENT-002  medium   entity         Entity carries behavior',
      'ENT-003  high     entity         Immutable identity',
    ]);
  });

  it('lists naming rules with the categories they apply to as JSON', async () => {
    await rulesCommand({ workspace, rawArgs: ['rules', '--category', 'naming', '--format', 'json'] });

    const listings: unknown = JSON.parse(printed()[0]);
    expect(listings).toEqual([
      expect.objectContaining({
        id: 'NAM-001',
        category: 'naming',
        appliesTo: ['entity', 'value-object', 'aggregate', 'domain-service'],
        heuristic: true,
      }),
      expect.objectContaining({ id: 'NAM-002', appliesTo: ['repository'] }),
    ]);
  });

  it('reflects the workspace rule settings', async () => {
    await fs.writeFile(
      path.join(workspace, 'tactician.config.yaml'),
      'rules:\n  disable: [ENT-001]\n  severity:\n    ENT-003: low\n',
    );

    await rulesCommand({ workspace, rawArgs: ['rules', '--category', 'entity'] });

    expect(printed()).toEqual([
      'ENT-002  medium   entity         Entity carries behavior',
      'ENT-003  low      entity         Immutable identity',
    ]);
  });

  it('rejects an unknown category', async () => {
    await expect(rulesCommand({ workspace, rawArgs: ['rules', '--category', 'saga'] })).rejects.toBeInstanceOf(CliError);
  });

  it('rejects unknown flags with a usage hint', async () => {
    const failure = rulesCommand({ workspace, rawArgs: ['rules', '--colour'] });

    await expect(failure).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      suggestion: 'Run `tactician help rules` for usage information.',
    });
  });
});

describe('formatRuleLine', () => {
  it('marks heuristic rules', () => {
    expect(
      formatRuleLine({
        id: 'EVT-001',
        category: 'domain-event',
        title: 'Past-tense event names',
        severity: 'low',
        message: '',
        fixSuggestion: '',
        reference: '',
        heuristic: true,
        check: () => ({ status: 'pass' }),
      }),
    ).toBe('EVT-001  low      domain-event   Past-tense event names (heuristic)');
  });
});
