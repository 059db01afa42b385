import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { anemicUser, emailValueObject, field } from '../../../__tests__/descriptor_fixtures.js';
import { serializeDescriptors } from '../../../descriptors/loader.js';
import type { ComplianceReport } from '../../../report/types.js';
import { analyzeCommand } from '../analyze.js';
import { scanCommand } from '../scan.js';

describe('analyzeCommand', () => {
  let workspace: string;
  let stdoutSpy: MockInstance<Parameters<typeof process.stdout.write>, ReturnType<typeof process.stdout.write>>;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'tactician-analyze-'));
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    await fs.writeFile(
      path.join(workspace, 'types.json'),
      serializeDescriptors([
        { ...emailValueObject(), categoryHint: 'value-object', fields: [field('address', { writable: true })] },
        anemicUser(),
      ]),
    );
  });

  afterEach(async () => {
    stdoutSpy.mockRestore();
    process.exitCode = undefined;
    await fs.rm(workspace, { recursive: true, force: true });
  });

  function written(): string {
    return stdoutSpy.mock.calls.map((call) => String(call[0])).join('');
  }

  it('prints a JSON report and fails on a critical violation', async () => {
    await analyzeCommand({ workspace, rawArgs: ['analyze', '--descriptors', 'types.json', '--format', 'json'] });

    const report: ComplianceReport = JSON.parse(written());
    expect(report.actionItems.map((item) => item.ruleId)).toEqual(['VO-001', 'ENT-002']);
    expect(process.exitCode).toBe(1);
  });

  it('does not fail below the threshold', async () => {
    await analyzeCommand({ workspace, rawArgs: ['analyze', '--descriptors', 'types.json', '--fail-on', 'none'] });

    expect(written().startsWith('=== DDD Compliance Report ===\n')).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it('takes the threshold from the configuration', async () => {
    await fs.writeFile(path.join(workspace, 'tactician.config.yaml'), 'rules:\n  disable: [VO-001]\nfailOn: high\n');

    await analyzeCommand({ workspace, rawArgs: ['analyze', '--descriptors', 'types.json'] });

    expect(process.exitCode).toBeUndefined();
  });

  it('writes the report to a file', async () => {
    await analyzeCommand({
      workspace,
      rawArgs: ['analyze', '--descriptors', 'types.json', '--format', 'markdown', '-o', 'report.md', '--fail-on', 'none'],
    });

    const markdown = await fs.readFile(path.join(workspace, 'report.md'), 'utf-8');
    expect(markdown.startsWith('# DDD Compliance Report\n')).toBe(true);
    expect(written()).toBe('');
  });

  it('rejects an unknown report format', async () => {
    await expect(
      analyzeCommand({ workspace, rawArgs: ['analyze', '--descriptors', 'types.json', '--format', 'html'] }),
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT', message: 'Unknown report format: html' });
  });

  it('rejects an invalid fail-on value', async () => {
    await expect(
      analyzeCommand({ workspace, rawArgs: ['analyze', '--descriptors', 'types.json', '--fail-on', 'severe'] }),
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT', message: 'Invalid --fail-on value: severe' });
  });

  it('analyzes the descriptors produced by scan', async () => {
    await fs.mkdir(path.join(workspace, 'src', 'identity'), { recursive: true });
    await fs.writeFile(
      path.join(workspace, 'src', 'identity', 'email.ts'),
      'export class Email {\n  constructor(public address: string) {}\n}\n',
    );

    await scanCommand({ workspace, rawArgs: ['scan', '--output', 'scanned.json'] });
    await analyzeCommand({
      workspace,
      rawArgs: ['analyze', '--descriptors', 'scanned.json', '--format', 'json', '--fail-on', 'none'],
    });

    const report: ComplianceReport = JSON.parse(written());
    expect(report.summary.types).toBe(1);
    expect(report.coverageGaps.map((gap) => gap.typeName)).toEqual(['Email']);
  });
});
