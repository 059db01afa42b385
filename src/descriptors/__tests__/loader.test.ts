import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { anemicUser, emailValueObject } from '../../__tests__/descriptor_fixtures.js';
import { DescriptorValidationError } from '../../core/errors.js';
import { loadDescriptorFile, parseDescriptors, serializeDescriptors } from '../loader.js';

describe('parseDescriptors', () => {
  it('fills defaults for optional descriptor keys', () => {
    expect(parseDescriptors([{ name: 'Money', fields: [{ name: 'amount', writable: false }] }])).toEqual([
      {
        name: 'Money',
        declarationKind: 'class',
        fields: [{ name: 'amount', writable: false, visibility: 'public' }],
        methods: [],
        equality: { kind: 'none', fields: [] },
        capabilities: [],
      },
    ]);
  });

  it('accepts the versioned envelope', () => {
    const types = parseDescriptors({ version: 1, types: [{ name: 'Order' }] });

    expect(types.map((type) => type.name)).toEqual(['Order']);
  });

  it('reports each issue with its path', () => {
    let thrown: unknown;
    try {
      parseDescriptors([{ name: '' }, { name: 'Email', fields: [{ name: 'address' }] }], 'types.json');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(DescriptorValidationError);
    if (thrown instanceof DescriptorValidationError) {
      expect(thrown.source).toBe('types.json');
      expect(thrown.issues).toEqual([
        '0.name: String must contain at least 1 character(s)',
        '1.fields.0.writable: Required',
      ]);
    }
  });

  it('rejects an unsupported envelope version', () => {
    expect(() => parseDescriptors({ version: 2, types: [] })).toThrow(
      'Invalid type descriptors in <input>: version: Invalid literal value, expected 1',
    );
  });
});

describe('descriptor files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tactician-descriptors-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads back what serializeDescriptors wrote', async () => {
    const file = path.join(dir, 'types.json');
    const types = [emailValueObject(), anemicUser()];
    await fs.writeFile(file, serializeDescriptors(types));

    expect(await loadDescriptorFile(file)).toEqual(types);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json');

    await expect(loadDescriptorFile(file)).rejects.toBeInstanceOf(DescriptorValidationError);
  });

  it('rejects a missing file', async () => {
    const file = path.join(dir, 'absent.json');

    await expect(loadDescriptorFile(file)).rejects.toThrow(`Invalid type descriptors in ${file}: cannot read file:`);
  });
});
