import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Project } from 'ts-morph';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runAnalysis } from '../../api/analyze.js';
import { defaultConfig } from '../../config/tactician_config.js';
import { ScanError } from '../../core/errors.js';
import type { TypeDescriptor } from '../../descriptors/types.js';
import { scanSourceFiles, scanWorkspace, unwrapTypeName } from '../ts_scanner.js';

const SOURCES: Record<string, string[]> = {
  '/src/ordering/order.ts': [
    "import { OrderLine } from './order_line';",
    '/** @aggregateRoot */',
    'export class Order {',
    '  private readonly lines: OrderLine[] = [];',
    '  constructor(private readonly id: string) {}',
    '  addLine(line: OrderLine): void {',
    "    if (this.lines.length > 20) throw new Error('too many lines');",
    '    this.lines.push(line);',
    '  }',
    '  equals(other: Order): boolean {',
    '    return this.id === other.id;',
    '  }',
    '}',
  ],
  '/src/ordering/order_line.ts': [
    'export class OrderLine {',
    '  constructor(readonly sku: string, readonly quantity: number) {}',
    '}',
  ],
  '/src/ordering/order_repository.ts': [
    "import { Order } from './order';",
    'export interface OrderRepository {',
    '  findById(id: string): Promise<Order | null>;',
    '  save(order: Order): Promise<void>;',
    '}',
  ],
  '/src/billing/invoice.ts': [
    "import { Order } from '../ordering/order';",
    "import { Money } from '../shared';",
    'export class Invoice {',
    '  constructor(readonly invoiceId: string, readonly order: Order, readonly total: Money) {}',
    '}',
  ],
  '/src/shared/index.ts': ["export { Money } from './money';"],
  '/src/shared/money.ts': [
    'export class Money {',
    '  constructor(readonly amount: number, readonly currency: string) {',
    "    if (amount < 0) throw new RangeError('negative amount');",
    '    Object.freeze(this);',
    '  }',
    '  static of(amount: number, currency: string): Money {',
    '    return new Money(amount, currency);',
    '  }',
    '  equals(other: Money): boolean {',
    '    return this.amount === other.amount && this.currency === other.currency;',
    '  }',
    '}',
  ],
  '/src/identity/user.ts': [
    'export class User {',
    '  #secret = 0;',
    '  protected name: string;',
    '  constructor(readonly id: string, name: string) {',
    '    this.name = name;',
    '  }',
    '  getName(): string {',
    '    return this.name;',
    '  }',
    '  setName(name: string): void {',
    '    this.name = name;',
    '  }',
    '  rename(name: string): void {',
    '    assertNotEmpty(name);',
    '    this.name = name;',
    '  }',
    '}',
    'function assertNotEmpty(value: string): void {',
    "  if (value === '') throw new Error('empty');",
    '}',
  ],
  '/src/persistence/sql_order_repository.ts': [
    "import { Order } from '../ordering/order';",
    'export class SqlOrderRepository implements Repository<Order> {}',
  ],
};

function createProject(): Project {
  const project = new Project({ useInMemoryFileSystem: true });
  for (const [file, lines] of Object.entries(SOURCES)) {
    project.createSourceFile(file, lines.join('\n'));
  }
  return project;
}

function byName(descriptors: TypeDescriptor[], name: string): TypeDescriptor {
  const found = descriptors.find((descriptor) => descriptor.name === name);
  if (!found) throw new Error(`no descriptor for ${name}`);
  return found;
}

describe('scanSourceFiles', () => {
  const descriptors = scanSourceFiles(createProject(), { root: '/' });

  it('describes an aggregate root class', () => {
    expect(byName(descriptors, 'Order')).toEqual({
      name: 'Order',
      declarationKind: 'class',
      fields: [
        { name: 'id', writable: false, visibility: 'private', typeName: 'string' },
        { name: 'lines', writable: false, visibility: 'private', typeName: 'OrderLine[]' },
      ],
      methods: [
        { name: 'constructor', kind: 'constructor', pureAccessor: false, validates: false, mutatesState: false, parameterTypes: ['string'] },
        { name: 'addLine', kind: 'instance', pureAccessor: false, validates: true, mutatesState: true, parameterTypes: ['OrderLine'], returnType: 'void' },
        { name: 'equals', kind: 'instance', pureAccessor: false, validates: false, mutatesState: false, parameterTypes: ['Order'], returnType: 'boolean' },
      ],
      equality: { kind: 'identity', fields: ['id'] },
      capabilities: [],
      externallyReferenced: true,
      location: { file: 'src/ordering/order.ts', line: 3 },
      cluster: 'src/ordering',
      categoryHint: 'aggregate',
    });
  });

  it('orders descriptors by file path, then by position', () => {
    expect(descriptors.map((descriptor) => descriptor.name)).toEqual([
      'Invoice',
      'User',
      'Order',
      'OrderLine',
      'OrderRepository',
      'SqlOrderRepository',
      'Money',
    ]);
  });

  it('marks only types imported from another directory as externally referenced', () => {
    expect(byName(descriptors, 'OrderLine').externallyReferenced).toBe(false);
    expect(byName(descriptors, 'Invoice').externallyReferenced).toBe(false);
  });

  it('resolves imports through barrel files to the declaring file', () => {
    expect(byName(descriptors, 'Money').externallyReferenced).toBe(true);
  });

  it('treats a frozen, validating class with a factory as a value object shape', () => {
    const money = byName(descriptors, 'Money');

    expect(money.fields.map((field) => [field.name, field.writable, field.visibility])).toEqual([
      ['amount', false, 'public'],
      ['currency', false, 'public'],
    ]);
    expect(money.methods.map((method) => [method.name, method.kind, method.validates])).toEqual([
      ['constructor', 'constructor', true],
      ['of', 'factory', false],
      ['equals', 'instance', false],
    ]);
    expect(money.equality).toEqual({ kind: 'attributes', fields: ['amount', 'currency'] });
  });

  it('separates accessors from behavior', () => {
    const user = byName(descriptors, 'User');

    expect(user.fields.map((field) => [field.name, field.writable, field.visibility])).toEqual([
      ['id', false, 'public'],
      ['#secret', true, 'private'],
      ['name', true, 'protected'],
    ]);
    expect(user.methods.map((method) => [method.name, method.pureAccessor, method.validates, method.mutatesState])).toEqual([
      ['constructor', false, false, false],
      ['getName', true, false, false],
      ['setName', true, false, true],
      ['rename', false, true, true],
    ]);
    expect(user.equality).toEqual({ kind: 'none', fields: [] });
  });

  it('infers repository targets from methods and from generic heritage', () => {
    const repository = byName(descriptors, 'OrderRepository');

    expect(repository.declarationKind).toBe('interface');
    expect(repository.repositoryTarget).toBe('Order');
    expect(repository.methods.map((method) => method.returnType)).toEqual(['Promise<Order | null>', 'Promise<void>']);

    const adapter = byName(descriptors, 'SqlOrderRepository');
    expect(adapter.capabilities).toEqual(['Repository']);
    expect(adapter.repositoryTarget).toBe('Order');
  });

  it('keeps same-named directories in different contexts as separate clusters', () => {
    const project = new Project({ useInMemoryFileSystem: true });
    project.createSourceFile('/src/ordering/domain/order.ts', '/** @aggregateRoot */\nexport class Order {\n  constructor(readonly id: string) {}\n}\n');
    project.createSourceFile('/src/billing/domain/invoice.ts', '/** @aggregateRoot */\nexport class Invoice {\n  constructor(readonly id: string) {}\n}\n');
    project.createSourceFile(
      '/src/app/checkout.ts',
      "import { Order } from '../ordering/domain/order';\nimport { Invoice } from '../billing/domain/invoice';\nexport class Checkout {\n  constructor(readonly order: Order, readonly invoice: Invoice) {}\n}\n",
    );

    const scanned = scanSourceFiles(project, { root: '/src' });

    expect(scanned.map((descriptor) => [descriptor.name, descriptor.cluster, descriptor.externallyReferenced])).toEqual([
      ['Checkout', 'app', false],
      ['Invoice', 'billing/domain', true],
      ['Order', 'ordering/domain', true],
    ]);

    const { report } = runAnalysis(scanned);
    expect(report.actionItems.filter((item) => item.ruleId === 'AGG-001')).toEqual([]);
  });

  it('puts files at the scan root in the "." cluster', () => {
    const project = new Project({ useInMemoryFileSystem: true });
    project.createSourceFile('/src/money.ts', 'export class Money {}\n');

    expect(scanSourceFiles(project, { root: '/src' })[0].cluster).toBe('.');
  });

  it('omits clusters with the none strategy and keeps absolute paths without a root', () => {
    const order = byName(scanSourceFiles(createProject(), { clusterStrategy: 'none' }), 'Order');

    expect(order.cluster).toBeUndefined();
    expect(order.location).toEqual({ file: '/src/ordering/order.ts', line: 3 });
  });
});

describe('unwrapTypeName', () => {
  it('unwraps containers and nullable unions', () => {
    expect(unwrapTypeName('Promise<Order | null>')).toBe('Order');
    expect(unwrapTypeName('ReadonlyArray<OrderLine>')).toBe('OrderLine');
    expect(unwrapTypeName('Order[]')).toBe('Order');
    expect(unwrapTypeName('undefined | Customer')).toBe('Customer');
  });

  it('returns undefined for types without a single name', () => {
    expect(unwrapTypeName('Map<string, Order>')).toBeUndefined();
    expect(unwrapTypeName('null')).toBeUndefined();
    expect(unwrapTypeName('{ id: string }')).toBeUndefined();
  });
});

describe('scanWorkspace', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'tactician-scan-'));
    await fs.mkdir(path.join(workspace, 'src', 'identity'), { recursive: true });
    await fs.writeFile(
      path.join(workspace, 'src', 'identity', 'email.ts'),
      'export class Email {\n  constructor(readonly address: string) {}\n}\n',
    );
    await fs.writeFile(
      path.join(workspace, 'src', 'identity', 'email.test.ts'),
      'export class EmailFixture {}\n',
    );
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('scans included files relative to the workspace and skips excluded ones', async () => {
    const descriptors = await scanWorkspace(workspace, defaultConfig());

    expect(descriptors.map((descriptor) => descriptor.name)).toEqual(['Email']);
    expect(descriptors[0].location).toEqual({ file: 'src/identity/email.ts', line: 1 });
    expect(descriptors[0].cluster).toBe('src/identity');
  });

  it('fails with a scan error for a missing root', async () => {
    await expect(scanWorkspace(path.join(workspace, 'absent'), defaultConfig())).rejects.toBeInstanceOf(ScanError);
  });
});
