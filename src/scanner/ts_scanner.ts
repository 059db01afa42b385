/**
 * @fileoverview Source scanner
 *
 * Builds TypeDescriptors from TypeScript sources with ts-morph. The scanner
 * records structure only (fields, method shapes, equality members, heritage,
 * imports across directories); all judgement is left to the rules.
 *
 * Clusters follow the directory layout: with the `directory` strategy every
 * type belongs to the cluster identified by its directory path relative to
 * the scan root, and a type is externally referenced when a file in another
 * directory imports it.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import {
  Node,
  Project,
  Scope,
  SyntaxKind,
  type ClassDeclaration,
  type ExpressionWithTypeArguments,
  type InterfaceDeclaration,
  type MethodDeclaration,
  type ParameterDeclaration,
  type SourceFile,
} from 'ts-morph';
import type { TacticianConfig } from '../config/tactician_config.js';
import { Errors } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import type {
  EqualityDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  TypeCategory,
  TypeDescriptor,
  Visibility,
} from '../descriptors/types.js';
import type { IdentityResolver } from '../matcher/classifier.js';
import { createIdentityResolver, DEFAULT_IDENTITY_FIELD_NAMES } from '../matcher/identity.js';
import { logDebug, logWarning } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type ClusterStrategy = 'directory' | 'none';

export interface ScanOptions {
  /** Locations are reported relative to this directory */
  root?: string;
  clusterStrategy?: ClusterStrategy;
  identityFieldNames?: readonly string[];
}

interface ScanContext {
  root: string | undefined;
  clusterStrategy: ClusterStrategy;
  identityFieldsOf: IdentityResolver;
  referenced: ReadonlySet<string>;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const CATEGORY_TAGS: Record<string, TypeCategory> = {
  aggregateroot: 'aggregate',
  aggregate: 'aggregate',
  entity: 'entity',
  valueobject: 'value-object',
  domainevent: 'domain-event',
  domainservice: 'domain-service',
  repository: 'repository',
};

const EQUALITY_METHODS = new Set(['equals', 'isEqual', 'isEqualTo', 'sameAs', 'sameIdentityAs', 'sameValueAs']);

const GUARD_CALL = /^(assert|ensure|guard|validate|check|invariant)/i;

const MUTATING_CALLS = new Set(['push', 'pop', 'shift', 'unshift', 'splice', 'set', 'delete', 'clear', 'add']);

const SAVE_METHODS = new Set(['save', 'add', 'store', 'put']);

const FINDER_METHOD = /^(find|get|load)/;

const TYPE_WRAPPER = /^(Promise|Array|ReadonlyArray|Readonly|Set|ReadonlySet)<(.+)>$/;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

// ============================================================================
// HELPERS
// ============================================================================

function typeKey(filePath: string, name: string): string {
  return `${filePath}#${name}`;
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function visibilityOf(scope: Scope | undefined, name: string): Visibility {
  if (name.startsWith('#')) return 'private';
  switch (scope) {
    case Scope.Private:
      return 'private';
    case Scope.Protected:
      return 'protected';
    default:
      return 'public';
  }
}

/** Strip generic arguments: `Repository<Order>` -> `Repository`. */
function stripTypeArguments(text: string): string {
  const open = text.indexOf('<');
  return (open === -1 ? text : text.slice(0, open)).trim();
}

/**
 * Reduce a written type to the domain type it carries:
 * `Promise<Order | null>` -> `Order`, `Order[]` -> `Order`.
 */
export function unwrapTypeName(text: string): string | undefined {
  let current = text.trim();
  for (;;) {
    const wrapped = TYPE_WRAPPER.exec(current);
    if (!wrapped) break;
    current = wrapped[2].trim();
  }
  const member = current
    .split('|')
    .map((part) => part.trim())
    .find((part) => part !== 'null' && part !== 'undefined');
  if (member === undefined) return undefined;
  const bare = member.endsWith('[]') ? member.slice(0, -2) : member;
  return IDENTIFIER.test(bare) ? bare : undefined;
}

function isThisMember(node: Node): boolean {
  if (!Node.isPropertyAccessExpression(node) && !Node.isElementAccessExpression(node)) return false;
  let current: Node = node;
  while (Node.isPropertyAccessExpression(current) || Node.isElementAccessExpression(current)) {
    current = current.getExpression();
  }
  return current.getKind() === SyntaxKind.ThisKeyword;
}

function isAssignmentOperator(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.FirstAssignment && kind <= SyntaxKind.LastAssignment;
}

function calleeName(node: Node): string | undefined {
  if (Node.isPropertyAccessExpression(node)) return node.getName();
  if (Node.isIdentifier(node)) return node.getText();
  return undefined;
}

function parameterTypes(parameters: ParameterDeclaration[]): string[] {
  return parameters.map((parameter) => parameter.getTypeNode()?.getText() ?? 'unknown');
}

// ============================================================================
// BODY ANALYSIS
// ============================================================================

/** A body that only returns a field, or only assigns a parameter to one. */
function isPureAccessor(body: Node | undefined): boolean {
  if (!body || !Node.isBlock(body)) return false;
  const statements = body.getStatements();
  if (statements.length === 0) return true;
  if (statements.length !== 1) return false;

  const [statement] = statements;
  if (Node.isReturnStatement(statement)) {
    const returned = statement.getExpression();
    return returned !== undefined && isThisMember(returned);
  }
  if (Node.isExpressionStatement(statement)) {
    const expression = statement.getExpression();
    return (
      Node.isBinaryExpression(expression) &&
      expression.getOperatorToken().getKind() === SyntaxKind.EqualsToken &&
      isThisMember(expression.getLeft()) &&
      Node.isIdentifier(expression.getRight())
    );
  }
  return false;
}

function validatesInput(body: Node | undefined): boolean {
  if (!body) return false;
  if (body.getDescendantsOfKind(SyntaxKind.ThrowStatement).length > 0) return true;
  return body.getDescendantsOfKind(SyntaxKind.CallExpression).some((call) => {
    const name = calleeName(call.getExpression());
    return name !== undefined && GUARD_CALL.test(name);
  });
}

function mutatesState(body: Node | undefined): boolean {
  if (!body) return false;

  const assigns = body
    .getDescendantsOfKind(SyntaxKind.BinaryExpression)
    .some((binary) => isAssignmentOperator(binary.getOperatorToken().getKind()) && isThisMember(binary.getLeft()));
  if (assigns) return true;

  const increments = [
    ...body.getDescendantsOfKind(SyntaxKind.PrefixUnaryExpression),
    ...body.getDescendantsOfKind(SyntaxKind.PostfixUnaryExpression),
  ].some((unary) => {
    const operator = unary.getOperatorToken();
    return (operator === SyntaxKind.PlusPlusToken || operator === SyntaxKind.MinusMinusToken) && isThisMember(unary.getOperand());
  });
  if (increments) return true;

  return body.getDescendantsOfKind(SyntaxKind.CallExpression).some((call) => {
    const callee = call.getExpression();
    return Node.isPropertyAccessExpression(callee) && MUTATING_CALLS.has(callee.getName()) && isThisMember(callee.getExpression());
  });
}

function freezesInstance(body: Node | undefined): boolean {
  if (!body) return false;
  return body.getDescendantsOfKind(SyntaxKind.CallExpression).some((call) => {
    const [first] = call.getArguments();
    return call.getExpression().getText() === 'Object.freeze' && first?.getKind() === SyntaxKind.ThisKeyword;
  });
}

function constructsOwnType(body: Node | undefined, typeName: string): boolean {
  if (!body) return false;
  return body
    .getDescendantsOfKind(SyntaxKind.NewExpression)
    .some((expression) => {
      const constructed = expression.getExpression().getText();
      return constructed === typeName || constructed === 'this';
    });
}

// ============================================================================
// DESCRIPTOR PIECES
// ============================================================================

function categoryHintOf(node: ClassDeclaration | InterfaceDeclaration): TypeCategory | undefined {
  for (const doc of node.getJsDocs()) {
    for (const tag of doc.getTags()) {
      const hint = CATEGORY_TAGS[tag.getTagName().toLowerCase()];
      if (hint) return hint;
    }
  }
  return undefined;
}

function classFields(cls: ClassDeclaration): FieldDescriptor[] {
  const frozen = cls.getConstructors().some((ctor) => freezesInstance(ctor.getBody()));
  const fields: FieldDescriptor[] = [];

  for (const ctor of cls.getConstructors()) {
    for (const parameter of ctor.getParameters()) {
      if (!parameter.isParameterProperty()) continue;
      const field: FieldDescriptor = {
        name: parameter.getName(),
        writable: !frozen && !parameter.isReadonly(),
        visibility: visibilityOf(parameter.getScope(), parameter.getName()),
      };
      const typeNode = parameter.getTypeNode();
      if (typeNode) field.typeName = typeNode.getText();
      fields.push(field);
    }
  }

  for (const property of cls.getProperties()) {
    if (property.isStatic()) continue;
    const field: FieldDescriptor = {
      name: property.getName(),
      writable: !frozen && !property.isReadonly(),
      visibility: visibilityOf(property.getScope(), property.getName()),
    };
    const typeNode = property.getTypeNode();
    if (typeNode) field.typeName = typeNode.getText();
    fields.push(field);
  }

  return fields;
}

function describeMethod(method: MethodDeclaration, typeName: string): MethodDescriptor {
  const body = method.getBody();
  const returnTypeNode = method.getReturnTypeNode();
  const returnType = returnTypeNode?.getText();

  let kind: MethodDescriptor['kind'] = 'instance';
  if (method.isStatic()) {
    const returnsOwnType = returnType !== undefined && unwrapTypeName(returnType) === typeName;
    kind = returnsOwnType || constructsOwnType(body, typeName) ? 'factory' : 'static';
  }

  const descriptor: MethodDescriptor = {
    name: method.getName(),
    kind,
    pureAccessor: isPureAccessor(body),
    validates: validatesInput(body),
    mutatesState: mutatesState(body),
    parameterTypes: parameterTypes(method.getParameters()),
  };
  if (returnType !== undefined) descriptor.returnType = returnType;
  return descriptor;
}

function classMethods(cls: ClassDeclaration, typeName: string): MethodDescriptor[] {
  const methods: MethodDescriptor[] = [];

  for (const ctor of cls.getConstructors()) {
    const body = ctor.getBody();
    methods.push({
      name: 'constructor',
      kind: 'constructor',
      pureAccessor: false,
      validates: validatesInput(body),
      mutatesState: false,
      parameterTypes: parameterTypes(ctor.getParameters()),
    });
  }

  for (const getter of cls.getGetAccessors()) {
    if (getter.isStatic()) continue;
    const body = getter.getBody();
    const descriptor: MethodDescriptor = {
      name: getter.getName(),
      kind: 'getter',
      pureAccessor: isPureAccessor(body),
      validates: false,
      mutatesState: mutatesState(body),
    };
    const returnType = getter.getReturnTypeNode()?.getText();
    if (returnType !== undefined) descriptor.returnType = returnType;
    methods.push(descriptor);
  }

  for (const setter of cls.getSetAccessors()) {
    if (setter.isStatic()) continue;
    const body = setter.getBody();
    methods.push({
      name: setter.getName(),
      kind: 'setter',
      pureAccessor: isPureAccessor(body),
      validates: validatesInput(body),
      mutatesState: mutatesState(body),
      parameterTypes: parameterTypes(setter.getParameters()),
    });
  }

  for (const method of cls.getMethods()) {
    methods.push(describeMethod(method, typeName));
  }

  return methods;
}

/**
 * Read the members an equality method compares. Names reached through a
 * getter map back to `_name` / `#name` backing fields.
 */
function classEquality(
  cls: ClassDeclaration,
  descriptor: TypeDescriptor,
  identityFieldsOf: IdentityResolver,
): EqualityDescriptor {
  const method = cls.getMethods().find((candidate) => !candidate.isStatic() && EQUALITY_METHODS.has(candidate.getName()));
  const body = method?.getBody();
  if (!method || !body) return { kind: 'none', fields: [] };

  const receivers = new Set(method.getParameters().map((parameter) => parameter.getName()));
  const touched = new Set<string>();
  for (const access of body.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)) {
    const target = access.getExpression();
    const onThis = target.getKind() === SyntaxKind.ThisKeyword;
    const onOther = Node.isIdentifier(target) && receivers.has(target.getText());
    if (!onThis && !onOther) continue;

    const name = access.getName();
    const field = descriptor.fields.find(
      (candidate) => candidate.name === name || candidate.name === `_${name}` || candidate.name === `#${name}`,
    );
    if (field) touched.add(field.name);
  }

  const compared = descriptor.fields.filter((field) => touched.has(field.name)).map((field) => field.name);
  if (compared.length === 0) {
    return { kind: 'attributes', fields: descriptor.fields.map((field) => field.name) };
  }

  const identity = new Set(identityFieldsOf(descriptor));
  return {
    kind: compared.every((name) => identity.has(name)) ? 'identity' : 'attributes',
    fields: compared,
  };
}

function heritageNames(clauses: readonly ExpressionWithTypeArguments[]): string[] {
  return clauses.map((clause) => stripTypeArguments(clause.getExpression().getText()));
}

function genericRepositoryTarget(clauses: readonly ExpressionWithTypeArguments[]): string | undefined {
  for (const clause of clauses) {
    if (!stripTypeArguments(clause.getExpression().getText()).endsWith('Repository')) continue;
    const [argument] = clause.getTypeArguments();
    if (argument) {
      const target = unwrapTypeName(argument.getText());
      if (target) return target;
    }
  }
  return undefined;
}

interface MethodShape {
  name: string;
  parameterTypes?: string[];
  returnType?: string;
}

function repositoryTargetFromMethods(methods: readonly MethodShape[]): string | undefined {
  for (const method of methods) {
    const [first] = method.parameterTypes ?? [];
    if (SAVE_METHODS.has(method.name) && first !== undefined) {
      const target = unwrapTypeName(first);
      if (target) return target;
    }
  }
  for (const method of methods) {
    if (FINDER_METHOD.test(method.name) && method.returnType !== undefined) {
      const target = unwrapTypeName(method.returnType);
      if (target) return target;
    }
  }
  return undefined;
}

// ============================================================================
// DECLARATIONS
// ============================================================================

/** Directory of the file relative to the scan root: `ordering/domain`, or `.` at the root. */
function clusterOf(filePath: string, root: string | undefined): string {
  const directory = path.posix.dirname(filePath);
  if (root === undefined) return directory;
  return path.posix.relative(root, directory) || '.';
}

function baseDescriptor(
  name: string,
  node: ClassDeclaration | InterfaceDeclaration,
  context: ScanContext,
): Pick<TypeDescriptor, 'cluster' | 'externallyReferenced' | 'location' | 'categoryHint'> {
  const filePath = node.getSourceFile().getFilePath();
  const base: Pick<TypeDescriptor, 'cluster' | 'externallyReferenced' | 'location' | 'categoryHint'> = {
    externallyReferenced: context.referenced.has(typeKey(filePath, name)),
    location: {
      file: context.root === undefined ? filePath : path.posix.relative(context.root, filePath),
      line: node.getStartLineNumber(),
    },
  };
  if (context.clusterStrategy === 'directory') {
    base.cluster = clusterOf(filePath, context.root);
  }
  const hint = categoryHintOf(node);
  if (hint) base.categoryHint = hint;
  return base;
}

function describeClass(cls: ClassDeclaration, context: ScanContext): TypeDescriptor | undefined {
  const name = cls.getName();
  if (!name) return undefined;

  const extendsClause = cls.getExtends();
  const heritage = [...(extendsClause ? [extendsClause] : []), ...cls.getImplements()];
  const methods = classMethods(cls, name);

  const descriptor: TypeDescriptor = {
    name,
    declarationKind: cls.isAbstract() ? 'abstract-class' : 'class',
    fields: classFields(cls),
    methods,
    equality: { kind: 'none', fields: [] },
    capabilities: [...heritageNames(heritage), ...cls.getDecorators().map((decorator) => decorator.getName())],
    ...baseDescriptor(name, cls, context),
  };
  descriptor.equality = classEquality(cls, descriptor, context.identityFieldsOf);

  if (name.endsWith('Repository') || descriptor.capabilities.some((capability) => capability.endsWith('Repository'))) {
    const target = genericRepositoryTarget(heritage) ?? repositoryTargetFromMethods(methods);
    if (target) descriptor.repositoryTarget = target;
  }
  return descriptor;
}

function describeInterface(iface: InterfaceDeclaration, context: ScanContext): TypeDescriptor {
  const name = iface.getName();
  const heritage = iface.getExtends();

  const fields: FieldDescriptor[] = iface.getProperties().map((property) => {
    const field: FieldDescriptor = {
      name: property.getName(),
      writable: !property.isReadonly(),
      visibility: 'public',
    };
    const typeNode = property.getTypeNode();
    if (typeNode) field.typeName = typeNode.getText();
    return field;
  });

  const methods: MethodDescriptor[] = iface.getMethods().map((method) => {
    const descriptor: MethodDescriptor = {
      name: method.getName(),
      kind: 'instance',
      pureAccessor: false,
      validates: false,
      mutatesState: false,
      parameterTypes: parameterTypes(method.getParameters()),
    };
    const returnType = method.getReturnTypeNode()?.getText();
    if (returnType !== undefined) descriptor.returnType = returnType;
    return descriptor;
  });

  const descriptor: TypeDescriptor = {
    name,
    declarationKind: 'interface',
    fields,
    methods,
    equality: { kind: 'none', fields: [] },
    capabilities: heritageNames(heritage),
    ...baseDescriptor(name, iface, context),
  };

  if (name.endsWith('Repository') || descriptor.capabilities.some((capability) => capability.endsWith('Repository'))) {
    const target = genericRepositoryTarget(heritage) ?? repositoryTargetFromMethods(methods);
    if (target) descriptor.repositoryTarget = target;
  }
  return descriptor;
}

// ============================================================================
// CROSS-FILE REFERENCES
// ============================================================================

/**
 * Keys of every class or interface imported from a file in a different
 * directory. Re-exports through barrels resolve to the declaring file.
 */
function collectExternalReferences(files: readonly SourceFile[]): Set<string> {
  const referenced = new Set<string>();

  for (const file of files) {
    const importerDir = path.posix.dirname(file.getFilePath());

    for (const declaration of file.getImportDeclarations()) {
      const target = declaration.getModuleSpecifierSourceFile();
      if (!target) continue;

      const exported = target.getExportedDeclarations();
      const names = declaration.getNamespaceImport()
        ? [...exported.keys()]
        : declaration.getNamedImports().map((specifier) => specifier.getName());
      if (declaration.getDefaultImport()) names.push('default');

      for (const name of names) {
        for (const node of exported.get(name) ?? []) {
          if (!Node.isClassDeclaration(node) && !Node.isInterfaceDeclaration(node)) continue;
          const declaredName = node.getName();
          const declaredIn = node.getSourceFile().getFilePath();
          if (declaredName && path.posix.dirname(declaredIn) !== importerDir) {
            referenced.add(typeKey(declaredIn, declaredName));
          }
        }
      }
    }
  }
  return referenced;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

export function createScanProject(): Project {
  return new Project({
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: true,
    compilerOptions: {
      allowJs: false,
      noEmit: true,
      skipLibCheck: true,
    },
  });
}

/**
 * Describe every named class and interface in the project, ordered by file
 * path and then by position in the file.
 */
export function scanSourceFiles(project: Project, options: ScanOptions = {}): TypeDescriptor[] {
  const files = [...project.getSourceFiles()].sort((a, b) =>
    a.getFilePath() < b.getFilePath() ? -1 : a.getFilePath() > b.getFilePath() ? 1 : 0,
  );

  const context: ScanContext = {
    root: options.root === undefined ? undefined : toPosix(options.root),
    clusterStrategy: options.clusterStrategy ?? 'directory',
    identityFieldsOf: createIdentityResolver([...DEFAULT_IDENTITY_FIELD_NAMES, ...(options.identityFieldNames ?? [])]),
    referenced: collectExternalReferences(files),
  };

  const descriptors: TypeDescriptor[] = [];
  for (const file of files) {
    const declarations: Array<ClassDeclaration | InterfaceDeclaration> = [...file.getClasses(), ...file.getInterfaces()];
    declarations.sort((a, b) => a.getStart() - b.getStart());

    for (const declaration of declarations) {
      const descriptor = Node.isClassDeclaration(declaration)
        ? describeClass(declaration, context)
        : describeInterface(declaration, context);
      if (descriptor) descriptors.push(descriptor);
    }
  }
  return descriptors;
}

/**
 * Discover sources with the configured include/exclude globs and scan them.
 * Files ts-morph cannot read are logged and skipped.
 */
export async function scanWorkspace(root: string, config: TacticianConfig): Promise<TypeDescriptor[]> {
  const workspace = path.resolve(root);

  try {
    const stats = await fs.stat(workspace);
    if (!stats.isDirectory()) throw new Error('not a directory');
  } catch (e) {
    const cause = e instanceof Error ? e : new Error(String(e));
    throw Errors.scan(workspace, cause.message, cause);
  }

  let files: string[];
  try {
    files = await glob(config.include, {
      cwd: workspace,
      ignore: config.exclude,
      nodir: true,
      absolute: true,
    });
  } catch (e) {
    const cause = e instanceof Error ? e : new Error(String(e));
    throw Errors.scan(workspace, `file discovery failed: ${cause.message}`, cause);
  }
  files.sort();
  logDebug('Discovered source files', { root: workspace, count: files.length });

  const project = createScanProject();
  for (const file of files) {
    const added = safeSync(() => project.addSourceFileAtPath(file));
    if (!added.ok) {
      logWarning('Skipping unreadable source file', { file, error: added.error.message });
    }
  }

  return scanSourceFiles(project, {
    root: workspace,
    clusterStrategy: config.clusterStrategy,
    identityFieldNames: config.identityFieldNames,
  });
}
