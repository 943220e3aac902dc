/**
 * Role Composer
 *
 * Merges the method and attribute namespaces of an implementation and its
 * roles. Layering is implementation first, then roles in declaration order.
 * A name contributed by two sources is a conflict: there is no implicit
 * override and no "last wins".
 */

import { CompositionError, SpecError } from './errors.js';
import type { Registry } from './registry.js';
import {
  AttributeDescriptor,
  Handles,
  MethodBody,
  ResolvedParam,
  SourceDefinition,
  SourceRef,
  Specification,
} from './types.js';

// ============================================
// Core Types
// ============================================

export interface ResolvedSource {
  label: string;
  role: boolean;
  definition: SourceDefinition;
}

export interface Contribution<T> {
  value: T;
  source: string;
}

export interface Composition {
  sources: ResolvedSource[];
  methods: Map<string, Contribution<MethodBody>>;
  attributes: Map<string, Contribution<AttributeDescriptor>>;
  semiprivate: Map<string, string>; // selector → declaring source
}

export interface ForwardedSelector {
  local: string;
  remote: string;
}

// ============================================
// Accessor and Forwarding Names
// ============================================

export function readerName(attribute: string, reader: boolean | string | undefined): string | undefined {
  if (reader === true) return attribute;
  return typeof reader === 'string' ? reader : undefined;
}

export function writerName(attribute: string, writer: boolean | string | undefined): string | undefined {
  if (writer === true) return `change_${attribute}`;
  return typeof writer === 'string' ? writer : undefined;
}

/**
 * Selectors a role exposes to the outside: its methods minus semiprivate ones
 */
export function roleSelectors(role: SourceDefinition): string[] {
  const hidden = new Set(role.semiprivate ?? []);
  return Object.keys(role.methods ?? {}).filter(
    (selector) => !hidden.has(selector) && selector !== 'BUILD'
  );
}

/**
 * Expand a `handles` declaration into local → remote selector pairs
 *
 * @example
 * expandHandles('items', ['has'], registry)          // [{ local: 'has', remote: 'has' }]
 * expandHandles('items', { contains: 'has' }, registry) // [{ local: 'contains', remote: 'has' }]
 * expandHandles('items', 'Membership', registry)     // one pair per public selector of the role
 */
export function expandHandles(
  attribute: string,
  handles: Handles,
  registry: Registry,
  className?: string
): ForwardedSelector[] {
  if (Array.isArray(handles)) {
    return handles.map((selector) => ({ local: selector, remote: selector }));
  }

  if (typeof handles === 'string') {
    const role = registry.getSource(handles);

    if (!role) {
      throw new SpecError(
        `Unknown role '${handles}' in handles of attribute '${attribute}'`,
        'Register the role with defineRole() before minionize()',
        className
      );
    }
    if (!role.role) {
      throw new SpecError(
        `Source '${handles}' in handles of attribute '${attribute}' is not a role`,
        undefined,
        className
      );
    }

    const selectors = roleSelectors(role);
    if (selectors.length === 0) {
      throw new SpecError(
        `Role '${handles}' declares no public selectors to forward for attribute '${attribute}'`,
        undefined,
        className
      );
    }
    return selectors.map((selector) => ({ local: selector, remote: selector }));
  }

  return Object.entries(handles).map(([local, remote]) => ({ local, remote }));
}

/**
 * Every selector an attribute contributes: reader, writer, forwarded
 */
export function attributeSelectors(
  attribute: string,
  descriptor: AttributeDescriptor,
  registry: Registry,
  className?: string
): string[] {
  const selectors: string[] = [];

  const reader = readerName(attribute, descriptor.reader);
  if (reader) selectors.push(reader);

  const writer = writerName(attribute, descriptor.writer);
  if (writer) selectors.push(writer);

  if (descriptor.handles !== undefined) {
    for (const { local } of expandHandles(attribute, descriptor.handles, registry, className)) {
      selectors.push(local);
    }
  }

  return selectors;
}

// ============================================
// Source Resolution
// ============================================

function resolveSource(
  ref: SourceRef,
  kind: 'implementation' | 'role',
  index: number,
  registry: Registry,
  className?: string
): ResolvedSource {
  let definition: SourceDefinition;
  let label: string;

  if (typeof ref === 'string') {
    const found = registry.getSource(ref);
    if (!found) {
      throw new SpecError(
        `Unknown ${kind} '${ref}'`,
        'Register it with defineImplementation() or defineRole() before minionize()',
        className
      );
    }
    definition = found;
    label = found.name ?? ref;
  } else {
    definition = ref;
    label = ref.name ?? (kind === 'implementation' ? 'implementation' : `role #${index + 1}`);
  }

  const isRole = definition.role === true;

  if (kind === 'implementation' && isRole) {
    throw new SpecError(
      `'${label}' is a role and cannot be used as the implementation`,
      'List it under roles instead',
      className
    );
  }
  if (kind === 'role' && !isRole) {
    throw new SpecError(
      `'${label}' is not a role`,
      'Mark role sources with role: true, or use defineRole()',
      className
    );
  }

  return { label, role: isRole, definition };
}

export function resolveSources(
  spec: Specification,
  registry: Registry,
  className?: string
): ResolvedSource[] {
  const sources: ResolvedSource[] = [];

  if (spec.implementation !== undefined) {
    sources.push(resolveSource(spec.implementation, 'implementation', 0, registry, className));
  }

  (spec.roles ?? []).forEach((ref, idx) => {
    sources.push(resolveSource(ref, 'role', idx, registry, className));
  });

  const labels = new Set<string>();
  for (const source of sources) {
    if (labels.has(source.label)) {
      throw new CompositionError(
        `Source '${source.label}' is composed more than once`,
        undefined,
        className
      );
    }
    labels.add(source.label);
  }

  return sources;
}

// ============================================
// Namespace Merge
// ============================================

function mergeInto<T>(
  target: Map<string, Contribution<T>>,
  entries: Record<string, T> | undefined,
  source: string,
  what: 'Method' | 'Attribute',
  className?: string
): void {
  if (!entries) return;

  for (const [name, value] of Object.entries(entries)) {
    const existing = target.get(name);
    if (existing) {
      throw new CompositionError(
        `${what} '${name}' is provided by both '${existing.source}' and '${source}'`,
        'Rename one of them, or remove it from one source',
        className
      );
    }
    target.set(name, { value, source });
  }
}

function declareSemiprivate(
  semiprivate: Map<string, string>,
  selector: string,
  source: string,
  className?: string
): void {
  const existing = semiprivate.get(selector);
  if (existing !== undefined && existing !== source) {
    throw new CompositionError(
      `Selector '${selector}' is declared semiprivate by both '${existing}' and '${source}'`,
      'Declare it semiprivate in the source that provides it',
      className
    );
  }
  semiprivate.set(selector, source);
}

/**
 * Compose an implementation and its roles into one flat namespace
 *
 * @param params - class-level constructor parameters (those with `attribute` satisfy role attribute requirements)
 * @throws CompositionError on name conflicts and unmet role requirements
 */
export function composeRoles(
  spec: Specification,
  registry: Registry,
  params: readonly ResolvedParam[],
  className?: string
): Composition {
  const sources = resolveSources(spec, registry, className);
  const methods = new Map<string, Contribution<MethodBody>>();
  const attributes = new Map<string, Contribution<AttributeDescriptor>>();
  const semiprivate = new Map<string, string>();

  for (const source of sources) {
    const { definition, label } = source;

    mergeInto(methods, definition.methods, label, 'Method', className);
    mergeInto(attributes, definition.has, label, 'Attribute', className);

    for (const selector of definition.semiprivate ?? []) {
      declareSemiprivate(semiprivate, selector, label, className);
    }
    // BUILD is always semiprivate
    if (definition.methods && 'BUILD' in definition.methods) {
      declareSemiprivate(semiprivate, 'BUILD', label, className);
    }
  }

  const composition: Composition = { sources, methods, attributes, semiprivate };
  checkRequirements(composition, registry, params, className);
  return composition;
}

function checkRequirements(
  composition: Composition,
  registry: Registry,
  params: readonly ResolvedParam[],
  className?: string
): void {
  const providedMethods = new Set(composition.methods.keys());
  for (const [name, { value }] of composition.attributes) {
    for (const selector of attributeSelectors(name, value, registry, className)) {
      providedMethods.add(selector);
    }
  }

  const providedAttributes = new Set(composition.attributes.keys());
  // Only parameters that materialize an attribute give the record a slot
  for (const param of params) {
    if (param.attribute) providedAttributes.add(param.attribute);
    if (param.reader) providedMethods.add(param.reader);
  }

  for (const source of composition.sources) {
    const requires = source.definition.requires;
    if (!source.role || !requires) continue;

    for (const method of requires.methods ?? []) {
      if (!providedMethods.has(method)) {
        throw new CompositionError(
          `Role '${source.label}' requires method '${method}', which is not provided`,
          'Provide it from the implementation or another role',
          className
        );
      }
    }

    for (const attribute of requires.attributes ?? []) {
      if (!providedAttributes.has(attribute)) {
        throw new CompositionError(
          `Role '${source.label}' requires attribute '${attribute}', which is not provided`,
          'Declare it in a source, or mark a class-level parameter with attribute: true',
          className
        );
      }
    }
  }
}
