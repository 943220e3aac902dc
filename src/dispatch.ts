/**
 * Method Dispatch Table
 *
 * Builds the two call surfaces of a compiled class once, at build time:
 *   public:      one entry per interface selector, plus readers and writers
 *   semiprivate: declared semiprivate selectors, forwarded selectors outside
 *                the interface, BUILD, and the generated ASSERT helper
 * Forwarding entries resolve the held attribute value and re-invoke the
 * target selector on it.
 */

import { assertValue } from './assertion.js';
import { MinionInstance } from './compiled-class.js';
import { CompositionError, NoSuchMethodError, SealedRecordViolation, SpecError } from './errors.js';
import { logger } from './logger.js';
import type { Registry } from './registry.js';
import { Composition, expandHandles } from './role-composer.js';
import { slotKey } from './sealed-record.js';
import { DispatchEntry, MethodBody, ResolvedAttribute } from './types.js';

export const RESERVED_SELECTORS: readonly string[] = ['ASSERT'];

export interface DispatchTables {
  publicDispatch: Map<string, DispatchEntry>;
  semiprivateDispatch: Map<string, DispatchEntry>;
}

export interface DispatchInput {
  className: string;
  interface: readonly string[];
  composition: Composition;
  attributes: ReadonlyMap<string, ResolvedAttribute>;
  registry: Registry;
}

// ============================================
// Entry Factories
// ============================================

function methodEntry(selector: string, body: MethodBody, source: string): DispatchEntry {
  return {
    selector,
    kind: 'method',
    source,
    invoke: (self, args) => body(self, ...args),
  };
}

function readerEntry(selector: string, attribute: ResolvedAttribute): DispatchEntry {
  const slot = slotKey(attribute.name);
  return {
    selector,
    kind: 'reader',
    source: `reader of attribute '${attribute.name}'`,
    invoke: (self) => self[slot],
  };
}

function writerEntry(selector: string, attribute: ResolvedAttribute, className: string): DispatchEntry {
  const slot = slotKey(attribute.name);
  return {
    selector,
    kind: 'writer',
    source: `writer of attribute '${attribute.name}'`,
    invoke: (self, [value]) => {
      assertValue('Attribute', attribute.name, value, attribute.assert, className);
      self[slot] = value;
      return undefined;
    },
  };
}

function packageOf(target: unknown): string {
  if (target instanceof MinionInstance) {
    return target.className;
  }
  if (typeof target === 'object' && target !== null) {
    const ctor: unknown = Reflect.get(target, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
  }
  return typeof target;
}

/**
 * Re-invoke `selector` on a held value: a minion instance through its public
 * surface, any other object through its own method
 */
export function forwardCall(target: unknown, selector: string, args: unknown[]): unknown {
  if (target instanceof MinionInstance) {
    return target.call(selector, ...args);
  }

  if ((typeof target === 'object' && target !== null) || typeof target === 'function') {
    const method: unknown = Reflect.get(target, selector);
    if (typeof method === 'function') {
      return Reflect.apply(method, target, args);
    }
  }

  if (target === undefined || target === null) {
    throw new NoSuchMethodError(
      `Can't call method "${selector}" on an undefined value`,
      selector,
      'undefined'
    );
  }
  throw NoSuchMethodError.unknown(selector, packageOf(target));
}

function forwardEntry(local: string, remote: string, attribute: ResolvedAttribute): DispatchEntry {
  const slot = slotKey(attribute.name);
  return {
    selector: local,
    kind: 'forward',
    source: `handles of attribute '${attribute.name}'`,
    invoke: (self, args) => forwardCall(self[slot], remote, args),
  };
}

function assertEntry(attributes: ReadonlyMap<string, ResolvedAttribute>, className: string): DispatchEntry {
  return {
    selector: 'ASSERT',
    kind: 'generated',
    source: 'generated',
    invoke: (_self, [name, value]) => {
      const attribute = typeof name === 'string' ? attributes.get(name) : undefined;
      if (!attribute) {
        throw new SealedRecordViolation(String(name), 'access', className);
      }
      assertValue('Attribute', attribute.name, value, attribute.assert, className);
      return undefined;
    },
  };
}

function describeEntry(entry: DispatchEntry): string {
  return entry.kind === 'method' ? `'${entry.source}'` : entry.source;
}

// ============================================
// Table Construction
// ============================================

function collectEntries(input: DispatchInput): Map<string, DispatchEntry> {
  const { className, composition, attributes, registry } = input;
  const available = new Map<string, DispatchEntry>();

  const add = (entry: DispatchEntry): void => {
    if (RESERVED_SELECTORS.includes(entry.selector)) {
      throw new SpecError(
        `Selector '${entry.selector}' from ${describeEntry(entry)} is reserved`,
        undefined,
        className
      );
    }

    const existing = available.get(entry.selector);
    if (existing) {
      throw new CompositionError(
        `Selector '${entry.selector}' is provided by both ${describeEntry(existing)} and ${describeEntry(entry)}`,
        'Rename the forwarded selector with a handles mapping, or drop one declaration',
        className
      );
    }
    available.set(entry.selector, entry);
  };

  for (const [selector, { value, source }] of composition.methods) {
    add(methodEntry(selector, value, source));
  }

  for (const attribute of attributes.values()) {
    if (attribute.reader) add(readerEntry(attribute.reader, attribute));
    if (attribute.writer) add(writerEntry(attribute.writer, attribute, className));

    if (attribute.handles !== undefined) {
      for (const { local, remote } of expandHandles(attribute.name, attribute.handles, registry, className)) {
        add(forwardEntry(local, remote, attribute));
      }
    }
  }

  return available;
}

/**
 * Build the public and semiprivate call surfaces
 *
 * @throws SpecError for unresolved selectors and public/semiprivate contradictions
 * @throws CompositionError when two declarations provide the same selector
 */
export function buildDispatchTables(input: DispatchInput): DispatchTables {
  const { className, composition } = input;
  const available = collectEntries(input);
  const publicDispatch = new Map<string, DispatchEntry>();
  const semiprivateDispatch = new Map<string, DispatchEntry>();

  for (const selector of input.interface) {
    if (selector === 'BUILD') {
      throw new SpecError(
        `Selector 'BUILD' is a construction hook and cannot be in the interface`,
        undefined,
        className
      );
    }

    const declaredBy = composition.semiprivate.get(selector);
    if (declaredBy) {
      throw new SpecError(
        `Selector '${selector}' is in the interface but declared semiprivate by '${declaredBy}'`,
        undefined,
        className
      );
    }

    const entry = available.get(selector);
    if (!entry) {
      throw new SpecError(
        `Interface selector '${selector}' has no implementation`,
        'Provide a method, reader, writer or handles entry for it',
        className
      );
    }
    publicDispatch.set(selector, entry);
  }

  for (const [selector, declaredBy] of composition.semiprivate) {
    const entry = available.get(selector);
    if (!entry) {
      throw new SpecError(
        `Semiprivate selector '${selector}' declared by '${declaredBy}' has no implementation`,
        undefined,
        className
      );
    }
    semiprivateDispatch.set(selector, entry);
  }

  for (const entry of available.values()) {
    if (publicDispatch.has(entry.selector) || semiprivateDispatch.has(entry.selector)) {
      continue;
    }

    switch (entry.kind) {
      case 'reader':
      case 'writer':
        publicDispatch.set(entry.selector, entry);
        break;
      case 'forward':
        semiprivateDispatch.set(entry.selector, entry);
        break;
      default:
        logger.debug(
          `Method '${entry.selector}' of ${describeEntry(entry)} in class '${className}' ` +
          `is neither in the interface nor semiprivate; it is not callable`
        );
    }
  }

  semiprivateDispatch.set('ASSERT', assertEntry(input.attributes, className));

  return { publicDispatch, semiprivateDispatch };
}
