/**
 * Shared specification pieces for the test suites
 */

import { MinionSelf, SourceDefinition, Specification } from '../../src/index.js';

export const isInteger = (value: unknown): boolean => Number.isInteger(value);

export function numberAt(self: MinionSelf, slot: `$${string}`): number {
  const value = self[slot];
  if (typeof value !== 'number') {
    throw new TypeError(`${slot} holds ${typeof value}, not a number`);
  }
  return value;
}

export function setAt(self: MinionSelf, slot: `$${string}`): Set<unknown> {
  const value = self[slot];
  if (!(value instanceof Set)) {
    throw new TypeError(`${slot} does not hold a Set`);
  }
  return value;
}

export function counterImplementation(): SourceDefinition {
  return {
    name: 'CounterImpl',
    has: {
      count: { default: 0 },
    },
    methods: {
      next: (self) => {
        const count = numberAt(self, '$count');
        self.$count = count + 1;
        return count;
      },
    },
  };
}

export function counterSpecification(name?: string): Specification {
  const spec: Specification = {
    interface: ['next'],
    implementation: counterImplementation(),
  };
  if (name) spec.name = name;
  return spec;
}
