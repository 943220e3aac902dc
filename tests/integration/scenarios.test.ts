/**
 * End-to-end class scenarios
 *
 * Each scenario builds a class from a specification, constructs instances
 * and drives them only through their public call surface.
 */

import { describe, it, expect } from '@jest/globals';
import {
  AssertionError,
  minionize,
  NoSuchMethodError,
  Registry,
} from '../../src/index.js';
import { counterImplementation, counterSpecification, isInteger, numberAt, setAt } from '../fixtures/minions.js';

describe('Scenario A: anonymous counter', () => {
  it('should count 0, 1, 2 on one instance', () => {
    const Counter = minionize(counterSpecification(), { registry: new Registry() });
    const counter = Counter.new();

    expect(counter.call('next')).toBe(0);
    expect(counter.call('next')).toBe(1);
    expect(counter.call('next')).toBe(2);
  });

  it('should keep separate state per instance', () => {
    const Counter = minionize(counterSpecification(), { registry: new Registry() });
    const first = Counter.new();
    const second = Counter.new();

    first.call('next');
    first.call('next');

    expect(second.call('next')).toBe(0);
    expect(first.call('next')).toBe(2);
  });

  it('should accept a module namespace exporting its specification', () => {
    const counterModule = { specification: counterSpecification() };
    const Counter = minionize(counterModule, { registry: new Registry() });

    expect(Counter.new().call('next')).toBe(0);
  });
});

describe('Scenario B: named counter', () => {
  it('should construct through the registered name', () => {
    const registry = new Registry();
    minionize(counterSpecification('Counter'), { registry });

    const counter = registry.construct('Counter');

    expect(counter.className).toBe('Counter');
    expect(counter.call('next')).toBe(0);
    expect(counter.call('next')).toBe(1);
  });

  it('should reject new on an instance with the no-such-method shape', () => {
    const Counter = minionize(counterSpecification('Counter'), { registry: new Registry() });
    const counter = Counter.new();

    expect(() => counter.call('new')).toThrow(NoSuchMethodError);
    expect(() => counter.call('new')).toThrow('Can\'t locate object method "new" via package "Counter"');
  });

  it('should reject next on the class itself', () => {
    const Counter = minionize(counterSpecification('Counter'), { registry: new Registry() });

    expect(() => Counter.call('next')).toThrow('Can\'t locate object method "next" via package "Counter"');
  });

  it('should reject construction through an unregistered name', () => {
    const registry = new Registry();

    expect(() => registry.construct('Counter')).toThrow('Can\'t locate object method "new" via package "Counter"');
  });
});

describe('Scenario C: counter with a validated start parameter', () => {
  function buildCounter() {
    return minionize(
      {
        name: 'Counter',
        interface: ['next'],
        implementation: {
          name: 'CounterImpl',
          has: {
            count: { default: 0, init_arg: 'start' },
          },
          methods: {
            next: (self) => {
              const count = numberAt(self, '$count');
              self.$count = count + 1;
              return count;
            },
          },
        },
        construct_with: {
          start: { assert: { integer: isInteger } },
        },
      },
      { registry: new Registry() }
    );
  }

  it('should start counting from the supplied value', () => {
    const counter = buildCounter().new({ start: 10 });

    expect(counter.call('next')).toBe(10);
    expect(counter.call('next')).toBe(11);
    expect(counter.call('next')).toBe(12);
  });

  it('should reject a non-integer start', () => {
    const Counter = buildCounter();

    expect(() => Counter.new({ start: 'ten' })).toThrow(AssertionError);
    expect(() => Counter.new({ start: 'ten' })).toThrow("Parameter 'start' is not integer");
  });

  it('should treat a missing start as a failed assertion', () => {
    expect(() => buildCounter().new()).toThrow("Parameter 'start' is not provided");
  });
});

describe('Scenario D: set built from positional arguments', () => {
  function buildSet() {
    return minionize(
      {
        name: 'IntSet',
        interface: ['has', 'add'],
        implementation: {
          name: 'IntSetImpl',
          has: {
            items: {
              default: () => new Set<unknown>(),
              init_arg: 'items',
              map_init_arg: (items) => new Set(Array.isArray(items) ? items : []),
            },
          },
          methods: {
            has: (self, item) => setAt(self, '$items').has(item),
            add: (self, item) => {
              setAt(self, '$items').add(item);
            },
          },
        },
        build_args: (...items) => ({ items }),
      },
      { registry: new Registry() }
    );
  }

  it('should report membership for the constructor arguments only', () => {
    const set = buildSet().new(1, 2, 3, 4);

    for (const item of [1, 2, 3, 4]) {
      expect(set.call('has', item)).toBe(true);
    }
    expect(set.call('has', 5)).toBe(false);
  });

  it('should report membership after add', () => {
    const set = buildSet().new(1, 2, 3, 4);

    set.call('add', 5);

    expect(set.call('has', 5)).toBe(true);
  });

  it('should not share the default set between instances', () => {
    const IntSet = buildSet();
    const first = IntSet.new();
    const second = IntSet.new();

    first.call('add', 7);

    expect(first.call('has', 7)).toBe(true);
    expect(second.call('has', 7)).toBe(false);
  });
});

describe('Interface guarantees', () => {
  it('should make every interface selector callable', () => {
    const Widget = minionize(
      {
        interface: ['next', 'describe'],
        implementation: counterImplementation(),
        roles: [
          {
            name: 'Describable',
            role: true,
            methods: { describe: () => 'a widget' },
            requires: { methods: ['next'] },
          },
        ],
      },
      { registry: new Registry() }
    );
    const widget = Widget.new();

    expect(widget.can('next')).toBe(true);
    expect(widget.can('describe')).toBe(true);
    expect(widget.call('describe')).toBe('a widget');
    expect(widget.call('next')).toBe(0);
  });
});
