import { describe, it, expect } from '@jest/globals';
import { collectClasses, formatLayouts } from '../../src/commands/inspect.js';
import { describeClass } from '../../src/describe.js';
import { minionize } from '../../src/minionizer.js';
import { defaultRegistry, Registry } from '../../src/registry.js';
import { counterSpecification, isInteger, numberAt } from '../fixtures/minions.js';

function buildCounter() {
  return minionize(
    {
      name: 'Counter',
      interface: ['next'],
      implementation: {
        name: 'CounterImpl',
        has: {
          count: { default: 0, init_arg: 'start', reader: true },
          history: { default: () => [] },
        },
        methods: {
          next: (self) => self.$$.call('_bump'),
          _bump: (self) => {
            const count = numberAt(self, '$count');
            self.$count = count + 1;
            return count;
          },
          BUILD: () => undefined,
        },
        semiprivate: ['_bump'],
      },
      construct_with: {
        start: { assert: { integer: isInteger }, optional: true },
        label: { attribute: true, default: 'none' },
      },
      class_methods: { origin: ({ compiled }) => compiled.name },
    },
    { registry: new Registry() }
  );
}

describe('describeClass', () => {
  it('should lay out both call surfaces and the schema', () => {
    expect(describeClass(buildCounter())).toEqual({
      name: 'Counter',
      anonymous: false,
      interface: [
        { selector: 'next', kind: 'method', source: 'CounterImpl' },
        { selector: 'count', kind: 'reader', source: "reader of attribute 'count'" },
      ],
      semiprivate: [
        { selector: '_bump', kind: 'method', source: 'CounterImpl' },
        { selector: 'BUILD', kind: 'method', source: 'CounterImpl' },
        { selector: 'ASSERT', kind: 'generated', source: 'generated' },
      ],
      attributes: {
        count: { source: 'CounterImpl', default: '0', init_arg: 'start', reader: 'count' },
        history: { source: 'CounterImpl', default: '<producer>' },
        label: { source: "parameter 'label'", init_arg: 'label' },
      },
      parameters: {
        start: { assert: ['integer'], optional: true },
        label: { default: '"none"', attribute: 'label' },
      },
      class_methods: ['origin'],
    });
  });

  it('should mark anonymous classes', () => {
    const layout = describeClass(minionize(counterSpecification(), { registry: new Registry() }));

    expect(layout.anonymous).toBe(true);
    expect(layout.name).toMatch(/^__ANON__::/);
    expect(layout.parameters).toEqual({});
  });
});

describe('formatLayouts', () => {
  it('should render JSON', () => {
    const layout = describeClass(buildCounter());

    expect(JSON.parse(formatLayouts([layout], 'json'))).toEqual([layout]);
  });

  it('should render YAML as a sequence of classes', () => {
    const output = formatLayouts([describeClass(buildCounter())], 'yaml');

    expect(output).toMatch(/^- name: Counter\n {2}anonymous: false\n {2}interface:\n/);
  });
});

describe('collectClasses', () => {
  it('should take compiled classes and compile specifications', () => {
    const Counter = buildCounter();

    const classes = collectClasses({
      Counter,
      specification: counterSpecification('Scratch'),
      version: 1,
    });

    expect(classes.map((compiled) => compiled.name)).toEqual(['Counter', 'Scratch']);
    expect(defaultRegistry.hasClass('Scratch')).toBe(false);
  });

  it('should find nothing in a non-object module', () => {
    expect(collectClasses(null)).toEqual([]);
  });
});
