import { describe, it, expect } from '@jest/globals';
import { SpecError } from '../../src/errors.js';
import { validateSource, validateSpecification } from '../../src/spec-validator.js';
import { counterImplementation, isInteger } from '../fixtures/minions.js';

describe('validateSpecification', () => {
  it('should accept a minimal specification and return a copy', () => {
    const spec = { interface: ['next'], implementation: counterImplementation() };

    const parsed = validateSpecification(spec);

    expect(parsed).not.toBe(spec);
    expect(parsed.interface).toEqual(['next']);
  });

  it('should not mutate its input', () => {
    const implementation = counterImplementation();
    const spec = { name: 'Counter', interface: ['next'], implementation };

    validateSpecification(spec);

    expect(spec).toEqual({ name: 'Counter', interface: ['next'], implementation });
    expect(Object.keys(spec)).toEqual(['name', 'interface', 'implementation']);
  });

  it('should keep method bodies and predicates by reference', () => {
    const implementation = counterImplementation();

    const parsed = validateSpecification({
      interface: ['next'],
      implementation,
      construct_with: { start: { assert: { integer: isInteger } } },
    });

    expect(typeof parsed.implementation).toBe('object');
    expect(parsed.construct_with?.start?.assert?.integer).toBe(isInteger);
  });

  it('should reject a missing interface', () => {
    expect(() => validateSpecification({ implementation: counterImplementation() }))
      .toThrow("Invalid specification:\n  interface: interface is required");
  });

  it('should reject an empty interface', () => {
    expect(() => validateSpecification({ name: 'Counter', interface: [], implementation: counterImplementation() }))
      .toThrow("Invalid specification for class 'Counter':\n  interface: interface must not be empty");
  });

  it('should reject a specification without implementation or roles', () => {
    expect(() => validateSpecification({ interface: ['next'] })).toThrow(SpecError);
    expect(() => validateSpecification({ interface: ['next'], roles: [] }))
      .toThrow(/an implementation or at least one role is required/);
  });

  it('should reject a predicate that is not a function', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: counterImplementation(),
      requires: { start: { assert: { integer: 'yes' } } },
    })).toThrow(/requires\.start\.assert\.integer: predicate must be a function/);
  });

  it('should reject repeated interface selectors', () => {
    expect(() => validateSpecification({
      interface: ['next', 'next'],
      implementation: counterImplementation(),
    })).toThrow(/interface\.1: selector 'next' is listed more than once/);
  });

  it('should reject a parameter declared in both requires and construct_with', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: counterImplementation(),
      requires: { start: {} },
      construct_with: { start: {} },
    })).toThrow(/parameter 'start' is declared in both requires and construct_with/);
  });

  it('should reject an object literal default', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: { has: { items: { default: [] } }, methods: { next: () => 1 } },
    })).toThrow(
      'Invalid specification:\n  implementation.has.items.default: ' +
      'default must be a primitive or a producer function; wrap objects in a producer'
    );
  });

  it('should report the defect inside an inline role', () => {
    expect(() => validateSpecification({
      interface: ['describe'],
      roles: [{ role: true, methods: { describe: 'described' } }],
    })).toThrow('Invalid specification:\n  roles.0.methods.describe: method body must be a function');
  });

  it('should report stray keys on an inline implementation', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: { ...counterImplementation(), extra: 1 },
    })).toThrow("Invalid specification:\n  implementation: Unrecognized key(s) in object: 'extra'");
  });

  it('should reject integer-like predicate descriptions', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: counterImplementation(),
      construct_with: { start: { assert: { positive: isInteger, '2': isInteger } } },
    })).toThrow('Invalid specification:\n  construct_with.start.assert.2: predicate description must not be an integer');
  });

  it('should reject a parameter reader without an attribute', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: counterImplementation(),
      construct_with: { start: { reader: true } },
    })).toThrow(/reader is only allowed on a parameter that materializes an attribute/);
  });

  it('should reject unknown keys', () => {
    expect(() => validateSpecification({
      interface: ['next'],
      implementation: counterImplementation(),
      interfaces: ['next'],
    })).toThrow(SpecError);
  });

  it('should attach a hint', () => {
    let caught: unknown;
    try {
      validateSpecification({ interface: [] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SpecError);
    expect(caught).toMatchObject({
      hint: 'A specification needs a non-empty interface and an implementation or roles',
    });
  });
});

describe('validateSource', () => {
  it('should accept a role with requirements', () => {
    const role = validateSource({
      name: 'Describable',
      role: true,
      methods: { describe: () => 'x' },
      requires: { methods: ['name'] },
    });

    expect(role.requires).toEqual({ methods: ['name'] });
  });

  it('should reject requirements on an implementation', () => {
    expect(() => validateSource({ name: 'Impl', requires: { methods: ['name'] } }))
      .toThrow("Invalid source 'Impl':\n  requires: requires is only allowed on roles");
  });

  it('should reject selectors that are not identifiers', () => {
    expect(() => validateSource({ methods: { 'not-valid': () => 1 } })).toThrow(SpecError);
  });
});
