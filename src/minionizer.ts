import { v4 as uuidv4 } from 'uuid';
import { buildAttributeSchema, collectRequiredParams } from './attribute-schema.js';
import { CompiledClass } from './compiled-class.js';
import { ConstructorFactory } from './constructor-factory.js';
import { buildDispatchTables } from './dispatch.js';
import { logger } from './logger.js';
import { defaultRegistry, Registry } from './registry.js';
import { composeRoles } from './role-composer.js';
import { isSpecificationModule, validateSpecification } from './spec-validator.js';
import { ClassMethodBody, Specification, SpecificationModule } from './types.js';

export interface MinionizeOptions {
  registry?: Registry;
}

/**
 * Names for classes built without one; they never enter the class registry
 */
export function anonymousClassName(): string {
  return `__ANON__::${uuidv4()}`;
}

/**
 * Build a class from a specification and register it when it has a name.
 *
 * Accepts the specification itself, or a module namespace that exports it
 * as `specification`. Nothing is registered unless every step succeeds.
 *
 * @example
 * const Counter = minionize({
 *   name: 'Counter',
 *   interface: ['next'],
 *   implementation: {
 *     has: { count: { default: 0 } },
 *     methods: { next: (self) => { ... } },
 *   },
 * });
 * Counter.new().call('next'); // 0
 */
export function minionize(
  input: Specification | SpecificationModule,
  options: MinionizeOptions = {}
): CompiledClass {
  return compileSpecification(input, options);
}

/**
 * minionize() for values of unknown shape, such as a loaded module's exports
 */
export function compileSpecification(input: unknown, options: MinionizeOptions = {}): CompiledClass {
  const registry = options.registry ?? defaultRegistry;
  const spec = validateSpecification(isSpecificationModule(input) ? input.specification : input);

  const anonymous = spec.name === undefined;
  const className = spec.name ?? anonymousClassName();

  const params = collectRequiredParams(spec);
  const composition = composeRoles(spec, registry, params, className);
  const schema = buildAttributeSchema(composition, params, className);
  const { publicDispatch, semiprivateDispatch } = buildDispatchTables({
    className,
    interface: spec.interface,
    composition,
    attributes: schema.attributes,
    registry,
  });

  const factory = new ConstructorFactory({
    className,
    attributes: schema.attributes,
    requiredParams: schema.requiredParams,
    buildArgs: spec.build_args,
  });

  const compiled = new CompiledClass({
    name: className,
    anonymous,
    attributeSchema: schema.attributes,
    requiredParams: schema.requiredParams,
    publicDispatch,
    semiprivateDispatch,
    classMethods: new Map<string, ClassMethodBody>(spec.class_methods ? Object.entries(spec.class_methods) : []),
    factory,
  });

  if (!anonymous) {
    registry.registerClass(compiled);
  }

  logger.debug(
    `Built class '${className}': ` +
    `${publicDispatch.size} public, ${semiprivateDispatch.size} semiprivate, ` +
    `${schema.attributes.size} attribute(s), ${schema.requiredParams.length} parameter(s)`
  );

  return compiled;
}
