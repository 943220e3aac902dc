/**
 * Constructor Factory
 *
 * Default construction protocol:
 *   0. adapt call arguments (build_args, or a single named-parameter mapping)
 *   1. assert every required parameter, in declaration order
 *   2. allocate the sealed record with fresh defaults, then bind init_args
 *   3. invoke the BUILD hook with the raw named parameters
 *   4. return the instance
 * A failure at any step throws before the instance escapes.
 */

import { assertValue } from './assertion.js';
import {
  CompiledClass,
  InstanceFactory,
  MinionInstance,
  SemiprivateSurface,
  selfOf,
} from './compiled-class.js';
import { AssertionError, SpecError } from './errors.js';
import { createSealedRecord, slotKey } from './sealed-record.js';
import {
  BuildArgs,
  DefaultValue,
  MinionSelf,
  ResolvedAttribute,
  ResolvedParam,
  UtilitySurface,
} from './types.js';

export interface ConstructionPlan {
  className: string;
  attributes: ReadonlyMap<string, ResolvedAttribute>;
  requiredParams: readonly ResolvedParam[];
  buildArgs?: BuildArgs;
}

/**
 * Producers run on every call, so each instance gets its own value
 */
export function materialize(value: DefaultValue): unknown {
  return typeof value === 'function' ? value() : value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export class ConstructorFactory implements InstanceFactory {
  constructor(private readonly plan: ConstructionPlan) {}

  construct(compiled: CompiledClass, args: unknown[]): MinionInstance {
    const raw = this.adaptArguments(args);
    const params = this.validateParams(raw);
    const { instance, self } = this.allocate(compiled);

    for (const attribute of this.plan.attributes.values()) {
      if (!attribute.initArg) continue;

      const supplied = params[attribute.initArg];
      if (supplied === undefined) continue;

      const value = attribute.mapInitArg ? attribute.mapInitArg(supplied) : supplied;
      assertValue('Attribute', attribute.name, value, attribute.assert, this.plan.className);
      self[slotKey(attribute.name)] = value;
    }

    this.runBuild(compiled, self, raw);
    return instance;
  }

  /**
   * Turn call arguments into a named-parameter mapping
   */
  adaptArguments(args: unknown[]): Record<string, unknown> {
    const { buildArgs, className } = this.plan;

    if (buildArgs) {
      const adapted = buildArgs(...args);
      if (!isPlainObject(adapted)) {
        throw new AssertionError('Arguments', className, 'adapted by build_args into a mapping', className);
      }
      return adapted;
    }

    if (args.length === 0) {
      return {};
    }

    const [first] = args;
    if (args.length === 1 && isPlainObject(first)) {
      return first;
    }

    throw new AssertionError('Arguments', className, 'a single mapping of named parameters', className);
  }

  /**
   * Assert required parameters and fill in parameter defaults
   *
   * @returns a copy of the raw parameters with defaults applied
   */
  validateParams(raw: Record<string, unknown>): Record<string, unknown> {
    const params: Record<string, unknown> = { ...raw };

    for (const param of this.plan.requiredParams) {
      let value = params[param.name];

      if (value === undefined) {
        if (param.default !== undefined) {
          value = materialize(param.default);
          params[param.name] = value;
        } else if (param.optional) {
          continue;
        } else {
          throw new AssertionError('Parameter', param.name, 'provided', this.plan.className);
        }
      }

      assertValue('Parameter', param.name, value, param.assert, this.plan.className);
    }

    return params;
  }

  utilityFor(compiled: CompiledClass): UtilitySurface {
    const { className } = this.plan;

    return {
      newObject: (rawAttrs?: Record<string, unknown>): MinionInstance => {
        return this.allocate(compiled, rawAttrs).instance;
      },

      build: (instance: MinionInstance, args: Record<string, unknown>): void => {
        const self = instance.compiled === compiled ? selfOf(instance) : undefined;
        if (!self) {
          throw new AssertionError('Arguments', 'build', `an instance of ${className}`, className);
        }
        this.runBuild(compiled, self, args);
      },

      assert: (name: string, value: unknown): void => {
        const param = this.plan.requiredParams.find((candidate) => candidate.name === name);
        if (!param) {
          throw new SpecError(
            `Class '${className}' declares no constructor parameter '${name}'`,
            undefined,
            className
          );
        }
        if (value === undefined && param.default === undefined && !param.optional) {
          throw new AssertionError('Parameter', name, 'provided', className);
        }
        assertValue('Parameter', name, value, param.assert, className);
      },
    };
  }

  private allocate(
    compiled: CompiledClass,
    rawAttrs?: Record<string, unknown>
  ): { instance: MinionInstance; self: MinionSelf } {
    const record = createSealedRecord(Array.from(this.plan.attributes.keys()), this.plan.className);
    const { self } = record;

    for (const attribute of this.plan.attributes.values()) {
      if (attribute.default !== undefined) {
        self[slotKey(attribute.name)] = materialize(attribute.default);
      }
    }

    if (rawAttrs) {
      for (const [name, value] of Object.entries(rawAttrs)) {
        self[slotKey(name)] = value;
      }
    }

    const instance = new MinionInstance(compiled, self);
    record.attachHandle(new SemiprivateSurface(compiled, self, instance));
    return { instance, self };
  }

  private runBuild(compiled: CompiledClass, self: MinionSelf, args: Record<string, unknown>): void {
    const hook = compiled.semiprivateDispatch.get('BUILD');
    if (hook) {
      hook.invoke(self, [args]);
    }
  }
}
