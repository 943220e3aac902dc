import { NoSuchMethodError, SpecError } from './errors.js';
import {
  ClassMethodBody,
  DispatchTable,
  MinionSelf,
  ResolvedAttribute,
  ResolvedParam,
  SemiprivateHandle,
  UtilitySurface,
} from './types.js';

// Instance → sealed state. Only this module and the constructor factory read it.
const states = new WeakMap<MinionInstance, MinionSelf>();

export function selfOf(instance: MinionInstance): MinionSelf | undefined {
  return states.get(instance);
}

// ============================================
// Instance
// ============================================

/**
 * A constructed object. Its state is sealed and reachable only from the
 * method bodies dispatched through `call`.
 */
export class MinionInstance {
  constructor(readonly compiled: CompiledClass, self: MinionSelf) {
    states.set(this, self);
    Object.freeze(this);
  }

  get className(): string {
    return this.compiled.name;
  }

  /**
   * Invoke a public selector
   *
   * @throws NoSuchMethodError for selectors outside the interface
   */
  call(selector: string, ...args: unknown[]): unknown {
    const entry = this.compiled.publicDispatch.get(selector);

    if (!entry) {
      if (this.compiled.semiprivateDispatch.has(selector)) {
        throw NoSuchMethodError.notPublic(selector, this.compiled.name);
      }
      throw NoSuchMethodError.unknown(selector, this.compiled.name);
    }

    const self = states.get(this);
    if (!self) {
      throw NoSuchMethodError.unknown(selector, this.compiled.name);
    }
    return entry.invoke(self, args);
  }

  can(selector: string): boolean {
    return this.compiled.publicDispatch.has(selector);
  }
}

/**
 * The `self.$$` handle: semiprivate calls and the generated ASSERT helper
 */
export class SemiprivateSurface implements SemiprivateHandle {
  constructor(
    private readonly compiled: CompiledClass,
    private readonly self: MinionSelf,
    readonly instance: MinionInstance
  ) {}

  call(selector: string, ...args: unknown[]): unknown {
    const entry = this.compiled.semiprivateDispatch.get(selector);
    if (!entry) {
      throw NoSuchMethodError.unknown(selector, `${this.compiled.name}::__Private`);
    }
    return entry.invoke(this.self, args);
  }

  can(selector: string): boolean {
    return this.compiled.semiprivateDispatch.has(selector);
  }

  ASSERT(attribute: string, value: unknown): void {
    this.call('ASSERT', attribute, value);
  }
}

// ============================================
// Compiled Class
// ============================================

/**
 * What the class needs from the constructor factory
 */
export interface InstanceFactory {
  construct(compiled: CompiledClass, args: unknown[]): MinionInstance;
  utilityFor(compiled: CompiledClass): UtilitySurface;
}

export interface CompiledClassParts {
  name: string;
  anonymous: boolean;
  attributeSchema: ReadonlyMap<string, ResolvedAttribute>;
  requiredParams: readonly ResolvedParam[];
  publicDispatch: DispatchTable;
  semiprivateDispatch: DispatchTable;
  classMethods: ReadonlyMap<string, ClassMethodBody>;
  factory: InstanceFactory;
}

export class CompiledClass {
  readonly name: string;
  readonly anonymous: boolean;
  readonly attributeSchema: ReadonlyMap<string, ResolvedAttribute>;
  readonly requiredParams: readonly ResolvedParam[];
  readonly publicDispatch: DispatchTable;
  readonly semiprivateDispatch: DispatchTable;
  readonly classMethods: ReadonlyMap<string, ClassMethodBody>;
  readonly utility: UtilitySurface;
  private readonly factory: InstanceFactory;

  constructor(parts: CompiledClassParts) {
    this.name = parts.name;
    this.anonymous = parts.anonymous;
    this.attributeSchema = parts.attributeSchema;
    this.requiredParams = parts.requiredParams;
    this.publicDispatch = parts.publicDispatch;
    this.semiprivateDispatch = parts.semiprivateDispatch;
    this.classMethods = parts.classMethods;
    this.factory = parts.factory;
    this.utility = parts.factory.utilityFor(this);
    Object.freeze(this);
  }

  /**
   * Construct an instance, through a custom `new` class method when one is declared
   */
  new(...args: unknown[]): MinionInstance {
    const custom = this.classMethods.get('new');
    if (!custom) {
      return this.factory.construct(this, args);
    }

    const result = custom({ compiled: this, util: this.utility }, ...args);
    if (!(result instanceof MinionInstance) || result.compiled !== this) {
      throw new SpecError(
        `Custom constructor of class '${this.name}' did not return an instance of '${this.name}'`,
        'Build the instance with util.newObject() and return it',
        this.name
      );
    }
    return result;
  }

  /**
   * Invoke a class-level selector: `new` or a declared class method
   */
  call(selector: string, ...args: unknown[]): unknown {
    if (selector === 'new') {
      return this.new(...args);
    }

    const body = this.classMethods.get(selector);
    if (!body) {
      throw NoSuchMethodError.unknown(selector, this.name);
    }
    return body({ compiled: this, util: this.utility }, ...args);
  }

  can(selector: string): boolean {
    return selector === 'new' || this.classMethods.has(selector);
  }
}
