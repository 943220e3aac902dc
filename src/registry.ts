import { CompiledClass, MinionInstance } from './compiled-class.js';
import { getConfig, MinionConfig } from './config.js';
import { NoSuchMethodError, SpecError } from './errors.js';
import { logger } from './logger.js';
import { validateSource } from './spec-validator.js';
import { SourceDefinition } from './types.js';

/**
 * Process-wide tables: source name → implementation/role definition, and
 * class name → compiled class.
 *
 * A child registry resolves sources through its parent but keeps its own
 * classes, so a scratch build never touches the parent's class table.
 */
export class Registry {
  private readonly sources = new Map<string, SourceDefinition>();
  private readonly classes = new Map<string, CompiledClass>();

  constructor(private readonly parent?: Registry) {}

  // ============================================
  // Sources
  // ============================================

  registerSource(name: string, definition: Omit<SourceDefinition, 'name'>): SourceDefinition {
    if (this.sources.has(name)) {
      throw new SpecError(
        `Source '${name}' is already registered`,
        'Implementations and roles cannot be re-opened once registered'
      );
    }

    const source = validateSource({ ...definition, name });
    this.sources.set(name, source);
    logger.debug(`Registered ${source.role ? 'role' : 'implementation'} '${name}'`);
    return source;
  }

  getSource(name: string): SourceDefinition | undefined {
    return this.sources.get(name) ?? this.parent?.getSource(name);
  }

  // ============================================
  // Classes
  // ============================================

  registerClass(
    compiled: CompiledClass,
    policy: MinionConfig['duplicateClass'] = getConfig().duplicateClass
  ): void {
    if (this.classes.has(compiled.name)) {
      if (policy === 'error') {
        throw new SpecError(
          `Class '${compiled.name}' is already registered`,
          'Choose another name, or set MINION_DUPLICATE_CLASS=replace',
          compiled.name
        );
      }
      logger.warn(`Replacing registered class '${compiled.name}'`);
    }

    this.classes.set(compiled.name, compiled);
    logger.debug(`Registered class '${compiled.name}'`);
  }

  getClass(name: string): CompiledClass | undefined {
    return this.classes.get(name);
  }

  hasClass(name: string): boolean {
    return this.classes.has(name);
  }

  classNames(): string[] {
    return Array.from(this.classes.keys());
  }

  /**
   * Construct through a registered class name
   *
   * @throws NoSuchMethodError when no class is registered under the name
   */
  construct(name: string, ...args: unknown[]): MinionInstance {
    const compiled = this.classes.get(name);
    if (!compiled) {
      throw NoSuchMethodError.unknown('new', name);
    }
    return compiled.new(...args);
  }
}

export const defaultRegistry = new Registry();

export function defineImplementation(
  name: string,
  definition: Omit<SourceDefinition, 'name' | 'role' | 'requires'>,
  registry: Registry = defaultRegistry
): SourceDefinition {
  return registry.registerSource(name, { ...definition, role: false });
}

export function defineRole(
  name: string,
  definition: Omit<SourceDefinition, 'name' | 'role'>,
  registry: Registry = defaultRegistry
): SourceDefinition {
  return registry.registerSource(name, { ...definition, role: true });
}

export function getClass(name: string): CompiledClass | undefined {
  return defaultRegistry.getClass(name);
}

export function construct(name: string, ...args: unknown[]): MinionInstance {
  return defaultRegistry.construct(name, ...args);
}
