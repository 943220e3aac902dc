/**
 * minion inspect <module>
 *
 * Loads a built JavaScript module, compiles every exported specification and
 * prints the layout of each class: its public and semiprivate surfaces,
 * attributes and constructor parameters.
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import * as yaml from 'yaml';
import { CompiledClass } from '../compiled-class.js';
import { ClassLayout, describeClass } from '../describe.js';
import { describeError } from '../errors.js';
import { compileSpecification } from '../minionizer.js';
import { defaultRegistry, Registry } from '../registry.js';

export type InspectFormat = 'yaml' | 'json';

export interface InspectOptions {
  format?: string;
}

function isSpecificationLike(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'interface' in value;
}

/**
 * Compile or collect every class a module exports.
 * Specifications are built against a scratch registry that resolves sources
 * through the default one, so inspecting never registers a class.
 */
export function collectClasses(moduleExports: unknown): CompiledClass[] {
  if (typeof moduleExports !== 'object' || moduleExports === null) {
    return [];
  }

  const scratch = new Registry(defaultRegistry);
  const classes: CompiledClass[] = [];

  for (const value of Object.values(moduleExports)) {
    if (value instanceof CompiledClass) {
      classes.push(value);
    } else if (isSpecificationLike(value)) {
      classes.push(compileSpecification(value, { registry: scratch }));
    }
  }

  return classes;
}

export function formatLayouts(layouts: ClassLayout[], format: InspectFormat): string {
  if (format === 'json') {
    return JSON.stringify(layouts, null, 2);
  }
  return yaml.stringify(layouts, { indent: 2, lineWidth: 0 });
}

export async function handleInspectCommand(modulePath: string, options: InspectOptions): Promise<void> {
  const format = options.format ?? 'yaml';
  if (format !== 'yaml' && format !== 'json') {
    console.error(`[ERROR] Unknown format '${format}'. Use yaml or json.`);
    process.exit(1);
  }

  const resolved = path.resolve(modulePath);

  try {
    const moduleExports: unknown = await import(pathToFileURL(resolved).href);
    const classes = collectClasses(moduleExports);

    if (classes.length === 0) {
      console.error(`[ERROR] No specifications or compiled classes exported by ${modulePath}`);
      console.error('[HINT] Export a specification object, or the result of minionize()');
      process.exit(1);
    }

    console.error(`[INFO] ${classes.length} class(es) in ${resolved}`);
    console.log(formatLayouts(classes.map(describeClass), format));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ERR_MODULE_NOT_FOUND') {
      console.error(`[ERROR] Module not found: ${modulePath}`);
      console.error('[HINT] Point inspect at a built .js file');
      process.exit(1);
    }

    console.error('[ERROR] Failed to build classes:');
    console.error(`  ${describeError(error)}`);
    process.exit(1);
  }
}
