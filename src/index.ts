/**
 * Minion Forge - library entry point
 */

export { minionize, compileSpecification, anonymousClassName } from './minionizer.js';
export type { MinionizeOptions } from './minionizer.js';
export {
  Registry,
  defaultRegistry,
  defineImplementation,
  defineRole,
  getClass,
  construct,
} from './registry.js';
export { CompiledClass, MinionInstance } from './compiled-class.js';
export { validate, assertValue } from './assertion.js';
export type { ValidationResult } from './assertion.js';
export { validateSpecification, validateSource } from './spec-validator.js';
export { describeClass } from './describe.js';
export type { ClassLayout } from './describe.js';
export { configure, getConfig, loadConfig, resetConfig } from './config.js';
export type { MinionConfig, LogLevel } from './config.js';
export {
  MinionError,
  SpecError,
  CompositionError,
  AssertionError,
  NoSuchMethodError,
  SealedRecordViolation,
  describeError,
} from './errors.js';
export type {
  AttributeDescriptor,
  BuildArgs,
  ClassMethodBody,
  ClassMethodContext,
  DefaultValue,
  Handles,
  MethodBody,
  MinionSelf,
  Predicate,
  PredicateMap,
  Producer,
  RequiredParam,
  SemiprivateHandle,
  SourceDefinition,
  Specification,
  SpecificationModule,
  UtilitySurface,
} from './types.js';
