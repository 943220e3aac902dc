import { z } from 'zod';
import type { CompiledClass, MinionInstance } from './compiled-class.js';

// ============================================
// Callable Shapes
// ============================================

export type Predicate = (value: unknown) => boolean;
export type PredicateMap = Record<string, Predicate>;

/**
 * Zero-argument default producer, invoked once per instance
 */
export type Producer = () => unknown;

export type DefaultValue = string | number | boolean | bigint | symbol | null | Producer;

export type InitArgMapper = (value: unknown) => unknown;

/**
 * Adapts arbitrary constructor call arguments into named parameters
 */
export type BuildArgs = (...args: unknown[]) => Record<string, unknown>;

// ============================================
// Instance State
// ============================================

export const ATTRIBUTE_PREFIX = '$';
export const SEMIPRIVATE_KEY = '$$';

/**
 * The reserved handle at `self.$$`, reachable only from method bodies
 */
export interface SemiprivateHandle {
  readonly instance: MinionInstance;
  call(selector: string, ...args: unknown[]): unknown;
  can(selector: string): boolean;
  ASSERT(attribute: string, value: unknown): void;
}

/**
 * Sealed state record handed to method bodies as `self`.
 * Attribute `count` lives at `self.$count`.
 */
export type MinionSelf = { [slot: `$${string}`]: unknown } & {
  readonly $$: SemiprivateHandle;
};

export type MethodBody = (self: MinionSelf, ...args: unknown[]) => unknown;

/**
 * Low-level construction operations for hand-written constructors
 */
export interface UtilitySurface {
  newObject(rawAttrs?: Record<string, unknown>): MinionInstance;
  build(instance: MinionInstance, args: Record<string, unknown>): void;
  assert(param: string, value: unknown): void;
}

export interface ClassMethodContext {
  compiled: CompiledClass;
  util: UtilitySurface;
}

export type ClassMethodBody = (context: ClassMethodContext, ...args: unknown[]) => unknown;

// ============================================
// Schema Helpers
// ============================================

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

function callable<T>(label: string) {
  return z.custom<T>(isFunction, { message: `${label} must be a function` });
}

export function isDefaultValue(value: unknown): value is DefaultValue {
  return value === null || ['string', 'number', 'boolean', 'bigint', 'symbol', 'function'].includes(typeof value);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const SelectorSchema = z.string().regex(IDENTIFIER, 'must be an identifier');
export const AttributeNameSchema = z.string().regex(IDENTIFIER, 'must be an identifier');

// Integer-like keys are enumerated before all others, which would break
// declaration order
const PredicateDescriptionSchema = z.string()
  .min(1, 'predicate description must not be empty')
  .refine((key) => !/^(0|[1-9][0-9]*)$/.test(key), 'predicate description must not be an integer');

export const PredicateMapSchema = z.record(
  PredicateDescriptionSchema,
  callable<Predicate>('predicate')
);

const DefaultSchema = z.custom<DefaultValue>(isDefaultValue, {
  message: 'default must be a primitive or a producer function; wrap objects in a producer',
});

// ============================================
// Attribute Descriptors
// ============================================

/**
 * Forwarding declaration: a selector list, a local → remote rename map,
 * or the name of a registered role
 */
export const HandlesSchema = z.union([
  z.array(SelectorSchema).min(1),
  z.record(SelectorSchema, SelectorSchema),
  z.string().min(1),
]);

export type Handles = z.infer<typeof HandlesSchema>;

export const AttributeDescriptorSchema = z.object({
  default: DefaultSchema.optional(),
  assert: PredicateMapSchema.optional(),
  init_arg: AttributeNameSchema.optional(),
  map_init_arg: callable<InitArgMapper>('map_init_arg').optional(),
  handles: HandlesSchema.optional(),
  reader: z.union([z.boolean(), SelectorSchema]).optional(),
  writer: z.union([z.boolean(), SelectorSchema]).optional(),
}).strict();

export type AttributeDescriptor = z.infer<typeof AttributeDescriptorSchema>;

// ============================================
// Method/Attribute Sources (Implementation and Role)
// ============================================

export const RoleRequirementsSchema = z.object({
  methods: z.array(SelectorSchema).optional(),
  attributes: z.array(AttributeNameSchema).optional(),
}).strict();

export const SourceDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  role: z.boolean().optional(),
  has: z.record(AttributeNameSchema, AttributeDescriptorSchema).optional(),
  methods: z.record(SelectorSchema, callable<MethodBody>('method body')).optional(),
  semiprivate: z.array(SelectorSchema).optional(),
  requires: RoleRequirementsSchema.optional(),
}).strict().refine(
  (data) => data.role === true || data.requires === undefined,
  { message: 'requires is only allowed on roles', path: ['requires'] }
);

export type SourceDefinition = z.infer<typeof SourceDefinitionSchema>;

export const SourceRefSchema = z.union([z.string().min(1), SourceDefinitionSchema]);

export type SourceRef = z.infer<typeof SourceRefSchema>;

// ============================================
// Class-Level Constructor Parameters
// ============================================

export const RequiredParamSchema = z.object({
  assert: PredicateMapSchema.optional(),
  attribute: z.union([z.boolean(), AttributeNameSchema]).optional(),
  reader: z.union([z.boolean(), SelectorSchema]).optional(),
  optional: z.boolean().optional(),
  default: DefaultSchema.optional(),
}).strict().refine(
  (data) => data.reader === undefined || data.reader === false || (data.attribute !== undefined && data.attribute !== false),
  { message: 'reader is only allowed on a parameter that materializes an attribute', path: ['reader'] }
);

export type RequiredParam = z.infer<typeof RequiredParamSchema>;

const RequiredParamMapSchema = z.record(AttributeNameSchema, RequiredParamSchema);

// ============================================
// Class Specification
// ============================================

export const SpecificationSchema = z.object({
  name: z.string().min(1).optional(),
  interface: z.array(SelectorSchema, { required_error: 'interface is required' })
    .min(1, 'interface must not be empty'),
  implementation: SourceRefSchema.optional(),
  roles: z.array(SourceRefSchema).optional(),
  requires: RequiredParamMapSchema.optional(),
  construct_with: RequiredParamMapSchema.optional(),
  build_args: callable<BuildArgs>('build_args').optional(),
  class_methods: z.record(SelectorSchema, callable<ClassMethodBody>('class method')).optional(),
}).strict().superRefine((spec, ctx) => {
  const seen = new Set<string>();
  spec.interface.forEach((selector, idx) => {
    if (seen.has(selector)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `selector '${selector}' is listed more than once`,
        path: ['interface', idx],
      });
    }
    seen.add(selector);
  });

  if (spec.implementation === undefined && (spec.roles === undefined || spec.roles.length === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'an implementation or at least one role is required',
      path: ['implementation'],
    });
  }

  if (spec.requires && spec.construct_with) {
    for (const param of Object.keys(spec.construct_with)) {
      if (param in spec.requires) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `parameter '${param}' is declared in both requires and construct_with`,
          path: ['construct_with', param],
        });
      }
    }
  }
});

export type Specification = z.infer<typeof SpecificationSchema>;

/**
 * A module namespace carrying its specification as an export
 */
export interface SpecificationModule {
  specification: Specification;
}

// ============================================
// Compiled Artifacts
// ============================================

export interface ResolvedAttribute {
  name: string;
  source: string;
  default?: DefaultValue;
  assert: PredicateMap;
  initArg?: string;
  mapInitArg?: InitArgMapper;
  handles?: Handles;
  reader?: string;
  writer?: string;
}

export interface ResolvedParam {
  name: string;
  assert: PredicateMap;
  optional: boolean;
  default?: DefaultValue;
  attribute?: string;
  reader?: string;
}

export type DispatchKind = 'method' | 'reader' | 'writer' | 'forward' | 'generated';

export interface DispatchEntry {
  selector: string;
  kind: DispatchKind;
  source: string;
  invoke: (self: MinionSelf, args: unknown[]) => unknown;
}

export type DispatchTable = ReadonlyMap<string, DispatchEntry>;
