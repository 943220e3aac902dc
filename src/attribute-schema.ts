import { CompositionError, SpecError } from './errors.js';
import { Composition, readerName, writerName } from './role-composer.js';
import {
  AttributeDescriptor,
  RequiredParam,
  ResolvedAttribute,
  ResolvedParam,
  Specification,
} from './types.js';

export interface AttributeSchema {
  attributes: Map<string, ResolvedAttribute>;
  requiredParams: ResolvedParam[];
}

function resolveParam(name: string, param: RequiredParam): ResolvedParam {
  const attribute = param.attribute === true
    ? name
    : typeof param.attribute === 'string' ? param.attribute : undefined;

  const resolved: ResolvedParam = {
    name,
    assert: param.assert ?? {},
    optional: param.optional ?? false,
  };

  if (param.default !== undefined) resolved.default = param.default;
  if (attribute) {
    resolved.attribute = attribute;
    const reader = readerName(attribute, param.reader);
    if (reader) resolved.reader = reader;
  }

  return resolved;
}

/**
 * Class-level constructor parameters from `requires` then `construct_with`,
 * in declaration order
 */
export function collectRequiredParams(spec: Specification): ResolvedParam[] {
  const params: ResolvedParam[] = [];

  for (const declared of [spec.requires, spec.construct_with]) {
    if (!declared) continue;

    for (const [name, param] of Object.entries(declared)) {
      params.push(resolveParam(name, param));
    }
  }

  return params;
}

function resolveAttribute(
  name: string,
  descriptor: AttributeDescriptor,
  source: string,
  className?: string
): ResolvedAttribute {
  if (descriptor.map_init_arg && !descriptor.init_arg) {
    throw new SpecError(
      `Attribute '${name}' declares map_init_arg without an init_arg`,
      'Name the constructor parameter to transform with init_arg',
      className
    );
  }

  const resolved: ResolvedAttribute = {
    name,
    source,
    assert: descriptor.assert ?? {},
  };

  if (descriptor.default !== undefined) resolved.default = descriptor.default;
  if (descriptor.init_arg) resolved.initArg = descriptor.init_arg;
  if (descriptor.map_init_arg) resolved.mapInitArg = descriptor.map_init_arg;
  if (descriptor.handles !== undefined) resolved.handles = descriptor.handles;

  const reader = readerName(name, descriptor.reader);
  if (reader) resolved.reader = reader;
  const writer = writerName(name, descriptor.writer);
  if (writer) resolved.writer = writer;

  return resolved;
}

/**
 * Merge composed attributes with class-level parameter declarations.
 *
 * A parameter marked `attribute` materializes an attribute with no default
 * that is populated from the parameter itself. Reusing a name a source already
 * declares is a conflict; a parameter-only requirement never conflicts.
 */
export function buildAttributeSchema(
  composition: Composition,
  params: readonly ResolvedParam[],
  className?: string
): AttributeSchema {
  const attributes = new Map<string, ResolvedAttribute>();

  for (const [name, { value, source }] of composition.attributes) {
    attributes.set(name, resolveAttribute(name, value, source, className));
  }

  for (const param of params) {
    if (!param.attribute) continue;

    const existing = attributes.get(param.attribute);
    if (existing) {
      throw new CompositionError(
        `Attribute '${param.attribute}' is provided by both '${existing.source}' and parameter '${param.name}'`,
        `Drop attribute: from parameter '${param.name}', or bind the existing attribute with init_arg`,
        className
      );
    }

    const materialized: ResolvedAttribute = {
      name: param.attribute,
      source: `parameter '${param.name}'`,
      assert: {},
      initArg: param.name,
    };
    if (param.reader) materialized.reader = param.reader;

    attributes.set(param.attribute, materialized);
  }

  return { attributes, requiredParams: [...params] };
}
