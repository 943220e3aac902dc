import { CompiledClass } from './compiled-class.js';
import { DefaultValue, DispatchKind, DispatchTable } from './types.js';

export interface SelectorLayout {
  selector: string;
  kind: DispatchKind;
  source: string;
}

export interface AttributeLayout {
  source: string;
  default?: string;
  init_arg?: string;
  assert?: string[];
  reader?: string;
  writer?: string;
}

export interface ParameterLayout {
  assert?: string[];
  optional?: true;
  default?: string;
  attribute?: string;
}

export interface ClassLayout {
  name: string;
  anonymous: boolean;
  interface: SelectorLayout[];
  semiprivate: SelectorLayout[];
  attributes: Record<string, AttributeLayout>;
  parameters: Record<string, ParameterLayout>;
  class_methods: string[];
}

function describeDefault(value: DefaultValue): string {
  if (typeof value === 'function') return '<producer>';
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

function describeTable(table: DispatchTable): SelectorLayout[] {
  return Array.from(table.values(), ({ selector, kind, source }) => ({ selector, kind, source }));
}

/**
 * Plain-data view of a compiled class, for `minion inspect`
 */
export function describeClass(compiled: CompiledClass): ClassLayout {
  const attributes: Record<string, AttributeLayout> = {};
  for (const attribute of compiled.attributeSchema.values()) {
    const layout: AttributeLayout = { source: attribute.source };
    if (attribute.default !== undefined) layout.default = describeDefault(attribute.default);
    if (attribute.initArg) layout.init_arg = attribute.initArg;
    const asserts = Object.keys(attribute.assert);
    if (asserts.length > 0) layout.assert = asserts;
    if (attribute.reader) layout.reader = attribute.reader;
    if (attribute.writer) layout.writer = attribute.writer;
    attributes[attribute.name] = layout;
  }

  const parameters: Record<string, ParameterLayout> = {};
  for (const param of compiled.requiredParams) {
    const layout: ParameterLayout = {};
    const asserts = Object.keys(param.assert);
    if (asserts.length > 0) layout.assert = asserts;
    if (param.optional) layout.optional = true;
    if (param.default !== undefined) layout.default = describeDefault(param.default);
    if (param.attribute) layout.attribute = param.attribute;
    parameters[param.name] = layout;
  }

  return {
    name: compiled.name,
    anonymous: compiled.anonymous,
    interface: describeTable(compiled.publicDispatch),
    semiprivate: describeTable(compiled.semiprivateDispatch),
    attributes,
    parameters,
    class_methods: Array.from(compiled.classMethods.keys()),
  };
}
