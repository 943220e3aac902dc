import { z } from 'zod';
import { SpecError } from './errors.js';
import {
  SourceDefinition,
  SourceDefinitionSchema,
  Specification,
  SpecificationSchema,
} from './types.js';

/**
 * Replace a union failure with the issues of the one branch whose type
 * matched, so an inline source reports its own defect
 */
function flattenIssues(issues: readonly z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) => {
    if (issue.code !== z.ZodIssueCode.invalid_union) {
      return [issue];
    }

    const matched = issue.unionErrors.filter(
      (branch) => !branch.issues.every(
        (inner) => inner.code === z.ZodIssueCode.invalid_type && inner.path.length === issue.path.length
      )
    );
    const [only] = matched;
    return matched.length === 1 && only ? flattenIssues(only.issues) : [issue];
  });
}

/**
 * Render the zod issues the way config loading reports them: one line per issue
 */
export function formatIssues(error: z.ZodError): string {
  return flattenIssues(error.issues)
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('\n  ');
}

function nameOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return raw.name;
  }
  return undefined;
}

/**
 * Check a class specification without mutating it
 *
 * @returns a parsed copy of the specification
 * @throws SpecError listing every structural defect
 */
export function validateSpecification(raw: unknown): Specification {
  const result = SpecificationSchema.safeParse(raw);

  if (!result.success) {
    const className = nameOf(raw);
    throw new SpecError(
      `Invalid specification${className ? ` for class '${className}'` : ''}:\n  ${formatIssues(result.error)}`,
      'A specification needs a non-empty interface and an implementation or roles',
      className
    );
  }

  return result.data;
}

/**
 * Check a standalone implementation or role definition
 */
export function validateSource(raw: unknown): SourceDefinition {
  const result = SourceDefinitionSchema.safeParse(raw);

  if (!result.success) {
    const sourceName = nameOf(raw);
    throw new SpecError(
      `Invalid source${sourceName ? ` '${sourceName}'` : ''}:\n  ${formatIssues(result.error)}`
    );
  }

  return result.data;
}

export function isSpecificationModule(value: unknown): value is { specification: unknown } {
  return typeof value === 'object' && value !== null && 'specification' in value;
}
