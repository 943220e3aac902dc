import { AssertionError, AssertionSubject } from './errors.js';
import { PredicateMap } from './types.js';

export type ValidationResult =
  | { ok: true }
  | { ok: false; description: string };

/**
 * Run named predicates against a value in declaration order.
 * The first predicate returning false determines the reported description.
 * Descriptions are object keys, so integer-like ones run first; specification
 * validation rejects them.
 */
export function validate(value: unknown, predicates: PredicateMap | undefined): ValidationResult {
  if (!predicates) {
    return { ok: true };
  }

  for (const [description, predicate] of Object.entries(predicates)) {
    if (!predicate(value)) {
      return { ok: false, description };
    }
  }

  return { ok: true };
}

/**
 * Validate and throw an AssertionError naming the subject and failing predicate
 *
 * @example
 * assertValue('Attribute', 'count', 1.5, { integer: Number.isInteger })
 * // throws: Attribute 'count' is not integer
 */
export function assertValue(
  subject: AssertionSubject,
  target: string,
  value: unknown,
  predicates: PredicateMap | undefined,
  className?: string
): void {
  const result = validate(value, predicates);
  if (!result.ok) {
    throw new AssertionError(subject, target, result.description, className);
  }
}
