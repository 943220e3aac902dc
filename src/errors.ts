/**
 * Error taxonomy for the build pipeline and the runtime call surfaces.
 *
 * Build-time: SpecError, CompositionError.
 * Construction-time: AssertionError.
 * Call-time: NoSuchMethodError, SealedRecordViolation.
 */

export class MinionError extends Error {
  constructor(
    message: string,
    public hint?: string,
    public className?: string
  ) {
    super(message);
    this.name = 'MinionError';
  }
}

/**
 * Malformed or incomplete specification (empty interface, unresolved selector)
 */
export class SpecError extends MinionError {
  constructor(message: string, hint?: string, className?: string) {
    super(message, hint, className);
    this.name = 'SpecError';
  }
}

/**
 * Name conflict between sources, or an unmet role requirement
 */
export class CompositionError extends MinionError {
  constructor(message: string, hint?: string, className?: string) {
    super(message, hint, className);
    this.name = 'CompositionError';
  }
}

export type AssertionSubject = 'Parameter' | 'Attribute' | 'Arguments';

/**
 * A value failed a declared predicate.
 * Message shape: `Attribute 'count' is not integer`
 */
export class AssertionError extends MinionError {
  constructor(
    public subject: AssertionSubject,
    public target: string,
    public description: string,
    className?: string
  ) {
    super(`${subject} '${target}' is not ${description}`, undefined, className);
    this.name = 'AssertionError';
  }
}

/**
 * Call to a selector that is not exposed on the surface it was called on.
 */
export class NoSuchMethodError extends MinionError {
  constructor(
    message: string,
    public selector: string,
    className: string
  ) {
    super(message, undefined, className);
    this.name = 'NoSuchMethodError';
  }

  static unknown(selector: string, className: string): NoSuchMethodError {
    return new NoSuchMethodError(
      `Can't locate object method "${selector}" via package "${className}"`,
      selector,
      className
    );
  }

  static notPublic(selector: string, className: string): NoSuchMethodError {
    return new NoSuchMethodError(
      `no such public method "${selector}" on class "${className}"`,
      selector,
      className
    );
  }
}

/**
 * Read or write of a key outside the sealed record's allowlist
 */
export class SealedRecordViolation extends MinionError {
  constructor(
    public key: string,
    action: 'access' | 'delete' | 'modify',
    className?: string
  ) {
    super(
      action === 'access'
        ? `Attempt to access disallowed key '${key}' in a restricted hash`
        : `Attempt to ${action} readonly key '${key}' in a restricted hash`,
      undefined,
      className
    );
    this.name = 'SealedRecordViolation';
  }
}

/**
 * Render an error with its hint, the way CLI output reports failures
 */
export function describeError(error: unknown): string {
  if (error instanceof MinionError) {
    return error.hint ? `${error.message}\n  Hint: ${error.hint}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
