/**
 * Error taxonomy for the journaling pipeline.
 *
 * Only PersistenceError is ever allowed to reach a caller of saveEntry, and
 * only SessionEndedError a caller of handleTurn. Everything else is recovered inside the pipeline (fallback, empty result,
 * regeneration) and only shows up in logs and stage results.
 */

export type DependencyName = 'embedding' | 'vector-search' | 'graph' | 'generation';

/**
 * An external capability was unreachable, rate-limited or timed out.
 */
export class DependencyUnavailableError extends Error {
  readonly dependency: DependencyName;

  constructor(dependency: DependencyName, message: string, options?: { cause?: unknown }) {
    super(`${dependency} unavailable: ${message}`, options);
    this.name = 'DependencyUnavailableError';
    this.dependency = dependency;
  }
}

/**
 * Structured model output did not match the required schema.
 */
export class SchemaValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * A generated reply broke the response-format contract.
 */
export class FormatContractViolation extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Reply violates format contract: ${violations.join('; ')}`);
    this.name = 'FormatContractViolation';
    this.violations = violations;
  }
}

/**
 * The journal entry itself could not be stored or read back.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

/**
 * A turn arrived for a session that was already saved as an entry.
 */
export class SessionEndedError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} has ended; start a new session to keep journaling`);
    this.name = 'SessionEndedError';
    this.sessionId = sessionId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Wrap any thrown value as DependencyUnavailableError, keeping existing ones as they are.
 */
export function asUnavailable(dependency: DependencyName, error: unknown): DependencyUnavailableError {
  if (error instanceof DependencyUnavailableError) {
    return error;
  }
  return new DependencyUnavailableError(dependency, errorMessage(error), { cause: error });
}
