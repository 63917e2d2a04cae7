/**
 * Typed error model.
 *
 * Every failure the orchestrator reports (configuration problems, identity
 * collisions, build failures, artifact handling) is expressed as a
 * TypedError so it can be listed in the run report, serialized into API
 * responses and matched on by code.
 */

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "ARTIFACT.EXTRACTION"). */
  code: string;
  message: string;
  /** Job identity the error belongs to, if any. */
  identity?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  identity?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    identity: params.identity,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Domain portion of an error code ("BUILD.TIMEOUT" -> "BUILD"). */
export function errorDomain(error: TypedError): string {
  const dot = error.code.indexOf('.');
  return dot === -1 ? error.code : error.code.slice(0, dot);
}

// --- Factories ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: `${resourceType.toUpperCase()}.NOT_FOUND`,
    message: `${resourceType} not found: ${resourceId}`,
  });
}

export function identityCollisionError(
  collisions: Array<{ identity: string; cells: Array<Record<string, string>> }>,
): TypedError {
  const first = collisions[0];
  const differing = differingDimensions(collisions.flatMap((c) => c.cells));
  const summary = first
    ? `${collisions.length} job identit${collisions.length === 1 ? 'y' : 'ies'} shared by distinct cells (first: "${first.identity}")`
    : 'Job identities collide';
  const hint =
    differing.length > 0
      ? `; the cells differ only in ${differing.map((name) => `"${name}"`).join(', ')}. Add ${differing.length === 1 ? 'it' : 'them'} to identityDimensions or exclude all but one value per identity`
      : '';
  return createTypedError({
    code: 'MATRIX.COLLISION',
    message: summary + hint,
    details: { collisions },
    suggestedFixes: [
      {
        type: 'ADD_EXCLUSION',
        params: { identities: collisions.map((c) => c.identity) },
        description: 'Exclude one of each colliding pair, for example by pinning each host to one architecture',
      },
      {
        type: 'ADD_IDENTITY_DIMENSION',
        params: { dimensions: differing },
        description: 'Name the differing dimensions in identityDimensions so each cell gets its own identity',
      },
    ],
  });
}

/** Dimensions whose value is not the same across every cell. */
function differingDimensions(cells: Array<Record<string, string>>): string[] {
  const names = [...new Set(cells.flatMap((cell) => Object.keys(cell)))];
  return names.filter((name) => new Set(cells.map((cell) => cell[name])).size > 1);
}

export function buildFailureError(identity: string, reason: string): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: reason,
    identity,
  });
}

export function buildTimeoutError(identity: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'BUILD.TIMEOUT',
    message: `Build timed out after ${timeoutMs}ms`,
    identity,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function extractionError(identity: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'ARTIFACT.EXTRACTION',
    message,
    identity,
    details,
  });
}

export function publicationError(identity: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'ARTIFACT.PUBLICATION',
    message,
    identity,
    retryable: true,
    details,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    details: reason ? { reason } : undefined,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/**
 * Base class for thrown orchestrator errors. The typed payload is what
 * callers inspect; the Error shell only carries a stack.
 */
export class OrchestratorError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

/** Malformed configuration. Raised before any job starts. */
export class ConfigurationError extends OrchestratorError {
  constructor(public readonly errors: TypedError[]) {
    super(
      errors.length === 1
        ? errors[0]
        : createTypedError({
            code: 'CONFIG.INVALID',
            message: `Configuration has ${errors.length} errors: ${errors.map((e) => e.message).join('; ')}`,
            details: { errors },
          }),
    );
    this.name = 'ConfigurationError';
  }
}

/** Two distinct cells resolve to one job identity. Raised before dispatch. */
export class CollisionError extends OrchestratorError {
  constructor(
    public readonly collisions: Array<{ identity: string; cells: Array<Record<string, string>> }>,
  ) {
    super(identityCollisionError(collisions));
    this.name = 'CollisionError';
  }
}

/** Convert anything thrown into a TypedError. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof OrchestratorError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
  });
}
