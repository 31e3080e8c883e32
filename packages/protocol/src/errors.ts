import type { ErrorKind, RunError } from './types.js';

/**
 * Base class for every failure the orchestrator reasons about.
 * `retryable` is the only thing the Runner looks at when deciding to retry.
 */
export abstract class OrchestrationError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toRunError(): RunError {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }
}

/**
 * Rate limit, timeout, transient I/O
 */
export class TransientExternalError extends OrchestrationError {
  readonly kind = 'TransientExternalError' as const;
  readonly retryable = true;
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/**
 * Malformed request, auth failure: retrying cannot help
 */
export class PermanentExternalError extends OrchestrationError {
  readonly kind = 'PermanentExternalError' as const;
  readonly retryable = false;
}

/**
 * A human request could not be resolved to any agent
 */
export class RoutingAmbiguityError extends OrchestrationError {
  readonly kind = 'RoutingAmbiguityError' as const;
  readonly retryable = false;
}

/**
 * An upstream run in a dependency chain failed, so the downstream run was skipped
 */
export class DependencyUnmetError extends OrchestrationError {
  readonly kind = 'DependencyUnmetError' as const;
  readonly retryable = false;

  constructor(
    readonly agentId: string,
    readonly upstreamAgentIds: string[],
  ) {
    super(`Skipped ${agentId}: upstream ${upstreamAgentIds.join(', ')} did not succeed`);
  }
}

/**
 * The post-call memory write failed; the reasoning result could not be persisted
 */
export class MemoryWriteError extends OrchestrationError {
  readonly kind = 'MemoryWriteError' as const;
  readonly retryable = false;
}

function hasRetryableFlag(error: unknown): error is { retryable: boolean; message?: unknown } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'retryable' in error &&
    typeof error.retryable === 'boolean'
  );
}

/**
 * Normalise anything thrown into the error record attached to a Run.
 * Errors that carry no classification are treated as permanent.
 */
export function toRunError(error: unknown): RunError {
  if (error instanceof OrchestrationError) {
    return error.toRunError();
  }

  const message = error instanceof Error ? error.message : String(error);

  if (hasRetryableFlag(error)) {
    return {
      kind: error.retryable ? 'TransientExternalError' : 'PermanentExternalError',
      message,
      retryable: error.retryable,
    };
  }

  return { kind: 'PermanentExternalError', message, retryable: false };
}
