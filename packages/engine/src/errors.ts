/**
 * Error classes for the engine bridge
 */

/**
 * Base error class for engine bridge errors
 */
export class EngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * Error held by the bridge once the engine cannot be used. Play carries on
 * without analysis; the next analysis request starts a fresh process.
 */
export class EngineUnavailableError extends EngineError {
  constructor(
    public readonly reason: string,
    cause?: Error,
  ) {
    super(`Engine unavailable: ${reason}${cause ? ` (${cause.message})` : ''}`, { cause });
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Error raised when the engine does not answer in time
 */
export class EngineTimeoutError extends EngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Engine did not answer '${operation}' within ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error raised for engine output that cannot be parsed or does not fit the
 * position it was computed for
 */
export class MalformedResponseError extends EngineError {
  constructor(
    public readonly line: string,
    public readonly detail: string,
  ) {
    super(`Malformed engine response "${line}": ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Wrap anything caught from the transport as an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
