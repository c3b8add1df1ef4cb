/**
 * Engine error taxonomy
 *
 * - SourceError: transient, per-source; retried on the next cycle
 * - DispatchError: delivery failed after the notification record was committed
 * - DataInconsistencyError: malformed snapshot, discarded and flagged for review
 * - EngineStartupError: the only fatal condition (subscriptions unavailable at start)
 */

export type SourceErrorCode = 'SOURCE_UNAVAILABLE' | 'SOURCE_TIMEOUT' | 'SOURCE_DATA_INVALID';

export abstract class SourceError extends Error {
  abstract readonly code: SourceErrorCode;

  constructor(
    public readonly sourceId: string,
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      sourceId: this.sourceId,
    };
  }
}

export class SourceUnavailableError extends SourceError {
  public override readonly code = 'SOURCE_UNAVAILABLE';

  constructor(sourceId: string, message = 'Booking system unavailable', cause?: unknown) {
    super(sourceId, message, cause);
    this.name = 'SourceUnavailableError';
  }
}

export class SourceTimeoutError extends SourceError {
  public override readonly code = 'SOURCE_TIMEOUT';

  constructor(
    sourceId: string,
    public readonly timeoutMs: number
  ) {
    super(sourceId, `Booking system did not respond within ${timeoutMs}ms`);
    this.name = 'SourceTimeoutError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), timeoutMs: this.timeoutMs };
  }
}

export class SourceDataInvalidError extends SourceError {
  public override readonly code = 'SOURCE_DATA_INVALID';

  constructor(
    sourceId: string,
    public readonly issues: string[]
  ) {
    super(sourceId, `Booking system returned an invalid snapshot: ${issues.join('; ')}`);
    this.name = 'SourceDataInvalidError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/**
 * Raised when a snapshot passes schema validation but breaks a grid invariant
 * (overlapping slots, start >= end, slot filed under the wrong court).
 */
export class DataInconsistencyError extends SourceDataInvalidError {
  constructor(sourceId: string, issues: string[]) {
    super(sourceId, issues);
    this.name = 'DataInconsistencyError';
  }
}

export class DispatchError extends Error {
  public readonly code = 'DISPATCH_FAILED';

  constructor(
    public readonly subscriptionId: string,
    public readonly digestId: string,
    message: string
  ) {
    super(message);
    this.name = 'DispatchError';
    Object.setPrototypeOf(this, DispatchError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      subscriptionId: this.subscriptionId,
      digestId: this.digestId,
    };
  }
}

export class EngineStartupError extends Error {
  public readonly code = 'ENGINE_STARTUP_FAILED';

  constructor(message: string, public override readonly cause?: unknown) {
    super(message);
    this.name = 'EngineStartupError';
    Object.setPrototypeOf(this, EngineStartupError.prototype);
  }
}

export class EngineNotRunningError extends Error {
  public readonly code = 'ENGINE_NOT_RUNNING';

  constructor() {
    super('Engine is not running');
    this.name = 'EngineNotRunningError';
    Object.setPrototypeOf(this, EngineNotRunningError.prototype);
  }
}

export class OperationTimeoutError extends Error {
  public readonly code = 'OPERATION_TIMEOUT';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    Object.setPrototypeOf(this, OperationTimeoutError.prototype);
  }
}

export const isSourceError = (error: unknown): error is SourceError => error instanceof SourceError;

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
