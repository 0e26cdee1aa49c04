/**
 * Error types for DAX LSP packages.
 *
 * Shared utilities for error handling across the LSP stack.
 */

/**
 * Valid error layers in the LSP stack.
 */
export type ErrorLayer = 'server' | 'bridge' | 'engine';

/**
 * Base error class for all LSP-related errors.
 *
 * Tracks which layer the error occurred at and supports error chaining
 * via the native Error.cause property.
 */
export class LSPError extends Error {
  /**
   * The layer where this error occurred.
   */
  public readonly layer: ErrorLayer;

  /**
   * The underlying error that caused this error (if any).
   */
  public override readonly cause?: Error;

  /**
   * @param message - Human-readable error message
   * @param layer - The layer where this error occurred
   * @param cause - The underlying error that caused this error
   */
  constructor(message: string, layer: ErrorLayer, cause?: Error) {
    super(message);

    this.name = 'LSPError';
    this.layer = layer;

    if (cause) {
      this.cause = cause;
    }

    // V8-only
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LSPError);
    }
  }

  public override toString(): string {
    return `${this.name} [${this.layer}]: ${this.message}`;
  }

  /**
   * Get the full error chain as a readable string.
   */
  get chain(): string {
    return this.chainErrors.map(err => err.message).join(' -> ');
  }

  /**
   * Get all errors in the chain as an array.
   */
  get chainErrors(): Error[] {
    const errors: Error[] = [this];

    let current = this.cause;
    while (current) {
      errors.push(current);
      current = current.cause instanceof Error ? current.cause : undefined;
    }

    return errors;
  }
}

/**
 * Error reported by the external analysis engine itself.
 *
 * The wire exchange succeeded, but the payload carried an `error` field
 * (unknown method, a failed analysis inside the engine, ...).
 *
 * @example
 * ```typescript
 * if (typeof response.error === 'string') {
 *   throw new EngineError(`engine rejected ${method}: ${response.error}`);
 * }
 * ```
 */
export class EngineError extends LSPError {
  constructor(message: string, cause?: Error) {
    super(message, 'engine', cause);
    this.name = 'EngineError';
  }
}

/**
 * Error that occurs in the bridge layer.
 *
 * Bridge errors typically involve:
 * - Calls made before the engine process was started
 * - stdin write failures (broken pipe)
 * - The engine closing stdout before replying
 * - Response lines that are not valid JSON
 *
 * @example
 * ```typescript
 * try {
 *   await this.process.send(line);
 * } catch (cause) {
 *   throw new BridgeError('failed to write request to engine', cause);
 * }
 * ```
 */
export class BridgeError extends LSPError {
  constructor(message: string, cause?: Error) {
    super(message, 'bridge', cause);
    this.name = 'BridgeError';
  }
}

/**
 * The engine accepted a request but did not answer within the bridge timeout.
 *
 * The session that raised it has been terminated: with no request ids on the
 * wire, a late reply could only ever be matched to the wrong call.
 */
export class EngineUnresponsiveError extends BridgeError {
  /** Timeout that elapsed, in milliseconds. */
  public readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number) {
    super(`Engine did not answer '${method}' within ${timeoutMs}ms`);
    this.name = 'EngineUnresponsiveError';
    this.timeoutMs = timeoutMs;
  }
}
