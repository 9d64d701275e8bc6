/**
 * JSON form of a WampError, used for structured logging.
 */
export interface WampErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly message: string;
  readonly [key: string]: unknown;
}

/**
 * Base class for every WAMP related failure.
 *
 * Catch this to handle all failures raised by the client uniformly; match on
 * `instanceof` of a subclass (or on `_tag`) for a specific variant.
 */
export abstract class WampError extends Error {
  abstract readonly _tag: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): WampErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
    };
  }
}

/** Check if a value is any WAMP failure */
export function isWampError(error: unknown): error is WampError {
  return error instanceof WampError;
}
