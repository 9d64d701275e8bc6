import type { URI, WampDict } from "@wampkit/core";
import type { AbortMessage } from "@wampkit/protocol";
import { WampError } from "../base.js";

/** Transport level failure (connection lost, frame could not be sent) */
export class TransportError extends WampError {
  readonly _tag = "TransportError" as const;

  constructor(message = "transport error", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The router aborted the session join.
 * Carries the machine-readable reason and the details sent with the ABORT.
 */
export class AbortError extends WampError {
  readonly _tag = "AbortError" as const;
  readonly reason: URI;
  readonly details: WampDict;

  constructor(message: AbortMessage) {
    super(`${message.reason} (details = ${JSON.stringify(message.details)})`);
    this.reason = message.reason;
    this.details = message.details;
  }

  override toString(): string {
    return this.message;
  }

  override toJSON() {
    return { ...super.toJSON(), reason: this.reason, details: this.details };
  }
}

/** Authentication was rejected during the join */
export class AuthError extends WampError {
  readonly _tag = "AuthError" as const;

  constructor(message = "authentication failed", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Operation attempted after the client was closed */
export class ClientClosed extends WampError {
  readonly _tag = "ClientClosed" as const;

  constructor(message = "client closed") {
    super(message);
  }
}
