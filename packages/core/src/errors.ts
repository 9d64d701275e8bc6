import type { URIValidationPolicy } from "./uri.js";

/**
 * Raised by registries when a key has no applicable entry.
 *
 * Not part of the WAMP error taxonomy: callers catch it and fall back to
 * their documented default instead of surfacing it to application code.
 */
export class LookupError extends Error {
  readonly _tag = "LookupError" as const;

  constructor(public readonly key: string) {
    super(`no entry registered for ${key}`);
    this.name = "LookupError";
  }
}

/** Check if an error is a registry lookup miss */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}

/**
 * Raised when a string does not satisfy the URI rules of the requested policy.
 */
export class InvalidUriError extends TypeError {
  readonly _tag = "InvalidUriError" as const;

  constructor(
    public readonly value: string,
    public readonly policy: URIValidationPolicy,
  ) {
    super(`invalid URI '${value}' (${policy.strict ? "strict" : "loose"}, ${policy.match})`);
    this.name = "InvalidUriError";
  }
}
