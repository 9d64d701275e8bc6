import { InvalidUriError } from "./errors.js";

declare const uriBrand: unique symbol;

/**
 * Validated, hierarchical WAMP identifier (dot-separated segments).
 *
 * A URI is a plain string at runtime, so it compares with `===` and works
 * as a `Map` key. The brand only records that it passed validation.
 */
export type URI = string & { readonly [uriBrand]: true };

/**
 * How a registered URI is matched against concrete URIs.
 * `prefix` and `wildcard` patterns may only be used where a registry
 * opts into them explicitly.
 */
export type MatchPolicy = "exact" | "prefix" | "wildcard";

export interface URIValidationPolicy {
  /** Restrict segments to lowercase letters, digits and `_` */
  readonly strict: boolean;
  /** `wildcard` permits empty segments */
  readonly match: MatchPolicy;
}

export const DEFAULT_URI_POLICY: URIValidationPolicy = {
  strict: false,
  match: "exact",
} as const;

const LOOSE_URI = /^([^\s.#]+\.)*([^\s.#]+)$/;
const STRICT_URI = /^([0-9a-z_]+\.)*([0-9a-z_]+)$/;
const LOOSE_WILDCARD_URI = /^(([^\s.#]+\.)|\.)*([^\s.#]+)?$/;
const STRICT_WILDCARD_URI = /^(([0-9a-z_]+\.)|\.)*([0-9a-z_]+)?$/;

function patternFor(policy: URIValidationPolicy): RegExp {
  if (policy.match === "wildcard") {
    return policy.strict ? STRICT_WILDCARD_URI : LOOSE_WILDCARD_URI;
  }
  return policy.strict ? STRICT_URI : LOOSE_URI;
}

function resolvePolicy(policy?: Partial<URIValidationPolicy>): URIValidationPolicy {
  return { ...DEFAULT_URI_POLICY, ...policy };
}

/**
 * Check if a value is a valid URI under the given policy (loose, exact by default).
 */
export function isUri(value: unknown, policy?: Partial<URIValidationPolicy>): value is URI {
  if (typeof value !== "string" || value.length === 0) {
    return false;
  }
  return patternFor(resolvePolicy(policy)).test(value);
}

/**
 * Validate a raw string and return it as a URI.
 *
 * @throws {InvalidUriError} If `raw` is empty or violates the policy
 *
 * @example
 * ```typescript
 * const uri = asUri("com.example.bad_arg");
 * asUri("com..example"); // throws, empty segment
 * asUri("com..example", { match: "wildcard" }); // ok
 * ```
 */
export function asUri(raw: string, policy?: Partial<URIValidationPolicy>): URI {
  if (isUri(raw, policy)) {
    return raw;
  }
  throw new InvalidUriError(raw, resolvePolicy(policy));
}

/** Split a URI into its dot-separated segments */
export function uriSegments(uri: string): string[] {
  return uri.split(".");
}

// ---------------------------------------------------------------------------
// Well-known URIs
// ---------------------------------------------------------------------------

/** Predefined error and close-reason URIs of the WAMP basic and advanced profiles */
export const WAMP_URIS = {
  INVALID_URI: "wamp.error.invalid_uri",
  NO_SUCH_PROCEDURE: "wamp.error.no_such_procedure",
  PROCEDURE_ALREADY_EXISTS: "wamp.error.procedure_already_exists",
  NO_SUCH_REGISTRATION: "wamp.error.no_such_registration",
  NO_SUCH_SUBSCRIPTION: "wamp.error.no_such_subscription",
  INVALID_ARGUMENT: "wamp.error.invalid_argument",
  SYSTEM_SHUTDOWN: "wamp.close.system_shutdown",
  CLOSE_REALM: "wamp.close.close_realm",
  GOODBYE_AND_OUT: "wamp.close.goodbye_and_out",
  PROTOCOL_VIOLATION: "wamp.error.protocol_violation",
  NOT_AUTHORIZED: "wamp.error.not_authorized",
  AUTHORIZATION_FAILED: "wamp.error.authorization_failed",
  AUTHENTICATION_FAILED: "wamp.error.authentication_failed",
  NO_SUCH_REALM: "wamp.error.no_such_realm",
  NO_SUCH_ROLE: "wamp.error.no_such_role",
  NO_SUCH_SESSION: "wamp.error.no_such_session",
  CANCELED: "wamp.error.canceled",
  TIMEOUT: "wamp.error.timeout",
  OPTION_NOT_ALLOWED: "wamp.error.option_not_allowed",
  NO_ELIGIBLE_CALLEE: "wamp.error.no_eligible_callee",
  OPTION_DISALLOWED_DISCLOSE_ME: "wamp.error.option_disallowed.disclose_me",
  NETWORK_FAILURE: "wamp.error.network_failure",
  RUNTIME_ERROR: "wamp.error.runtime_error",
} as const;

export type WampUriName = keyof typeof WAMP_URIS;

/** Generic URI reported for failures that have no registered URI of their own */
export const RUNTIME_ERROR: URI = asUri(WAMP_URIS.RUNTIME_ERROR);
