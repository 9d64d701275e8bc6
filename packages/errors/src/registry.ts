import {
  asUri,
  isLookupError,
  LookupError,
  type MatchPolicy,
  type URI,
  URIMap,
  type WampList,
  WampListSchema,
} from "@wampkit/core";
import type { ErrorMessage } from "@wampkit/protocol";
import { attachInvocationError, getAttachedInvocationError } from "./attachment.js";
import { WampError } from "./base.js";
import {
  type ErrorRegistryConfig,
  type ResolvedErrorRegistryConfig,
  resolveErrorRegistryConfig,
} from "./config.js";
import { ErrorResponse } from "./taxonomy/error-response.js";
import { InvocationError } from "./taxonomy/invocation-error.js";

/** Creates the failure to raise for a remote ERROR message */
export type ErrorFactory = (message: ErrorMessage) => Error;

/** Identity of a failure kind: its class */
export type ErrorKind = abstract new (...args: never[]) => Error;

export interface RegisterErrorResponseOptions {
  /** Match policy of the registered URI (default: "exact") */
  readonly match?: MatchPolicy;
}

/**
 * Raised when registering into a registry after its initialization phase ended.
 */
export class RegistrySealedError extends WampError {
  readonly _tag = "RegistrySealedError" as const;

  constructor(key: string) {
    super(`error registry is sealed, cannot register ${key}`);
  }
}

/** Class of an object failure; undefined for null-prototype objects */
function constructorOf(failure: object): unknown {
  const proto: unknown = Object.getPrototypeOf(failure);
  if (typeof proto !== "object" || proto === null || !("constructor" in proto)) {
    return undefined;
  }
  return proto.constructor;
}

function kindName(failure: unknown): string {
  if (typeof failure === "object" && failure !== null) {
    const kind = constructorOf(failure);
    return typeof kind === "function" && kind.name ? kind.name : "Object";
  }
  return typeof failure;
}

/**
 * Positional arguments carried by a failure:
 * - an explicit `args` array of wire values, when the failure has one
 * - otherwise the message of an Error, when it is not empty
 * - a thrown primitive is its own single argument
 */
function positionalArgs(failure: unknown): WampList {
  if (failure instanceof Error) {
    if ("args" in failure) {
      const parsed = WampListSchema.safeParse(failure.args);
      if (parsed.success) {
        return parsed.data;
      }
    }
    return failure.message ? [failure.message] : [];
  }
  if (typeof failure === "string" || typeof failure === "number" || typeof failure === "boolean") {
    return [failure];
  }
  return [];
}

/**
 * Translates between remote ERROR messages and local failures.
 *
 * Holds two independent tables:
 * - inbound: error URI → factory building the failure raised to application code
 * - outbound: failure class → URI reported to a remote caller
 *
 * Registration belongs to the initialization phase. Once `seal()` is called
 * the tables are read-only, so every lookup observes a fully populated registry.
 *
 * @example
 * ```typescript
 * const registry = new ErrorRegistry();
 * registry.registerErrorResponse("com.example.bad_arg", (msg) => new BadArgError(msg));
 * registry.registerExceptionUri(BadArgError, "com.example.bad_arg");
 * registry.seal();
 *
 * const failure = registry.errorToException(errorMessage);
 * const reply = registry.exceptionToInvocationError(failure);
 * ```
 */
export class ErrorRegistry {
  private readonly factories = new URIMap<ErrorFactory>();
  private readonly exceptionUris = new Map<unknown, URI>();
  private readonly config: ResolvedErrorRegistryConfig;
  private sealed = false;

  constructor(config: ErrorRegistryConfig = {}) {
    this.config = resolveErrorRegistryConfig(config);
  }

  /** URI reported for failures without a registered URI */
  get runtimeErrorUri(): URI {
    return this.config.runtimeErrorUri;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * End the initialization phase. Later registrations throw RegistrySealedError.
   */
  seal(): void {
    this.sealed = true;
  }

  // --------------------------------------------------------------------------
  // Inbound: ERROR message → failure
  // --------------------------------------------------------------------------

  /**
   * Register the factory used for ERROR messages with the given URI.
   * A later registration for the same URI replaces the earlier one.
   *
   * @throws {InvalidUriError} If `uri` is not a valid URI
   * @throws {TypeError} If `factory` is not callable
   * @throws {RegistrySealedError} If the registry is sealed
   */
  registerErrorResponse(uri: string, factory: ErrorFactory, options?: RegisterErrorResponseOptions): void {
    const match = options?.match ?? "exact";
    const key = asUri(uri, { strict: this.config.strictUris, match });
    if (typeof factory !== "function") {
      throw new TypeError("error factory must be callable");
    }
    this.assertOpen(key);

    if (this.factories.register(key, factory, { match }) !== undefined) {
      this.config.onDiagnostic(`replacing error factory for ${key} (${match})`);
    }
  }

  /**
   * Factory registered for a URI.
   *
   * @throws {LookupError} If no factory applies to the URI
   */
  getExceptionFactory(uri: string): ErrorFactory {
    return this.factories.resolve(uri);
  }

  /**
   * Failure to raise for a remote ERROR message.
   *
   * Calls the factory registered for `message.error`; for an unknown URI
   * returns an ErrorResponse wrapping the message. Never throws for an
   * unregistered URI.
   */
  errorToException(message: ErrorMessage): Error {
    let factory: ErrorFactory;
    try {
      factory = this.getExceptionFactory(message.error);
    } catch (error) {
      if (isLookupError(error)) {
        return new ErrorResponse(message);
      }
      throw error;
    }
    return factory(message);
  }

  // --------------------------------------------------------------------------
  // Outbound: failure → InvocationError
  // --------------------------------------------------------------------------

  /**
   * Register the URI reported for failures of exactly this class.
   * Subclasses are not matched; register them separately.
   *
   * @throws {InvalidUriError} If `uri` is not a valid URI
   * @throws {RegistrySealedError} If the registry is sealed
   */
  registerExceptionUri(kind: ErrorKind, uri: string): void {
    const value = asUri(uri, { strict: this.config.strictUris });
    this.assertOpen(kind.name);

    const previous = this.exceptionUris.get(kind);
    this.exceptionUris.set(kind, value);
    if (previous !== undefined) {
      this.config.onDiagnostic(`replacing URI ${previous} of ${kind.name} with ${value}`);
    }
  }

  /**
   * URI registered for a failure class.
   *
   * @throws {LookupError} If the class was never registered
   */
  getExceptionUri(kind: ErrorKind): URI {
    const uri = this.exceptionUris.get(kind);
    if (uri === undefined) {
      throw new LookupError(kind.name);
    }
    return uri;
  }

  /**
   * The InvocationError to report for a failure, in priority order:
   *
   * 1. the failure itself, when it is an InvocationError
   * 2. the InvocationError attached with `setInvocationError`
   * 3. a new InvocationError with the URI registered for the failure's class
   *    and the failure's positional arguments
   * 4. the same with `runtimeErrorUri`, when the class is not registered
   */
  exceptionToInvocationError(failure: unknown): InvocationError {
    if (failure instanceof InvocationError) {
      return failure;
    }

    const attached = getAttachedInvocationError(failure);
    if (attached !== undefined) {
      return attached;
    }

    return new InvocationError(this.uriFor(failure), { args: positionalArgs(failure) });
  }

  /**
   * Attach the InvocationError to report for `failure`.
   *
   * When `failure` is itself an InvocationError its fields are overwritten
   * in place; otherwise `err` is stored alongside it without touching it.
   */
  setInvocationError(failure: object, err: InvocationError): void {
    if (failure instanceof InvocationError) {
      this.config.onDiagnostic(`overwriting ${failure.toString()} with ${err.toString()}`);
      failure.overwriteWith(err);
      return;
    }

    const previous = attachInvocationError(failure, err);
    if (previous !== undefined) {
      this.config.onDiagnostic(
        `replacing attached ${previous.toString()} of ${kindName(failure)} with ${err.toString()}`,
      );
    }
  }

  private uriFor(failure: unknown): URI {
    if (typeof failure === "object" && failure !== null) {
      const uri = this.exceptionUris.get(constructorOf(failure));
      if (uri !== undefined) {
        return uri;
      }
    }

    this.config.onDiagnostic(
      `no uri registered for exception ${kindName(failure)}. Using ${this.config.runtimeErrorUri}`,
    );
    return this.config.runtimeErrorUri;
  }

  private assertOpen(key: string): void {
    if (this.sealed) {
      throw new RegistrySealedError(key);
    }
  }
}
