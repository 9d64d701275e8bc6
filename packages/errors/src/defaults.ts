/**
 * Process-wide default registry.
 *
 * Libraries and applications register their error kinds here during
 * initialization (before any message traffic depends on them). Code that
 * needs isolation, such as tests or multi-tenant hosts, constructs its own
 * ErrorRegistry instead.
 */

import type { URI } from "@wampkit/core";
import type { ErrorMessage } from "@wampkit/protocol";
import {
  type ErrorFactory,
  type ErrorKind,
  ErrorRegistry,
  type RegisterErrorResponseOptions,
} from "./registry.js";
import type { InvocationError } from "./taxonomy/invocation-error.js";

export const defaultErrorRegistry = new ErrorRegistry();

export function registerErrorResponse(
  uri: string,
  factory: ErrorFactory,
  options?: RegisterErrorResponseOptions,
): void {
  defaultErrorRegistry.registerErrorResponse(uri, factory, options);
}

export function registerExceptionUri(kind: ErrorKind, uri: string): void {
  defaultErrorRegistry.registerExceptionUri(kind, uri);
}

export function getExceptionFactory(uri: string): ErrorFactory {
  return defaultErrorRegistry.getExceptionFactory(uri);
}

export function getExceptionUri(kind: ErrorKind): URI {
  return defaultErrorRegistry.getExceptionUri(kind);
}

export function errorToException(message: ErrorMessage): Error {
  return defaultErrorRegistry.errorToException(message);
}

export function exceptionToInvocationError(failure: unknown): InvocationError {
  return defaultErrorRegistry.exceptionToInvocationError(failure);
}

export function setInvocationError(failure: object, err: InvocationError): void {
  defaultErrorRegistry.setInvocationError(failure, err);
}
