/**
 * @wampkit/errors
 *
 * Error taxonomy and error translation for a WAMP client.
 *
 * Inbound, ERROR messages become typed failures through the URI → factory
 * table (`errorToException`), falling back to ErrorResponse for unknown URIs.
 * Outbound, any failure raised by a procedure becomes an InvocationError
 * (`exceptionToInvocationError`) through, in order: the failure itself, an
 * attached InvocationError, the class → URI table, or the generic
 * runtime-error URI.
 */

// ============================================================================
// TAXONOMY
// ============================================================================

export { isWampError, WampError, type WampErrorJSON } from "./base.js";

export {
  AbortError,
  AuthError,
  ClientClosed,
  ErrorResponse,
  Interrupt,
  InvalidMessage,
  InvocationError,
  type InvocationErrorInit,
  TransportError,
  UnexpectedMessageError,
} from "./taxonomy/index.js";

export { isErrorResponse, isInterrupt, isInvocationError } from "./guards.js";

// ============================================================================
// CATALOG
// ============================================================================

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCategory,
  getCatalogEntriesByCategory,
  getCatalogEntry,
  isWellKnownErrorUri,
  type WellKnownErrorUri,
} from "./catalog.js";

// ============================================================================
// REGISTRY
// ============================================================================

export {
  DEFAULT_ERROR_REGISTRY_CONFIG,
  type DiagnosticSink,
  type ErrorRegistryConfig,
  ErrorRegistryConfigSchema,
  LOG_TAG,
  type ResolvedErrorRegistryConfig,
  resolveErrorRegistryConfig,
} from "./config.js";

export {
  type ErrorFactory,
  type ErrorKind,
  ErrorRegistry,
  type RegisterErrorResponseOptions,
  RegistrySealedError,
} from "./registry.js";

export { clearInvocationError, getAttachedInvocationError } from "./attachment.js";

export {
  defaultErrorRegistry,
  errorToException,
  exceptionToInvocationError,
  getExceptionFactory,
  getExceptionUri,
  registerErrorResponse,
  registerExceptionUri,
  setInvocationError,
} from "./defaults.js";

// ============================================================================
// WIRE
// ============================================================================

export {
  failureToErrorMessage,
  type InvocationErrorPayload,
  InvocationErrorPayloadSchema,
  invocationErrorFromPayload,
  toErrorMessage,
  toInvocationErrorPayload,
} from "./wire/payload.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@wampkit/errors";
export const PACKAGE_VERSION = "0.1.0";
