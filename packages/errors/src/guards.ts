/**
 * Type guards for the failure variants most often matched by callers.
 */

import { ErrorResponse } from "./taxonomy/error-response.js";
import { Interrupt } from "./taxonomy/interrupt.js";
import { InvocationError } from "./taxonomy/invocation-error.js";

/** Check if an error is an unregistered remote error */
export function isErrorResponse(error: unknown): error is ErrorResponse {
  return error instanceof ErrorResponse;
}

/** Check if an error is a failure destined for a remote caller */
export function isInvocationError(error: unknown): error is InvocationError {
  return error instanceof InvocationError;
}

/** Check if an error is a cancellation request */
export function isInterrupt(error: unknown): error is Interrupt {
  return error instanceof Interrupt;
}
