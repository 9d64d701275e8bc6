import type { InvocationError } from "./taxonomy/invocation-error.js";

/**
 * Side-table associating arbitrary failures with the InvocationError to
 * report for them. Entries live exactly as long as the failure object.
 */
const attached = new WeakMap<object, InvocationError>();

/**
 * Associate `err` with `failure`, replacing any earlier association.
 *
 * @returns The InvocationError previously attached, if any
 */
export function attachInvocationError(failure: object, err: InvocationError): InvocationError | undefined {
  const previous = attached.get(failure);
  attached.set(failure, err);
  return previous;
}

/**
 * The InvocationError attached to a failure.
 * Returns undefined when nothing is attached (and for primitives, which
 * cannot carry an attachment).
 */
export function getAttachedInvocationError(failure: unknown): InvocationError | undefined {
  if ((typeof failure !== "object" && typeof failure !== "function") || failure === null) {
    return undefined;
  }
  return attached.get(failure);
}

/**
 * Remove the attachment from a failure.
 *
 * @returns true if an attachment was removed
 */
export function clearInvocationError(failure: object): boolean {
  return attached.delete(failure);
}
