/**
 * Outbound error payload
 *
 * Wire shape of an InvocationError handed to the transport. Absent fields
 * are omitted, never encoded as empty containers.
 */

import {
  type URI,
  type WampDict,
  WampDictSchema,
  type WampList,
  WampListSchema,
} from "@wampkit/core";
import { type ErrorMessage, MessageType, UriSchema } from "@wampkit/protocol";
import { z } from "zod";
import { defaultErrorRegistry } from "../defaults.js";
import type { ErrorRegistry } from "../registry.js";
import { InvocationError } from "../taxonomy/invocation-error.js";

export interface InvocationErrorPayload {
  readonly uri: URI;
  readonly args?: WampList;
  readonly kwargs?: WampDict;
  readonly details?: WampDict;
}

export const InvocationErrorPayloadSchema = z
  .object({
    uri: UriSchema,
    args: WampListSchema.optional(),
    kwargs: WampDictSchema.optional(),
    details: WampDictSchema.optional(),
  })
  .strict();

/**
 * Payload of an InvocationError, leaving out absent fields.
 */
export function toInvocationErrorPayload(err: InvocationError): InvocationErrorPayload {
  return {
    uri: err.uri,
    ...(err.args !== undefined ? { args: err.args } : {}),
    ...(err.kwargs !== undefined ? { kwargs: err.kwargs } : {}),
    ...(err.details !== undefined ? { details: err.details } : {}),
  };
}

/**
 * Validate a payload with Zod and rebuild the InvocationError.
 *
 * @throws {ZodError} If the payload is malformed
 */
export function invocationErrorFromPayload(raw: unknown): InvocationError {
  const parsed = InvocationErrorPayloadSchema.parse(raw);
  return new InvocationError(parsed.uri, {
    args: parsed.args,
    kwargs: parsed.kwargs,
    details: parsed.details,
  });
}

/**
 * ERROR message replying to a request with an InvocationError.
 */
export function toErrorMessage(
  err: InvocationError,
  requestId: number,
  requestType: MessageType = MessageType.INVOCATION,
): ErrorMessage {
  return {
    kind: "ERROR",
    requestType,
    requestId,
    details: err.details ?? {},
    error: err.uri,
    args: err.args ?? [],
    kwargs: err.kwargs ?? {},
  };
}

/**
 * ERROR message replying to an invocation whose handler failed with `failure`.
 */
export function failureToErrorMessage(
  failure: unknown,
  requestId: number,
  registry: ErrorRegistry = defaultErrorRegistry,
): ErrorMessage {
  return toErrorMessage(registry.exceptionToInvocationError(failure), requestId);
}
