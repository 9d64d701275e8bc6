import {
  isUri,
  type URI,
  type WampDict,
  WampDictSchema,
  type WampList,
  WampListSchema,
  type WampValue,
} from "@wampkit/core";
import { z } from "zod";
import { isMessageType, MessageType } from "./message-type.js";

// ---------------------------------------------------------------------------
// Shared field schemas
// ---------------------------------------------------------------------------

export const UriSchema = z.custom<URI>((value) => isUri(value), { message: "Invalid URI" });

/** WAMP IDs are integers in [0, 2^53] */
export const IdSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER + 1);

export const MessageTypeSchema = z.custom<MessageType>((value) => isMessageType(value), {
  message: "Unknown message type",
});

// ---------------------------------------------------------------------------
// ABORT
// ---------------------------------------------------------------------------

/**
 * Session establishment rejected by the peer.
 * Wire: `[ABORT, Details|dict, Reason|uri]`
 */
export interface AbortMessage {
  readonly kind: "ABORT";
  readonly details: WampDict;
  readonly reason: URI;
}

export const AbortMessageSchema = z
  .tuple([z.literal(MessageType.ABORT), WampDictSchema, UriSchema])
  .transform(
    ([, details, reason]): AbortMessage => ({ kind: "ABORT", details, reason }),
  );

// ---------------------------------------------------------------------------
// ERROR
// ---------------------------------------------------------------------------

/**
 * Failure reply to a request.
 * Wire: `[ERROR, REQUEST.Type|int, REQUEST.Request|id, Details|dict, Error|uri,
 * Arguments|list?, ArgumentsKw|dict?]`
 *
 * Missing payload decodes to an empty list / dict.
 */
export interface ErrorMessage {
  readonly kind: "ERROR";
  readonly requestType: MessageType;
  readonly requestId: number;
  readonly details: WampDict;
  readonly error: URI;
  readonly args: WampList;
  readonly kwargs: WampDict;
}

function errorMessage(
  requestType: MessageType,
  requestId: number,
  details: WampDict,
  error: URI,
  args: WampList = [],
  kwargs: WampDict = {},
): ErrorMessage {
  return { kind: "ERROR", requestType, requestId, details, error, args, kwargs };
}

export const ErrorMessageSchema = z.union([
  z
    .tuple([z.literal(MessageType.ERROR), MessageTypeSchema, IdSchema, WampDictSchema, UriSchema])
    .transform(([, requestType, requestId, details, error]) =>
      errorMessage(requestType, requestId, details, error),
    ),
  z
    .tuple([
      z.literal(MessageType.ERROR),
      MessageTypeSchema,
      IdSchema,
      WampDictSchema,
      UriSchema,
      WampListSchema,
    ])
    .transform(([, requestType, requestId, details, error, args]) =>
      errorMessage(requestType, requestId, details, error, args),
    ),
  z
    .tuple([
      z.literal(MessageType.ERROR),
      MessageTypeSchema,
      IdSchema,
      WampDictSchema,
      UriSchema,
      WampListSchema,
      WampDictSchema,
    ])
    .transform(([, requestType, requestId, details, error, args, kwargs]) =>
      errorMessage(requestType, requestId, details, error, args, kwargs),
    ),
]);

// ---------------------------------------------------------------------------
// EVENT
// ---------------------------------------------------------------------------

/**
 * Publication delivered to a subscriber.
 * Wire: `[EVENT, SUBSCRIBED.Subscription|id, PUBLISHED.Publication|id,
 * Details|dict, PUBLISH.Arguments|list?, PUBLISH.ArgumentsKw|dict?]`
 */
export interface EventMessage {
  readonly kind: "EVENT";
  readonly subscriptionId: number;
  readonly publicationId: number;
  readonly details: WampDict;
  readonly args?: WampList;
  readonly kwargs?: WampDict;
}

export const EventMessageSchema = z.union([
  z
    .tuple([z.literal(MessageType.EVENT), IdSchema, IdSchema, WampDictSchema])
    .transform(
      ([, subscriptionId, publicationId, details]): EventMessage => ({
        kind: "EVENT",
        subscriptionId,
        publicationId,
        details,
      }),
    ),
  z
    .tuple([z.literal(MessageType.EVENT), IdSchema, IdSchema, WampDictSchema, WampListSchema])
    .transform(
      ([, subscriptionId, publicationId, details, args]): EventMessage => ({
        kind: "EVENT",
        subscriptionId,
        publicationId,
        details,
        args,
      }),
    ),
  z
    .tuple([
      z.literal(MessageType.EVENT),
      IdSchema,
      IdSchema,
      WampDictSchema,
      WampListSchema,
      WampDictSchema,
    ])
    .transform(
      ([, subscriptionId, publicationId, details, args, kwargs]): EventMessage => ({
        kind: "EVENT",
        subscriptionId,
        publicationId,
        details,
        args,
        kwargs,
      }),
    ),
]);

// ---------------------------------------------------------------------------
// INTERRUPT
// ---------------------------------------------------------------------------

/**
 * Request to cancel an in-flight invocation.
 * Wire: `[INTERRUPT, INVOCATION.Request|id, Options|dict]`
 */
export interface InterruptMessage {
  readonly kind: "INTERRUPT";
  readonly requestId: number;
  readonly options: WampDict;
}

export const InterruptMessageSchema = z
  .tuple([z.literal(MessageType.INTERRUPT), IdSchema, WampDictSchema])
  .transform(
    ([, requestId, options]): InterruptMessage => ({ kind: "INTERRUPT", requestId, options }),
  );

// ---------------------------------------------------------------------------
// Union + helpers
// ---------------------------------------------------------------------------

/** Messages the error layer consumes or produces */
export type WampMessage = AbortMessage | ErrorMessage | EventMessage | InterruptMessage;

export const WampMessageSchema = z.union([
  AbortMessageSchema,
  ErrorMessageSchema,
  EventMessageSchema,
  InterruptMessageSchema,
]);

/**
 * Parse a decoded wire array into a message, throwing on invalid input.
 */
export function parseMessage(raw: unknown): WampMessage {
  return WampMessageSchema.parse(raw);
}

/**
 * Safely parse a decoded wire array, returning a result object.
 */
export function safeParseMessage(raw: unknown): ReturnType<typeof WampMessageSchema.safeParse> {
  return WampMessageSchema.safeParse(raw);
}

/**
 * Trailing payload fields: kwargs only when non-empty, args when non-empty
 * or when kwargs follow them.
 */
function payloadFields(args: WampList | undefined, kwargs: WampDict | undefined): WampValue[] {
  const hasKwargs = kwargs !== undefined && Object.keys(kwargs).length > 0;
  const hasArgs = args !== undefined && args.length > 0;
  if (hasKwargs) {
    return [args ?? [], kwargs];
  }
  if (hasArgs) {
    return [args];
  }
  return [];
}

/**
 * Encode a message into its wire array form, omitting empty trailing payload.
 */
export function serializeMessage(message: WampMessage): WampValue[] {
  switch (message.kind) {
    case "ABORT":
      return [MessageType.ABORT, message.details, message.reason];
    case "ERROR":
      return [
        MessageType.ERROR,
        message.requestType,
        message.requestId,
        message.details,
        message.error,
        ...payloadFields(message.args, message.kwargs),
      ];
    case "EVENT":
      return [
        MessageType.EVENT,
        message.subscriptionId,
        message.publicationId,
        message.details,
        ...payloadFields(message.args, message.kwargs),
      ];
    case "INTERRUPT":
      return [MessageType.INTERRUPT, message.requestId, message.options];
  }
}

/** Diagnostic rendering: `KIND [wire array]` */
export function formatMessage(message: WampMessage): string {
  return `${message.kind} ${JSON.stringify(serializeMessage(message))}`;
}
