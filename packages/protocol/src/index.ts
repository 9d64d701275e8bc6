/**
 * @wampkit/protocol
 *
 * WAMP message kinds, decoded message shapes and zod schemas for their
 * wire (array) form.
 */

export {
  isMessageType,
  type MessageKind,
  MessageType,
  messageKindOf,
} from "./message-type.js";

export {
  type AbortMessage,
  AbortMessageSchema,
  type ErrorMessage,
  ErrorMessageSchema,
  type EventMessage,
  EventMessageSchema,
  formatMessage,
  IdSchema,
  type InterruptMessage,
  InterruptMessageSchema,
  MessageTypeSchema,
  parseMessage,
  safeParseMessage,
  serializeMessage,
  UriSchema,
  type WampMessage,
  WampMessageSchema,
} from "./messages.js";

export const PACKAGE_NAME = "@wampkit/protocol" as const;
