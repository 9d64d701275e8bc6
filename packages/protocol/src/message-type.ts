// ---------------------------------------------------------------------------
// Message type codes
// ---------------------------------------------------------------------------

/** Numeric codes identifying each WAMP message kind on the wire */
export const MessageType = {
  HELLO: 1,
  WELCOME: 2,
  ABORT: 3,
  CHALLENGE: 4,
  AUTHENTICATE: 5,
  GOODBYE: 6,
  ERROR: 8,
  PUBLISH: 16,
  PUBLISHED: 17,
  SUBSCRIBE: 32,
  SUBSCRIBED: 33,
  UNSUBSCRIBE: 34,
  UNSUBSCRIBED: 35,
  EVENT: 36,
  CALL: 48,
  CANCEL: 49,
  RESULT: 50,
  REGISTER: 64,
  REGISTERED: 65,
  UNREGISTER: 66,
  UNREGISTERED: 67,
  INVOCATION: 68,
  INTERRUPT: 69,
  YIELD: 70,
} as const;

export type MessageKind = keyof typeof MessageType;
export type MessageType = (typeof MessageType)[MessageKind];

const KIND_BY_CODE = new Map<number, MessageKind>(
  Object.entries(MessageType).map(([kind, code]): [number, MessageKind] => [code, kind as MessageKind]),
);

/** Check if a number is a known message type code */
export function isMessageType(value: unknown): value is MessageType {
  return typeof value === "number" && KIND_BY_CODE.has(value);
}

/** Name of the message kind for a type code (e.g. 8 → "ERROR") */
export function messageKindOf(code: MessageType): MessageKind;
export function messageKindOf(code: number): MessageKind | undefined;
export function messageKindOf(code: number): MessageKind | undefined {
  return KIND_BY_CODE.get(code);
}
