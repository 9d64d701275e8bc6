import {
  formatMessage,
  type MessageType,
  messageKindOf,
  type WampMessage,
} from "@wampkit/protocol";
import { WampError } from "../base.js";

/** Malformed or unparseable message */
export class InvalidMessage extends WampError {
  readonly _tag: "InvalidMessage" | "UnexpectedMessageError" = "InvalidMessage";

  constructor(message = "invalid message", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A message of one kind arrived where a specific other kind was required.
 */
export class UnexpectedMessageError extends InvalidMessage {
  override readonly _tag = "UnexpectedMessageError" as const;

  constructor(
    /** Message that was received */
    public readonly received: WampMessage,
    /** Message type that was expected */
    public readonly expected: MessageType,
  ) {
    super(
      `received message ${formatMessage(received)} but expected message of type ${messageKindOf(expected)}`,
    );
  }

  override toString(): string {
    return this.message;
  }

  override toJSON() {
    return { ...super.toJSON(), received: this.received, expected: messageKindOf(this.expected) };
  }
}
