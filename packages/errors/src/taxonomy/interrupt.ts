import { type CancelMode, isCancelMode, type WampDict, type WampValue } from "@wampkit/core";
import type { InterruptMessage } from "@wampkit/protocol";
import { WampError } from "../base.js";

/**
 * The caller asked to cancel an in-flight invocation.
 *
 * Delivered to the invocation handler rather than to the caller: the handler
 * observes it and decides whether to cooperate.
 */
export class Interrupt extends WampError {
  readonly _tag = "Interrupt" as const;

  constructor(
    /** Options sent with the interrupt */
    public readonly options: WampDict,
  ) {
    super(`Interrupt(options=${JSON.stringify(options)})`);
  }

  static fromMessage(message: InterruptMessage): Interrupt {
    return new Interrupt(message.options);
  }

  /** `mode` option exactly as sent, including modes this client does not know */
  get requestedMode(): WampValue | undefined {
    return this.options.mode;
  }

  /** Cancel mode sent with the interrupt, undefined if absent or unknown */
  get cancelMode(): CancelMode | undefined {
    const mode = this.requestedMode;
    return isCancelMode(mode) ? mode : undefined;
  }

  override toString(): string {
    return this.message;
  }

  override toJSON() {
    return { ...super.toJSON(), options: this.options };
  }
}
