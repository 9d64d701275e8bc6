import type { URI, WampDict, WampList } from "@wampkit/core";
import type { EventMessage } from "@wampkit/protocol";
import type { ClientLike } from "./types.js";

export interface SubscriptionEventOptions {
  /** Topic the subscription was made for */
  readonly topic: URI;
}

/**
 * An event delivered to a subscriber.
 *
 * Wraps the EVENT message together with the client that received it, so the
 * handler can end its own subscription.
 *
 * @typeParam C - The client type the event was received on
 */
export class SubscriptionEvent<C extends ClientLike = ClientLike> {
  private readonly _client: C;
  private readonly _message: EventMessage;
  private readonly _topic: URI;
  private readonly _args: WampList;

  constructor(client: C, message: EventMessage, options: SubscriptionEventOptions) {
    this._client = client;
    this._message = message;
    this._topic = options.topic;
    this._args = Object.freeze([...(message.args ?? [])]);
  }

  get client(): C {
    return this._client;
  }

  get publicationId(): number {
    return this._message.publicationId;
  }

  get subscriptionId(): number {
    return this._message.subscriptionId;
  }

  get subscribedTopic(): URI {
    return this._topic;
  }

  get args(): WampList {
    return this._args;
  }

  get kwargs(): WampDict {
    return this._message.kwargs ?? {};
  }

  get details(): WampDict {
    return this._message.details;
  }

  /** Unsubscribe from the topic this event was delivered for */
  async unsubscribe(): Promise<void> {
    await this._client.unsubscribe(this._topic);
  }
}
