import type { URI } from "@wampkit/core";

/**
 * The part of a session client a subscription event needs.
 * Implemented by the transport-facing client.
 */
export interface ClientLike {
  unsubscribe(topic: URI): Promise<void>;
}
