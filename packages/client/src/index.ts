/**
 * @wampkit/client
 *
 * Client-facing collaborators shared by session implementations.
 */

export { SubscriptionEvent, type SubscriptionEventOptions } from "./subscription-event.js";
export type { ClientLike } from "./types.js";

export const PACKAGE_NAME = "@wampkit/client" as const;
