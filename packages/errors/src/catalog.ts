/**
 * Error Catalog
 *
 * Predefined error URIs of the WAMP basic and advanced profiles. Routers and
 * peers raise these without any application registration, so they are known
 * to every client.
 */

import { WAMP_URIS } from "@wampkit/core";

/** Protocol area an error URI belongs to */
export type ErrorCategory = "session" | "rpc" | "pubsub" | "auth" | "generic";

export interface ErrorCatalogEntry {
  readonly uri: string;
  readonly category: ErrorCategory;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ==========================================================================
  // GENERIC
  // ==========================================================================
  [WAMP_URIS.INVALID_URI]: {
    uri: WAMP_URIS.INVALID_URI,
    category: "generic",
    title: "Invalid URI",
    description: "A URI given in a request failed validation",
  },
  [WAMP_URIS.INVALID_ARGUMENT]: {
    uri: WAMP_URIS.INVALID_ARGUMENT,
    category: "generic",
    title: "Invalid argument",
    description: "The arguments given to a procedure or topic were rejected",
  },
  [WAMP_URIS.PROTOCOL_VIOLATION]: {
    uri: WAMP_URIS.PROTOCOL_VIOLATION,
    category: "generic",
    title: "Protocol violation",
    description: "A peer sent a message that violates the protocol",
  },
  [WAMP_URIS.OPTION_NOT_ALLOWED]: {
    uri: WAMP_URIS.OPTION_NOT_ALLOWED,
    category: "generic",
    title: "Option not allowed",
    description: "The router rejected an option given in a request",
  },
  [WAMP_URIS.NETWORK_FAILURE]: {
    uri: WAMP_URIS.NETWORK_FAILURE,
    category: "generic",
    title: "Network failure",
    description: "The request could not be completed because of a network failure",
  },
  [WAMP_URIS.RUNTIME_ERROR]: {
    uri: WAMP_URIS.RUNTIME_ERROR,
    category: "generic",
    title: "Runtime error",
    description: "A procedure failed with an error that has no URI of its own",
  },

  // ==========================================================================
  // SESSION
  // ==========================================================================
  [WAMP_URIS.SYSTEM_SHUTDOWN]: {
    uri: WAMP_URIS.SYSTEM_SHUTDOWN,
    category: "session",
    title: "System shutdown",
    description: "The peer is shutting down",
  },
  [WAMP_URIS.CLOSE_REALM]: {
    uri: WAMP_URIS.CLOSE_REALM,
    category: "session",
    title: "Close realm",
    description: "The peer wants to leave the realm",
  },
  [WAMP_URIS.GOODBYE_AND_OUT]: {
    uri: WAMP_URIS.GOODBYE_AND_OUT,
    category: "session",
    title: "Goodbye and out",
    description: "Acknowledgement of a GOODBYE",
  },
  [WAMP_URIS.NO_SUCH_REALM]: {
    uri: WAMP_URIS.NO_SUCH_REALM,
    category: "session",
    title: "No such realm",
    description: "The realm requested in HELLO does not exist",
  },
  [WAMP_URIS.NO_SUCH_SESSION]: {
    uri: WAMP_URIS.NO_SUCH_SESSION,
    category: "session",
    title: "No such session",
    description: "The session referenced in a request does not exist",
  },

  // ==========================================================================
  // AUTH
  // ==========================================================================
  [WAMP_URIS.NOT_AUTHORIZED]: {
    uri: WAMP_URIS.NOT_AUTHORIZED,
    category: "auth",
    title: "Not authorized",
    description: "The session is not authorized to perform the action",
  },
  [WAMP_URIS.AUTHORIZATION_FAILED]: {
    uri: WAMP_URIS.AUTHORIZATION_FAILED,
    category: "auth",
    title: "Authorization failed",
    description: "The router could not determine whether the action is authorized",
  },
  [WAMP_URIS.AUTHENTICATION_FAILED]: {
    uri: WAMP_URIS.AUTHENTICATION_FAILED,
    category: "auth",
    title: "Authentication failed",
    description: "The credentials presented during the join were rejected",
  },
  [WAMP_URIS.NO_SUCH_ROLE]: {
    uri: WAMP_URIS.NO_SUCH_ROLE,
    category: "auth",
    title: "No such role",
    description: "The role requested in HELLO does not exist",
  },

  // ==========================================================================
  // RPC
  // ==========================================================================
  [WAMP_URIS.NO_SUCH_PROCEDURE]: {
    uri: WAMP_URIS.NO_SUCH_PROCEDURE,
    category: "rpc",
    title: "No such procedure",
    description: "No callee is registered for the called procedure",
  },
  [WAMP_URIS.PROCEDURE_ALREADY_EXISTS]: {
    uri: WAMP_URIS.PROCEDURE_ALREADY_EXISTS,
    category: "rpc",
    title: "Procedure already exists",
    description: "The procedure is already registered by another callee",
  },
  [WAMP_URIS.NO_SUCH_REGISTRATION]: {
    uri: WAMP_URIS.NO_SUCH_REGISTRATION,
    category: "rpc",
    title: "No such registration",
    description: "The registration to remove does not exist",
  },
  [WAMP_URIS.CANCELED]: {
    uri: WAMP_URIS.CANCELED,
    category: "rpc",
    title: "Canceled",
    description: "The call was canceled by the caller",
  },
  [WAMP_URIS.TIMEOUT]: {
    uri: WAMP_URIS.TIMEOUT,
    category: "rpc",
    title: "Timeout",
    description: "The call did not complete within its timeout",
  },
  [WAMP_URIS.NO_ELIGIBLE_CALLEE]: {
    uri: WAMP_URIS.NO_ELIGIBLE_CALLEE,
    category: "rpc",
    title: "No eligible callee",
    description: "Callee exclusion or eligibility options left no callee",
  },
  [WAMP_URIS.OPTION_DISALLOWED_DISCLOSE_ME]: {
    uri: WAMP_URIS.OPTION_DISALLOWED_DISCLOSE_ME,
    category: "rpc",
    title: "Disclose me disallowed",
    description: "The router refused to disclose the caller identity",
  },

  // ==========================================================================
  // PUBSUB
  // ==========================================================================
  [WAMP_URIS.NO_SUCH_SUBSCRIPTION]: {
    uri: WAMP_URIS.NO_SUCH_SUBSCRIPTION,
    category: "pubsub",
    title: "No such subscription",
    description: "The subscription to remove does not exist",
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

export type WellKnownErrorUri = keyof typeof ERROR_CATALOG;

const CATALOG_BY_URI: ReadonlyMap<string, ErrorCatalogEntry> = new Map(
  Object.values(ERROR_CATALOG).map((entry): [string, ErrorCatalogEntry] => [entry.uri, entry]),
);

/** Check if a URI is one of the predefined WAMP errors */
export function isWellKnownErrorUri(uri: string): uri is WellKnownErrorUri {
  return CATALOG_BY_URI.has(uri);
}

/** Look up the catalog entry of a predefined error URI */
export function getCatalogEntry(uri: string): ErrorCatalogEntry | undefined {
  return CATALOG_BY_URI.get(uri);
}

/** All catalog entries of a category */
export function getCatalogEntriesByCategory(category: ErrorCategory): ErrorCatalogEntry[] {
  return [...CATALOG_BY_URI.values()].filter((entry) => entry.category === category);
}
