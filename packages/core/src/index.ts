/**
 * @wampkit/core
 *
 * URI value type, well-known WAMP URIs and the URI registry shared by the
 * other wampkit packages.
 */

export { InvalidUriError, isLookupError, LookupError } from "./errors.js";

export {
  CANCEL_MODES,
  type CancelMode,
  CancelModeSchema,
  isCancelMode,
  type WampDict,
  WampDictSchema,
  type WampList,
  WampListSchema,
  type WampValue,
  WampValueSchema,
} from "./types.js";

export {
  asUri,
  DEFAULT_URI_POLICY,
  isUri,
  type MatchPolicy,
  RUNTIME_ERROR,
  type URI,
  type URIValidationPolicy,
  uriSegments,
  WAMP_URIS,
  type WampUriName,
} from "./uri.js";

export { type URIMapEntry, type URIMapRegisterOptions, URIMap } from "./uri-map.js";

export const PACKAGE_NAME = "@wampkit/core" as const;
