import { z } from "zod";

// ---------------------------------------------------------------------------
// WAMP payload values
// ---------------------------------------------------------------------------

/**
 * Any value that can travel in a WAMP payload (positional arguments,
 * keyword arguments, details and options dictionaries).
 */
export type WampValue =
  | string
  | number
  | boolean
  | null
  | readonly WampValue[]
  | { readonly [key: string]: WampValue };

/** Ordered positional payload */
export type WampList = readonly WampValue[];

/** Keyword payload, details or options dictionary */
export type WampDict = { readonly [key: string]: WampValue };

export const WampValueSchema: z.ZodType<WampValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(WampValueSchema),
    z.record(WampValueSchema),
  ]),
);

export const WampListSchema: z.ZodType<WampList> = z.array(WampValueSchema);

export const WampDictSchema: z.ZodType<WampDict> = z.record(WampValueSchema);

// ---------------------------------------------------------------------------
// Call cancellation
// ---------------------------------------------------------------------------

/** Cancel modes a caller may request for an in-flight invocation */
export const CANCEL_MODES = ["skip", "kill", "killnowait"] as const;
export type CancelMode = (typeof CANCEL_MODES)[number];

export const CancelModeSchema = z.enum(CANCEL_MODES);

/** Check if a payload value names a cancel mode */
export function isCancelMode(value: unknown): value is CancelMode {
  return CancelModeSchema.safeParse(value).success;
}
