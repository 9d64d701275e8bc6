import { asUri, type URI, WAMP_URIS } from "@wampkit/core";
import { z } from "zod";

/** Prefix of every diagnostic the error registry logs */
export const LOG_TAG = "wampkit:errors";

/** Receives diagnostics emitted by an ErrorRegistry */
export type DiagnosticSink = (message: string) => void;

/**
 * ErrorRegistry configuration.
 */
export interface ErrorRegistryConfig {
  /** URI reported for failures without a registered URI (default: wamp.error.runtime_error) */
  readonly runtimeErrorUri?: string;
  /** URI validation applied to registered keys (default: "loose") */
  readonly uriPolicy?: "loose" | "strict";
  /** Diagnostic sink (default: console.info with the `[wampkit:errors]` tag) */
  readonly onDiagnostic?: DiagnosticSink;
}

export const ErrorRegistryConfigSchema = z.object({
  runtimeErrorUri: z.string().min(1),
  uriPolicy: z.enum(["loose", "strict"]),
});

/**
 * Default configuration values.
 */
export const DEFAULT_ERROR_REGISTRY_CONFIG = {
  runtimeErrorUri: WAMP_URIS.RUNTIME_ERROR,
  uriPolicy: "loose",
} as const satisfies z.infer<typeof ErrorRegistryConfigSchema>;

export interface ResolvedErrorRegistryConfig {
  readonly runtimeErrorUri: URI;
  readonly strictUris: boolean;
  readonly onDiagnostic: DiagnosticSink;
}

function logDiagnostic(message: string): void {
  console.info(`[${LOG_TAG}] ${message}`);
}

/**
 * Merge a partial config with the defaults and validate it.
 *
 * @throws {ZodError} If a field has the wrong shape
 * @throws {InvalidUriError} If `runtimeErrorUri` is not a valid URI under `uriPolicy`
 */
export function resolveErrorRegistryConfig(config: ErrorRegistryConfig = {}): ResolvedErrorRegistryConfig {
  const parsed = ErrorRegistryConfigSchema.parse({
    runtimeErrorUri: config.runtimeErrorUri ?? DEFAULT_ERROR_REGISTRY_CONFIG.runtimeErrorUri,
    uriPolicy: config.uriPolicy ?? DEFAULT_ERROR_REGISTRY_CONFIG.uriPolicy,
  });
  const strictUris = parsed.uriPolicy === "strict";

  return {
    runtimeErrorUri: asUri(parsed.runtimeErrorUri, { strict: strictUris }),
    strictUris,
    onDiagnostic: config.onDiagnostic ?? logDiagnostic,
  };
}
