import { InvalidUriError } from "@wampkit/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_ERROR_REGISTRY_CONFIG,
  ErrorRegistry,
  ErrorRegistryConfigSchema,
  resolveErrorRegistryConfig,
} from "../../index.js";

describe("resolveErrorRegistryConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies the defaults", () => {
    const config = resolveErrorRegistryConfig();

    expect(config.runtimeErrorUri).toBe(DEFAULT_ERROR_REGISTRY_CONFIG.runtimeErrorUri);
    expect(config.runtimeErrorUri).toBe("wamp.error.runtime_error");
    expect(config.strictUris).toBe(false);
    expect(config.onDiagnostic).toBeTypeOf("function");
  });

  it("keeps an explicit diagnostic sink", () => {
    const onDiagnostic = vi.fn();

    expect(resolveErrorRegistryConfig({ onDiagnostic }).onDiagnostic).toBe(onDiagnostic);
  });

  it("validates the runtime error URI against the URI policy", () => {
    expect(() => resolveErrorRegistryConfig({ runtimeErrorUri: "com.Example.internal", uriPolicy: "strict" })).toThrow(
      InvalidUriError,
    );
    expect(resolveErrorRegistryConfig({ runtimeErrorUri: "com.Example.internal" }).runtimeErrorUri).toBe(
      "com.Example.internal",
    );
  });

  it("rejects an empty runtime error URI", () => {
    expect(() => resolveErrorRegistryConfig({ runtimeErrorUri: "" })).toThrow();
  });

  it("schema rejects unknown URI policies", () => {
    expect(ErrorRegistryConfigSchema.safeParse({ runtimeErrorUri: "a.b", uriPolicy: "medium" }).success).toBe(false);
    expect(ErrorRegistryConfigSchema.safeParse({ runtimeErrorUri: "a.b", uriPolicy: "strict" }).success).toBe(true);
  });

  it("logs diagnostics through console.info by default", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const registry = new ErrorRegistry();

    registry.exceptionToInvocationError("oops");

    expect(info).toHaveBeenCalledWith(
      "[wampkit:errors] no uri registered for exception string. Using wamp.error.runtime_error",
    );
  });
});
