import { asUri, LookupError } from "@wampkit/core";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import {
  defaultErrorRegistry,
  ErrorResponse,
  errorToException,
  exceptionToInvocationError,
  getExceptionFactory,
  getExceptionUri,
  InvocationError,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  registerErrorResponse,
  registerExceptionUri,
  setInvocationError,
} from "../index.js";
import { makeErrorMessage } from "./fixtures/messages.js";

class DefaultsFailure extends Error {}
class NeverRegistered extends Error {}

describe("@wampkit/errors", () => {
  it("exports package metadata", () => {
    expect(PACKAGE_NAME).toBe("@wampkit/errors");
    expect(PACKAGE_VERSION).toBe("0.1.0");
  });
});

describe("default registry", () => {
  const info = vi.spyOn(console, "info");

  beforeAll(() => {
    info.mockImplementation(() => {});
  });

  afterAll(() => {
    info.mockRestore();
  });

  it("is an open process-wide registry", () => {
    expect(defaultErrorRegistry.isSealed).toBe(false);
    expect(defaultErrorRegistry.runtimeErrorUri).toBe("wamp.error.runtime_error");
  });

  it("routes inbound registrations through the free functions", () => {
    const produced = new Error("defaults");
    registerErrorResponse("com.example.defaults.inbound", () => produced);

    expect(getExceptionFactory("com.example.defaults.inbound")).toBeTypeOf("function");
    expect(errorToException(makeErrorMessage({ error: asUri("com.example.defaults.inbound") }))).toBe(produced);
    expect(errorToException(makeErrorMessage({ error: asUri("com.example.defaults.missing") }))).toBeInstanceOf(
      ErrorResponse,
    );
  });

  it("routes outbound registrations through the free functions", () => {
    registerExceptionUri(DefaultsFailure, "com.example.defaults.outbound");

    expect(getExceptionUri(DefaultsFailure)).toBe("com.example.defaults.outbound");
    expect(exceptionToInvocationError(new DefaultsFailure("x")).uri).toBe("com.example.defaults.outbound");
    expect(() => getExceptionUri(NeverRegistered)).toThrow(LookupError);
  });

  it("attaches invocation errors through the free function", () => {
    const failure = new NeverRegistered("x");
    const attached = InvocationError.of("com.example.defaults.attached");

    setInvocationError(failure, attached);

    expect(exceptionToInvocationError(failure)).toBe(attached);
  });

  it("falls back to the runtime error URI and logs the miss", () => {
    const result = exceptionToInvocationError(new NeverRegistered("boom"));

    expect(result.uri).toBe("wamp.error.runtime_error");
    expect(info).toHaveBeenCalledWith(
      "[wampkit:errors] no uri registered for exception NeverRegistered. Using wamp.error.runtime_error",
    );
  });
});
