import { asUri, InvalidUriError, LookupError } from "@wampkit/core";
import type { ErrorMessage } from "@wampkit/protocol";
import { describe, expect, it, vi } from "vitest";
import { ErrorRegistry, ErrorResponse, RegistrySealedError, WampError } from "../../index.js";
import { makeErrorMessage } from "../fixtures/messages.js";

class BadArgumentError extends WampError {
  readonly _tag = "BadArgumentError" as const;

  constructor(public readonly source: ErrorMessage) {
    super(`bad argument: ${source.args.join(", ")}`);
  }
}

const quiet = () => new ErrorRegistry({ onDiagnostic: () => {} });

describe("ErrorRegistry: registerErrorResponse", () => {
  it("errorToException returns exactly what the registered factory returns", () => {
    const registry = quiet();
    const produced = new Error("produced");
    const factory = vi.fn(() => produced);
    registry.registerErrorResponse("com.example.bad_arg", factory);

    const message = makeErrorMessage({ error: asUri("com.example.bad_arg"), args: [1] });

    expect(registry.errorToException(message)).toBe(produced);
    expect(factory).toHaveBeenCalledOnce();
    expect(factory).toHaveBeenCalledWith(message);
  });

  it("supports factories building typed failures", () => {
    const registry = quiet();
    registry.registerErrorResponse("com.example.bad_arg", (message) => new BadArgumentError(message));

    const message = makeErrorMessage({ error: asUri("com.example.bad_arg"), args: ["x", 2] });
    const failure = registry.errorToException(message);

    expect(failure).toBeInstanceOf(BadArgumentError);
    expect(failure.message).toBe("bad argument: x, 2");
  });

  it("the last registration for a URI wins", () => {
    const onDiagnostic = vi.fn();
    const registry = new ErrorRegistry({ onDiagnostic });
    const second = new Error("second");
    registry.registerErrorResponse("com.example.bad_arg", () => new Error("first"));
    registry.registerErrorResponse("com.example.bad_arg", () => second);

    expect(registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toBe(second);
    expect(onDiagnostic).toHaveBeenCalledWith("replacing error factory for com.example.bad_arg (exact)");
  });

  it("rejects a factory that is not callable", () => {
    const registry = quiet();

    expect(() => Reflect.apply(registry.registerErrorResponse, registry, ["com.example.bad_arg", "nope"])).toThrow(
      new TypeError("error factory must be callable"),
    );
    expect(() => registry.getExceptionFactory("com.example.bad_arg")).toThrow(LookupError);
  });

  it("rejects an invalid URI", () => {
    const registry = quiet();

    expect(() => registry.registerErrorResponse("com..bad_arg", () => new Error("x"))).toThrow(InvalidUriError);
  });

  it("applies the strict URI policy when configured", () => {
    const registry = new ErrorRegistry({ uriPolicy: "strict", onDiagnostic: () => {} });

    expect(() => registry.registerErrorResponse("com.Example.bad_arg", () => new Error("x"))).toThrow(
      InvalidUriError,
    );
    registry.registerErrorResponse("com.example.bad_arg", () => new Error("x"));
    expect(registry.getExceptionFactory("com.example.bad_arg")).toBeTypeOf("function");
  });
});

describe("ErrorRegistry: errorToException fallback", () => {
  it("wraps an unregistered URI in an ErrorResponse without throwing", () => {
    const registry = quiet();
    registry.registerErrorResponse("com.example.bad_arg", () => new Error("registered"));
    const message = makeErrorMessage({ error: asUri("com.example.unknown"), args: ["a"] });

    const failure = registry.errorToException(message);

    expect(failure).toBeInstanceOf(ErrorResponse);
    if (failure instanceof ErrorResponse) {
      expect(failure.response).toBe(message);
      expect(failure.uri).toBe("com.example.unknown");
    }
  });

  it("does not match registered URIs partially", () => {
    const registry = quiet();
    registry.registerErrorResponse("com.example", () => new Error("registered"));

    expect(registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toBeInstanceOf(
      ErrorResponse,
    );
  });

  it("matches prefix registrations when explicitly requested", () => {
    const registry = quiet();
    const produced = new Error("prefix");
    registry.registerErrorResponse("com.example", () => produced, { match: "prefix" });

    expect(registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toBe(produced);
  });

  it("matches wildcard registrations when explicitly requested", () => {
    const registry = quiet();
    const produced = new Error("wildcard");
    registry.registerErrorResponse("com..bad_arg", () => produced, { match: "wildcard" });

    expect(registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toBe(produced);
  });

  it("propagates failures thrown by the factory itself", () => {
    const registry = quiet();
    registry.registerErrorResponse("com.example.bad_arg", () => {
      throw new RangeError("factory broke");
    });

    expect(() => registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toThrow(
      RangeError,
    );
  });

  it("getExceptionFactory signals a miss with LookupError", () => {
    const registry = quiet();

    expect(() => registry.getExceptionFactory("com.example.unknown")).toThrow(LookupError);
  });
});

describe("ErrorRegistry: initialization phase", () => {
  it("rejects registrations once sealed", () => {
    const registry = quiet();
    registry.registerErrorResponse("com.example.bad_arg", () => new Error("x"));
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.registerErrorResponse("com.example.other", () => new Error("y"))).toThrow(
      new RegistrySealedError("com.example.other"),
    );
    expect(() => registry.registerExceptionUri(RangeError, "com.example.range")).toThrow(RegistrySealedError);
  });

  it("keeps serving lookups after sealing", () => {
    const registry = quiet();
    const produced = new Error("x");
    registry.registerErrorResponse("com.example.bad_arg", () => produced);
    registry.seal();

    expect(registry.errorToException(makeErrorMessage({ error: asUri("com.example.bad_arg") }))).toBe(produced);
  });

  it("reports the sealed key in the message", () => {
    expect(new RegistrySealedError("com.example.other").message).toBe(
      "error registry is sealed, cannot register com.example.other",
    );
  });
});
