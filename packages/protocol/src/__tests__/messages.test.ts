import { asUri } from "@wampkit/core";
import { describe, expect, it } from "vitest";
import {
  type ErrorMessage,
  type EventMessage,
  formatMessage,
  MessageType,
  messageKindOf,
  parseMessage,
  safeParseMessage,
  serializeMessage,
} from "../index.js";

describe("MessageType", () => {
  it("maps codes back to kinds", () => {
    expect(messageKindOf(MessageType.ERROR)).toBe("ERROR");
    expect(messageKindOf(68)).toBe("INVOCATION");
    expect(messageKindOf(7)).toBeUndefined();
  });
});

describe("WampMessage schemas", () => {
  // -------------------------------------------------------------------------
  // ABORT
  // -------------------------------------------------------------------------
  describe("ABORT", () => {
    it("parses details and reason", () => {
      expect(parseMessage([3, { message: "no realm" }, "wamp.error.no_such_realm"])).toEqual({
        kind: "ABORT",
        details: { message: "no realm" },
        reason: "wamp.error.no_such_realm",
      });
    });

    it("rejects an invalid reason URI", () => {
      expect(safeParseMessage([3, {}, "not a uri"]).success).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // ERROR
  // -------------------------------------------------------------------------
  describe("ERROR", () => {
    it("decodes missing payload as empty list and dict", () => {
      expect(parseMessage([8, 48, 7, {}, "com.example.bad_arg"])).toEqual({
        kind: "ERROR",
        requestType: 48,
        requestId: 7,
        details: {},
        error: "com.example.bad_arg",
        args: [],
        kwargs: {},
      });
    });

    it("decodes args and kwargs", () => {
      const message = parseMessage([8, 48, 7, {}, "com.example.bad_arg", [1, "two"], { x: 3 }]);
      expect(message).toMatchObject({ args: [1, "two"], kwargs: { x: 3 } });
    });

    it("rejects an unknown request type", () => {
      expect(safeParseMessage([8, 7, 1, {}, "com.example.bad_arg"]).success).toBe(false);
    });

    it("rejects trailing fields beyond kwargs", () => {
      expect(safeParseMessage([8, 48, 1, {}, "com.example.x", [], {}, "extra"]).success).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // EVENT / INTERRUPT
  // -------------------------------------------------------------------------
  describe("EVENT", () => {
    it("leaves absent payload absent", () => {
      expect(parseMessage([36, 1, 2, {}])).toEqual({
        kind: "EVENT",
        subscriptionId: 1,
        publicationId: 2,
        details: {},
      });
    });

    it("keeps args and kwargs when present", () => {
      expect(parseMessage([36, 1, 2, { topic: "com.example.topic" }, ["hello"], { n: 1 }])).toEqual({
        kind: "EVENT",
        subscriptionId: 1,
        publicationId: 2,
        details: { topic: "com.example.topic" },
        args: ["hello"],
        kwargs: { n: 1 },
      });
    });
  });

  describe("INTERRUPT", () => {
    it("parses request id and options", () => {
      expect(parseMessage([69, 12, { mode: "kill" }])).toEqual({
        kind: "INTERRUPT",
        requestId: 12,
        options: { mode: "kill" },
      });
    });

    it("rejects a negative request id", () => {
      expect(safeParseMessage([69, -1, {}]).success).toBe(false);
    });
  });

  it("rejects unsupported message types", () => {
    expect(safeParseMessage([1, "realm1", {}]).success).toBe(false);
    expect(safeParseMessage("not an array").success).toBe(false);
  });
});

describe("serializeMessage", () => {
  const base: ErrorMessage = {
    kind: "ERROR",
    requestType: MessageType.INVOCATION,
    requestId: 5,
    details: {},
    error: asUri("com.example.bad_arg"),
    args: [],
    kwargs: {},
  };

  it("omits empty args and kwargs", () => {
    expect(serializeMessage(base)).toEqual([8, 68, 5, {}, "com.example.bad_arg"]);
  });

  it("omits empty kwargs after args", () => {
    expect(serializeMessage({ ...base, args: [1, 2] })).toEqual([8, 68, 5, {}, "com.example.bad_arg", [1, 2]]);
  });

  it("keeps an empty args list in front of kwargs", () => {
    expect(serializeMessage({ ...base, kwargs: { x: 3 } })).toEqual([
      8,
      68,
      5,
      {},
      "com.example.bad_arg",
      [],
      { x: 3 },
    ]);
  });

  it("encodes events with absent payload", () => {
    const event: EventMessage = { kind: "EVENT", subscriptionId: 1, publicationId: 2, details: {} };
    expect(serializeMessage(event)).toEqual([36, 1, 2, {}]);
  });

  it("parses what it serializes", () => {
    const wire = serializeMessage({ ...base, args: ["a"], kwargs: { k: true } });
    expect(parseMessage(wire)).toEqual({ ...base, args: ["a"], kwargs: { k: true } });
  });
});

describe("formatMessage", () => {
  it("renders the kind followed by the wire array", () => {
    expect(formatMessage({ kind: "INTERRUPT", requestId: 3, options: { mode: "skip" } })).toBe(
      'INTERRUPT [69,3,{"mode":"skip"}]',
    );
  });
});
