import { describe, it, expect, expectTypeOf } from "vitest";
import { z } from "zod";
import { ok } from "../lib/outcome.js";
import {
  CANCELLATION,
  createToken,
  defineEvent,
  defineHandler,
  isCancellationSlot,
  isEventType,
  isServiceToken,
} from "./definitions.js";
import { ClockToken, MessageCreated } from "./test-fixtures.js";
import type { HandlerReturn } from "./types.js";

describe("defineEvent", () => {
  it("creates a frozen event type carrying its name and schema", () => {
    const schema = z.object({ id: z.string() });
    const OrderPlaced = defineEvent("order.placed", schema);

    expect(OrderPlaced.kind).toBe("event-type");
    expect(OrderPlaced.name).toBe("order.placed");
    expect(OrderPlaced.schema).toBe(schema);
    expect(Object.isFrozen(OrderPlaced)).toBe(true);
  });
});

describe("createToken", () => {
  it("gives every token its own key, even with the same description", () => {
    const first = createToken<string>("Greeting");
    const second = createToken<string>("Greeting");

    expect(first.description).toBe("Greeting");
    expect(first.key).not.toBe(second.key);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe("slot and event guards", () => {
  it("recognizes service tokens", () => {
    expect(isServiceToken(ClockToken)).toBe(true);
    expect(isServiceToken(CANCELLATION)).toBe(false);
    expect(isServiceToken({ kind: "service", key: "Clock" })).toBe(false);
    expect(isServiceToken(null)).toBe(false);
  });

  it("recognizes only the shared cancellation marker", () => {
    expect(isCancellationSlot(CANCELLATION)).toBe(true);
    expect(isCancellationSlot({ kind: "cancellation" })).toBe(false);
  });

  it("recognizes event types", () => {
    expect(isEventType(MessageCreated)).toBe(true);
    expect(isEventType({ kind: "event-type", name: "", schema: z.object({}) })).toBe(false);
    expect(isEventType({ name: "message.created" })).toBe(false);
    expect(isEventType("message.created")).toBe(false);
  });
});

describe("defineHandler", () => {
  it("defaults to no slots and a synchronous void return", () => {
    const handler = defineHandler(MessageCreated, {
      name: "log",
      handle: () => {},
    });

    expect(handler).toMatchObject({
      event: MessageCreated,
      name: "log",
      inject: [],
      returns: "void",
      async: false,
    });
    expect(Object.isFrozen(handler)).toBe(true);
  });

  it("keeps declared slots and return shape", () => {
    const handle = async (message: { content: string }, clock: { now(): number }, signal: AbortSignal) =>
      ok(`${message.content}@${clock.now()}:${signal.aborted}`);

    const handler = defineHandler(MessageCreated, {
      name: "stamp",
      inject: [ClockToken, CANCELLATION],
      returns: "result",
      async: true,
      handle,
    });

    expect(handler.inject).toEqual([ClockToken, CANCELLATION]);
    expect(handler.returns).toBe("result");
    expect(handler.async).toBe(true);
    expect(handler.handle).toBe(handle);
  });
});

describe("HandlerReturn", () => {
  it("requires a synchronous void handler to return undefined rather than a promise", () => {
    expectTypeOf<HandlerReturn<"void", false>>().toEqualTypeOf<undefined>();
    expectTypeOf<Promise<void>>().not.toMatchTypeOf<HandlerReturn<"void", false>>();
    expectTypeOf<Promise<void>>().toMatchTypeOf<HandlerReturn<"void", true>>();
  });
});
