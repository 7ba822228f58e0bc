import { describe, it, expect, vi } from "vitest";
import { BuildError, CompileError } from "../lib/errors.js";
import { silentLogger } from "../lib/logger.js";
import { fail, ok } from "../lib/outcome.js";
import { CANCELLATION, defineHandler } from "./definitions.js";
import { buildDispatchTable } from "./dispatch-table.js";
import { HandlerRegistry } from "./registry.js";
import { createStaticResolver } from "./resolver.js";
import {
  AuditLogToken,
  ClockToken,
  MemberJoined,
  MessageCreated,
  createAuditLog,
  createTestLogger,
} from "./test-fixtures.js";

const greet = defineHandler(MessageCreated, {
  name: "greet",
  inject: [ClockToken],
  handle: (_message, clock) => {
    clock.now();
  },
});

const moderate = defineHandler(MessageCreated, {
  name: "moderate",
  returns: "result",
  handle: (message) => (message.content.includes("spam") ? fail("spam") : ok()),
});

const welcome = defineHandler(MemberJoined, {
  name: "welcome",
  inject: [AuditLogToken, CANCELLATION],
  async: true,
  handle: async (member, audit, _signal) => {
    audit.record(member.userId);
  },
});

function createRegistry(): HandlerRegistry {
  return new HandlerRegistry({ logger: silentLogger })
    .register(MessageCreated, greet)
    .register(MemberJoined, welcome)
    .register(MessageCreated, moderate);
}

function createResolver() {
  return createStaticResolver()
    .provide(ClockToken, { now: () => 0 })
    .provideFactory(AuditLogToken, createAuditLog);
}

describe("buildDispatchTable", () => {
  it("groups invokers by event name in registration order", () => {
    const table = buildDispatchTable(createRegistry(), createResolver(), { logger: silentLogger });

    expect(table.size).toBe(2);
    expect(table.eventNames()).toEqual(["message.created", "member.joined"]);
    expect(table.invokersFor("message.created").map((invoker) => invoker.handlerName)).toEqual([
      "greet",
      "moderate",
    ]);
    expect(table.invokersFor("member.joined").map((invoker) => invoker.handlerName)).toEqual(["welcome"]);
    expect(table.has("member.joined")).toBe(true);
  });

  it("has no entry for event names without handlers", () => {
    const table = buildDispatchTable(createRegistry(), createResolver(), { logger: silentLogger });

    expect(table.has("member.left")).toBe(false);
    expect(table.invokersFor("member.left")).toEqual([]);
  });

  it("builds an empty table from an empty registry", () => {
    const logger = createTestLogger();

    const table = buildDispatchTable(new HandlerRegistry({ logger: silentLogger }), createResolver(), { logger });

    expect(table.size).toBe(0);
    expect(table.eventNames()).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith("Dispatch table ready: 0 handler(s) across 0 event type(s)");
  });

  it("seals the registry", () => {
    const registry = createRegistry();

    buildDispatchTable(registry, createResolver(), { logger: silentLogger });

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(MessageCreated, moderate)).toThrow("registry sealed");
  });

  it("is immutable", () => {
    const table = buildDispatchTable(createRegistry(), createResolver(), { logger: silentLogger });

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.invokersFor("message.created"))).toBe(true);
    expect(Object.isFrozen(table.invokersFor("member.left"))).toBe(true);
  });

  it("checks each dependency slot against the resolver without resolving it", () => {
    const resolver = { has: vi.fn(() => true), resolve: vi.fn() };

    buildDispatchTable(createRegistry(), resolver, { logger: silentLogger });

    expect(resolver.has).toHaveBeenCalledTimes(2);
    expect(resolver.has).toHaveBeenNthCalledWith(1, ClockToken);
    expect(resolver.has).toHaveBeenNthCalledWith(2, AuditLogToken);
    expect(resolver.resolve).not.toHaveBeenCalled();
  });

  it("aborts the build when a dependency has no provider", () => {
    const registry = createRegistry();
    const resolver = createStaticResolver().provide(ClockToken, { now: () => 0 });

    let thrown: unknown;
    try {
      buildDispatchTable(registry, resolver, { logger: silentLogger });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(BuildError);
    expect(thrown).toHaveProperty(
      "message",
      'Dispatch table build aborted: Cannot compile handler "welcome" for member.joined: no provider for "AuditLog" (parameter 2)',
    );
    expect(thrown).toHaveProperty("cause");
    expect(thrown instanceof BuildError && thrown.cause).toBeInstanceOf(CompileError);
    expect(registry.isSealed).toBe(true);
  });

  it("logs the compile error and closes the log group when the build fails", () => {
    const logger = createTestLogger();
    const resolver = createStaticResolver();

    expect(() => buildDispatchTable(createRegistry(), resolver, { logger })).toThrow(BuildError);

    expect(logger.group).toHaveBeenCalledWith("Building dispatch table (3 handler(s))");
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Dispatch table build failed", expect.any(CompileError));
    expect(logger.groupEnd).toHaveBeenCalledTimes(1);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("rethrows resolver errors that are not compile errors", () => {
    const resolver = {
      has: () => {
        throw new Error("container offline");
      },
      resolve: () => undefined,
    };

    let thrown: unknown;
    try {
      buildDispatchTable(createRegistry(), resolver, { logger: silentLogger });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toEqual(new Error("container offline"));
    expect(thrown).not.toBeInstanceOf(BuildError);
  });

  it("logs a summary of the built table", () => {
    const logger = createTestLogger();

    buildDispatchTable(createRegistry(), createResolver(), { logger });

    expect(logger.group).toHaveBeenCalledWith("Building dispatch table (3 handler(s))");
    expect(logger.groupEnd).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith("[message.created] 2 handler(s): greet, moderate");
    expect(logger.debug).toHaveBeenCalledWith("[member.joined] 1 handler(s): welcome");
    expect(logger.info).toHaveBeenCalledWith("Dispatch table ready: 3 handler(s) across 2 event type(s)");
  });
});
