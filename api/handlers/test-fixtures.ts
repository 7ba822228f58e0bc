/**
 * Shared test fixtures for handler tests.
 */

import { vi } from "vitest";
import { z } from "zod";
import type { Logger } from "../lib/logger.js";
import { createToken, defineEvent } from "./definitions.js";
import type { IncomingEvent } from "./types.js";

export const MessageCreated = defineEvent(
  "message.created",
  z.object({
    channelId: z.string(),
    content: z.string(),
  }),
);

export const MemberJoined = defineEvent(
  "member.joined",
  z.object({
    userId: z.string(),
  }),
);

export interface Clock {
  now(): number;
}

export interface AuditLog {
  readonly entries: string[];
  record(entry: string): void;
}

export const ClockToken = createToken<Clock>("Clock");
export const AuditLogToken = createToken<AuditLog>("AuditLog");

export function createAuditLog(): AuditLog {
  const entries: string[] = [];
  return {
    entries,
    record: (entry) => {
      entries.push(entry);
    },
  };
}

export function messageEvent(content: string, channelId = "channel-1"): IncomingEvent {
  return { name: MessageCreated.name, payload: { channelId, content } };
}

export function memberEvent(userId: string): IncomingEvent {
  return { name: MemberJoined.name, payload: { userId } };
}

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  } satisfies Logger;
}

/**
 * A promise plus the function that settles it, for holding a handler open.
 */
export function createDeferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}

/** Let every queued microtask and timer callback run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
