import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import {
  CANCELLATION,
  HandlerFault,
  createDelegateDispatch,
  createStaticResolver,
  createToken,
  defineEvent,
  defineHandler,
  fail,
  ok,
  silentLogger,
} from "./index.js";

interface Mailer {
  send(to: string, body: string, signal: AbortSignal): Promise<void>;
}

const MemberJoined = defineEvent("member.joined", z.object({ userId: z.string() }));
const MailerToken = createToken<Mailer>("Mailer");

describe("public API", () => {
  it("dispatches one event to every kind of handler", async () => {
    const mailer = { send: vi.fn(async () => {}) };
    const greeted: string[] = [];

    const dispatcher = createDelegateDispatch({
      resolver: createStaticResolver().provide(MailerToken, mailer),
      logger: silentLogger,
      config: { slowHandlerMs: 0 },
      configure: (registry) => {
        registry
          .register(
            MemberJoined,
            defineHandler(MemberJoined, {
              name: "welcome",
              inject: [MailerToken, CANCELLATION],
              async: true,
              handle: async (member, injected, signal) => {
                await injected.send(member.userId, "Welcome!", signal);
              },
            }),
          )
          .register(
            MemberJoined,
            defineHandler(MemberJoined, {
              name: "vet-name",
              returns: "result",
              handle: (member) => (member.userId.startsWith("bot-") ? fail("bots are not members") : ok()),
            }),
          )
          .register(MemberJoined, (member) => {
            greeted.push(member.userId);
          })
          .register(
            MemberJoined,
            defineHandler(MemberJoined, {
              name: "audit",
              returns: "signal",
              handle: (member) => {
                if (member.userId === "bot-2") {
                  throw new Error("audit store unavailable");
                }
                return true;
              },
            }),
          );
      },
    });
    const controller = new AbortController();

    const human = await dispatcher.dispatch({ name: "member.joined", payload: { userId: "user-1" } }, controller.signal);
    const bot = await dispatcher.dispatch({ name: "member.joined", payload: { userId: "bot-2" } });

    expect(human).toEqual({ isSuccess: true, failures: [] });
    expect(mailer.send).toHaveBeenNthCalledWith(1, "user-1", "Welcome!", controller.signal);
    expect(greeted).toEqual(["user-1", "bot-2"]);

    expect(bot.isSuccess).toBe(false);
    expect(bot.failures).toHaveLength(2);
    expect(bot.failures[0]).toEqual({ message: "bots are not members" });
    expect(bot.failures[1]).toBeInstanceOf(HandlerFault);
    expect(bot.failures[1].message).toBe('Handler "audit" failed on member.joined: audit store unavailable');
  });
});
