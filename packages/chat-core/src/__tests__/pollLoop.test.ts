import { describe, test, expect } from "vitest";
import { pino } from "pino";
import { PollLoop, type PollLoopOptions } from "../pollLoop.js";
import { ReconnectExhaustedError } from "../errors.js";
import type { InboundMessage } from "../types.js";
import { captureLogger, connectedSession } from "./helpers.js";

const silent = pino({ level: "silent" });

/** Sleep stub that records delays and stops the loop after `limit` sleeps. */
function recordingSleep(limit: number) {
  const delays: number[] = [];
  let loop: PollLoop | null = null;
  return {
    delays,
    attach: (l: PollLoop) => {
      loop = l;
    },
    sleep: async (ms: number) => {
      delays.push(ms);
      if (delays.length >= limit) loop?.stop();
    },
  };
}

function makeLoop(
  options: Omit<PollLoopOptions, "logger" | "sleep"> & { limit: number; logger?: PollLoopOptions["logger"] },
) {
  const { limit, logger = silent, ...rest } = options;
  const clock = recordingSleep(limit);
  const loop = new PollLoop({
    ...rest,
    logger,
    sleep: clock.sleep,
    random: () => 0.5,
    reconnect: { minDelayMs: 100, maxDelayMs: 1_000, jitter: 0.2, ...rest.reconnect },
  });
  clock.attach(loop);
  return { loop, delays: clock.delays };
}

describe("PollLoop", () => {
  test("hands every message to the handler in order, then sleeps one interval", async () => {
    const { transport, session } = await connectedSession();
    transport.push(
      { type: "message", text: "first", user: "U1", channel: "C1" },
      { type: "message", text: "second", user: "U2", channel: "C1" },
    );
    const seen: InboundMessage[] = [];
    const { loop, delays } = makeLoop({
      session,
      onMessage: async (m) => seen.push(m),
      limit: 1,
    });

    await loop.run();

    expect(seen.map((m) => m.text)).toEqual(["first", "second"]);
    expect(delays).toEqual([1_000]);
    expect(loop.state).toBe("stopped");
  });

  test("tick returns the number of messages handled", async () => {
    const { transport, session } = await connectedSession();
    transport.push({ type: "message", text: "hi", user: "U1", channel: "C1" }, { type: "hello" });
    const { loop } = makeLoop({ session, onMessage: async () => {}, limit: 1 });

    expect(await loop.tick()).toBe(1);
    expect(await loop.tick()).toBe(0);
  });

  test("reconnects after a read failure and keeps polling", async () => {
    const { transport, session } = await connectedSession();
    transport.failRead();
    const seen: string[] = [];
    const { loop, delays } = makeLoop({
      session,
      onMessage: async (m) => seen.push(m.text),
      limit: 2,
    });

    const running = loop.run();
    transport.push({ type: "message", text: "after reconnect", user: "U1", channel: "C1" });
    await running;

    expect(transport.connectCount).toBe(2);
    expect(seen).toEqual(["after reconnect"]);
    expect(delays).toEqual([1_000, 1_000]);
  });

  test("backs off exponentially between failed reconnects", async () => {
    const { transport, session } = await connectedSession();
    transport.failRead();
    transport.failConnect(new Error("ECONNRESET"), 2);
    const { logger, lines } = captureLogger();
    const { loop, delays } = makeLoop({ session, onMessage: async () => {}, limit: 3, logger });

    await loop.run();

    expect(delays).toEqual([100, 200, 1_000]);
    expect(transport.connectCount).toBe(4);
    expect(lines.filter((l) => l.msg === "Reconnect failed, backing off")).toHaveLength(2);
    expect(lines.find((l) => l.level === 50)?.msg).toBe("Got exception when attempting to read!");
  });

  test("gives up once the reconnect budget is spent", async () => {
    const { transport, session } = await connectedSession();
    transport.failRead();
    transport.failConnect(new Error("socket hang up"), 5);
    const { loop, delays } = makeLoop({
      session,
      onMessage: async () => {},
      limit: 10,
      reconnect: { attempts: 3 },
    });

    const outcome = loop.run();

    await expect(outcome).rejects.toBeInstanceOf(ReconnectExhaustedError);
    await expect(outcome).rejects.toMatchObject({ attempts: 3 });
    expect(delays).toEqual([100, 200]);
    expect(loop.state).toBe("stopped");
  });

  test("does not retry an authentication failure", async () => {
    const { transport, session } = await connectedSession();
    transport.failRead();
    transport.failConnect(new Error("An invalid token was provided."), 1);
    const { loop, delays } = makeLoop({ session, onMessage: async () => {}, limit: 10 });

    await expect(loop.run()).rejects.toMatchObject({ attempts: 1 });
    expect(delays).toEqual([]);
    expect(transport.connectCount).toBe(2);
  });

  test("a handler error escaping dispatch triggers a reconnect", async () => {
    const { transport, session } = await connectedSession();
    transport.push({ type: "message", text: "boom", user: "U1", channel: "C1" });
    const { loop } = makeLoop({
      session,
      onMessage: async () => {
        throw new Error("handler exploded");
      },
      limit: 1,
    });

    await loop.run();

    expect(transport.connectCount).toBe(2);
  });

  test("refuses to run twice at once", async () => {
    const { session } = await connectedSession();
    const { loop } = makeLoop({ session, onMessage: async () => {}, limit: 1 });

    const first = loop.run();
    await expect(loop.run()).rejects.toThrow("Poll loop is already running");
    await first;
  });
});
