import type { Logger } from "pino";
import { ReconnectExhaustedError } from "./errors.js";
import { retryAsync, sleep } from "./retry.js";
import type { InboundMessage } from "./types.js";

export type PollLoopState = "idle" | "running" | "recovering" | "stopped";

export interface ReconnectPolicy {
  /** Connect attempts per recovery before giving up */
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  /** Jitter factor 0–1 */
  jitter: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  attempts: 5,
  minDelayMs: 1_000,
  maxDelayMs: 60_000,
  jitter: 0.2,
};

/** The part of BotSession the loop drives. */
export interface PollableSession {
  connect(): Promise<void>;
  receiveBatch(): Promise<InboundMessage[]>;
}

export interface PollLoopOptions {
  session: PollableSession;
  /** Called for each received message, in order, one at a time */
  onMessage: (message: InboundMessage) => Promise<unknown>;
  logger: Logger;
  /** Pause between ticks (default: 1000) */
  intervalMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
  sleep?: (ms: number) => Promise<void>;
  /** Randomness for backoff jitter (default: Math.random) */
  random?: () => number;
}

/**
 * PollLoop: receive, dispatch, sleep, forever.
 *
 * Any error escaping a tick moves the loop to "recovering", where the
 * session is reconnected with exponential backoff. When the reconnect
 * budget runs out, run() rejects with ReconnectExhaustedError.
 */
export class PollLoop {
  readonly intervalMs: number;
  readonly reconnect: ReconnectPolicy;
  private session: PollableSession;
  private onMessage: (message: InboundMessage) => Promise<unknown>;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private random: (() => number) | undefined;
  private _state: PollLoopState = "idle";
  private stopRequested = false;

  constructor(options: PollLoopOptions) {
    this.session = options.session;
    this.onMessage = options.onMessage;
    this.logger = options.logger.child({ component: "PollLoop" });
    this.intervalMs = options.intervalMs ?? 1_000;
    this.reconnect = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };
    this.sleep = options.sleep ?? sleep;
    this.random = options.random;
  }

  get state(): PollLoopState {
    return this._state;
  }

  /** One receive/dispatch cycle. Returns the number of messages handled. */
  async tick(): Promise<number> {
    const batch = await this.session.receiveBatch();
    for (const message of batch) {
      await this.onMessage(message);
    }
    return batch.length;
  }

  async run(): Promise<void> {
    if (this._state === "running" || this._state === "recovering") {
      throw new Error("Poll loop is already running");
    }

    this.stopRequested = false;
    this._state = "running";
    this.logger.info({ intervalMs: this.intervalMs }, "Poll loop started");

    while (!this.stopRequested) {
      try {
        await this.tick();
      } catch (err) {
        if (this.stopRequested) break;
        await this.recover(err);
      }
      if (this.stopRequested) break;
      await this.sleep(this.intervalMs);
    }

    this._state = "stopped";
    this.logger.info("Poll loop stopped");
  }

  /** Ask the loop to exit after the current tick. */
  stop(): void {
    this.stopRequested = true;
  }

  private async recover(cause: unknown): Promise<void> {
    this._state = "recovering";
    this.logger.error({ err: cause }, "Got exception when attempting to read!");

    let tries = 0;
    try {
      await retryAsync(
        () => {
          tries++;
          return this.session.connect();
        },
        {
          ...this.reconnect,
          sleep: this.sleep,
          random: this.random,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
            this.logger.warn(
              { attempt, maxAttempts, delayMs, err: error },
              "Reconnect failed, backing off",
            ),
        },
      );
    } catch (err) {
      this._state = "stopped";
      this.logger.fatal({ err, tries }, "Giving up on reconnecting");
      throw new ReconnectExhaustedError(tries, err);
    }

    this._state = "running";
  }
}
