/**
 * GoodNameBot: wires the store, the dispatch registry and the chat
 * session into one poll-driven bot.
 */

import {
  BotSession,
  PollLoop,
  type ApiCall,
  type ChatTransport,
  type Logger,
  type ReconnectPolicy,
} from "@goodname/chat-core";
import { FileNameStore, type NameStore } from "@goodname/name-store";
import { createActionHandlers } from "./actions.js";
import type { BotConfig } from "./config.js";
import { DispatchRegistry } from "./registry.js";

export interface GoodNameBotOptions {
  session: BotSession;
  registry: DispatchRegistry;
  logger: Logger;
  /** API calls issued once after connecting */
  debugCalls?: ApiCall[];
  pollIntervalMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
  sleep?: (ms: number) => Promise<void>;
}

export class GoodNameBot {
  readonly session: BotSession;
  readonly registry: DispatchRegistry;
  readonly loop: PollLoop;
  private logger: Logger;
  private debugCalls: ApiCall[];

  constructor(options: GoodNameBotOptions) {
    this.session = options.session;
    this.registry = options.registry;
    this.logger = options.logger.child({ component: "GoodNameBot" });
    this.debugCalls = options.debugCalls ?? [];
    this.loop = new PollLoop({
      session: this.session,
      onMessage: (message) => this.registry.dispatch(message),
      logger: options.logger,
      intervalMs: options.pollIntervalMs,
      reconnect: options.reconnect,
      sleep: options.sleep,
    });
  }

  /**
   * Connect, run the startup diagnostics, then poll until stopped.
   * A failed initial connect rejects; so does running out of reconnects.
   */
  async start(): Promise<void> {
    await this.session.connect();
    await this.runDebugCalls();
    await this.loop.run();
  }

  /** Stop polling and close the session. */
  async stop(): Promise<void> {
    this.loop.stop();
    await this.session.disconnect();
  }

  /** Issue each configured diagnostic call once. Failures are only logged. */
  async runDebugCalls(): Promise<void> {
    for (const call of this.debugCalls) {
      this.logger.debug({ call }, "Calling api");
      const result = await this.session.call(call);
      if (!result.ok) {
        this.logger.warn({ call, error: result.error }, "Debug call failed");
      }
    }
  }
}

export interface CreateBotDeps {
  transport: ChatTransport;
  logger: Logger;
  /** Defaults to a FileNameStore on config.dataFile */
  store?: NameStore;
  sleep?: (ms: number) => Promise<void>;
}

/** Build a bot from validated config. Loads the store before returning. */
export async function createBot(config: BotConfig, deps: CreateBotDeps): Promise<GoodNameBot> {
  const { transport, logger } = deps;

  const store =
    deps.store ?? new FileNameStore({ filename: config.dataFile, season: config.season, logger });
  await store.load();
  if (!store.isConnected()) {
    logger.warn({ dataFile: config.dataFile }, "Good name store unavailable, continuing without it");
  }

  const session = new BotSession({ transport, logger });
  const registry = new DispatchRegistry({
    triggers: config.actions,
    handlers: createActionHandlers({ store, sender: session, logger }),
    logger,
  });

  return new GoodNameBot({
    session,
    registry,
    logger,
    debugCalls: config.debugCalls,
    pollIntervalMs: config.pollIntervalMs,
    reconnect: config.reconnect,
    sleep: deps.sleep,
  });
}
