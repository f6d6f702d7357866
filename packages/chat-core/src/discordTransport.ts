import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import type { Logger } from "pino";
import { chunkMessage } from "./chunker.js";
import { TransportError } from "./errors.js";
import type { ApiCall, ApiResult, ChatEvent, ChatTransport } from "./types.js";

// ── Gateway client ───────────────────────────────────────────────────

/** Message fields read from `messageCreate`. */
export interface GatewayMessage {
  id: string;
  content: string;
  channelId: string;
  author: { id: string; bot: boolean };
}

export interface GatewayChannel {
  id: string;
  type: number;
  isSendable(): boolean;
  send?(content: string): Promise<{ id: string }>;
}

/** The part of a discord.js `Client` the transport drives. */
export interface GatewayClient {
  readonly user: { id: string; tag: string } | null;
  readonly channels: { fetch(id: string): Promise<GatewayChannel | null> };
  on<A extends unknown[]>(event: string, listener: (...args: A) => void): unknown;
  once<A extends unknown[]>(event: string, listener: (...args: A) => void): unknown;
  login(token: string): Promise<unknown>;
  destroy(): Promise<void>;
}

export function createDiscordClient(): GatewayClient {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.DirectMessages,
      GatewayIntentBits.MessageContent,
    ],
    partials: [Partials.Channel, Partials.Message],
  });
}

// ── Transport ────────────────────────────────────────────────────────

export interface DiscordTransportOptions {
  /** Discord bot token */
  botToken: string;
  logger: Logger;
  /** How long to wait for the gateway ready event (default: 30000) */
  readyTimeoutMs?: number;
  /** Max buffered events between reads; oldest are dropped (default: 500) */
  maxInbox?: number;
  /** Builds a fresh client on every connect (default: createDiscordClient) */
  createClient?: () => GatewayClient;
}

/**
 * Discord gateway transport.
 *
 * discord.js pushes messages as they arrive; they are buffered here and
 * handed out in batches by readEvents(). Messages written by bots,
 * including this one, are ignored.
 */
export class DiscordTransport implements ChatTransport {
  private client: GatewayClient | null = null;
  private inbox: ChatEvent[] = [];
  private lost: TransportError | null = null;
  private botToken: string;
  private logger: Logger;
  private readyTimeoutMs: number;
  private maxInbox: number;
  private createClient: () => GatewayClient;

  constructor(options: DiscordTransportOptions) {
    this.botToken = options.botToken;
    this.logger = options.logger.child({ component: "DiscordTransport" });
    this.readyTimeoutMs = options.readyTimeoutMs ?? 30_000;
    this.maxInbox = options.maxInbox ?? 500;
    this.createClient = options.createClient ?? createDiscordClient;
  }

  async connect(): Promise<void> {
    await this.disconnect();

    const client = this.createClient();

    client.on(Events.MessageCreate, (msg: GatewayMessage) => this.enqueue(msg));
    client.on(Events.ShardDisconnect, (event: { code: number }, shardId: number) => {
      if (this.client !== client) return;
      this.lost = new TransportError(`Connection lost (shard ${shardId}, code ${event.code})`);
      this.logger.warn({ shardId, code: event.code }, "Gateway connection closed");
    });
    client.on(Events.Invalidated, () => {
      if (this.client !== client) return;
      this.lost = new TransportError("Connection lost: session invalidated");
    });
    client.on(Events.Error, (err: Error) => {
      this.logger.error({ err }, "Discord error");
      if (this.client !== client) return;
      this.lost = new TransportError(`Connection lost: ${err.message}`, { cause: err });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(
          () => reject(new TransportError(`No ready event within ${this.readyTimeoutMs}ms`)),
          this.readyTimeoutMs,
        );
        client.once(Events.ClientReady, () => {
          clearTimeout(timer);
          resolve();
        });
        client.login(this.botToken).catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
      });
    } catch (err) {
      await client.destroy();
      throw err;
    }

    this.client = client;
    this.lost = null;
    this.logger.info({ tag: client.user?.tag }, "Discord bot connected");
  }

  async readEvents(): Promise<ChatEvent[]> {
    if (this.lost) throw this.lost;
    if (!this.client) throw new TransportError("Not connected");

    const batch = this.inbox;
    this.inbox = [];
    return batch;
  }

  async call(call: ApiCall): Promise<ApiResult> {
    const client = this.client;
    if (!client) return { ok: false, error: "not_connected" };

    switch (call.method) {
      case "postMessage": {
        const channel = await client.channels.fetch(call.channel);
        if (!channel) return { ok: false, error: "channel_not_found" };
        if (!channel.isSendable() || !channel.send) {
          return { ok: false, error: "channel_not_sendable" };
        }

        const ids: string[] = [];
        for (const chunk of chunkMessage(call.text)) {
          const sent = await channel.send(chunk);
          ids.push(sent.id);
        }
        return { ok: true, data: { channel: call.channel, ids } };
      }
      case "fetchChannel": {
        const channel = await client.channels.fetch(call.channel);
        if (!channel) return { ok: false, error: "channel_not_found" };
        return { ok: true, data: { id: channel.id, type: channel.type } };
      }
      case "whoami": {
        const user = client.user;
        if (!user) return { ok: false, error: "not_ready" };
        return { ok: true, data: { id: user.id, tag: user.tag } };
      }
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.inbox = [];
    if (client) {
      await client.destroy();
    }
  }

  private enqueue(msg: GatewayMessage): void {
    if (msg.author.bot) return;

    this.inbox.push({
      type: "message",
      text: msg.content,
      user: msg.author.id,
      channel: msg.channelId,
      id: msg.id,
    });

    if (this.inbox.length > this.maxInbox) {
      const dropped = this.inbox.shift();
      this.logger.warn({ id: dropped?.id }, "Inbox full, dropping oldest event");
    }
  }
}
