import type { Logger } from "pino";
import { TransportError } from "./errors.js";
import type { ApiCall, ApiResult, ChatEvent, ChatTransport, InboundMessage } from "./types.js";

export interface BotSessionOptions {
  transport: ChatTransport;
  logger: Logger;
}

/**
 * BotSession: owns the connection to the chat service.
 *
 * Turns raw transport events into text messages for the dispatcher and
 * gives handlers a send primitive that never throws. Every inbound batch
 * and outbound call is logged at debug level.
 */
export class BotSession {
  private transport: ChatTransport;
  private logger: Logger;

  constructor(options: BotSessionOptions) {
    this.transport = options.transport;
    this.logger = options.logger.child({ component: "BotSession" });
  }

  /** Establish the session. Throws TransportError; there is no retry here. */
  async connect(): Promise<void> {
    try {
      await this.transport.connect();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error({ err }, "Connection error!");
      throw new TransportError(`Connection error: ${reason}`, { cause: err });
    }
    this.logger.info("Connection established.");
  }

  /**
   * Next batch of inbound text messages, possibly empty. Non-message events,
   * blank messages and events without a sender or channel are dropped.
   * Read failures propagate.
   */
  async receiveBatch(): Promise<InboundMessage[]> {
    const events = await this.transport.readEvents();
    if (events.length > 0) {
      this.logger.debug({ events }, "Received events");
    }

    const messages: InboundMessage[] = [];
    for (const event of events) {
      const message = toInboundMessage(event);
      if (message) messages.push(message);
    }
    return messages;
  }

  /** Post text to a channel. A failed post is logged, never thrown. */
  async send(channel: string, text: string): Promise<void> {
    const result = await this.call({ method: "postMessage", channel, text });
    if (!result.ok) {
      this.logger.warn({ channel, result }, "Erroneous result?");
    }
  }

  /** Issue an API call; transport exceptions come back as `{ ok: false }`. */
  async call(call: ApiCall): Promise<ApiResult> {
    this.logger.debug({ call }, "API call");

    let result: ApiResult;
    try {
      result = await this.transport.call(call);
    } catch (err) {
      result = { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    this.logger.debug({ method: call.method, result }, "API result");
    return result;
  }

  async disconnect(): Promise<void> {
    await this.transport.disconnect();
    this.logger.info("Disconnected.");
  }
}

export function toInboundMessage(event: ChatEvent): InboundMessage | null {
  if (event.type !== "message") return null;
  if (!event.text || !event.text.trim()) return null;
  if (!event.user || !event.channel) return null;
  return { text: event.text, user: event.user, channel: event.channel };
}
