// ── Inbound ──────────────────────────────────────────────────────────

/** Raw event as delivered by a transport. */
export interface ChatEvent {
  /** Event discriminator; only "message" events reach handlers */
  type: string;
  text?: string;
  /** Sender id */
  user?: string;
  /** Channel (destination) id */
  channel?: string;
  /** Transport-specific message id */
  id?: string;
}

/** A text message that passed the session's filters. */
export interface InboundMessage {
  /** Message text, untrimmed */
  text: string;
  /** Sender id */
  user: string;
  /** Channel the message was posted in; replies go here */
  channel: string;
}

// ── Outbound ─────────────────────────────────────────────────────────

export type ApiCall =
  | { method: "postMessage"; channel: string; text: string }
  | { method: "fetchChannel"; channel: string }
  | { method: "whoami" };

export type ApiMethod = ApiCall["method"];

export type ApiResult =
  | { ok: true; data: Record<string, unknown> }
  | { ok: false; error: string };

// ── Transport port ───────────────────────────────────────────────────

/**
 * What a bot session needs from a messaging service.
 * Implementations: DiscordTransport, MemoryTransport.
 */
export interface ChatTransport {
  /** Open (or reopen) the session. Throws when the handshake fails. */
  connect(): Promise<void>;
  /**
   * Drain the events received since the last read. Throws when the
   * connection has been lost.
   */
  readEvents(): Promise<ChatEvent[]>;
  /** Issue an API call. May throw on transport failure. */
  call(call: ApiCall): Promise<ApiResult>;
  /** Close the session. */
  disconnect(): Promise<void>;
}
