// ── Session ──────────────────────────────────────────────────────────
export { BotSession, toInboundMessage } from "./session.js";
export type { BotSessionOptions } from "./session.js";
export { PollLoop, DEFAULT_RECONNECT_POLICY } from "./pollLoop.js";
export type {
  PollLoopOptions,
  PollLoopState,
  PollableSession,
  ReconnectPolicy,
} from "./pollLoop.js";

// ── Transports ───────────────────────────────────────────────────────
export { DiscordTransport, createDiscordClient } from "./discordTransport.js";
export type {
  DiscordTransportOptions,
  GatewayChannel,
  GatewayClient,
  GatewayMessage,
} from "./discordTransport.js";
export { MemoryTransport } from "./memoryTransport.js";
export type { PostedMessage } from "./memoryTransport.js";

// ── Types ────────────────────────────────────────────────────────────
export type {
  ChatEvent,
  InboundMessage,
  ApiCall,
  ApiMethod,
  ApiResult,
  ChatTransport,
} from "./types.js";

// ── Errors ───────────────────────────────────────────────────────────
export { TransportError, ReconnectExhaustedError } from "./errors.js";

// ── Utilities ────────────────────────────────────────────────────────
export { createLogger, LOG_LEVELS } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";
export {
  retryAsync,
  backoffDelay,
  sleep,
  isAuthError,
} from "./retry.js";
export type { RetryOptions, RetryInfo } from "./retry.js";
export { chunkMessage, MAX_MESSAGE_LENGTH } from "./chunker.js";
