/**
 * Test helpers for chat-core tests.
 */

import { pino, type Logger } from "pino";
import { BotSession } from "../session.js";
import { MemoryTransport } from "../memoryTransport.js";

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** A debug-level logger whose JSON lines are collected in memory. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    { write: (line: string) => void lines.push(JSON.parse(line)) },
  );
  return { logger, lines };
}

/** A connected session over a fresh MemoryTransport. */
export async function connectedSession(logger: Logger = pino({ level: "silent" })) {
  const transport = new MemoryTransport();
  const session = new BotSession({ transport, logger });
  await session.connect();
  return { transport, session };
}
