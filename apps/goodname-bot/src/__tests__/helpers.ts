/**
 * Test helpers for goodname-bot tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { pino, type Logger } from "pino";
import type { BotConfig } from "../config.js";

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

export const silentLogger = pino({ level: "silent" });

/** Temp directory holding a good-names document with the given names. */
export function createTempDataFile(...names: string[]): {
  filename: string;
  read: () => Array<Record<string, unknown>>;
  cleanup: () => void;
} {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "goodname-bot-test-"));
  const filename = path.join(dir, "good_names.json");
  const records = names.map((name) => ({
    good_name: name,
    added_by: "U0",
    date_added: "2017-05-14 12:00:00",
    season: "11",
    votes: {},
  }));
  fs.writeFileSync(filename, JSON.stringify({ good_names: records }, null, 2));

  return {
    filename,
    read: () => JSON.parse(fs.readFileSync(filename, "utf-8")).good_names,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export const DEFAULT_TRIGGERS = [
  { trigger: ".*name alert.*", action: "post_good_name_alert" },
  { trigger: "!gna(.+)", action: "add_good_name" },
];

export function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    token: "test-token",
    actions: DEFAULT_TRIGGERS,
    debugCalls: [],
    dataFile: "good_names.json",
    season: "11",
    logLevel: "silent",
    pollIntervalMs: 1_000,
    reconnect: { attempts: 3, minDelayMs: 10, maxDelayMs: 100, jitter: 0 },
    ...overrides,
  };
}
