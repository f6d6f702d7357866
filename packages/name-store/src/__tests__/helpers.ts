/**
 * Test helpers for name-store tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { pino, type Logger } from "pino";

/** Create a temporary directory holding a good-names document. */
export function createTempStoreFile(contents?: string): {
  dir: string;
  filename: string;
  cleanup: () => void;
} {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "name-store-test-"));
  const filename = path.join(dir, "good_names.json");
  if (contents !== undefined) {
    fs.writeFileSync(filename, contents, "utf-8");
  }

  return {
    dir,
    filename,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

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

export function record(goodName: string, overrides: Record<string, unknown> = {}) {
  return {
    good_name: goodName,
    added_by: "U0",
    date_added: "2017-05-14 12:00:00",
    season: "11",
    votes: {},
    ...overrides,
  };
}

export function documentWith(...records: Array<ReturnType<typeof record>>): string {
  return JSON.stringify({ good_names: records }, null, 2);
}
