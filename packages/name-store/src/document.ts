/**
 * On-disk shape of the good-name store.
 *
 * {
 *   "good_names": [
 *     {
 *       "good_name": "Jerry mander",
 *       "added_by": "U04S0E2JZ",
 *       "date_added": "2017-05-14 12:00:00",
 *       "season": "11",
 *       "votes": {}
 *     }
 *   ]
 * }
 */

import { z } from "zod";
import type { Entry } from "./types.js";

export const NAMES_KEY = "good_names";

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

// Unknown keys, on records and on the document, survive a rewrite.
export const goodNameRecordSchema = z
  .object({
    good_name: z.string(),
    added_by: z.string(),
    date_added: z.string().regex(TIMESTAMP_RE, "expected YYYY-MM-DD HH:MM:SS"),
    season: z.string(),
    votes: z.record(z.string(), z.number()).default({}),
  })
  .passthrough();

export type GoodNameRecord = z.infer<typeof goodNameRecordSchema>;

export const goodNameDocumentSchema = z
  .object({ [NAMES_KEY]: z.array(goodNameRecordSchema) })
  .passthrough();

export type GoodNameDocument = z.infer<typeof goodNameDocumentSchema>;

// ── Timestamps ───────────────────────────────────────────────────────

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Format as `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/** Parse a `YYYY-MM-DD HH:MM:SS` UTC timestamp. Returns null if malformed. */
export function parseTimestamp(value: string): Date | null {
  const m = TIMESTAMP_RE.exec(value);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  return Number.isNaN(date.getTime()) ? null : date;
}

// ── Codec ────────────────────────────────────────────────────────────

export function recordToEntry(record: GoodNameRecord, text: string): Entry {
  return {
    text,
    contributor: record.added_by,
    createdAt: parseTimestamp(record.date_added) ?? new Date(0),
    season: record.season,
    votes: { ...record.votes },
  };
}

/** Build a record with keys in their persisted order. */
export function entryToRecord(entry: Entry): GoodNameRecord {
  return {
    good_name: entry.text,
    added_by: entry.contributor,
    date_added: formatTimestamp(entry.createdAt),
    season: entry.season,
    votes: { ...entry.votes },
  };
}

/** Parse raw file contents. Throws on invalid JSON or schema mismatch. */
export function parseDocument(raw: string): GoodNameDocument {
  return goodNameDocumentSchema.parse(JSON.parse(raw));
}

export function serializeDocument(doc: GoodNameDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
