import { readFile, writeFile } from "fs/promises";
import type { Logger } from "pino";
import {
  NAMES_KEY,
  entryToRecord,
  parseDocument,
  recordToEntry,
  serializeDocument,
  type GoodNameDocument,
} from "./document.js";
import { normalizeName } from "./normalize.js";
import type { AddResult, Entry, EntryFilter, NameStore } from "./types.js";

export const DEFAULT_SEASON = "11";

export interface FileNameStoreOptions {
  /** Path of the JSON backing document */
  filename: string;
  logger: Logger;
  /** Season tag given to new entries (default: "11") */
  season?: string;
  /** Source of randomness in [0, 1) (default: Math.random) */
  random?: () => number;
  /** Clock used to stamp new entries (default: current time) */
  now?: () => Date;
}

/**
 * FileNameStore: good names kept in memory, persisted as one JSON document.
 *
 * Every I/O failure is caught here, logged, and turned into a null or
 * "unavailable" result. Nothing in this class throws past its public methods.
 */
export class FileNameStore implements NameStore {
  readonly filename: string;
  readonly season: string;
  private logger: Logger;
  private random: () => number;
  private now: () => Date;
  private document: GoodNameDocument | null = null;
  private entries = new Map<string, Entry>();
  private _lastError: Error | null = null;

  constructor(options: FileNameStoreOptions) {
    this.filename = options.filename;
    this.season = options.season ?? DEFAULT_SEASON;
    this.logger = options.logger.child({ component: "FileNameStore" });
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  /** The error that left the store disconnected, if any. */
  get lastError(): Error | null {
    return this._lastError;
  }

  get size(): number {
    return this.document ? this.entries.size : 0;
  }

  async load(): Promise<void> {
    this.document = null;
    this.entries.clear();

    let doc: GoodNameDocument;
    try {
      doc = parseDocument(await readFile(this.filename, "utf-8"));
    } catch (err) {
      this.disconnect(err);
      this.logger.error(
        { err, filename: this.filename },
        "Got error when attempting to open file",
      );
      return;
    }

    for (const record of doc[NAMES_KEY]) {
      const text = normalizeName(record.good_name);
      if (this.entries.has(text)) {
        this.logger.warn({ goodName: record.good_name }, "Skipping duplicate good name in file");
        continue;
      }
      this.entries.set(text, recordToEntry(record, text));
    }

    this.document = doc;
    this._lastError = null;
    this.logger.info(
      { filename: this.filename, count: this.entries.size },
      "Loaded good names",
    );
  }

  isConnected(): boolean {
    return this.document !== null;
  }

  getRandomEntry(filter: EntryFilter = {}): Entry | null {
    if (!this.isConnected()) {
      this.logger.debug("Could not get good name, resource not connected");
      return null;
    }

    let pool = [...this.entries.values()];
    if (filter.season !== undefined) {
      pool = pool.filter((e) => e.season === filter.season);
    }
    if (pool.length === 0) return null;

    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index];
  }

  getEntry(text: string): Entry | null {
    if (!this.isConnected()) return null;
    return this.entries.get(normalizeName(text)) ?? null;
  }

  /**
   * Idempotently add a good name. The document is rewritten first; memory
   * is only updated once the write has succeeded.
   */
  async addEntry(text: string, contributor: string): Promise<AddResult> {
    const normalized = normalizeName(text);

    const doc = this.document;
    if (!doc) {
      this.logger.debug({ text: normalized }, "Could not add good name, resource not connected");
      return { added: false, text: normalized, reason: "unavailable" };
    }
    if (!normalized) {
      return { added: false, text: normalized, reason: "empty" };
    }
    if (this.entries.has(normalized)) {
      return { added: false, text: normalized, reason: "duplicate" };
    }

    const entry: Entry = {
      text: normalized,
      contributor,
      createdAt: this.now(),
      season: this.season,
      votes: {},
    };
    const next: GoodNameDocument = {
      ...doc,
      [NAMES_KEY]: [...doc[NAMES_KEY], entryToRecord(entry)],
    };

    try {
      await writeFile(this.filename, serializeDocument(next), "utf-8");
    } catch (err) {
      this.disconnect(err);
      this.logger.error(
        { err, filename: this.filename },
        "Got error when attempting to dump current good names",
      );
      return { added: false, text: normalized, reason: "unavailable" };
    }

    this.document = next;
    this.entries.set(normalized, entry);
    this.logger.info({ goodName: normalized, contributor }, "Recorded good name");
    return { added: true, text: normalized, entry };
  }

  private disconnect(err: unknown): void {
    this.document = null;
    this.entries.clear();
    this._lastError = err instanceof Error ? err : new Error(String(err));
  }
}
