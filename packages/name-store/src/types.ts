// ── Entries ──────────────────────────────────────────────────────────

/** One curated good name, as held in memory. */
export interface Entry {
  /** Normalized display text; the natural key of the store */
  text: string;
  /** Id of whoever submitted it */
  contributor: string;
  createdAt: Date;
  /** Season the name was added in */
  season: string;
  /** Voter id → vote value */
  votes: Record<string, number>;
}

export interface EntryFilter {
  /** Only consider entries tagged with this season */
  season?: string;
}

// ── Insertion ────────────────────────────────────────────────────────

export type AddRejection = "duplicate" | "empty" | "unavailable";

export type AddResult =
  | { added: true; text: string; entry: Entry }
  | { added: false; text: string; reason: AddRejection };

// ── Store ────────────────────────────────────────────────────────────

export interface NameStore {
  load(): Promise<void>;
  isConnected(): boolean;
  getRandomEntry(filter?: EntryFilter): Entry | null;
  getEntry(text: string): Entry | null;
  addEntry(text: string, contributor: string): Promise<AddResult>;
  readonly size: number;
}
