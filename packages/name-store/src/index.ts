// ── Store ────────────────────────────────────────────────────────────
export { FileNameStore, DEFAULT_SEASON } from "./fileStore.js";
export type { FileNameStoreOptions } from "./fileStore.js";
export { normalizeName } from "./normalize.js";

// ── Types ────────────────────────────────────────────────────────────
export type {
  Entry,
  EntryFilter,
  AddResult,
  AddRejection,
  NameStore,
} from "./types.js";

// ── Document codec ───────────────────────────────────────────────────
export {
  NAMES_KEY,
  formatTimestamp,
  parseTimestamp,
  parseDocument,
  serializeDocument,
} from "./document.js";
export type { GoodNameDocument, GoodNameRecord } from "./document.js";
