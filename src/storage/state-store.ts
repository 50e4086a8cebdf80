// ---------------------------------------------------------------------------
// Persistence contract for the whole library state.
// ---------------------------------------------------------------------------

import type { LibrarySnapshot } from "../core/types.js";

/**
 * Every store must implement this interface. The lending engine calls
 * `load()` once at start-up and `save()` after every mutation.
 */
export interface StateStore {
  /** Human-readable location, used in logs and error messages. */
  readonly location: string;

  /**
   * Read the stored state. A missing or unreadable store yields an empty
   * snapshot; this never rejects.
   */
  load(): Promise<LibrarySnapshot>;

  /**
   * Replace the stored state with `snapshot`.
   * @throws {PersistenceError} when the write fails.
   */
  save(snapshot: LibrarySnapshot): Promise<void>;
}

export function emptySnapshot(): LibrarySnapshot {
  return { books: [], members: [], history: [] };
}
