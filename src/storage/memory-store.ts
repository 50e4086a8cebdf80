// ---------------------------------------------------------------------------
// In-memory store for tests and throwaway runs.
// ---------------------------------------------------------------------------

import type { LibrarySnapshot } from "../core/types.js";
import { PersistenceError } from "../core/errors.js";
import { emptySnapshot, type StateStore } from "./state-store.js";

export class MemoryStateStore implements StateStore {
  readonly location = "memory";

  private saved: LibrarySnapshot | null;
  private pendingFailure: string | null = null;
  private saves = 0;

  constructor(initial: LibrarySnapshot | null = null) {
    this.saved = initial ? structuredClone(initial) : null;
  }

  /** Number of successful saves so far. */
  get saveCount(): number {
    return this.saves;
  }

  /** The last saved state, or `null` if nothing was saved yet. */
  get lastSaved(): LibrarySnapshot | null {
    return this.saved ? structuredClone(this.saved) : null;
  }

  /** Make the next `save()` reject with a {@link PersistenceError}. */
  failNextSave(reason = "simulated write failure"): void {
    this.pendingFailure = reason;
  }

  async load(): Promise<LibrarySnapshot> {
    return this.saved ? structuredClone(this.saved) : emptySnapshot();
  }

  async save(snapshot: LibrarySnapshot): Promise<void> {
    if (this.pendingFailure !== null) {
      const reason = this.pendingFailure;
      this.pendingFailure = null;
      throw new PersistenceError(this.location, reason);
    }
    this.saved = structuredClone(snapshot);
    this.saves++;
  }
}
