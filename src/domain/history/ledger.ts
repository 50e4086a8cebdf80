// ---------------------------------------------------------------------------
// Append-only transaction history.
// ---------------------------------------------------------------------------

import type { HistoryEntry } from "../../core/types.js";

/**
 * Chronological log of borrow / return transactions. Entries are frozen on
 * append and the ledger exposes no way to remove or edit them.
 */
export class HistoryLedger {
  private readonly log: HistoryEntry[] = [];

  constructor(initial: HistoryEntry[] = []) {
    for (const entry of initial) {
      this.append(entry);
    }
  }

  get size(): number {
    return this.log.length;
  }

  append(entry: HistoryEntry): void {
    this.log.push(Object.freeze({ ...entry }));
  }

  /** Oldest first. */
  entries(): HistoryEntry[] {
    return [...this.log];
  }

  /** Newest first; does not disturb the ledger. */
  recentFirst(): HistoryEntry[] {
    return [...this.log].reverse();
  }
}
