// ---------------------------------------------------------------------------
// Due dates, stored-date parsing, and overdue fines.
// ---------------------------------------------------------------------------

import type { LendingConfig, Timestamp } from "../../core/types.js";

export const DAY_MS = 24 * 60 * 60 * 1_000;

/** `YYYY-MM-DD HH:MM`, the format older data files used for every date. */
const LEGACY_DATE_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

/** ISO-8601 with an explicit offset or `Z`, as written by this service. */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

export interface FineAssessment {
  /** Whole days past the due date; 0 when on time or the due date is unknown. */
  daysLate: number;
  fine: number;
}

export function computeDueDate(borrowedAt: Date, loanPeriodDays: number): Date {
  return new Date(borrowedAt.getTime() + loanPeriodDays * DAY_MS);
}

/**
 * Parse a date as stored in a loan or history entry. Legacy
 * `YYYY-MM-DD HH:MM` values are read as UTC. Returns `null` for anything
 * else, including impossible calendar dates.
 */
export function parseStoredDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const text = value.trim();

  const legacy = LEGACY_DATE_RE.exec(text);
  if (legacy) {
    const [y = 0, mo = 0, d = 0, h = 0, mi = 0] = legacy.slice(1).map(Number);
    const date = new Date(Date.UTC(y, mo - 1, d, h, mi));
    // Date.UTC rolls 2024-02-31 over into March; reject instead.
    if (date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d || h > 23 || mi > 59) {
      return null;
    }
    return date;
  }

  if (!ISO_DATE_RE.test(text)) return null;
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Normalise any readable stored date to ISO-8601; unreadable values stay `null`. */
export function normaliseStoredDate(value: string | null | undefined): Timestamp | null {
  return parseStoredDate(value)?.toISOString() ?? null;
}

/**
 * Fine owed for a copy returned at `returnedAt`. Lateness counts whole days
 * only, truncated; early and on-time returns owe nothing. There is no cap
 * and no grace period.
 */
export function assessFine(
  dueDate: string | null,
  returnedAt: Date,
  policy: Pick<LendingConfig, "finePerDay">,
): FineAssessment {
  const due = parseStoredDate(dueDate);
  if (!due) return { daysLate: 0, fine: 0 };

  const daysLate = Math.max(0, Math.floor((returnedAt.getTime() - due.getTime()) / DAY_MS));
  return { daysLate, fine: daysLate * policy.finePerDay };
}

/** `YYYY-MM-DD HH:MM` in UTC, for human-readable messages. */
export function formatDisplayDate(value: string | null): string {
  const date = parseStoredDate(value);
  if (!date) return value ?? "N/A";
  return date.toISOString().slice(0, 16).replace("T", " ");
}
