// ---------------------------------------------------------------------------
// Core types for the Lending Desk service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Unique identifier for a book record in the catalog. */
export type BookId = string & { readonly __brand: "BookId" };

/** Unique identifier for a member of the library. */
export type MemberId = string & { readonly __brand: "MemberId" };

/** An ISO-8601 timestamp, e.g. `2024-03-01T09:30:00.000Z`. */
export type Timestamp = string;

// ── Records ─────────────────────────────────────────────────────────────────

/** One checked-out copy of a book. */
export interface Loan {
  memberId: MemberId;
  /** `null` when imported from a store that never recorded it. */
  borrowedAt: Timestamp | null;
  dueDate: Timestamp | null;
}

/**
 * A catalog entry. A single-copy book is simply `totalCopies === 1`.
 *
 * `loans.length === totalCopies - availableCopies` at all times.
 */
export interface Book {
  id: BookId;
  title: string;
  author: string;
  totalCopies: number;
  availableCopies: number;
  loans: Loan[];
}

export interface Member {
  id: MemberId;
  name: string;
  borrowedBookIds: BookId[];
}

export const HistoryAction = {
  BORROW: "borrow",
  RETURN: "return",
} as const;
export type HistoryAction = (typeof HistoryAction)[keyof typeof HistoryAction];

export interface BorrowEntry {
  readonly timestamp: Timestamp;
  readonly action: typeof HistoryAction.BORROW;
  readonly bookId: BookId;
  readonly memberId: MemberId;
  readonly dueDate: Timestamp;
}

export interface ReturnEntry {
  readonly timestamp: Timestamp;
  readonly action: typeof HistoryAction.RETURN;
  readonly bookId: BookId;
  readonly memberId: MemberId;
  readonly fine: number;
}

export type HistoryEntry = BorrowEntry | ReturnEntry;

/** Full persisted state: what a {@link StateStore} reads and writes. */
export interface LibrarySnapshot {
  books: Book[];
  members: Member[];
  history: HistoryEntry[];
}

// ── Results ─────────────────────────────────────────────────────────────────

export const FailureCode = {
  DUPLICATE_ID: "DuplicateId",
  INVALID_INPUT: "InvalidInput",
  MEMBER_NOT_FOUND: "MemberNotFound",
  BOOK_NOT_FOUND: "BookNotFound",
  NO_COPIES_AVAILABLE: "NoCopiesAvailable",
  ALREADY_HELD_BY_MEMBER: "AlreadyHeldByMember",
  NOT_HELD_BY_MEMBER: "NotHeldByMember",
} as const;
export type FailureCode = (typeof FailureCode)[keyof typeof FailureCode];

export type AddFailureCode =
  | typeof FailureCode.DUPLICATE_ID
  | typeof FailureCode.INVALID_INPUT;

export type BorrowFailureCode =
  | typeof FailureCode.MEMBER_NOT_FOUND
  | typeof FailureCode.BOOK_NOT_FOUND
  | typeof FailureCode.NO_COPIES_AVAILABLE
  | typeof FailureCode.ALREADY_HELD_BY_MEMBER;

export type ReturnFailureCode =
  | typeof FailureCode.MEMBER_NOT_FOUND
  | typeof FailureCode.BOOK_NOT_FOUND
  | typeof FailureCode.NOT_HELD_BY_MEMBER;

export interface Failure<C extends FailureCode> {
  code: C;
  /** Names the record involved, for message rendering. */
  subject?: { memberName?: string; bookTitle?: string };
}

export type Result<T, C extends FailureCode> =
  | { ok: true; value: T }
  | { ok: false; error: Failure<C> };

// ── Lending requests & payloads ─────────────────────────────────────────────

/**
 * Borrow / return requests state how the member and book are addressed.
 * Both are by id, or both are by display name / title.
 */
export type LendingRequest =
  | { mode: "id"; memberId: string; bookId: string }
  | { mode: "name"; memberName: string; bookTitle: string };

export interface LoanInfo {
  bookId: BookId;
  memberId: MemberId;
  title: string;
  memberName: string;
  borrowedAt: Timestamp;
  dueDate: Timestamp;
}

export interface ReturnInfo {
  bookId: BookId;
  memberId: MemberId;
  title: string;
  memberName: string;
  returnedAt: Timestamp;
  daysLate: number;
  fine: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  logLevel: string;
  storage: StorageConfig;
  lending: LendingConfig;
}

export interface StorageConfig {
  /** Path of the JSON document holding the whole library state. */
  dataFile: string;
}

export interface LendingConfig {
  loanPeriodDays: number;
  finePerDay: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}
