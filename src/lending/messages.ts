// ---------------------------------------------------------------------------
// Human-readable renderings of records and operation outcomes.
// ---------------------------------------------------------------------------

import type { Book, Failure, HistoryEntry, Member } from "../core/types.js";
import { FailureCode, HistoryAction } from "../core/types.js";
import type { PersistenceError } from "../core/errors.js";
import { formatDisplayDate } from "../domain/fines/fine-policy.js";

export type RecordKind = "book" | "member";

export function formatBook(book: Book): string {
  const line = `[${book.id}] ${book.title} by ${book.author} - ${book.availableCopies}/${book.totalCopies} available`;
  if (book.loans.length === 0) return line;

  const borrowers = book.loans
    .map((l) => (l.dueDate ? `${l.memberId} (due ${formatDisplayDate(l.dueDate)})` : l.memberId))
    .join(", ");
  return `${line} | Borrowers: ${borrowers}`;
}

export function formatMember(member: Member): string {
  return `[${member.id}] ${member.name} | Borrowed: ${member.borrowedBookIds.length}`;
}

export function formatHistoryEntry(entry: HistoryEntry): string {
  const head = `${formatDisplayDate(entry.timestamp)} | ${entry.action.toUpperCase()} | Book ${entry.bookId} | Member ${entry.memberId}`;
  return entry.action === HistoryAction.BORROW
    ? `${head} | Due ${formatDisplayDate(entry.dueDate)}`
    : `${head} | Fine ${entry.fine}`;
}

/** Message for a rejected operation. `kind` only matters for add failures. */
export function failureMessage(failure: Failure<FailureCode>, kind: RecordKind = "book"): string {
  const title = failure.subject?.bookTitle ?? "that book";
  const name = failure.subject?.memberName ?? "This member";

  switch (failure.code) {
    case FailureCode.DUPLICATE_ID:
      return kind === "book" ? "Book ID already exists." : "Member ID already exists.";
    case FailureCode.INVALID_INPUT:
      return kind === "book"
        ? "A book needs an ID, a title, and a whole number of copies (at least 1)."
        : "A member needs an ID and a name.";
    case FailureCode.MEMBER_NOT_FOUND:
      return "Member not found.";
    case FailureCode.BOOK_NOT_FOUND:
      return "Book not found.";
    case FailureCode.NO_COPIES_AVAILABLE:
      return `No copies of '${title}' available right now.`;
    case FailureCode.ALREADY_HELD_BY_MEMBER:
      return `${name} already has a copy of '${title}'.`;
    case FailureCode.NOT_HELD_BY_MEMBER:
      return "This member does not hold that book.";
  }
}

/** Suffix appended to a success message when the change was not saved. */
export function warningSuffix(warning: PersistenceError | null): string {
  return warning ? ` Warning: changes could not be saved (${warning.message}).` : "";
}
