// ---------------------------------------------------------------------------
// Lending desk: the operation surface offered to the presentation layer.
// Every operation answers with a success flag and a readable message.
// ---------------------------------------------------------------------------

import type {
  Book,
  HistoryEntry,
  LendingRequest,
  LoanInfo,
  Member,
  ReturnInfo,
} from "../core/types.js";
import { FailureCode } from "../core/types.js";
import type { LendingEngine, NewBook, NewMember } from "./lending-engine.js";
import { formatDisplayDate } from "../domain/fines/fine-policy.js";
import {
  failureMessage,
  formatBook,
  formatHistoryEntry,
  formatMember,
  warningSuffix,
} from "./messages.js";

export interface OperationReport<T> {
  success: boolean;
  message: string;
  /** Set when `success` is false. */
  code: FailureCode | null;
  /** Set when a change was applied but could not be saved. */
  warning: string | null;
  data: T | null;
}

export type BookListing = "all" | "available" | "borrowed";

function ok<T>(message: string, data: T, warning: string | null = null): OperationReport<T> {
  return { success: true, message, code: null, warning, data };
}

function rejected<T>(code: FailureCode, message: string): OperationReport<T> {
  return { success: false, message, code, warning: null, data: null };
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => key(a).toLowerCase().localeCompare(key(b).toLowerCase());
}

const EMPTY_LISTING: Record<BookListing, string> = {
  all: "No books in library yet.",
  available: "No available books.",
  borrowed: "No borrowed books.",
};

export class LendingDesk {
  constructor(private readonly engine: LendingEngine) {}

  async addBook(input: NewBook): Promise<OperationReport<Book>> {
    const outcome = await this.engine.addBook(input);
    if (!outcome.ok) {
      return rejected(outcome.error.code, failureMessage(outcome.error, "book"));
    }
    return ok(
      "Book added." + warningSuffix(outcome.warning),
      outcome.value,
      outcome.warning?.message ?? null,
    );
  }

  async addMember(input: NewMember): Promise<OperationReport<Member>> {
    const outcome = await this.engine.addMember(input);
    if (!outcome.ok) {
      return rejected(outcome.error.code, failureMessage(outcome.error, "member"));
    }
    return ok(
      "Member added." + warningSuffix(outcome.warning),
      outcome.value,
      outcome.warning?.message ?? null,
    );
  }

  async borrow(request: LendingRequest): Promise<OperationReport<LoanInfo>> {
    const outcome = await this.engine.borrow(request);
    if (!outcome.ok) {
      return rejected(outcome.error.code, failureMessage(outcome.error));
    }
    const loan = outcome.value;
    return ok(
      `${loan.memberName} borrowed '${loan.title}'. Due: ${formatDisplayDate(loan.dueDate)}` +
        warningSuffix(outcome.warning),
      loan,
      outcome.warning?.message ?? null,
    );
  }

  async returnBook(request: LendingRequest): Promise<OperationReport<ReturnInfo>> {
    const outcome = await this.engine.returnBook(request);
    if (!outcome.ok) {
      return rejected(outcome.error.code, failureMessage(outcome.error));
    }
    const info = outcome.value;
    const fineText = info.fine > 0 ? ` Late fine: ${info.fine}` : "";
    return ok(
      `Returned '${info.title}'.${fineText}` + warningSuffix(outcome.warning),
      info,
      outcome.warning?.message ?? null,
    );
  }

  getBook(id: string): OperationReport<Book> {
    const book = this.engine.findBook(id);
    return book
      ? ok(formatBook(book), book)
      : rejected(FailureCode.BOOK_NOT_FOUND, failureMessage({ code: FailureCode.BOOK_NOT_FOUND }));
  }

  getMember(id: string): OperationReport<Member> {
    const member = this.engine.findMember(id);
    return member
      ? ok(formatMember(member), member)
      : rejected(FailureCode.MEMBER_NOT_FOUND, failureMessage({ code: FailureCode.MEMBER_NOT_FOUND }));
  }

  searchBooks(keyword: string): OperationReport<Book[]> {
    const books = this.engine.searchBooks(keyword);
    return ok(books.length > 0 ? books.map(formatBook).join("\n") : "No matching books found.", books);
  }

  /** Books sorted by title; `listing` narrows to shelf or loaned copies. */
  listBooks(listing: BookListing = "all"): OperationReport<Book[]> {
    const source =
      listing === "available"
        ? this.engine.listAvailableBooks()
        : listing === "borrowed"
          ? this.engine.listBorrowedBooks()
          : this.engine.listBooks();
    const books = source.sort(byKey((b: Book) => b.title));
    return ok(books.length > 0 ? books.map(formatBook).join("\n") : EMPTY_LISTING[listing], books);
  }

  listAvailableBooks(): OperationReport<Book[]> {
    return this.listBooks("available");
  }

  listBorrowedBooks(): OperationReport<Book[]> {
    return this.listBooks("borrowed");
  }

  listMembers(): OperationReport<Member[]> {
    const members = this.engine.listMembers().sort(byKey((m: Member) => m.name));
    return ok(members.length > 0 ? members.map(formatMember).join("\n") : "No members yet.", members);
  }

  /** Transactions, newest first. */
  listHistory(): OperationReport<HistoryEntry[]> {
    const entries = this.engine.listHistory();
    return ok(
      entries.length > 0 ? entries.map(formatHistoryEntry).join("\n") : "No transactions yet.",
      entries,
    );
  }
}
