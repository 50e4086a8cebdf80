// ---------------------------------------------------------------------------
// Lending engine: executes add / borrow / return against the catalog and
// roster, records history, and persists the full state after each change.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type pino from "pino";
import type {
  AddFailureCode,
  Book,
  BorrowFailureCode,
  Failure,
  HistoryEntry,
  LendingConfig,
  LendingRequest,
  LibrarySnapshot,
  LoanInfo,
  Member,
  Result,
  ReturnFailureCode,
  ReturnInfo,
} from "../core/types.js";
import { FailureCode, HistoryAction } from "../core/types.js";
import { PersistenceError } from "../core/errors.js";
import { Catalog, cloneBook } from "../domain/catalog/catalog.js";
import { Roster, cloneMember } from "../domain/roster/roster.js";
import { HistoryLedger } from "../domain/history/ledger.js";
import { assessFine, computeDueDate } from "../domain/fines/fine-policy.js";
import type { StateStore } from "../storage/state-store.js";

// ── Public types ───────────────────────────────────────────────────────────

/**
 * Result of a mutating operation. A success may still carry a `warning`
 * when the change was applied in memory but could not be saved.
 */
export type Outcome<T, C extends FailureCode> =
  | { ok: true; value: T; warning: PersistenceError | null }
  | { ok: false; error: Failure<C> };

export interface NewBook {
  id: string;
  title: string;
  author: string;
  copies?: number;
}

export interface NewMember {
  id: string;
  name: string;
}

export interface LendingEngineOptions {
  store: StateStore;
  policy: LendingConfig;
  logger: pino.Logger;
  /** Source of "now"; defaults to the system clock. */
  clock?: () => Date;
}

function fail<C extends FailureCode>(code: C, subject?: Failure<C>["subject"]): { ok: false; error: Failure<C> } {
  return { ok: false, error: subject ? { code, subject } : { code } };
}

// ── LendingEngine ──────────────────────────────────────────────────────────

/**
 * Owns the catalog, roster and history ledger for one store.
 *
 * Every mutating operation runs inside a single-slot queue covering
 * resolve, validate, mutate and persist, so two borrows of the last copy
 * cannot both succeed. The mutation itself is synchronous, which means
 * read-only queries (run outside the queue) never observe a half-applied
 * change. Queries hand out copies, never the engine's own records.
 */
export class LendingEngine {
  private readonly catalog: Catalog;
  private readonly roster: Roster;
  private readonly ledger: HistoryLedger;
  private readonly exclusive: ReturnType<typeof pLimit>;

  private readonly store: StateStore;
  private readonly policy: LendingConfig;
  private readonly logger: pino.Logger;
  private readonly clock: () => Date;

  constructor(snapshot: LibrarySnapshot, options: LendingEngineOptions) {
    this.catalog = new Catalog(snapshot.books);
    this.roster = new Roster(snapshot.members);
    this.ledger = new HistoryLedger(snapshot.history);
    this.exclusive = pLimit(1);

    this.store = options.store;
    this.policy = options.policy;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Load the store's current state and build an engine over it. */
  static async open(options: LendingEngineOptions): Promise<LendingEngine> {
    const snapshot = await options.store.load();
    return new LendingEngine(snapshot, options);
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  addBook(input: NewBook): Promise<Outcome<Book, AddFailureCode>> {
    return this.run("addBook", (): Result<Book, AddFailureCode> => {
      const result = this.catalog.addBook(input.id, input.title, input.author, input.copies ?? 1);
      return result.ok ? { ok: true, value: cloneBook(result.value) } : result;
    });
  }

  addMember(input: NewMember): Promise<Outcome<Member, AddFailureCode>> {
    return this.run("addMember", (): Result<Member, AddFailureCode> => {
      const result = this.roster.addMember(input.id, input.name);
      return result.ok ? { ok: true, value: cloneMember(result.value) } : result;
    });
  }

  borrow(request: LendingRequest): Promise<Outcome<LoanInfo, BorrowFailureCode>> {
    return this.run("borrow", (): Result<LoanInfo, BorrowFailureCode> => {
      const member = this.resolveMember(request);
      if (!member) return fail(FailureCode.MEMBER_NOT_FOUND);

      const book = this.resolveBook(request);
      if (!book) return fail(FailureCode.BOOK_NOT_FOUND, { memberName: member.name });

      const subject = { memberName: member.name, bookTitle: book.title };
      if (book.availableCopies <= 0) {
        return fail(FailureCode.NO_COPIES_AVAILABLE, subject);
      }
      if (member.borrowedBookIds.includes(book.id) || book.loans.some((l) => l.memberId === member.id)) {
        return fail(FailureCode.ALREADY_HELD_BY_MEMBER, subject);
      }

      const now = this.clock();
      const borrowedAt = now.toISOString();
      const dueDate = computeDueDate(now, this.policy.loanPeriodDays).toISOString();

      this.catalog.checkOut(book, { memberId: member.id, borrowedAt, dueDate });
      this.roster.attach(member, book.id);
      this.ledger.append({
        timestamp: borrowedAt,
        action: HistoryAction.BORROW,
        bookId: book.id,
        memberId: member.id,
        dueDate,
      });

      this.logger.info({ bookId: book.id, memberId: member.id, dueDate }, "book borrowed");

      return {
        ok: true,
        value: {
          bookId: book.id,
          memberId: member.id,
          title: book.title,
          memberName: member.name,
          borrowedAt,
          dueDate,
        },
      };
    });
  }

  returnBook(request: LendingRequest): Promise<Outcome<ReturnInfo, ReturnFailureCode>> {
    return this.run("return", (): Result<ReturnInfo, ReturnFailureCode> => {
      const member = this.resolveMember(request);
      if (!member) return fail(FailureCode.MEMBER_NOT_FOUND);

      const book = this.resolveBook(request);
      if (!book) return fail(FailureCode.BOOK_NOT_FOUND, { memberName: member.name });

      const subject = { memberName: member.name, bookTitle: book.title };
      if (!member.borrowedBookIds.includes(book.id)) {
        return fail(FailureCode.NOT_HELD_BY_MEMBER, subject);
      }

      const loan = this.catalog.checkIn(book, member.id);
      if (!loan) return fail(FailureCode.NOT_HELD_BY_MEMBER, subject);

      const now = this.clock();
      const returnedAt = now.toISOString();
      const { daysLate, fine } = assessFine(loan.dueDate, now, this.policy);

      this.roster.detach(member, book.id);
      this.ledger.append({
        timestamp: returnedAt,
        action: HistoryAction.RETURN,
        bookId: book.id,
        memberId: member.id,
        fine,
      });

      this.logger.info({ bookId: book.id, memberId: member.id, daysLate, fine }, "book returned");

      return {
        ok: true,
        value: {
          bookId: book.id,
          memberId: member.id,
          title: book.title,
          memberName: member.name,
          returnedAt,
          daysLate,
          fine,
        },
      };
    });
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  findBook(id: string): Book | null {
    const book = this.catalog.findById(id);
    return book ? cloneBook(book) : null;
  }

  findBookByTitle(title: string): Book | null {
    const book = this.catalog.findByTitleExact(title);
    return book ? cloneBook(book) : null;
  }

  findMember(id: string): Member | null {
    const member = this.roster.findById(id);
    return member ? cloneMember(member) : null;
  }

  findMemberByName(name: string): Member | null {
    const member = this.roster.findByNameExact(name);
    return member ? cloneMember(member) : null;
  }

  searchBooks(keyword: string): Book[] {
    return this.catalog.searchByKeyword(keyword).map(cloneBook);
  }

  listBooks(): Book[] {
    return this.catalog.list().map(cloneBook);
  }

  listAvailableBooks(): Book[] {
    return this.catalog.listAvailable().map(cloneBook);
  }

  listBorrowedBooks(): Book[] {
    return this.catalog.listBorrowed().map(cloneBook);
  }

  listMembers(): Member[] {
    return this.roster.list().map(cloneMember);
  }

  /** Transactions, newest first. */
  listHistory(): HistoryEntry[] {
    return this.ledger.recentFirst();
  }

  snapshot(): LibrarySnapshot {
    return {
      books: this.listBooks(),
      members: this.listMembers(),
      history: this.ledger.entries(),
    };
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private resolveMember(request: LendingRequest): Member | null {
    return request.mode === "id"
      ? this.roster.findById(request.memberId)
      : this.roster.findByNameExact(request.memberName);
  }

  private resolveBook(request: LendingRequest): Book | null {
    return request.mode === "id"
      ? this.catalog.findById(request.bookId)
      : this.catalog.findByTitleExact(request.bookTitle);
  }

  /**
   * Run `apply` in the exclusive section. A failed result is returned as is,
   * with nothing changed; a successful one is followed by a save.
   */
  private run<T, C extends FailureCode>(
    operation: string,
    apply: () => Result<T, C>,
  ): Promise<Outcome<T, C>> {
    return this.exclusive(async (): Promise<Outcome<T, C>> => {
      const result = apply();
      if (!result.ok) {
        this.logger.debug({ operation, code: result.error.code }, "operation rejected");
        return result;
      }
      const warning = await this.persist(operation);
      return { ok: true, value: result.value, warning };
    });
  }

  private async persist(operation: string): Promise<PersistenceError | null> {
    try {
      await this.store.save(this.snapshot());
      return null;
    } catch (err) {
      const error =
        err instanceof PersistenceError
          ? err
          : new PersistenceError(
              this.store.location,
              err instanceof Error ? err.message : String(err),
              { cause: err },
            );
      this.logger.error(
        { operation, err: { name: error.name, message: error.message } },
        "state change applied in memory but not saved",
      );
      return error;
    }
  }
}
