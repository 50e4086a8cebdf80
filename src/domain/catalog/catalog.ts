// ---------------------------------------------------------------------------
// Catalog: the set of book records and their copy accounting.
// ---------------------------------------------------------------------------

import type { AddFailureCode, Book, BookId, Loan, MemberId, Result } from "../../core/types.js";
import { FailureCode } from "../../core/types.js";

/** Normalise raw caller input into a branded book id. */
export function toBookId(raw: string | number): BookId {
  return String(raw).trim() as BookId;
}

/** Copy a book so callers cannot reach the catalog's own record. */
export function cloneBook(book: Book): Book {
  return { ...book, loans: book.loans.map((l) => ({ ...l })) };
}

/**
 * Owns every {@link Book}. Records keep insertion order, which decides ties
 * in title lookup and the order of search results.
 */
export class Catalog {
  private readonly books = new Map<BookId, Book>();

  constructor(initial: Book[] = []) {
    for (const book of initial) {
      this.books.set(book.id, book);
    }
  }

  get size(): number {
    return this.books.size;
  }

  // ── Mutation ────────────────────────────────────────────────────────────

  addBook(
    id: string,
    title: string,
    author: string,
    copies = 1,
  ): Result<Book, AddFailureCode> {
    const bookId = toBookId(id);
    const cleanTitle = title.trim();

    if (!bookId || !cleanTitle || !Number.isInteger(copies) || copies < 1) {
      return { ok: false, error: { code: FailureCode.INVALID_INPUT } };
    }
    if (this.books.has(bookId)) {
      return { ok: false, error: { code: FailureCode.DUPLICATE_ID } };
    }

    const book: Book = {
      id: bookId,
      title: cleanTitle,
      author: author.trim(),
      totalCopies: copies,
      availableCopies: copies,
      loans: [],
    };
    this.books.set(bookId, book);
    return { ok: true, value: book };
  }

  /**
   * Take one copy off the shelf for `loan`. Returns `false` (and changes
   * nothing) when every copy is already out.
   */
  checkOut(book: Book, loan: Loan): boolean {
    if (book.availableCopies <= 0) return false;
    book.availableCopies -= 1;
    book.loans.push(loan);
    return true;
  }

  /**
   * Put back the copy held by `memberId` and return its loan, or `null` when
   * no outstanding copy is attributed to that member.
   */
  checkIn(book: Book, memberId: MemberId): Loan | null {
    const index = book.loans.findIndex((l) => l.memberId === memberId);
    if (index === -1) return null;

    const [loan] = book.loans.splice(index, 1);
    book.availableCopies = Math.min(book.availableCopies + 1, book.totalCopies);
    return loan ?? null;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  findById(id: string): Book | null {
    return this.books.get(toBookId(id)) ?? null;
  }

  /** Case-insensitive exact title match; the earliest-added book wins. */
  findByTitleExact(title: string): Book | null {
    const wanted = title.trim().toLowerCase();
    for (const book of this.books.values()) {
      if (book.title.toLowerCase() === wanted) return book;
    }
    return null;
  }

  /**
   * Case-insensitive substring search over title and author, in insertion
   * order. An empty keyword matches everything.
   */
  searchByKeyword(keyword: string): Book[] {
    const kw = keyword.trim().toLowerCase();
    return this.list().filter(
      (b) => b.title.toLowerCase().includes(kw) || b.author.toLowerCase().includes(kw),
    );
  }

  list(): Book[] {
    return [...this.books.values()];
  }

  /** Books with at least one copy on the shelf. */
  listAvailable(): Book[] {
    return this.list().filter((b) => b.availableCopies > 0);
  }

  /** Books with at least one copy out on loan. */
  listBorrowed(): Book[] {
    return this.list().filter((b) => b.availableCopies < b.totalCopies);
  }
}
