// ---------------------------------------------------------------------------
// On-disk document format: Zod schemas, decoding (including data files from
// the earlier single-copy and multi-copy programs), and encoding.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type {
  Book,
  BookId,
  HistoryEntry,
  LibrarySnapshot,
  Loan,
  Member,
  MemberId,
} from "../core/types.js";
import { HistoryAction } from "../core/types.js";
import { toBookId } from "../domain/catalog/catalog.js";
import { toMemberId } from "../domain/roster/roster.js";
import { normaliseStoredDate } from "../domain/fines/fine-policy.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

/** Older files wrote numeric ids. */
const IdSchema = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const DateSchema = z.string().nullable().optional();

export const LoanRecordSchema = z.object({
  member_id: IdSchema,
  borrowed_at: DateSchema,
  due_date: DateSchema,
});

export const BookRecordSchema = z.object({
  id: IdSchema.optional(),
  book_id: IdSchema.optional(),
  title: z.string(),
  author: z.string().default(""),
  total_copies: z.number().int().positive().optional(),
  available_copies: z.number().int().nonnegative().optional(),
  loans: z.array(LoanRecordSchema).optional(),
  // single-copy layout
  is_borrowed: z.boolean().optional(),
  borrower_id: IdSchema.nullable().optional(),
  due_date: DateSchema,
});

export const MemberRecordSchema = z.object({
  id: IdSchema.optional(),
  member_id: IdSchema.optional(),
  name: z.string(),
  borrowed_book_ids: z.array(IdSchema).optional(),
  borrowed_books: z.array(IdSchema).optional(),
});

export const HistoryRecordSchema = z.object({
  timestamp: z.string(),
  action: z.enum([HistoryAction.BORROW, HistoryAction.RETURN]),
  book_id: IdSchema,
  member_id: IdSchema,
  due_date: DateSchema,
  fine: z.number().nonnegative().optional(),
});

/**
 * Records may be keyed by id in an object or listed in an array. Objects are
 * turned into arrays before validation, with each key carried on its record
 * as `key`, so that an id such as `__proto__` survives as an ordinary entry.
 */
function keyedList<T extends z.ZodTypeAny>(record: T) {
  return z.preprocess(
    (value) =>
      value !== null && typeof value === "object" && !Array.isArray(value)
        ? Object.entries(value).map(([key, rec]: [string, unknown]) =>
            rec !== null && typeof rec === "object" && !Array.isArray(rec) ? { ...rec, key } : rec,
          )
        : value,
    z.array(record).default([]),
  );
}

export const LibraryDocumentSchema = z.object({
  books: keyedList(BookRecordSchema.extend({ key: z.string().optional() })),
  members: keyedList(MemberRecordSchema.extend({ key: z.string().optional() })),
  history: z.array(HistoryRecordSchema).default([]),
});

type BookRecord = z.infer<typeof BookRecordSchema> & { key?: string };
type MemberRecord = z.infer<typeof MemberRecordSchema> & { key?: string };
type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

// ── Encoded shape ───────────────────────────────────────────────────────────

export interface LibraryDocument {
  books: Record<
    string,
    {
      id: string;
      title: string;
      author: string;
      total_copies: number;
      available_copies: number;
      loans: { member_id: string; borrowed_at: string | null; due_date: string | null }[];
    }
  >;
  members: Record<string, { id: string; name: string; borrowed_book_ids: string[] }>;
  history: (
    | { timestamp: string; action: "borrow"; book_id: string; member_id: string; due_date: string }
    | { timestamp: string; action: "return"; book_id: string; member_id: string; fine: number }
  )[];
}

// ── Decoding ────────────────────────────────────────────────────────────────

export interface DecodeResult {
  snapshot: LibrarySnapshot;
  /** Inconsistencies found in the document and how each was resolved. */
  repairs: string[];
}

/** A book as read, before loans are reconciled with the roster. */
interface DraftBook {
  book: Book;
  /** Copies the document claims are out, whether or not a loan says who has them. */
  declaredOut: number;
}

function draftBook(rec: BookRecord): DraftBook | null {
  const rawId = rec.id ?? rec.book_id ?? rec.key;
  if (!rawId) return null;

  const total = rec.total_copies ?? 1;
  let loans: Loan[];
  let declaredOut: number;

  if (rec.loans) {
    loans = rec.loans.map((l) => ({
      memberId: toMemberId(l.member_id),
      borrowedAt: normaliseStoredDate(l.borrowed_at),
      dueDate: normaliseStoredDate(l.due_date),
    }));
    declaredOut = loans.length;
  } else if (rec.is_borrowed !== undefined) {
    loans =
      rec.is_borrowed && rec.borrower_id
        ? [
            {
              memberId: toMemberId(rec.borrower_id),
              borrowedAt: null,
              dueDate: normaliseStoredDate(rec.due_date),
            },
          ]
        : [];
    declaredOut = rec.is_borrowed ? 1 : 0;
  } else {
    loans = [];
    const available = Math.min(rec.available_copies ?? total, total);
    declaredOut = total - available;
  }

  return {
    book: {
      id: toBookId(rawId),
      title: rec.title.trim(),
      author: rec.author.trim(),
      totalCopies: total,
      availableCopies: total,
      loans,
    },
    declaredOut: Math.min(declaredOut, total),
  };
}

function decodeMember(rec: MemberRecord): Member | null {
  const rawId = rec.id ?? rec.member_id ?? rec.key;
  if (!rawId) return null;
  const borrowed = (rec.borrowed_book_ids ?? rec.borrowed_books ?? []).map(toBookId);
  return {
    id: toMemberId(rawId),
    name: rec.name.trim(),
    borrowedBookIds: [...new Set(borrowed)],
  };
}

function decodeHistoryEntry(rec: HistoryRecord): HistoryEntry {
  const base = {
    timestamp: normaliseStoredDate(rec.timestamp) ?? rec.timestamp,
    bookId: toBookId(rec.book_id),
    memberId: toMemberId(rec.member_id),
  };
  if (rec.action === HistoryAction.BORROW) {
    return {
      ...base,
      action: HistoryAction.BORROW,
      dueDate: normaliseStoredDate(rec.due_date) ?? rec.due_date ?? "",
    };
  }
  return { ...base, action: HistoryAction.RETURN, fine: rec.fine ?? 0 };
}

/**
 * Make loans and borrowed sets agree, so that every member's borrowed set
 * names exactly the books they hold a loan on and no book has more loans
 * than copies.
 */
function reconcile(
  drafts: DraftBook[],
  members: Map<MemberId, Member>,
  repairs: string[],
): Book[] {
  const books = new Map<BookId, Book>(drafts.map((d) => [d.book.id, d.book]));

  for (const { book, declaredOut } of drafts) {
    const seen = new Set<MemberId>();
    book.loans = book.loans.filter((loan) => {
      if (!members.has(loan.memberId)) {
        repairs.push(`book ${book.id}: dropped loan to unknown member ${loan.memberId}`);
        return false;
      }
      if (seen.has(loan.memberId)) {
        repairs.push(`book ${book.id}: dropped duplicate loan to member ${loan.memberId}`);
        return false;
      }
      seen.add(loan.memberId);
      return true;
    });

    // Holders the document lists only on the member side get a loan with
    // unknown dates, as long as the book says that many copies are out.
    for (const member of members.values()) {
      if (!member.borrowedBookIds.includes(book.id) || seen.has(member.id)) continue;
      if (book.loans.length < declaredOut && book.loans.length < book.totalCopies) {
        book.loans.push({ memberId: member.id, borrowedAt: null, dueDate: null });
        seen.add(member.id);
      }
    }

    if (book.loans.length > book.totalCopies) {
      repairs.push(`book ${book.id}: more loans than copies, kept the first ${book.totalCopies}`);
      book.loans = book.loans.slice(0, book.totalCopies);
    }
    if (book.loans.length !== declaredOut) {
      repairs.push(
        `book ${book.id}: ${declaredOut} copies marked out but ${book.loans.length} attributable`,
      );
    }
    book.availableCopies = book.totalCopies - book.loans.length;
  }

  for (const member of members.values()) {
    const held = member.borrowedBookIds.filter((bookId) =>
      books.get(bookId)?.loans.some((l) => l.memberId === member.id),
    );
    if (held.length !== member.borrowedBookIds.length) {
      repairs.push(`member ${member.id}: removed books with no matching loan`);
    }
    member.borrowedBookIds = held;
  }

  for (const book of books.values()) {
    for (const loan of book.loans) {
      const member = members.get(loan.memberId);
      if (member && !member.borrowedBookIds.includes(book.id)) {
        member.borrowedBookIds.push(book.id);
        repairs.push(`member ${member.id}: added ${book.id} from its loan record`);
      }
    }
  }

  return [...books.values()];
}

/**
 * Validate and normalise a parsed JSON document into a snapshot. A top-level
 * array is a books file from the split layout (books and members in separate
 * files); its members, if any, come in as `splitMembers`.
 *
 * @throws {z.ZodError} when the document does not have the expected shape.
 */
export function decodeSnapshot(raw: unknown, splitMembers: unknown[] = []): DecodeResult {
  const doc = LibraryDocumentSchema.parse(Array.isArray(raw) ? { books: raw, members: splitMembers } : raw);
  const repairs: string[] = [];

  const drafts: DraftBook[] = [];
  const bookIds = new Set<BookId>();
  for (const rec of doc.books) {
    const draft = draftBook(rec);
    if (!draft) {
      repairs.push(`skipped book "${rec.title}" with no id`);
      continue;
    }
    if (bookIds.has(draft.book.id)) {
      repairs.push(`skipped duplicate book id ${draft.book.id}`);
      continue;
    }
    bookIds.add(draft.book.id);
    drafts.push(draft);
  }

  const members = new Map<MemberId, Member>();
  for (const rec of doc.members) {
    const member = decodeMember(rec);
    if (!member) {
      repairs.push(`skipped member "${rec.name}" with no id`);
      continue;
    }
    if (members.has(member.id)) {
      repairs.push(`skipped duplicate member id ${member.id}`);
      continue;
    }
    members.set(member.id, member);
  }

  const books = reconcile(drafts, members, repairs);

  return {
    snapshot: {
      books,
      members: [...members.values()],
      history: doc.history.map(decodeHistoryEntry),
    },
    repairs,
  };
}

// ── Encoding ────────────────────────────────────────────────────────────────

export function encodeSnapshot(snapshot: LibrarySnapshot): LibraryDocument {
  // Object.fromEntries defines own keys, so no id can reach the prototype.
  return {
    books: Object.fromEntries(
      snapshot.books.map((book) => [
        book.id,
        {
          id: book.id,
          title: book.title,
          author: book.author,
          total_copies: book.totalCopies,
          available_copies: book.availableCopies,
          loans: book.loans.map((l) => ({
            member_id: l.memberId,
            borrowed_at: l.borrowedAt,
            due_date: l.dueDate,
          })),
        },
      ]),
    ),
    members: Object.fromEntries(
      snapshot.members.map((member) => [
        member.id,
        { id: member.id, name: member.name, borrowed_book_ids: [...member.borrowedBookIds] },
      ]),
    ),
    history: snapshot.history.map((entry) =>
      entry.action === HistoryAction.BORROW
        ? {
            timestamp: entry.timestamp,
            action: entry.action,
            book_id: entry.bookId,
            member_id: entry.memberId,
            due_date: entry.dueDate,
          }
        : {
            timestamp: entry.timestamp,
            action: entry.action,
            book_id: entry.bookId,
            member_id: entry.memberId,
            fine: entry.fine,
          },
    ),
  };
}
