// ---------------------------------------------------------------------------
// Tests for the on-disk document codec.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";

import { decodeSnapshot, encodeSnapshot } from "../../../src/storage/snapshot-codec.js";
import { toBookId } from "../../../src/domain/catalog/catalog.js";
import { toMemberId } from "../../../src/domain/roster/roster.js";
import type { LibrarySnapshot } from "../../../src/core/types.js";

// ── Fixtures ───────────────────────────────────────────────────────────────

function sampleSnapshot(): LibrarySnapshot {
  return {
    books: [
      {
        id: toBookId("B1"),
        title: "Emma",
        author: "Austen",
        totalCopies: 2,
        availableCopies: 1,
        loans: [
          {
            memberId: toMemberId("M1"),
            borrowedAt: "2024-03-01T09:30:00.000Z",
            dueDate: "2024-03-08T09:30:00.000Z",
          },
        ],
      },
    ],
    members: [{ id: toMemberId("M1"), name: "Alice", borrowedBookIds: [toBookId("B1")] }],
    history: [
      {
        timestamp: "2024-03-01T09:30:00.000Z",
        action: "borrow",
        bookId: toBookId("B1"),
        memberId: toMemberId("M1"),
        dueDate: "2024-03-08T09:30:00.000Z",
      },
    ],
  };
}

// ── Encoding ───────────────────────────────────────────────────────────────

describe("encodeSnapshot", () => {
  it("writes snake_case records keyed by id", () => {
    expect(encodeSnapshot(sampleSnapshot())).toEqual({
      books: {
        B1: {
          id: "B1",
          title: "Emma",
          author: "Austen",
          total_copies: 2,
          available_copies: 1,
          loans: [
            {
              member_id: "M1",
              borrowed_at: "2024-03-01T09:30:00.000Z",
              due_date: "2024-03-08T09:30:00.000Z",
            },
          ],
        },
      },
      members: { M1: { id: "M1", name: "Alice", borrowed_book_ids: ["B1"] } },
      history: [
        {
          timestamp: "2024-03-01T09:30:00.000Z",
          action: "borrow",
          book_id: "B1",
          member_id: "M1",
          due_date: "2024-03-08T09:30:00.000Z",
        },
      ],
    });
  });

  it("writes the fine of a return entry", () => {
    const snapshot: LibrarySnapshot = {
      books: [],
      members: [],
      history: [
        {
          timestamp: "2024-03-11T09:30:00.000Z",
          action: "return",
          bookId: toBookId("B1"),
          memberId: toMemberId("M1"),
          fine: 30,
        },
      ],
    };

    expect(encodeSnapshot(snapshot).history).toEqual([
      {
        timestamp: "2024-03-11T09:30:00.000Z",
        action: "return",
        book_id: "B1",
        member_id: "M1",
        fine: 30,
      },
    ]);
  });
});

// ── Decoding ───────────────────────────────────────────────────────────────

describe("decodeSnapshot", () => {
  it("reads back what it wrote, with no repairs", () => {
    const snapshot = sampleSnapshot();
    expect(decodeSnapshot(encodeSnapshot(snapshot))).toEqual({ snapshot, repairs: [] });
  });

  it("keeps records whose id is __proto__", () => {
    const snapshot: LibrarySnapshot = {
      books: [
        {
          id: toBookId("__proto__"),
          title: "Dune",
          author: "Herbert",
          totalCopies: 1,
          availableCopies: 1,
          loans: [],
        },
      ],
      members: [{ id: toMemberId("__proto__"), name: "Alice", borrowedBookIds: [] }],
      history: [],
    };

    const doc = encodeSnapshot(snapshot);
    expect(Object.keys(doc.books)).toEqual(["__proto__"]);
    expect(Object.keys(doc.members)).toEqual(["__proto__"]);

    const reread: unknown = JSON.parse(JSON.stringify(doc));
    expect(decodeSnapshot(reread)).toEqual({ snapshot, repairs: [] });
  });

  it("takes the id of a keyed record from its key when the record has none", () => {
    const { snapshot } = decodeSnapshot(
      JSON.parse('{"books":{"__proto__":{"title":"Dune","author":"Herbert"}}}'),
    );

    expect(snapshot.books.map((b) => b.id)).toEqual(["__proto__"]);
  });

  it("reads a split-layout books list with its members", () => {
    const { snapshot, repairs } = decodeSnapshot(
      [{ book_id: 1, title: "Dune", author: "Herbert", total_copies: 2, available_copies: 1 }],
      [{ member_id: 7, name: "Alice", borrowed_books: [1] }],
    );

    expect(repairs).toEqual([]);
    expect(snapshot.books).toEqual([
      {
        id: "1",
        title: "Dune",
        author: "Herbert",
        totalCopies: 2,
        availableCopies: 1,
        loans: [{ memberId: "7", borrowedAt: null, dueDate: null }],
      },
    ]);
    expect(snapshot.members).toEqual([{ id: "7", name: "Alice", borrowedBookIds: ["1"] }]);
  });

  it("treats missing sections as empty", () => {
    expect(decodeSnapshot({})).toEqual({
      snapshot: { books: [], members: [], history: [] },
      repairs: [],
    });
  });

  it("reads single-copy files with numeric ids and minute-precision dates", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: {
        "1": {
          book_id: 1,
          title: "Dune",
          author: "Herbert",
          is_borrowed: true,
          borrower_id: 7,
          due_date: "2024-03-08 09:30",
        },
        "2": { book_id: 2, title: "Emma", author: "Austen", is_borrowed: false, borrower_id: null, due_date: null },
      },
      members: { "7": { member_id: 7, name: "Alice", borrowed_books: [1] } },
      history: [
        {
          timestamp: "2024-03-01 09:30",
          action: "borrow",
          book_id: 1,
          member_id: 7,
          due_date: "2024-03-08 09:30",
        },
      ],
    });

    expect(repairs).toEqual([]);
    expect(snapshot.books).toEqual([
      {
        id: "1",
        title: "Dune",
        author: "Herbert",
        totalCopies: 1,
        availableCopies: 0,
        loans: [{ memberId: "7", borrowedAt: null, dueDate: "2024-03-08T09:30:00.000Z" }],
      },
      { id: "2", title: "Emma", author: "Austen", totalCopies: 1, availableCopies: 1, loans: [] },
    ]);
    expect(snapshot.members).toEqual([{ id: "7", name: "Alice", borrowedBookIds: ["1"] }]);
    expect(snapshot.history).toEqual([
      {
        timestamp: "2024-03-01T09:30:00.000Z",
        action: "borrow",
        bookId: "1",
        memberId: "7",
        dueDate: "2024-03-08T09:30:00.000Z",
      },
    ]);
  });

  it("attributes copies from member records when books carry no loans", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: [{ id: "B1", title: "Emma", author: "Austen", total_copies: 3, available_copies: 1 }],
      members: [
        { id: "M1", name: "Alice", borrowed_books: ["B1"] },
        { id: "M2", name: "Bob", borrowed_book_ids: ["B1"] },
      ],
    });

    expect(repairs).toEqual([]);
    expect(snapshot.books[0]).toEqual({
      id: "B1",
      title: "Emma",
      author: "Austen",
      totalCopies: 3,
      availableCopies: 1,
      loans: [
        { memberId: "M1", borrowedAt: null, dueDate: null },
        { memberId: "M2", borrowedAt: null, dueDate: null },
      ],
    });
  });

  it("drops loans and borrowed books that do not match, and says so", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: {
        B1: {
          id: "B1",
          title: "Dune",
          author: "Herbert",
          total_copies: 1,
          available_copies: 0,
          loans: [{ member_id: "M9", due_date: null }],
        },
        B2: { id: "B2", title: "Emma", author: "Austen", total_copies: 1, available_copies: 1, loans: [] },
      },
      members: { M1: { id: "M1", name: "Alice", borrowed_book_ids: ["B2"] } },
    });

    expect(repairs).toEqual([
      "book B1: dropped loan to unknown member M9",
      "book B1: 1 copies marked out but 0 attributable",
      "member M1: removed books with no matching loan",
    ]);
    expect(snapshot.books.map((b) => [b.id, b.availableCopies])).toEqual([
      ["B1", 1],
      ["B2", 1],
    ]);
    expect(snapshot.members[0]?.borrowedBookIds).toEqual([]);
  });

  it("adds a book to a member's borrowed set from its loan record", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: {
        B1: {
          id: "B1",
          title: "Dune",
          author: "Herbert",
          total_copies: 1,
          loans: [{ member_id: "M1", borrowed_at: null, due_date: "2024-03-08T09:30:00.000Z" }],
        },
      },
      members: { M1: { id: "M1", name: "Alice" } },
    });

    expect(repairs).toEqual(["member M1: added B1 from its loan record"]);
    expect(snapshot.members[0]?.borrowedBookIds).toEqual(["B1"]);
    expect(snapshot.books[0]?.availableCopies).toBe(0);
  });

  it("keeps the first of two records sharing an id", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: [
        { id: "B1", title: "Dune", author: "Herbert" },
        { id: "B1", title: "Emma", author: "Austen" },
      ],
      members: [
        { id: "M1", name: "Alice" },
        { id: "M1", name: "Bob" },
      ],
    });

    expect(repairs).toEqual(["skipped duplicate book id B1", "skipped duplicate member id M1"]);
    expect(snapshot.books.map((b) => b.title)).toEqual(["Dune"]);
    expect(snapshot.members.map((m) => m.name)).toEqual(["Alice"]);
  });

  it("skips array records that carry no id", () => {
    const { snapshot, repairs } = decodeSnapshot({
      books: [{ title: "Dune", author: "Herbert" }],
    });

    expect(snapshot.books).toEqual([]);
    expect(repairs).toEqual(['skipped book "Dune" with no id']);
  });

  it("rejects documents of the wrong shape", () => {
    expect(() => decodeSnapshot({ books: "none" })).toThrow(ZodError);
    expect(() => decodeSnapshot({ books: [{ id: "B1", author: "Herbert" }] })).toThrow(ZodError);
    expect(() => decodeSnapshot("library")).toThrow(ZodError);
    expect(() => decodeSnapshot([{ book_id: 1, author: "Herbert" }])).toThrow(ZodError);
  });
});
