// ---------------------------------------------------------------------------
// Integration tests for the /books routes.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { createTestApp, postForm, postJson, type TestApp } from "../../helpers/test-app.js";

describe("/books", () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  // ── POST /books ─────────────────────────────────────────────────────────

  describe("POST /books", () => {
    it("adds a book from a JSON body and answers 201", async () => {
      const res = await postJson(t.app, "/books", {
        id: "B1",
        title: "Emma",
        author: "Austen",
        copies: 2,
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        success: true,
        message: "Book added.",
        code: null,
        warning: null,
        data: {
          id: "B1",
          title: "Emma",
          author: "Austen",
          totalCopies: 2,
          availableCopies: 2,
          loans: [],
        },
      });
    });

    it("adds a book from a form, treating a blank copy count as one", async () => {
      const res = await postForm(t.app, "/books", {
        id: "B1",
        title: "Dune",
        author: "Herbert",
        copies: "",
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ data: { totalCopies: 1 } });
    });

    it("accepts a numeric id", async () => {
      const res = await postJson(t.app, "/books", { id: 42, title: "Dune", author: "Herbert" });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ data: { id: "42" } });
    });

    it("answers 409 for a duplicate id", async () => {
      await postJson(t.app, "/books", { id: "B1", title: "Dune", author: "Herbert" });
      const res = await postJson(t.app, "/books", { id: "B1", title: "Emma", author: "Austen" });

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        success: false,
        code: "DuplicateId",
        message: "Book ID already exists.",
      });
    });

    it("answers 400 for a blank title", async () => {
      const res = await postJson(t.app, "/books", { id: "B1", title: "   ", author: "Herbert" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false, code: "InvalidInput" });
    });

    it("answers 400 when a field fails validation", async () => {
      const res = await postJson(t.app, "/books", { id: "B1", title: "Dune", copies: 0 });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        type: "validation_error",
        message: expect.stringMatching(/^copies: /),
      });
    });

    it("answers 400 for a body that is not JSON", async () => {
      const res = await t.app.request("/books", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: "{ id: ",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        message: "Request body could not be parsed",
        type: "validation_error",
      });
    });
  });

  // ── GET /books ──────────────────────────────────────────────────────────

  describe("GET /books", () => {
    beforeEach(async () => {
      await postJson(t.app, "/books", { id: "B1", title: "Emma", author: "Austen" });
      await postJson(t.app, "/books", { id: "B2", title: "Dune", author: "Herbert" });
      await postJson(t.app, "/members", { id: "M1", name: "Alice" });
      await postJson(t.app, "/loans/borrow", { mode: "id", memberId: "M1", bookId: "B1" });
    });

    it("lists every book sorted by title", async () => {
      const res = await t.app.request("/books");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        message: [
          "[B2] Dune by Herbert - 1/1 available",
          "[B1] Emma by Austen - 0/1 available | Borrowers: M1 (due 2024-03-08 09:30)",
        ].join("\n"),
      });
    });

    it("filters by status", async () => {
      const available = await t.app.request("/books?status=available");
      const borrowed = await t.app.request("/books?status=borrowed");

      expect(await available.json()).toMatchObject({ data: [{ id: "B2" }] });
      expect(await borrowed.json()).toMatchObject({ data: [{ id: "B1" }] });
    });

    it("rejects an unknown status", async () => {
      const res = await t.app.request("/books?status=lost");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        message: "status must be one of: all, available, borrowed",
        type: "validation_error",
      });
    });

    it("searches title and author with ?q=", async () => {
      const hit = await t.app.request("/books?q=HERB");
      const miss = await t.app.request("/books?q=tolstoy");

      expect(await hit.json()).toMatchObject({ message: "[B2] Dune by Herbert - 1/1 available" });
      expect(await miss.json()).toMatchObject({
        success: true,
        message: "No matching books found.",
        data: [],
      });
    });
  });

  // ── GET /books/:id ──────────────────────────────────────────────────────

  describe("GET /books/:id", () => {
    it("returns one book", async () => {
      await postJson(t.app, "/books", { id: "B1", title: "Dune", author: "Herbert" });
      const res = await t.app.request("/books/B1");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        message: "[B1] Dune by Herbert - 1/1 available",
        data: { id: "B1" },
      });
    });

    it("answers 404 for an unknown id", async () => {
      const res = await t.app.request("/books/B9");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        message: "Book not found.",
        code: "BookNotFound",
        warning: null,
        data: null,
      });
    });
  });
});
