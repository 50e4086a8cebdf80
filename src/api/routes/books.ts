// ---------------------------------------------------------------------------
// Catalog routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types.js";
import type { LendingDesk } from "../../lending/lending-desk.js";
import { IdField, optionalField, readBody } from "../body.js";
import { respond, validationError } from "./respond.js";

/** Dependencies required by book routes. */
export interface BookRouteDeps {
  desk: LendingDesk;
}

export const NewBookSchema = z.object({
  id: IdField,
  title: z.string(),
  author: z.string().default(""),
  copies: optionalField(z.coerce.number().int().positive()),
});

const ListingSchema = z.enum(["all", "available", "borrowed"]).default("all");

/**
 * Mounts catalog endpoints:
 *
 * - `GET  /books`      -- List books; `?q=` searches title and author,
 *                         `?status=available|borrowed` filters.
 * - `GET  /books/:id`  -- Single book.
 * - `POST /books`      -- Add a book (JSON or form body).
 */
export function bookRoutes(deps: BookRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /books
  app.get("/", (c) => {
    const keyword = c.req.query("q");
    if (keyword !== undefined) {
      return respond(c, deps.desk.searchBooks(keyword));
    }

    const listing = ListingSchema.safeParse(c.req.query("status"));
    if (!listing.success) {
      return validationError(c, "status must be one of: all, available, borrowed");
    }
    return respond(c, deps.desk.listBooks(listing.data));
  });

  // GET /books/:id
  app.get("/:id", (c) => respond(c, deps.desk.getBook(c.req.param("id"))));

  // POST /books
  app.post("/", async (c) => {
    const body = await readBody(c, NewBookSchema);
    if (!body.ok) return validationError(c, body.error);

    const report = await deps.desk.addBook(body.value);
    return respond(c, report, 201);
  });

  return app;
}
