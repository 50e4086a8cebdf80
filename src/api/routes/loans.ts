// ---------------------------------------------------------------------------
// Borrow / return routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types.js";
import type { LendingDesk } from "../../lending/lending-desk.js";
import { IdField, readBody } from "../body.js";
import { respond, validationError } from "./respond.js";

/** Dependencies required by loan routes. */
export interface LoanRouteDeps {
  desk: LendingDesk;
}

/**
 * The caller picks how member and book are named: both by id, or by member
 * name and book title. Nothing is inferred from which fields are present.
 */
export const LendingRequestSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("id"), memberId: IdField, bookId: IdField }),
  z.object({ mode: z.literal("name"), memberName: z.string(), bookTitle: z.string() }),
]);

/**
 * Mounts lending endpoints:
 *
 * - `POST /loans/borrow` -- Check a copy out to a member.
 * - `POST /loans/return` -- Check a copy back in; reports any late fine.
 */
export function loanRoutes(deps: LoanRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/borrow", async (c) => {
    const body = await readBody(c, LendingRequestSchema);
    if (!body.ok) return validationError(c, body.error);

    const report = await deps.desk.borrow(body.value);
    if (report.warning) {
      c.get("logger").warn({ warning: report.warning }, "borrow recorded but not saved");
    }
    return respond(c, report);
  });

  app.post("/return", async (c) => {
    const body = await readBody(c, LendingRequestSchema);
    if (!body.ok) return validationError(c, body.error);

    const report = await deps.desk.returnBook(body.value);
    if (report.warning) {
      c.get("logger").warn({ warning: report.warning }, "return recorded but not saved");
    }
    return respond(c, report);
  });

  return app;
}
