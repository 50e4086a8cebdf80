// ---------------------------------------------------------------------------
// Roster routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types.js";
import type { LendingDesk } from "../../lending/lending-desk.js";
import { IdField, readBody } from "../body.js";
import { respond, validationError } from "./respond.js";

/** Dependencies required by member routes. */
export interface MemberRouteDeps {
  desk: LendingDesk;
}

export const NewMemberSchema = z.object({
  id: IdField,
  name: z.string(),
});

/**
 * Mounts roster endpoints:
 *
 * - `GET  /members`      -- List members.
 * - `GET  /members/:id`  -- Single member.
 * - `POST /members`      -- Add a member.
 */
export function memberRoutes(deps: MemberRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => respond(c, deps.desk.listMembers()));

  app.get("/:id", (c) => respond(c, deps.desk.getMember(c.req.param("id"))));

  app.post("/", async (c) => {
    const body = await readBody(c, NewMemberSchema);
    if (!body.ok) return validationError(c, body.error);

    const report = await deps.desk.addMember(body.value);
    return respond(c, report, 201);
  });

  return app;
}
