// ---------------------------------------------------------------------------
// Request body reading and validation for JSON and HTML form submissions.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { z } from "zod";

export type BodyResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** Ids arrive as strings from forms and sometimes as numbers from JSON. */
export const IdField = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

/** Form inputs send `""` for an untouched optional field. */
export function optionalField<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === "" ? undefined : v), schema.optional());
}

async function readRaw(c: Context): Promise<unknown> {
  const contentType = c.req.header("content-type") ?? "";
  if (contentType.includes("application/json")) {
    return c.req.json<unknown>();
  }
  return c.req.parseBody();
}

/**
 * Read the request body (JSON or form-encoded) and validate it against
 * `schema`. Unparseable bodies and schema violations come back as an error
 * message suitable for a 400 response.
 */
export async function readBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<BodyResult<z.output<T>>> {
  let raw: unknown;
  try {
    raw = await readRaw(c);
  } catch {
    return { ok: false, error: "Request body could not be parsed" };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    return { ok: false, error: details };
  }
  return { ok: true, value: parsed.data };
}
