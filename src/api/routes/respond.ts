// ---------------------------------------------------------------------------
// Maps operation reports onto HTTP status codes.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { FailureCode } from "../../core/types.js";
import type { OperationReport } from "../../lending/lending-desk.js";

type ReportStatus = 200 | 201 | 400 | 404 | 409;

const FAILURE_STATUS: Record<FailureCode, ReportStatus> = {
  DuplicateId: 409,
  InvalidInput: 400,
  MemberNotFound: 404,
  BookNotFound: 404,
  NoCopiesAvailable: 409,
  AlreadyHeldByMember: 409,
  NotHeldByMember: 409,
};

export function statusForReport<T>(report: OperationReport<T>, successStatus: 200 | 201 = 200): ReportStatus {
  if (report.success) return successStatus;
  return report.code ? FAILURE_STATUS[report.code] : 400;
}

export function respond<T>(c: Context, report: OperationReport<T>, successStatus: 200 | 201 = 200): Response {
  return c.json(report, statusForReport(report, successStatus));
}

export function validationError(c: Context, message: string): Response {
  return c.json({ success: false, message, type: "validation_error" }, 400);
}
