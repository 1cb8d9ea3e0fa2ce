// apps/runner/src/protocol.ts
//
// Response handling for the two-phase request/poll protocol.

import Ajv from "ajv";
import type { PlanId, SubmissionAccepted } from "shared-types";
import { ProtocolError } from "./errors";

export const SUCCESS_SENTINEL = "SUCCESS";

/** Submission statuses the service is known to answer with. */
export const KNOWN_SUBMISSION_STATUSES: ReadonlySet<number> = new Set([200, 400, 403]);

/** Poll statuses the service is known to answer with; 202 means still processing. */
export const KNOWN_POLL_STATUSES: ReadonlySet<number> = new Set([200, 202, 400, 403]);

export const POLL_DONE_STATUS = 200;

const ajv = new Ajv({ allErrors: true, strict: false });

const submissionAcceptedSchema = {
  type: "object",
  required: ["status", "plan_id"],
  properties: {
    status: { const: SUCCESS_SENTINEL },
    plan_id: { type: ["string", "number"] },
  },
};

const isSubmissionAccepted = ajv.compile<SubmissionAccepted>(submissionAcceptedSchema);

function describeStatus(body: unknown): string {
  if (typeof body === "object" && body !== null && "status" in body) {
    return JSON.stringify(body.status);
  }
  return "missing";
}

/** Extracts the plan id, or throws ProtocolError naming what was wrong. */
export function readPlanId(body: unknown): PlanId {
  if (isSubmissionAccepted(body)) return body.plan_id;

  const status = describeStatus(body);
  if (status !== JSON.stringify(SUCCESS_SENTINEL)) {
    throw new ProtocolError(`Did not receive success (status: ${status})`);
  }
  throw new ProtocolError(`Invalid submission response: ${ajv.errorsText(isSubmissionAccepted.errors)}`);
}
