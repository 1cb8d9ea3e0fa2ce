// apps/runner/src/flowRunner.ts
//
// One flow: wait for the scheduled offset, submit, then poll with decaying
// backoff. Every expected failure ends in a terminal state; the runner only
// throws for bugs.

import type {
  FlowRequest,
  FlowResult,
  FlowTrace,
  PlanId,
  PollPayload,
  PollRecord,
  SubmissionRecord,
  TerminalFlowState,
} from "shared-types";
import { FlowError, PollExhaustedError, TransportError, decodeJson } from "./errors";
import { transition } from "./flowState";
import type { HttpClient, HttpReply } from "./httpClient";
import { pollUrl, submissionUrl } from "./httpClient";
import type { FlowLogger } from "./logger";
import { drawBaseWait, planPollSteps } from "./pollPlan";
import { KNOWN_POLL_STATUSES, KNOWN_SUBMISSION_STATUSES, POLL_DONE_STATUS, readPlanId } from "./protocol";
import type { RandomSource } from "./random";

export type FlowContext = {
  client: HttpClient;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  createRandom: (flowId: number) => RandomSource;
  createLogger: (flowId: number) => FlowLogger;
  /** Offsets are measured from here; defaults to the moment the flow starts. */
  runStartedAt?: number;
};

// setTimeout clamps anything above this to 1 ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

export async function sleep(ms: number): Promise<void> {
  let left = ms;
  while (left > 0) {
    const step = Math.min(left, MAX_TIMER_MS);
    await new Promise((r) => setTimeout(r, step));
    left -= step;
  }
}

/** Epoch ms on the monotonic clock. */
export function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

async function post(client: HttpClient, url: string, body: unknown): Promise<HttpReply> {
  try {
    return await client.postJson(url, body);
  } catch (e) {
    throw TransportError.from(e);
  }
}

function asFlowError(e: unknown): FlowError {
  if (e instanceof FlowError) return e;
  throw e;
}

async function submit(req: FlowRequest, ctx: FlowContext, trace: FlowTrace, log: FlowLogger): Promise<PlanId | null> {
  transition(trace, "SUBMITTING");
  log.info("Requesting processing...");

  const record: SubmissionRecord = { start_ms: ctx.now(), outcome: "pending" };
  trace.submission = record;

  try {
    const reply = await post(ctx.client, submissionUrl(req.domain), req.payload);
    record.status = reply.status;
    if (!KNOWN_SUBMISSION_STATUSES.has(reply.status)) {
      log.error(`Unexpected status code from request_processing_location! ${reply.status}`);
    }
    const body = decodeJson(reply.text);
    record.body = body;
    record.end_ms = ctx.now();

    const planId = readPlanId(body);
    record.outcome = "accepted";
    trace.plan_id = planId;
    transition(trace, "SUBMITTED_OK");
    log.debug(`plan_id=${String(planId)}`);
    return planId;
  } catch (e) {
    const err = asFlowError(e);
    record.end_ms ??= ctx.now();
    record.outcome = "rejected";
    record.failure = err.toFailure();
    trace.failure = record.failure;
    transition(trace, "SUBMITTED_FAIL");
    log.debug(err.message);
    log.warn("Request failed, aborting...");
    return null;
  }
}

async function poll(
  req: FlowRequest,
  planId: PlanId,
  ctx: FlowContext,
  trace: FlowTrace,
  log: FlowLogger,
  random: RandomSource
): Promise<TerminalFlowState> {
  transition(trace, "POLLING");
  log.info("Moving onto getting features");

  const steps = planPollSteps(drawBaseWait(random));
  const payload: PollPayload = { plan_id: planId, api_key: req.payload.api_key };

  for (const step of steps) {
    await ctx.sleep(step.wait_s * 1000);
    log.info(`Slept for ${step.wait_s} (${step.cumulative_wait_s} total)`);

    const record: PollRecord = {
      attempt: step.attempt,
      wait_s: step.wait_s,
      cumulative_wait_s: step.cumulative_wait_s,
      start_ms: ctx.now(),
    };
    trace.polls.push(record);

    let reply: HttpReply;
    try {
      reply = await post(ctx.client, pollUrl(req.domain), payload);
    } catch (e) {
      const err = asFlowError(e);
      record.end_ms = ctx.now();
      record.failure = err.toFailure();
      trace.failure = record.failure;
      log.warn(`Polling aborted: ${err.message}`);
      transition(trace, "POLL_ABORTED");
      return "POLL_ABORTED";
    }

    try {
      const body = decodeJson(reply.text);
      record.status = reply.status;
      record.body = body;
    } catch (e) {
      record.failure = asFlowError(e).toFailure();
      log.info("Request failed");
    }
    record.end_ms = ctx.now();

    if (record.status === undefined) continue;
    if (record.status === POLL_DONE_STATUS) {
      log.info("Got results!");
      transition(trace, "POLL_SUCCESS");
      return "POLL_SUCCESS";
    }
    if (!KNOWN_POLL_STATUSES.has(record.status)) {
      log.error(`Unexpected status code from get_features! ${record.status}`);
    } else if (record.status !== 202) {
      log.warn(`get_features answered ${record.status}, still polling`);
    }
  }

  const exhausted = new PollExhaustedError(steps.length);
  trace.failure = exhausted.toFailure();
  log.warn(exhausted.message);
  transition(trace, "POLL_EXHAUSTED");
  return "POLL_EXHAUSTED";
}

export async function runFlow(req: FlowRequest, ctx: FlowContext): Promise<FlowResult> {
  const log = ctx.createLogger(req.id);
  const random = ctx.createRandom(req.id);
  const trace: FlowTrace = { state: "PENDING", submission: null, polls: [] };

  const origin = ctx.runStartedAt ?? ctx.now();
  const delayMs = req.offset_s * 1000 - (ctx.now() - origin);
  if (delayMs > 0) await ctx.sleep(delayMs);

  const planId = await submit(req, ctx, trace, log);
  const state: TerminalFlowState = planId === null ? "SUBMITTED_FAIL" : await poll(req, planId, ctx, trace, log, random);

  return { request: req, ok: state === "POLL_SUCCESS", state, trace };
}
