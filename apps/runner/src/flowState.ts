// apps/runner/src/flowState.ts
//
// Flow lifecycle transitions. An invalid transition is a bug in the runner,
// so it throws instead of being recorded on the trace.

import type { FlowState, FlowTrace, TerminalFlowState } from "shared-types";
import { InvalidTransitionError } from "./errors";

export const VALID_FLOW_TRANSITIONS: Readonly<Record<FlowState, readonly FlowState[]>> = {
  PENDING: ["SUBMITTING"],
  SUBMITTING: ["SUBMITTED_OK", "SUBMITTED_FAIL"],
  SUBMITTED_OK: ["POLLING"],
  POLLING: ["POLL_SUCCESS", "POLL_EXHAUSTED", "POLL_ABORTED"],
  SUBMITTED_FAIL: [],
  POLL_SUCCESS: [],
  POLL_EXHAUSTED: [],
  POLL_ABORTED: [],
};

export function isTerminalFlowState(state: FlowState): state is TerminalFlowState {
  return (
    state === "SUBMITTED_FAIL" || state === "POLL_SUCCESS" || state === "POLL_EXHAUSTED" || state === "POLL_ABORTED"
  );
}

export function transition(trace: FlowTrace, target: FlowState): void {
  if (!VALID_FLOW_TRANSITIONS[trace.state].includes(target)) {
    throw new InvalidTransitionError(trace.state, target);
  }
  trace.state = target;
}
