// packages/shared-types/src/index.ts
//
// Canonical contract types shared across runner and demo-service.
// No runtime logic here, only types.

/* ------------------------------------------------------------------ */
/*  Primitives                                                         */
/* ------------------------------------------------------------------ */

export type PlanId = string | number;

export type FlowFailureKind = "transport" | "decode" | "protocol" | "exhausted";

export type NetErrorKind =
    | "dns"
    | "tls"
    | "conn_refused"
    | "conn_reset"
    | "socket_hang_up"
    | "proxy"
    | "abort"
    | "unknown";

export type FlowFailure = {
    kind: FlowFailureKind;
    message: string;
    net_error_kind?: NetErrorKind;
};

/* ------------------------------------------------------------------ */
/*  Wire payloads                                                      */
/* ------------------------------------------------------------------ */

/** Body of `POST /api/request_processing_location`. */
export type SubmissionPayload = {
    address: string;
    api_key: string;
};

/** Accepted submission body. Any other `status` is a rejection. */
export type SubmissionAccepted = {
    status: "SUCCESS";
    plan_id: PlanId;
};

/** Body of `POST /api/get_features`. */
export type PollPayload = {
    plan_id: PlanId;
    api_key: string;
};

/* ------------------------------------------------------------------ */
/*  Flow state machine                                                 */
/* ------------------------------------------------------------------ */

export type TerminalFlowState = "SUBMITTED_FAIL" | "POLL_SUCCESS" | "POLL_EXHAUSTED" | "POLL_ABORTED";

export type FlowState = "PENDING" | "SUBMITTING" | "SUBMITTED_OK" | "POLLING" | TerminalFlowState;

/* ------------------------------------------------------------------ */
/*  Requests & traces                                                  */
/* ------------------------------------------------------------------ */

export type FlowRequest = {
    readonly id: number;
    readonly domain: string;
    readonly offset_s: number;
    readonly payload: Readonly<SubmissionPayload>;
};

export type ScheduleEntry = {
    readonly index: number;
    readonly offset_s: number;
};

export type SubmissionRecord = {
    start_ms: number;
    end_ms?: number;
    status?: number;
    body?: unknown;
    outcome: "pending" | "accepted" | "rejected";
    failure?: FlowFailure;
};

export type PollRecord = {
    /** 0-based chronological attempt number. */
    attempt: number;
    wait_s: number;
    /** This attempt's wait plus every wait still scheduled after it. */
    cumulative_wait_s: number;
    start_ms: number;
    end_ms?: number;
    status?: number;
    body?: unknown;
    failure?: FlowFailure;
};

export type FlowTrace = {
    state: FlowState;
    submission: SubmissionRecord | null;
    plan_id?: PlanId;
    polls: PollRecord[];
    failure?: FlowFailure;
};

export type FlowResult = {
    readonly request: FlowRequest;
    readonly ok: boolean;
    readonly state: TerminalFlowState;
    readonly trace: Readonly<FlowTrace>;
};

export type AggregateResult = {
    readonly total: number;
    readonly succeeded: number;
    /** Per-flow outcome, in flow-index order. */
    readonly outcomes: readonly boolean[];
    readonly flows: readonly FlowResult[];
};

/* ------------------------------------------------------------------ */
/*  Report                                                             */
/* ------------------------------------------------------------------ */

export type LatencyStats = {
    avg: number;
    p95: number;
    p99: number;
};

export type RunSummary = {
    total: number;
    succeeded: number;
    failed: number;
    by_state: Record<TerminalFlowState, number>;
    submit_ms: LatencyStats;
    time_to_result_ms: LatencyStats;
    polls_avg: number;
};

export type ReportFlowEntry = {
    id: number;
    domain: string;
    offset_s: number;
    json: SubmissionPayload;
    ok: boolean;
    state: TerminalFlowState;
    trace: FlowTrace;
};

export type RunReport = {
    started_at: number;
    ended_at: number;
    domain: string;
    options: Record<string, unknown>;
    summary: RunSummary;
    flows: ReportFlowEntry[];
};
