//apps/demo-service/src/app.ts
import express, { type Express, type Request, type Response } from "express";
import type { PlanId, PollPayload, SubmissionPayload } from "shared-types";

export type DemoServiceOptions = {
  apiKey: string;
  /** Polls answered with 202 before a plan turns 200. */
  readyAfterPolls?: number;
};

type Plan = {
  address: string;
  polls: number;
};

/**
 * Addresses starting with "fault:" force protocol-level failures:
 * - fault:reject        200 with {status:"FAILURE"}
 * - fault:no_plan       200 with {status:"SUCCESS"} but no plan_id
 * - fault:invalid_json  200 with a body that is not JSON
 * - fault:http_500      500 with a text body
 * - fault:drop          socket destroyed before any response
 * - fault:poll_403      accepted, but every poll answers 403
 */
type Fault = "reject" | "no_plan" | "invalid_json" | "http_500" | "drop" | "poll_403";

const FAULTS: readonly Fault[] = ["reject", "no_plan", "invalid_json", "http_500", "drop", "poll_403"];

function faultOf(address: string): Fault | null {
  if (!address.startsWith("fault:")) return null;
  const name = address.slice("fault:".length);
  return FAULTS.find((f) => f === name) ?? null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function readSubmission(body: unknown): Partial<SubmissionPayload> {
  if (!isRecord(body)) return {};
  return {
    address: typeof body.address === "string" ? body.address : undefined,
    api_key: typeof body.api_key === "string" ? body.api_key : undefined,
  };
}

function readPoll(body: unknown): Partial<PollPayload> {
  if (!isRecord(body)) return {};
  const planId = body.plan_id;
  return {
    plan_id: typeof planId === "string" || typeof planId === "number" ? planId : undefined,
    api_key: typeof body.api_key === "string" ? body.api_key : undefined,
  };
}

function dropSocket(res: Response): void {
  const sock = res.req?.socket;
  try {
    sock?.destroy(new Error("demo-service forced socket destroy"));
  } catch {
    sock?.destroy();
  }
}

export function createDemoService(opts: DemoServiceOptions): Express {
  const readyAfterPolls = Math.max(0, opts.readyAfterPolls ?? 2);
  const plans = new Map<string, Plan>();
  let nextPlan = 1;

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, plans: plans.size });
  });

  app.post("/api/request_processing_location", (req: Request, res: Response) => {
    const { address, api_key } = readSubmission(req.body);

    if (api_key !== opts.apiKey) {
      res.status(403).json({ status: "FAILURE", error: "invalid api_key" });
      return;
    }
    if (!address) {
      res.status(400).json({ status: "FAILURE", error: "missing address" });
      return;
    }

    switch (faultOf(address)) {
      case "reject":
        res.json({ status: "FAILURE", error: "address rejected" });
        return;
      case "no_plan":
        res.json({ status: "SUCCESS" });
        return;
      case "invalid_json":
        res.status(200);
        res.setHeader("Content-Type", "application/json; charset=utf-8");
        res.send('{"status": "SUCCESS",,,');
        return;
      case "http_500":
        res.status(500);
        res.setHeader("Content-Type", "text/plain; charset=utf-8");
        res.send("demo-service forced 500");
        return;
      case "drop":
        dropSocket(res);
        return;
      default:
        break;
    }

    const planId: PlanId = `plan-${nextPlan++}`;
    plans.set(planId, { address, polls: 0 });
    res.json({ status: "SUCCESS", plan_id: planId });
  });

  app.post("/api/get_features", (req: Request, res: Response) => {
    const { plan_id, api_key } = readPoll(req.body);

    if (api_key !== opts.apiKey) {
      res.status(403).json({ error: "invalid api_key" });
      return;
    }
    const plan = plan_id === undefined ? undefined : plans.get(String(plan_id));
    if (!plan) {
      res.status(400).json({ error: "unknown plan_id" });
      return;
    }

    plan.polls += 1;
    if (faultOf(plan.address) === "poll_403") {
      res.status(403).json({ error: "plan not accessible" });
      return;
    }
    if (plan.polls <= readyAfterPolls) {
      res.status(202).json({ status: "PROCESSING", polls: plan.polls });
      return;
    }
    res.status(200).json({ plan_id, address: plan.address, features: { polls: plan.polls } });
  });

  return app;
}
