import { afterEach, describe, it, expect } from "vitest";
import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { createDemoService, type DemoServiceOptions } from "./app";

let server: Server | null = null;

async function start(opts: DemoServiceOptions): Promise<string> {
  const app = createDemoService(opts);
  const s = await new Promise<Server>((resolve) => {
    const srv = app.listen(0, "127.0.0.1", () => resolve(srv));
  });
  server = s;
  const addr = s.address();
  if (addr === null || typeof addr === "string") throw new Error("expected a TCP address");
  return `http://127.0.0.1:${(addr satisfies AddressInfo).port}`;
}

afterEach(async () => {
  const s = server;
  server = null;
  if (!s) return;
  s.closeAllConnections();
  await new Promise<void>((resolve) => s.close(() => resolve()));
});

async function post(url: string, body: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });
  return { status: res.status, body: await res.json() };
}

describe("demo service", () => {
  it("hands out plan ids and answers 202 until the plan is ready", async () => {
    const base = await start({ apiKey: "test-key", readyAfterPolls: 2 });

    const sub = await post(`${base}/api/request_processing_location`, { address: "1 Main St", api_key: "test-key" });
    expect(sub).toEqual({ status: 200, body: { status: "SUCCESS", plan_id: "plan-1" } });

    const poll = () => post(`${base}/api/get_features`, { plan_id: "plan-1", api_key: "test-key" });
    expect((await poll()).status).toBe(202);
    expect((await poll()).status).toBe(202);
    expect(await poll()).toEqual({
      status: 200,
      body: { plan_id: "plan-1", address: "1 Main St", features: { polls: 3 } },
    });
  });

  it("checks the api key and required fields", async () => {
    const base = await start({ apiKey: "test-key" });

    expect((await post(`${base}/api/request_processing_location`, { address: "a", api_key: "nope" })).status).toBe(403);
    expect((await post(`${base}/api/request_processing_location`, { api_key: "test-key" })).status).toBe(400);
    expect((await post(`${base}/api/get_features`, { plan_id: "plan-9", api_key: "test-key" })).status).toBe(400);
    expect((await post(`${base}/api/get_features`, { plan_id: "plan-9", api_key: "nope" })).status).toBe(403);
  });

  it("rejects fault:reject addresses with a FAILURE status", async () => {
    const base = await start({ apiKey: "test-key" });
    const res = await post(`${base}/api/request_processing_location`, { address: "fault:reject", api_key: "test-key" });
    expect(res).toEqual({ status: 200, body: { status: "FAILURE", error: "address rejected" } });
  });
});
