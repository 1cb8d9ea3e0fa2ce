import { describe, it, expect } from "vitest";
import { ProtocolError } from "./errors";
import { readPlanId } from "./protocol";

describe("readPlanId", () => {
  it("accepts string and numeric plan ids", () => {
    expect(readPlanId({ status: "SUCCESS", plan_id: "abc" })).toBe("abc");
    expect(readPlanId({ status: "SUCCESS", plan_id: 7, extra: true })).toBe(7);
  });

  it("rejects any other status", () => {
    expect(() => readPlanId({ status: "FAILURE", plan_id: "abc" })).toThrow('Did not receive success (status: "FAILURE")');
    expect(() => readPlanId({ plan_id: "abc" })).toThrow("Did not receive success (status: missing)");
    expect(() => readPlanId(["SUCCESS"])).toThrow(ProtocolError);
    expect(() => readPlanId(null)).toThrow(ProtocolError);
  });

  it("rejects a missing or malformed plan id", () => {
    expect(() => readPlanId({ status: "SUCCESS" })).toThrow("must have required property 'plan_id'");
    expect(() => readPlanId({ status: "SUCCESS", plan_id: { nested: 1 } })).toThrow(ProtocolError);
  });
});
