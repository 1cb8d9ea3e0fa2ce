import { describe, it, expect } from "vitest";
import { DecodeError, PollExhaustedError, ProtocolError, TransportError, decodeJson, inferNetErrorKind } from "./errors";

describe("inferNetErrorKind", () => {
  it("classifies common network failures", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(inferNetErrorKind(abort)).toBe("abort");
    expect(inferNetErrorKind(new Error("getaddrinfo ENOTFOUND service.test"))).toBe("dns");
    expect(inferNetErrorKind(new Error("connect ECONNREFUSED 127.0.0.1:1"))).toBe("conn_refused");
    expect(inferNetErrorKind(new Error("read ECONNRESET"))).toBe("conn_reset");
    expect(inferNetErrorKind(new Error("unable to verify the first certificate"))).toBe("tls");
    expect(inferNetErrorKind("something odd")).toBe("unknown");
  });

  it("looks through fetch's cause", () => {
    const cause = Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" });
    const err = new TypeError("fetch failed", { cause });
    expect(inferNetErrorKind(err)).toBe("conn_refused");
  });
});

describe("FlowError failures", () => {
  it("serialises each kind", () => {
    expect(new TransportError("x", "dns").toFailure()).toEqual({ kind: "transport", message: "x", net_error_kind: "dns" });
    expect(new DecodeError("y").toFailure()).toEqual({ kind: "decode", message: "y" });
    expect(new ProtocolError("z").toFailure()).toEqual({ kind: "protocol", message: "z" });
    expect(new PollExhaustedError(12).toFailure()).toEqual({
      kind: "exhausted",
      message: "No result after 12 poll attempts",
    });
  });

  it("TransportError.from keeps an existing TransportError", () => {
    const original = new TransportError("boom", "tls");
    expect(TransportError.from(original)).toBe(original);
  });
});

describe("decodeJson", () => {
  it("parses JSON bodies", () => {
    expect(decodeJson('{"status":"SUCCESS"}')).toEqual({ status: "SUCCESS" });
  });

  it("throws DecodeError with a snippet", () => {
    expect(() => decodeJson("<html>")).toThrow(DecodeError);
    expect(() => decodeJson("")).toThrow('Response body is not JSON: ""');
  });
});
