// apps/runner/src/errors.ts
//
// Flow-level failures. All of them are recovered inside the flow that hit them
// and end up as a terminal state plus a FlowFailure on the trace.

import type { FlowFailure, FlowFailureKind, NetErrorKind } from "shared-types";

export abstract class FlowError extends Error {
  abstract readonly kind: FlowFailureKind;

  toFailure(): FlowFailure {
    return { kind: this.kind, message: this.message };
  }
}

export function inferNetErrorKind(e: unknown): NetErrorKind {
  const name = e instanceof Error ? e.name : "";
  const cause = e instanceof Error && e.cause instanceof Error ? ` ${e.cause.name} ${e.cause.message}` : "";
  const msg = e instanceof Error ? e.message : String(e ?? "");
  const code =
    e instanceof Error && typeof e.cause === "object" && e.cause !== null && "code" in e.cause
      ? ` ${String(e.cause.code)}`
      : "";

  const s = `${name} ${msg}${cause}${code}`.toLowerCase();

  if (name === "AbortError" || name === "TimeoutError" || s.includes("abort")) return "abort";
  if (s.includes("enotfound") || s.includes("eai_again") || s.includes("dns")) return "dns";
  if (s.includes("cert") || s.includes("tls") || s.includes("ssl") || s.includes("handshake")) return "tls";
  if (s.includes("econnrefused") || s.includes("connection refused")) return "conn_refused";
  if (s.includes("econnreset") || s.includes("connection reset")) return "conn_reset";
  if (s.includes("socket hang up") || s.includes("other side closed")) return "socket_hang_up";
  if (s.includes("proxy")) return "proxy";

  return "unknown";
}

/** Connection, timeout or body-read failure. */
export class TransportError extends FlowError {
  readonly kind = "transport" as const;
  readonly netErrorKind: NetErrorKind;

  constructor(message: string, netErrorKind: NetErrorKind = "unknown", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.netErrorKind = netErrorKind;
  }

  static from(e: unknown): TransportError {
    if (e instanceof TransportError) return e;
    const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    return new TransportError(message, inferNetErrorKind(e), { cause: e });
  }

  override toFailure(): FlowFailure {
    return { ...super.toFailure(), net_error_kind: this.netErrorKind };
  }
}

/** Body was not JSON. */
export class DecodeError extends FlowError {
  readonly kind = "decode" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/** Well-formed body that reports a logical failure. */
export class ProtocolError extends FlowError {
  readonly kind = "protocol" as const;

  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class PollExhaustedError extends FlowError {
  readonly kind = "exhausted" as const;

  constructor(attempts: number) {
    super(`No result after ${attempts} poll attempts`);
    this.name = "PollExhaustedError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid flow state transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class RunAbortedError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = "RunAbortedError";
  }
}

export function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (e) {
    const snippet = text.length > 200 ? `${text.slice(0, 200)}...` : text;
    throw new DecodeError(`Response body is not JSON: ${JSON.stringify(snippet)}`, { cause: e });
  }
}
