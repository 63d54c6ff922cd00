import type { LedgerState } from "./ledger.js";

/** Transient feed problem: the loop logs it, backs off and carries on. */
export interface FeedError {
  kind: "feed";
  reason: "malformed" | "timeout" | "transport";
  message: string;
}

/** Order placement failed; the ledger did not change. */
export interface GatewayError {
  kind: "gateway";
  message: string;
  cause?: unknown;
}

/** A transition the state machine does not allow, e.g. an exit while flat. */
export interface InvariantViolation {
  kind: "invariant";
  message: string;
  state: LedgerState;
  attempted: string;
}

export type TraderError = FeedError | GatewayError | InvariantViolation;

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function feedError(reason: FeedError["reason"], message: string): FeedError {
  return { kind: "feed", reason, message };
}

export function gatewayError(err: unknown): GatewayError {
  return { kind: "gateway", message: errorMessage(err), cause: err };
}
