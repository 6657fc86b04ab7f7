/**
 * Capability set shared by the execution backends.
 */

import type { Candidate, LocalBook } from "../types";
import { isRecord } from "../types";

export type BackendKind = "clob" | "simmer";

/** Filled shares per token id. */
export type Fills = Record<string, number>;

export interface Submission {
  submittedAtMs: number;
  orderIds: string[];
  /** Set when the submission itself failed. */
  error: string | null;
  /** Per-order error messages reported by the venue. */
  messages: string[];
}

export interface UnwindReport {
  attempted: number;
  succeeded: number;
  error?: string;
}

export interface ExecutionBackend<S extends Submission = Submission> {
  readonly kind: BackendKind;
  /** Fills reported by `pollFills` do not change between polls. */
  readonly fillsAreFinal: boolean;
  /** Notional the basket would consume, for the daily cap. */
  estimateCost(candidate: Candidate): number;
  submitBasket(candidate: Candidate): Promise<S>;
  pollFills(candidate: Candidate, submission: S): Promise<Fills>;
  cancel(orderIds: readonly string[]): Promise<void>;
  unwind(candidate: Candidate, submission: S, fills: Fills, books: (tokenId: string) => LocalBook | undefined): Promise<UnwindReport>;
  /** null when the venue has no open-order notion. */
  openOrderCount(): Promise<number | null>;
  /** Extra wait before the next attempt, e.g. from a rate-limit response. */
  retryAfterMs(submission: S): number;
  /** Notional actually spent by a filled submission. */
  executedCost(candidate: Candidate, submission: S): number;
}

/** Source of the account's total PnL for the daily loss guard. */
export interface PortfolioSource {
  fetchPnlTotal(): Promise<number | null>;
}

/** Walk a response and collect every non-empty id / orderId / order_id string, sorted and unique. */
export function extractOrderIds(payload: unknown): string[] {
  const ids = new Set<string>();
  const walk = (v: unknown): void => {
    if (Array.isArray(v)) {
      for (const x of v) walk(x);
      return;
    }
    if (!isRecord(v)) return;
    for (const [k, x] of Object.entries(v)) {
      const lk = k.toLowerCase();
      if ((lk === "id" || lk === "orderid" || lk === "order_id") && typeof x === "string" && x) ids.add(x);
      walk(x);
    }
  };
  walk(payload);
  return [...ids].sort();
}

/** errorMsg / message / error strings from a list of per-order rows, unique, in order. */
export function extractErrorMessages(payload: unknown): string[] {
  const out: string[] = [];
  if (!Array.isArray(payload)) return out;
  for (const row of payload) {
    if (!isRecord(row)) continue;
    const raw = row.errorMsg || row.message || row.error || "";
    const msg = String(raw).trim();
    if (msg && !out.includes(msg)) out.push(msg);
  }
  return out;
}
