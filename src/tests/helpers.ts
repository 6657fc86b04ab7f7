/**
 * Shared builders for tests. Values are made up.
 */
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { parseConfig, type Config } from "../config/load_config";
import type { BackendKind, ExecutionBackend, Fills, Submission, UnwindReport } from "../execution/backend";
import { EventLog, MetricsLog } from "../state/store";
import type { Candidate, EventAction, EventBasket, EventLogEntry, Leg, LegSide, LocalBook, OrderLevel } from "../types";

export function makeLeg(tokenId: string, overrides: Partial<Leg> = {}): Leg {
  return {
    marketId: `m-${tokenId}`,
    question: `Question ${tokenId}?`,
    label: tokenId,
    tokenId,
    side: "yes",
    conditionId: `0xcond${tokenId}`,
    brokerMarketId: "",
    ...overrides,
  };
}

export function makeBasket(key: string, legs: readonly Leg[], overrides: Partial<EventBasket> = {}): EventBasket {
  return {
    key,
    title: `Basket ${key}`,
    strategy: "buckets",
    legs,
    marketId: `event-${key}`,
    eventId: `event-${key}`,
    eventSlug: `slug-${key}`,
    liquidityNum: 1000,
    volume24hr: 500,
    spread: 0.01,
    oneDayPriceChange: 0,
    endMs: null,
    minOrderSize: 0,
    priceTickSize: 0.01,
    ...overrides,
  };
}

export function makeBook(asks: OrderLevel[], overrides: Partial<LocalBook> = {}): LocalBook {
  const prices = asks.map((a) => a.price);
  return {
    asks,
    bids: [],
    bestAsk: prices.length ? Math.min(...prices) : null,
    bestBid: null,
    asksSynthetic: false,
    bidsSynthetic: false,
    updatedAt: 0,
    ...overrides,
  };
}

/** Candidate with the given per-leg costs for `shares` shares each, no fee, no fixed cost. */
export function makeCandidate(
  costs: number[],
  shares: number,
  opts: { side?: LegSide; brokerIds?: string[]; key?: string } = {}
): Candidate {
  const legCosts = costs.map((cost, i) => ({
    leg: makeLeg(`t${i + 1}`, { side: opts.side ?? "yes", brokerMarketId: opts.brokerIds?.[i] ?? "" }),
    cost,
  }));
  const basketCost = costs.reduce((s, c) => s + c, 0);
  const payout = shares;
  const grossEdge = payout - basketCost;
  return {
    strategy: "buckets",
    basketKey: opts.key ?? "b1",
    title: "Test basket",
    sharesPerLeg: shares,
    basketCost,
    payout,
    fixedCost: 0,
    grossEdge,
    edgePct: payout > 0 ? grossEdge / payout : 0,
    legCosts,
  };
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Config from defaults with per-section overrides. */
export function makeConfig(sections: DeepPartial<Config> = {}): Config {
  return parseConfig(sections);
}

/** Silence console output for the duration of `fn`, returning the captured lines. */
export async function captureLogs(fn: () => Promise<void> | void): Promise<string[]> {
  const lines: string[] = [];
  const orig = { log: console.log, warn: console.warn, error: console.error };
  const capture = (...args: unknown[]): void => {
    lines.push(args.map((a) => String(a)).join(" "));
  };
  console.log = capture;
  console.warn = capture;
  console.error = capture;
  try {
    await fn();
  } finally {
    console.log = orig.log;
    console.warn = orig.warn;
    console.error = orig.error;
  }
  return lines;
}

/** Scriptable backend: each submit returns the next queued fills, or throws `submitError`. */
export class FakeBackend implements ExecutionBackend {
  readonly calls: string[] = [];
  readonly canceled: string[][] = [];
  readonly unwound: Fills[] = [];
  fillsQueue: Fills[] = [];
  submitError: string | null = null;
  pollError: string | null = null;
  openOrders: number | null | Error = null;
  costEstimate: number | null = null;
  retryMs = 0;
  private submitted = 0;

  constructor(
    readonly kind: BackendKind = "clob",
    readonly fillsAreFinal = false
  ) {}

  estimateCost(candidate: Candidate): number {
    return this.costEstimate ?? candidate.basketCost;
  }

  async submitBasket(_candidate: Candidate): Promise<Submission> {
    this.calls.push("submit");
    if (this.submitError) throw new Error(this.submitError);
    this.submitted++;
    return { submittedAtMs: 0, orderIds: [`o${this.submitted}`], error: null, messages: [] };
  }

  async pollFills(_candidate: Candidate, _submission: Submission): Promise<Fills> {
    this.calls.push("poll");
    if (this.pollError) throw new Error(this.pollError);
    return this.fillsQueue.shift() ?? {};
  }

  async cancel(orderIds: readonly string[]): Promise<void> {
    this.calls.push("cancel");
    this.canceled.push([...orderIds]);
  }

  async unwind(_candidate: Candidate, _submission: Submission, fills: Fills): Promise<UnwindReport> {
    this.calls.push("unwind");
    this.unwound.push({ ...fills });
    const attempted = Object.values(fills).filter((x) => x > 0).length;
    return { attempted, succeeded: attempted };
  }

  async openOrderCount(): Promise<number | null> {
    if (this.openOrders instanceof Error) throw this.openOrders;
    return this.openOrders;
  }

  retryAfterMs(_submission: Submission): number {
    return this.retryMs;
  }

  executedCost(candidate: Candidate, _submission: Submission): number {
    return this.estimateCost(candidate);
  }
}

/** Event log that keeps `action:basketKey` in memory instead of writing a file. */
export class RecordingEventLog extends EventLog {
  readonly actions: string[] = [];
  readonly metadata: Record<string, unknown>[] = [];

  constructor() {
    super("");
  }

  record(action: EventAction, basketKey: string, metadata: Record<string, unknown> = {}, nowMs = Date.now()): void {
    this.actions.push(`${action}:${basketKey}`);
    this.metadata.push(metadata);
    super.record(action, basketKey, metadata, nowMs);
  }
}

export class RecordingMetricsLog extends MetricsLog {
  readonly rows: object[] = [];

  constructor() {
    super("");
  }

  get enabled(): boolean {
    return true;
  }

  append(row: object): void {
    this.rows.push(row);
  }
}

/** Sleep that returns at once and remembers the requested delays. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

const EventLogEntrySchema = z.object({
  timestamp: z.string(),
  action: z.enum(["run_start", "run_stop", "candidate", "exec_skip", "exec_result", "halt", "daily_reset"]),
  basketKey: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

/** Read the last `limit` event log entries, newest first. Malformed lines are skipped. */
export function readEventLog(path: string, limit: number): EventLogEntry[] {
  if (!path || !existsSync(path)) return [];
  const lines = readFileSync(path, "utf-8").split("\n").filter((s) => s.trim());
  const out: EventLogEntry[] = [];
  for (const line of lines.slice(-limit).reverse()) {
    const parsed = EventLogEntrySchema.safeParse(parseLine(line));
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}
