/**
 * Multi-leg execution: guard checks, submit, reconcile fills, cancel and unwind on
 * partial fills, retries, and the daily bookkeeping that follows.
 */

import type { Config } from "../config/load_config";
import type { Notifier } from "../notify/discord";
import { canExecute, recordExecutionResult } from "../risk/risk_guard";
import type { EventLog, StateStore } from "../state/store";
import { edgeThresholdUsd, formatPct, type BookLookup } from "../strategy/detector";
import { execLimitPrice, orderCostForShares } from "../strategy/pricing";
import type { Candidate, EventBasket, RuntimeState } from "../types";
import { errorMessage } from "../types";
import type { ExecutionBackend, Fills, Submission, UnwindReport } from "./backend";

export type ExecutionSettings = Config["execution"];

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AttemptResult {
  attempt: number;
  allFilled: boolean;
  fills: Fills;
  minFillRatio: number;
  orderIds: string[];
  error: string | null;
  messages: string[];
  unwind: UnwindReport | null;
}

export interface ExecutionResult<S extends Submission = Submission> {
  ok: boolean;
  result: AttemptResult;
  /** Last submission that reached the venue. */
  submission: S | null;
}

/** Smallest filled/target ratio across legs; 0 for a leg with no fill entry. */
export function minFillRatio(candidate: Candidate, fills: Fills): number {
  const shares = Math.max(candidate.sharesPerLeg, 1e-9);
  let min = Number.POSITIVE_INFINITY;
  for (const { leg } of candidate.legCosts) {
    min = Math.min(min, (fills[leg.tokenId] ?? 0) / shares);
  }
  return Number.isFinite(min) ? min : 0;
}

/** One-line reason for a NO FILL notification. */
export function summarizeExecFailure(result: AttemptResult): string {
  if (result.error) return result.error;
  if (result.messages.length) return result.messages.join(" | ").slice(0, 300);
  return "not filled";
}

function emptyAttempt(attempt: number): AttemptResult {
  return {
    attempt,
    allFilled: false,
    fills: {},
    minFillRatio: 0,
    orderIds: [],
    error: null,
    messages: [],
    unwind: null,
  };
}

/** Poll fills until every leg reaches `min_fill_ratio` or the polls run out. */
export async function reconcileFills<S extends Submission>(
  backend: ExecutionBackend<S>,
  candidate: Candidate,
  submission: S,
  exec: ExecutionSettings,
  sleep: Sleep
): Promise<{ fills: Fills; minFillRatio: number; allFilled: boolean }> {
  const polls = backend.fillsAreFinal ? 1 : Math.max(1, exec.reconcile_polls);
  let fills: Fills = {};
  let ratio = 0;
  for (let i = 0; i < polls; i++) {
    fills = await backend.pollFills(candidate, submission);
    ratio = minFillRatio(candidate, fills);
    if (ratio >= exec.min_fill_ratio) return { fills, minFillRatio: ratio, allFilled: true };
    if (i < polls - 1) await sleep(exec.reconcile_interval_sec * 1000);
  }
  return { fills, minFillRatio: ratio, allFilled: false };
}

export async function executeWithRetries<S extends Submission>(
  backend: ExecutionBackend<S>,
  candidate: Candidate,
  books: BookLookup,
  exec: ExecutionSettings,
  sleep: Sleep = realSleep
): Promise<ExecutionResult<S>> {
  let last = emptyAttempt(0);
  let lastSubmission: S | null = null;

  for (let attempt = 1; attempt <= exec.max_attempts; attempt++) {
    const more = attempt < exec.max_attempts;
    let submission: S;
    try {
      submission = await backend.submitBasket(candidate);
    } catch (e) {
      last = { ...emptyAttempt(attempt), error: errorMessage(e) };
      if (more) await sleep(exec.retry_delay_sec * 1000);
      continue;
    }
    lastSubmission = submission;

    let recon: { fills: Fills; minFillRatio: number; allFilled: boolean };
    let reconError: string | null = null;
    try {
      recon = await reconcileFills(backend, candidate, submission, exec, sleep);
    } catch (e) {
      reconError = `fill reconcile failed: ${errorMessage(e)}`;
      recon = { fills: {}, minFillRatio: 0, allFilled: false };
    }
    last = {
      attempt,
      allFilled: recon.allFilled,
      fills: recon.fills,
      minFillRatio: recon.minFillRatio,
      orderIds: submission.orderIds,
      error: reconError ?? submission.error,
      messages: submission.messages,
      unwind: null,
    };
    if (recon.allFilled) return { ok: true, result: last, submission };

    if (exec.cancel_unfilled_on_fail && submission.orderIds.length) {
      try {
        await backend.cancel(submission.orderIds);
        console.log(`[exec] live: canceled unfilled order ids: ${submission.orderIds.join(",")}`);
      } catch (e) {
        console.log(`[exec] live: cancel attempt failed: ${errorMessage(e)}`);
      }
    }

    if (exec.unwind_partial) {
      try {
        last.unwind = await backend.unwind(candidate, submission, recon.fills, books);
      } catch (e) {
        last.unwind = { attempted: 0, succeeded: 0, error: errorMessage(e) };
      }
      if (last.unwind.attempted > 0) {
        console.log(
          `[exec] live: unwind(${backend.kind}) attempted=${last.unwind.attempted} succeeded=${last.unwind.succeeded}`
        );
      }
    }

    if (more) await sleep(Math.max(exec.retry_delay_sec * 1000, backend.retryAfterMs(submission)));
  }

  return { ok: false, result: last, submission: lastSubmission };
}

export type PrecheckResult = { ok: true } | { ok: false; reason: string };

/**
 * Books must be fresh, carry real asks (unless best-only books are allowed), and hold
 * enough depth at or under each leg's limit price.
 */
export function precheckBooks(
  candidate: Candidate,
  books: BookLookup,
  exec: ExecutionSettings,
  nowMs: number
): PrecheckResult {
  const staleMs = Math.max(0, exec.book_stale_sec) * 1000;
  const shares = candidate.sharesPerLeg;
  for (const { leg, cost } of candidate.legCosts) {
    const book = books(leg.tokenId);
    if (!book) return { ok: false, reason: `missing book token_id=${leg.tokenId}` };
    const age = nowMs - book.updatedAt;
    if (staleMs > 0 && age > staleMs) {
      return { ok: false, reason: `stale book (${(age / 1000).toFixed(1)}s) token_id=${leg.tokenId}` };
    }
    if (!exec.allow_best_only && book.asksSynthetic) return { ok: false, reason: `best_only book token_id=${leg.tokenId}` };
    if (book.asks.length === 0) return { ok: false, reason: `no asks token_id=${leg.tokenId}` };

    const px = execLimitPrice(cost, shares, exec.slippage_bps);
    const within = book.asks.filter((a) => Number.isFinite(a.price) && a.price <= px);
    if (orderCostForShares(within, shares) == null) {
      return { ok: false, reason: `insufficient ask depth <=$${px.toFixed(2)} token_id=${leg.tokenId}` };
    }
  }
  return { ok: true };
}

/** Mutable holder so a day rollover can swap the state object under running code. */
export interface StateRef {
  current: RuntimeState;
}

export interface ExecutionContext {
  cfg: Config;
  state: StateRef;
  store: StateStore;
  backend: ExecutionBackend;
  books: BookLookup;
  notifier: Notifier;
  eventLog: EventLog;
  /** Last execution time per basket key, epoch ms. */
  lastExecMs: Map<string, number>;
  now: () => number;
  sleep: Sleep;
}

export type ExecOutcome =
  | { status: "skipped"; reason: string }
  | { status: "filled"; cost: number; attempt: number }
  | { status: "failed"; reason: string; halted: boolean };

function skip(reason: string): ExecOutcome {
  console.log(`  live: skipped (${reason})`);
  return { status: "skipped", reason };
}

export async function maybeExecuteCandidate(
  ctx: ExecutionContext,
  basket: EventBasket,
  candidate: Candidate
): Promise<ExecOutcome> {
  const { cfg, backend, notifier } = ctx;
  const exec = cfg.execution;
  const state = ctx.state.current;
  const nowMs = ctx.now();

  const lastExec = ctx.lastExecMs.get(basket.key);
  if (lastExec != null && nowMs - lastExec < exec.cooldown_sec * 1000) return skip("event execution cooldown");

  const wasHalted = state.halted;
  const decision = await canExecute(state, candidate, cfg, backend, notifier);
  if (!decision.allowed) {
    ctx.store.save(state);
    if (!wasHalted && state.halted) ctx.eventLog.record("halt", basket.key, { reason: state.haltReason }, nowMs);
    ctx.eventLog.record("exec_skip", basket.key, { reason: decision.reason }, nowMs);
    return skip(decision.reason);
  }

  const legs = candidate.legCosts.length;
  let entry = `ENTRY (${backend.kind}) ${candidate.title} | edge ${formatPct(candidate.edgePct)} ($${candidate.grossEdge.toFixed(4)}) | legs=${legs}`;
  if (backend.kind === "clob") {
    const threshold = edgeThresholdUsd(cfg.detector.min_edge_cents);
    const execCost = backend.estimateCost(candidate);
    const execEdge = candidate.payout - execCost - candidate.fixedCost;
    const execEdgePct = candidate.payout > 0 ? execEdge / candidate.payout : 0;
    if (execEdge < threshold) {
      return skip(`edge after cents/slippage $${execEdge.toFixed(4)} < threshold $${threshold.toFixed(4)}`);
    }
    const pre = precheckBooks(candidate, ctx.books, exec, nowMs);
    if (!pre.ok) return skip(`book precheck: ${pre.reason}`);
    entry =
      `ENTRY (${backend.kind}) ${candidate.title} | est edge ${formatPct(execEdgePct)} ($${execEdge.toFixed(4)}) | ` +
      `est cost $${execCost.toFixed(4)} | legs=${legs}`;
  }
  notifier.notify(entry);

  const { ok, result, submission } = await executeWithRetries(backend, candidate, ctx.books, exec, ctx.sleep);
  ctx.lastExecMs.set(basket.key, nowMs);

  const edgeText = `edge ${formatPct(candidate.edgePct)} ($${candidate.grossEdge.toFixed(4)})`;
  let outcome: ExecOutcome;
  if (ok && submission) {
    const cost = backend.executedCost(candidate, submission);
    recordExecutionResult(state, true, cost, cfg.risk, notifier);
    if (backend.kind === "clob") {
      console.log(`  live: filled (attempt=${result.attempt}, fills=${JSON.stringify(result.fills)})`);
      notifier.notify(`Filled (${backend.kind}) ${candidate.title} | ${edgeText} | cost $${cost.toFixed(4)} | legs=${legs}`);
    } else {
      console.log(`  live: batch executed (attempt=${result.attempt}, total_cost=$${cost.toFixed(4)})`);
      notifier.notify(
        `Executed (${backend.kind}) ${candidate.title} | ${edgeText} | total_cost $${cost.toFixed(4)} | legs=${legs}`
      );
    }
    outcome = { status: "filled", cost, attempt: result.attempt };
  } else {
    const halted = recordExecutionResult(state, false, 0, cfg.risk, notifier);
    const reason = summarizeExecFailure(result);
    console.log(
      `  live: not filled (attempt=${result.attempt}, fails=${state.consecutiveFailures}, ` +
        `min_fill=${result.minFillRatio.toFixed(2)}, detail=${reason})`
    );
    notifier.notify(`NO FILL (${backend.kind}) ${candidate.title} | ${edgeText} | reason: ${reason}`);
    if (halted) ctx.eventLog.record("halt", basket.key, { reason: state.haltReason }, nowMs);
    outcome = { status: "failed", reason, halted };
  }

  ctx.store.save(state);
  ctx.eventLog.record(
    "exec_result",
    basket.key,
    {
      backend: backend.kind,
      ok,
      attempt: result.attempt,
      minFillRatio: result.minFillRatio,
      fills: result.fills,
      orderIds: result.orderIds,
      unwind: result.unwind,
      error: ok ? null : summarizeExecFailure(result),
    },
    nowMs
  );
  return outcome;
}
