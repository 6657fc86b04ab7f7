/**
 * Single-task streaming loop: owns the feed connection, the local books and the runtime
 * state; re-prices impacted baskets on every frame and hands candidates to execution.
 */

import type { Config, UniverseKind } from "../config/load_config";
import type { ExecutionBackend, PortfolioSource } from "../execution/backend";
import { maybeExecuteCandidate, type ExecutionContext, type Sleep, type StateRef } from "../execution/basket_executor";
import { extractBookItems, subscribeFrame, type BookStore, type FeedConnection } from "../markets/orderbook_ws";
import type { Notifier } from "../notify/discord";
import { checkDailyLoss } from "../risk/risk_guard";
import { dayKeyLocal, rolloverIfNewDay, type EventLog, type MetricsLog, type StateStore } from "../state/store";
import {
  buildMetricsRow,
  candidateSignature,
  computeCandidate,
  formatCandidate,
  formatCandidateBrief,
  formatPct,
  isActionable,
  type BookLookup,
} from "../strategy/detector";
import type { SubscriptionMaps } from "../strategy/token_cap";
import type { Candidate, EventBasket, RunStats } from "../types";

export type StopReason = "deadline" | "halted" | "feed-closed";

export interface MonitorResult {
  reason: StopReason;
  stats: RunStats;
}

export interface MonitorDeps {
  cfg: Config;
  universe: UniverseKind;
  feed: FeedConnection;
  maps: SubscriptionMaps;
  books: BookStore;
  state: StateRef;
  store: StateStore;
  eventLog: EventLog;
  metrics: MetricsLog;
  notifier: Notifier;
  /** null in observe mode. */
  backend: ExecutionBackend | null;
  portfolio: PortfolioSource | null;
  now: () => number;
  sleep: Sleep;
  today?: (ms: number) => string;
}

const MIN_RECEIVE_MS = 200;
const HEARTBEAT_TAIL_MS = 2000;

export function newRunStats(nowMs: number): RunStats {
  return {
    candidatesTotal: 0,
    candidatesWindow: 0,
    bestAll: null,
    bestWindow: null,
    windowStartedAt: nowMs,
    lastSummaryAt: nowMs,
  };
}

export function recordCandidate(stats: RunStats, c: Candidate): void {
  stats.candidatesTotal++;
  stats.candidatesWindow++;
  if (!stats.bestAll || c.grossEdge > stats.bestAll.grossEdge) stats.bestAll = c;
  if (!stats.bestWindow || c.grossEdge > stats.bestWindow.grossEdge) stats.bestWindow = c;
}

/** Receive timeout for the next frame; null once the run deadline has passed. */
export function receiveTimeoutMs(defaultMs: number, deadlineMs: number | null, nowMs: number): number | null {
  if (deadlineMs == null) return defaultMs;
  const remaining = deadlineMs - nowMs;
  if (remaining <= 0) return null;
  return Math.min(defaultMs, Math.max(MIN_RECEIVE_MS, remaining));
}

function parseFrame(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
}

export async function runMonitorLoop(deps: MonitorDeps): Promise<MonitorResult> {
  const { cfg, feed, maps, books, store, eventLog, metrics, notifier, backend, now } = deps;
  const today = deps.today ?? dayKeyLocal;
  const det = cfg.detector;
  const mon = cfg.monitor;
  const startMs = now();
  const deadlineMs = mon.run_seconds > 0 ? startMs + mon.run_seconds * 1000 : null;
  const summaryEveryMs = mon.summary_every_sec * 1000;
  const recvMs = mon.receive_timeout_sec * 1000;
  const stats = newRunStats(startMs);
  const lookup: BookLookup = (tokenId) => books.get(tokenId);

  const lastEvalMs = new Map<string, number>();
  const lastSignature = new Map<string, string>();
  const lastAlertMs = new Map<string, number>();
  let lastObserveNotifyMs = Number.NEGATIVE_INFINITY;

  const execCtx: ExecutionContext | null = backend
    ? {
        cfg,
        state: deps.state,
        store,
        backend,
        books: lookup,
        notifier,
        eventLog,
        lastExecMs: new Map(),
        now,
        sleep: deps.sleep,
      }
    : null;

  const processBasket = async (basket: EventBasket): Promise<void> => {
    const t = now();
    if (det.min_eval_interval_ms > 0) {
      const prev = lastEvalMs.get(basket.key);
      if (prev != null && t - prev < det.min_eval_interval_ms) return;
    }
    const c = computeCandidate(basket, lookup, {
      sharesPerLeg: det.shares,
      winnerFeeRate: det.winner_fee_rate,
      fixedCost: det.fixed_cost,
    });
    if (!c) return;
    lastEvalMs.set(basket.key, t);

    recordCandidate(stats, c);
    const actionable = isActionable(c, det.min_edge_cents);
    if (metrics.enabled && (actionable || cfg.state.metrics_all_candidates)) {
      metrics.append(
        buildMetricsRow(c, basket, lookup, {
          universe: deps.universe,
          minEdgeCents: det.min_edge_cents,
          slippageBps: cfg.execution.slippage_bps,
          nowMs: t,
        })
      );
    }
    if (!actionable) return;

    const sig = candidateSignature(c);
    const prevAlert = lastAlertMs.get(basket.key);
    if (lastSignature.get(basket.key) === sig && prevAlert != null && t - prevAlert < det.alert_cooldown_sec * 1000) {
      return;
    }
    console.log(formatCandidate(c));
    lastSignature.set(basket.key, sig);
    lastAlertMs.set(basket.key, t);
    eventLog.record(
      "candidate",
      basket.key,
      { strategy: c.strategy, edge: c.grossEdge, edgePct: c.edgePct, cost: c.basketCost, legs: c.legCosts.length },
      t
    );

    if (!execCtx && cfg.notify.observe_signals && t - lastObserveNotifyMs >= cfg.notify.observe_min_interval_sec * 1000) {
      notifier.notify(
        `OBSERVE SIGNAL ${c.title} | edge ${formatPct(c.edgePct)} ($${c.grossEdge.toFixed(4)}) | ` +
          `cost $${c.basketCost.toFixed(4)} | legs=${c.legCosts.length}`
      );
      lastObserveNotifyMs = t;
    }

    if (execCtx) await maybeExecuteCandidate(execCtx, basket, c);
  };

  feed.send(subscribeFrame(maps.tokenIds));
  let reason: StopReason;

  for (;;) {
    const nowMs = now();

    const rolled = rolloverIfNewDay(deps.state.current, today(nowMs));
    if (rolled.rolled) {
      deps.state.current = rolled.state;
      store.save(rolled.state);
      console.log("[monitor] state: daily counters reset");
      eventLog.record("daily_reset", "", { day: rolled.state.day }, nowMs);
    }

    if (summaryEveryMs > 0 && nowMs - stats.lastSummaryAt >= summaryEveryMs) {
      const windowSec = Math.max(1, Math.trunc((nowMs - stats.windowStartedAt) / 1000));
      const best = stats.bestWindow ? formatCandidateBrief(stats.bestWindow) : "none";
      console.log(`[monitor] summary(${windowSec}s): candidates=${stats.candidatesWindow} | ${best}`);
      stats.candidatesWindow = 0;
      stats.bestWindow = null;
      stats.windowStartedAt = nowMs;
      stats.lastSummaryAt = nowMs;
    }

    if (deadlineMs != null && nowMs >= deadlineMs) {
      console.log("[monitor] Run timeout reached. Exiting.");
      reason = "deadline";
      break;
    }

    if (backend) {
      const state = deps.state.current;
      const wasHalted = state.halted;
      const ok = await checkDailyLoss(state, cfg.risk, deps.portfolio, nowMs, notifier);
      if (!ok) {
        store.save(state);
        if (!wasHalted && state.halted) eventLog.record("halt", "", { reason: state.haltReason }, nowMs);
      }
      if (state.halted) {
        console.log("[monitor] run ending early due to halt state");
        reason = "halted";
        break;
      }
    }

    const timeout = receiveTimeoutMs(recvMs, deadlineMs, nowMs);
    if (timeout == null) {
      console.log("[monitor] Run timeout reached. Exiting.");
      reason = "deadline";
      break;
    }
    const received = await feed.receive(timeout);
    if (received.kind === "timeout") {
      if (deadlineMs == null || deadlineMs - now() > HEARTBEAT_TAIL_MS) {
        console.log(`[monitor] heartbeat: no message in ${mon.receive_timeout_sec}s`);
      }
      continue;
    }
    if (received.kind === "closed") {
      console.warn("[monitor] feed closed");
      reason = "feed-closed";
      break;
    }

    const impacted = new Set<string>();
    for (const item of extractBookItems(parseFrame(received.data))) {
      const keys = maps.tokenToBaskets.get(item.assetId);
      if (!keys) continue;
      books.applyItem(item);
      for (const k of keys) impacted.add(k);
    }
    for (const key of impacted) {
      const basket = maps.basketsByKey.get(key);
      if (basket) await processBasket(basket);
    }
  }

  if (summaryEveryMs > 0) {
    const best = stats.bestAll ? formatCandidateBrief(stats.bestAll) : "none";
    console.log(`[monitor] run summary: candidates=${stats.candidatesTotal} | ${best}`);
  }
  return { reason, stats };
}
