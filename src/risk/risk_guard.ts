import type { Config } from "../config/load_config";
import type { ExecutionBackend, PortfolioSource } from "../execution/backend";
import type { Notifier } from "../notify/discord";
import type { Candidate, RuntimeState } from "../types";
import { errorMessage } from "../types";

export type GuardDecision = { allowed: true } | { allowed: false; reason: string };

export type GuardStatus = "ACTIVE" | "HALTED";

export function guardStatus(state: RuntimeState): GuardStatus {
  return state.halted ? "HALTED" : "ACTIVE";
}

function halt(state: RuntimeState, reason: string, notifier: Notifier): void {
  state.halted = true;
  state.haltReason = reason;
  console.log(`[risk] guard: HALT ${reason}`);
  notifier.notify(`CLOBBOT HALT: ${reason}`);
}

/**
 * Poll the portfolio (rate-limited) and halt once the drawdown from the day's first
 * reading reaches the limit. Returns false when the state is halted.
 */
export async function checkDailyLoss(
  state: RuntimeState,
  risk: Config["risk"],
  portfolio: PortfolioSource | null,
  nowMs: number,
  notifier: Notifier
): Promise<boolean> {
  if (state.halted) return false;
  if (risk.daily_loss_limit_usd <= 0 || !portfolio) return true;
  if (nowMs - state.lastPnlCheckTs < risk.pnl_check_interval_sec * 1000) return true;

  state.lastPnlCheckTs = nowMs;
  const pnl = await portfolio.fetchPnlTotal();
  if (pnl == null || !Number.isFinite(pnl)) return true;

  state.lastPnlTotal = pnl;
  if (state.startPnlTotal == null) {
    state.startPnlTotal = pnl;
    console.log(`[risk] guard: baseline pnl_total set to $${pnl.toFixed(2)}`);
    return true;
  }

  const drawdown = state.startPnlTotal - pnl;
  if (drawdown >= risk.daily_loss_limit_usd) {
    halt(
      state,
      `Daily loss guard hit: drawdown $${drawdown.toFixed(2)} >= $${risk.daily_loss_limit_usd.toFixed(2)}`,
      notifier
    );
    return false;
  }
  return true;
}

function consecutiveFailureReason(state: RuntimeState, max: number): string {
  return `Consecutive failure cap reached (${state.consecutiveFailures}/${max})`;
}

/** Pre-trade checks, first failure wins. May move the state to HALTED (logged and notified). */
export async function canExecute(
  state: RuntimeState,
  candidate: Candidate,
  cfg: Config,
  backend: ExecutionBackend,
  notifier: Notifier
): Promise<GuardDecision> {
  const risk = cfg.risk;
  const maxLegs = cfg.detector.max_legs;
  const legs = candidate.legCosts.length;

  if (state.halted) return { allowed: false, reason: `halted: ${state.haltReason}` };
  if (maxLegs > 0 && legs > maxLegs) return { allowed: false, reason: `legs cap exceeded (${legs}/${maxLegs})` };

  if (backend.kind === "simmer") {
    const missing = candidate.legCosts.filter((lc) => !lc.leg.brokerMarketId).length;
    if (missing > 0) return { allowed: false, reason: `missing simmer mapping for ${missing} legs` };
  }

  if (risk.max_exec_per_day > 0 && state.executionsToday >= risk.max_exec_per_day) {
    return {
      allowed: false,
      reason: `daily exec cap reached (${state.executionsToday}/${risk.max_exec_per_day})`,
    };
  }

  const estCost = backend.estimateCost(candidate);
  if (risk.max_notional_per_day > 0 && state.notionalToday + estCost > risk.max_notional_per_day) {
    return {
      allowed: false,
      reason:
        `daily notional cap reached ($${state.notionalToday.toFixed(2)} + $${estCost.toFixed(2)} > ` +
        `$${risk.max_notional_per_day.toFixed(2)})`,
    };
  }

  if (risk.max_consecutive_failures > 0 && state.consecutiveFailures >= risk.max_consecutive_failures) {
    halt(state, consecutiveFailureReason(state, risk.max_consecutive_failures), notifier);
    return { allowed: false, reason: `halted: ${state.haltReason}` };
  }

  if (backend.kind === "clob") {
    const shares = candidate.sharesPerLeg;
    if (Math.abs(shares - Math.round(shares)) > 1e-6) {
      return { allowed: false, reason: `shares_per_leg must be integer-like for clob execution (got ${shares})` };
    }
    if (risk.max_open_orders > 0) {
      let open: number | null;
      try {
        open = await backend.openOrderCount();
      } catch (e) {
        return { allowed: false, reason: `could not check open orders: ${errorMessage(e)}` };
      }
      if (open != null && open >= risk.max_open_orders) {
        return { allowed: false, reason: `open order cap reached (${open}/${risk.max_open_orders})` };
      }
    }
  }

  return { allowed: true };
}

/**
 * Success: one more execution and its notional, failure streak cleared.
 * Failure: streak grows and halts at the cap. Returns true on a halt transition.
 */
export function recordExecutionResult(
  state: RuntimeState,
  ok: boolean,
  cost: number,
  risk: Config["risk"],
  notifier: Notifier
): boolean {
  if (ok) {
    state.executionsToday += 1;
    state.notionalToday += cost;
    state.consecutiveFailures = 0;
    return false;
  }
  state.consecutiveFailures += 1;
  if (!state.halted && risk.max_consecutive_failures > 0 && state.consecutiveFailures >= risk.max_consecutive_failures) {
    halt(state, consecutiveFailureReason(state, risk.max_consecutive_failures), notifier);
    return true;
  }
  return false;
}
