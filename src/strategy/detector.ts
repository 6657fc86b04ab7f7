/**
 * Basket pricing against local books: net edge after winner fee and fixed cost,
 * alert signatures and log formatting.
 */

import type { Candidate, EventBasket, LegCost, LocalBook, OrderLevel } from "../types";
import { depthAtOrBelow, estimateExecCost, execLimitPrice, orderCostForShares } from "./pricing";

export interface DetectorParams {
  sharesPerLeg: number;
  winnerFeeRate: number;
  fixedCost: number;
}

/** Book lookup by token id. */
export type BookLookup = (tokenId: string) => LocalBook | undefined;

const EDGE_EPS = 1e-12;
const SYNTHETIC_SIZE = 1e9;
const LEGS_SHOWN = 6;

/** Asks to price against; a best-ask-only book counts as unlimited size at that price. */
export function effectiveAsks(book: LocalBook): OrderLevel[] {
  if (book.asks.length === 0 && book.bestAsk != null && book.bestAsk > 0) {
    return [{ price: book.bestAsk, size: SYNTHETIC_SIZE }];
  }
  return book.asks;
}

/**
 * Price every leg for `sharesPerLeg` shares. Returns null when the basket cannot be priced:
 * a leg without a book, a leg without enough depth, or a size under the market minimum.
 */
export function computeCandidate(
  basket: EventBasket,
  books: BookLookup,
  params: DetectorParams
): Candidate | null {
  const { sharesPerLeg, winnerFeeRate, fixedCost } = params;
  if (basket.minOrderSize > 0 && sharesPerLeg < basket.minOrderSize) return null;

  const legCosts: LegCost[] = [];
  for (const leg of basket.legs) {
    const book = books(leg.tokenId);
    if (!book) return null;
    const cost = orderCostForShares(effectiveAsks(book), sharesPerLeg);
    if (cost == null) return null;
    legCosts.push({ leg, cost });
  }

  const basketCost = legCosts.reduce((s, lc) => s + lc.cost, 0);
  const payout = sharesPerLeg * (1 - winnerFeeRate);
  const grossEdge = payout - basketCost - fixedCost;
  const edgePct = payout > 0 ? grossEdge / payout : 0;
  return {
    strategy: basket.strategy,
    basketKey: basket.key,
    title: basket.title,
    sharesPerLeg,
    basketCost,
    payout,
    fixedCost,
    grossEdge,
    edgePct,
    legCosts,
  };
}

export function edgeThresholdUsd(minEdgeCents: number): number {
  return minEdgeCents / 100;
}

export function isActionable(candidate: Candidate, minEdgeCents: number): boolean {
  return candidate.grossEdge >= edgeThresholdUsd(minEdgeCents) - EDGE_EPS;
}

/** Best edge first. */
export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.grossEdge - a.grossEdge);
}

/** Stable text key; an unchanged signature inside the alert cooldown is not re-alerted. */
export function candidateSignature(c: Candidate): string {
  const legs = c.legCosts.map(({ leg, cost }) => `${leg.side}:${cost.toFixed(4)}`);
  return `${c.strategy}|${c.basketKey}|${c.grossEdge.toFixed(4)}|${legs.join(",")}`;
}

export function formatPct(x: number): string {
  return `${(x * 100).toFixed(2)}%`;
}

export function formatCandidate(c: Candidate): string {
  const lines = [
    `[${c.strategy}] EDGE $${c.grossEdge.toFixed(4)} (${formatPct(c.edgePct)}) | ` +
      `cost $${c.basketCost.toFixed(4)} | payout $${c.payout.toFixed(4)} | fixed $${c.fixedCost.toFixed(4)}`,
    `  Event: ${c.title} | legs=${c.legCosts.length}`,
  ];
  const cheapest = [...c.legCosts].sort((a, b) => a.cost - b.cost).slice(0, LEGS_SHOWN);
  for (const { leg, cost } of cheapest) {
    lines.push(`    - ${leg.label}/${leg.side.toUpperCase()}: $${cost.toFixed(4)} (market_id=${leg.marketId})`);
  }
  const extra = c.legCosts.length - LEGS_SHOWN;
  if (extra > 0) lines.push(`    - ... ${extra} more`);
  return lines.join("\n");
}

export function formatCandidateBrief(c: Candidate): string {
  return (
    `EDGE $${c.grossEdge.toFixed(4)} (${formatPct(c.edgePct)}) | cost $${c.basketCost.toFixed(4)} | ` +
    `payout $${c.payout.toFixed(4)} | legs=${c.legCosts.length} | ${c.title}`
  );
}

export interface MetricsContext {
  universe: string;
  minEdgeCents: number;
  slippageBps: number;
  nowMs: number;
}

/** One metrics-stream row (snake_case wire format). */
export interface MetricsRow {
  ts: string;
  ts_ms: number;
  universe: string;
  strategy: string;
  event_key: string;
  title: string;
  market_id: string;
  event_id: string;
  event_slug: string;
  leg_count: number;
  shares_per_leg: number;
  payout_after_fee: number;
  fixed_cost: number;
  basket_cost_observed: number;
  basket_cost_exec_est: number;
  net_edge_raw: number;
  edge_pct_raw: number;
  net_edge_exec_est: number;
  edge_pct_exec_est: number;
  edge_threshold_usd: number;
  passes_raw_threshold: boolean;
  passes_exec_threshold: boolean;
  fill_ratio_min: number;
  fill_ratio_avg: number;
  worst_book_stale_sec: number;
  synthetic_ask_legs: number;
  missing_book_legs: number;
  reason: "threshold" | "candidate";
}

function clamp01(x: number): number {
  if (!Number.isFinite(x) || x <= 0) return 0;
  return x >= 1 ? 1 : x;
}

/**
 * Executable view of a candidate: cost at cents-rounded limit prices, and how much of each leg
 * the visible depth at or under that limit could fill.
 */
export function buildMetricsRow(
  c: Candidate,
  basket: EventBasket,
  books: BookLookup,
  ctx: MetricsContext
): MetricsRow {
  const threshold = edgeThresholdUsd(ctx.minEdgeCents);
  const execCost = estimateExecCost(c, ctx.slippageBps);
  const execEdge = c.payout - execCost - c.fixedCost;
  const shares = Math.max(c.sharesPerLeg, 1e-9);

  const fillRatios: number[] = [];
  const staleSecs: number[] = [];
  let syntheticAskLegs = 0;
  let missingBookLegs = 0;
  for (const { leg, cost } of c.legCosts) {
    const book = books(leg.tokenId);
    if (!book) {
      missingBookLegs++;
      fillRatios.push(0);
      continue;
    }
    if (book.updatedAt > 0) staleSecs.push(Math.max(0, (ctx.nowMs - book.updatedAt) / 1000));
    if (book.asksSynthetic) syntheticAskLegs++;
    const limit = execLimitPrice(cost, c.sharesPerLeg, ctx.slippageBps);
    fillRatios.push(clamp01(depthAtOrBelow(effectiveAsks(book), limit) / shares));
  }

  const passesRaw = c.grossEdge >= threshold;
  return {
    ts: new Date(ctx.nowMs).toISOString(),
    ts_ms: ctx.nowMs,
    universe: ctx.universe,
    strategy: c.strategy,
    event_key: c.basketKey,
    title: c.title,
    market_id: basket.marketId,
    event_id: basket.eventId,
    event_slug: basket.eventSlug,
    leg_count: c.legCosts.length,
    shares_per_leg: c.sharesPerLeg,
    payout_after_fee: c.payout,
    fixed_cost: c.fixedCost,
    basket_cost_observed: c.basketCost,
    basket_cost_exec_est: execCost,
    net_edge_raw: c.grossEdge,
    edge_pct_raw: c.edgePct,
    net_edge_exec_est: execEdge,
    edge_pct_exec_est: c.payout > 0 ? execEdge / c.payout : 0,
    edge_threshold_usd: threshold,
    passes_raw_threshold: passesRaw,
    passes_exec_threshold: execEdge >= threshold,
    fill_ratio_min: fillRatios.length ? Math.min(...fillRatios) : 0,
    fill_ratio_avg: fillRatios.length ? fillRatios.reduce((s, x) => s + x, 0) / fillRatios.length : 0,
    worst_book_stale_sec: staleSecs.length ? Math.max(...staleSecs) : -1,
    synthetic_ask_legs: syntheticAskLegs,
    missing_book_legs: missingBookLegs,
    reason: passesRaw ? "threshold" : "candidate",
  };
}
