import type { Candidate, OrderLevel } from "../types";

const FILL_EPS = 1e-9;
const MIN_LIMIT_PRICE = 0.001;
const MAX_LIMIT_PRICE = 0.999;

function usableLevels(levels: readonly OrderLevel[]): OrderLevel[] {
  return levels.filter(
    (l) => Number.isFinite(l.price) && l.price > 0 && Number.isFinite(l.size) && l.size > 0
  );
}

/**
 * Cost to buy `shares` by walking asks cheapest first.
 * Returns null when the visible depth cannot fill the size.
 */
export function orderCostForShares(asks: readonly OrderLevel[], shares: number): number | null {
  if (!(shares > 0)) return 0;
  const levels = usableLevels(asks).sort((a, b) => a.price - b.price);
  let remaining = shares;
  let total = 0;
  for (const level of levels) {
    const take = Math.min(remaining, level.size);
    total += take * level.price;
    remaining -= take;
    if (remaining <= FILL_EPS) return total;
  }
  return null;
}

/** Total ask size priced at or under `maxPrice`. */
export function depthAtOrBelow(asks: readonly OrderLevel[], maxPrice: number): number {
  let total = 0;
  for (const level of usableLevels(asks)) {
    if (level.price <= maxPrice + 1e-12) total += level.size;
  }
  return total;
}

function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

export function quantizeCentsUp(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.ceil(roundTo(x * 100, 9)) / 100;
}

export function quantizeCentsDown(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.floor(roundTo(x * 100, 9)) / 100;
}

export function clampLimitPrice(px: number): number {
  return Math.min(MAX_LIMIT_PRICE, Math.max(MIN_LIMIT_PRICE, px));
}

/**
 * Limit price for a FOK buy: average observed price plus slippage, rounded up to whole cents.
 * The exchange rejects market-buy amounts with more than two decimals.
 */
export function execLimitPrice(observedCost: number, shares: number, slippageBps: number): number {
  const slip = Math.max(0, slippageBps) / 10000;
  const avg = observedCost / Math.max(shares, 1e-9);
  return clampLimitPrice(quantizeCentsUp(Math.min(MAX_LIMIT_PRICE, avg * (1 + slip))));
}

/** Executable basket cost on the exchange at cents-rounded limit prices. */
export function estimateExecCost(candidate: Candidate, slippageBps: number): number {
  let total = 0;
  for (const { cost } of candidate.legCosts) {
    total += execLimitPrice(cost, candidate.sharesPerLeg, slippageBps) * candidate.sharesPerLeg;
  }
  return total;
}
