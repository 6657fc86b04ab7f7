/**
 * Subscription token cap: pick the baskets whose tokens fit into one feed subscription.
 * gamma-active ranks baskets by a liquidity/volume/spread/volatility score decayed by time to end.
 */

import type { EventBasket } from "../types";
import type { UniverseKind } from "../config/load_config";
import { daysUntil } from "../markets/market_time";

export interface ScoreParams {
  /** 0 = no limit. */
  maxDaysToEnd: number;
  halflifeDays: number;
}

export interface TokenCapParams extends ScoreParams {
  /** 0 = no cap. */
  maxTokens: number;
  /** 0 = no per-event cap. */
  maxMarketsPerEvent: number;
}

export interface TokenCapResult {
  baskets: EventBasket[];
  emptyReason: string | null;
}

const SCALE = Math.log1p(50_000);

function clamp01(x: number): number {
  if (!Number.isFinite(x) || x <= 0) return 0;
  return x >= 1 ? 1 : x;
}

/** Selection score in [0, 1]; -1 excludes the basket (ended, or too far out). */
export function scoreGammaBasket(basket: EventBasket, nowMs: number, params: ScoreParams): number {
  let daysToEnd = 365;
  if (basket.endMs) {
    const raw = daysUntil(basket.endMs, nowMs);
    if (raw < -1) return -1;
    daysToEnd = Math.max(0, raw);
  }
  if (params.maxDaysToEnd > 0 && daysToEnd > params.maxDaysToEnd) return -1;

  const timeScore = Math.exp(-daysToEnd / Math.max(1, params.halflifeDays));
  const liq = clamp01(Math.log1p(Math.max(0, basket.liquidityNum)) / SCALE);
  const vol = clamp01(Math.log1p(Math.max(0, basket.volume24hr)) / SCALE);
  const spr = clamp01(Math.max(0, basket.spread) / 0.02);
  const volat = clamp01(Math.abs(basket.oneDayPriceChange) / 0.02);
  const base = 0.4 * liq + 0.35 * vol + 0.15 * spr + 0.1 * volat;
  return base * timeScore;
}

function tokensOf(basket: EventBasket): Set<string> {
  return new Set(basket.legs.map((l) => l.tokenId).filter(Boolean));
}

function fitsWith(current: Set<string>, extra: Set<string>, max: number): boolean {
  let n = current.size;
  for (const t of extra) if (!current.has(t)) n++;
  return n <= max;
}

export function applySubscriptionTokenCap(
  baskets: readonly EventBasket[],
  universe: UniverseKind,
  params: TokenCapParams,
  nowMs: number = Date.now()
): TokenCapResult {
  if (params.maxTokens <= 0) return { baskets: [...baskets], emptyReason: null };

  const selected: EventBasket[] = [];
  const tokens = new Set<string>();
  const take = (b: EventBasket, bt: Set<string>): void => {
    selected.push(b);
    for (const t of bt) tokens.add(t);
  };

  if (universe === "gamma-active") {
    const ranked = baskets
      .map((b) => ({ b, score: scoreGammaBasket(b, nowMs, params) }))
      .filter((x) => x.score >= 0)
      .sort((x, y) => y.score - x.score || y.b.volume24hr - x.b.volume24hr);
    const perEvent = new Map<string, number>();
    for (const { b } of ranked) {
      const bt = tokensOf(b);
      if (bt.size === 0 || !fitsWith(tokens, bt, params.maxTokens)) continue;
      if (params.maxMarketsPerEvent > 0 && b.eventId) {
        const used = perEvent.get(b.eventId) ?? 0;
        if (used >= params.maxMarketsPerEvent) continue;
        perEvent.set(b.eventId, used + 1);
      }
      take(b, bt);
    }
    console.log(
      `[universe] scored selection (gamma-active) max_subscribe_tokens=${params.maxTokens}: baskets ${baskets.length} -> ${selected.length} | tokens=${tokens.size}`
    );
    if (selected.length === 0) {
      return {
        baskets: [],
        emptyReason:
          "CLOBBOT: gamma-active selection empty (all markets filtered out). Try raising scan_max_markets, relaxing min_liquidity/min_volume24hr, or loosening max_days_to_end.",
      };
    }
    return { baskets: selected, emptyReason: null };
  }

  const bySize = [...baskets].sort((a, b) => tokensOf(a).size - tokensOf(b).size);
  for (const b of bySize) {
    const bt = tokensOf(b);
    if (bt.size === 0 || !fitsWith(tokens, bt, params.maxTokens)) continue;
    take(b, bt);
  }
  if (selected.length === 0) {
    return {
      baskets: [],
      emptyReason: `CLOBBOT: ${universe} universe empty after max_subscribe_tokens=${params.maxTokens}.`,
    };
  }
  if (selected.length !== baskets.length) {
    console.log(
      `[universe] applied max_subscribe_tokens=${params.maxTokens}: baskets ${baskets.length} -> ${selected.length} | tokens=${tokens.size}`
    );
  }
  return { baskets: selected, emptyReason: null };
}

export interface SubscriptionMaps {
  /** token id -> keys of baskets containing it */
  tokenToBaskets: Map<string, Set<string>>;
  basketsByKey: Map<string, EventBasket>;
  /** Unique token ids in first-seen order. */
  tokenIds: string[];
}

export function buildSubscriptionMaps(baskets: readonly EventBasket[]): SubscriptionMaps {
  const tokenToBaskets = new Map<string, Set<string>>();
  const basketsByKey = new Map<string, EventBasket>();
  const tokenIds: string[] = [];
  for (const b of baskets) {
    basketsByKey.set(b.key, b);
    for (const leg of b.legs) {
      let keys = tokenToBaskets.get(leg.tokenId);
      if (!keys) {
        keys = new Set();
        tokenToBaskets.set(leg.tokenId, keys);
        tokenIds.push(leg.tokenId);
      }
      keys.add(b.key);
    }
  }
  return { tokenToBaskets, basketsByKey, tokenIds };
}
