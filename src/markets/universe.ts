/**
 * Market universe: which markets to scan and which baskets to build from them.
 */

import type { Config, UniverseKind } from "../config/load_config";
import type { EventBasket, Leg } from "../types";
import { errorMessage } from "../types";
import {
  asFloat,
  eventSlugForMarket,
  groupBucketBaskets,
  groupEventPairBaskets,
  groupYesNoBaskets,
  marketEndMs,
  marketLiquidity,
  parseJsonStringField,
  type BrokerIdMap,
  type GammaMarket,
} from "../strategy/basket_grouper";
import { mapWithConcurrency } from "./clob_http";
import type { GammaEvent, MarketSource } from "./fetch_markets";
import { DAY_MS, getMarketEndTimeMs } from "./market_time";

export interface UniverseResult {
  universe: UniverseKind;
  baskets: EventBasket[];
  /** Set when nothing survived; the run should stop with this message. */
  emptyReason: string | null;
}

const PAGE_SIZE = 500;
const WEATHER_MAX_PAGES = 40;
const WEATHER_MAX_EVENT_SLUGS = 120;
const DEFAULT_BUILD_MAX_LEGS = 12;

const WEATHER_MARKERS = [
  "highest temperature in",
  "lowest temperature in",
  "high temperature in",
  "low temperature in",
];

export function isWeatherBucketMarket(m: GammaMarket): boolean {
  const q = (m.question ?? "").toLowerCase();
  return WEATHER_MARKERS.some((marker) => q.includes(marker));
}

interface StrategyPlan {
  buckets: boolean;
  yesNo: boolean;
  eventPair: boolean;
}

export function strategyPlan(strategy: Config["universe"]["strategy"]): StrategyPlan {
  return {
    buckets: strategy === "buckets" || strategy === "both" || strategy === "all",
    yesNo: strategy === "yes-no" || strategy === "both" || strategy === "all",
    eventPair: strategy === "event-pair" || strategy === "all",
  };
}

function compileFilter(pattern: string, name: string): RegExp | null {
  if (!pattern) return null;
  try {
    return new RegExp(pattern, "i");
  } catch (e) {
    throw new Error(`Invalid ${name}: ${errorMessage(e)}`);
  }
}

export interface MarketFilter {
  minLiquidity: number;
  minVolume24hr: number;
  /** epoch ms; null = no limit */
  maxEndMs: number | null;
  include: RegExp | null;
  exclude: RegExp | null;
}

export function gammaMarketFilter(cfg: Config, nowMs: number): MarketFilter {
  const g = cfg.universe.gamma;
  return {
    minLiquidity: g.min_liquidity,
    minVolume24hr: g.min_volume24hr,
    maxEndMs: g.max_days_to_end > 0 ? nowMs + g.max_days_to_end * DAY_MS : null,
    include: compileFilter(g.include_regex, "include_regex"),
    exclude: compileFilter(g.exclude_regex, "exclude_regex"),
  };
}

/** Order-book markets without taker fees that pass the liquidity/volume/horizon/text filters. */
export function passesMarketFilter(m: GammaMarket, f: MarketFilter): boolean {
  if (m.enableOrderBook === false) return false;
  if (m.feesEnabled === true) return false;
  if (marketLiquidity(m) < f.minLiquidity) return false;
  if (asFloat(m.volume24hr) < f.minVolume24hr) return false;
  const end = marketEndMs(m);
  if (f.maxEndMs != null && end != null && end > f.maxEndMs) return false;
  if (f.include || f.exclude) {
    const hay = `${(m.question ?? "").trim()}\n${eventSlugForMarket(m)}\n${String(m.id)}`;
    if (f.include && !f.include.test(hay)) return false;
    if (f.exclude && f.exclude.test(hay)) return false;
  }
  return true;
}

function groupAll(
  markets: readonly GammaMarket[],
  plan: StrategyPlan,
  opts: { minOutcomes: number; maxLegs: number; perStrategyLimit: number; brokerIds?: BrokerIdMap; nowMs: number }
): EventBasket[] {
  const cap = (bs: EventBasket[]): EventBasket[] =>
    opts.perStrategyLimit > 0 ? bs.slice(0, opts.perStrategyLimit) : bs;
  const out: EventBasket[] = [];
  if (plan.buckets) out.push(...cap(groupBucketBaskets(markets, opts)));
  if (plan.yesNo) out.push(...cap(groupYesNoBaskets(markets, opts)));
  if (plan.eventPair) out.push(...cap(groupEventPairBaskets(markets, opts)));
  return out;
}

async function scanActiveMarkets(
  source: MarketSource,
  startOffset: number,
  scanCap: number,
  keep: (m: GammaMarket) => boolean
): Promise<GammaMarket[]> {
  const out: GammaMarket[] = [];
  let offset = Math.max(0, startOffset);
  let scanned = 0;
  while (scanCap <= 0 || scanned < scanCap) {
    const batch = scanCap > 0 ? Math.min(PAGE_SIZE, scanCap - scanned) : PAGE_SIZE;
    if (batch <= 0) break;
    const page = await source.fetchActiveMarkets(batch, offset);
    if (page.length === 0) break;
    offset += batch;
    scanned += page.length;
    for (const m of page) if (keep(m)) out.push(m);
  }
  return out;
}

export async function buildGammaActiveBaskets(
  cfg: Config,
  source: MarketSource,
  nowMs: number
): Promise<EventBasket[]> {
  const g = cfg.universe.gamma;
  const filter = gammaMarketFilter(cfg, nowMs);
  const markets = await scanActiveMarkets(source, g.offset, g.scan_max_markets, (m) => passesMarketFilter(m, filter));
  console.log(`[universe] gamma-active: ${markets.length} markets passed filters`);
  return groupAll(markets, strategyPlan(cfg.universe.strategy), {
    minOutcomes: cfg.universe.min_outcomes,
    maxLegs: cfg.detector.max_legs > 0 ? cfg.detector.max_legs : DEFAULT_BUILD_MAX_LEGS,
    perStrategyLimit: g.limit,
    nowMs,
  });
}

async function expandEventSlugs(
  source: MarketSource,
  slugs: readonly string[],
  workers: number
): Promise<GammaMarket[]> {
  const events = await mapWithConcurrency([...slugs].sort(), workers, (slug) => source.fetchEventBySlug(slug));
  const byId = new Map<string, GammaMarket>();
  for (const ev of events) {
    if (!ev) continue;
    for (const m of ev.markets) {
      const id = String(m.id);
      if (id) byId.set(id, m);
    }
  }
  return [...byId.values()];
}

export async function buildWeatherBaskets(cfg: Config, source: MarketSource, nowMs: number): Promise<EventBasket[]> {
  const limit = cfg.universe.limit;
  const slugs = new Set<string>();
  let found = 0;
  for (let page = 0, offset = 0; page < WEATHER_MAX_PAGES; page++, offset += PAGE_SIZE) {
    const rows = await source.fetchActiveMarkets(PAGE_SIZE, offset);
    if (rows.length === 0) break;
    for (const m of rows) {
      if (!isWeatherBucketMarket(m)) continue;
      found++;
      const slug = eventSlugForMarket(m);
      if (slug) slugs.add(slug);
    }
    if (found >= limit || slugs.size >= WEATHER_MAX_EVENT_SLUGS) break;
  }
  if (slugs.size === 0) return [];

  const expanded = await expandEventSlugs(source, [...slugs].slice(0, WEATHER_MAX_EVENT_SLUGS), cfg.universe.workers);
  const weather = expanded.filter(isWeatherBucketMarket);

  const brokerIds = new Map<string, string>();
  for (const row of await source.fetchBrokerMarkets("weather", Math.max(limit, 500))) {
    brokerIds.set(row.conditionId, row.id);
  }
  console.log(
    `[universe] weather: ${weather.length} markets from ${slugs.size} events | hosted mappings=${brokerIds.size}`
  );
  return groupAll(weather, strategyPlan(cfg.universe.strategy), {
    minOutcomes: cfg.universe.min_outcomes,
    maxLegs: cfg.detector.max_legs,
    perStrategyLimit: 0,
    brokerIds,
    nowMs,
  });
}

/** Every market of an up/down event with two or more tokens becomes a basket of all its outcomes. */
export function upDownBasketsFromEvent(ev: GammaEvent, slug: string): EventBasket[] {
  const out: EventBasket[] = [];
  for (const m of ev.markets) {
    if (m.enableOrderBook === false) continue;
    const tokens = parseJsonStringField(m.clobTokenIds);
    if (tokens.length < 2) continue;
    const outcomes = parseJsonStringField(m.outcomes);
    const marketId = String(m.id).trim();
    const conditionId = (m.conditionId ?? "").trim().toLowerCase();
    const question = (m.question ?? "").trim() || ev.title || slug;
    const legs: Leg[] = [];
    tokens.forEach((tokenId, idx) => {
      if (!tokenId) return;
      legs.push({
        marketId,
        question,
        label: (outcomes[idx] ?? "").trim() || `OUT${idx + 1}`,
        tokenId,
        side: idx === 0 ? "yes" : "no",
        conditionId,
        brokerMarketId: "",
      });
    });
    if (legs.length < 2) continue;
    out.push({
      key: `slug:${slug}:${marketId}`,
      title: ev.title || question,
      strategy: "yes-no",
      legs,
      marketId,
      eventId: ev.id,
      eventSlug: ev.slug || slug,
      liquidityNum: marketLiquidity(m),
      volume24hr: asFloat(m.volume24hr),
      spread: asFloat(m.spread),
      oneDayPriceChange: Math.abs(asFloat(m.oneDayPriceChange)),
      endMs: marketEndMs(m) ?? getMarketEndTimeMs({ endDate: ev.endDate }),
      minOrderSize: asFloat(m.orderMinSize),
      priceTickSize: asFloat(m.orderPriceMinTickSize),
    });
  }
  return out;
}

export function upDownSlugs(windowMinutes: readonly number[], back: number, forward: number, nowMs: number): string[] {
  const nowSec = Math.floor(nowMs / 1000);
  const slugs: string[] = [];
  for (const minutes of windowMinutes) {
    const windowSec = minutes * 60;
    const start = Math.floor(nowSec / windowSec) * windowSec;
    for (let i = -Math.max(0, back); i <= Math.max(0, forward); i++) {
      slugs.push(`btc-updown-${minutes}m-${start + i * windowSec}`);
    }
  }
  return slugs;
}

export async function buildUpDownBaskets(cfg: Config, source: MarketSource, nowMs: number): Promise<EventBasket[]> {
  const b = cfg.universe.btc;
  const slugs = upDownSlugs(b.window_minutes, b.windows_back, b.windows_forward, nowMs);
  const seen = new Set<string>();
  const out: EventBasket[] = [];
  for (const slug of slugs) {
    const ev = await source.fetchEventBySlug(slug);
    if (!ev) continue;
    for (const basket of upDownBasketsFromEvent(ev, slug)) {
      if (seen.has(basket.key)) continue;
      seen.add(basket.key);
      out.push(basket);
    }
  }
  return out;
}

export async function buildUniverse(
  cfg: Config,
  source: MarketSource,
  nowMs: number = Date.now()
): Promise<UniverseResult> {
  const universe = cfg.universe.kind;
  if (universe === "gamma-active") {
    const baskets = await buildGammaActiveBaskets(cfg, source, nowMs);
    return {
      universe,
      baskets,
      emptyReason: baskets.length
        ? null
        : "CLOBBOT: gamma-active universe empty (no baskets). Check filters / Gamma API.",
    };
  }
  if (universe === "btc-updown") {
    const baskets = await buildUpDownBaskets(cfg, source, nowMs);
    const minutes = cfg.universe.btc.window_minutes.join(",");
    return {
      universe,
      baskets,
      emptyReason: baskets.length
        ? null
        : `CLOBBOT: btc-updown universe empty (minutes=${minutes}; could not fetch current events).`,
    };
  }
  const baskets = await buildWeatherBaskets(cfg, source, nowMs);
  return {
    universe,
    baskets,
    emptyReason: baskets.length ? null : "CLOBBOT: weather universe empty (no baskets).",
  };
}
