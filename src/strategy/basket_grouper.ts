/**
 * Turns metadata-API market records into tradeable baskets:
 * exhaustive numeric bucket sets, single-market YES+NO pairs and two-outcome event pairs.
 */

import { z } from "zod";
import type { EventBasket, Leg, LegSide } from "../types";
import { DAY_MS, getMarketEndTimeMs } from "../markets/market_time";
import { bucketsLookExhaustive, parseBucketBounds } from "./bucket_bounds";

const StrOrNum = z.union([z.string(), z.number()]);

const GammaEventRefSchema = z
  .object({
    id: StrOrNum.nullish(),
    title: z.string().nullish(),
    slug: z.string().nullish(),
  })
  .passthrough();

/** Gamma market shape (subset we use). Unknown fields pass through. */
export const GammaMarketSchema = z
  .object({
    id: StrOrNum,
    question: z.string().nullish(),
    slug: z.string().nullish(),
    conditionId: z.string().nullish(),
    questionID: z.string().nullish(),
    negRiskMarketID: z.string().nullish(),
    groupItemTitle: z.string().nullish(),
    clobTokenIds: z.union([z.string(), z.array(StrOrNum)]).nullish(),
    outcomes: z.union([z.string(), z.array(z.string())]).nullish(),
    liquidityNum: StrOrNum.nullish(),
    liquidity: StrOrNum.nullish(),
    volume24hr: StrOrNum.nullish(),
    spread: StrOrNum.nullish(),
    oneDayPriceChange: StrOrNum.nullish(),
    orderMinSize: StrOrNum.nullish(),
    orderPriceMinTickSize: StrOrNum.nullish(),
    endDate: StrOrNum.nullish(),
    endDateIso: StrOrNum.nullish(),
    enableOrderBook: z.boolean().nullish(),
    feesEnabled: z.boolean().nullish(),
    events: z.array(GammaEventRefSchema).nullish(),
  })
  .passthrough();

export type GammaMarket = z.infer<typeof GammaMarketSchema>;

/** Keep the array items that look like market records; drop the rest. */
export function parseGammaMarkets(raw: unknown): GammaMarket[] {
  if (!Array.isArray(raw)) return [];
  const out: GammaMarket[] = [];
  for (const item of raw) {
    const r = GammaMarketSchema.safeParse(item);
    if (r.success) out.push(r.data);
  }
  return out;
}

export function asFloat(value: unknown, fallback = 0): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (typeof value === "string" && value.trim()) {
    const n = Number(value);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}

/** Gamma returns list fields either as arrays or as JSON-encoded strings. */
export function parseJsonStringField(value: unknown): string[] {
  let v = value;
  if (typeof v === "string") {
    const s = v.trim();
    if (!s) return [];
    try {
      v = JSON.parse(s);
    } catch {
      return [];
    }
  }
  if (!Array.isArray(v)) return [];
  return v.filter((x) => typeof x === "string" || typeof x === "number").map((x) => String(x));
}

function text(value: string | number | null | undefined): string {
  return value == null ? "" : String(value).trim();
}

function firstEvent(m: GammaMarket): { id: string; title: string; slug: string } {
  const e0 = m.events?.[0];
  return { id: text(e0?.id), title: text(e0?.title), slug: text(e0?.slug) };
}

export function marketLiquidity(m: GammaMarket): number {
  return asFloat(m.liquidityNum ?? m.liquidity, 0);
}

export function marketEndMs(m: GammaMarket): number | null {
  return getMarketEndTimeMs(m);
}

export function eventSlugForMarket(m: GammaMarket): string {
  return firstEvent(m).slug;
}

export function eventKeyForMarket(m: GammaMarket): string {
  const negRisk = text(m.negRiskMarketID);
  if (negRisk) return `negRiskMarketID:${negRisk}`;
  const questionId = text(m.questionID);
  if (questionId) return `questionID:${questionId}`;
  const e0 = firstEvent(m);
  if (e0.id) return `event:${e0.id}`;
  if (e0.title) return `title:${e0.title}`;
  return `q:${(m.question ?? "").slice(0, 80)}`;
}

/** "Will the high in NYC be 34-35°F?" -> "Will the high in NYC be..." */
export function eventTitleForMarket(m: GammaMarket): string {
  const q = m.question ?? "";
  const marker = " be ";
  const idx = q.toLowerCase().indexOf(marker);
  if (idx > 0) return q.slice(0, idx + marker.length).trim() + "...";
  const e0 = firstEvent(m);
  if (e0.title) return e0.title;
  return q || "Unknown event";
}

/** Markets already reported as lacking Yes/No outcome labels. */
const positionalWarned = new Set<string>();

export function resetPositionalWarningsForTesting(): void {
  positionalWarned.clear();
}

export interface YesNoTokens {
  yes: string;
  no: string;
  /** True when outcomes did not name Yes/No and the [YES, NO] ordering was assumed. */
  positional: boolean;
}

export function extractYesNoTokenIds(m: GammaMarket): YesNoTokens | null {
  const tokens = parseJsonStringField(m.clobTokenIds);
  if (tokens.length < 2) return null;
  const outcomes = parseJsonStringField(m.outcomes).map((o) => o.trim().toLowerCase());
  if (outcomes.length === tokens.length) {
    const yesIdx = outcomes.indexOf("yes");
    const noIdx = outcomes.indexOf("no");
    if (yesIdx >= 0 && noIdx >= 0) {
      return { yes: tokens[yesIdx], no: tokens[noIdx], positional: false };
    }
  }
  const id = text(m.id);
  if (!positionalWarned.has(id)) {
    positionalWarned.add(id);
    console.warn(`[universe] outcomes lack Yes/No for market_id=${id}; assuming [YES, NO] token order`);
  }
  return { yes: tokens[0], no: tokens[1], positional: true };
}

export function extractYesTokenId(m: GammaMarket): string | null {
  const tokens = parseJsonStringField(m.clobTokenIds);
  if (tokens.length === 0) return null;
  const outcomes = parseJsonStringField(m.outcomes);
  if (outcomes.length > 0 && tokens.length >= outcomes.length) {
    const idx = outcomes.findIndex((o) => o.trim().toLowerCase() === "yes");
    if (idx >= 0) return tokens[idx];
  }
  return tokens[0];
}

/** Condition id (lowercased) -> hosted-service market id. */
export type BrokerIdMap = ReadonlyMap<string, string>;

export interface GroupOptions {
  minOutcomes: number;
  /** 0 = unlimited. */
  maxLegs: number;
  brokerIds?: BrokerIdMap;
  nowMs?: number;
}

function makeLeg(
  m: GammaMarket,
  label: string,
  tokenId: string,
  side: LegSide,
  brokerIds: BrokerIdMap | undefined
): Leg {
  const conditionId = text(m.conditionId).toLowerCase();
  return {
    marketId: text(m.id),
    question: text(m.question),
    label,
    tokenId,
    side,
    conditionId,
    brokerMarketId: brokerIds?.get(conditionId) ?? "",
  };
}

type BasketMeta = Pick<
  EventBasket,
  "liquidityNum" | "volume24hr" | "spread" | "oneDayPriceChange" | "endMs" | "minOrderSize" | "priceTickSize"
>;

/** Aggregate selection metadata: weakest liquidity, total volume, widest spread. */
function basketMeta(markets: readonly GammaMarket[]): BasketMeta {
  let endMs: number | null = null;
  for (const m of markets) {
    const e = marketEndMs(m);
    if (e != null) {
      endMs = e;
      break;
    }
  }
  return {
    liquidityNum: markets.length ? Math.min(...markets.map(marketLiquidity)) : 0,
    volume24hr: markets.reduce((s, m) => s + asFloat(m.volume24hr), 0),
    spread: Math.max(0, ...markets.map((m) => asFloat(m.spread))),
    oneDayPriceChange: Math.max(0, ...markets.map((m) => Math.abs(asFloat(m.oneDayPriceChange)))),
    endMs,
    minOrderSize: Math.max(0, ...markets.map((m) => asFloat(m.orderMinSize))),
    priceTickSize: Math.max(0, ...markets.map((m) => asFloat(m.orderPriceMinTickSize))),
  };
}

function bucketLabel(m: GammaMarket): string {
  return text(m.groupItemTitle) || text(m.question) || text(m.slug);
}

/** Markets sharing an event whose YES legs cover every numeric outcome exactly once. */
export function groupBucketBaskets(markets: readonly GammaMarket[], opts: GroupOptions): EventBasket[] {
  const grouped = new Map<string, GammaMarket[]>();
  for (const m of markets) {
    const k = eventKeyForMarket(m);
    const list = grouped.get(k);
    if (list) list.push(m);
    else grouped.set(k, [m]);
  }

  const baskets: EventBasket[] = [];
  for (const [key, ms] of grouped) {
    // Every outcome of the event needs a leg, or the payout is not guaranteed.
    const kept: { market: GammaMarket; leg: Leg; low: number; high: number }[] = [];
    let complete = true;
    for (const m of ms) {
      const tokenId = extractYesTokenId(m);
      const label = bucketLabel(m);
      const bounds = parseBucketBounds(label);
      if (!tokenId || !bounds) {
        complete = false;
        break;
      }
      kept.push({ market: m, leg: makeLeg(m, label, tokenId, "yes", opts.brokerIds), ...bounds });
    }
    if (!complete || kept.length < opts.minOutcomes) continue;
    if (opts.maxLegs > 0 && kept.length > opts.maxLegs) continue;
    if (!bucketsLookExhaustive(kept.map((k) => k.leg.label))) continue;

    kept.sort((a, b) => a.low - b.low || a.high - b.high);
    const first = ms[0];
    const e0 = firstEvent(first);
    baskets.push({
      key,
      title: eventTitleForMarket(first),
      strategy: "buckets",
      legs: kept.map((k) => k.leg),
      marketId: e0.id || text(first.id),
      eventId: e0.id,
      eventSlug: e0.slug,
      ...basketMeta(kept.map((k) => k.market)),
    });
  }
  return baskets;
}

/** One YES+NO basket per binary market. */
export function groupYesNoBaskets(markets: readonly GammaMarket[], opts: Pick<GroupOptions, "brokerIds">): EventBasket[] {
  const seen = new Set<string>();
  const baskets: EventBasket[] = [];
  for (const m of markets) {
    const marketId = text(m.id);
    if (!marketId || seen.has(marketId)) continue;
    const tokens = parseJsonStringField(m.clobTokenIds);
    const outcomes = parseJsonStringField(m.outcomes);
    if (tokens.length !== 2) continue;
    if (outcomes.length > 0 && outcomes.length !== 2) continue;
    const yn = extractYesNoTokenIds(m);
    if (!yn) continue;
    seen.add(marketId);

    const labelAt = (tokenId: string, fallback: string): string => {
      const idx = tokens.indexOf(tokenId);
      return (idx >= 0 ? outcomes[idx] ?? "" : "").trim() || fallback;
    };
    const labelYes = labelAt(yn.yes, "YES");
    const labelNo = labelAt(yn.no, "NO");
    const question = text(m.question) || `market ${marketId}`;
    const e0 = firstEvent(m);
    baskets.push({
      key: `yn:${marketId}`,
      title: `${question} [YES+NO]`,
      strategy: "yes-no",
      legs: [
        makeLeg(m, labelYes, yn.yes, "yes", opts.brokerIds),
        makeLeg(m, labelNo, yn.no, "no", opts.brokerIds),
      ],
      marketId,
      eventId: e0.id,
      eventSlug: e0.slug,
      ...basketMeta([m]),
    });
  }
  return baskets;
}

const COMPARATIVE_RE = /\b(?:or more|or less|or below|or above|between|under|over|at least|at most)\b/;

/** Named outcome ("Team A", "Candidate B") rather than a number or range. */
export function isNamedOutcomeLabel(label: string): boolean {
  const lc = label.trim().toLowerCase();
  if (!lc) return false;
  if (/\d/.test(lc)) return false;
  if (/[<>%$°"]/.test(lc)) return false;
  if (COMPARATIVE_RE.test(lc)) return false;
  return parseBucketBounds(label) === null;
}

/**
 * Two-outcome negative-risk events: buying YES on both (or NO on both) pays exactly one share.
 * Yields an `ey:` and an `en:` basket per event.
 */
export function groupEventPairBaskets(markets: readonly GammaMarket[], opts: GroupOptions): EventBasket[] {
  const nowMs = opts.nowMs ?? Date.now();
  const grouped = new Map<string, Map<string, { market: GammaMarket; label: string; tokens: YesNoTokens }>>();
  for (const m of markets) {
    const negRiskId = text(m.negRiskMarketID);
    if (!negRiskId) continue;
    const tokens = parseJsonStringField(m.clobTokenIds);
    const outcomes = parseJsonStringField(m.outcomes);
    if (tokens.length !== 2) continue;
    if (outcomes.length > 0 && outcomes.length !== 2) continue;
    const label = text(m.groupItemTitle);
    if (!isNamedOutcomeLabel(label)) continue;
    const yn = extractYesNoTokenIds(m);
    if (!yn) continue;

    let byLabel = grouped.get(negRiskId);
    if (!byLabel) {
      byLabel = new Map();
      grouped.set(negRiskId, byLabel);
    }
    const labelKey = label.toLowerCase();
    const cur = byLabel.get(labelKey);
    if (!cur || marketLiquidity(m) > marketLiquidity(cur.market)) {
      byLabel.set(labelKey, { market: m, label, tokens: yn });
    }
  }

  const baskets: EventBasket[] = [];
  if (opts.maxLegs > 0 && opts.maxLegs < 2) return baskets;
  for (const [negRiskId, byLabel] of grouped) {
    if (byLabel.size !== 2) continue;
    const rows = [...byLabel.values()].sort((a, b) =>
      a.label.toLowerCase().localeCompare(b.label.toLowerCase())
    );
    const fresh = rows.every((r) => {
      const end = marketEndMs(r.market);
      return end != null && end >= nowMs - DAY_MS;
    });
    if (!fresh) continue;

    const first = rows[0].market;
    const e0 = firstEvent(first);
    const title = eventTitleForMarket(first);
    const meta = basketMeta(rows.map((r) => r.market));
    const ends = rows.map((r) => marketEndMs(r.market)).filter((e): e is number => e != null);
    const common = {
      strategy: "event-pair" as const,
      marketId: negRiskId,
      eventId: e0.id,
      eventSlug: e0.slug,
      ...meta,
      endMs: ends.length ? Math.min(...ends) : null,
    };
    baskets.push({
      ...common,
      key: `ey:${negRiskId}`,
      title: `${title} [YES+YES]`,
      legs: rows.map((r) => makeLeg(r.market, r.label, r.tokens.yes, "yes", opts.brokerIds)),
    });
    baskets.push({
      ...common,
      key: `en:${negRiskId}`,
      title: `${title} [NO+NO]`,
      legs: rows.map((r) => makeLeg(r.market, r.label, r.tokens.no, "no", opts.brokerIds)),
    });
  }
  return baskets;
}
