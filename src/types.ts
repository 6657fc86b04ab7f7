/**
 * Shared types for the basket arbitrage monitor.
 */

export interface OrderLevel {
  price: number;
  size: number;
}

export type LegSide = "yes" | "no";

export type BasketStrategy = "buckets" | "yes-no" | "event-pair";

/** One outcome token inside a basket. */
export interface Leg {
  marketId: string;
  question: string;
  label: string;
  tokenId: string;
  side: LegSide;
  conditionId: string;
  /** Market id on the hosted execution service; empty when unmapped. */
  brokerMarketId: string;
}

export interface EventBasket {
  key: string;
  title: string;
  strategy: BasketStrategy;
  legs: readonly Leg[];
  marketId: string;
  eventId: string;
  eventSlug: string;
  liquidityNum: number;
  volume24hr: number;
  spread: number;
  oneDayPriceChange: number;
  endMs: number | null;
  minOrderSize: number;
  priceTickSize: number;
}

/** Local order book for one token, as last seen on the feed or via REST. */
export interface LocalBook {
  asks: OrderLevel[];
  bids: OrderLevel[];
  bestAsk: number | null;
  bestBid: number | null;
  /** True when asks is a single level synthesized from a best_ask-only update. */
  asksSynthetic: boolean;
  bidsSynthetic: boolean;
  /** Epoch ms of the last update. */
  updatedAt: number;
}

export interface LegCost {
  leg: Leg;
  cost: number;
}

export interface Candidate {
  strategy: BasketStrategy;
  basketKey: string;
  title: string;
  sharesPerLeg: number;
  basketCost: number;
  payout: number;
  fixedCost: number;
  grossEdge: number;
  edgePct: number;
  legCosts: LegCost[];
}

/** The only durable state. Persisted after every mutation. */
export interface RuntimeState {
  version: 1;
  day: string;
  executionsToday: number;
  notionalToday: number;
  consecutiveFailures: number;
  halted: boolean;
  haltReason: string;
  startPnlTotal: number | null;
  lastPnlTotal: number | null;
  /** Epoch ms of the last portfolio poll. */
  lastPnlCheckTs: number;
}

export interface RunStats {
  candidatesTotal: number;
  candidatesWindow: number;
  bestAll: Candidate | null;
  bestWindow: Candidate | null;
  windowStartedAt: number;
  lastSummaryAt: number;
}

export type EventAction =
  | "run_start"
  | "run_stop"
  | "candidate"
  | "exec_skip"
  | "exec_result"
  | "halt"
  | "daily_reset";

export interface EventLogEntry {
  timestamp: string;
  action: EventAction;
  basketKey: string;
  metadata?: Record<string, unknown>;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
