/**
 * Hosted execution service: batched USD-amount buys through its SDK endpoints, with
 * unwind from the batch response and a flatten pass over venue positions.
 */

import { request } from "undici";
import { z } from "zod";
import { asFloat } from "../strategy/basket_grouper";
import type { Candidate, LegSide } from "../types";
import { errorMessage, isRecord } from "../types";
import type { ExecutionBackend, Fills, PortfolioSource, Submission, UnwindReport } from "./backend";

export type HttpMethod = "GET" | "POST";

export interface SdkResult {
  /** 0 when the request never got a response. */
  status: number;
  body: Record<string, unknown>;
}

/** Transport for the service's SDK endpoints. */
export interface SimmerApi {
  call(method: HttpMethod, endpoint: string, data?: Record<string, unknown>): Promise<SdkResult>;
}

export class SimmerSdkClient implements SimmerApi {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number = 20_000
  ) {}

  /** Never throws: transport failures come back as `{success: false, error}`. */
  async call(method: HttpMethod, endpoint: string, data?: Record<string, unknown>): Promise<SdkResult> {
    if (!this.apiKey) return { status: 0, body: { success: false, error: "SIMMER_API_KEY missing" } };
    let url = this.baseUrl.replace(/\/$/, "") + endpoint;
    let body: string | undefined;
    if (method === "GET" && data) {
      const q = new URLSearchParams();
      for (const [k, v] of Object.entries(data)) if (v != null) q.set(k, String(v));
      const qs = q.toString();
      if (qs) url += (url.includes("?") ? "&" : "?") + qs;
    } else if (data) {
      body = JSON.stringify(data);
    }
    try {
      const res = await request(url, {
        method,
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
          "user-agent": "clob-arb-monitor/1.0",
        },
        body,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      const text = await res.body.text();
      let json: unknown = null;
      try {
        json = text ? JSON.parse(text) : null;
      } catch (e) {
        return { status: res.statusCode, body: { success: false, error: `invalid JSON: ${errorMessage(e)}` } };
      }
      if (isRecord(json)) return { status: res.statusCode, body: json };
      if (res.statusCode >= 400) return { status: res.statusCode, body: { success: false, error: `HTTP ${res.statusCode}` } };
      return { status: res.statusCode, body: { success: true, data: json } };
    } catch (e) {
      return { status: 0, body: { success: false, error: errorMessage(e) } };
    }
  }
}

const looseNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => asFloat(v, Number.NaN));

const BatchRowSchema = z
  .object({
    success: z.boolean().nullish(),
    market_id: z.union([z.string(), z.number()]).nullish(),
    side: z.string().nullish(),
    shares: looseNumber,
    error: z.string().nullish(),
  })
  .passthrough();

type BatchRow = z.infer<typeof BatchRowSchema>;

const BatchResponseSchema = z
  .object({
    success: z.boolean().nullish(),
    failed_count: looseNumber,
    total_cost: looseNumber,
    results: z.array(z.unknown()).nullish(),
    error: z.string().nullish(),
    retry_after: looseNumber,
  })
  .passthrough();

const PositionSchema = z
  .object({
    market_id: z.union([z.string(), z.number()]).nullish(),
    venue: z.string().nullish(),
    shares_yes: looseNumber,
    shares_no: looseNumber,
    cost_basis: looseNumber,
    current_value: looseNumber,
  })
  .passthrough();

export type SimmerPosition = z.infer<typeof PositionSchema>;

const SettingsSchema = z
  .object({
    trading_paused: z.boolean().nullish(),
    sdk_real_trading_enabled: z.boolean().nullish(),
    polymarket_usdc_balance: looseNumber,
  })
  .passthrough();

export type SimmerSettings = z.infer<typeof SettingsSchema>;

export interface SimmerTrade {
  market_id: string;
  side: LegSide;
  amount: number;
  venue: string;
  source: string;
}

export interface SimmerSubmission extends Submission {
  ok: boolean;
  status: number;
  rows: Array<BatchRow | null>;
  submitted: SimmerTrade[];
  totalCost: number;
  retryAfterSec: number;
}

export interface SimmerOptions {
  venue: string;
  source: string;
  minAmount: number;
  slippageBps: number;
  /** Flatten refuses positions worth more than twice this; 0 disables the check. */
  maxNotionalPerDay: number;
}

function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

function legAmount(cost: number, slippageBps: number, minAmount: number): number {
  const slip = Math.max(0, slippageBps) / 10000;
  return Math.max(cost * (1 + slip), Math.max(0, minAmount));
}

/** Total USD the batch will spend: per leg max(cost × (1+slip), min amount). */
export function estimateSimmerTotalAmount(candidate: Candidate, slippageBps: number, minAmount: number): number {
  return candidate.legCosts.reduce((s, lc) => s + legAmount(lc.cost, slippageBps, minAmount), 0);
}

function marketIdOf(v: string | number | null | undefined): string {
  return v == null ? "" : String(v).trim();
}

function normalizeSide(v: string | null | undefined): LegSide | null {
  const s = (v ?? "").trim().toLowerCase();
  return s === "yes" || s === "no" ? s : null;
}

function positionShares(pos: SimmerPosition, side: LegSide): number {
  const v = side === "yes" ? pos.shares_yes : pos.shares_no;
  return Number.isFinite(v) ? v : 0;
}

function tradeSucceeded(body: Record<string, unknown>): boolean {
  return !body.error && Boolean(body.success);
}

export class SimmerBackend implements ExecutionBackend<SimmerSubmission>, PortfolioSource {
  readonly kind = "simmer" as const;
  readonly fillsAreFinal = true;

  constructor(
    private readonly api: SimmerApi,
    private readonly opts: SimmerOptions,
    private readonly now: () => number = Date.now
  ) {}

  estimateCost(candidate: Candidate): number {
    return estimateSimmerTotalAmount(candidate, this.opts.slippageBps, this.opts.minAmount);
  }

  async submitBasket(candidate: Candidate): Promise<SimmerSubmission> {
    const submittedAtMs = this.now();
    const missing = candidate.legCosts.filter((lc) => !lc.leg.brokerMarketId).length;
    const base: SimmerSubmission = {
      submittedAtMs,
      orderIds: [],
      error: null,
      messages: [],
      ok: false,
      status: 0,
      rows: [],
      submitted: [],
      totalCost: Number.NaN,
      retryAfterSec: 0,
    };
    if (missing > 0) return { ...base, error: `missing simmer market mapping for ${missing} legs` };

    const trades: SimmerTrade[] = candidate.legCosts.map((lc) => ({
      market_id: lc.leg.brokerMarketId,
      side: lc.leg.side,
      amount: round(legAmount(lc.cost, this.opts.slippageBps, this.opts.minAmount), 4),
      venue: this.opts.venue,
      source: this.opts.source,
    }));
    if (trades.length === 0) return { ...base, error: "no executable trades after mapping" };

    const res = await this.api.call("POST", "/api/sdk/trades/batch", { trades });
    const parsed = BatchResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      return { ...base, status: res.status, submitted: trades, error: "unrecognized batch response" };
    }
    const body = parsed.data;
    const rawRows = body.results ?? [];
    const rows = rawRows.map((r) => {
      const row = BatchRowSchema.safeParse(r);
      return row.success ? row.data : null;
    });
    const failedCount = Number.isFinite(body.failed_count) ? body.failed_count : 0;
    const messages: string[] = [];
    for (const row of rows) {
      const msg = (row?.error ?? "").trim();
      if (msg && !messages.includes(msg)) messages.push(msg);
    }
    return {
      ...base,
      status: res.status,
      ok: Boolean(body.success) && failedCount === 0,
      error: body.error ?? null,
      messages,
      rows,
      submitted: trades,
      totalCost: body.total_cost,
      retryAfterSec: Number.isFinite(body.retry_after) ? body.retry_after : 0,
    };
  }

  /** Batch results are final: a successful row counts as the full leg. */
  async pollFills(candidate: Candidate, submission: SimmerSubmission): Promise<Fills> {
    const fills: Fills = {};
    candidate.legCosts.forEach((lc, idx) => {
      const row = submission.rows[idx];
      const filled = submission.ok || row?.success === true;
      fills[lc.leg.tokenId] = filled ? candidate.sharesPerLeg : 0;
    });
    return fills;
  }

  async cancel(_orderIds: readonly string[]): Promise<void> {}

  async unwind(candidate: Candidate, submission: SimmerSubmission): Promise<UnwindReport> {
    const fromResponse = await this.unwindFromResponse(submission);
    if (fromResponse.attempted > 0) {
      console.log(
        `[exec] live: partial batch unwind(from_response) attempted=${fromResponse.attempted} succeeded=${fromResponse.succeeded}`
      );
    }
    const flatten = await this.flattenPositions(candidate);
    if (flatten.attempted > 0) {
      console.log(
        `[exec] live: flatten(from_positions) attempted=${flatten.attempted} succeeded=${flatten.succeeded}`
      );
    }
    return {
      attempted: fromResponse.attempted + flatten.attempted,
      succeeded: fromResponse.succeeded + flatten.succeeded,
    };
  }

  async openOrderCount(): Promise<number | null> {
    return null;
  }

  retryAfterMs(submission: SimmerSubmission): number {
    return submission.status === 429 ? submission.retryAfterSec * 1000 : 0;
  }

  executedCost(candidate: Candidate, submission: SimmerSubmission): number {
    if (Number.isFinite(submission.totalCost) && submission.totalCost > 0) return submission.totalCost;
    return this.estimateCost(candidate);
  }

  /** Sell back every successful row of a partially failed batch. */
  async unwindFromResponse(submission: SimmerSubmission): Promise<UnwindReport> {
    const venue = this.opts.venue.trim().toLowerCase();
    const byMarket = new Map<string, SimmerPosition>();
    for (const p of await this.fetchPositions()) {
      const mid = marketIdOf(p.market_id);
      if (mid) byMarket.set(mid, p);
    }

    let attempted = 0;
    let succeeded = 0;
    for (const [idx, row] of submission.rows.entries()) {
      if (!row || !row.success) continue;
      const marketId = marketIdOf(row.market_id);
      if (!marketId) continue;
      const side = normalizeSide(row.side) ?? normalizeSide(submission.submitted[idx]?.side) ?? "yes";

      let shares = Number.isFinite(row.shares) ? row.shares : 0;
      if (shares <= 0) {
        const pos = byMarket.get(marketId);
        if (pos && (pos.venue ?? "").trim().toLowerCase() === venue) shares = positionShares(pos, side);
      }
      if (shares <= 0) continue;

      attempted++;
      const res = await this.api.call("POST", "/api/sdk/trade", {
        market_id: marketId,
        side,
        action: "sell",
        shares: round(shares, 4),
        venue: this.opts.venue,
        source: this.opts.source,
        reasoning: "Auto-unwind after partial batch fill",
      });
      if (tradeSucceeded(res.body)) succeeded++;
      else console.log(`[exec] live: unwind failed market_id=${marketId} shares=${shares.toFixed(4)} resp=${JSON.stringify(res.body)}`);
    }
    return { attempted, succeeded };
  }

  /** Sell remaining venue positions on the basket's legs, skipping oversized ones. */
  async flattenPositions(candidate: Candidate): Promise<UnwindReport> {
    const venue = this.opts.venue.trim().toLowerCase();
    const byMarket = new Map<string, SimmerPosition>();
    for (const p of await this.fetchPositions()) {
      if ((p.venue ?? "").trim().toLowerCase() !== venue) continue;
      const mid = marketIdOf(p.market_id);
      if (mid) byMarket.set(mid, p);
    }

    const cap = this.opts.maxNotionalPerDay;
    let attempted = 0;
    let succeeded = 0;
    for (const { leg } of candidate.legCosts) {
      const marketId = leg.brokerMarketId.trim();
      if (!marketId) continue;
      const pos = byMarket.get(marketId);
      if (!pos) continue;
      const shares = positionShares(pos, leg.side);

      if (cap > 0) {
        const posCost = Math.abs(Number.isFinite(pos.cost_basis) ? pos.cost_basis : 0);
        const posValue = Math.abs(Number.isFinite(pos.current_value) ? pos.current_value : 0);
        if (Math.max(posCost, posValue) > cap * 2) {
          console.log(
            `[exec] live: flatten skipped (position too large) market_id=${marketId} side=${leg.side} ` +
              `cost_basis=$${posCost.toFixed(2)} value=$${posValue.toFixed(2)} cap=$${cap.toFixed(2)}`
          );
          continue;
        }
      }
      if (shares <= 0) continue;

      attempted++;
      const res = await this.api.call("POST", "/api/sdk/trade", {
        market_id: marketId,
        side: leg.side,
        action: "sell",
        shares: round(shares, 6),
        venue: this.opts.venue,
        source: this.opts.source,
        reasoning: "Flatten after partial batch failure",
      });
      if (tradeSucceeded(res.body)) succeeded++;
      else console.log(`[exec] live: flatten failed market_id=${marketId} side=${leg.side} shares=${shares.toFixed(6)}`);
    }
    return { attempted, succeeded };
  }

  async fetchPortfolio(): Promise<Record<string, unknown> | null> {
    const { body } = await this.api.call("GET", "/api/sdk/portfolio");
    if ("pnl_total" in body) return body;
    if (isRecord(body.data) && isRecord(body.data.portfolio)) return body.data.portfolio;
    if (isRecord(body.portfolio)) return body.portfolio;
    return null;
  }

  async fetchPnlTotal(): Promise<number | null> {
    const portfolio = await this.fetchPortfolio();
    if (!portfolio) return null;
    const pnl = asFloat(portfolio.pnl_total, Number.NaN);
    return Number.isFinite(pnl) ? pnl : null;
  }

  async fetchSettings(): Promise<SimmerSettings | null> {
    const { body } = await this.api.call("GET", "/api/sdk/settings");
    const raw = isRecord(body.settings) ? body.settings : isRecord(body.data) ? body.data : null;
    if (!raw) return null;
    const parsed = SettingsSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async fetchPositions(): Promise<SimmerPosition[]> {
    const { body } = await this.api.call("GET", "/api/sdk/positions");
    const list = Array.isArray(body.positions)
      ? body.positions
      : isRecord(body.data) && Array.isArray(body.data.positions)
        ? body.data.positions
        : [];
    const out: SimmerPosition[] = [];
    for (const p of list) {
      const parsed = PositionSchema.safeParse(p);
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }
}
