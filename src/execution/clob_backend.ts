/**
 * Direct-exchange execution: one signed FOK order per leg, fills read back from the
 * account's trade history, unwind by selling filled legs into the bid.
 */

import { readFileSync } from "fs";
import { Chain, ClobClient, OrderType, Side } from "@polymarket/clob-client";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import { Wallet } from "ethers";
import { toEpochMs } from "../markets/market_time";
import { asFloat } from "../strategy/basket_grouper";
import { clampLimitPrice, estimateExecCost, execLimitPrice, quantizeCentsDown } from "../strategy/pricing";
import type { Candidate, LocalBook } from "../types";
import { errorMessage, isRecord } from "../types";
import type { ExecutionBackend, Fills, Submission, UnwindReport } from "./backend";
import { extractErrorMessages, extractOrderIds } from "./backend";

export type OrderSide = "BUY" | "SELL";

export interface FokOrder {
  tokenId: string;
  price: number;
  size: number;
  side: OrderSide;
}

export interface TradeQuery {
  assetId: string;
  after?: string;
}

/** The slice of the exchange client the backend needs. */
export interface ClobTradingApi {
  placeFok(order: FokOrder): Promise<unknown>;
  cancelOrders(orderIds: readonly string[]): Promise<void>;
  getTrades(query: TradeQuery): Promise<unknown[]>;
  getOpenOrders(): Promise<unknown[]>;
}

export interface ClobCredentials {
  privateKey: string;
  funder: string;
  signatureType: number;
  apiCreds: ApiKeyCreds | null;
}

function envStr(env: NodeJS.ProcessEnv, key: string): string {
  return (env[key] ?? "").trim();
}

function privateKeyFromEnv(env: NodeJS.ProcessEnv): string {
  const direct = envStr(env, "PM_PRIVATE_KEY");
  if (direct) return direct;
  const file = envStr(env, "PM_PRIVATE_KEY_FILE");
  if (!file) return "";
  try {
    return readFileSync(file, "utf-8").trim();
  } catch (e) {
    throw new Error(`Could not read PM_PRIVATE_KEY_FILE: ${errorMessage(e)}`);
  }
}

/** Key and funder present; the key is not validated here. */
export function hasClobCredentials(env: NodeJS.ProcessEnv): boolean {
  const key = envStr(env, "PM_PRIVATE_KEY") || envStr(env, "PM_PRIVATE_KEY_FILE");
  const funder = envStr(env, "PM_FUNDER") || envStr(env, "PM_PROXY_ADDRESS");
  return Boolean(key && funder);
}

export function clobCredentialsFromEnv(env: NodeJS.ProcessEnv): ClobCredentials {
  let privateKey = privateKeyFromEnv(env);
  const funder = envStr(env, "PM_FUNDER") || envStr(env, "PM_PROXY_ADDRESS");
  if (!privateKey || !funder) {
    throw new Error("Missing env for live execution. Set PM_PRIVATE_KEY and PM_FUNDER (or PM_PROXY_ADDRESS).");
  }
  if (!privateKey.startsWith("0x") && privateKey.length === 64) privateKey = `0x${privateKey}`;
  if (!/^0x[0-9a-fA-F]{64}$/.test(privateKey)) {
    throw new Error("Invalid PM_PRIVATE_KEY format. Expected 64 hex chars (optionally prefixed with 0x).");
  }
  // EOA (0) unless overridden; 1 on a plain wallet yields "invalid signature".
  const signatureType = Number.parseInt(envStr(env, "PM_SIGNATURE_TYPE") || "0", 10);
  const key = envStr(env, "PM_API_KEY");
  const secret = envStr(env, "PM_API_SECRET");
  const passphrase = envStr(env, "PM_API_PASSPHRASE");
  return {
    privateKey,
    funder,
    signatureType: Number.isFinite(signatureType) ? signatureType : 0,
    apiCreds: key && secret && passphrase ? { key, secret, passphrase } : null,
  };
}

/** Build a signing client; derives API credentials when none are configured. */
export async function createClobTradingApi(
  host: string,
  chainId: number,
  creds: ClobCredentials
): Promise<ClobTradingApi> {
  const chain = chainId === 80002 ? Chain.AMOY : Chain.POLYGON;
  const wallet = new Wallet(creds.privateKey);
  const apiCreds = creds.apiCreds ?? (await new ClobClient(host, chain, wallet).createOrDeriveApiKey());
  const client = new ClobClient(host, chain, wallet, apiCreds, creds.signatureType, creds.funder);

  return {
    async placeFok(order: FokOrder): Promise<unknown> {
      const signed = await client.createOrder({
        tokenID: order.tokenId,
        price: order.price,
        size: order.size,
        side: order.side === "BUY" ? Side.BUY : Side.SELL,
      });
      return client.postOrder(signed, OrderType.FOK);
    },
    async cancelOrders(orderIds: readonly string[]): Promise<void> {
      await client.cancelOrders([...orderIds]);
    },
    async getTrades(query: TradeQuery): Promise<unknown[]> {
      return client.getTrades({ asset_id: query.assetId, after: query.after });
    },
    async getOpenOrders(): Promise<unknown[]> {
      return client.getOpenOrders();
    },
  };
}

const TOKEN_KEYS = ["asset_id", "assetId", "token_id", "tokenId"] as const;
const SIZE_KEYS = ["size", "amount", "filled_size", "matched_size", "maker_amount", "taker_amount"] as const;
const TS_KEYS = ["timestamp", "created_at", "createdAt", "matched_at", "time", "ts"] as const;

export function tradeTokenId(trade: Record<string, unknown>): string {
  for (const k of TOKEN_KEYS) {
    const v = trade[k];
    if (v) return String(v);
  }
  return "";
}

export function tradeSize(trade: Record<string, unknown>): number {
  for (const k of SIZE_KEYS) {
    const v = asFloat(trade[k], Number.NaN);
    if (Number.isFinite(v) && v > 0) return v;
  }
  return 0;
}

export function tradeTimestampMs(trade: Record<string, unknown>): number | null {
  for (const k of TS_KEYS) {
    if (!(k in trade)) continue;
    const ms = toEpochMs(trade[k]);
    if (ms) return ms;
  }
  return null;
}

const TRADE_LOOKBACK_MS = 30_000;
const TRADE_GRACE_MS = 1_000;

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

export interface ClobOptions {
  slippageBps: number;
  unwindSlippageBps: number;
}

export class ClobBackend implements ExecutionBackend {
  readonly kind = "clob" as const;
  readonly fillsAreFinal = false;

  constructor(
    private readonly api: ClobTradingApi,
    private readonly opts: ClobOptions,
    private readonly now: () => number = Date.now
  ) {}

  estimateCost(candidate: Candidate): number {
    return estimateExecCost(candidate, this.opts.slippageBps);
  }

  /** Throws when no leg could be placed at all. */
  async submitBasket(candidate: Candidate): Promise<Submission> {
    const submittedAtMs = this.now();
    const shares = candidate.sharesPerLeg;
    const orders: FokOrder[] = candidate.legCosts.map((lc) => ({
      tokenId: lc.leg.tokenId,
      price: execLimitPrice(lc.cost, shares, this.opts.slippageBps),
      size: round2(shares),
      side: "BUY",
    }));
    const settled = await Promise.allSettled(orders.map((o) => this.api.placeFok(o)));
    const responses: unknown[] = [];
    const failures: string[] = [];
    for (const s of settled) {
      if (s.status === "fulfilled") responses.push(s.value);
      else failures.push(errorMessage(s.reason));
    }
    if (responses.length === 0) throw new Error(failures.join(" | ") || "no orders placed");

    const messages = extractErrorMessages(responses);
    for (const f of failures) if (!messages.includes(f)) messages.push(f);
    return { submittedAtMs, orderIds: extractOrderIds(responses), error: null, messages };
  }

  /**
   * The account's trades for one token since shortly before submit. Tries a millisecond
   * `after`, then seconds, then no filter.
   */
  async recentTradesForToken(tokenId: string, submittedAtMs: number): Promise<Record<string, unknown>[]> {
    const since = submittedAtMs - TRADE_LOOKBACK_MS;
    const queries: TradeQuery[] = [
      { assetId: tokenId, after: String(since) },
      { assetId: tokenId, after: String(Math.trunc(since / 1000)) },
      { assetId: tokenId },
    ];
    let rows: unknown[] = [];
    for (const q of queries) {
      try {
        rows = await this.api.getTrades(q);
        break;
      } catch (e) {
        console.warn(`[exec] trades lookup failed token_id=${tokenId}: ${errorMessage(e)}`);
      }
    }
    const out: Record<string, unknown>[] = [];
    for (const row of rows) {
      if (!isRecord(row)) continue;
      const ts = tradeTimestampMs(row);
      if (ts != null && ts < submittedAtMs - TRADE_GRACE_MS) continue;
      out.push(row);
    }
    return out;
  }

  async pollFills(candidate: Candidate, submission: Submission): Promise<Fills> {
    const fills: Fills = {};
    for (const { leg } of candidate.legCosts) fills[leg.tokenId] = 0;
    const seen = new Set<string>();
    for (const tokenId of Object.keys(fills)) {
      for (const trade of await this.recentTradesForToken(tokenId, submission.submittedAtMs)) {
        const id = trade.id;
        if (typeof id === "string") {
          if (seen.has(id)) continue;
          seen.add(id);
        }
        const tok = tradeTokenId(trade) || tokenId;
        if (tok in fills) fills[tok] += tradeSize(trade);
      }
    }
    return fills;
  }

  async cancel(orderIds: readonly string[]): Promise<void> {
    await this.api.cancelOrders(orderIds);
  }

  /** Sell each filled leg at the bid less unwind slippage; legs without a bid are skipped. */
  async unwind(
    candidate: Candidate,
    _submission: Submission,
    fills: Fills,
    books: (tokenId: string) => LocalBook | undefined
  ): Promise<UnwindReport> {
    const slip = Math.max(0, this.opts.unwindSlippageBps) / 10000;
    const orders: FokOrder[] = [];
    for (const { leg } of candidate.legCosts) {
      const filled = fills[leg.tokenId] ?? 0;
      if (!(filled > 0)) continue;
      const book = books(leg.tokenId);
      let bestBid = book && book.bids.length ? Math.max(0, ...book.bids.map((l) => l.price)) : 0;
      if (!(bestBid > 0) && book?.bestBid) bestBid = book.bestBid;
      if (!(bestBid > 0)) {
        console.log(`[exec] live: unwind skipped (no bid) token_id=${leg.tokenId}`);
        continue;
      }
      const size = round2(filled);
      if (size <= 0) continue;
      orders.push({
        tokenId: leg.tokenId,
        price: clampLimitPrice(quantizeCentsDown(bestBid * (1 - slip))),
        size,
        side: "SELL",
      });
    }
    if (orders.length === 0) return { attempted: 0, succeeded: 0 };

    const settled = await Promise.allSettled(orders.map((o) => this.api.placeFok(o)));
    const rejected = settled.filter((s): s is PromiseRejectedResult => s.status === "rejected");
    const report: UnwindReport = { attempted: orders.length, succeeded: orders.length - rejected.length };
    if (rejected.length) report.error = errorMessage(rejected[0].reason);
    return report;
  }

  async openOrderCount(): Promise<number | null> {
    return (await this.api.getOpenOrders()).length;
  }

  retryAfterMs(): number {
    return 0;
  }

  executedCost(candidate: Candidate): number {
    const cost = this.estimateCost(candidate);
    return Number.isFinite(cost) && cost > 0 ? cost : candidate.basketCost;
  }
}
