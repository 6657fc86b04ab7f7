import WebSocket from "ws";
import type { LocalBook, OrderLevel } from "../types";
import { errorMessage, isRecord } from "../types";

/** One book update for one token, normalized from a feed frame or a REST snapshot. */
export interface BookItem {
  assetId: string;
  /** null = ladder not present in this update */
  asks: OrderLevel[] | null;
  bids: OrderLevel[] | null;
  bestAsk: number | null;
  bestBid: number | null;
}

const SYNTHETIC_SIZE = 1e9;
const BOOK_EVENT_TYPES = new Set(["book", "price_change", "tick_size_change"]);
const LIST_NESTED_KEYS = ["changes", "price_changes", "items"] as const;
const OBJECT_NESTED_KEYS = ["changes", "price_changes", "items", "books"] as const;

function toNumber(v: unknown): number {
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim()) return Number(v);
  return NaN;
}

function parseLevels(arr: unknown): OrderLevel[] | null {
  if (!Array.isArray(arr)) return null;
  const out: OrderLevel[] = [];
  for (const x of arr) {
    if (!isRecord(x)) continue;
    const price = toNumber(x.price);
    const size = toNumber(x.size);
    if (Number.isFinite(price) && Number.isFinite(size)) out.push({ price, size });
  }
  return out;
}

function normalizeItem(d: Record<string, unknown>): BookItem | null {
  const id = d.asset_id ?? d.assetId;
  if (typeof id !== "string" && typeof id !== "number") return null;
  const assetId = String(id);
  if (!assetId) return null;
  if (!("asks" in d || "bids" in d || "best_ask" in d || "best_bid" in d)) return null;
  const bestAsk = d.best_ask == null ? null : toNumber(d.best_ask);
  const bestBid = d.best_bid == null ? null : toNumber(d.best_bid);
  return {
    assetId,
    asks: parseLevels(d.asks),
    bids: parseLevels(d.bids),
    bestAsk: bestAsk != null && Number.isFinite(bestAsk) ? bestAsk : null,
    bestBid: bestBid != null && bestBid > 0 ? bestBid : null,
  };
}

/**
 * Pull every per-token book update out of a market-channel frame.
 * Frames are either a list of events or a single object, with updates possibly nested.
 */
export function extractBookItems(payload: unknown): BookItem[] {
  const out: BookItem[] = [];
  const add = (d: unknown): void => {
    if (!isRecord(d)) return;
    const item = normalizeItem(d);
    if (item) out.push(item);
  };
  const addNested = (d: Record<string, unknown>, keys: readonly string[]): void => {
    for (const key of keys) {
      const nested = d[key];
      if (Array.isArray(nested)) nested.forEach(add);
    }
  };

  if (Array.isArray(payload)) {
    for (const item of payload) {
      if (!isRecord(item)) continue;
      add(item);
      const eventType = String(item.event_type ?? "").toLowerCase();
      if (BOOK_EVENT_TYPES.has(eventType)) addNested(item, LIST_NESTED_KEYS);
    }
  } else if (isRecord(payload)) {
    add(payload);
    addNested(payload, OBJECT_NESTED_KEYS);
  }
  return out;
}

export function emptyBook(): LocalBook {
  return {
    asks: [],
    bids: [],
    bestAsk: null,
    bestBid: null,
    asksSynthetic: false,
    bidsSynthetic: false,
    updatedAt: 0,
  };
}

/** In-memory books keyed by token id. Owned by the monitor loop. */
export class BookStore {
  private readonly books = new Map<string, LocalBook>();

  constructor(private readonly now: () => number = Date.now) {}

  get(tokenId: string): LocalBook | undefined {
    return this.books.get(tokenId);
  }

  get size(): number {
    return this.books.size;
  }

  seed(tokenId: string, book: LocalBook): void {
    this.books.set(tokenId, book);
  }

  /**
   * Apply one update. Full ladders replace the stored ones; a best price without a ladder
   * becomes a single synthetic level. Returns the token id.
   */
  applyItem(item: BookItem): string {
    const book = this.books.get(item.assetId) ?? emptyBook();

    if (item.asks) {
      book.asks = item.asks;
      book.asksSynthetic = false;
      const best = Math.min(...item.asks.map((l) => l.price).filter((p) => p > 0));
      book.bestAsk = Number.isFinite(best) ? best : null;
    }
    if (item.bids) {
      book.bids = item.bids;
      book.bidsSynthetic = false;
      const best = Math.max(0, ...item.bids.map((l) => l.price));
      book.bestBid = best > 0 ? best : null;
    }
    if (item.bestAsk != null) {
      book.bestAsk = item.bestAsk;
      if (book.asks.length === 0) {
        book.asks = [{ price: item.bestAsk, size: SYNTHETIC_SIZE }];
        book.asksSynthetic = true;
      }
    }
    if (item.bestBid != null) {
      book.bestBid = item.bestBid;
      if (book.bids.length === 0) {
        book.bids = [{ price: item.bestBid, size: SYNTHETIC_SIZE }];
        book.bidsSynthetic = true;
      }
    }

    book.updatedAt = this.now();
    this.books.set(item.assetId, book);
    return item.assetId;
  }
}

export type ReceiveResult = { kind: "message"; data: string } | { kind: "timeout" } | { kind: "closed" };

/** One market-channel connection. `receive` suspends until a frame, the timeout or close. */
export interface FeedConnection {
  send(text: string): void;
  receive(timeoutMs: number): Promise<ReceiveResult>;
  close(): void;
}

export function subscribeFrame(tokenIds: readonly string[]): string {
  return JSON.stringify({ type: "market", assets_ids: tokenIds });
}

const PING_INTERVAL_MS = 20_000;

/**
 * Open the market-channel WebSocket. Inbound frames are queued until `receive` takes them.
 */
export function openWsFeed(url: string): Promise<FeedConnection> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url, { maxPayload: 2 ** 24 });
    const queue: string[] = [];
    let waiter: ((r: ReceiveResult) => void) | null = null;
    let closed = false;
    let opened = false;
    let pingTimer: ReturnType<typeof setInterval> | null = null;

    const deliver = (r: ReceiveResult): void => {
      const w = waiter;
      waiter = null;
      w?.(r);
    };

    ws.on("message", (data: WebSocket.RawData) => {
      const text = Array.isArray(data) ? Buffer.concat(data).toString() : data.toString();
      if (waiter) deliver({ kind: "message", data: text });
      else queue.push(text);
    });
    ws.on("error", (err) => {
      console.error("[orderbook_ws] WS error:", err.message);
      if (!opened) reject(err);
    });
    ws.on("close", () => {
      closed = true;
      if (pingTimer) clearInterval(pingTimer);
      deliver({ kind: "closed" });
    });
    ws.on("open", () => {
      opened = true;
      pingTimer = setInterval(() => ws.ping(), PING_INTERVAL_MS);
      resolve({
        send(text: string): void {
          ws.send(text);
        },
        receive(timeoutMs: number): Promise<ReceiveResult> {
          const next = queue.shift();
          if (next !== undefined) return Promise.resolve<ReceiveResult>({ kind: "message", data: next });
          if (closed) return Promise.resolve<ReceiveResult>({ kind: "closed" });
          return new Promise<ReceiveResult>((res) => {
            const timer = setTimeout(() => {
              waiter = null;
              res({ kind: "timeout" });
            }, timeoutMs);
            waiter = (r) => {
              clearTimeout(timer);
              res(r);
            };
          });
        },
        close(): void {
          if (pingTimer) clearInterval(pingTimer);
          try {
            ws.close();
          } catch (e) {
            console.warn(`[orderbook_ws] close failed: ${errorMessage(e)}`);
          }
        },
      });
    });
  });
}
