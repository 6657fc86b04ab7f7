/**
 * CLOB REST book snapshots (GET /book?token_id=...), used to seed local books before streaming.
 * Node 18+ global fetch.
 */

import { errorMessage } from "../types";
import { extractBookItems, type BookItem } from "./orderbook_ws";

const DEFAULT_BASE = "https://clob.polymarket.com";

/**
 * Fetch one token's book. Returns null on non-200, network failure or an unrecognized shape.
 */
export async function fetchBook(tokenId: string, baseUrl: string = DEFAULT_BASE): Promise<BookItem | null> {
  const key = (tokenId ?? "").trim();
  if (!key) return null;
  const url = `${baseUrl.replace(/\/$/, "")}/book?token_id=${encodeURIComponent(key)}`;

  try {
    const res = await fetch(url);
    if (!res.ok) return null;
    const json: unknown = await res.json();
    if (typeof json !== "object" || json === null || Array.isArray(json)) return null;
    // Snapshot responses may omit asset_id; the requested token is authoritative.
    const [item] = extractBookItems({ asset_id: key, ...json });
    return item ? { ...item, assetId: key } : null;
  } catch (e) {
    console.warn(`[clob_http] book ${key} failed: ${errorMessage(e)}`);
    return null;
  }
}

/**
 * Run `fn` over `items` with at most `workers` in flight. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  workers: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  };
  const n = Math.max(1, Math.min(workers, items.length));
  await Promise.all(Array.from({ length: n }, worker));
  return results;
}

export interface FetchBooksOptions {
  workers: number;
  baseUrl?: string;
}

/** Fetch many books; tokens that fail are left out. */
export async function fetchBooks(tokenIds: readonly string[], opts: FetchBooksOptions): Promise<BookItem[]> {
  const books = await mapWithConcurrency(tokenIds, opts.workers, (id) => fetchBook(id, opts.baseUrl));
  return books.filter((b): b is BookItem => b != null);
}
