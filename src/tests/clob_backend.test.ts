import { describe, it } from "node:test";
import assert from "node:assert";
import {
  ClobBackend,
  clobCredentialsFromEnv,
  hasClobCredentials,
  tradeSize,
  tradeTimestampMs,
  type ClobTradingApi,
  type FokOrder,
  type TradeQuery,
} from "../execution/clob_backend";
import type { LocalBook } from "../types";
import { captureLogs, makeBook, makeCandidate } from "./helpers";

const SUBMIT_MS = 1_000_000_000_000;
const PLACEHOLDER_KEY = "1".repeat(64);

class FakeClobApi implements ClobTradingApi {
  readonly placed: FokOrder[] = [];
  readonly canceled: string[][] = [];
  readonly queries: TradeQuery[] = [];
  placeResults: (unknown | Error)[] = [];
  trades: Record<string, unknown[]> = {};
  tradeFailures = 0;
  openOrders: unknown[] = [];

  async placeFok(order: FokOrder): Promise<unknown> {
    this.placed.push(order);
    const r = this.placeResults.shift();
    if (r instanceof Error) throw r;
    return r ?? { success: true };
  }

  async cancelOrders(orderIds: readonly string[]): Promise<void> {
    this.canceled.push([...orderIds]);
  }

  async getTrades(query: TradeQuery): Promise<unknown[]> {
    this.queries.push(query);
    if (this.tradeFailures > 0) {
      this.tradeFailures--;
      throw new Error("bad after");
    }
    return this.trades[query.assetId] ?? [];
  }

  async getOpenOrders(): Promise<unknown[]> {
    return this.openOrders;
  }
}

const opts = { slippageBps: 50, unwindSlippageBps: 150 };
const candidate = makeCandidate([1, 1, 2], 5);

describe("ClobBackend submit", () => {
  it("places one FOK buy per leg at cents-rounded limits", async () => {
    const api = new FakeClobApi();
    api.placeResults = [{ orderID: "A", success: true }, { orderID: "B", success: true }, new Error("not enough balance")];
    const sub = await new ClobBackend(api, opts, () => SUBMIT_MS).submitBasket(candidate);
    assert.deepStrictEqual(api.placed, [
      { tokenId: "t1", price: 0.21, size: 5, side: "BUY" },
      { tokenId: "t2", price: 0.21, size: 5, side: "BUY" },
      { tokenId: "t3", price: 0.41, size: 5, side: "BUY" },
    ]);
    assert.deepStrictEqual(sub, {
      submittedAtMs: SUBMIT_MS,
      orderIds: ["A", "B"],
      error: null,
      messages: ["not enough balance"],
    });
  });

  it("throws when no leg could be placed", async () => {
    const api = new FakeClobApi();
    api.placeResults = [new Error("x"), new Error("y")];
    await assert.rejects(new ClobBackend(api, opts).submitBasket(makeCandidate([1, 1], 5)), /^Error: x \| y$/);
  });
});

describe("ClobBackend fills", () => {
  const submission = { submittedAtMs: SUBMIT_MS, orderIds: [], error: null, messages: [] };

  it("sums recent trades per token, once per trade id", async () => {
    const api = new FakeClobApi();
    const shared = { id: "tr1", asset_id: "t1", size: "3", timestamp: String(SUBMIT_MS / 1000) };
    api.trades = {
      t1: [shared],
      t2: [shared, { id: "tr2", asset_id: "t2", size: 5 }],
      t3: [{ id: "old", asset_id: "t3", size: 5, timestamp: SUBMIT_MS - 5000 }],
    };
    const fills = await new ClobBackend(api, opts).pollFills(candidate, submission);
    assert.deepStrictEqual(fills, { t1: 3, t2: 5, t3: 0 });
  });

  it("falls back to a seconds filter when the millisecond filter fails", async () => {
    const api = new FakeClobApi();
    api.tradeFailures = 1;
    const lines = await captureLogs(async () => {
      await new ClobBackend(api, opts).recentTradesForToken("t1", SUBMIT_MS);
    });
    assert.deepStrictEqual(api.queries, [
      { assetId: "t1", after: "999999970000" },
      { assetId: "t1", after: "999999970" },
    ]);
    assert.deepStrictEqual(lines, ["[exec] trades lookup failed token_id=t1: bad after"]);
  });

  it("reads trade sizes and timestamps from alternate keys", () => {
    assert.strictEqual(tradeSize({ matched_size: "2.5" }), 2.5);
    assert.strictEqual(tradeSize({}), 0);
    assert.strictEqual(tradeTimestampMs({ created_at: "2026-01-05T00:00:00Z" }), Date.parse("2026-01-05T00:00:00Z"));
    assert.strictEqual(tradeTimestampMs({}), null);
  });
});

describe("ClobBackend unwind and housekeeping", () => {
  it("sells filled legs into the bid and skips legs without one", async () => {
    const api = new FakeClobApi();
    const books = new Map<string, LocalBook>([
      [
        "t1",
        makeBook([], {
          bids: [
            { price: 0.5, size: 10 },
            { price: 0.55, size: 3 },
          ],
        }),
      ],
      ["t2", makeBook([])],
    ]);
    const backend = new ClobBackend(api, opts);
    const out: { attempted?: number; succeeded?: number } = {};
    const lines = await captureLogs(async () => {
      const r = await backend.unwind(
        candidate,
        { submittedAtMs: SUBMIT_MS, orderIds: [], error: null, messages: [] },
        { t1: 5, t2: 2, t3: 0 },
        (id) => books.get(id)
      );
      out.attempted = r.attempted;
      out.succeeded = r.succeeded;
    });
    assert.deepStrictEqual(api.placed, [{ tokenId: "t1", price: 0.54, size: 5, side: "SELL" }]);
    assert.deepStrictEqual(out, { attempted: 1, succeeded: 1 });
    assert.deepStrictEqual(lines, ["[exec] live: unwind skipped (no bid) token_id=t2"]);
  });

  it("cancels by id and counts open orders", async () => {
    const api = new FakeClobApi();
    api.openOrders = [{ id: "a" }, { id: "b" }];
    const backend = new ClobBackend(api, opts);
    await backend.cancel(["A", "B"]);
    assert.deepStrictEqual(api.canceled, [["A", "B"]]);
    assert.strictEqual(await backend.openOrderCount(), 2);
  });

  it("uses the executable estimate as the executed cost", () => {
    const backend = new ClobBackend(new FakeClobApi(), { slippageBps: 0, unwindSlippageBps: 0 });
    assert.strictEqual(backend.executedCost(candidate), 4);
  });
});

describe("exchange credentials", () => {
  it("reads key and funder and adds the 0x prefix", () => {
    const creds = clobCredentialsFromEnv({ PM_PRIVATE_KEY: PLACEHOLDER_KEY, PM_PROXY_ADDRESS: "0xfunder" });
    assert.deepStrictEqual(creds, {
      privateKey: `0x${PLACEHOLDER_KEY}`,
      funder: "0xfunder",
      signatureType: 0,
      apiCreds: null,
    });
  });

  it("takes configured API credentials and signature type", () => {
    const creds = clobCredentialsFromEnv({
      PM_PRIVATE_KEY: `0x${PLACEHOLDER_KEY}`,
      PM_FUNDER: "0xfunder",
      PM_SIGNATURE_TYPE: "2",
      PM_API_KEY: "test-key",
      PM_API_SECRET: "test-secret",
      PM_API_PASSPHRASE: "test-passphrase",
    });
    assert.strictEqual(creds.signatureType, 2);
    assert.deepStrictEqual(creds.apiCreds, { key: "test-key", secret: "test-secret", passphrase: "test-passphrase" });
  });

  it("rejects missing or malformed keys", () => {
    assert.throws(() => clobCredentialsFromEnv({}), /Missing env for live execution/);
    assert.throws(
      () => clobCredentialsFromEnv({ PM_PRIVATE_KEY: "not-a-key", PM_FUNDER: "0xfunder" }),
      /Invalid PM_PRIVATE_KEY format/
    );
  });

  it("detects whether credentials are present", () => {
    assert.strictEqual(hasClobCredentials({ PM_PRIVATE_KEY: "k", PM_FUNDER: "f" }), true);
    assert.strictEqual(hasClobCredentials({ PM_PRIVATE_KEY: "k" }), false);
  });
});
