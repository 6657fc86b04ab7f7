import { describe, it } from "node:test";
import assert from "node:assert";
import {
  buildMetricsRow,
  candidateSignature,
  computeCandidate,
  formatCandidateBrief,
  isActionable,
  rankCandidates,
  type BookLookup,
} from "../strategy/detector";
import type { LocalBook } from "../types";
import { makeBasket, makeBook, makeCandidate, makeLeg } from "./helpers";

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} !== ${expected}`);
}

const basket = makeBasket("b1", [makeLeg("t1"), makeLeg("t2"), makeLeg("t3")]);

function booksAt(prices: number[], updatedAt = 0): BookLookup {
  const m = new Map<string, LocalBook>();
  prices.forEach((price, i) => m.set(`t${i + 1}`, makeBook([{ price, size: 100 }], { updatedAt })));
  return (id) => m.get(id);
}

const params = { sharesPerLeg: 5, winnerFeeRate: 0, fixedCost: 0 };

describe("computeCandidate", () => {
  it("overpriced basket has negative edge and is not actionable", () => {
    const c = computeCandidate(basket, booksAt([0.2, 0.3, 0.51]), params);
    assert.ok(c);
    near(c.basketCost, 5.05);
    assert.strictEqual(c.payout, 5);
    near(c.grossEdge, -0.05);
    assert.strictEqual(isActionable(c, 1), false);
  });

  it("underpriced basket is actionable at a one cent threshold", () => {
    const c = computeCandidate(basket, booksAt([0.1, 0.3, 0.4]), params);
    assert.ok(c);
    near(c.basketCost, 4);
    near(c.grossEdge, 1);
    near(c.edgePct, 0.2);
    assert.strictEqual(isActionable(c, 1), true);
  });

  it("applies winner fee to payout and subtracts fixed cost", () => {
    const c = computeCandidate(basket, booksAt([0.1, 0.3, 0.4]), {
      sharesPerLeg: 5,
      winnerFeeRate: 0.02,
      fixedCost: 0.1,
    });
    assert.ok(c);
    near(c.payout, 4.9);
    near(c.grossEdge, 0.8);
  });

  it("returns null when a leg has no book", () => {
    const m = new Map<string, LocalBook>([["t1", makeBook([{ price: 0.1, size: 100 }])]]);
    assert.strictEqual(computeCandidate(basket, (id) => m.get(id), params), null);
  });

  it("returns null when depth cannot fill the size", () => {
    const m = new Map<string, LocalBook>();
    for (const id of ["t1", "t2", "t3"]) m.set(id, makeBook([{ price: 0.1, size: 2 }]));
    assert.strictEqual(computeCandidate(basket, (id) => m.get(id), params), null);
  });

  it("returns null under the market minimum order size", () => {
    const small = makeBasket("b2", basket.legs, { minOrderSize: 10 });
    assert.strictEqual(computeCandidate(small, booksAt([0.1, 0.3, 0.4]), params), null);
  });

  it("prices a best-ask-only book as unlimited size", () => {
    const m = new Map<string, LocalBook>();
    for (const id of ["t1", "t2", "t3"]) m.set(id, makeBook([], { bestAsk: 0.2, asksSynthetic: true }));
    const c = computeCandidate(basket, (id) => m.get(id), params);
    assert.ok(c);
    near(c.basketCost, 3);
  });
});

describe("candidate formatting", () => {
  it("builds a stable signature from strategy, key, edge and leg costs", () => {
    const c = computeCandidate(basket, booksAt([0.1, 0.3, 0.4]), params);
    assert.ok(c);
    assert.strictEqual(candidateSignature(c), "buckets|b1|1.0000|yes:0.5000,yes:1.5000,yes:2.0000");
  });

  it("formats a one-line brief", () => {
    const c = computeCandidate(basket, booksAt([0.1, 0.3, 0.4]), params);
    assert.ok(c);
    assert.strictEqual(
      formatCandidateBrief(c),
      "EDGE $1.0000 (20.00%) | cost $4.0000 | payout $5.0000 | legs=3 | Basket b1"
    );
  });

  it("ranks by edge, best first", () => {
    const low = makeCandidate([0.9], 1, { key: "low" });
    const high = makeCandidate([0.5], 1, { key: "high" });
    assert.deepStrictEqual(
      rankCandidates([low, high]).map((c) => c.basketKey),
      ["high", "low"]
    );
  });
});

describe("buildMetricsRow", () => {
  it("reports executable cost, fill ratios and book staleness", () => {
    const books = booksAt([0.1, 0.3, 0.4], 4000);
    const c = computeCandidate(basket, books, params);
    assert.ok(c);
    const row = buildMetricsRow(c, basket, books, {
      universe: "buckets",
      minEdgeCents: 1,
      slippageBps: 0,
      nowMs: 10000,
    });
    near(row.basket_cost_exec_est, 4);
    near(row.net_edge_exec_est, 1);
    assert.strictEqual(row.fill_ratio_min, 1);
    assert.strictEqual(row.worst_book_stale_sec, 6);
    assert.strictEqual(row.passes_raw_threshold, true);
    assert.strictEqual(row.passes_exec_threshold, true);
    assert.strictEqual(row.reason, "threshold");
    assert.strictEqual(row.missing_book_legs, 0);
    assert.strictEqual(row.edge_threshold_usd, 0.01);
    assert.strictEqual(row.ts, "1970-01-01T00:00:10.000Z");
  });
});
