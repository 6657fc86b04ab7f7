import { describe, it } from "node:test";
import assert from "node:assert";
import {
  clampLimitPrice,
  depthAtOrBelow,
  estimateExecCost,
  execLimitPrice,
  orderCostForShares,
  quantizeCentsDown,
  quantizeCentsUp,
} from "../strategy/pricing";
import { makeCandidate } from "./helpers";

describe("orderCostForShares", () => {
  it("walks asks cheapest first regardless of input order", () => {
    const asks = [
      { price: 0.5, size: 10 },
      { price: 0.4, size: 5 },
    ];
    assert.strictEqual(orderCostForShares(asks, 10), 4.5);
  });

  it("returns null when depth is insufficient", () => {
    assert.strictEqual(orderCostForShares([{ price: 0.4, size: 5 }], 6), null);
  });

  it("costs nothing for zero shares", () => {
    assert.strictEqual(orderCostForShares([], 0), 0);
  });

  const ladder = [
    { price: 0.4, size: 5 },
    { price: 0.5, size: 5 },
  ];
  const depthCases: { shares: number; cost: number | null }[] = [
    { shares: 5, cost: 2 },
    { shares: 10, cost: 4.5 },
    { shares: 10.01, cost: null },
  ];
  for (const { shares, cost } of depthCases) {
    it(`prices ${shares} shares against 10 of depth as ${cost}`, () => {
      assert.strictEqual(orderCostForShares(ladder, shares), cost);
    });
  }

  it("never gets cheaper as shares grow", () => {
    let prev = 0;
    for (let shares = 0.5; shares <= 10; shares += 0.5) {
      const cost = orderCostForShares(ladder, shares);
      assert.notStrictEqual(cost, null, `shares=${shares}`);
      assert.ok((cost ?? -1) >= prev, `shares=${shares}`);
      prev = cost ?? prev;
    }
  });

  it("ignores levels with non-positive size", () => {
    const asks = [
      { price: 0.1, size: 0 },
      { price: 0.3, size: 5 },
    ];
    assert.strictEqual(orderCostForShares(asks, 5), 1.5);
  });
});

describe("depthAtOrBelow", () => {
  it("sums sizes priced at or under the limit", () => {
    const asks = [
      { price: 0.4, size: 5 },
      { price: 0.41, size: 3 },
      { price: 0.5, size: 10 },
    ];
    assert.strictEqual(depthAtOrBelow(asks, 0.41), 8);
  });
});

describe("cent quantization", () => {
  it("rounds up and down to whole cents", () => {
    assert.strictEqual(quantizeCentsUp(0.401), 0.41);
    assert.strictEqual(quantizeCentsUp(0.41), 0.41);
    assert.strictEqual(quantizeCentsDown(0.419), 0.41);
  });

  it("clamps limit prices inside the tradable range", () => {
    assert.strictEqual(clampLimitPrice(1.2), 0.999);
    assert.strictEqual(clampLimitPrice(0), 0.001);
  });
});

describe("execLimitPrice", () => {
  it("adds slippage to the average price and rounds up", () => {
    assert.strictEqual(execLimitPrice(4, 10, 100), 0.41);
  });

  it("keeps an exact cent price without slippage", () => {
    assert.strictEqual(execLimitPrice(4, 10, 0), 0.4);
  });
});

describe("estimateExecCost", () => {
  it("prices every leg at its limit times shares", () => {
    const c = makeCandidate([4, 2], 10);
    assert.strictEqual(estimateExecCost(c, 0), 6);
  });
});
