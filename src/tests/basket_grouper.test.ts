import { beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import {
  eventKeyForMarket,
  eventTitleForMarket,
  extractYesNoTokenIds,
  groupBucketBaskets,
  groupEventPairBaskets,
  groupYesNoBaskets,
  isNamedOutcomeLabel,
  parseGammaMarkets,
  parseJsonStringField,
  resetPositionalWarningsForTesting,
} from "../strategy/basket_grouper";
import { captureLogs } from "./helpers";

function bucketMarket(id: string, label: string, yes: string) {
  return {
    id,
    question: `Will the value be ${label}?`,
    conditionId: `0xC${id}`,
    negRiskMarketID: "nr1",
    groupItemTitle: label,
    clobTokenIds: JSON.stringify([yes, `no-${yes}`]),
    outcomes: '["Yes","No"]',
    liquidityNum: 100,
    events: [{ id: "e1", slug: "value-event", title: "Value" }],
  };
}

const bucketRaw = [bucketMarket("3", "20+", "y3"), bucketMarket("1", "<10", "y1"), bucketMarket("2", "10-20", "y2")];

describe("parseGammaMarkets", () => {
  it("keeps market-shaped items and drops the rest", () => {
    const ms = parseGammaMarkets([{ id: "1" }, { question: "no id" }, "junk"]);
    assert.strictEqual(ms.length, 1);
    assert.strictEqual(ms[0].id, "1");
  });

  it("returns empty for non-array input", () => {
    assert.deepStrictEqual(parseGammaMarkets({ data: [] }), []);
  });
});

describe("parseJsonStringField", () => {
  it("accepts JSON-encoded strings and arrays", () => {
    assert.deepStrictEqual(parseJsonStringField('["a","b"]'), ["a", "b"]);
    assert.deepStrictEqual(parseJsonStringField(["a", 2]), ["a", "2"]);
    assert.deepStrictEqual(parseJsonStringField("not json"), []);
  });
});

describe("eventKeyForMarket", () => {
  it("prefers negRiskMarketID, then questionID, then event id", () => {
    const [a, b, c, d] = parseGammaMarkets([
      { id: "1", negRiskMarketID: "nr", questionID: "q" },
      { id: "2", questionID: "q" },
      { id: "3", events: [{ id: "e9" }] },
      { id: "4", question: "Loose question?" },
    ]);
    assert.strictEqual(eventKeyForMarket(a), "negRiskMarketID:nr");
    assert.strictEqual(eventKeyForMarket(b), "questionID:q");
    assert.strictEqual(eventKeyForMarket(c), "event:e9");
    assert.strictEqual(eventKeyForMarket(d), "q:Loose question?");
  });

  it("titles an event from the question up to ' be '", () => {
    const [m] = parseGammaMarkets([{ id: "1", question: "Will the high in Springfield be 34-35°F?" }]);
    assert.strictEqual(eventTitleForMarket(m), "Will the high in Springfield be...");
  });
});

describe("groupBucketBaskets", () => {
  it("builds one exhaustive basket with legs sorted by bucket", () => {
    const baskets = groupBucketBaskets(parseGammaMarkets(bucketRaw), { minOutcomes: 3, maxLegs: 0 });
    assert.strictEqual(baskets.length, 1);
    const b = baskets[0];
    assert.strictEqual(b.key, "negRiskMarketID:nr1");
    assert.strictEqual(b.strategy, "buckets");
    assert.strictEqual(b.title, "Will the value be...");
    assert.strictEqual(b.marketId, "e1");
    assert.deepStrictEqual(
      b.legs.map((l) => l.tokenId),
      ["y1", "y2", "y3"]
    );
    assert.strictEqual(b.legs[0].conditionId, "0xc1");
  });

  it("attaches hosted-service ids by lowercased condition id", () => {
    const brokerIds = new Map([["0xc2", "broker-2"]]);
    const [b] = groupBucketBaskets(parseGammaMarkets(bucketRaw), { minOutcomes: 3, maxLegs: 0, brokerIds });
    assert.deepStrictEqual(
      b.legs.map((l) => l.brokerMarketId),
      ["", "broker-2", ""]
    );
  });

  it("skips sets that are too large, too small or not exhaustive", () => {
    const ms = parseGammaMarkets(bucketRaw);
    assert.strictEqual(groupBucketBaskets(ms, { minOutcomes: 3, maxLegs: 2 }).length, 0);
    assert.strictEqual(groupBucketBaskets(ms, { minOutcomes: 4, maxLegs: 0 }).length, 0);
    assert.strictEqual(groupBucketBaskets(ms.slice(1), { minOutcomes: 2, maxLegs: 0 }).length, 0);
  });

  it("skips an event with any outcome that is not a numeric bucket", () => {
    const ms = parseGammaMarkets([...bucketRaw, bucketMarket("4", "No change", "y4")]);
    assert.strictEqual(groupBucketBaskets(ms, { minOutcomes: 3, maxLegs: 0 }).length, 0);
  });

  it("skips an event with an outcome that has no token", () => {
    const ms = parseGammaMarkets([...bucketRaw, { ...bucketMarket("4", "30+", "y4"), clobTokenIds: "[]" }]);
    assert.strictEqual(groupBucketBaskets(ms, { minOutcomes: 3, maxLegs: 0 }).length, 0);
  });
});

describe("groupYesNoBaskets", () => {
  beforeEach(() => resetPositionalWarningsForTesting());

  it("pairs YES and NO tokens by outcome label", () => {
    const ms = parseGammaMarkets([
      { id: "m9", question: "Will it rain?", clobTokenIds: '["b","a"]', outcomes: '["No","Yes"]' },
    ]);
    const [b] = groupYesNoBaskets(ms, {});
    assert.strictEqual(b.key, "yn:m9");
    assert.strictEqual(b.title, "Will it rain? [YES+NO]");
    assert.deepStrictEqual(
      b.legs.map((l) => `${l.side}:${l.tokenId}`),
      ["yes:a", "no:b"]
    );
  });

  it("labels each leg with the outcome its token came from", () => {
    const ms = parseGammaMarkets([
      { id: "m7", question: "Will it snow?", clobTokenIds: '["tokNo","tokYes"]', outcomes: '["No","Yes"]' },
    ]);
    const [b] = groupYesNoBaskets(ms, {});
    assert.deepStrictEqual(
      b.legs.map((l) => `${l.side}:${l.label}:${l.tokenId}`),
      ["yes:Yes:tokYes", "no:No:tokNo"]
    );
  });

  it("skips markets without exactly two tokens and duplicates", () => {
    const ms = parseGammaMarkets([
      { id: "m1", clobTokenIds: '["a"]' },
      { id: "m2", clobTokenIds: '["a","b"]', outcomes: '["Yes","No"]' },
      { id: "m2", clobTokenIds: '["a","b"]', outcomes: '["Yes","No"]' },
    ]);
    assert.deepStrictEqual(
      groupYesNoBaskets(ms, {}).map((b) => b.key),
      ["yn:m2"]
    );
  });

  it("falls back to [YES, NO] order and warns once per market", async () => {
    const [m] = parseGammaMarkets([{ id: "m5", clobTokenIds: '["u","d"]', outcomes: '["Up","Down"]' }]);
    let first: ReturnType<typeof extractYesNoTokenIds> = null;
    const lines = await captureLogs(() => {
      first = extractYesNoTokenIds(m);
      extractYesNoTokenIds(m);
    });
    assert.deepStrictEqual(first, { yes: "u", no: "d", positional: true });
    assert.deepStrictEqual(lines, [
      "[universe] outcomes lack Yes/No for market_id=m5; assuming [YES, NO] token order",
    ]);
  });
});

describe("groupEventPairBaskets", () => {
  const nowMs = Date.parse("2026-01-01T00:00:00Z");

  function pairMarket(id: string, label: string, yes: string, no: string, endDate: string) {
    return {
      id,
      question: `Will ${label} win?`,
      negRiskMarketID: "nr2",
      groupItemTitle: label,
      clobTokenIds: JSON.stringify([yes, no]),
      outcomes: '["Yes","No"]',
      endDate,
      events: [{ id: "e2", title: "Final match" }],
    };
  }

  it("yields YES+YES and NO+NO baskets for a two-outcome event", () => {
    const ms = parseGammaMarkets([
      pairMarket("p2", "Team B", "yb", "nb", "2026-01-10T00:00:00Z"),
      pairMarket("p1", "Team A", "ya", "na", "2026-01-10T00:00:00Z"),
    ]);
    const baskets = groupEventPairBaskets(ms, { minOutcomes: 2, maxLegs: 0, nowMs });
    assert.deepStrictEqual(
      baskets.map((b) => [b.key, b.title, b.legs.map((l) => l.tokenId).join(",")]),
      [
        ["ey:nr2", "Final match [YES+YES]", "ya,yb"],
        ["en:nr2", "Final match [NO+NO]", "na,nb"],
      ]
    );
    assert.strictEqual(baskets[0].endMs, Date.parse("2026-01-10T00:00:00Z"));
  });

  it("skips events that ended more than a day ago", () => {
    const ms = parseGammaMarkets([
      pairMarket("p2", "Team B", "yb", "nb", "2025-12-01T00:00:00Z"),
      pairMarket("p1", "Team A", "ya", "na", "2026-01-10T00:00:00Z"),
    ]);
    assert.strictEqual(groupEventPairBaskets(ms, { minOutcomes: 2, maxLegs: 0, nowMs }).length, 0);
  });

  it("only accepts named outcome labels", () => {
    assert.strictEqual(isNamedOutcomeLabel("Team A"), true);
    assert.strictEqual(isNamedOutcomeLabel("10 or more"), false);
    assert.strictEqual(isNamedOutcomeLabel(""), false);
  });
});
