/**
 * Metadata API client against an in-process undici mock.
 */
import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { getGlobalDispatcher, MockAgent, setGlobalDispatcher, type Dispatcher } from "undici";
import { GammaMarketSource } from "../markets/fetch_markets";
import { captureLogs } from "./helpers";

const GAMMA = "http://gamma.test";
const BROKER = "http://broker.test";

describe("GammaMarketSource", () => {
  let saved: Dispatcher;
  let agent: MockAgent;

  beforeEach(() => {
    saved = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(saved);
    await agent.close();
  });

  it("fetches and parses a page of active markets", async () => {
    agent
      .get(GAMMA)
      .intercept({ path: "/markets?active=true&closed=false&limit=2&offset=4", method: "GET" })
      .reply(200, [{ id: "11", question: "First?" }, { id: 12 }, { nope: true }]);
    const source = new GammaMarketSource(GAMMA, BROKER);
    const markets = await source.fetchActiveMarkets(2, 4);
    assert.deepStrictEqual(
      markets.map((m) => String(m.id)),
      ["11", "12"]
    );
  });

  it("degrades to an empty page on HTTP errors", async () => {
    agent
      .get(GAMMA)
      .intercept({ path: "/markets?active=true&closed=false&limit=5&offset=0", method: "GET" })
      .reply(503, "busy");
    const source = new GammaMarketSource(GAMMA, BROKER);
    const out: { markets?: unknown[] } = {};
    const lines = await captureLogs(async () => {
      out.markets = await source.fetchActiveMarkets(5, 0);
    });
    assert.deepStrictEqual(out.markets, []);
    assert.deepStrictEqual(lines, ["[universe] Gamma markets page offset=0 failed: HTTP 503"]);
  });

  it("attaches the parent event to nested markets", async () => {
    agent
      .get(GAMMA)
      .intercept({ path: "/events/slug/spring-high", method: "GET" })
      .reply(200, {
        id: 77,
        slug: "spring-high",
        title: "Springfield high",
        endDate: "2026-05-02T00:00:00Z",
        markets: [{ id: "1" }, { id: "2", events: [{ id: "other" }] }],
      });
    const source = new GammaMarketSource(GAMMA, BROKER);
    const ev = await source.fetchEventBySlug("spring-high");
    assert.ok(ev);
    assert.strictEqual(ev.id, "77");
    assert.strictEqual(ev.endDate, "2026-05-02T00:00:00Z");
    assert.deepStrictEqual(
      ev.markets.map((m) => m.events?.[0]?.id),
      ["77", "other"]
    );
  });

  it("maps the hosted market index by lowercased condition id", async () => {
    agent
      .get(BROKER)
      .intercept({ path: "/api/markets?tags=weather&status=active&limit=500", method: "GET" })
      .reply(200, {
        markets: [
          { id: "s-1", polymarket_id: "0xABC" },
          { id: "s-2", polymarket_id: "" },
          { id: null, polymarket_id: "0xdef" },
        ],
      });
    const source = new GammaMarketSource(GAMMA, BROKER);
    assert.deepStrictEqual(await source.fetchBrokerMarkets("weather", 500), [{ id: "s-1", conditionId: "0xabc" }]);
  });
});
