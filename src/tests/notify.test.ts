import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { getGlobalDispatcher, MockAgent, setGlobalDispatcher, type Dispatcher } from "undici";
import { DiscordNotifier, discordContent, NoopNotifier, notifierFromEnv } from "../notify/discord";
import { captureLogs } from "./helpers";

const HOOK = "http://hooks.test";

describe("discordContent", () => {
  it("prefixes the mention when set", () => {
    assert.strictEqual(discordContent("Filled", "@here"), "@here Filled");
    assert.strictEqual(discordContent("Filled", ""), "Filled");
  });
});

describe("notifierFromEnv", () => {
  it("is a no-op without a webhook", () => {
    assert.ok(notifierFromEnv({}) instanceof NoopNotifier);
    assert.ok(notifierFromEnv({ DISCORD_WEBHOOK_URL: "  " }) instanceof NoopNotifier);
  });

  it("uses the webhook from either variable", () => {
    assert.ok(notifierFromEnv({ DISCORD_WEBHOOK_URL: `${HOOK}/a` }) instanceof DiscordNotifier);
    assert.ok(notifierFromEnv({ CLOBBOT_DISCORD_WEBHOOK_URL: `${HOOK}/b` }) instanceof DiscordNotifier);
  });
});

describe("DiscordNotifier", () => {
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

  it("posts the message as webhook content", async () => {
    agent
      .get(HOOK)
      .intercept({ path: "/webhook", method: "POST", body: JSON.stringify({ content: "@here Filled basket" }) })
      .reply(200, "ok");
    const ok = await new DiscordNotifier(`${HOOK}/webhook`, "@here").send("Filled basket");
    assert.strictEqual(ok, true);
    agent.assertNoPendingInterceptors();
  });

  it("warns on an HTTP error without throwing", async () => {
    agent.get(HOOK).intercept({ path: "/webhook", method: "POST" }).reply(500, "oops");
    const out: { ok?: boolean } = {};
    const lines = await captureLogs(async () => {
      out.ok = await new DiscordNotifier(`${HOOK}/webhook`).send("x");
    });
    assert.strictEqual(out.ok, false);
    assert.deepStrictEqual(lines, ["[notify] notify(discord) failed: HTTP 500"]);
  });

  it("warns on a transport error without logging the URL", async () => {
    agent.get(HOOK).intercept({ path: "/webhook", method: "POST" }).replyWithError(new Error("down"));
    const out: { ok?: boolean } = {};
    const lines = await captureLogs(async () => {
      out.ok = await new DiscordNotifier(`${HOOK}/webhook`).send("x");
    });
    assert.strictEqual(out.ok, false);
    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0].startsWith("[notify] notify(discord) failed: "));
    assert.ok(!lines[0].includes(HOOK));
  });
});
