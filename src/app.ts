/**
 * One monitor run from validated config to exit code. Collaborators are injected so the
 * whole run can be exercised without a network.
 */

import type { Config } from "./config/load_config";
import type { Sleep } from "./execution/basket_executor";
import { initializeExecutionBackend, resolveBackend, type BackendFactories } from "./execution/backend_selector";
import type { FetchBooksOptions } from "./markets/clob_http";
import type { MarketSource } from "./markets/fetch_markets";
import { BookStore, type BookItem, type FeedConnection } from "./markets/orderbook_ws";
import { buildUniverse } from "./markets/universe";
import { runMonitorLoop } from "./monitor/monitor_loop";
import type { Notifier } from "./notify/discord";
import type { EventLog, MetricsLog, StateStore } from "./state/store";
import { formatPct } from "./strategy/detector";
import { applySubscriptionTokenCap, buildSubscriptionMaps } from "./strategy/token_cap";
import { errorMessage } from "./types";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_HALTED = 2;
export const EXIT_FEED_ERROR = 3;

export interface AppDeps {
  env: NodeJS.ProcessEnv;
  source: MarketSource;
  openFeed(url: string): Promise<FeedConnection>;
  fetchBooks(tokenIds: readonly string[], opts: FetchBooksOptions): Promise<BookItem[]>;
  factories: BackendFactories;
  notifier: Notifier;
  store: StateStore;
  eventLog: EventLog;
  metrics: MetricsLog;
  now: () => number;
  sleep: Sleep;
}

function logStartup(cfg: Config, universe: string, baskets: number, tokens: number, metricsPath: string): void {
  const d = cfg.detector;
  console.log(`[monitor] Loaded baskets: ${baskets}`);
  console.log(`[monitor] Subscribed token IDs: ${tokens}`);
  console.log(`[monitor] Mode: ${cfg.execution.execute ? "LIVE EXECUTION" : "observe-only"}`);
  console.log(`[monitor] Universe: ${universe}`);
  console.log(
    `[monitor] Threshold: net edge >= ${d.min_edge_cents.toFixed(2)}c | shares/leg=${d.shares.toFixed(2)} | ` +
      `winner_fee=${formatPct(d.winner_fee_rate)} | fixed_cost=$${d.fixed_cost.toFixed(4)}`
  );
  console.log(`[monitor] Strategy: ${cfg.universe.strategy}`);
  if (metricsPath) console.log(`[monitor] Metrics: ${metricsPath}`);
}

export async function runApp(cfg: Config, deps: AppDeps): Promise<number> {
  const { notifier, store, eventLog } = deps;
  const ex = cfg.execution;

  // Refuse unconfirmed live mode before touching the network.
  const resolution = resolveBackend({ execute: ex.execute, confirmLive: ex.confirm_live, backend: ex.backend }, deps.env);
  if (resolution.kind === "rejected") {
    console.error(`[backend] ${resolution.reason}`);
    return resolution.exitCode;
  }

  const state = { current: store.load() };
  if (ex.execute && state.current.halted) {
    console.log(`[risk] state halted: ${state.current.haltReason}`);
    console.log("[risk] run skipped while halted (will auto-reset next day or clear in state file)");
    return EXIT_HALTED;
  }

  const built = await buildUniverse(cfg, deps.source, deps.now());
  if (built.baskets.length === 0) {
    if (built.emptyReason) notifier.notify(built.emptyReason);
    console.error(`[universe] ${built.emptyReason ?? "no baskets"}`);
    return EXIT_FAILURE;
  }

  const capped = applySubscriptionTokenCap(
    built.baskets,
    built.universe,
    {
      maxTokens: cfg.universe.max_subscribe_tokens,
      maxMarketsPerEvent: cfg.universe.max_markets_per_event,
      maxDaysToEnd: cfg.universe.gamma.max_days_to_end,
      halflifeDays: cfg.universe.gamma.score_halflife_days,
    },
    deps.now()
  );
  if (capped.baskets.length === 0) {
    if (capped.emptyReason) notifier.notify(capped.emptyReason);
    console.error(`[universe] ${capped.emptyReason ?? "no baskets after token cap"}`);
    return EXIT_FAILURE;
  }

  let baskets = capped.baskets;
  let maps = buildSubscriptionMaps(baskets);
  logStartup(cfg, built.universe, baskets.length, maps.tokenIds.length, deps.metrics.path);
  notifier.notify(
    `CLOBBOT started (${ex.execute ? "LIVE" : "observe"}) | universe=${built.universe} ` +
      `min_edge=${cfg.detector.min_edge_cents.toFixed(2)}c strategy=${cfg.universe.strategy}`
  );

  const init = await initializeExecutionBackend(cfg, deps.env, baskets, deps.factories);
  if (!init.ok) return init.exitCode;
  if (init.basketsChanged) {
    baskets = init.baskets;
    maps = buildSubscriptionMaps(baskets);
  }
  console.log(`[monitor] Runtime baskets: ${baskets.length}`);
  console.log(`[monitor] Runtime subscribed token IDs: ${maps.tokenIds.length}`);

  const books = new BookStore(deps.now);
  if (cfg.monitor.snapshot_on_start) {
    const snapshots = await deps.fetchBooks(maps.tokenIds, {
      workers: cfg.universe.workers,
      baseUrl: cfg.api.clobRestBaseUrl,
    });
    for (const item of snapshots) books.applyItem(item);
    console.log(`[monitor] Seeded books: ${snapshots.length}/${maps.tokenIds.length}`);
  }

  let feed: FeedConnection;
  try {
    feed = await deps.openFeed(cfg.api.clobWsMarketUrl);
  } catch (e) {
    console.error(`[monitor] feed connect failed: ${errorMessage(e)}`);
    return EXIT_FEED_ERROR;
  }
  console.log(`[monitor] Connected: ${cfg.api.clobWsMarketUrl}`);
  eventLog.record("run_start", "", { universe: built.universe, baskets: baskets.length, execute: ex.execute }, deps.now());

  let code: number;
  try {
    const result = await runMonitorLoop({
      cfg,
      universe: built.universe,
      feed,
      maps,
      books,
      state,
      store,
      eventLog,
      metrics: deps.metrics,
      notifier,
      backend: init.backend,
      portfolio: init.portfolio,
      now: deps.now,
      sleep: deps.sleep,
    });
    code = result.reason === "halted" ? EXIT_HALTED : result.reason === "feed-closed" ? EXIT_FEED_ERROR : EXIT_OK;
    eventLog.record("run_stop", "", { reason: result.reason, candidates: result.stats.candidatesTotal }, deps.now());
  } catch (e) {
    console.error(`[monitor] loop failed: ${errorMessage(e)}`);
    eventLog.record("run_stop", "", { reason: "error", error: errorMessage(e) }, deps.now());
    code = EXIT_FEED_ERROR;
  } finally {
    feed.close();
  }
  store.save(state.current);
  return code;
}
