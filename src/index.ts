/**
 * clob-basket-arb: real-time basket arbitrage monitor.
 * Observe-only unless execution.execute is set and confirmed with confirm_live "YES".
 */

import { runApp } from "./app";
import { getConfigPath, parseConfig, readConfigFile } from "./config/load_config";
import { createClobTradingApi, realSleep, SimmerSdkClient } from "./execution";
import { fetchBooks, GammaMarketSource } from "./market_fetcher";
import { openWsFeed } from "./markets/orderbook_ws";
import { notifierFromEnv } from "./notify/discord";
import { checkConfigHasNoSecrets } from "./safety/live_confirmation";
import { EventLog, FileStateStore, MetricsLog } from "./state/store";
import { errorMessage } from "./types";

async function main(): Promise<number> {
  const configPath = getConfigPath();
  const raw = readConfigFile(configPath);
  if (!checkConfigHasNoSecrets(raw)) return 1;
  const config = parseConfig(raw);
  console.log(`[config] Loaded ${configPath}`);

  const api = config.api;
  return runApp(config, {
    env: process.env,
    source: new GammaMarketSource(api.gammaBaseUrl, api.simmerBaseUrl),
    openFeed: openWsFeed,
    fetchBooks,
    factories: {
      createClobApi: (creds) => createClobTradingApi(api.clobRestBaseUrl, config.execution.clob.chain_id, creds),
      createSimmerApi: (apiKey) => new SimmerSdkClient(apiKey, api.simmerBaseUrl),
    },
    notifier: notifierFromEnv(process.env, config.notify.timeout_ms),
    store: new FileStateStore(config.state.state_file),
    eventLog: new EventLog(config.state.event_log_file),
    metrics: new MetricsLog(config.state.metrics_file),
    now: Date.now,
    sleep: realSleep,
  });
}

process.on("SIGINT", () => {
  console.log("\n[shutdown] SIGINT, exiting.");
  process.exit(0);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error("[startup]", errorMessage(e));
    process.exitCode = 1;
  });
