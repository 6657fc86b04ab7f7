import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";

const ApiSchema = z
  .object({
    gammaBaseUrl: z.string().url().optional().default("https://gamma-api.polymarket.com"),
    clobRestBaseUrl: z.string().url().optional().default("https://clob.polymarket.com"),
    clobWsMarketUrl: z.string().optional().default("wss://ws-subscriptions-clob.polymarket.com/ws/market"),
    simmerBaseUrl: z.string().url().optional().default("https://api.simmer.markets"),
  })
  .optional()
  .default({});

const GammaSchema = z
  .object({
    limit: z.number().int().min(0).optional().default(500),
    offset: z.number().int().min(0).optional().default(0),
    min_liquidity: z.number().min(0).optional().default(0),
    min_volume24hr: z.number().min(0).optional().default(0),
    scan_max_markets: z.number().int().min(0).optional().default(5000),
    /** 0 = no limit. */
    max_days_to_end: z.number().min(0).optional().default(0),
    score_halflife_days: z.number().positive().optional().default(30),
    include_regex: z.string().optional().default(""),
    exclude_regex: z.string().optional().default(""),
  })
  .optional()
  .default({});

const BtcSchema = z
  .object({
    window_minutes: z.array(z.union([z.literal(5), z.literal(15)])).min(1).optional().default([5]),
    windows_back: z.number().int().min(0).optional().default(1),
    windows_forward: z.number().int().min(0).optional().default(1),
  })
  .optional()
  .default({});

const UniverseSchema = z
  .object({
    kind: z.enum(["weather", "gamma-active", "btc-updown"]).optional().default("weather"),
    strategy: z.enum(["buckets", "yes-no", "event-pair", "both", "all"]).optional().default("both"),
    /** Max weather markets to collect before expanding events. */
    limit: z.number().int().positive().optional().default(250),
    workers: z.number().int().positive().optional().default(24),
    min_outcomes: z.number().int().min(2).optional().default(4),
    gamma: GammaSchema,
    btc: BtcSchema,
    /** 0 = subscribe to every token. */
    max_subscribe_tokens: z.number().int().min(0).optional().default(0),
    max_markets_per_event: z.number().int().min(0).optional().default(0),
  })
  .optional()
  .default({});

const DetectorSchema = z
  .object({
    shares: z.number().positive().optional().default(5),
    min_edge_cents: z.number().optional().default(1),
    winner_fee_rate: z.number().min(0).max(1).optional().default(0),
    fixed_cost: z.number().min(0).optional().default(0),
    alert_cooldown_sec: z.number().min(0).optional().default(10),
    min_eval_interval_ms: z.number().int().min(0).optional().default(0),
    /** 0 = unlimited. */
    max_legs: z.number().int().min(0).optional().default(0),
  })
  .optional()
  .default({});

const MonitorSchema = z
  .object({
    /** 0 = run until the feed closes or a halt. */
    run_seconds: z.number().int().min(0).optional().default(0),
    summary_every_sec: z.number().min(0).optional().default(0),
    receive_timeout_sec: z.number().positive().optional().default(30),
    snapshot_on_start: z.boolean().optional().default(true),
  })
  .optional()
  .default({});

const RiskSchema = z
  .object({
    max_exec_per_day: z.number().int().min(0).optional().default(20),
    max_notional_per_day: z.number().min(0).optional().default(200),
    max_open_orders: z.number().int().min(0).optional().default(0),
    max_consecutive_failures: z.number().int().min(0).optional().default(3),
    /** 0 disables the daily loss guard. */
    daily_loss_limit_usd: z.number().min(0).optional().default(0),
    pnl_check_interval_sec: z.number().min(0).optional().default(60),
  })
  .optional()
  .default({});

const ExecutionSchema = z
  .object({
    execute: z.boolean().optional().default(false),
    /** Must be exactly "YES" when execute is true. */
    confirm_live: z.string().optional().default(""),
    backend: z.string().optional().default("auto"),
    slippage_bps: z.number().min(0).optional().default(50),
    unwind_slippage_bps: z.number().min(0).optional().default(150),
    cooldown_sec: z.number().min(0).optional().default(30),
    max_attempts: z.number().int().positive().optional().default(2),
    retry_delay_sec: z.number().min(0).optional().default(2),
    book_stale_sec: z.number().min(0).optional().default(5),
    allow_best_only: z.boolean().optional().default(false),
    reconcile_polls: z.number().int().positive().optional().default(4),
    reconcile_interval_sec: z.number().min(0).optional().default(1),
    min_fill_ratio: z.number().min(0).max(1).optional().default(0.98),
    cancel_unfilled_on_fail: z.boolean().optional().default(true),
    unwind_partial: z.boolean().optional().default(true),
    clob: z
      .object({
        chain_id: z.union([z.literal(137), z.literal(80002)]).optional().default(137),
      })
      .optional()
      .default({}),
    simmer: z
      .object({
        venue: z.string().optional().default("polymarket"),
        source: z.string().optional().default("sdk:clob-arb"),
        min_amount: z.number().min(0).optional().default(1),
      })
      .optional()
      .default({}),
  })
  .optional()
  .default({});

const StateSchema = z
  .object({
    state_file: z.string().optional().default("data/clob_arb_state.json"),
    event_log_file: z.string().optional().default("data/clob_arb_events.jsonl"),
    /** Empty disables the metrics stream. */
    metrics_file: z.string().optional().default(""),
    metrics_all_candidates: z.boolean().optional().default(false),
  })
  .optional()
  .default({});

const NotifySchema = z
  .object({
    observe_signals: z.boolean().optional().default(false),
    observe_min_interval_sec: z.number().min(0).optional().default(30),
    timeout_ms: z.number().int().positive().optional().default(5000),
  })
  .optional()
  .default({});

const ConfigSchema = z.object({
  api: ApiSchema,
  universe: UniverseSchema,
  detector: DetectorSchema,
  monitor: MonitorSchema,
  risk: RiskSchema,
  execution: ExecutionSchema,
  state: StateSchema,
  notify: NotifySchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type UniverseKind = Config["universe"]["kind"];
export type StrategySelection = Config["universe"]["strategy"];

function findConfigPath(explicitPath?: string): string {
  if (explicitPath) {
    if (existsSync(explicitPath)) return explicitPath;
    throw new Error(`Config file not found. Tried: ${explicitPath}`);
  }
  const cwd = process.cwd();
  const candidates = [
    join(cwd, "config.json"),
    join(cwd, "src", "config", "config.json"),
    join(cwd, "src", "config", "config.example.json"),
    join(__dirname, "config.json"),
    join(__dirname, "config.example.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error(
    `Config file not found. Copy src/config/config.example.json to config.json (in project root or src/config). Tried: ${candidates.join(", ")}`
  );
}

/** Returns the path to the config file that would be loaded (first existing from project root or src/config). */
export function getConfigPath(explicitPath?: string): string {
  return findConfigPath(explicitPath ?? process.env.CLOBBOT_CONFIG);
}

/** Validate an already-parsed config object; every field has a default. */
export function parseConfig(data: unknown): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const msg = issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Config validation failed: ${msg}`);
  }
  return result.data;
}

/** Parsed JSON of a config file, before validation. */
export function readConfigFile(configPath: string): unknown {
  const raw = readFileSync(configPath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in config at ${configPath}: ${String(e)}`);
  }
}

export function loadConfig(explicitPath?: string): Config {
  return parseConfig(readConfigFile(getConfigPath(explicitPath)));
}
