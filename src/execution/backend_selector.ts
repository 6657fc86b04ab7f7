/**
 * Live-mode gate and backend choice. `resolveBackend` is pure and runs before any
 * network call; `initializeExecutionBackend` builds and validates the chosen backend.
 */

import type { Config } from "../config/load_config";
import { isLiveConfirmed } from "../safety/live_confirmation";
import type { EventBasket } from "../types";
import { errorMessage } from "../types";
import type { ExecutionBackend, PortfolioSource } from "./backend";
import {
  ClobBackend,
  clobCredentialsFromEnv,
  hasClobCredentials,
  type ClobCredentials,
  type ClobTradingApi,
} from "./clob_backend";
import { SimmerBackend, type SimmerApi } from "./simmer_backend";

export type BackendResolution =
  | { kind: "none" }
  | { kind: "clob" }
  | { kind: "simmer" }
  | { kind: "rejected"; reason: string; exitCode: number };

export interface BackendRequest {
  execute: boolean;
  confirmLive: string;
  backend: string;
}

function rejected(reason: string, exitCode = 1): BackendResolution {
  return { kind: "rejected", reason, exitCode };
}

export function resolveBackend(req: BackendRequest, env: NodeJS.ProcessEnv): BackendResolution {
  if (!req.execute) return { kind: "none" };
  if (!isLiveConfirmed(req.confirmLive)) return rejected('Refusing live mode. Re-run with confirm_live "YES"');

  const simmerKey = (env.SIMMER_API_KEY ?? "").trim();
  const requested = req.backend.trim().toLowerCase() || "auto";
  if (requested === "auto") {
    if (hasClobCredentials(env)) return { kind: "clob" };
    if (simmerKey) return { kind: "simmer" };
    return rejected(
      "Live execution init failed: no backend credentials found " +
        "(need PM_PRIVATE_KEY+PM_FUNDER for clob or SIMMER_API_KEY for simmer)."
    );
  }
  if (requested === "clob") {
    return hasClobCredentials(env)
      ? { kind: "clob" }
      : rejected("Live execution init failed (clob): PM_PRIVATE_KEY and PM_FUNDER are required");
  }
  if (requested === "simmer") {
    return simmerKey ? { kind: "simmer" } : rejected("Live execution init failed (simmer): SIMMER_API_KEY is missing");
  }
  return rejected(`Live execution init failed: unsupported exec backend '${requested}'`);
}

export interface BackendFactories {
  createClobApi(creds: ClobCredentials): Promise<ClobTradingApi>;
  createSimmerApi(apiKey: string): SimmerApi;
  now?: () => number;
}

export type BackendInit =
  | {
      ok: true;
      backend: ExecutionBackend | null;
      /** PnL source for the daily loss guard, when one is configured. */
      portfolio: PortfolioSource | null;
      baskets: EventBasket[];
      basketsChanged: boolean;
    }
  | { ok: false; exitCode: number; reason: string };

function simmerBackend(cfg: Config, api: SimmerApi, now?: () => number): SimmerBackend {
  const ex = cfg.execution;
  return new SimmerBackend(
    api,
    {
      venue: ex.simmer.venue,
      source: ex.simmer.source,
      minAmount: ex.simmer.min_amount,
      slippageBps: ex.slippage_bps,
      maxNotionalPerDay: cfg.risk.max_notional_per_day,
    },
    now
  );
}

export async function initializeExecutionBackend(
  cfg: Config,
  env: NodeJS.ProcessEnv,
  baskets: EventBasket[],
  factories: BackendFactories
): Promise<BackendInit> {
  const ex = cfg.execution;
  const resolution = resolveBackend({ execute: ex.execute, confirmLive: ex.confirm_live, backend: ex.backend }, env);
  const simmerKey = (env.SIMMER_API_KEY ?? "").trim();

  if (resolution.kind === "rejected") {
    console.error(`[backend] ${resolution.reason}`);
    return { ok: false, exitCode: resolution.exitCode, reason: resolution.reason };
  }
  if (resolution.kind === "none") {
    return { ok: true, backend: null, portfolio: null, baskets, basketsChanged: false };
  }

  if (resolution.kind === "clob") {
    let api: ClobTradingApi;
    try {
      api = await factories.createClobApi(clobCredentialsFromEnv(env));
    } catch (e) {
      const reason = `Live execution init failed (clob): ${errorMessage(e)}`;
      console.error(`[backend] ${reason}`);
      return { ok: false, exitCode: 1, reason };
    }
    console.log("[backend] Live execution backend: clob");
    const backend = new ClobBackend(api, { slippageBps: ex.slippage_bps, unwindSlippageBps: ex.unwind_slippage_bps }, factories.now);
    const portfolio = simmerKey ? simmerBackend(cfg, factories.createSimmerApi(simmerKey), factories.now) : null;
    return { ok: true, backend, portfolio, baskets, basketsChanged: false };
  }

  const backend = simmerBackend(cfg, factories.createSimmerApi(simmerKey), factories.now);
  console.log(`[backend] Live execution backend: simmer (venue=${ex.simmer.venue}, source=${ex.simmer.source})`);

  if (ex.simmer.venue.trim().toLowerCase() === "polymarket") {
    const settings = await backend.fetchSettings();
    if (!settings) {
      console.warn("[backend] SDK settings unavailable; continuing with venue=polymarket execution path");
    } else {
      if (settings.trading_paused) {
        const reason = "Live execution paused: SDK settings show trading_paused=true";
        console.log(`[backend] ${reason}`);
        return { ok: false, exitCode: 0, reason };
      }
      if (settings.sdk_real_trading_enabled === false) {
        console.warn("[backend] Warning: sdk_real_trading_enabled=false in SDK settings; continuing");
      }
      const balance = Number.isFinite(settings.polymarket_usdc_balance) ? settings.polymarket_usdc_balance : 0;
      if (balance <= 0) {
        const reason = "Live execution init failed (simmer): polymarket_usdc_balance<=0 in SDK settings";
        console.error(`[backend] ${reason}`);
        return { ok: false, exitCode: 1, reason };
      }
    }
  }

  const mapped = baskets.filter((b) => b.legs.every((leg) => leg.brokerMarketId));
  if (mapped.length === 0) {
    const reason = "Live execution init failed (simmer): no fully-mapped event baskets available";
    console.error(`[backend] ${reason}`);
    return { ok: false, exitCode: 1, reason };
  }
  const basketsChanged = mapped.length !== baskets.length;
  if (basketsChanged) console.log(`[backend] Filtered baskets for simmer mapping: ${baskets.length} -> ${mapped.length}`);
  return { ok: true, backend, portfolio: backend, baskets: mapped, basketsChanged };
}
