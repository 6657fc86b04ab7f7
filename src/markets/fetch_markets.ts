import { request } from "undici";
import { z } from "zod";
import { errorMessage } from "../types";
import { parseGammaMarkets, type GammaMarket } from "../strategy/basket_grouper";

/** Read-only market metadata. Failures degrade to empty results. */
export interface MarketSource {
  fetchActiveMarkets(limit: number, offset: number): Promise<GammaMarket[]>;
  fetchEventBySlug(slug: string): Promise<GammaEvent | null>;
  /** Hosted execution service market index: service market id + exchange condition id. */
  fetchBrokerMarkets(tag: string, limit: number): Promise<BrokerMarket[]>;
}

export interface GammaEvent {
  id: string;
  slug: string;
  title: string;
  endDate: string;
  markets: GammaMarket[];
}

export interface BrokerMarket {
  id: string;
  conditionId: string;
}

const StrOrNum = z.union([z.string(), z.number()]);

const GammaEventSchema = z
  .object({
    id: StrOrNum.nullish(),
    slug: z.string().nullish(),
    title: z.string().nullish(),
    endDate: z.string().nullish(),
    markets: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const BrokerIndexSchema = z.object({
  markets: z.array(
    z
      .object({
        id: StrOrNum.nullish(),
        polymarket_id: z.string().nullish(),
      })
      .passthrough()
  ),
});

async function getJson(url: string, timeoutMs: number): Promise<unknown> {
  const { statusCode, body } = await request(url, {
    method: "GET",
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });
  if (statusCode !== 200) {
    await body.dump();
    throw new Error(`HTTP ${statusCode}`);
  }
  return body.json();
}

export class GammaMarketSource implements MarketSource {
  constructor(
    private readonly gammaBaseUrl: string,
    private readonly brokerBaseUrl: string,
    private readonly timeoutMs = 25_000
  ) {}

  private gammaUrl(path: string): string {
    return `${this.gammaBaseUrl.replace(/\/$/, "")}${path}`;
  }

  async fetchActiveMarkets(limit: number, offset: number): Promise<GammaMarket[]> {
    const q = new URLSearchParams({
      active: "true",
      closed: "false",
      limit: String(limit),
      offset: String(offset),
    });
    try {
      return parseGammaMarkets(await getJson(this.gammaUrl(`/markets?${q.toString()}`), this.timeoutMs));
    } catch (e) {
      console.warn(`[universe] Gamma markets page offset=${offset} failed: ${errorMessage(e)}`);
      return [];
    }
  }

  async fetchEventBySlug(slug: string): Promise<GammaEvent | null> {
    let raw: unknown;
    try {
      raw = await getJson(this.gammaUrl(`/events/slug/${encodeURIComponent(slug)}`), this.timeoutMs);
    } catch (e) {
      console.warn(`[universe] Gamma event ${slug} failed: ${errorMessage(e)}`);
      return null;
    }
    const parsed = GammaEventSchema.safeParse(raw);
    if (!parsed.success) return null;
    const ev = parsed.data;
    const ref = {
      id: ev.id == null ? "" : String(ev.id),
      slug: ev.slug ?? slug,
      title: ev.title ?? "",
    };
    // Markets nested under an event do not repeat their parent; attach it for grouping.
    const markets = parseGammaMarkets(ev.markets ?? []).map((m): GammaMarket =>
      m.events && m.events.length > 0 ? m : { ...m, events: [ref] }
    );
    return { ...ref, endDate: ev.endDate ?? "", markets };
  }

  async fetchBrokerMarkets(tag: string, limit: number): Promise<BrokerMarket[]> {
    const q = new URLSearchParams({ tags: tag, status: "active", limit: String(limit) });
    const url = `${this.brokerBaseUrl.replace(/\/$/, "")}/api/markets?${q.toString()}`;
    let raw: unknown;
    try {
      raw = await getJson(url, this.timeoutMs);
    } catch (e) {
      console.warn(`[universe] hosted market index unavailable: ${errorMessage(e)}`);
      return [];
    }
    const parsed = BrokerIndexSchema.safeParse(raw);
    if (!parsed.success) return [];
    const out: BrokerMarket[] = [];
    for (const row of parsed.data.markets) {
      const id = row.id == null ? "" : String(row.id).trim();
      const conditionId = (row.polymarket_id ?? "").trim().toLowerCase();
      if (id && conditionId) out.push({ id, conditionId });
    }
    return out;
  }
}
