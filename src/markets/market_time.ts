/**
 * Timestamps from market metadata and trade rows, normalized to epoch ms.
 */

const CANDIDATE_KEYS = [
  "endDate",
  "endDateIso",
  "end_date",
  "endTime",
  "end_time",
  "closeTime",
  "close_time",
] as const;

export const DAY_MS = 86_400_000;

export function toEpochMs(value: unknown): number | null {
  if (value == null) return null;
  if (value instanceof Date) {
    const t = value.getTime();
    return Number.isNaN(t) ? null : t;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    if (value <= 0) return null;
    // epoch seconds below 1e10
    return value > 10_000_000_000 ? Math.trunc(value) : Math.trunc(value * 1000);
  }
  if (typeof value === "string" && value.trim()) {
    const s = value.trim();
    if (/^\d+(?:\.\d+)?$/.test(s)) return toEpochMs(Number(s));
    const t = new Date(s).getTime();
    return Number.isNaN(t) ? null : t;
  }
  return null;
}

/** First parseable end-time field of a market or event, in priority order. */
export function getMarketEndTimeMs(market: Record<string, unknown>): number | null {
  for (const key of CANDIDATE_KEYS) {
    const ms = toEpochMs(market[key]);
    if (ms != null) return ms;
  }
  return null;
}

/** Days from `nowMs` until `endMs`; negative once ended. */
export function daysUntil(endMs: number, nowMs: number): number {
  return (endMs - nowMs) / DAY_MS;
}
