/**
 * Numeric bucket labels ("<250k", "2m+", "1-1.25m", "between 60% and 65%",
 * "34-35°F", "5°C", "10 or below") parsed into closed intervals.
 */

export interface BucketBounds {
  low: number;
  high: number;
}

const SUFFIX_MULTIPLIER: Record<string, number> = { "": 1, k: 1e3, m: 1e6, b: 1e9, t: 1e12 };

/** Allowed hole between neighbouring buckets ("34-35" then "36-37"). */
const GAP_TOLERANCE = 1;
const EPS = 1e-9;

const NUM = String.raw`(-?\d+(?:\.\d+)?\s*[kmbt]?)`;

const AT_MOST_RE = new RegExp(String.raw`^\s*(?:<=|<|≤)\s*${NUM}\s*$`);
const PLUS_RE = new RegExp(String.raw`^\s*${NUM}\s*\+\s*$`);
const OR_BELOW_RE = new RegExp(String.raw`${NUM}\s*°?\s*[fc]?\s*(?:or below|or less|or under|or fewer)`);
const OR_ABOVE_RE = new RegExp(String.raw`${NUM}\s*°?\s*[fc]?\s*(?:or higher|or above|or more|or over|or greater)`);
const LESS_THAN_RE = new RegExp(String.raw`(?:less than|under|below)\s*${NUM}`);
const MORE_THAN_RE = new RegExp(String.raw`(?:more than|over|above|greater than)\s*${NUM}`);
const BETWEEN_RE = new RegExp(String.raw`between\s*${NUM}\s*(?:and|to)\s*${NUM}`);
const RANGE_RE = new RegExp(String.raw`${NUM}\s*[-–to]+\s*${NUM}`);
const POINT_RE = new RegExp(String.raw`^\s*${NUM}\s*°?\s*[fc]?\s*$`);

function normalizeLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/,/g, "")
    .replace(/\$/g, "")
    .replace(/%/g, "")
    .replace(/−/g, "-")
    .replace(/\bthousand\b/g, "k")
    .replace(/\bmillion\b/g, "m")
    .replace(/\b(?:billion|bn)\b/g, "b")
    .replace(/\btrillion\b/g, "t");
}

function parseNumber(token: string): number | null {
  const t = token.trim().toLowerCase().replace(/ /g, "");
  const m = /^(-?\d+(?:\.\d+)?)([kmbt])?$/.exec(t);
  if (!m) return null;
  const value = parseFloat(m[1]);
  return value * SUFFIX_MULTIPLIER[m[2] ?? ""];
}

function unitSuffix(token: string): string {
  const m = /([kmbt])\s*$/.exec(token.trim());
  return m ? m[1] : "";
}

/** "250-500k": a unit on one side applies to the other. */
function boundsFromPair(aToken: string, bToken: string): BucketBounds | null {
  let a = aToken.trim();
  let b = bToken.trim();
  const aSuffix = unitSuffix(a);
  const bSuffix = unitSuffix(b);
  if (!aSuffix && bSuffix) a += bSuffix;
  else if (aSuffix && !bSuffix) b += aSuffix;
  const x = parseNumber(a);
  const y = parseNumber(b);
  if (x == null || y == null) return null;
  return { low: Math.min(x, y), high: Math.max(x, y) };
}

function lowerTail(token: string): BucketBounds | null {
  const x = parseNumber(token);
  return x == null ? null : { low: -Infinity, high: x };
}

function upperTail(token: string): BucketBounds | null {
  const x = parseNumber(token);
  return x == null ? null : { low: x, high: Infinity };
}

/**
 * Parse a bucket label into bounds. Open tails use -Infinity / Infinity.
 * Returns null when the label does not look like a numeric bucket.
 */
export function parseBucketBounds(label: string | null | undefined): BucketBounds | null {
  const s = normalizeLabel(label ?? "");
  if (!s) return null;

  let m = AT_MOST_RE.exec(s);
  if (m) return lowerTail(m[1]);

  m = PLUS_RE.exec(s);
  if (m) return upperTail(m[1]);

  m = OR_BELOW_RE.exec(s);
  if (m) return lowerTail(m[1]);

  m = OR_ABOVE_RE.exec(s);
  if (m) return upperTail(m[1]);

  m = LESS_THAN_RE.exec(s);
  if (m) return lowerTail(m[1]);

  m = MORE_THAN_RE.exec(s);
  if (m) return upperTail(m[1]);

  m = BETWEEN_RE.exec(s);
  if (m) return boundsFromPair(m[1], m[2]);

  m = RANGE_RE.exec(s);
  if (m) return boundsFromPair(m[1], m[2]);

  m = POINT_RE.exec(s);
  if (m) {
    const x = parseNumber(m[1]);
    return x == null ? null : { low: x, high: x };
  }
  return null;
}

/**
 * True when every label parses and the intervals cover the whole line:
 * a low tail, a high tail, and no hole wider than one unit anywhere between.
 * Overlapping buckets are fine.
 */
export function bucketsLookExhaustive(labels: readonly string[]): boolean {
  const bounds: BucketBounds[] = [];
  for (const label of labels) {
    const b = parseBucketBounds(label);
    if (!b) return false;
    bounds.push(b);
  }

  const lowTails = bounds.filter((b) => b.low === -Infinity);
  if (lowTails.length === 0) return false;
  if (!bounds.some((b) => b.high === Infinity)) return false;

  let reach = Math.max(...lowTails.map((b) => b.high));
  const rest = bounds.filter((b) => b.low !== -Infinity).sort((a, b) => a.low - b.low);
  for (const b of rest) {
    if (reach === Infinity) break;
    if (b.low > reach + GAP_TOLERANCE + EPS) return false;
    reach = Math.max(reach, b.high);
  }
  return reach === Infinity;
}
