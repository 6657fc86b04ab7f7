/**
 * Live-trading guardrails: explicit confirmation before any order path, and secrets only
 * from the environment, never from the config file.
 */

export const LIVE_CONFIRMATION = "YES";

export function isLiveConfirmed(confirmLive: string): boolean {
  return confirmLive === LIVE_CONFIRMATION;
}

/** Config key substrings that must not appear (credentials / signing). */
const FORBIDDEN_CONFIG_KEYS = [
  "privateKey",
  "private_key",
  "secret_key",
  "api_secret",
  "passphrase",
  "mnemonic",
  "api_key",
  "webhook",
];

/** Paths in the raw config object that look like credentials. */
export function findConfigSecrets(obj: unknown, path: string = "config"): string[] {
  const found: string[] = [];
  if (obj === null || typeof obj !== "object") return found;
  for (const [k, v] of Object.entries(obj)) {
    const keyLower = k.toLowerCase();
    const fullPath = `${path}.${k}`;
    if (FORBIDDEN_CONFIG_KEYS.some((f) => keyLower.includes(f.toLowerCase()))) {
      found.push(`Config has suspicious key: ${fullPath}`);
    }
    if (typeof v === "string" && /^(0x)?[a-fA-F0-9]{64}$/.test(v)) {
      found.push(`Config has hex-like value at: ${fullPath}`);
    }
    if (v !== null && typeof v === "object" && !Array.isArray(v)) {
      found.push(...findConfigSecrets(v, fullPath));
    }
  }
  return found;
}

/** Logs violations; returns false when the config must be rejected. */
export function checkConfigHasNoSecrets(rawConfig: unknown): boolean {
  const violations = findConfigSecrets(rawConfig);
  if (violations.length === 0) return true;
  console.error("[SAFETY] Credentials belong in the environment. Suspicious config entries:");
  violations.forEach((m) => console.error("  - " + m));
  return false;
}
