/**
 * Operator notifications. Discord webhook when configured, otherwise a no-op.
 */

import { request } from "undici";

export interface Notifier {
  notify(message: string): void;
}

export class NoopNotifier implements Notifier {
  notify(_message: string): void {}
}

/** Records messages; used by tests. */
export class MemoryNotifier implements Notifier {
  readonly messages: string[] = [];

  notify(message: string): void {
    this.messages.push(message);
  }
}

export function discordContent(message: string, mention: string): string {
  return `${mention} ${message}`.trim();
}

export class DiscordNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly mention: string = "",
    private readonly timeoutMs: number = 5000
  ) {}

  /** Never throws; the URL is never logged. */
  async send(message: string): Promise<boolean> {
    try {
      const res = await request(this.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json", "user-agent": "clob-arb-monitor/1.0" },
        body: JSON.stringify({ content: discordContent(message, this.mention) }),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      await res.body.dump();
      if (res.statusCode >= 300) {
        console.warn(`[notify] notify(discord) failed: HTTP ${res.statusCode}`);
        return false;
      }
      return true;
    } catch (e) {
      const name = e instanceof Error ? e.name : typeof e;
      console.warn(`[notify] notify(discord) failed: ${name}`);
      return false;
    }
  }

  notify(message: string): void {
    void this.send(message);
  }
}

export function notifierFromEnv(env: NodeJS.ProcessEnv = process.env, timeoutMs = 5000): Notifier {
  const url = (env.CLOBBOT_DISCORD_WEBHOOK_URL ?? env.DISCORD_WEBHOOK_URL ?? "").trim();
  if (!url) return new NoopNotifier();
  return new DiscordNotifier(url, (env.CLOBBOT_DISCORD_MENTION ?? "").trim(), timeoutMs);
}
