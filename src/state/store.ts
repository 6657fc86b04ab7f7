/**
 * File-based persistence: one JSON document for the daily runtime state,
 * JSONL for the event log and the metrics stream. No native addons.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { EventAction, EventLogEntry, RuntimeState } from "../types";
import { errorMessage } from "../types";

const RuntimeStateSchema = z.object({
  version: z.literal(1),
  day: z.string(),
  executionsToday: z.number().int().min(0),
  notionalToday: z.number().min(0),
  consecutiveFailures: z.number().int().min(0),
  halted: z.boolean(),
  haltReason: z.string(),
  startPnlTotal: z.number().nullable(),
  lastPnlTotal: z.number().nullable(),
  lastPnlCheckTs: z.number(),
});

/** Local calendar day, YYYY-MM-DD. */
export function dayKeyLocal(ms: number = Date.now()): string {
  const d = new Date(ms);
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

export function freshState(day: string): RuntimeState {
  return {
    version: 1,
    day,
    executionsToday: 0,
    notionalToday: 0,
    consecutiveFailures: 0,
    halted: false,
    haltReason: "",
    startPnlTotal: null,
    lastPnlTotal: null,
    lastPnlCheckTs: 0,
  };
}

/** Same object when still today; a fresh state for a new day (this clears a halt). */
export function rolloverIfNewDay(state: RuntimeState, day: string): { state: RuntimeState; rolled: boolean } {
  if (state.day === day) return { state, rolled: false };
  return { state: freshState(day), rolled: true };
}

export interface StateStore {
  load(): RuntimeState;
  save(state: RuntimeState): void;
}

function ensureDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

export class FileStateStore implements StateStore {
  constructor(
    readonly path: string,
    private readonly today: () => string = () => dayKeyLocal()
  ) {}

  /** Missing, unreadable or stale-day files all start a fresh day. */
  load(): RuntimeState {
    const day = this.today();
    if (!existsSync(this.path)) return freshState(day);
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (e) {
      console.warn(`[store] unreadable state file ${this.path}: ${errorMessage(e)}; starting fresh`);
      return freshState(day);
    }
    const parsed = RuntimeStateSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[store] invalid state file ${this.path}; starting fresh`);
      return freshState(day);
    }
    return rolloverIfNewDay(parsed.data, day).state;
  }

  /** Write to a temp file and rename over the target. */
  save(state: RuntimeState): void {
    ensureDir(this.path);
    const tmp = `${this.path}.tmp-${process.pid}`;
    writeFileSync(tmp, JSON.stringify(state, null, 2), "utf-8");
    renameSync(tmp, this.path);
  }
}

export class MemoryStateStore implements StateStore {
  saves = 0;
  private current: RuntimeState;

  constructor(initial: RuntimeState) {
    this.current = { ...initial };
  }

  load(): RuntimeState {
    return { ...this.current };
  }

  save(state: RuntimeState): void {
    this.saves++;
    this.current = { ...state };
  }
}

/** Append-only JSONL writer; a no-op when the path is empty. */
export class JsonlWriter {
  constructor(readonly path: string) {
    if (path) ensureDir(path);
  }

  get enabled(): boolean {
    return this.path !== "";
  }

  append(row: object): void {
    if (!this.path) return;
    appendFileSync(this.path, JSON.stringify(row) + "\n", "utf-8");
  }
}

export class EventLog extends JsonlWriter {
  record(action: EventAction, basketKey: string, metadata: Record<string, unknown> = {}, nowMs = Date.now()): void {
    const entry: EventLogEntry = {
      timestamp: new Date(nowMs).toISOString(),
      action,
      basketKey,
      metadata,
    };
    this.append(entry);
  }
}

export class MetricsLog extends JsonlWriter {}
