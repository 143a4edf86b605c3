import { createStore, type StoreApi } from "zustand/vanilla";

import { random_id } from "./ids";

export type ActivityLogKind = "info" | "warn" | "error" | "event";

export type ActivityLogItem = {
  id: string;
  ts: string;
  kind: ActivityLogKind;
  title: string;
  preview?: string;
  data?: unknown;
  cycle_id?: string;
};

export type ActivityLogInput = Omit<ActivityLogItem, "id" | "ts"> & { id?: string; ts?: string };

export interface ActivityLogger {
  push_log(item: ActivityLogInput): void;
}

export type ActivityLogState = { items: ActivityLogItem[] };

export const DEFAULT_LOG_LIMIT = 200;

export function now_iso(): string {
  return new Date().toISOString();
}

export function clamp_preview(text: string, opts?: { max_chars?: number; max_lines?: number }): string {
  const max_chars = typeof opts?.max_chars === "number" ? opts.max_chars : 360;
  const max_lines = typeof opts?.max_lines === "number" ? opts.max_lines : 2;
  const raw = String(text || "");
  const lines = raw.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");
  const head = lines.slice(0, Math.max(1, max_lines)).join("\n");
  const more_lines = lines.length > max_lines;
  const trimmed = head.length > max_chars ? `${head.slice(0, Math.max(0, max_chars - 1))}…` : head;
  if (more_lines && trimmed === head) return `${head}…`;
  return trimmed;
}

/** Newest-first, bounded log shown in the console's activity drawer. */
export class ActivityLog implements ActivityLogger {
  readonly store: StoreApi<ActivityLogState>;
  private _limit: number;

  constructor(opts?: { limit?: number }) {
    this._limit = typeof opts?.limit === "number" && opts.limit > 0 ? Math.floor(opts.limit) : DEFAULT_LOG_LIMIT;
    this.store = createStore<ActivityLogState>(() => ({ items: [] }));
  }

  get items(): ActivityLogItem[] {
    return this.store.getState().items;
  }

  push_log(item: ActivityLogInput): void {
    const id = String(item.id || "").trim() || random_id();
    const ts = String(item.ts || "").trim() || now_iso();
    const entry: ActivityLogItem = { ...item, id, ts };
    this.store.setState((prev) => ({ items: [entry, ...prev.items].slice(0, this._limit) }));
  }

  clear(): void {
    this.store.setState({ items: [] });
  }
}

export const noop_logger: ActivityLogger = {
  push_log: () => undefined,
};
