import { createStore, type StoreApi } from "zustand/vanilla";

import { OPERATION_STAGE_KINDS, type OperationStage, type OperationStageKind, type OperationStageStatus } from "./types";

export const DEFAULT_STAGE_LABELS: Record<OperationStageKind, string> = {
  trigger_submit: "Submit trigger",
  stream_await: "Await stream",
  snapshot_refresh: "Refresh snapshot",
  outbox_ready: "Outbox ready",
};

export type StageTrackerState = {
  stages: OperationStage[];
  current_stage: OperationStageKind | null;
  total_elapsed_ms: number | null;
};

function pending_stages(): OperationStage[] {
  return OPERATION_STAGE_KINDS.map((kind) => ({ kind, label: DEFAULT_STAGE_LABELS[kind], status: "pending" }));
}

function total_of(stages: OperationStage[]): number | null {
  const total = stages.reduce((acc, s) => acc + (s.duration_ms ?? 0), 0);
  return total > 0 ? total : null;
}

/**
 * Observable register of the four workflow stages.
 * Stages move independently; readers get immutable snapshots from the store.
 */
export class StageTracker {
  readonly store: StoreApi<StageTrackerState>;
  private _now: () => number;

  constructor(opts?: { now?: () => number }) {
    this._now = opts?.now || (() => Date.now());
    this.store = createStore<StageTrackerState>(() => ({
      stages: pending_stages(),
      current_stage: null,
      total_elapsed_ms: null,
    }));
  }

  get_snapshot(): StageTrackerState {
    return this.store.getState();
  }

  subscribe(listener: (state: StageTrackerState, prev: StageTrackerState) => void): () => void {
    return this.store.subscribe(listener);
  }

  stage(kind: OperationStageKind): OperationStage {
    const found = this.store.getState().stages.find((s) => s.kind === kind);
    return found || { kind, label: DEFAULT_STAGE_LABELS[kind], status: "pending" };
  }

  reset(): void {
    this.store.setState({ stages: pending_stages(), current_stage: null, total_elapsed_ms: null });
  }

  start(kind: OperationStageKind, label?: string): void {
    const now = this._now();
    this.store.setState((prev) => ({
      stages: prev.stages.map((s) => {
        if (s.kind !== kind) return s;
        const next: OperationStage = {
          kind,
          label: String(label || "").trim() || s.label,
          status: "running",
          started_at: s.started_at || new Date(now).toISOString(),
          started_at_ms: now,
        };
        return next;
      }),
      current_stage: kind,
    }));
  }

  complete(kind: OperationStageKind, detail?: string): void {
    this._finish(kind, "completed", detail);
  }

  fail(kind: OperationStageKind, detail?: string): void {
    this._finish(kind, "failed", detail);
  }

  /** Fails every stage still running; returns the kinds it touched. */
  fail_running(detail?: string): OperationStageKind[] {
    const running = this.store
      .getState()
      .stages.filter((s) => s.status === "running")
      .map((s) => s.kind);
    for (const kind of running) this._finish(kind, "failed", detail);
    return running;
  }

  private _finish(kind: OperationStageKind, status: OperationStageStatus, detail?: string): void {
    const now = this._now();
    this.store.setState((prev) => {
      const stages = prev.stages.map((s) => {
        if (s.kind !== kind) return s;
        const next: OperationStage = { ...s, status, finished_at: new Date(now).toISOString() };
        if (detail !== undefined) next.detail = detail;
        else delete next.detail;
        if (typeof s.started_at_ms === "number") next.duration_ms = Math.max(0, now - s.started_at_ms);
        return next;
      });
      return {
        stages,
        current_stage: prev.current_stage === kind ? null : prev.current_stage,
        total_elapsed_ms: total_of(stages),
      };
    });
  }
}
