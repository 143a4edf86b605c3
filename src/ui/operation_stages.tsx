import React from "react";

import type { CycleOrchestrator } from "../lib/cycle_orchestrator";
import type { OperationStage, OperationStageStatus } from "../lib/types";
import { use_cycle_runner } from "./use_cycle_runner";

const STATUS_TEXT: Record<OperationStageStatus, string> = {
  pending: "pending",
  running: "running…",
  completed: "done",
  failed: "failed",
};

export function format_duration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return "";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const m = Math.floor(ms / 60_000);
  const s = Math.round((ms % 60_000) / 1000);
  return `${m}m ${s}s`;
}

export function OperationStageList({ stages }: { stages: OperationStage[] }): React.ReactElement {
  return (
    <ol className="operation_stages">
      {stages.map((s) => (
        <li key={s.kind} className={`operation_stage ${s.status}`} data-stage={s.kind}>
          <span className="operation_stage_label">{s.label}</span>
          <span className="operation_stage_status">{STATUS_TEXT[s.status]}</span>
          {s.detail ? <span className="operation_stage_detail">{s.detail}</span> : null}
          {typeof s.duration_ms === "number" ? <span className="operation_stage_duration">{format_duration(s.duration_ms)}</span> : null}
        </li>
      ))}
    </ol>
  );
}

export function OperationPanel({ orchestrator }: { orchestrator: CycleOrchestrator }): React.ReactElement {
  const runner = use_cycle_runner(orchestrator);
  const { state, stages } = runner;
  const notice = state.error ? (
    <div className="operation_error">{state.error}</div>
  ) : state.last_message ? (
    <div className="operation_message">{state.last_message}</div>
  ) : null;

  return (
    <div className="operation_panel">
      <div className="operation_header">
        <span className="operation_phase">{state.phase}</span>
        {state.last_cycle_id ? <span className="operation_cycle">{`cycle ${state.last_cycle_id}`}</span> : null}
        {state.is_running ? (
          <button className="btn" onClick={() => runner.cancel()}>
            Cancel
          </button>
        ) : null}
      </div>
      {notice}
      {state.trace_id ? <div className="operation_trace">{`trace ${state.trace_id}`}</div> : null}
      {state.budget ? <div className="operation_budget">{`budget ${state.budget}`}</div> : null}
      {state.indices_used.length ? <div className="operation_indices">{`indices ${state.indices_used.join(", ")}`}</div> : null}
      <OperationStageList stages={stages.stages} />
      {stages.total_elapsed_ms !== null ? (
        <div className="operation_total">{`total ${format_duration(stages.total_elapsed_ms)}`}</div>
      ) : null}
    </div>
  );
}
