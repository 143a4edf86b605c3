export type OperationStageKind = "trigger_submit" | "stream_await" | "snapshot_refresh" | "outbox_ready";

export const OPERATION_STAGE_KINDS: readonly OperationStageKind[] = ["trigger_submit", "stream_await", "snapshot_refresh", "outbox_ready"];

export type OperationStageStatus = "pending" | "running" | "completed" | "failed";

export type OperationStage = {
  kind: OperationStageKind;
  label: string;
  status: OperationStageStatus;
  detail?: string;
  started_at?: string;
  finished_at?: string;
  duration_ms?: number;
  started_at_ms?: number;
};

// Canonical numeric form is a decimal string so u64 ids survive without precision loss.
export type CycleRef = {
  display: string;
  numeric: string;
  parsed: boolean;
};

export type CycleOutcomeSummary = {
  cycle_id: string;
  status: string;
  manifest_digest?: string;
};

export type CycleTriggerResponse = {
  cycle_id: string | number;
  status: string;
  manifest_digest?: string;
};

export type CycleSchedule = {
  cycle_id?: string;
  status?: string;
  lane?: string;
  [key: string]: unknown;
};

export type CycleSnapshot = {
  schedule?: CycleSchedule;
  outcomes: CycleOutcomeSummary[];
  outbox: OutboxMessage[];
  [key: string]: unknown;
};

export type OutboxMessage = {
  cycle_id: string;
  event_id: string;
  payload?: unknown;
};

export type TimelinePayload = {
  items: unknown[];
  awareness: unknown[];
  next_cursor?: string;
};

export type TimelineQuery = {
  limit: number;
  session_id?: string;
  scenario?: string;
  cursor?: string;
};

export type ApiErrorBody = {
  code: string;
  message: string;
  details?: unknown;
};

export type ApiEnvelope<T> = {
  success: boolean;
  data: T | null;
  error: ApiErrorBody | null;
  trace_id: string | null;
  duration_ms: number | null;
};
