import { createStore, type StoreApi } from "zustand/vanilla";

import { clamp_preview, noop_logger, now_iso, type ActivityLogInput, type ActivityLogger } from "./activity_log";
import { AsyncChannel } from "./channel";
import type { ConsoleConfig } from "./config";
import type { CycleApi } from "./console_client";
import { describe_client_error, type OperationFailure } from "./diagnostics";
import { build_message_event, DialogueBuildError, type DialogueEvent, type MessageEventDraft } from "./dialogue";
import { DisconnectVerifier, extract_cycle_status } from "./disconnect_verifier";
import { error_message } from "./errors";
import { cycle_ref_from_wire } from "./ids";
import { StageTracker } from "./stage_tracker";
import type { ConnectOptions, StreamClient, StreamFailure, StreamHandle, StreamMessage } from "./stream_client";
import type {
  ApiEnvelope,
  CycleOutcomeSummary,
  CycleRef,
  CycleSnapshot,
  CycleTriggerResponse,
  OperationStageKind,
  OutboxMessage,
  TimelinePayload,
} from "./types";

export const TIMELINE_REFRESH_LIMIT = 50;

export type CyclePhase = "idle" | "submitting" | "streaming" | "verifying" | "completing";

export type OperationState = {
  phase: CyclePhase;
  is_running: boolean;
  last_message: string | null;
  error: string | null;
  last_status: number | null;
  error_code: string | null;
  trace_id: string | null;
  context: string | null;
  triggered_at: string | null;
  last_cycle_id: string | null;
  last_outcome: CycleOutcomeSummary | null;
  indices_used: string[];
  budget: string | null;
};

export function initial_operation_state(): OperationState {
  return {
    phase: "idle",
    is_running: false,
    last_message: null,
    error: null,
    last_status: null,
    error_code: null,
    trace_id: null,
    context: null,
    triggered_at: null,
    last_cycle_id: null,
    last_outcome: null,
    indices_used: [],
    budget: null,
  };
}

export type CycleTriggerParams = Omit<MessageEventDraft, "tenant_id" | "session_id"> & {
  tenant_id?: string;
  session_id?: string;
};

export type CycleRunResult =
  | { kind: "completed"; cycle: CycleRef; status: string; via: "stream" | "verification"; refresh_ok: boolean }
  | { kind: "failed"; cycle: CycleRef | null; stage: OperationStageKind | null; message: string }
  | { kind: "superseded"; cycle: CycleRef | null }
  | { kind: "cancelled"; cycle: CycleRef | null };

export type CycleStreamEvent =
  | { type: "pending"; payload: string }
  | { type: "complete"; payload: string }
  | { type: "timeout"; payload: string }
  | { type: "progress"; payload: string }
  | { type: "other"; name: string; payload: string };

export function classify_stream_message(message: StreamMessage): CycleStreamEvent {
  const name = (message.event_name || "").trim();
  switch (name) {
    case "":
      return { type: "progress", payload: message.payload };
    case "pending":
      return { type: "pending", payload: message.payload };
    case "complete":
      return { type: "complete", payload: message.payload };
    case "timeout":
      return { type: "timeout", payload: message.payload };
    default:
      return { type: "other", name, payload: message.payload };
  }
}

/** Status carried by a `complete` event; opaque or empty payloads count as completed. */
export function complete_event_status(payload: string): string {
  const text = payload.trim();
  if (!text) return "completed";
  try {
    return extract_cycle_status(JSON.parse(text)) || "completed";
  } catch {
    return "completed";
  }
}

/** Receives data loaded around a cycle so views can render it. */
export interface CycleViewSink {
  on_dialogue_event?(event: DialogueEvent): void;
  on_timeline?(payload: TimelinePayload): void;
  on_context?(bundle: Record<string, unknown> | null, explain_indices: Record<string, unknown> | null): void;
  on_cycle_snapshot?(cycle: CycleRef, snapshot: CycleSnapshot | null, outbox: OutboxMessage[]): void;
}

export type SessionSelection = { tenant_id?: string | null; session_id?: string | null };

export type CycleOrchestratorDeps = {
  api: CycleApi;
  stream: StreamClient;
  config: ConsoleConfig;
  log?: ActivityLogger;
  tracker?: StageTracker;
  verifier?: DisconnectVerifier;
  sink?: CycleViewSink;
  session?: () => SessionSelection;
  connect_options?: Partial<Omit<ConnectOptions, "heartbeat_timeout_ms">>;
};

type RunSignal = { type: "opened" } | { type: "event"; event: CycleStreamEvent } | { type: "failure"; failure: StreamFailure };

type Run = {
  seq: number;
  channel: AsyncChannel<RunSignal>;
  handle: StreamHandle | null;
  cycle: CycleRef | null;
  stage: OperationStageKind | null;
  cancelled: boolean;
  tenant_id: string;
  session_id: string;
};

/**
 * Drives one cycle at a time: submit, stream, verify on disconnect, refresh.
 * A new trigger supersedes the active run; its stream is closed before anything else happens.
 */
export class CycleOrchestrator {
  readonly state: StoreApi<OperationState>;
  readonly stages: StageTracker;
  private _api: CycleApi;
  private _stream: StreamClient;
  private _config: ConsoleConfig;
  private _log: ActivityLogger;
  private _verifier: DisconnectVerifier;
  private _sink: CycleViewSink;
  private _session: () => SessionSelection;
  private _connect_options: Partial<Omit<ConnectOptions, "heartbeat_timeout_ms">>;
  private _run: Run | null = null;
  private _seq = 0;

  constructor(deps: CycleOrchestratorDeps) {
    this._api = deps.api;
    this._stream = deps.stream;
    this._config = deps.config;
    this._log = deps.log || noop_logger;
    this.stages = deps.tracker || new StageTracker();
    this._verifier = deps.verifier || new DisconnectVerifier(deps.api, { log: this._log });
    this._sink = deps.sink || {};
    this._session = deps.session || (() => ({}));
    this._connect_options = deps.connect_options || {};
    this.state = createStore<OperationState>(() => initial_operation_state());
  }

  get is_running(): boolean {
    return this.state.getState().is_running;
  }

  get_state(): OperationState {
    return this.state.getState();
  }

  async trigger(params: CycleTriggerParams): Promise<CycleRunResult> {
    const prev = this._run;
    if (prev) this._supersede(prev);

    const run: Run = {
      seq: ++this._seq,
      channel: new AsyncChannel<RunSignal>(),
      handle: null,
      cycle: null,
      stage: null,
      cancelled: false,
      tenant_id: "",
      session_id: "",
    };
    this._run = run;

    try {
      return await this._execute(run, params);
    } catch (e) {
      const ended = this._ended(run);
      if (ended) return ended;
      const message = `Unexpected cycle runner failure: ${error_message(e)}`;
      return this._fail(run, run.stage, message, { message, context: "cycle runner", indices: [] });
    } finally {
      this._release(run);
      if (this._run === run) {
        this._run = null;
        this._patch({ phase: "idle", is_running: false });
      }
    }
  }

  /** Stops the active run; every stage it left running is marked failed. */
  cancel(): boolean {
    const run = this._run;
    if (!run) return false;
    run.cancelled = true;
    this._run = null;
    this._release(run);
    run.stage = null;
    this.stages.fail_running("cancelled");
    this._patch({ phase: "idle", is_running: false, last_message: "Cycle cancelled" });
    this._emit_log(run, { kind: "warn", title: "Cycle cancelled" });
    return true;
  }

  /** Releases the active stream without touching the visible state. */
  dispose(): void {
    const run = this._run;
    if (!run) return;
    run.cancelled = true;
    this._run = null;
    this._release(run);
  }

  private async _execute(run: Run, params: CycleTriggerParams): Promise<CycleRunResult> {
    const selection = this._session();
    const tenant_id = [params.tenant_id, selection.tenant_id, this._config.default_tenant_id]
      .map((v) => String(v || "").trim())
      .find((v) => v.length > 0);
    const session_id = [params.session_id, selection.session_id, this._config.default_session_id]
      .map((v) => String(v || "").trim())
      .find((v) => v.length > 0);

    this.stages.reset();
    this._patch({
      ...initial_operation_state(),
      phase: "submitting",
      is_running: true,
      triggered_at: now_iso(),
      last_cycle_id: this.state.getState().last_cycle_id,
      last_outcome: this.state.getState().last_outcome,
    });

    if (!tenant_id) return this._fail(run, null, "Select a tenant before triggering a cycle");
    if (!session_id) return this._fail(run, null, "Select a session before triggering a cycle");
    run.tenant_id = tenant_id;
    run.session_id = session_id;

    if (!this._stream.is_supported()) {
      return this._fail(run, null, "Cycle streaming is unsupported in this runtime; nothing was submitted");
    }

    let event: DialogueEvent;
    try {
      event = build_message_event({ ...params, tenant_id, session_id });
    } catch (e) {
      if (!(e instanceof DialogueBuildError)) throw e;
      return this._fail(run, null, `Could not build the dialogue event: ${e.message}`);
    }
    this._notify("on_dialogue_event", () => this._sink.on_dialogue_event?.(event));

    this._enter_stage(run, "trigger_submit");
    this._emit_log(run, { kind: "info", title: "Cycle trigger submitted", data: { tenant_id, session_id, event_id: event.event_id } });

    let trigger: ApiEnvelope<CycleTriggerResponse>;
    try {
      trigger = await this._api.post_dialogue_event(tenant_id, event);
    } catch (e) {
      const ended = this._ended(run);
      if (ended) return ended;
      return this._fail_with_error(run, "trigger_submit", e, "trigger", "Cycle trigger failed");
    }
    const ended_after_post = this._ended(run);
    if (ended_after_post) return ended_after_post;

    const data = trigger.data;
    if (!data) {
      return this._fail(run, "trigger_submit", "trigger endpoint returned no data", {
        message: "trigger endpoint returned no data",
        context: "trigger",
        indices: [],
        ...(trigger.trace_id ? { trace_id: trigger.trace_id } : {}),
      });
    }

    const cycle = cycle_ref_from_wire(data.cycle_id);
    run.cycle = cycle;
    if (!cycle.parsed) {
      this._emit_log(run, { kind: "warn", title: "Cycle id is not base-36; using it verbatim", preview: cycle.display });
    }
    this._patch({
      trace_id: trigger.trace_id,
      last_cycle_id: cycle.display,
      last_message: `Cycle ${cycle.display} accepted (${data.status})`,
    });
    this.stages.complete("trigger_submit", `status ${data.status}`);

    this._enter_stage(run, "stream_await");
    this._patch({ phase: "streaming" });
    try {
      run.handle = this._open_stream(run, cycle);
    } catch (e) {
      return this._fail(run, "stream_await", `Could not open the cycle stream: ${error_message(e)}`);
    }

    for await (const signal of run.channel) {
      if (signal.type === "opened") {
        this._emit_log(run, { kind: "info", title: "Cycle stream open" });
        continue;
      }

      if (signal.type === "failure") {
        const f = signal.failure;
        if (f.kind !== "disconnected") {
          this._emit_log(run, {
            kind: "warn",
            title: f.kind === "heartbeat_timeout" ? "Cycle stream heartbeat lapsed" : "Cycle stream unavailable",
            preview: `${f.reason}; retry ${f.attempt} in ${f.retry_in_ms}ms`,
          });
          continue;
        }
        this._emit_log(run, { kind: "warn", title: "Cycle stream dropped", preview: f.reason });
        this._close_stream(run);
        return await this._verify(run, cycle);
      }

      const ev = signal.event;
      switch (ev.type) {
        case "pending":
          this._patch({ last_message: `Cycle ${cycle.display} pending` });
          break;
        case "progress":
          this._patch({ last_message: `Cycle ${cycle.display}: ${clamp_preview(ev.payload, { max_chars: 120, max_lines: 1 })}` });
          break;
        case "other":
          this._emit_log(run, { kind: "warn", title: `Ignoring cycle stream event "${ev.name}"`, preview: clamp_preview(ev.payload) });
          break;
        case "timeout":
          this._close_stream(run);
          return this._fail(run, "stream_await", "stream timeout");
        case "complete": {
          const status = complete_event_status(ev.payload);
          this._emit_log(run, { kind: "event", title: "Cycle complete event", preview: clamp_preview(ev.payload) });
          this._close_stream(run);
          return await this._complete(run, cycle, status, "stream");
        }
      }
    }

    return this._ended(run) || this._fail(run, "stream_await", "cycle stream ended unexpectedly");
  }

  private async _verify(run: Run, cycle: CycleRef): Promise<CycleRunResult> {
    this._patch({ phase: "verifying", last_message: `Verifying cycle ${cycle.display} after the stream dropped` });
    const outcome = await this._verifier.resolve(run.tenant_id, cycle);
    const ended = this._ended(run);
    if (ended) return ended;

    if (outcome.kind === "completed") return await this._complete(run, cycle, outcome.status, "verification");
    if (outcome.kind === "unreachable") {
      const failure = describe_client_error(outcome.error, "verify", "Disconnect verification failed");
      return this._fail(run, "stream_await", outcome.message, { ...failure, message: outcome.message });
    }
    return this._fail(run, "stream_await", outcome.message);
  }

  private async _complete(run: Run, cycle: CycleRef, status: string, via: "stream" | "verification"): Promise<CycleRunResult> {
    this.stages.complete("stream_await", status);
    this._patch({ phase: "completing", last_message: `Cycle ${cycle.display} ${status}` });
    this._emit_log(run, { kind: "info", title: `Cycle ${status}`, preview: via === "verification" ? "confirmed by snapshot after disconnect" : undefined });

    this._enter_stage(run, "snapshot_refresh");
    const problems: OperationFailure[] = [];
    const tenant = run.tenant_id;

    // Every await below can outlive the run; nothing reaches the sink or stores once it has ended.
    try {
      const timeline = await this._api.get_timeline(tenant, { limit: TIMELINE_REFRESH_LIMIT, session_id: run.session_id });
      const ended = this._ended(run);
      if (ended) return ended;
      if (timeline.data) {
        const payload = timeline.data;
        this._notify("on_timeline", () => this._sink.on_timeline?.(payload));
      }
    } catch (e) {
      const ended = this._ended(run);
      if (ended) return ended;
      problems.push(describe_client_error(e, "timeline", "Timeline refresh failed"));
    }

    try {
      const bundle = await this._api.get_context_bundle(tenant, run.session_id);
      const ended_bundle = this._ended(run);
      if (ended_bundle) return ended_bundle;
      const indices = await this._api.get_explain_indices(tenant);
      const ended = this._ended(run);
      if (ended) return ended;
      this._notify("on_context", () => this._sink.on_context?.(bundle.data, indices.data));
    } catch (e) {
      const ended = this._ended(run);
      if (ended) return ended;
      problems.push(describe_client_error(e, "context", "Context refresh failed"));
    }

    this._enter_stage(run, "outbox_ready");
    try {
      const snapshot = await this._api.get_cycle_snapshot(tenant, cycle.display);
      const ended_snapshot = this._ended(run);
      if (ended_snapshot) return ended_snapshot;
      const outbox = await this._api.get_cycle_outbox(tenant, cycle.display);
      const ended = this._ended(run);
      if (ended) return ended;
      const messages = outbox.data || [];
      const outcomes = snapshot.data ? snapshot.data.outcomes : [];
      const last = outcomes[outcomes.length - 1] || { cycle_id: cycle.display, status };
      this._patch({ last_outcome: last });
      this._notify("on_cycle_snapshot", () => this._sink.on_cycle_snapshot?.(cycle, snapshot.data, messages));
      this.stages.complete("outbox_ready", `outbox ${messages.length} messages`);
    } catch (e) {
      const ended = this._ended(run);
      if (ended) return ended;
      const failure = describe_client_error(e, "snapshot", "Snapshot refresh failed");
      this.stages.fail("outbox_ready", failure.message);
      problems.push(failure);
    }

    if (problems.length === 0) {
      this.stages.complete("snapshot_refresh", `cycle ${cycle.display} status ${status}`);
      run.stage = null;
      return { kind: "completed", cycle, status, via, refresh_ok: true };
    }

    const message = `Refresh after cycle ${cycle.display} failed: ${problems.map((p) => p.message).join("; ")}`;
    this._fail(run, "snapshot_refresh", message, { ...problems[0], message });
    return { kind: "completed", cycle, status, via, refresh_ok: false };
  }

  private _open_stream(run: Run, cycle: CycleRef): StreamHandle {
    const url = this._api.cycle_stream_url(cycle.numeric);
    this._emit_log(run, { kind: "info", title: "Connecting cycle stream", preview: url });
    return this._stream.connect(
      url,
      {
        on_open: () => {
          run.channel.push({ type: "opened" });
        },
        on_message: (message) => {
          run.channel.push({ type: "event", event: classify_stream_message(message) });
        },
        on_error: (failure) => {
          run.channel.push({ type: "failure", failure });
        },
      },
      {
        ...this._connect_options,
        heartbeat_timeout_ms: this._config.sse_timeout_ms,
        headers: this._api.stream_headers(run.tenant_id),
      }
    );
  }

  private _enter_stage(run: Run, kind: OperationStageKind): void {
    run.stage = kind;
    this.stages.start(kind);
  }

  // Returns the terminal result when the run is no longer the active one.
  private _ended(run: Run): CycleRunResult | null {
    if (run.cancelled) return { kind: "cancelled", cycle: run.cycle };
    if (this._run !== run) return { kind: "superseded", cycle: run.cycle };
    return null;
  }

  private _supersede(run: Run): void {
    this._emit_log(run, { kind: "info", title: "Superseding the active cycle run", preview: `run ${run.seq}` });
    this._run = null;
    this._release(run);
  }

  private _close_stream(run: Run): void {
    const handle = run.handle;
    run.handle = null;
    if (handle) handle.close();
  }

  private _release(run: Run): void {
    this._close_stream(run);
    run.channel.close();
  }

  private _fail(run: Run, stage: OperationStageKind | null, message: string, failure?: OperationFailure): CycleRunResult {
    if (stage) this.stages.fail(stage, message);
    this.stages.fail_running(message);
    run.stage = null;
    this._patch({
      error: message,
      last_message: null,
      last_status: failure?.status ?? null,
      error_code: failure?.error_code ?? null,
      trace_id: failure?.trace_id ?? this.state.getState().trace_id,
      context: failure?.context ?? null,
      indices_used: failure?.indices ?? [],
      budget: failure?.budget ?? null,
    });
    this._emit_log(run, { kind: "error", title: "Cycle failed", preview: clamp_preview(message), data: failure });
    return { kind: "failed", cycle: run.cycle, stage, message };
  }

  private _fail_with_error(run: Run, stage: OperationStageKind, e: unknown, context: string, fallback: string): CycleRunResult {
    const failure = describe_client_error(e, context, fallback);
    return this._fail(run, stage, failure.message, failure);
  }

  private _patch(patch: Partial<OperationState>): void {
    this.state.setState(patch);
  }

  private _notify(name: keyof CycleViewSink, fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this._log.push_log({ kind: "error", title: `Cycle view ${name} failed`, preview: clamp_preview(error_message(e)) });
    }
  }

  private _emit_log(run: Run, item: ActivityLogInput): void {
    const cycle_id = run.cycle?.display;
    this._log.push_log(cycle_id ? { ...item, cycle_id } : item);
  }
}
