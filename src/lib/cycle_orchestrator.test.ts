import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ActivityLog } from "./activity_log";
import { resolve_console_config, type ConsoleConfigInput } from "./config";
import {
  CycleOrchestrator,
  classify_stream_message,
  complete_event_status,
  type CycleOrchestratorDeps,
  type CycleViewSink,
} from "./cycle_orchestrator";
import { ClientError } from "./errors";
import { StreamClient } from "./stream_client";
import { FakeCycleApi, FakeStreamTransport, deferred, until } from "./test_fakes";
import type { CycleSnapshot, OutboxMessage, TimelinePayload } from "./types";

const A1 = { display: "a1", numeric: "361", parsed: true };
const STREAM_URL = "http://stream.test/ace/cycles/361/stream";
const COMPLETED_PAYLOAD = JSON.stringify({ outcomes: [{ status: "completed" }] });

function setup(opts?: { config?: ConsoleConfigInput; deps?: Partial<CycleOrchestratorDeps> }) {
  const api = new FakeCycleApi();
  const transport = new FakeStreamTransport();
  const log = new ActivityLog();
  const config = resolve_console_config({ default_tenant_id: "t1", default_session_id: "s1", ...opts?.config });
  const orch = new CycleOrchestrator({ api, stream: new StreamClient(transport, { log }), config, log, ...opts?.deps });
  return { api, transport, log, orch };
}

function stage_rows(orch: CycleOrchestrator) {
  return orch.stages.get_snapshot().stages.map((s) => [s.kind, s.status, s.detail]);
}

describe("classify_stream_message", () => {
  it("maps event names to a closed set", () => {
    expect(classify_stream_message({ event_name: "pending", payload: "{}" })).toEqual({ type: "pending", payload: "{}" });
    expect(classify_stream_message({ event_name: "complete", payload: "" })).toEqual({ type: "complete", payload: "" });
    expect(classify_stream_message({ event_name: "timeout", payload: "" })).toEqual({ type: "timeout", payload: "" });
    expect(classify_stream_message({ payload: "tick" })).toEqual({ type: "progress", payload: "tick" });
    expect(classify_stream_message({ event_name: "heartbeat", payload: "" })).toEqual({ type: "other", name: "heartbeat", payload: "" });
  });
});

describe("complete_event_status", () => {
  it("reads outcomes first, then the schedule", () => {
    expect(complete_event_status(JSON.stringify({ schedule: { status: "running" }, outcomes: [{ status: "failed" }] }))).toBe("failed");
    expect(complete_event_status(JSON.stringify({ schedule: { status: "success" }, outcomes: [] }))).toBe("success");
  });

  it("treats opaque and empty payloads as completed", () => {
    expect(complete_event_status("")).toBe("completed");
    expect(complete_event_status("done")).toBe("completed");
    expect(complete_event_status("{}")).toBe("completed");
  });
});

describe("CycleOrchestrator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("completes after the stream retries and then delivers complete", async () => {
    const received: string[] = [];
    const sink: CycleViewSink = {
      on_dialogue_event: (ev) => received.push(`event ${ev.metadata.text}`),
      on_timeline: () => received.push("timeline"),
      on_context: (bundle, indices) => received.push(`context ${JSON.stringify(bundle)} ${JSON.stringify(indices)}`),
      on_cycle_snapshot: (cycle, _snapshot, outbox) => received.push(`snapshot ${cycle.display} ${outbox.length}`),
    };
    const { api, transport, orch } = setup({ deps: { sink } });

    const done = orch.trigger({ text: "plan the day" });
    expect(orch.is_running).toBe(true);
    await until(() => transport.connections.length === 1);
    expect(transport.last.url).toBe(STREAM_URL);

    transport.last.fail("connection refused");
    await vi.advanceTimersByTimeAsync(1_000);
    expect(transport.connections).toHaveLength(2);
    transport.last.fail("connection refused");
    await vi.advanceTimersByTimeAsync(2_000);
    transport.last.open();
    transport.last.emit("complete", COMPLETED_PAYLOAD);

    expect(await done).toEqual({ kind: "completed", cycle: A1, status: "completed", via: "stream", refresh_ok: true });
    expect(stage_rows(orch)).toEqual([
      ["trigger_submit", "completed", "status accepted"],
      ["stream_await", "completed", "completed"],
      ["snapshot_refresh", "completed", "cycle a1 status completed"],
      ["outbox_ready", "completed", "outbox 1 messages"],
    ]);
    expect(api.calls).toEqual([
      "post_dialogue_event t1",
      "get_timeline t1 limit=50 session=s1",
      "get_context_bundle t1 s1",
      "get_explain_indices t1",
      "get_cycle_snapshot t1 a1",
      "get_cycle_outbox t1 a1",
    ]);
    expect(received).toEqual([
      "event plan the day",
      "timeline",
      'context {"segments":[]} {"indices":["timeline"]}',
      "snapshot a1 1",
    ]);
    expect(orch.get_state()).toMatchObject({
      phase: "idle",
      is_running: false,
      error: null,
      trace_id: "trace-fake",
      last_cycle_id: "a1",
      last_message: "Cycle a1 completed",
      last_outcome: { cycle_id: "361", status: "completed" },
    });
    expect(transport.last.closed).toBe(true);
  });

  it("reports a dropped stream whose cycle is still running", async () => {
    const { api, transport, orch } = setup();
    api.snapshot = { data: { schedule: { status: "running" }, outcomes: [], outbox: [] } };

    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.open();
    transport.last.fail("connection reset");

    const message = "cycle a1 is still running, connection dropped (status running)";
    expect(await done).toEqual({ kind: "failed", cycle: A1, stage: "stream_await", message });
    expect(orch.stages.stage("stream_await")).toMatchObject({ status: "failed", detail: message });
    expect(orch.get_state()).toMatchObject({ error: message, is_running: false, phase: "idle" });
    expect(api.calls).toEqual(["post_dialogue_event t1", "get_cycle_snapshot t1 a1"]);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(transport.connections).toHaveLength(1);
  });

  it("fails on a timeout event without verifying", async () => {
    const { api, transport, orch } = setup();
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.open();
    transport.last.emit("pending", "{}");
    transport.last.emit("timeout", "{}");

    expect(await done).toEqual({ kind: "failed", cycle: A1, stage: "stream_await", message: "stream timeout" });
    expect(orch.stages.stage("stream_await")).toMatchObject({ status: "failed", detail: "stream timeout" });
    expect(api.calls).toEqual(["post_dialogue_event t1"]);
    expect(transport.last.closed).toBe(true);
  });

  it("ends in the same state whether completion came from the stream or verification", async () => {
    const by_stream = setup();
    const a = by_stream.orch.trigger({ text: "x" });
    await until(() => by_stream.transport.connections.length === 1);
    by_stream.transport.last.open();
    by_stream.transport.last.emit("complete", COMPLETED_PAYLOAD);
    const ra = await a;

    const by_poll = setup();
    const b = by_poll.orch.trigger({ text: "x" });
    await until(() => by_poll.transport.connections.length === 1);
    by_poll.transport.last.open();
    by_poll.transport.last.fail("network changed");
    const rb = await b;

    expect(ra).toMatchObject({ kind: "completed", via: "stream" });
    expect(rb).toMatchObject({ kind: "completed", via: "verification" });
    expect({ ...rb, via: "stream" }).toEqual(ra);
    expect(stage_rows(by_poll.orch)).toEqual(stage_rows(by_stream.orch));
    const pick = (o: CycleOrchestrator) => {
      const s = o.get_state();
      return [s.phase, s.is_running, s.error, s.last_cycle_id, s.last_message, s.last_outcome];
    };
    expect(pick(by_poll.orch)).toEqual(pick(by_stream.orch));
  });

  it("closes the previous stream before starting a new run", async () => {
    const { api, transport, orch } = setup();
    const first = orch.trigger({ text: "one" });
    await until(() => transport.connections.length === 1);
    transport.last.open();

    const second = orch.trigger({ text: "two" });
    expect(transport.journal).toEqual([`open#0 ${STREAM_URL}`, "close#0"]);
    expect(await first).toEqual({ kind: "superseded", cycle: A1 });

    await until(() => transport.connections.length === 2);
    expect(transport.journal).toEqual([`open#0 ${STREAM_URL}`, "close#0", `open#1 ${STREAM_URL}`]);
    expect(api.posted.map((e) => e.metadata.text)).toEqual(["one", "two"]);

    transport.last.open();
    transport.last.emit("complete", "");
    expect(await second).toMatchObject({ kind: "completed", status: "completed" });
    expect(orch.is_running).toBe(false);
  });

  it("authenticates the cycle stream for the run's tenant", async () => {
    const { api, transport, orch } = setup();
    api.stream_auth = { Authorization: "Bearer test-secret" };
    const done = orch.trigger({ text: "x", tenant_id: "t2" });
    await until(() => transport.connections.length === 1);

    expect(transport.last.headers).toEqual({ Authorization: "Bearer test-secret", "X-Tenant-Id": "t2" });
    transport.last.emit("complete", "");
    expect(await done).toMatchObject({ kind: "completed" });
  });

  it("drops refresh data that arrives after the run was superseded", async () => {
    const received: string[] = [];
    const sink: CycleViewSink = {
      on_timeline: (p) => received.push(`timeline ${JSON.stringify(p.items)}`),
      on_context: () => received.push("context"),
      on_cycle_snapshot: (cycle) => received.push(`snapshot ${cycle.display}`),
    };
    const { api, transport, orch } = setup({ deps: { sink } });
    const timeline = deferred<TimelinePayload | null>();
    api.timeline = { defer: () => timeline.promise };

    const first = orch.trigger({ text: "one" });
    await until(() => transport.connections.length === 1);
    transport.last.emit("complete", COMPLETED_PAYLOAD);
    await until(() => api.calls.includes("get_timeline t1 limit=50 session=s1"));

    api.timeline = { data: { items: [], awareness: [] } };
    const second = orch.trigger({ text: "two" });
    timeline.resolve({ items: ["stale"], awareness: [] });
    expect(await first).toEqual({ kind: "superseded", cycle: A1 });

    await until(() => transport.connections.length === 2);
    expect(received).toEqual([]);
    expect(stage_rows(orch)).toEqual([
      ["trigger_submit", "completed", "status accepted"],
      ["stream_await", "running", undefined],
      ["snapshot_refresh", "pending", undefined],
      ["outbox_ready", "pending", undefined],
    ]);

    transport.last.emit("complete", COMPLETED_PAYLOAD);
    expect(await second).toMatchObject({ kind: "completed", refresh_ok: true });
    expect(received).toEqual(["timeline []", "context", "snapshot a1"]);
  });

  it("ignores a verification that finishes after the run was superseded", async () => {
    const { api, transport, orch } = setup();
    const snapshot = deferred<CycleSnapshot | null>();
    api.snapshot = { defer: () => snapshot.promise };

    const first = orch.trigger({ text: "one" });
    await until(() => transport.connections.length === 1);
    transport.last.open();
    transport.last.fail("connection reset");
    await until(() => api.calls.includes("get_cycle_snapshot t1 a1"));

    const second = orch.trigger({ text: "two" });
    snapshot.resolve({ schedule: { status: "failed" }, outcomes: [], outbox: [] });
    expect(await first).toEqual({ kind: "superseded", cycle: A1 });

    await until(() => transport.connections.length === 2);
    expect(orch.get_state()).toMatchObject({ phase: "streaming", is_running: true, error: null });
    expect(orch.stages.stage("stream_await").status).toBe("running");

    expect(orch.cancel()).toBe(true);
    expect(await second).toEqual({ kind: "cancelled", cycle: A1 });
  });

  it("cancels during the context refresh without touching the view", async () => {
    const received: string[] = [];
    const sink: CycleViewSink = {
      on_context: () => received.push("context"),
      on_cycle_snapshot: (cycle) => received.push(`snapshot ${cycle.display}`),
    };
    const { api, transport, orch } = setup({ deps: { sink } });
    const indices = deferred<Record<string, unknown> | null>();
    api.explain_indices = { defer: () => indices.promise };

    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.emit("complete", COMPLETED_PAYLOAD);
    await until(() => api.calls.includes("get_explain_indices t1"));

    expect(orch.cancel()).toBe(true);
    indices.resolve({ indices: ["late"] });
    expect(await done).toEqual({ kind: "cancelled", cycle: A1 });
    expect(received).toEqual([]);
    expect(api.calls[api.calls.length - 1]).toBe("get_explain_indices t1");
    expect(stage_rows(orch)).toEqual([
      ["trigger_submit", "completed", "status accepted"],
      ["stream_await", "completed", "completed"],
      ["snapshot_refresh", "failed", "cancelled"],
      ["outbox_ready", "pending", undefined],
    ]);
  });

  it("fails every open stage when cancelled while the outbox loads", async () => {
    const { api, transport, orch } = setup();
    const outbox = deferred<OutboxMessage[] | null>();
    api.outbox = { defer: () => outbox.promise };

    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.emit("complete", COMPLETED_PAYLOAD);
    await until(() => api.calls.includes("get_cycle_outbox t1 a1"));

    expect(orch.cancel()).toBe(true);
    outbox.resolve([]);
    expect(await done).toEqual({ kind: "cancelled", cycle: A1 });
    expect(stage_rows(orch)).toEqual([
      ["trigger_submit", "completed", "status accepted"],
      ["stream_await", "completed", "completed"],
      ["snapshot_refresh", "failed", "cancelled"],
      ["outbox_ready", "failed", "cancelled"],
    ]);
    expect(orch.stages.get_snapshot().current_stage).toBeNull();
    expect(orch.get_state()).toMatchObject({ is_running: false, phase: "idle", last_message: "Cycle cancelled", last_outcome: null });
  });

  it("keeps waiting through a heartbeat reconnect", async () => {
    const { transport, log, orch } = setup({ config: { sse_timeout_ms: 10_000 } });
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.open();

    await vi.advanceTimersByTimeAsync(15_000);
    await until(() => log.items.some((i) => i.title === "Cycle stream heartbeat lapsed"));
    const lapse = log.items.find((i) => i.title === "Cycle stream heartbeat lapsed");
    expect(lapse?.preview).toBe("heartbeat timeout; retry 1 in 1000ms");
    expect(orch.stages.stage("stream_await").status).toBe("running");
    expect(orch.get_state().error).toBeNull();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(transport.connections).toHaveLength(2);
    transport.last.open();
    transport.last.emit("complete", COMPLETED_PAYLOAD);
    expect(await done).toMatchObject({ kind: "completed", via: "stream", refresh_ok: true });
  });

  it("shows progress text and ignores unknown events", async () => {
    const { transport, log, orch } = setup();
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.open();
    transport.last.emit(undefined, "step 2 of 3");
    await until(() => orch.get_state().last_message === "Cycle a1: step 2 of 3");
    transport.last.emit("pending", "{}");
    await until(() => orch.get_state().last_message === "Cycle a1 pending");
    transport.last.emit("lane_changed", "{}");
    await until(() => log.items.some((i) => i.title === 'Ignoring cycle stream event "lane_changed"'));
    expect(orch.stages.stage("stream_await").status).toBe("running");

    transport.last.emit("complete", COMPLETED_PAYLOAD);
    expect(await done).toMatchObject({ kind: "completed" });
  });

  it("cancels the active run", async () => {
    const { transport, orch } = setup();
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.open();

    expect(orch.cancel()).toBe(true);
    expect(orch.cancel()).toBe(false);
    expect(await done).toEqual({ kind: "cancelled", cycle: A1 });
    expect(orch.stages.stage("stream_await")).toMatchObject({ status: "failed", detail: "cancelled" });
    expect(orch.get_state()).toMatchObject({ is_running: false, phase: "idle", last_message: "Cycle cancelled" });
    expect(transport.last.closed).toBe(true);
  });

  it("records diagnostics and opens no stream when the trigger fails", async () => {
    const { api, transport, orch } = setup();
    api.trigger = {
      error: new ClientError("api", "post_dialogue_event failed: 429 budget_exceeded: over budget", {
        status: 429,
        code: "budget_exceeded",
        trace_id: "tr-1",
        details: { indices_used: ["timeline"], tokens_spent: 12, tokens_allowed: 10 },
      }),
    };

    const message = "post_dialogue_event failed: 429 budget_exceeded: over budget · rate limited: retry later or raise the quota · trace_id tr-1";
    expect(await orch.trigger({ text: "x" })).toEqual({ kind: "failed", cycle: null, stage: "trigger_submit", message });
    expect(orch.get_state()).toMatchObject({
      error: message,
      last_status: 429,
      error_code: "budget_exceeded",
      trace_id: "tr-1",
      context: "trigger",
      indices_used: ["timeline"],
      budget: "tokens 12/10",
      is_running: false,
    });
    expect(stage_rows(orch).map((r) => r[1])).toEqual(["failed", "pending", "pending", "pending"]);
    expect(transport.connections).toHaveLength(0);
  });

  it("fails when the trigger response has no data", async () => {
    const { api, transport, orch } = setup();
    api.trigger = { data: null };
    const result = await orch.trigger({ text: "x" });
    expect(result).toEqual({ kind: "failed", cycle: null, stage: "trigger_submit", message: "trigger endpoint returned no data" });
    expect(orch.get_state().trace_id).toBe("trace-fake");
    expect(transport.connections).toHaveLength(0);
  });

  it("rejects an unsupported runtime before submitting", async () => {
    const { api, transport, orch } = setup();
    transport.supported = false;
    const result = await orch.trigger({ text: "x" });
    expect(result).toEqual({
      kind: "failed",
      cycle: null,
      stage: null,
      message: "Cycle streaming is unsupported in this runtime; nothing was submitted",
    });
    expect(api.calls).toEqual([]);
  });

  it("requires a tenant", async () => {
    const { api, orch } = setup({ config: { default_tenant_id: "" } });
    const result = await orch.trigger({ text: "x" });
    expect(result).toMatchObject({ kind: "failed", message: "Select a tenant before triggering a cycle" });
    expect(api.calls).toEqual([]);
  });

  it("prefers explicit params over the session provider and config", async () => {
    const { api, transport, orch } = setup({ deps: { session: () => ({ tenant_id: "t9", session_id: "s9" }) } });
    const done = orch.trigger({ text: "x", tenant_id: "t2" });
    await until(() => transport.connections.length === 1);
    expect(api.calls[0]).toBe("post_dialogue_event t2");
    expect(api.posted[0].session_id).toBe("s9");
    orch.cancel();
    await done;
  });

  it("streams by numeric id when the trigger returns a number", async () => {
    const { api, transport, orch } = setup();
    api.trigger = { data: { cycle_id: 361, status: "accepted" } };
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    expect(transport.last.url).toBe(STREAM_URL);
    expect(orch.get_state().last_cycle_id).toBe("a1");
    orch.cancel();
    expect(await done).toEqual({ kind: "cancelled", cycle: A1 });
  });

  it("passes an unparsable id through and warns", async () => {
    const { api, transport, log, orch } = setup();
    api.trigger = { data: { cycle_id: "cycle#7", status: "accepted" } };
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    expect(transport.last.url).toBe("http://stream.test/ace/cycles/cycle#7/stream");
    expect(log.items.some((i) => i.title === "Cycle id is not base-36; using it verbatim" && i.preview === "cycle#7")).toBe(true);
    transport.last.emit("timeout", "");
    expect(await done).toMatchObject({ kind: "failed", cycle: { display: "cycle#7", numeric: "cycle#7", parsed: false } });
  });

  it("keeps the completion but flags a failed refresh", async () => {
    const { api, transport, orch } = setup();
    api.outbox = { error: new ClientError("transport", "get_cycle_outbox failed: fetch failed") };
    const done = orch.trigger({ text: "x" });
    await until(() => transport.connections.length === 1);
    transport.last.emit("complete", COMPLETED_PAYLOAD);

    expect(await done).toEqual({ kind: "completed", cycle: A1, status: "completed", via: "stream", refresh_ok: false });
    const outbox_detail = "Snapshot refresh failed: get_cycle_outbox failed: fetch failed";
    const refresh_detail = `Refresh after cycle a1 failed: ${outbox_detail}`;
    expect(stage_rows(orch)).toEqual([
      ["trigger_submit", "completed", "status accepted"],
      ["stream_await", "completed", "completed"],
      ["snapshot_refresh", "failed", refresh_detail],
      ["outbox_ready", "failed", outbox_detail],
    ]);
    expect(orch.get_state().error).toBe(refresh_detail);
  });

  it("surfaces unexpected failures and still releases the run", async () => {
    const { orch } = setup({
      deps: {
        session: () => {
          throw new Error("store gone");
        },
      },
    });
    const result = await orch.trigger({ text: "x" });
    expect(result).toEqual({ kind: "failed", cycle: null, stage: null, message: "Unexpected cycle runner failure: store gone" });
    expect(orch.get_state()).toMatchObject({ is_running: false, phase: "idle", error: "Unexpected cycle runner failure: store gone" });
  });
});
