import { z } from "zod";

import { clamp_preview } from "./activity_log";
import { auth_headers, stream_endpoint, trim_base_url, type ConsoleConfig } from "./config";
import type { DialogueEvent } from "./dialogue";
import { ClientError, error_message } from "./errors";
import {
  ApiEnvelopeSchema,
  CycleSnapshotSchema,
  CycleTriggerResponseSchema,
  OpaqueObjectSchema,
  OutboxListSchema,
  TimelinePayloadSchema,
} from "./schemas";
import type { ApiEnvelope, CycleSnapshot, CycleTriggerResponse, OutboxMessage, TimelinePayload, TimelineQuery } from "./types";

/** The backend calls the cycle workflow depends on. */
export interface CycleApi {
  post_dialogue_event(tenant_id: string, event: DialogueEvent): Promise<ApiEnvelope<CycleTriggerResponse>>;
  get_cycle_snapshot(tenant_id: string, cycle_id: string): Promise<ApiEnvelope<CycleSnapshot>>;
  get_cycle_outbox(tenant_id: string, cycle_id: string): Promise<ApiEnvelope<OutboxMessage[]>>;
  get_timeline(tenant_id: string, query: TimelineQuery): Promise<ApiEnvelope<TimelinePayload>>;
  get_context_bundle(tenant_id: string, session_id?: string): Promise<ApiEnvelope<Record<string, unknown>>>;
  get_explain_indices(tenant_id: string): Promise<ApiEnvelope<Record<string, unknown>>>;
  cycle_stream_url(numeric_cycle_id: string): string;
  stream_headers(tenant_id?: string): Record<string, string>;
}

type Method = "GET" | "POST";

type SendRequest = {
  method: Method;
  path: string;
  tenant_id?: string;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
};

type RawResponse = { status: number; ok: boolean; text: string };

function _join(base_url: string, path: string): string {
  const base = trim_base_url(base_url);
  const p = path.replace(/^\/+/, "");
  if (!base) return `/${p}`;
  return `${base}/${p}`;
}

function _seg(value: string): string {
  return encodeURIComponent(String(value || "").trim());
}

function _zod_issues(err: z.ZodError): string {
  return err.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export class ConsoleClient implements CycleApi {
  private _cfg: ConsoleConfig;
  private _fetch: typeof fetch;

  constructor(cfg: ConsoleConfig, opts?: { fetch_impl?: typeof fetch }) {
    this._cfg = cfg;
    this._fetch = opts?.fetch_impl || ((input, init) => fetch(input, init));
  }

  get config(): ConsoleConfig {
    return this._cfg;
  }

  async post_dialogue_event(tenant_id: string, event: DialogueEvent): Promise<ApiEnvelope<CycleTriggerResponse>> {
    return await this._send(
      "post_dialogue_event",
      { method: "POST", path: `tenants/${_seg(tenant_id)}/dialogue-events`, tenant_id, body: event },
      CycleTriggerResponseSchema
    );
  }

  async get_cycle_snapshot(tenant_id: string, cycle_id: string): Promise<ApiEnvelope<CycleSnapshot>> {
    return await this._send(
      "get_cycle_snapshot",
      { method: "GET", path: `tenants/${_seg(tenant_id)}/ace/cycles/${_seg(cycle_id)}`, tenant_id },
      CycleSnapshotSchema
    );
  }

  async get_cycle_outbox(tenant_id: string, cycle_id: string): Promise<ApiEnvelope<OutboxMessage[]>> {
    return await this._send(
      "get_cycle_outbox",
      { method: "GET", path: `tenants/${_seg(tenant_id)}/ace/cycles/${_seg(cycle_id)}/outbox`, tenant_id },
      OutboxListSchema
    );
  }

  async get_timeline(tenant_id: string, query: TimelineQuery): Promise<ApiEnvelope<TimelinePayload>> {
    return await this._send(
      "get_timeline",
      {
        method: "GET",
        path: `tenants/${_seg(tenant_id)}/graph/timeline`,
        tenant_id,
        query: { limit: query.limit, session_id: query.session_id, scenario: query.scenario, cursor: query.cursor },
      },
      TimelinePayloadSchema
    );
  }

  async get_context_bundle(tenant_id: string, session_id?: string): Promise<ApiEnvelope<Record<string, unknown>>> {
    return await this._send(
      "get_context_bundle",
      { method: "GET", path: `tenants/${_seg(tenant_id)}/context/bundle`, tenant_id, query: { session_id } },
      OpaqueObjectSchema
    );
  }

  async get_explain_indices(tenant_id: string): Promise<ApiEnvelope<Record<string, unknown>>> {
    return await this._send(
      "get_explain_indices",
      { method: "GET", path: `tenants/${_seg(tenant_id)}/explain/indices`, tenant_id },
      OpaqueObjectSchema
    );
  }

  cycle_stream_url(numeric_cycle_id: string): string {
    return _join(stream_endpoint(this._cfg), `ace/cycles/${_seg(numeric_cycle_id)}/stream`);
  }

  /** Headers for the cycle stream request; the tenant falls back to the configured default. */
  stream_headers(tenant_id?: string): Record<string, string> {
    const h: Record<string, string> = { ...auth_headers(this._cfg.auth_token) };
    const tenant = String(tenant_id || "").trim() || this._cfg.default_tenant_id;
    if (tenant) h["X-Tenant-Id"] = tenant;
    return h;
  }

  private _url(path: string, query?: SendRequest["query"]): string {
    const url = _join(this._cfg.api_base_url, path);
    if (!query) return url;
    const qs = new URLSearchParams();
    for (const [k, v] of Object.entries(query)) {
      if (v === undefined) continue;
      const s = String(v).trim();
      if (s) qs.set(k, s);
    }
    const q = qs.toString();
    return q ? `${url}?${q}` : url;
  }

  private _headers(req: SendRequest): Record<string, string> {
    const h: Record<string, string> = {
      Accept: "application/json",
      ...auth_headers(this._cfg.auth_token),
    };
    if (req.body !== undefined) h["Content-Type"] = "application/json";
    const tenant = String(req.tenant_id || "").trim() || this._cfg.default_tenant_id;
    if (tenant) h["X-Tenant-Id"] = tenant;
    return h;
  }

  private async _fetch_text(op: string, req: SendRequest): Promise<RawResponse> {
    const timeout_ms = this._cfg.request_timeout_ms;
    const abort = new AbortController();
    const timer = setTimeout(() => abort.abort(), timeout_ms);
    try {
      const r = await this._fetch(this._url(req.path, req.query), {
        method: req.method,
        headers: this._headers(req),
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: abort.signal,
      });
      const text = await r.text();
      return { status: r.status, ok: r.ok, text };
    } catch (e) {
      if (abort.signal.aborted) {
        throw new ClientError("timeout", `${op} failed: no response within ${timeout_ms}ms`, { cause: e });
      }
      throw new ClientError("transport", `${op} failed: ${error_message(e)}`, { cause: e });
    } finally {
      clearTimeout(timer);
    }
  }

  // One request through the `{success, data, error, trace_id}` envelope.
  private async _send<T>(op: string, req: SendRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ApiEnvelope<T>> {
    const r = await this._fetch_text(op, req);
    if (!r.text.trim()) {
      throw new ClientError("empty_response", `${op} failed: empty response body (${r.status})`, { status: r.status });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(r.text);
    } catch (e) {
      throw new ClientError("decode", `${op} failed: response is not JSON (${r.status})`, {
        status: r.status,
        body: clamp_preview(r.text),
        cause: e,
      });
    }

    const env = ApiEnvelopeSchema.safeParse(raw);
    if (!env.success) {
      throw new ClientError("decode", `${op} failed: malformed envelope: ${_zod_issues(env.error)}`, {
        status: r.status,
        body: clamp_preview(r.text),
      });
    }
    const trace_id = env.data.trace_id ?? null;
    const duration_ms = env.data.duration_ms ?? null;

    if (r.ok && env.data.success) {
      const data = env.data.data;
      if (data === undefined || data === null) {
        return { success: true, data: null, error: null, trace_id, duration_ms };
      }
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        throw new ClientError("decode", `${op} failed: unexpected data: ${_zod_issues(parsed.error)}`, {
          status: r.status,
          trace_id: trace_id ?? undefined,
        });
      }
      return { success: true, data: parsed.data, error: null, trace_id, duration_ms };
    }

    const err = env.data.error;
    if (err) {
      throw new ClientError("api", `${op} failed: ${r.status} ${err.code}: ${err.message}`, {
        status: r.status,
        code: err.code,
        details: err.details,
        trace_id: trace_id ?? undefined,
      });
    }
    throw new ClientError("unexpected_status", `${op} failed: unexpected status ${r.status}`, {
      status: r.status,
      body: clamp_preview(r.text),
      trace_id: trace_id ?? undefined,
    });
  }
}
