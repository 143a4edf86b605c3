import { clamp_preview, noop_logger, type ActivityLogger } from "./activity_log";
import { error_message } from "./errors";
import { SseParser, type SseEvent } from "./sse_parser";

export type StreamMessage = {
  event_name?: string;
  payload: string;
  id?: string;
};

export type StreamFailureKind = "connect_failed" | "disconnected" | "heartbeat_timeout";

export type StreamFailure = {
  kind: StreamFailureKind;
  reason: string;
  attempt: number;
  retry_in_ms: number;
};

export type StreamCallbacks = {
  on_open?: () => void;
  on_message: (message: StreamMessage) => void;
  on_error?: (failure: StreamFailure) => void;
};

export type ConnectOptions = {
  heartbeat_timeout_ms: number;
  retry_base_ms: number;
  retry_max_ms: number;
};

export const DEFAULT_CONNECT_OPTIONS: ConnectOptions = {
  heartbeat_timeout_ms: 30_000,
  retry_base_ms: 1_000,
  retry_max_ms: 10_000,
};

const MIN_HEARTBEAT_TIMEOUT_MS = 5_000;
const MIN_RETRY_BASE_MS = 500;
const MIN_RETRY_MAX_MS = 1_000;

export type ConnectionState = "idle" | "connecting" | "open" | "reconnecting" | "closed";

export type StreamConnectErrorKind = "invalid_url" | "invalid_options" | "unsupported";

export class StreamConnectError extends Error {
  readonly kind: StreamConnectErrorKind;

  constructor(kind: StreamConnectErrorKind, message: string) {
    super(message);
    this.name = "StreamConnectError";
    this.kind = kind;
  }
}

export type TransportListeners = {
  on_open: () => void;
  on_event: (ev: SseEvent) => void;
  on_error: (reason: string) => void;
};

export type TransportConnection = { close(): void };

/** One physical push connection per `open` call. */
export interface StreamTransport {
  is_supported(): boolean;
  open(url: string, listeners: TransportListeners, headers?: Record<string, string>): TransportConnection;
}

export type FetchStreamTransportConfig = {
  headers?: Record<string, string> | (() => Record<string, string>);
  fetch_impl?: typeof fetch;
};

export class FetchStreamTransport implements StreamTransport {
  private _cfg: FetchStreamTransportConfig;

  constructor(cfg: FetchStreamTransportConfig = {}) {
    this._cfg = cfg;
  }

  is_supported(): boolean {
    const has_fetch = typeof this._cfg.fetch_impl === "function" || typeof fetch === "function";
    return has_fetch && typeof ReadableStream !== "undefined" && typeof TextDecoder !== "undefined";
  }

  open(url: string, listeners: TransportListeners, headers?: Record<string, string>): TransportConnection {
    const abort = new AbortController();
    this._pump(url, listeners, { ...this._headers(), ...(headers || {}) }, abort.signal).catch((e: unknown) => {
      if (abort.signal.aborted) return;
      listeners.on_error(`stream read failed: ${error_message(e)}`);
    });
    return { close: () => abort.abort() };
  }

  private _headers(): Record<string, string> {
    const h = this._cfg.headers;
    return typeof h === "function" ? h() : { ...(h || {}) };
  }

  private async _pump(url: string, listeners: TransportListeners, headers: Record<string, string>, signal: AbortSignal): Promise<void> {
    const fetch_impl = this._cfg.fetch_impl || fetch;
    const r = await fetch_impl(url, {
      headers: {
        Accept: "text/event-stream",
        ...headers,
      },
      cache: "no-store",
      signal,
    });
    if (signal.aborted) return;
    if (!r.ok) {
      listeners.on_error(`stream request failed: ${r.status}`);
      return;
    }
    if (!r.body) {
      listeners.on_error("stream response body is missing");
      return;
    }
    listeners.on_open();

    const reader = r.body.getReader();
    const decoder = new TextDecoder("utf-8");
    const parser = new SseParser();

    while (true) {
      const { value, done } = await reader.read();
      if (signal.aborted) return;
      if (done) {
        parser.flush(listeners.on_event);
        listeners.on_error("stream closed by server");
        return;
      }
      parser.push(decoder.decode(value, { stream: true }), listeners.on_event);
    }
  }
}

/** Returns the delay to use now and the backoff to use after it. */
export function next_backoff(current_ms: number, max_ms: number): { delay_ms: number; next_ms: number } {
  const delay_ms = Math.min(current_ms, max_ms);
  return { delay_ms, next_ms: Math.min(delay_ms * 2, max_ms) };
}

export function normalize_connect_options(input?: Partial<ConnectOptions>): ConnectOptions {
  const merged: ConnectOptions = { ...DEFAULT_CONNECT_OPTIONS };
  for (const key of ["heartbeat_timeout_ms", "retry_base_ms", "retry_max_ms"] as const) {
    const v = input?.[key];
    if (v === undefined) continue;
    if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
      throw new StreamConnectError("invalid_options", `${key} must be a positive duration`);
    }
    merged[key] = Math.floor(v);
  }
  const retry_base_ms = Math.max(MIN_RETRY_BASE_MS, merged.retry_base_ms);
  return {
    heartbeat_timeout_ms: Math.max(MIN_HEARTBEAT_TIMEOUT_MS, merged.heartbeat_timeout_ms),
    retry_base_ms,
    retry_max_ms: Math.max(MIN_RETRY_MAX_MS, retry_base_ms, merged.retry_max_ms),
  };
}

export interface StreamHandle {
  readonly url: string;
  readonly state: ConnectionState;
  readonly closed: boolean;
  close(): void;
}

class StreamConnection implements StreamHandle {
  readonly url: string;
  private _callbacks: StreamCallbacks;
  private _options: ConnectOptions;
  private _headers: Record<string, string>;
  private _transport: StreamTransport;
  private _log: ActivityLogger;

  private _state: ConnectionState = "idle";
  private _conn: TransportConnection | null = null;
  private _generation = 0;
  private _reconnect_timer: ReturnType<typeof setTimeout> | null = null;
  private _heartbeat_timer: ReturnType<typeof setInterval> | null = null;
  private _last_activity_ms = 0;
  private _backoff_ms: number;
  private _attempt = 0;
  private _detach_signal: (() => void) | null = null;

  constructor(
    url: string,
    callbacks: StreamCallbacks,
    options: ConnectOptions,
    headers: Record<string, string>,
    transport: StreamTransport,
    log: ActivityLogger
  ) {
    this.url = url;
    this._callbacks = callbacks;
    this._options = options;
    this._headers = headers;
    this._transport = transport;
    this._log = log;
    this._backoff_ms = options.retry_base_ms;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get closed(): boolean {
    return this._state === "closed";
  }

  bind_signal(signal: AbortSignal): void {
    if (signal.aborted) {
      this.close();
      return;
    }
    const on_abort = () => this.close();
    signal.addEventListener("abort", on_abort, { once: true });
    this._detach_signal = () => signal.removeEventListener("abort", on_abort);
  }

  open(): void {
    if (this.closed) return;
    this._state = "connecting";
    const gen = ++this._generation;
    let conn: TransportConnection;
    try {
      conn = this._transport.open(
        this.url,
        {
          on_open: () => this._on_open(gen),
          on_event: (ev) => this._on_event(gen, ev),
          on_error: (reason) => this._on_transport_error(gen, reason),
        },
        { ...this._headers }
      );
    } catch (e) {
      this._on_transport_error(gen, `stream connect failed: ${error_message(e)}`);
      return;
    }
    // A transport that failed synchronously has already been replaced or closed.
    if (gen !== this._generation || this.closed) {
      this._close_quietly(conn);
      return;
    }
    this._conn = conn;
  }

  close(): void {
    if (this.closed) return;
    this._state = "closed";
    this._generation++;
    this._clear_reconnect();
    this._stop_heartbeat();
    this._release_transport();
    if (this._detach_signal) {
      this._detach_signal();
      this._detach_signal = null;
    }
  }

  private _on_open(gen: number): void {
    if (gen !== this._generation || this.closed) return;
    this._state = "open";
    this._backoff_ms = this._options.retry_base_ms;
    this._attempt = 0;
    this._last_activity_ms = Date.now();
    this._start_heartbeat();
    this._emit("on_open", () => this._callbacks.on_open?.());
  }

  private _on_event(gen: number, ev: SseEvent): void {
    if (gen !== this._generation || this.closed) return;
    this._last_activity_ms = Date.now();
    const message: StreamMessage = { payload: ev.data };
    const name = (ev.event || "").trim();
    if (name) message.event_name = name;
    if (ev.id !== undefined) message.id = ev.id;
    this._emit("on_message", () => this._callbacks.on_message(message));
  }

  private _on_transport_error(gen: number, reason: string): void {
    if (gen !== this._generation || this.closed) return;
    this._restart(this._state === "open" ? "disconnected" : "connect_failed", reason);
  }

  // Tear down the current transport and retry after the current backoff.
  // Heartbeat lapses wait out the same delay before reopening.
  private _restart(kind: StreamFailure["kind"], reason: string): void {
    this._generation++;
    this._stop_heartbeat();
    this._release_transport();
    this._state = "reconnecting";

    const { delay_ms, next_ms } = next_backoff(this._backoff_ms, this._options.retry_max_ms);
    this._backoff_ms = next_ms;
    this._attempt += 1;

    const failure: StreamFailure = { kind, reason, attempt: this._attempt, retry_in_ms: delay_ms };
    this._emit("on_error", () => this._callbacks.on_error?.(failure));
    // The error callback may have closed us.
    if (this.closed) return;

    this._clear_reconnect();
    this._reconnect_timer = setTimeout(() => {
      this._reconnect_timer = null;
      this.open();
    }, delay_ms);
  }

  private _start_heartbeat(): void {
    this._stop_heartbeat();
    const timeout_ms = this._options.heartbeat_timeout_ms;
    this._heartbeat_timer = setInterval(() => {
      if (this._state !== "open") return;
      if (Date.now() - this._last_activity_ms > timeout_ms) {
        this._restart("heartbeat_timeout", "heartbeat timeout");
      }
    }, Math.floor(timeout_ms / 2));
  }

  private _stop_heartbeat(): void {
    if (this._heartbeat_timer !== null) clearInterval(this._heartbeat_timer);
    this._heartbeat_timer = null;
  }

  private _clear_reconnect(): void {
    if (this._reconnect_timer !== null) clearTimeout(this._reconnect_timer);
    this._reconnect_timer = null;
  }

  private _release_transport(): void {
    const conn = this._conn;
    this._conn = null;
    if (conn) this._close_quietly(conn);
  }

  private _close_quietly(conn: TransportConnection): void {
    try {
      conn.close();
    } catch (e) {
      this._log.push_log({ kind: "warn", title: "Stream transport close failed", preview: clamp_preview(error_message(e)) });
    }
  }

  private _emit(name: keyof StreamCallbacks, fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this._log.push_log({
        kind: "error",
        title: `Stream ${name} callback failed`,
        preview: clamp_preview(error_message(e)),
        data: { url: this.url },
      });
    }
  }
}

/** Manages one push-event connection per `connect` call. */
export class StreamClient {
  private _transport: StreamTransport;
  private _log: ActivityLogger;

  constructor(transport: StreamTransport = new FetchStreamTransport(), opts?: { log?: ActivityLogger }) {
    this._transport = transport;
    this._log = opts?.log || noop_logger;
  }

  is_supported(): boolean {
    return this._transport.is_supported();
  }

  connect(
    url: string,
    callbacks: StreamCallbacks,
    options?: Partial<ConnectOptions> & { signal?: AbortSignal; headers?: Record<string, string> }
  ): StreamHandle {
    const u = String(url || "").trim();
    if (!u) throw new StreamConnectError("invalid_url", "stream url is empty");
    if (!this._transport.is_supported()) {
      throw new StreamConnectError("unsupported", "server-sent event streaming is not available in this runtime");
    }
    const normalized = normalize_connect_options(options);
    const conn = new StreamConnection(u, callbacks, normalized, options?.headers || {}, this._transport, this._log);
    if (options?.signal) conn.bind_signal(options.signal);
    conn.open();
    return conn;
  }
}
