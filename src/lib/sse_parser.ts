export type SseEvent = {
  id?: string;
  event?: string;
  data: string;
  retry?: number;
};

type PendingEvent = { id?: string; event?: string; retry?: number; data_lines: string[] };

// Incremental SSE parser for fetch streaming.
// Parses "event:", "id:", "data:" and "retry:"; dispatches on blank line.
export class SseParser {
  private _buffer = "";
  private _started = false;
  private _current: PendingEvent = { data_lines: [] };

  push(chunk: string, on_event: (ev: SseEvent) => void): void {
    this._buffer += chunk;
    if (!this._started && this._buffer.length > 0) {
      this._started = true;
      if (this._buffer.charCodeAt(0) === 0xfeff) this._buffer = this._buffer.slice(1);
    }

    while (true) {
      const idx = this._buffer.indexOf("\n");
      if (idx === -1) return;
      const raw_line = this._buffer.slice(0, idx);
      this._buffer = this._buffer.slice(idx + 1);
      this._line(raw_line.endsWith("\r") ? raw_line.slice(0, -1) : raw_line, on_event);
    }
  }

  /** Dispatches a trailing event when the stream ends without a blank line. */
  flush(on_event: (ev: SseEvent) => void): void {
    if (this._buffer) {
      const rest = this._buffer;
      this._buffer = "";
      this._line(rest.endsWith("\r") ? rest.slice(0, -1) : rest, on_event);
    }
    this._dispatch(on_event);
  }

  private _line(line: string, on_event: (ev: SseEvent) => void): void {
    // Comment / keep-alive.
    if (line.startsWith(":")) return;

    if (line === "") {
      this._dispatch(on_event);
      return;
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "id") {
      this._current.id = value;
    } else if (field === "event") {
      this._current.event = value;
    } else if (field === "data") {
      this._current.data_lines.push(value);
    } else if (field === "retry") {
      const n = Number(value);
      if (/^\d+$/.test(value) && Number.isFinite(n)) this._current.retry = n;
    }
  }

  private _dispatch(on_event: (ev: SseEvent) => void): void {
    const cur = this._current;
    this._current = { data_lines: [] };
    if (cur.data_lines.length === 0 && !cur.event && !cur.id) return;
    const ev: SseEvent = { data: cur.data_lines.join("\n") };
    if (cur.id !== undefined) ev.id = cur.id;
    if (cur.event) ev.event = cur.event;
    if (cur.retry !== undefined) ev.retry = cur.retry;
    on_event(ev);
  }
}
