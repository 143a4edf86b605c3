export type ClientErrorKind = "transport" | "timeout" | "decode" | "api" | "empty_response" | "unexpected_status";

export type ClientErrorInit = {
  status?: number;
  code?: string;
  details?: unknown;
  trace_id?: string;
  body?: string;
  cause?: unknown;
};

// Failure of one call through the envelope client, classified by where it broke.
export class ClientError extends Error {
  readonly kind: ClientErrorKind;
  readonly status?: number;
  readonly code?: string;
  readonly details?: unknown;
  readonly trace_id?: string;
  readonly body?: string;

  constructor(kind: ClientErrorKind, message: string, init?: ClientErrorInit) {
    super(message, init?.cause === undefined ? undefined : { cause: init.cause });
    this.name = "ClientError";
    this.kind = kind;
    this.status = init?.status;
    this.code = init?.code;
    this.details = init?.details;
    this.trace_id = init?.trace_id;
    this.body = init?.body;
  }

  /** Structured error details, only present on api errors. */
  trace_context(): unknown {
    return this.kind === "api" ? this.details : undefined;
  }

  is_not_found(): boolean {
    if (this.status === 404) return true;
    const code = String(this.code || "").toLowerCase();
    return code.includes("not_found") || code.includes("notfound");
  }
}

export function error_message(e: unknown): string {
  if (e instanceof Error) return e.message || e.name || "unknown error";
  const s = String(e ?? "").trim();
  return s || "unknown error";
}

export function is_not_found_error(e: unknown): boolean {
  if (e instanceof ClientError) return e.is_not_found();
  const msg = error_message(e).toLowerCase();
  return /\b404\b/.test(msg) || msg.includes("not found");
}
