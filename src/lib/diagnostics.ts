import { ClientError, error_message } from "./errors";

export type OperationFailure = {
  message: string;
  context: string;
  status?: number;
  trace_id?: string;
  error_code?: string;
  indices: string[];
  budget?: string;
};

function is_record(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function normalized_key(key: string): string {
  return key.trim().replace(/-/g, "_").toLowerCase();
}

function push_unique(acc: string[], text: string): void {
  const lower = text.toLowerCase();
  if (!acc.some((existing) => existing.toLowerCase() === lower)) acc.push(text);
}

/** Collects index names from any `indices` / `indices_used` field in structured error details. */
export function extract_indices_from_details(details: unknown): string[] {
  const acc: string[] = [];
  const visit = (value: unknown) => {
    if (Array.isArray(value)) {
      for (const item of value) visit(item);
      return;
    }
    if (!is_record(value)) return;
    for (const [key, entry] of Object.entries(value)) {
      const k = normalized_key(key);
      if (k !== "indices_used" && k !== "indices") {
        visit(entry);
        continue;
      }
      if (Array.isArray(entry)) {
        for (const item of entry) if (typeof item === "string") push_unique(acc, item);
      } else if (typeof entry === "string") {
        push_unique(acc, entry);
      }
    }
  };
  visit(details);
  return acc;
}

function _count(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0 ? v : undefined;
}

function _pair(a: number | undefined, b: number | undefined, unit = ""): string {
  const l = a === undefined ? "-" : `${a}`;
  const r = b === undefined ? "-" : `${b}`;
  return `${l}${unit}/${r}${unit}`;
}

/** Formats token/walltime budget usage found anywhere in error details, e.g. "tokens 900/800 · wall 12ms/-". */
export function extract_budget_hint(details: unknown): string | undefined {
  const visit = (value: unknown): string | undefined => {
    if (Array.isArray(value)) {
      for (const item of value) {
        const found = visit(item);
        if (found) return found;
      }
      return undefined;
    }
    if (!is_record(value)) return undefined;

    const tokens_spent = _count(value.tokens_spent);
    const tokens_allowed = _count(value.tokens_allowed);
    const wall_used = _count(value.walltime_ms_used);
    const wall_allowed = _count(value.walltime_ms_allowed);
    const parts: string[] = [];
    if (tokens_spent !== undefined || tokens_allowed !== undefined) parts.push(`tokens ${_pair(tokens_spent, tokens_allowed)}`);
    if (wall_used !== undefined || wall_allowed !== undefined) parts.push(`wall ${_pair(wall_used, wall_allowed, "ms")}`);
    if (parts.length) return parts.join(" · ");

    for (const entry of Object.values(value)) {
      const found = visit(entry);
      if (found) return found;
    }
    return undefined;
  };
  return visit(details);
}

export function http_status_advice(status: number): string | undefined {
  switch (status) {
    case 401:
      return "unauthorized: the token is missing or expired";
    case 403:
      return "forbidden: check the tenant's permissions and roles";
    case 409:
      return "conflict: possibly a duplicate submission, refresh the timeline or bump sequence_number";
    case 429:
      return "rate limited: retry later or raise the quota";
    default:
      return undefined;
  }
}

/**
 * Turns a failed call into the text and hints shown on the operation panel.
 * Errors without an HTTP status are prefixed with `fallback`.
 */
export function describe_client_error(err: unknown, context: string, fallback: string): OperationFailure {
  if (!(err instanceof ClientError)) {
    return { message: `${fallback}: ${error_message(err)}`, context, indices: [] };
  }

  const details = err.trace_context();
  const indices = details === undefined ? [] : extract_indices_from_details(details);
  const budget = details === undefined ? undefined : extract_budget_hint(details);
  const detail_trace = is_record(details) && typeof details.trace_id === "string" ? details.trace_id : undefined;
  const trace_id = err.trace_id || detail_trace;

  const parts = [err.status === undefined ? `${fallback}: ${err.message}` : err.message];
  const advice = err.status === undefined ? undefined : http_status_advice(err.status);
  if (advice) parts.push(advice);
  if (trace_id) parts.push(`trace_id ${trace_id}`);

  const out: OperationFailure = { message: parts.join(" · "), context, indices };
  if (err.status !== undefined) out.status = err.status;
  if (trace_id) out.trace_id = trace_id;
  if (err.kind === "api" && err.code) out.error_code = err.code;
  if (budget) out.budget = budget;
  return out;
}
