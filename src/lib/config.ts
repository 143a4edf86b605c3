import { z } from "zod";

export const DEFAULT_API_BASE_URL = "http://localhost:8700/api/v1";
export const DEFAULT_SSE_TIMEOUT_MS = 30_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

const MIN_TIMEOUT_MS = 1_000;

const OptionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = String(v || "").trim();
    return t ? t : undefined;
  });

const TimeoutMs = (fallback: number) =>
  z
    .number()
    .finite()
    .positive()
    .optional()
    .transform((v) => Math.max(MIN_TIMEOUT_MS, Math.floor(v ?? fallback)));

export const ConsoleConfigSchema = z.object({
  api_base_url: z
    .string()
    .optional()
    .transform((v) => (v || "").trim() || DEFAULT_API_BASE_URL),
  stream_base_url: OptionalText,
  default_tenant_id: OptionalText,
  default_session_id: OptionalText,
  auth_token: OptionalText,
  sse_timeout_ms: TimeoutMs(DEFAULT_SSE_TIMEOUT_MS),
  request_timeout_ms: TimeoutMs(DEFAULT_REQUEST_TIMEOUT_MS),
});

export type ConsoleConfigInput = z.input<typeof ConsoleConfigSchema>;
export type ConsoleConfig = z.output<typeof ConsoleConfigSchema>;

export function resolve_console_config(input: ConsoleConfigInput = {}): ConsoleConfig {
  return ConsoleConfigSchema.parse(input);
}

export function trim_base_url(url: string): string {
  return (url || "").trim().replace(/\/+$/, "");
}

// Streams may be served from a different origin than the REST API.
export function stream_endpoint(cfg: ConsoleConfig): string {
  return trim_base_url(cfg.stream_base_url || cfg.api_base_url);
}

export function auth_headers(token?: string): Record<string, string> {
  const t = (token || "").trim();
  if (!t) return {};
  return { Authorization: `Bearer ${t}` };
}
