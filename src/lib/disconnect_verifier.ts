import { clamp_preview, noop_logger, type ActivityLogger } from "./activity_log";
import type { CycleApi } from "./console_client";
import { error_message, is_not_found_error } from "./errors";
import type { CycleOutcomeSummary, CycleRef, CycleSnapshot } from "./types";

export type CycleStatusFamily = "completed" | "failed" | "still_running" | "unknown";

const COMPLETED = new Set(["completed", "complete", "success"]);
const FAILED = new Set(["failed", "failure", "error"]);
const RUNNING = new Set(["running", "awaiting_external", "pending"]);

export function classify_cycle_status(status: string | undefined): CycleStatusFamily {
  const s = String(status || "")
    .trim()
    .toLowerCase();
  if (COMPLETED.has(s)) return "completed";
  if (FAILED.has(s)) return "failed";
  if (RUNNING.has(s)) return "still_running";
  return "unknown";
}

function is_record(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function _text(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const t = v.trim();
  return t ? t : undefined;
}

/**
 * Terminal status of a cycle payload: the last outcome's status, else the schedule status.
 * Works on both decoded snapshots and raw `complete` event JSON.
 */
export function extract_cycle_status(value: unknown): string | undefined {
  if (!is_record(value)) return undefined;
  const outcomes = value.outcomes;
  if (Array.isArray(outcomes) && outcomes.length > 0) {
    const last: unknown = outcomes[outcomes.length - 1];
    const s = is_record(last) ? _text(last.status) : undefined;
    if (s) return s;
  }
  const schedule = value.schedule;
  return is_record(schedule) ? _text(schedule.status) : undefined;
}

export type VerificationOutcome =
  | { kind: "completed"; status: string; outcome?: CycleOutcomeSummary; snapshot: CycleSnapshot; message: string }
  | { kind: "failed"; status: string; snapshot: CycleSnapshot; message: string }
  | { kind: "still_running"; status: string; snapshot: CycleSnapshot; message: string }
  | { kind: "unknown_status"; status: string; snapshot: CycleSnapshot | null; message: string }
  | { kind: "unreachable"; not_found: boolean; message: string; error: unknown };

/**
 * Resolves an ambiguous stream disconnect with one authoritative snapshot read.
 * Never retries; the caller decides what the outcome means for the workflow.
 */
export class DisconnectVerifier {
  private _api: Pick<CycleApi, "get_cycle_snapshot">;
  private _log: ActivityLogger;

  constructor(api: Pick<CycleApi, "get_cycle_snapshot">, opts?: { log?: ActivityLogger }) {
    this._api = api;
    this._log = opts?.log || noop_logger;
  }

  async resolve(tenant_id: string, cycle: CycleRef): Promise<VerificationOutcome> {
    const id = cycle.display;
    let snapshot: CycleSnapshot | null;
    try {
      const env = await this._api.get_cycle_snapshot(tenant_id, id);
      snapshot = env.data;
    } catch (e) {
      const not_found = is_not_found_error(e);
      const message = not_found
        ? `cycle ${id} was not found while verifying the dropped stream`
        : `verification of cycle ${id} failed: ${error_message(e)}`;
      this._log.push_log({ kind: "error", title: "Disconnect verification failed", preview: clamp_preview(message), cycle_id: id });
      return { kind: "unreachable", not_found, message, error: e };
    }

    const status = extract_cycle_status(snapshot) || "";
    const family = classify_cycle_status(status);
    this._log.push_log({
      kind: "info",
      title: "Disconnect verified",
      preview: `cycle ${id} status ${status || "(none)"}`,
      cycle_id: id,
    });

    if (snapshot === null || family === "unknown") {
      return {
        kind: "unknown_status",
        status,
        snapshot,
        message: `cycle ${id} reported an unknown status "${status || "(none)"}" after the stream dropped`,
      };
    }
    if (family === "completed") {
      const outcome = snapshot.outcomes[snapshot.outcomes.length - 1];
      return {
        kind: "completed",
        status,
        snapshot,
        message: `cycle ${id} completed`,
        ...(outcome ? { outcome } : {}),
      };
    }
    if (family === "failed") {
      return { kind: "failed", status, snapshot, message: `cycle ${id} failed: ${status}` };
    }
    return {
      kind: "still_running",
      status,
      snapshot,
      message: `cycle ${id} is still running, connection dropped (status ${status})`,
    };
  }
}
