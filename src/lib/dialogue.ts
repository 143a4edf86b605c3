import { random_id } from "./ids";

export type SubjectRef = {
  kind: "human" | "ai" | "system" | string;
  id: string;
};

export type AccessClass = "public" | "internal" | "restricted" | string;

export type MessageEventDraft = {
  tenant_id: string;
  session_id: string;
  text: string;
  scenario?: string;
  subject?: SubjectRef;
  participants?: SubjectRef[];
  sequence_number?: number;
  channel?: string | null;
  access_class?: AccessClass;
  config_snapshot_hash?: string;
  config_snapshot_version?: number;
  timestamp_override_ms?: number;
};

export type DialogueEvent = {
  tenant_id: string;
  event_id: string;
  session_id: string;
  event_type: "message";
  scenario: string;
  subject: SubjectRef;
  participants: SubjectRef[];
  head: {
    envelope_id: string;
    trace_id: string;
    correlation_id: string;
    config_snapshot_hash: string;
    config_snapshot_version: number;
  };
  snapshot: { schema_v: number; created_at: string };
  timestamp_ms: number;
  access_class: AccessClass;
  provenance: { source: string; method: string };
  sequence_number: number;
  message_ref: { message_id: string };
  metadata: {
    text: string;
    channel: string | null;
    submitted_at: string;
    origin: string;
  };
};

export const DEFAULT_SCENARIO = "human_to_ai";
export const DEFAULT_ACCESS_CLASS: AccessClass = "internal";
export const EVENT_ORIGIN = "cycle-console";

export type DialogueBuildErrorKind = "missing_tenant_id" | "missing_session_id" | "empty_text" | "invalid_sequence";

export class DialogueBuildError extends Error {
  readonly kind: DialogueBuildErrorKind;

  constructor(kind: DialogueBuildErrorKind, message: string) {
    super(message);
    this.name = "DialogueBuildError";
    this.kind = kind;
  }
}

/** Builds the message event posted to the dialogue-events endpoint to start a cycle. */
export function build_message_event(draft: MessageEventDraft): DialogueEvent {
  const tenant_id = String(draft.tenant_id || "").trim();
  if (!tenant_id) throw new DialogueBuildError("missing_tenant_id", "tenant_id is required");
  const session_id = String(draft.session_id || "").trim();
  if (!session_id) throw new DialogueBuildError("missing_session_id", "session_id is required");
  const text = String(draft.text || "").trim();
  if (!text) throw new DialogueBuildError("empty_text", "message text is empty");

  const sequence_number = draft.sequence_number ?? 1;
  if (!Number.isSafeInteger(sequence_number) || sequence_number < 1) {
    throw new DialogueBuildError("invalid_sequence", "sequence_number must be >= 1");
  }

  const override = draft.timestamp_override_ms;
  const timestamp_ms = typeof override === "number" && Number.isFinite(override) ? Math.floor(override) : Date.now();
  const created_at = new Date(timestamp_ms).toISOString();
  const subject = draft.subject || { kind: "human", id: session_id };
  const channel = String(draft.channel || "").trim();

  return {
    tenant_id,
    event_id: random_id(),
    session_id,
    event_type: "message",
    scenario: String(draft.scenario || "").trim() || DEFAULT_SCENARIO,
    subject,
    participants: draft.participants ? [...draft.participants] : [subject],
    head: {
      envelope_id: random_id(),
      trace_id: `trace-${random_id()}`,
      correlation_id: `corr-${random_id()}`,
      config_snapshot_hash: String(draft.config_snapshot_hash || "").trim() || "frontend:default",
      config_snapshot_version: draft.config_snapshot_version ?? 1,
    },
    snapshot: { schema_v: 1, created_at },
    timestamp_ms,
    access_class: draft.access_class || DEFAULT_ACCESS_CLASS,
    provenance: { source: EVENT_ORIGIN, method: "interaction_panel" },
    sequence_number,
    message_ref: { message_id: random_id() },
    metadata: {
      text,
      channel: channel || null,
      submitted_at: created_at,
      origin: EVENT_ORIGIN,
    },
  };
}
