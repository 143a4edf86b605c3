import { z } from "zod";

// Ids arrive as either JSON strings or numbers depending on the backend build.
const IdSchema = z.union([z.string(), z.number()]).transform((v) => String(v));

const OptionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const ApiErrorBodySchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

export const ApiEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: ApiErrorBodySchema.nullish(),
  trace_id: z.string().nullish(),
  duration_ms: z.number().nullish(),
});

export const CycleTriggerResponseSchema = z.object({
  cycle_id: z.union([z.string().min(1), z.number().int().nonnegative()]),
  status: z.string(),
  manifest_digest: OptionalString,
});

export const CycleOutcomeSummarySchema = z.object({
  cycle_id: IdSchema,
  status: z.string(),
  manifest_digest: OptionalString,
});

export const CycleScheduleSchema = z
  .object({
    cycle_id: IdSchema.optional(),
    status: z.string().optional(),
    lane: z.string().optional(),
  })
  .passthrough();

export const OutboxMessageSchema = z.object({
  cycle_id: IdSchema,
  event_id: IdSchema,
  payload: z.unknown(),
});

export const CycleSnapshotSchema = z
  .object({
    schedule: CycleScheduleSchema.optional(),
    outcomes: z.array(CycleOutcomeSummarySchema).default([]),
    outbox: z.array(OutboxMessageSchema).default([]),
  })
  .passthrough();

export const OutboxListSchema = z.array(OutboxMessageSchema);

export const TimelinePayloadSchema = z.object({
  items: z.array(z.unknown()),
  awareness: z.array(z.unknown()).default([]),
  next_cursor: OptionalString,
});

// Context bundle and explain indices are only handed through to views.
export const OpaqueObjectSchema = z.record(z.unknown());
