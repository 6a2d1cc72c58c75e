import { z } from "zod";
import { ValidationError } from "./errors";
import { COMMAND_TYPES, OPERATION_MODES, SEVERITIES } from "./types";

export const Uuid = z.string().uuid();

// One reading as a device posts it. Numeric ranges are enforced by the
// ingest pipeline so bulk items get per-item outcomes.
export const ReadingItem = z.object({
  device_id: z.string().min(1).max(64).optional(),
  sensor_id: z.string().uuid().optional(),
  temperature: z.number().nullable().optional(),
  humidity: z.number().nullable().optional(),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .transform((s) => new Date(s))
    .optional(),
});

export const BulkReadingsBody = z.object({
  readings: z.array(z.unknown()).min(1).max(500),
});

export const RegisterSensorBody = z.object({
  room_id: z.string().uuid(),
  device_id: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(100),
});

export const ReadingsQuery = z.object({
  start_date: z.string().datetime({ offset: true }).transform((s) => new Date(s)).optional(),
  end_date: z.string().datetime({ offset: true }).transform((s) => new Date(s)).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const RoomQuery = z.object({
  room_id: z.string().uuid().optional(),
});

export const AlertsQuery = RoomQuery.extend({
  severity: z.enum(SEVERITIES).optional(),
});

export const RoomScopeBody = z
  .object({
    room_id: z.string().uuid().optional(),
  })
  .default({});

export const RoomSettingsBody = z
  .object({
    target_temperature: z.number().min(15).max(30).optional(),
    target_humidity: z.number().min(20).max(80).optional(),
    operation_mode: z.enum(OPERATION_MODES).optional(),
  })
  .refine((b) => Object.values(b).some((v) => v !== undefined), {
    message: "At least one setting is required",
  });

export const RecordIrBody = z.object({
  command_type: z.enum(COMMAND_TYPES),
});

// Posted by the transmitter once it has learned (or failed to learn) a frame.
export const IrSignalBody = z
  .object({
    command_type: z.enum(COMMAND_TYPES),
    raw_signal: z.string().default(""),
    protocol: z.string().max(50).default(""),
    success: z.boolean().default(true),
    message: z.string().optional(),
  })
  .refine((b) => !b.success || b.raw_signal.length > 0, {
    message: "raw_signal is required",
    path: ["raw_signal"],
  });

/** Parses with a zod schema, turning failures into a ValidationError. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
    throw new ValidationError(`Invalid request: ${details.map((d) => `${d.path || "body"} ${d.message}`).join("; ")}`, details);
  }
  return parsed.data;
}
