import { z } from "zod";

// ── Storage ──
const StorageSchema = z.object({
  dir: z.string().optional(),
});

// ── Retention ──
// Used by `prune` when neither --keep nor --older-than is given.
const RetentionSchema = z.object({
  keep: z.number().int().positive().optional(),
  olderThanDays: z.number().int().positive().optional(),
});

// ── Logging ──
const LoggingSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
  file: z.string().optional(),
});

export const SnapconfConfigSchema = z.object({
  storage: StorageSchema.optional(),
  retention: RetentionSchema.optional(),
  logging: LoggingSchema.optional(),
});

export type SnapconfConfig = z.infer<typeof SnapconfConfigSchema>;

export const DEFAULT_CONFIG: SnapconfConfig = {
  logging: { verbose: false, json: false },
};
