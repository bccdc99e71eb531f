import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't run inner defaults for objects.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Fields every repository descriptor must declare. */
export const DEFAULT_REQUIRED_FIELDS = [
  'name',
  'layer',
  'status',
  'short_description',
  'dependencies',
  'tags',
  'license',
] as const;

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
  warning_only: z.number().int().default(0),
});

/** Audit configuration. */
export const ConfigSchema = z.object({
  /** Maximum concurrent link probes */
  concurrency: z.number().int().min(1).max(64).default(8),
  /** Per-request timeout */
  timeout_ms: z.number().int().min(1).default(5000),
  /** Retries for transient probe failures (5xx, connection errors) */
  retries: z.number().int().min(0).max(10).default(2),
  /** Linear backoff step between retries */
  retry_backoff_ms: z.number().int().min(0).default(250),
  /** Wall-clock budget for the whole probing phase */
  probe_budget_ms: z.number().int().min(1).default(60000),
  staleness_threshold_days: z.number().int().min(1).default(90),
  /** Hosts whose failures are reported as warnings instead of blocking */
  best_effort_hosts: z.array(z.string()).default([]),
  /** Reverse-dependency count at which a node is marked central */
  central_threshold: z.number().int().min(1).default(3),
  max_description_length: z.number().int().min(1).default(150),
  /** Upper bound on cycles reported per edge class */
  max_cycles: z.number().int().min(1).default(100),
  required_fields: z.array(z.string()).default([...DEFAULT_REQUIRED_FIELDS]),
  exit_codes: withDefaults(ExitCodesSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
