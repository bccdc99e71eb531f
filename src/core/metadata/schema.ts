import { z } from 'zod';

/**
 * Normalize a YAML/JSON date value to YYYY-MM-DD where possible.
 */
function toDateString(value: string | Date): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return /^\d{4}-\d{2}-\d{2}/.test(value) ? value.slice(0, 10) : value;
}

/** A dependency is a bare name (direct) or `{ name, type }`. */
export const DependencyEntrySchema = z.union([
  z.string().min(1),
  z.object({
    name: z.string().min(1),
    type: z.string().optional(),
  }),
]);

export type DependencyEntry = z.infer<typeof DependencyEntrySchema>;

/**
 * Per-field shape of a repository descriptor. Every field is optional here;
 * presence of required fields is checked separately so that each absence
 * becomes its own finding.
 */
export const DescriptorSchema = z
  .object({
    name: z.string().min(1),
    layer: z.string(),
    status: z.string(),
    short_description: z.string(),
    long_description: z.string(),
    dependencies: z.array(DependencyEntrySchema),
    tags: z.array(z.string()),
    license: z.string(),
    spec_version: z.union([z.string(), z.number()]).transform(String),
    url: z.string(),
    links: z.array(z.string()),
    health_endpoint: z.string(),
    updated: z.union([z.string(), z.date()]).transform(toDateString),
    deprecated: z.boolean(),
  })
  .partial();

export type Descriptor = z.infer<typeof DescriptorSchema>;

export const KNOWN_FIELDS: ReadonlySet<string> = new Set(Object.keys(DescriptorSchema.shape));

/**
 * Fields written by index generation tooling. Accepted and dropped silently.
 */
export const GENERATED_FIELDS: ReadonlySet<string> = new Set([
  'local_path',
  'has_metadata',
  'has_readme',
  'is_ecosystem',
  'visibility',
  'reverse_dependencies',
]);
