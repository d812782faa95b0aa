import { z } from 'zod';

// ── Component record ──────────────────────────────────────────

/**
 * One component definition from a catalog endpoint. Only `task` is
 * required; every other field is carried through untouched.
 */
export const componentRecordSchema = z
  .object({
    task: z.string(),
    category: z.string().optional(),
  })
  .passthrough();

export type ComponentRecord = z.infer<typeof componentRecordSchema>;
