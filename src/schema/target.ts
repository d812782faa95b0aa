import { z } from 'zod';

// ── Target strategy ───────────────────────────────────────────

export const targetStrategySchema = z.enum(['css', 'role', 'label', 'testid', 'text']);

export type TargetStrategy = z.infer<typeof targetStrategySchema>;

// ── Target ────────────────────────────────────────────────────

/**
 * How to find an element. `value` is the CSS selector, ARIA role, label
 * text, test id or visible text depending on `strategy`; `name` narrows a
 * role lookup by accessible name. Both may contain `{var}` placeholders.
 */
export const targetSchema = z.object({
  strategy: targetStrategySchema.default('css'),
  value: z.string().min(1),
  name: z.string().optional(),
});

export type Target = z.infer<typeof targetSchema>;

// A bare string is shorthand for a CSS target.
export const targetInputSchema = z.union([
  z.string().min(1).transform((value): Target => ({ strategy: 'css', value })),
  targetSchema,
]);
