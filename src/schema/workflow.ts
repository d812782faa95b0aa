import { z } from 'zod';

import { README_GENERATION, TIMEOUTS } from '../config/defaults.js';
import { actionOptions, stepBaseFields } from './action.js';
import { inputKindSchema } from './inputs.js';

// ── Data step schemas ─────────────────────────────────────────
// Steps that run in the caller and never touch the browser directly.

export const extractComponentStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('extract_component'),
  component: z.string().min(1),
});

export const extractCategoryStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('extract_category'),
  category: z.string().min(1),
});

export const loadJsonStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('load_json'),
  path: z.string().min(1),
  kind: inputKindSchema,
});

export const fetchTemplateStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('fetch_template'),
  url: z.string().min(1),
});

export const generateReadmeStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('generate_readme'),
  output: z.string().min(1).optional().default(README_GENERATION.OUTPUT_FILE),
  categoryKey: z.string().min(1).optional().default('category_info'),
  templateKey: z.string().min(1).optional().default('readme_template'),
  linksKey: z.string().min(1).optional().default('screenshot_links'),
});

export const delayStepSchema = z.object({
  ...stepBaseFields,
  type: z.literal('delay'),
  seconds: z.number().nonnegative().optional().default(TIMEOUTS.DELAY_SECONDS),
});

// ── Union schema ──────────────────────────────────────────────

export const workflowStepSchema = z.discriminatedUnion('type', [
  ...actionOptions,
  extractComponentStepSchema,
  extractCategoryStepSchema,
  loadJsonStepSchema,
  fetchTemplateStepSchema,
  generateReadmeStepSchema,
  delayStepSchema,
]);

export type WorkflowStep = z.infer<typeof workflowStepSchema>;

export type ExtractComponentStep = z.infer<typeof extractComponentStepSchema>;
export type ExtractCategoryStep = z.infer<typeof extractCategoryStepSchema>;
export type LoadJsonStep = z.infer<typeof loadJsonStepSchema>;
export type FetchTemplateStep = z.infer<typeof fetchTemplateStepSchema>;
export type GenerateReadmeStep = z.infer<typeof generateReadmeStepSchema>;
export type DelayStep = z.infer<typeof delayStepSchema>;

// ── Workflow file ─────────────────────────────────────────────

export const varValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const workflowSchema = z.object({
  name: z.string().min(1),
  headless: z.boolean().optional().default(false),
  /** Seconds a step may wait for its browser operation before giving up. */
  waitTimeout: z.number().positive().optional(),
  vars: z.record(varValueSchema).optional().default({}),
  steps: z.array(workflowStepSchema).min(1),
});

export type Workflow = z.infer<typeof workflowSchema>;

export type WorkflowInput = z.input<typeof workflowSchema>;
