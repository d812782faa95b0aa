import { z } from 'zod';

import { CAPTURE } from '../config/defaults.js';
import { targetInputSchema } from './target.js';

// ── Shared step fields ────────────────────────────────────────

export const stepBaseFields = {
  description: z.string().min(1).optional(),
  /** Context key that receives the step's value, when it has one. */
  saveAs: z.string().min(1).optional(),
  continueOnError: z.boolean().optional().default(false),
};

// ── Browser action schemas ────────────────────────────────────

export const positionSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Position = z.infer<typeof positionSchema>;

export const openActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('open'),
  url: z.string().min(1),
  headless: z.boolean().optional(),
});

export const navigateActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('navigate'),
  url: z.string().min(1),
});

export const clickActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('click'),
  target: targetInputSchema.optional(),
  position: positionSchema.optional(),
  double: z.boolean().optional().default(false),
});

export const fillActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('fill'),
  target: targetInputSchema,
  text: z.string(),
  sequential: z.boolean().optional().default(false),
  delay: z.number().int().nonnegative().optional().default(0),
});

export const pressKeyActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('press_key'),
  key: z.string().min(1),
  target: targetInputSchema.optional(),
});

export const hoverActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('hover'),
  target: targetInputSchema,
});

export const focusActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('focus'),
  target: targetInputSchema,
});

export const checkActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('check'),
  target: targetInputSchema,
  /** Skip the check and only assert the element is already checked. */
  expectChecked: z.boolean().optional().default(false),
});

export const selectBySchema = z.enum(['label', 'value', 'index']);

export type SelectBy = z.infer<typeof selectBySchema>;

export const selectActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('select'),
  target: targetInputSchema,
  options: z.array(z.string()).min(1),
  by: selectBySchema.optional(),
});

export const uploadActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('upload'),
  target: targetInputSchema,
  files: z.array(z.string().min(1)).min(1),
});

export const scrollMethodSchema = z.enum([
  'scroll_into_view',
  'mouse_wheel',
  'evaluate',
  'page_evaluate',
]);

export type ScrollMethod = z.infer<typeof scrollMethodSchema>;

export const scrollActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('scroll'),
  method: scrollMethodSchema.optional().default('evaluate'),
  target: targetInputSchema.optional(),
  x: z.number().optional().default(0),
  y: z.number().optional().default(0),
});

export const dragActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('drag'),
  source: targetInputSchema,
  target: targetInputSchema,
});

export const screenshotActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('screenshot'),
  path: z.string().min(1),
  target: targetInputSchema.optional(),
  fullPage: z.boolean().optional().default(false),
});

/**
 * Run a script on the first element `target` matches and tag the element
 * it returns (e.g. `node => node.closest('.card')`) so later steps can
 * target it by `name`.
 */
export const deriveElementActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('derive_element'),
  target: targetInputSchema,
  script: z.string().min(1),
  name: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'name may only use letters, digits, underscores and hyphens'),
});

export const waitForActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('wait_for'),
  target: targetInputSchema,
  timeout: z.number().int().positive().optional(),
});

export const captureEndpointActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('capture_endpoint'),
  pattern: z.string().min(1).optional().default(CAPTURE.ENDPOINT_PATTERN),
  reload: z.boolean().optional().default(true),
  windowMs: z.number().int().nonnegative().optional(),
});

export const readBodyActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('read_body'),
});

export const closeActionSchema = z.object({
  ...stepBaseFields,
  type: z.literal('close'),
});

// ── Union schema ──────────────────────────────────────────────

export const actionOptions = [
  openActionSchema,
  navigateActionSchema,
  clickActionSchema,
  fillActionSchema,
  pressKeyActionSchema,
  hoverActionSchema,
  focusActionSchema,
  checkActionSchema,
  selectActionSchema,
  uploadActionSchema,
  scrollActionSchema,
  dragActionSchema,
  screenshotActionSchema,
  waitForActionSchema,
  deriveElementActionSchema,
  captureEndpointActionSchema,
  readBodyActionSchema,
  closeActionSchema,
] as const;

export const actionSchema = z.discriminatedUnion('type', [...actionOptions]);

/** Parsed form: defaults applied, string targets expanded. */
export type Action = z.infer<typeof actionSchema>;

/** Authoring form, as written in a workflow file or passed by code. */
export type ActionInput = z.input<typeof actionSchema>;

export type ActionType = Action['type'];

export type OpenAction = z.infer<typeof openActionSchema>;
export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type ClickAction = z.infer<typeof clickActionSchema>;
export type FillAction = z.infer<typeof fillActionSchema>;
export type PressKeyAction = z.infer<typeof pressKeyActionSchema>;
export type CheckAction = z.infer<typeof checkActionSchema>;
export type SelectAction = z.infer<typeof selectActionSchema>;
export type ScrollAction = z.infer<typeof scrollActionSchema>;
export type ScreenshotAction = z.infer<typeof screenshotActionSchema>;
export type WaitForAction = z.infer<typeof waitForActionSchema>;
export type DeriveElementAction = z.infer<typeof deriveElementActionSchema>;
export type CaptureEndpointAction = z.infer<typeof captureEndpointActionSchema>;

// ── Parser ────────────────────────────────────────────────────

export function parseAction(data: unknown): Action {
  return actionSchema.parse(data);
}
