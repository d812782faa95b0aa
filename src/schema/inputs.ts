import { z } from 'zod';

// ── Input document kinds ──────────────────────────────────────

export const inputKindSchema = z.enum([
  'category_data',
  'component_details',
  'category_details',
  'component_paths',
]);

export type InputKind = z.infer<typeof inputKindSchema>;

// ── Documents ─────────────────────────────────────────────────
// Missing fields read as empty, matching how these files are hand-written.

export const categoryDataSchema = z.object({
  category_info: z.array(z.unknown()).optional().default([]),
  /** Markdown template, or an http(s) URL pointing at one. */
  readme_template: z.string().optional().default(''),
  screenshot_links: z.array(z.string()).optional().default([]),
});

export type CategoryData = z.infer<typeof categoryDataSchema>;

export const componentDetailsSchema = z.object({
  url: z.string().optional().default(''),
  component_name: z.string().optional().default(''),
});

export const categoryDetailsSchema = z.object({
  url: z.string().optional().default(''),
  category_name: z.string().optional().default(''),
});

export const componentPathsSchema = z.object({
  url: z.string().optional().default(''),
  file_path: z.string().optional().default(''),
});

export const inputDocumentSchemas = {
  category_data: categoryDataSchema,
  component_details: componentDetailsSchema,
  category_details: categoryDetailsSchema,
  component_paths: componentPathsSchema,
} as const;

// ── Parser ────────────────────────────────────────────────────

/** Parse a JSON input document into the context entries it provides. */
export function parseInputDocument(
  kind: InputKind,
  raw: string,
): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  return inputDocumentSchemas[kind].parse(parsed);
}
