import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import { README_GENERATION } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ReadmeInput {
  categoryInfo: readonly unknown[];
  /** Markdown template the README must follow. */
  template: string;
  screenshotLinks: readonly string[];
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const SYSTEM_PROMPT =
  'You are a documentation generator for component libraries. ' +
  'Reply with the README text only.';

// ── Prompt rendering ─────────────────────────────────────────

export async function buildReadmePrompt(input: ReadmeInput): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'readme.txt'), 'utf-8');

  const values: Record<string, string> = {
    template: input.template,
    categoryInfo: JSON.stringify(input.categoryInfo, null, 2),
    screenshotLinks: JSON.stringify(input.screenshotLinks, null, 2),
  };

  // One pass: placeholders inside the inserted data stay literal.
  return template.replace(
    /\{\{(template|categoryInfo|screenshotLinks)\}\}/g,
    (match, key: string) => values[key] ?? match,
  );
}

// ── Output cleanup ───────────────────────────────────────────

const FENCED = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n```[ \t]*$/i;

/** Remove a code fence wrapping the whole reply, if the model added one. */
export function stripMarkdownFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCED.exec(trimmed);
  return match?.[1] ?? trimmed;
}

// ── Main entry ───────────────────────────────────────────────

export async function generateReadme(
  client: LLMClient,
  input: ReadmeInput,
): Promise<string> {
  log.llm(
    `Drafting README for ${String(input.categoryInfo.length)} components...`,
  );
  const prompt = await buildReadmePrompt(input);

  const raw = await client.generate(SYSTEM_PROMPT, prompt, {
    maxTokens: README_GENERATION.MAX_TOKENS,
    temperature: README_GENERATION.TEMPERATURE,
  });

  return stripMarkdownFence(raw);
}
