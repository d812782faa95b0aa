import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { workflowSchema } from '../schema/workflow.js';
import type { Workflow } from '../schema/workflow.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a workflow file (YAML, or JSON by extension).
 * Throws if the file is missing, unparsable, or fails validation.
 */
export async function loadWorkflowFile(workflowPath: string): Promise<Workflow> {
  const raw = await readFile(workflowPath, 'utf-8');
  return parseWorkflow(raw, workflowPath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseWorkflow(raw: string, format: 'json' | 'yaml'): Workflow {
  const parsed: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  return workflowSchema.parse(parsed);
}
