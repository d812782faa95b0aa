import { readFile, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import type { ActionPerformer } from '../browser/performer.js';
import { describeAction } from '../browser/performer.js';
import {
  componentContext,
  filterCategory,
  findComponent,
  flattenComponents,
  parseCatalogJson,
} from '../catalog/components.js';
import { generateReadme } from '../docs/readme.js';
import { fetchTemplate, resolveTemplate } from '../docs/template.js';
import type { FetchLike } from '../docs/template.js';
import type { LLMClient } from '../llm/index.js';
import type { Action } from '../schema/action.js';
import type { ComponentRecord } from '../schema/catalog.js';
import { parseInputDocument } from '../schema/inputs.js';
import type { GenerateReadmeStep, Workflow, WorkflowStep } from '../schema/workflow.js';
import { formatTemplate } from '../utils/template.js';
import * as log from '../utils/logger.js';
import { WorkflowContext } from './context.js';
import { WorkflowError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface WorkflowDeps {
  performer: ActionPerformer;
  /** Called only when a step needs the LLM, so other runs need no API key. */
  llm: () => LLMClient;
  fetchImpl?: FetchLike | undefined;
}

export interface StepRecord {
  index: number;
  type: WorkflowStep['type'];
  description: string;
  ok: boolean;
  durationMs: number;
  value?: unknown;
  error?: string | undefined;
}

export interface WorkflowResult {
  name: string;
  ok: boolean;
  steps: StepRecord[];
  context: Record<string, unknown>;
}

// ── Defaults ─────────────────────────────────────────────────

/** Where a step's value lands when the step has no `saveAs`. */
const DEFAULT_SAVE_KEYS: Partial<Record<WorkflowStep['type'], string>> = {
  extract_component: 'comp_info',
  extract_category: 'category_info',
  fetch_template: 'readme_template',
  generate_readme: 'new_readme',
};

const READ_BODY: Action = { type: 'read_body', continueOnError: false };

// ── Main entry ───────────────────────────────────────────────

/**
 * Run steps in order against one shared context.
 * The first failing step ends the run unless it sets `continueOnError`.
 */
export async function runWorkflow(
  workflow: Workflow,
  deps: WorkflowDeps,
  context: WorkflowContext = new WorkflowContext(workflow.vars),
): Promise<WorkflowResult> {
  const total = workflow.steps.length;
  const records: StepRecord[] = [];
  let ok = true;

  log.section(`Workflow: ${workflow.name}`);

  for (const [index, step] of workflow.steps.entries()) {
    const description = describeStep(step);
    log.step(index, total, description);

    const startedAt = Date.now();
    try {
      const value = await runStep(step, context, deps);

      const key = step.saveAs ?? DEFAULT_SAVE_KEYS[step.type];
      if (key !== undefined && value !== undefined && value !== null) {
        context.set(key, value);
        if (step.type === 'fetch_template') {
          context.markFetchedTemplate(key);
        }
      }

      records.push({
        index,
        type: step.type,
        description,
        ok: true,
        durationMs: Date.now() - startedAt,
        ...(value !== undefined ? { value } : {}),
      });
      log.stepResult(index, total, true, description);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      records.push({
        index,
        type: step.type,
        description,
        ok: false,
        durationMs: Date.now() - startedAt,
        error: message,
      });
      log.stepResult(index, total, false, description);
      log.error(message);

      if (!step.continueOnError) {
        ok = false;
        break;
      }
      log.warn('continueOnError set, moving on');
    }
  }

  return { name: workflow.name, ok, steps: records, context: context.snapshot() };
}

// ── Step dispatch ────────────────────────────────────────────

async function runStep(
  step: WorkflowStep,
  context: WorkflowContext,
  deps: WorkflowDeps,
): Promise<unknown> {
  const text = (template: string): string =>
    formatTemplate(template, context.toVars());

  switch (step.type) {
    case 'extract_component': {
      const components = await readCatalog(deps.performer, context);
      const component = findComponent(components, text(step.component));
      for (const [key, value] of Object.entries(componentContext(component))) {
        context.set(key, value);
      }
      log.detail(`Found component ${component.task}`);
      return component;
    }

    case 'extract_category': {
      const components = await readCatalog(deps.performer, context);
      const matches = filterCategory(components, text(step.category));
      log.detail(`${String(matches.length)} components in category`);
      return matches;
    }

    case 'load_json': {
      const raw = await readFile(text(step.path), 'utf-8');
      for (const [key, value] of Object.entries(parseInputDocument(step.kind, raw))) {
        context.set(key, value);
      }
      return undefined;
    }

    case 'fetch_template':
      return fetchTemplate(text(step.url), deps.fetchImpl);

    case 'generate_readme':
      return writeReadme(step, context, deps, text(step.output));

    case 'delay':
      await new Promise((r) => setTimeout(r, step.seconds * 1000));
      return undefined;

    default:
      return deps.performer.perform(step, context.toVars());
  }
}

async function readCatalog(
  performer: ActionPerformer,
  context: WorkflowContext,
): Promise<ComponentRecord[]> {
  const body = await performer.perform(READ_BODY, context.toVars());
  return flattenComponents(parseCatalogJson(body ?? ''));
}

// ── README generation ────────────────────────────────────────

async function writeReadme(
  step: GenerateReadmeStep,
  context: WorkflowContext,
  deps: WorkflowDeps,
  outputPath: string,
): Promise<string> {
  const categoryInfo = readContext(context, step.categoryKey, z.array(z.unknown()));
  const templateSource = readContext(context, step.templateKey, z.string());
  const screenshotLinks = context.has(step.linksKey)
    ? readContext(context, step.linksKey, z.array(z.string()))
    : [];

  // Text from a fetch_template step is never fetched again.
  const template = context.isFetchedTemplate(step.templateKey)
    ? templateSource
    : await resolveTemplate(templateSource, deps.fetchImpl);
  const readme = await generateReadme(deps.llm(), {
    categoryInfo,
    template,
    screenshotLinks,
  });

  await writeFile(outputPath, readme, 'utf-8');
  log.detail(`README saved to ${outputPath}`);
  return readme;
}

function readContext<T>(
  context: WorkflowContext,
  key: string,
  schema: z.ZodType<T>,
): T {
  if (!context.has(key)) {
    throw new WorkflowError(`Context has no "${key}" value`);
  }
  const parsed = schema.safeParse(context.get(key));
  if (!parsed.success) {
    throw new WorkflowError(
      `Context value "${key}" has the wrong shape: ${parsed.error.issues
        .map((i) => i.message)
        .join('; ')}`,
    );
  }
  return parsed.data;
}

// ── Descriptions ─────────────────────────────────────────────

export function describeStep(step: WorkflowStep): string {
  if (step.description) return step.description;

  switch (step.type) {
    case 'extract_component':
      return `Extract component ${step.component}`;
    case 'extract_category':
      return `Extract category ${step.category}`;
    case 'load_json':
      return `Load ${step.kind} from ${step.path}`;
    case 'fetch_template':
      return `Fetch template ${step.url}`;
    case 'generate_readme':
      return `Generate README to ${step.output}`;
    case 'delay':
      return `Wait ${String(step.seconds)}s`;
    default:
      return describeAction(step);
  }
}
