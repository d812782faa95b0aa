import type { StepRecord, WorkflowResult } from '../workflow/runner.js';

// ── JSON contract ────────────────────────────────────────────

export const JSON_OUTPUT_VERSION = 1;

export interface JsonOutputStep {
  index: number;
  type: string;
  description: string;
  ok: boolean;
  durationMs: number;
  value?: string;
  error?: string;
}

export interface JsonOutput {
  version: typeof JSON_OUTPUT_VERSION;
  workflow: string;
  ok: boolean;
  exitCode: number;
  durationMs: number;
  steps: JsonOutputStep[];
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: WorkflowResult, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    workflow: run.name,
    ok: run.ok,
    exitCode,
    durationMs: totalDuration(run.steps),
    steps: run.steps.map(stepToJSON),
  };
}

function stepToJSON(step: StepRecord): JsonOutputStep {
  return {
    index: step.index,
    type: step.type,
    description: step.description,
    ok: step.ok,
    durationMs: step.durationMs,
    // Only string values are echoed; lists and records stay in the context.
    ...(typeof step.value === 'string' ? { value: step.value } : {}),
    ...(step.error !== undefined ? { error: step.error } : {}),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: WorkflowResult): string {
  const lines: string[] = [];

  lines.push(`# Workflow Report: ${run.name}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Result** | ${run.ok ? '**OK**' : '**FAILED**'} |`);
  lines.push(`| **Steps run** | ${String(run.steps.length)} |`);
  lines.push(`| **Duration** | ${formatDuration(totalDuration(run.steps))} |`);
  lines.push('');

  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Step | Result | Time | Error |`);
  lines.push(`|---|------|--------|------|-------|`);

  for (const step of run.steps) {
    lines.push(
      `| ${String(step.index + 1)} | ${escapeMarkdownCell(step.description)} | ${
        step.ok ? '[OK]' : '[FAIL]'
      } | ${formatDuration(step.durationMs)} | ${escapeMarkdownCell(step.error ?? '')} |`,
    );
  }
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function totalDuration(steps: readonly StepRecord[]): number {
  return steps.reduce((sum, step) => sum + step.durationMs, 0);
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
