import type { TemplateVars } from '../utils/template.js';

export type ScalarValue = string | number | boolean;

/**
 * Values one workflow run passes from step to step.
 * Handed to each step explicitly; operations on the browser Worker only
 * ever receive the plain `TemplateVars` snapshot, never the context.
 */
export class WorkflowContext {
  private readonly values = new Map<string, unknown>();
  /** Keys whose value is template text already downloaded. */
  private readonly fetchedTemplates = new Set<string>();

  constructor(initial: Readonly<Record<string, ScalarValue>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
    this.fetchedTemplates.delete(key);
  }

  /** Record that `key` holds downloaded template text, not a URL. */
  markFetchedTemplate(key: string): void {
    if (this.values.has(key)) {
      this.fetchedTemplates.add(key);
    }
  }

  isFetchedTemplate(key: string): boolean {
    return this.fetchedTemplates.has(key);
  }

  /** Scalar entries, stringified, for `{placeholder}` filling. */
  toVars(): TemplateVars {
    const vars: Record<string, string> = {};
    for (const [key, value] of this.values) {
      if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
      ) {
        vars[key] = String(value);
      }
    }
    return vars;
  }

  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
