import type { Locator, Page } from 'playwright';

import type { Target, TargetStrategy } from '../schema/target.js';
import { formatTemplate, TemplateError } from '../utils/template.js';
import type { TemplateVars } from '../utils/template.js';

// ── Error ─────────────────────────────────────────────────────

export class SelectorError extends Error {
  readonly strategy: TargetStrategy;
  readonly target: Target;

  constructor(target: Target, reason: string) {
    super(`Cannot resolve ${target.strategy} target: ${reason}`);
    this.name = 'SelectorError';
    this.strategy = target.strategy;
    this.target = target;
  }
}

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a Target to a Playwright Locator after filling its placeholders.
 *
 *   css    → page.locator(value)
 *   role   → page.getByRole(value, { name })
 *   label  → page.getByLabel(value)
 *   testid → page.getByTestId(value)
 *   text   → page.getByText(value)
 *
 * Resolution is lazy on Playwright's side: a wrong target fails when the
 * action uses the locator.
 */
export function resolveTarget(
  page: Page,
  target: Target,
  vars: TemplateVars,
): Locator {
  const value = fill(target, target.value, vars);

  switch (target.strategy) {
    case 'css':
      return page.locator(value);

    case 'role': {
      const options: { name?: string } = {};
      if (target.name) {
        options.name = fill(target, target.name, vars);
      }
      // Playwright accepts the ARIA role as a plain string at runtime.
      // The TypeScript overload expects a union literal, so we cast once here.
      return page.getByRole(value as Parameters<Page['getByRole']>[0], options);
    }

    case 'label':
      return page.getByLabel(value);

    case 'testid':
      return page.getByTestId(value);

    case 'text':
      return page.getByText(value);
  }
}

function fill(target: Target, template: string, vars: TemplateVars): string {
  try {
    return formatTemplate(template, vars);
  } catch (err) {
    if (err instanceof TemplateError) {
      throw new SelectorError(target, err.message);
    }
    throw err;
  }
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the target for logs. */
export function describeTarget(target: Target): string {
  switch (target.strategy) {
    case 'css':
      return target.value;
    case 'role':
      return target.name
        ? `role=${target.value}[name="${target.name}"]`
        : `role=${target.value}`;
    case 'label':
      return `label="${target.value}"`;
    case 'testid':
      return `[data-testid="${target.value}"]`;
    case 'text':
      return `text="${target.value}"`;
  }
}
