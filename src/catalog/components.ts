import { componentRecordSchema } from '../schema/catalog.js';
import type { ComponentRecord } from '../schema/catalog.js';
import { CatalogError } from './errors.js';

// ── Parsing ──────────────────────────────────────────────────

/** Parse a catalog endpoint's body (read from the page) as JSON. */
export function parseCatalogJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Catalog body is not valid JSON: ${reason}`);
  }
}

// ── Flattening ───────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect component definitions from arbitrarily nested catalog JSON.
 *
 * Arrays and objects are walked depth-first in document order. An object
 * with a `task` key is a component and is not descended into; one whose
 * `task` is not a string is skipped.
 */
export function flattenComponents(data: unknown): ComponentRecord[] {
  if (Array.isArray(data)) {
    return data.flatMap((item) => flattenComponents(item));
  }

  if (!isPlainObject(data)) return [];

  if ('task' in data) {
    const parsed = componentRecordSchema.safeParse(data);
    return parsed.success ? [parsed.data] : [];
  }

  return Object.values(data).flatMap((value) => flattenComponents(value));
}

// ── Lookup ───────────────────────────────────────────────────

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

/** First component whose task name matches, ignoring case. */
export function findComponent(
  components: readonly ComponentRecord[],
  name: string,
): ComponentRecord {
  const wanted = name.toLowerCase();
  const match = components.find((c) => c.task.toLowerCase() === wanted);
  if (!match) {
    throw new CatalogError(`Component not found: ${name}`);
  }
  return match;
}

/** Every component in `category`, ignoring case and surrounding space. */
export function filterCategory(
  components: readonly ComponentRecord[],
  category: string,
): ComponentRecord[] {
  const wanted = normalize(category);
  return components.filter((c) => normalize(c.category ?? '') === wanted);
}

/** Context entries a located component contributes to later steps. */
export function componentContext(component: ComponentRecord): Record<string, string> {
  return {
    comp_info_category: component.category ?? '',
    comp_info_task: component.task,
  };
}
