/**
 * pageline library entry.
 * The core is generic over its resource; the browser, catalog, docs and
 * workflow modules build the Playwright pipeline on top of it.
 */

export * from './core/index.js';
export * from './browser/index.js';
export * from './catalog/index.js';
export * from './docs/index.js';
export * from './workflow/index.js';
export * from './schema/index.js';
export * from './config/index.js';
export * from './report/index.js';
export * from './llm/index.js';
