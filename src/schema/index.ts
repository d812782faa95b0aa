/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './target.js';
export * from './action.js';
export * from './inputs.js';
export * from './workflow.js';
export * from './catalog.js';
