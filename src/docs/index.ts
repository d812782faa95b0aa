/**
 * Documentation module.
 * Turns captured catalog data and a template into a README via the LLM.
 */

export { buildReadmePrompt, generateReadme, stripMarkdownFence } from './readme.js';
export type { ReadmeInput } from './readme.js';
export { fetchTemplate, resolveTemplate, isRemoteTemplate } from './template.js';
export type { FetchLike } from './template.js';
export { DocsError } from './errors.js';
