/**
 * Report generation module.
 * Deterministic; no LLM calls.
 * Turns a workflow result into JSON and markdown artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON, JSON_OUTPUT_VERSION } from './reporter.js';
export type { JsonOutput, JsonOutputStep } from './reporter.js';
