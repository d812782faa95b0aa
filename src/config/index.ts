/**
 * Configuration module.
 * Constants plus the zod-validated workflow file loader.
 */

export { TIMEOUTS, README_GENERATION, CAPTURE, EXIT_CODES } from './defaults.js';
export { loadWorkflowFile, parseWorkflow } from './loader.js';
