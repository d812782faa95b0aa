/**
 * Workflow module.
 * Runs a parsed workflow: browser actions go through the performer, data
 * steps run here, and a context object carries values between them.
 */

export { runWorkflow, describeStep } from './runner.js';
export type { WorkflowDeps, WorkflowResult, StepRecord } from './runner.js';
export { WorkflowContext } from './context.js';
export type { ScalarValue } from './context.js';
export { WorkflowError } from './errors.js';
