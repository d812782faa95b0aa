/**
 * Serialized execution core.
 * One Worker owns a resource; every call site reaches it through a
 * Dispatcher, and operations run one at a time in submission order.
 */

export { Mailbox } from './mailbox.js';
export { createTask, describeFailure } from './task.js';
export type {
  Operation,
  PendingTask,
  ReplySlot,
  Task,
  TaskFailure,
  TaskOutcome,
} from './task.js';
export { Worker } from './worker.js';
export type { ResourceFactory, WorkerState } from './worker.js';
export { Dispatcher } from './dispatcher.js';
export type { SubmitOptions } from './dispatcher.js';
export { createWorkerHost } from './lifecycle.js';
export type { WorkerHost } from './lifecycle.js';
export { SubmissionError, SubmitTimeoutError, ReplySlotError } from './errors.js';
