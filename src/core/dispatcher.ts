import { SubmissionError, SubmitTimeoutError } from './errors.js';
import type { Operation, Task, TaskOutcome } from './task.js';
import { createTask } from './task.js';
import type { Mailbox } from './mailbox.js';

// ── Public types ─────────────────────────────────────────────

export interface SubmitOptions {
  /**
   * Stop waiting after this many milliseconds.
   * The task is not cancelled: it keeps its place and still runs.
   */
  timeoutMs?: number | undefined;
}

// ── Dispatcher ───────────────────────────────────────────────

/**
 * Caller-facing handle to a Worker. Holds nothing but the mailbox, so any
 * number of call sites can share one instance and await their own results.
 */
export class Dispatcher<R> {
  private readonly mailbox: Mailbox<Task<R>>;
  private nextId = 1;

  constructor(mailbox: Mailbox<Task<R>>) {
    this.mailbox = mailbox;
  }

  /** Run `operation` on the Worker; resolve with its value or rethrow its error. */
  async submit<T>(
    operation: Operation<R, T>,
    options: SubmitOptions = {},
  ): Promise<T> {
    const outcome = await this.submitSettled(operation, options);
    if (outcome.ok) return outcome.value;
    throw outcome.failure.error;
  }

  /** Like `submit`, but resolves with the tagged outcome instead of throwing. */
  submitSettled<T>(
    operation: Operation<R, T>,
    options: SubmitOptions = {},
  ): Promise<TaskOutcome<T>> {
    if (typeof operation !== 'function') {
      return Promise.reject(
        new SubmissionError(
          `Operation must be a function, received ${describeValue(operation)}`,
        ),
      );
    }

    const { timeoutMs } = options;
    if (timeoutMs !== undefined && !(timeoutMs > 0)) {
      return Promise.reject(
        new SubmissionError(
          `timeoutMs must be a positive number, received ${String(timeoutMs)}`,
        ),
      );
    }

    const { task, outcome } = createTask(this.nextId++, operation);
    this.mailbox.enqueue(task);

    if (timeoutMs === undefined) return outcome;
    return withWaitLimit(outcome, task.id, timeoutMs);
  }
}

// ── Helpers ──────────────────────────────────────────────────

function withWaitLimit<T>(
  outcome: Promise<TaskOutcome<T>>,
  taskId: number,
  timeoutMs: number,
): Promise<TaskOutcome<T>> {
  return new Promise<TaskOutcome<T>>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new SubmitTimeoutError(taskId, timeoutMs));
    }, timeoutMs);

    void outcome.then((result) => {
      clearTimeout(timer);
      resolve(result);
    });
  });
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  return typeof value;
}
