import { ReplySlotError } from './errors.js';

// ── Operation ────────────────────────────────────────────────

/** A deferred computation over the resource owned by a Worker. */
export type Operation<R, T> = (resource: R) => T | Promise<T>;

// ── Tagged outcome ───────────────────────────────────────────

export interface TaskFailure {
  /** Error class name, or `typeof` for values that are not Errors. */
  kind: string;
  message: string;
  /** The thrown value, untouched. */
  error: unknown;
}

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: TaskFailure };

export function describeFailure(error: unknown): TaskFailure {
  if (error instanceof Error) {
    return { kind: error.name, message: error.message, error };
  }
  return { kind: typeof error, message: String(error), error };
}

// ── Reply slot ───────────────────────────────────────────────

/** Written once by the Worker, read once by the submitting caller. */
export interface ReplySlot<T> {
  readonly filled: boolean;
  readonly outcome: Promise<TaskOutcome<T>>;
  fill(outcome: TaskOutcome<T>): void;
}

function createReplySlot<T>(taskId: number): ReplySlot<T> {
  let filled = false;
  let resolve: (outcome: TaskOutcome<T>) => void = () => {};
  const outcome = new Promise<TaskOutcome<T>>((r) => {
    resolve = r;
  });

  return {
    get filled() {
      return filled;
    },
    outcome,
    fill(result: TaskOutcome<T>): void {
      if (filled) throw new ReplySlotError(taskId);
      filled = true;
      resolve(result);
    },
  };
}

// ── Task ─────────────────────────────────────────────────────

export interface Task<R> {
  readonly id: number;
  readonly operation: Operation<R, unknown>;
  readonly reply: ReplySlot<unknown>;
  readonly enqueuedAt: number;
}

export interface PendingTask<R, T> {
  task: Task<R>;
  outcome: Promise<TaskOutcome<T>>;
}

/**
 * Pair an operation with a fresh reply slot.
 * The typed `outcome` stays with the caller; the queue only sees `Task<R>`.
 */
export function createTask<R, T>(
  id: number,
  operation: Operation<R, T>,
): PendingTask<R, T> {
  const reply = createReplySlot<T>(id);
  const task: Task<R> = Object.freeze({
    id,
    operation,
    reply,
    enqueuedAt: Date.now(),
  });
  return { task, outcome: reply.outcome };
}
