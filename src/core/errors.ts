// ── Submission ───────────────────────────────────────────────

/** Raised in the caller's context before anything is enqueued. */
export class SubmissionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubmissionError';
  }
}

/**
 * The caller stopped waiting for a reply.
 * The task itself keeps its place in the queue and still runs.
 */
export class SubmitTimeoutError extends Error {
  readonly taskId: number;
  readonly timeoutMs: number;

  constructor(taskId: number, timeoutMs: number) {
    super(`Task ${String(taskId)} did not reply within ${String(timeoutMs)}ms`);
    this.name = 'SubmitTimeoutError';
    this.taskId = taskId;
    this.timeoutMs = timeoutMs;
  }
}

// ── Reply slot ───────────────────────────────────────────────

export class ReplySlotError extends Error {
  constructor(taskId: number) {
    super(`Reply slot for task ${String(taskId)} was already filled`);
    this.name = 'ReplySlotError';
  }
}
