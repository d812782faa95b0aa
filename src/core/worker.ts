import { Mailbox } from './mailbox.js';
import type { Operation, Task, TaskOutcome } from './task.js';
import { describeFailure } from './task.js';

// ── Public types ─────────────────────────────────────────────

/** Builds the resource a Worker owns. Runs once, before the loop starts. */
export type ResourceFactory<R> = () => R | Promise<R>;

export type WorkerState = 'idle' | 'executing';

// ── Worker ───────────────────────────────────────────────────

/**
 * Sole owner of a resource that must never be driven concurrently.
 *
 * The loop takes one Task at a time from the mailbox, awaits its operation
 * to completion, writes the outcome into the task's reply slot, and only
 * then takes the next. Nothing outside the loop holds the resource.
 */
export class Worker<R> {
  readonly mailbox = new Mailbox<Task<R>>();

  private readonly resource: R;
  private currentState: WorkerState = 'idle';
  private completed = 0;

  private constructor(resource: R) {
    this.resource = resource;
    // run() turns every operation failure into an outcome; it never settles.
    void this.run();
  }

  /** Construct the resource, then start the loop. Rejects if construction fails. */
  static async start<R>(factory: ResourceFactory<R>): Promise<Worker<R>> {
    const resource = await factory();
    return new Worker<R>(resource);
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /** Tasks waiting in the mailbox (not counting one being executed). */
  get pending(): number {
    return this.mailbox.size;
  }

  get processed(): number {
    return this.completed;
  }

  // ── Loop ───────────────────────────────────────────────────

  private async run(): Promise<never> {
    for (;;) {
      const task = await this.mailbox.take();

      this.currentState = 'executing';
      const outcome = await execute(task.operation, this.resource);
      task.reply.fill(outcome);
      this.completed++;
      this.currentState = 'idle';
    }
  }
}

// ── Execution ────────────────────────────────────────────────

async function execute<R>(
  operation: Operation<R, unknown>,
  resource: R,
): Promise<TaskOutcome<unknown>> {
  try {
    const value = await operation(resource);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, failure: describeFailure(err) };
  }
}
