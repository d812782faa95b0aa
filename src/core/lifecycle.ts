import { Dispatcher } from './dispatcher.js';
import type { ResourceFactory } from './worker.js';
import { Worker } from './worker.js';

// ── Public types ─────────────────────────────────────────────

export interface WorkerHost<R> {
  /** True once a Worker has been constructed successfully. */
  readonly initialized: boolean;
  /**
   * Return the shared Dispatcher, constructing the Worker on first use.
   * Concurrent first calls share a single construction.
   */
  getOrCreate(): Promise<Dispatcher<R>>;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Create the handle that owns "exactly one Worker" for a resource.
 * Pass the returned host to whatever needs the resource instead of
 * reaching for module state.
 */
export function createWorkerHost<R>(factory: ResourceFactory<R>): WorkerHost<R> {
  let dispatcher: Dispatcher<R> | null = null;
  let starting: Promise<Dispatcher<R>> | null = null;

  return {
    get initialized() {
      return dispatcher !== null;
    },

    getOrCreate(): Promise<Dispatcher<R>> {
      if (dispatcher) return Promise.resolve(dispatcher);

      if (!starting) {
        starting = Worker.start(factory).then(
          (worker) => {
            dispatcher = new Dispatcher(worker.mailbox);
            starting = null;
            return dispatcher;
          },
          (err: unknown) => {
            // Leave the host uninitialized so the next call retries.
            starting = null;
            throw err;
          },
        );
      }

      return starting;
    },
  };
}
