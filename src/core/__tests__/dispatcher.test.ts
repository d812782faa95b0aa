import { describe, expect, it } from 'vitest';

import { Dispatcher } from '../dispatcher.js';
import { SubmissionError, SubmitTimeoutError } from '../errors.js';
import type { Operation } from '../task.js';
import { Worker } from '../worker.js';

// ── Fixtures ─────────────────────────────────────────────────

interface Counter {
  value: number;
  log: string[];
}

class DriverFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DriverFault';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

async function startCounter(): Promise<{
  worker: Worker<Counter>;
  dispatcher: Dispatcher<Counter>;
}> {
  const worker = await Worker.start<Counter>(() => ({ value: 0, log: [] }));
  return { worker, dispatcher: new Dispatcher(worker.mailbox) };
}

// ── Tests ────────────────────────────────────────────────────

describe('Dispatcher.submit', () => {
  it('returns the value an operation computes', async () => {
    const { dispatcher } = await startCounter();

    expect(await dispatcher.submit(() => 42)).toBe(42);
  });

  it('forwards a failure and keeps serving later tasks', async () => {
    const { dispatcher } = await startCounter();

    await expect(
      dispatcher.submit(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await dispatcher.submit(() => 7)).toBe(7);
  });

  it('rethrows the very error object the operation raised', async () => {
    const { dispatcher } = await startCounter();
    const fault = new DriverFault('page crashed');

    const caught = await dispatcher
      .submit(async () => {
        await sleep(1);
        throw fault;
      })
      .catch((err: unknown) => err);

    expect(caught).toBe(fault);
    expect(caught).toBeInstanceOf(DriverFault);
  });

  it('forwards thrown values that are not Errors', async () => {
    const { dispatcher } = await startCounter();

    await expect(
      dispatcher.submit(() => {
        throw 'plain failure';
      }),
    ).rejects.toBe('plain failure');
  });

  it('never lets two operations overlap', async () => {
    const { dispatcher } = await startCounter();
    const intervals: Array<[number, number]> = [];
    let clock = 0;

    const op: Operation<Counter, void> = async () => {
      const entry = clock++;
      await sleep(2);
      intervals.push([entry, clock++]);
    };

    await Promise.all(Array.from({ length: 8 }, () => dispatcher.submit(op)));

    expect(intervals).toHaveLength(8);
    for (const [entry, exit] of intervals) {
      // With no overlap, every task bumps the clock twice in a row.
      expect(exit).toBe(entry + 1);
    }
  });

  it('starts tasks in submission order', async () => {
    const { dispatcher } = await startCounter();

    const jobs = ['a', 'b', 'c', 'd'].map((name, i) =>
      dispatcher.submit(async (counter) => {
        counter.log.push(name);
        await sleep(4 - i);
      }),
    );
    await Promise.all(jobs);

    const log = await dispatcher.submit((counter) => [...counter.log]);
    expect(log).toEqual(['a', 'b', 'c', 'd']);
  });

  it('gives each concurrent caller its own result', async () => {
    const { dispatcher } = await startCounter();

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        dispatcher.submit(async () => {
          await sleep(5 - n);
          return n;
        }),
      ),
    );

    expect(results).toEqual([1, 2, 3, 4, 5]);
  });

  it('applies operations to the owned resource in sequence', async () => {
    const { dispatcher } = await startCounter();

    await Promise.all(
      Array.from({ length: 5 }, () =>
        dispatcher.submit(async (counter) => {
          const seen = counter.value;
          await sleep(1);
          counter.value = seen + 1;
        }),
      ),
    );

    expect(await dispatcher.submit((counter) => counter.value)).toBe(5);
  });

  it('reports the worker as executing while an operation runs', async () => {
    const { worker, dispatcher } = await startCounter();

    const during = await dispatcher.submit(() => worker.state);

    expect(during).toBe('executing');
    expect(worker.state).toBe('idle');
    expect(worker.processed).toBe(1);
  });
});

describe('Dispatcher.submitSettled', () => {
  it('tags a successful outcome', async () => {
    const { dispatcher } = await startCounter();

    expect(await dispatcher.submitSettled(() => 'done')).toEqual({
      ok: true,
      value: 'done',
    });
  });

  it('tags a failure with its kind and message', async () => {
    const { dispatcher } = await startCounter();
    const fault = new DriverFault('detached');

    const outcome = await dispatcher.submitSettled(() => {
      throw fault;
    });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'DriverFault', message: 'detached', error: fault },
    });
  });
});

describe('submission checks', () => {
  it('rejects a non-function before anything is queued', async () => {
    const { worker, dispatcher } = await startCounter();
    const notAnOperation: unknown = null;

    await expect(
      dispatcher.submit(notAnOperation as Operation<Counter, number>),
    ).rejects.toThrow(SubmissionError);

    expect(worker.pending).toBe(0);
    expect(worker.processed).toBe(0);
  });

  it('rejects a non-positive wait limit', async () => {
    const { worker, dispatcher } = await startCounter();

    await expect(
      dispatcher.submit(() => 1, { timeoutMs: 0 }),
    ).rejects.toThrow('timeoutMs must be a positive number, received 0');
    expect(worker.processed).toBe(0);
  });
});

describe('wait limit', () => {
  it('stops waiting without cancelling the task', async () => {
    const { dispatcher } = await startCounter();

    const slow = dispatcher.submit(
      async (counter) => {
        await sleep(30);
        counter.value = 99;
      },
      { timeoutMs: 5 },
    );

    await expect(slow).rejects.toBeInstanceOf(SubmitTimeoutError);
    await expect(slow).rejects.toThrow('Task 1 did not reply within 5ms');

    // Queued behind the slow task, so it observes the slow task's write.
    expect(await dispatcher.submit((counter) => counter.value)).toBe(99);
  });

  it('resolves normally when the reply arrives in time', async () => {
    const { dispatcher } = await startCounter();

    expect(await dispatcher.submit(() => 'fast', { timeoutMs: 1_000 })).toBe(
      'fast',
    );
  });
});
