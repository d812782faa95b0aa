import { describe, expect, it } from 'vitest';

import { Mailbox } from '../mailbox.js';

describe('Mailbox', () => {
  it('delivers queued items in insertion order', async () => {
    const mailbox = new Mailbox<string>();
    mailbox.enqueue('a');
    mailbox.enqueue('b');
    mailbox.enqueue('c');

    expect(mailbox.size).toBe(3);
    expect(await mailbox.take()).toBe('a');
    expect(await mailbox.take()).toBe('b');
    expect(await mailbox.take()).toBe('c');
    expect(mailbox.size).toBe(0);
  });

  it('hands an item straight to a waiting taker', async () => {
    const mailbox = new Mailbox<number>();
    const taken = mailbox.take();

    mailbox.enqueue(7);

    expect(await taken).toBe(7);
    expect(mailbox.size).toBe(0);
  });

  it('serves waiting takers first-come first-served', async () => {
    const mailbox = new Mailbox<number>();
    const first = mailbox.take();
    const second = mailbox.take();

    mailbox.enqueue(1);
    mailbox.enqueue(2);

    expect(await first).toBe(1);
    expect(await second).toBe(2);
  });

  it('keeps falsy items', async () => {
    const mailbox = new Mailbox<number | null>();
    mailbox.enqueue(0);
    mailbox.enqueue(null);

    expect(await mailbox.take()).toBe(0);
    expect(await mailbox.take()).toBeNull();
  });

  it('keeps accepting after draining to empty', async () => {
    const mailbox = new Mailbox<string>();
    mailbox.enqueue('x');
    await mailbox.take();

    mailbox.enqueue('y');
    expect(mailbox.size).toBe(1);
    expect(await mailbox.take()).toBe('y');
  });
});
