// ── Linked queue node ────────────────────────────────────────

interface Node<T> {
  readonly value: T;
  next: Node<T> | null;
}

// ── Mailbox ──────────────────────────────────────────────────

/**
 * Unbounded FIFO with an async `take()`.
 * Items handed to a waiting taker skip the queue; otherwise they are
 * appended. Either way insertion order is delivery order.
 */
export class Mailbox<T> {
  private head: Node<T> | null = null;
  private tail: Node<T> | null = null;
  private count = 0;
  private readonly takers: Array<(item: T) => void> = [];

  get size(): number {
    return this.count;
  }

  enqueue(item: T): void {
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return;
    }

    const node: Node<T> = { value: item, next: null };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.count++;
  }

  take(): Promise<T> {
    const node = this.head;
    if (node) {
      this.head = node.next;
      if (!this.head) this.tail = null;
      this.count--;
      return Promise.resolve(node.value);
    }

    return new Promise<T>((resolve) => {
      this.takers.push(resolve);
    });
  }
}
