// FIFO task runner: one task at a time, in enqueue order. A failing task is
// handed to onError and never stops the tasks queued behind it.

export type QueuedTask = () => Promise<void>;

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private readonly onError: (err: unknown) => void;

  constructor(onError: (err: unknown) => void) {
    this.onError = onError;
  }

  get size(): number {
    return this.pending;
  }

  enqueue(task: QueuedTask): void {
    this.pending++;
    this.tail = this.tail
      .then(task)
      .catch((err: unknown) => this.onError(err))
      .finally(() => {
        this.pending--;
      });
  }

  /** Resolves once every task enqueued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
