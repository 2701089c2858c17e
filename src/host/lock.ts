import { AsyncLocalStorage } from "async_hooks";

// FIFO mutex for async work. Reentrancy follows the async call chain: a
// run() started from inside another run() of the same lock executes
// immediately instead of queueing behind itself.
export class ReentrantLock {
  private readonly holder = new AsyncLocalStorage<symbol>();
  private readonly token: symbol;
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  constructor(readonly name = "host") {
    this.token = Symbol(name);
  }

  isHeld(): boolean {
    return this.holder.getStore() === this.token;
  }

  // Callers queued behind the current holder.
  get pending(): number {
    return this.waiting;
  }

  async run<T>(work: () => Promise<T> | T): Promise<T> {
    if (this.isHeld()) {
      return work();
    }

    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => released);

    this.waiting++;
    try {
      await previous;
    } finally {
      this.waiting--;
    }

    try {
      return await this.holder.run(this.token, work);
    } finally {
      release();
    }
  }
}
