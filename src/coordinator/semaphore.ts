/**
 * Counting semaphore with a FIFO wait queue.
 *
 * `acquire()` resolves to a release function once a slot is free.
 * Waiters are admitted in arrival order. `rejectWaiting()` fails every
 * queued acquisition, which is how shutdown drains the queue.
 */

type Release = () => void;

interface Waiter {
  resolve: (release: Release) => void;
  reject: (error: Error) => void;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }
    return new Promise<Release>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Fail every queued acquisition with `error`. Held slots are unaffected. */
  rejectWaiting(error: Error): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  /** Slots currently held */
  get inFlight(): number {
    return this.capacity - this.available;
  }

  /** Acquisitions waiting for a slot */
  get queued(): number {
    return this.waiters.length;
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter.
        next.resolve(this.releaser());
      } else {
        this.available++;
      }
    };
  }
}
