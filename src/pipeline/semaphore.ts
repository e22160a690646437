import { abortReason } from "./errors.js";

export type Release = () => void;

export interface Semaphore {
  /** Resolves with a release callback once a permit is free; rejects if `signal` aborts first. */
  acquire(signal?: AbortSignal): Promise<Release>;
  readonly active: number;
  readonly waiting: number;
}

interface Waiter {
  grant: (release: Release) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore shared by every fetch in a pipeline. Waiters are served
 * FIFO; an aborted waiter leaves the queue without consuming a permit.
 */
export function createSemaphore(limit: number): Semaphore {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
  }

  let active = 0;
  const queue: Waiter[] = [];

  function makeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = queue.shift();
      if (next) {
        // Hand the permit straight over; `active` stays the same
        if (next.onAbort) next.signal?.removeEventListener("abort", next.onAbort);
        next.grant(makeRelease());
      } else {
        active--;
      }
    };
  }

  return {
    acquire(signal) {
      if (signal?.aborted) return Promise.reject(abortReason(signal));
      if (active < limit) {
        active++;
        return Promise.resolve(makeRelease());
      }
      return new Promise<Release>((resolve, reject) => {
        const waiter: Waiter = { grant: resolve, signal };
        if (signal) {
          waiter.onAbort = () => {
            const idx = queue.indexOf(waiter);
            if (idx !== -1) queue.splice(idx, 1);
            reject(abortReason(signal));
          };
          signal.addEventListener("abort", waiter.onAbort, { once: true });
        }
        queue.push(waiter);
      });
    },
    get active() {
      return active;
    },
    get waiting() {
      return queue.length;
    },
  };
}
