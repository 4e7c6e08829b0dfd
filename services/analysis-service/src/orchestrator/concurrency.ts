import { BackendError } from "../backends/errors";

export type AcquirePriority = "capture" | "stream";

export type Release = () => void;

type Waiter = {
  priority: AcquirePriority;
  grant: (release: Release) => void;
};

/**
 * Counting semaphore whose waiters are served capture-first, FIFO within a
 * priority. With capacity 1 it guards the device-exclusive inference slot.
 */
export class PrioritySemaphore {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(priority: AcquirePriority, signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new BackendError("CANCELLED", "Cancelled while waiting for an analysis slot"));
    }
    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new BackendError("CANCELLED", "Cancelled while waiting for an analysis slot"));
      };
      const waiter: Waiter = {
        priority,
        grant: (release) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(release);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.enqueue(waiter);
    });
  }

  private enqueue(waiter: Waiter): void {
    if (waiter.priority === "capture") {
      const firstStream = this.waiters.findIndex((entry) => entry.priority === "stream");
      if (firstStream !== -1) {
        this.waiters.splice(firstStream, 0, waiter);
        return;
      }
    }
    this.waiters.push(waiter);
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.active -= 1;
      this.dispatch();
    };
  }

  private dispatch(): void {
    while (this.active < this.capacity && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next) {
        return;
      }
      this.active += 1;
      next.grant(this.createRelease());
    }
  }
}
