import { expect, test } from "vitest";
import { BackendError } from "../src/backends/errors";
import { PrioritySemaphore } from "../src/orchestrator/concurrency";

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return null;
}

test("capacity must be a positive integer", () => {
  expect(() => new PrioritySemaphore(0)).toThrow(RangeError);
});

test("waiters are served captures first and FIFO within a priority", async () => {
  const semaphore = new PrioritySemaphore(1);
  const order: string[] = [];
  const holder = await semaphore.acquire("stream");

  const waiters = [
    semaphore.acquire("stream").then((release) => {
      order.push("stream-1");
      release();
    }),
    semaphore.acquire("capture").then((release) => {
      order.push("capture-1");
      release();
    }),
    semaphore.acquire("stream").then((release) => {
      order.push("stream-2");
      release();
    }),
    semaphore.acquire("capture").then((release) => {
      order.push("capture-2");
      release();
    })
  ];
  expect(semaphore.pending).toBe(4);

  holder();
  await Promise.all(waiters);
  expect(order).toEqual(["capture-1", "capture-2", "stream-1", "stream-2"]);
  expect(semaphore.inUse).toBe(0);
});

test("releasing twice frees only one slot", async () => {
  const semaphore = new PrioritySemaphore(2);
  const first = await semaphore.acquire("capture");
  await semaphore.acquire("capture");
  first();
  first();
  expect(semaphore.inUse).toBe(1);
});

test("an aborted waiter leaves the queue without taking a slot", async () => {
  const semaphore = new PrioritySemaphore(1);
  const holder = await semaphore.acquire("capture");
  const controller = new AbortController();
  const waiting = semaphore.acquire("stream", controller.signal);
  controller.abort();

  const error = await captureRejection(waiting);
  expect(error instanceof BackendError ? error.kind : null).toBe("CANCELLED");
  expect(semaphore.pending).toBe(0);
  holder();
  expect(semaphore.inUse).toBe(0);
});

test("no more than capacity holders run at once", async () => {
  const semaphore = new PrioritySemaphore(3);
  let running = 0;
  let peak = 0;
  await Promise.all(
    Array.from({ length: 8 }, async () => {
      const release = await semaphore.acquire("stream");
      try {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running -= 1;
      } finally {
        release();
      }
    })
  );
  expect(peak).toBe(3);
  expect(semaphore.inUse).toBe(0);
});
