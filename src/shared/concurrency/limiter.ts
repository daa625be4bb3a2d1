export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount(): number;
  pendingCount(): number;
  /** Resolves once a new task would start immediately. */
  whenSlotAvailable(): Promise<void>;
};

/**
 * Bounds how many tasks run at once. Queued tasks start in submission order.
 *   const limit = createLimiter(4);
 *   await Promise.all(batches.map((b) => limit(() => reconcile(b))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];
  const slotWaiters: Array<() => void> = [];

  const hasFreeSlot = () => active + queue.length < concurrency;

  const notifySlotWaiters = () => {
    while (slotWaiters.length > 0 && hasFreeSlot()) {
      slotWaiters.shift()?.();
    }
  };

  const next = () => {
    if (active < concurrency) {
      const start = queue.shift();
      if (start) {
        active += 1;
        start();
      }
    }
    notifySlotWaiters();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return Object.assign(limit, {
    activeCount: () => active,
    pendingCount: () => queue.length,
    whenSlotAvailable: () =>
      hasFreeSlot() ? Promise.resolve() : new Promise<void>((resolve) => slotWaiters.push(resolve))
  });
};
