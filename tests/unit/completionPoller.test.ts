import type { Batch, Job } from "../../src/core/bulk/bulk.types";
import {
  CancelledError,
  PollingError,
  RemoteServiceError,
  TimeoutError,
  TransportError
} from "../../src/core/bulk/errors";
import { awaitAll } from "../../src/application/bulk-load/completionPoller";
import type { BatchStateSnapshot, BulkService } from "../../src/ports/BulkService";
import { silenceConsole } from "../support/inMemoryBulkService";

const job: Job = { id: "job-1", objectType: "Account", operation: "insert", state: "Closed" };

const batch = (id: string, chunkIndex: number): Batch => ({
  id,
  jobId: job.id,
  chunkIndex,
  rowCount: 1,
  byteLength: 10,
  state: "Queued"
});

const scriptedService = (cycles: Array<BatchStateSnapshot[] | Error>) => {
  let calls = 0;
  const service: BulkService = {
    createJob: jest.fn(),
    submitBatch: jest.fn(),
    closeJob: jest.fn(),
    getBatchResultStream: jest.fn(),
    getBatchStates: async () => {
      const step = cycles[Math.min(calls, cycles.length - 1)];
      calls += 1;
      if (step instanceof Error) throw step;
      return step;
    }
  };
  return { service, calls: () => calls };
};

describe("awaitAll", () => {
  let restoreConsole: () => void;

  beforeEach(() => {
    restoreConsole = silenceConsole();
  });

  afterEach(() => {
    restoreConsole();
  });

  it("polls until every batch is terminal and records observed states", async () => {
    const batches = [batch("b1", 0), batch("b2", 1)];
    const { service, calls } = scriptedService([
      [
        { batchId: "b1", state: "InProgress" },
        { batchId: "b2", state: "Queued" }
      ],
      [
        { batchId: "b1", state: "Completed" },
        { batchId: "b2", state: "InProgress" }
      ],
      [
        { batchId: "b1", state: "Completed" },
        { batchId: "b2", state: "Failed", stateMessage: "InvalidBatch : bad" }
      ]
    ]);

    const result = await awaitAll(service, job, batches, { pollIntervalMs: 1, maxPollFailures: 0 });

    expect([...result.entries()]).toEqual([
      ["b1", "Completed"],
      ["b2", "Failed"]
    ]);
    expect(calls()).toBe(3);
    expect(batches[0].state).toBe("Completed");
    expect(batches[1]).toMatchObject({ state: "Failed", stateMessage: "InvalidBatch : bad" });
  });

  it("ignores batches it does not track", async () => {
    const { service } = scriptedService([
      [
        { batchId: "other", state: "Queued" },
        { batchId: "b1", state: "Completed" }
      ]
    ]);

    const result = await awaitAll(service, job, [batch("b1", 0)], { pollIntervalMs: 1, maxPollFailures: 0 });
    expect([...result.keys()]).toEqual(["b1"]);
  });

  it("returns immediately without polling when there is nothing to wait for", async () => {
    const { service, calls } = scriptedService([[]]);
    await expect(awaitAll(service, job, [], { pollIntervalMs: 1, maxPollFailures: 0 })).resolves.toEqual(new Map());
    expect(calls()).toBe(0);
  });

  it("waits pollIntervalMs between cycles but not before the first one", async () => {
    jest.useFakeTimers();
    try {
      const { service, calls } = scriptedService([
        [{ batchId: "b1", state: "InProgress" }],
        [{ batchId: "b1", state: "Completed" }]
      ]);
      const waiting = awaitAll(service, job, [batch("b1", 0)], { pollIntervalMs: 10_000, maxPollFailures: 0 });

      await jest.advanceTimersByTimeAsync(0);
      expect(calls()).toBe(1);
      await jest.advanceTimersByTimeAsync(9_999);
      expect(calls()).toBe(1);
      await jest.advanceTimersByTimeAsync(1);

      await expect(waiting).resolves.toEqual(new Map([["b1", "Completed"]]));
      expect(calls()).toBe(2);
    } finally {
      jest.useRealTimers();
    }
  });

  it("fails with TimeoutError and reports what was resolved when maxWaitMs elapses", async () => {
    const { service } = scriptedService([
      [
        { batchId: "b1", state: "Completed" },
        { batchId: "b2", state: "InProgress" }
      ]
    ]);

    let error: unknown;
    try {
      await awaitAll(service, job, [batch("b1", 0), batch("b2", 1)], {
        pollIntervalMs: 5,
        maxWaitMs: 30,
        maxPollFailures: 0
      });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(TimeoutError);
    const timeout = error instanceof TimeoutError ? error : undefined;
    expect(timeout?.completion.pending).toEqual(["b2"]);
    expect([...(timeout?.completion.resolved.entries() ?? [])]).toEqual([["b1", "Completed"]]);
    expect(timeout?.context.pending).toBe(1);
  });

  it("tolerates transient transport failures up to maxPollFailures", async () => {
    const { service, calls } = scriptedService([
      new TransportError({ message: "socket hang up" }),
      new TransportError({ message: "socket hang up" }),
      [{ batchId: "b1", state: "Completed" }]
    ]);

    await expect(awaitAll(service, job, [batch("b1", 0)], { pollIntervalMs: 1, maxPollFailures: 2 })).resolves.toEqual(
      new Map([["b1", "Completed"]])
    );
    expect(calls()).toBe(3);
  });

  it("gives up with PollingError after too many consecutive failures", async () => {
    const { service, calls } = scriptedService([new TransportError({ message: "socket hang up" })]);

    await expect(
      awaitAll(service, job, [batch("b1", 0)], { pollIntervalMs: 1, maxPollFailures: 2 })
    ).rejects.toBeInstanceOf(PollingError);
    expect(calls()).toBe(3);
  });

  it("does not tolerate remote rejections of the status call", async () => {
    const { service, calls } = scriptedService([new RemoteServiceError({ message: "Bulk request failed: 400" })]);

    await expect(
      awaitAll(service, job, [batch("b1", 0)], { pollIntervalMs: 1, maxPollFailures: 5 })
    ).rejects.toThrow("Job job-1: batch status polling failed: Bulk request failed: 400");
    expect(calls()).toBe(1);
  });

  it("stops waiting when the signal aborts", async () => {
    const { service, calls } = scriptedService([[{ batchId: "b1", state: "InProgress" }]]);
    const controller = new AbortController();

    const waiting = awaitAll(service, job, [batch("b1", 0)], {
      pollIntervalMs: 60_000,
      maxPollFailures: 0,
      signal: controller.signal
    });
    setTimeout(() => controller.abort(), 10);

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect(calls()).toBe(1);
  });
});
