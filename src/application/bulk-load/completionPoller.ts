import type { Batch, Job, TerminalBatchState } from "../../core/bulk/bulk.types";
import { isTerminalBatchState } from "../../core/bulk/bulk.types";
import {
  CancelledError,
  PollingError,
  TimeoutError,
  TransportError,
  toErrorMessage,
  type PartialCompletion
} from "../../core/bulk/errors";
import type { BatchStateSnapshot, BulkService } from "../../ports/BulkService";
import { sleep, throwIfAborted } from "../../shared/async/abort";

export type AwaitOptions = {
  pollIntervalMs: number;
  maxWaitMs?: number;
  maxPollFailures: number;
  signal?: AbortSignal;
  now?: () => number;
};

/**
 * Polls the job's batch states until every tracked batch is Completed or Failed.
 *
 * One bulk status call per cycle; the first cycle runs immediately, later ones after
 * `pollIntervalMs`. Observed states are written back onto the Batch objects.
 */
export const awaitAll = async (
  service: BulkService,
  job: Job,
  batches: readonly Batch[],
  opts: AwaitOptions
): Promise<Map<string, TerminalBatchState>> => {
  const { pollIntervalMs, maxWaitMs, maxPollFailures, signal, now = Date.now } = opts;
  const byId = new Map(batches.map((batch) => [batch.id, batch]));
  const resolved = new Map<string, TerminalBatchState>();
  const pending = new Set<string>();

  for (const batch of batches) {
    if (isTerminalBatchState(batch.state)) {
      resolved.set(batch.id, batch.state);
    } else {
      pending.add(batch.id);
    }
  }

  const snapshot = (): PartialCompletion => ({ resolved: new Map(resolved), pending: [...pending] });
  const startedAt = now();
  let cycle = 0;
  let consecutiveFailures = 0;

  while (pending.size > 0) {
    if (cycle === 0) {
      throwIfAborted(signal);
    } else {
      let delayMs = pollIntervalMs;
      if (maxWaitMs !== undefined) {
        const elapsedMs = now() - startedAt;
        const remainingMs = maxWaitMs - elapsedMs;
        if (remainingMs <= 0) {
          throw new TimeoutError({
            message: `Job ${job.id}: ${pending.size} batch(es) not terminal after ${elapsedMs}ms`,
            context: { elapsedMs, pending: pending.size },
            completion: snapshot()
          });
        }
        delayMs = Math.min(delayMs, remainingMs);
      }
      await sleep(delayMs, signal);
    }
    cycle += 1;

    let states: BatchStateSnapshot[];
    try {
      states = await service.getBatchStates(job.id, signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (err instanceof TransportError && consecutiveFailures < maxPollFailures) {
        consecutiveFailures += 1;
        console.warn(JSON.stringify({
          event: "bulk.poll_failed",
          jobId: job.id,
          cycle,
          consecutiveFailures,
          message: err.message
        }));
        continue;
      }
      throw new PollingError({
        message: `Job ${job.id}: batch status polling failed: ${toErrorMessage(err)}`,
        context: { attempt: consecutiveFailures + 1, pending: pending.size },
        completion: snapshot(),
        cause: err
      });
    }
    consecutiveFailures = 0;

    for (const observed of states) {
      const batch = byId.get(observed.batchId);
      if (!batch || !pending.has(observed.batchId)) continue;

      batch.state = observed.state;
      batch.stateMessage = observed.stateMessage;
      if (isTerminalBatchState(observed.state)) {
        pending.delete(observed.batchId);
        resolved.set(observed.batchId, observed.state);
        console.log(JSON.stringify({
          event: "bulk.batch_terminal",
          jobId: job.id,
          batchId: observed.batchId,
          state: observed.state
        }));
      }
    }

    console.log(JSON.stringify({ event: "bulk.poll", jobId: job.id, cycle, pending: pending.size }));
  }

  return resolved;
};
