import { Readable } from "stream";
import type { Batch, Chunk, Job, OperationKind, Report, TerminalBatchState } from "../../core/bulk/bulk.types";
import { CancelledError, PollingError, TimeoutError } from "../../core/bulk/errors";
import { chunkDataset } from "../../core/chunking/chunkDataset";
import { readLines } from "../../core/chunking/readLines";
import type { BulkService } from "../../ports/BulkService";
import type { ChunkStager } from "../../ports/ChunkStager";
import { createLimiter } from "../../shared/concurrency/limiter";
import { awaitAll } from "./completionPoller";
import { JobController } from "./jobController";
import type { LoaderConfigInput } from "./loader.config";
import { resolveLoaderConfig } from "./loader.config";
import { collectOutcomes } from "./resultReconciler";
import { createReportTracker, summarizeReport, toBatchFailure } from "./bulkLoad.error-handler";

export type LoadRequest = {
  dataset: Readable | AsyncIterable<string>; // a UTF-8 byte stream, or its lines
  objectType: string;
  operation: OperationKind;
  externalIdField?: string;
};

const firstRejection = (results: PromiseSettledResult<unknown>[]): unknown => {
  const rejected = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
  return rejected?.reason;
};

/**
 * Chunks the dataset, submits every chunk as a batch of one job, closes the job,
 * waits for every batch and reconciles the results into a Report.
 *
 * Job setup failures abort the run. Once one batch is in, later submission, polling and
 * reconciliation failures become degraded report entries instead.
 */
export const loadRecords = async (deps: {
  service: BulkService;
  stager?: ChunkStager;
  config?: LoaderConfigInput;
  request: LoadRequest;
  signal?: AbortSignal;
}): Promise<Report> => {
  const { service, request, signal } = deps;
  const config = resolveLoaderConfig(deps.config);
  const controller = new JobController(service, deps.stager);
  const limit = createLimiter(config.concurrency);

  const lines = request.dataset instanceof Readable ? readLines(request.dataset) : request.dataset;
  const chunks = chunkDataset(lines, { maxBytes: config.maxBytes, maxRows: config.maxRows }, signal);

  // A missing header must fail the run before any remote state exists.
  let next = await chunks.next();
  let job: Job;
  try {
    job = await controller.createJob(request.objectType, request.operation, {
      externalIdField: request.externalIdField,
      signal
    });
  } catch (err) {
    await chunks.return(undefined);
    throw err;
  }
  const tracker = createReportTracker(job);

  const submitted: Batch[] = [];
  const earlyFailures: Array<{ chunk: Chunk; reason: unknown }> = [];
  const inflight: Array<Promise<void>> = [];
  let pauseSubmitting = false;
  let cancelled: unknown;

  const submit = (chunk: Chunk) => {
    const upload = limit(async () => {
      try {
        submitted.push(await controller.submitBatch(job, chunk, signal));
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        console.warn(JSON.stringify({
          event: "bulk.batch_submit_failed",
          jobId: job.id,
          chunkIndex: chunk.index,
          rows: chunk.rows.length,
          ...toBatchFailure(err)
        }));
        if (submitted.length === 0) {
          earlyFailures.push({ chunk, reason: err });
          pauseSubmitting = true;
          return;
        }
        tracker.addSubmissionFailure(chunk, err);
      }
    });
    inflight.push(upload.then(() => undefined, (err: unknown) => {
      cancelled ??= err;
    }));
  };

  const flushEarlyFailures = () => {
    for (const { chunk, reason } of earlyFailures) {
      tracker.addSubmissionFailure(chunk, reason);
    }
    earlyFailures.length = 0;
  };

  let chunkingFailure: { reason: unknown } | undefined;
  try {
    while (!next.done && cancelled === undefined) {
      submit(next.value);
      await limit.whenSlotAvailable();
      // Until one batch is in, a failed upload may mean the job itself is unusable.
      if (pauseSubmitting) {
        await Promise.all(inflight);
        if (submitted.length === 0) break;
        flushEarlyFailures();
        pauseSubmitting = false;
      }
      if (cancelled !== undefined) break;
      next = await chunks.next();
    }
  } catch (err) {
    chunkingFailure = { reason: err };
  }
  // Let in-flight uploads release their staged chunks before leaving.
  await Promise.all(inflight);
  await chunks.return(undefined);
  if (chunkingFailure) throw chunkingFailure.reason;
  if (cancelled !== undefined) throw cancelled;

  if (submitted.length === 0 && earlyFailures.length > 0) {
    earlyFailures.sort((a, b) => a.chunk.index - b.chunk.index);
    throw earlyFailures[0].reason;
  }
  flushEarlyFailures();

  await controller.closeJob(job, signal);
  submitted.sort((a, b) => a.chunkIndex - b.chunkIndex);

  let terminal: Map<string, TerminalBatchState>;
  try {
    terminal = await awaitAll(service, job, submitted, {
      pollIntervalMs: config.pollIntervalMs,
      maxWaitMs: config.maxWaitMs,
      maxPollFailures: config.maxPollFailures,
      signal
    });
  } catch (err) {
    if (!(err instanceof TimeoutError || err instanceof PollingError)) throw err;
    terminal = new Map(err.completion.resolved);
    for (const batch of submitted) {
      if (terminal.has(batch.id)) continue;
      tracker.addUnresolved(batch, err);
      console.warn(JSON.stringify({
        event: "bulk.batch_unresolved",
        jobId: job.id,
        batchId: batch.id,
        chunkIndex: batch.chunkIndex,
        lastKnownState: batch.state,
        code: err.code
      }));
    }
  }

  const reconciliations = submitted.flatMap((batch) => {
    const state = terminal.get(batch.id);
    if (state === undefined) return [];
    return [
      limit(async () => {
        try {
          tracker.addReconciled(batch, state, await collectOutcomes(service, job, batch, signal));
        } catch (err) {
          if (err instanceof CancelledError) throw err;
          tracker.addReconcileFailure(batch, state, err);
          console.warn(JSON.stringify({
            event: "bulk.reconcile_failed",
            jobId: job.id,
            batchId: batch.id,
            chunkIndex: batch.chunkIndex,
            ...toBatchFailure(err)
          }));
        }
      })
    ];
  });
  const cancelledReconcile = firstRejection(await Promise.allSettled(reconciliations));
  if (cancelledReconcile !== undefined) throw cancelledReconcile;

  const report = tracker.build();
  console.log(JSON.stringify({ event: "bulk.completed", ...summarizeReport(report) }));
  return report;
};
