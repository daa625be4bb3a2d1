import type {
  Batch,
  BatchFailure,
  BatchReportEntry,
  Chunk,
  Job,
  RecordOutcome,
  Report,
  TerminalBatchState
} from "../../core/bulk/bulk.types";
import { BulkLoadError, toErrorMessage } from "../../core/bulk/errors";

export const toBatchFailure = (reason: unknown): BatchFailure => ({
  code: reason instanceof BulkLoadError ? reason.code : "unexpected",
  message: toErrorMessage(reason)
});

/**
 * Collects one entry per chunk while the run progresses and freezes them into a Report.
 * Every entry is keyed by chunk index, so a batch can only be reported once.
 */
export const createReportTracker = (job: Job) => {
  const entries = new Map<number, BatchReportEntry>();

  const add = (entry: BatchReportEntry) => {
    if (entries.has(entry.chunkIndex)) {
      throw new Error(`Chunk ${entry.chunkIndex} of job ${job.id} was already reported`);
    }
    entries.set(entry.chunkIndex, entry);
  };

  return {
    addSubmissionFailure: (chunk: Pick<Chunk, "index" | "rows">, reason: unknown) =>
      add({ kind: "submission_failed", chunkIndex: chunk.index, rowCount: chunk.rows.length, failure: toBatchFailure(reason) }),
    addReconciled: (batch: Batch, state: TerminalBatchState, outcomes: readonly RecordOutcome[]) =>
      add({
        kind: "reconciled",
        chunkIndex: batch.chunkIndex,
        batchId: batch.id,
        state,
        ...(batch.stateMessage ? { stateMessage: batch.stateMessage } : {}),
        outcomes: Object.freeze([...outcomes])
      }),
    addReconcileFailure: (batch: Batch, state: TerminalBatchState, reason: unknown) =>
      add({ kind: "reconcile_failed", chunkIndex: batch.chunkIndex, batchId: batch.id, state, failure: toBatchFailure(reason) }),
    addUnresolved: (batch: Batch, reason: unknown) =>
      add({
        kind: "unresolved",
        chunkIndex: batch.chunkIndex,
        batchId: batch.id,
        lastKnownState: batch.state,
        failure: toBatchFailure(reason)
      }),
    build: (): Report => {
      const batches = [...entries.values()].sort((a, b) => a.chunkIndex - b.chunkIndex);
      const outcomesByBatch = new Map<string, readonly RecordOutcome[]>();
      let createdCount = 0;
      let updatedCount = 0;
      let failedCount = 0;

      for (const entry of batches) {
        Object.freeze(entry);
        if (entry.kind !== "reconciled") continue;
        outcomesByBatch.set(entry.batchId, entry.outcomes);
        for (const outcome of entry.outcomes) {
          if (outcome.status === "created") createdCount += 1;
          else if (outcome.status === "updated") updatedCount += 1;
          else failedCount += 1;
        }
      }

      return Object.freeze({
        jobId: job.id,
        objectType: job.objectType,
        operation: job.operation,
        batches: Object.freeze(batches),
        outcomesByBatch,
        createdCount,
        updatedCount,
        failedCount,
        totalRecords: createdCount + updatedCount + failedCount,
        unresolvedBatchCount: batches.filter((entry) => entry.kind === "unresolved").length,
        degradedBatchCount: batches.filter((entry) => entry.kind !== "reconciled").length
      });
    }
  };
};

export const summarizeReport = (report: Report) => ({
  jobId: report.jobId,
  objectType: report.objectType,
  operation: report.operation,
  batches: report.batches.length,
  createdCount: report.createdCount,
  updatedCount: report.updatedCount,
  failedCount: report.failedCount,
  totalRecords: report.totalRecords,
  unresolvedBatchCount: report.unresolvedBatchCount,
  degradedBatchCount: report.degradedBatchCount
});
