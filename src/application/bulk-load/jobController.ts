import type { Batch, Chunk, Job, OperationKind } from "../../core/bulk/bulk.types";
import { isOperationKind } from "../../core/bulk/bulk.types";
import { JobDescriptorError, JobStateError } from "../../core/bulk/errors";
import type { BulkService } from "../../ports/BulkService";
import type { ChunkStager } from "../../ports/ChunkStager";
import { MemoryChunkStager } from "../../infrastructure/staging/MemoryChunkStager";

/**
 * Creates the remote job, uploads chunks as batches and closes the job.
 * No retries: remote failures propagate to the caller.
 */
export class JobController {
  constructor(
    private readonly service: BulkService,
    private readonly stager: ChunkStager = new MemoryChunkStager()
  ) {}

  async createJob(objectType: string, operation: OperationKind, opts: { externalIdField?: string; signal?: AbortSignal } = {}): Promise<Job> {
    const object = objectType.trim();
    if (object === "") {
      throw new JobDescriptorError({ message: "Job object type must not be blank" });
    }
    if (!isOperationKind(operation)) {
      throw new JobDescriptorError({ message: `Unsupported job operation: ${String(operation)}` });
    }
    const externalIdField = opts.externalIdField?.trim() || undefined;
    if (operation === "upsert" && externalIdField === undefined) {
      throw new JobDescriptorError({ message: "upsert jobs require an external id field" });
    }

    const descriptor = { objectType: object, operation, ...(externalIdField ? { externalIdField } : {}) };
    const id = await this.service.createJob(descriptor, opts.signal);
    console.log(JSON.stringify({ event: "bulk.job_created", jobId: id, objectType: object, operation }));
    return { ...descriptor, id, state: "Open" };
  }

  async submitBatch(job: Job, chunk: Chunk, signal?: AbortSignal): Promise<Batch> {
    if (job.state !== "Open") {
      throw new JobStateError({
        message: `Job ${job.id} is closed; chunk ${chunk.index} cannot be submitted`,
        context: { chunkIndex: chunk.index }
      });
    }

    const staged = await this.stager.stage(chunk, signal);
    try {
      const id = await this.service.submitBatch(job.id, staged, signal);
      const batch: Batch = {
        id,
        jobId: job.id,
        chunkIndex: chunk.index,
        rowCount: chunk.rows.length,
        byteLength: staged.byteLength,
        state: "Queued"
      };
      console.log(JSON.stringify({
        event: "bulk.batch_submitted",
        jobId: job.id,
        batchId: id,
        chunkIndex: chunk.index,
        rows: batch.rowCount,
        bytes: batch.byteLength
      }));
      return batch;
    } finally {
      await staged.release();
    }
  }

  async closeJob(job: Job, signal?: AbortSignal): Promise<void> {
    if (job.state !== "Open") {
      throw new JobStateError({ message: `Job ${job.id} is already closed` });
    }
    await this.service.closeJob(job.id, signal);
    job.state = "Closed";
    console.log(JSON.stringify({ event: "bulk.job_closed", jobId: job.id }));
  }
}
