import type { Readable } from "stream";
import type { BatchState, JobDescriptor } from "../core/bulk/bulk.types";

export type BatchPayload = {
  byteLength: number;
  open(): Readable; // fresh read of the staged CSV content
};

export type BatchStateSnapshot = {
  batchId: string;
  state: BatchState;
  stateMessage?: string;
};

/**
 * Remote asynchronous bulk service.
 * Implementations raise TransportError for connectivity failures,
 * RemoteServiceError when the service rejects a request and CancelledError once `signal` aborts.
 */
export interface BulkService {
  createJob(descriptor: JobDescriptor, signal?: AbortSignal): Promise<string>;
  submitBatch(jobId: string, payload: BatchPayload, signal?: AbortSignal): Promise<string>;
  closeJob(jobId: string, signal?: AbortSignal): Promise<void>;
  getBatchStates(jobId: string, signal?: AbortSignal): Promise<BatchStateSnapshot[]>;
  getBatchResultStream(jobId: string, batchId: string, signal?: AbortSignal): Promise<Readable>;
}
