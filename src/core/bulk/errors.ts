export type BulkErrorCode =
  | "transport_failed"
  | "remote_rejected"
  | "chunking_failed"
  | "poll_timeout"
  | "poll_failed"
  | "cancelled"
  | "job_state"
  | "invalid_job";

export type BulkErrorContext = Partial<{
  chunkIndex: number;
  rowCount: number;
  status: number;
  attempt: number;
  elapsedMs: number;
  pending: number;
}>;

type BulkErrorArgs = {
  message: string;
  context?: BulkErrorContext;
  cause?: unknown;
};

/**
 * Base class for every failure raised by the loader.
 * `context` only carries numbers so it can be logged without leaking payloads.
 */
export abstract class BulkLoadError extends Error {
  abstract readonly code: BulkErrorCode;
  readonly context: BulkErrorContext;

  protected constructor(name: string, args: BulkErrorArgs) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = name;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network or connectivity failure talking to the remote service. Retrying may help. */
export class TransportError extends BulkLoadError {
  readonly code = "transport_failed";
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryAfterMs?: number;

  constructor(args: BulkErrorArgs & { status?: number; isTimeout?: boolean; retryAfterMs?: number }) {
    super("TransportError", args);
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryAfterMs = args.retryAfterMs;
  }
}

/** The remote service rejected a request. Never retried automatically. */
export class RemoteServiceError extends BulkLoadError {
  readonly code = "remote_rejected";
  readonly status?: number;
  readonly remoteCode?: string;

  constructor(args: BulkErrorArgs & { status?: number; remoteCode?: string }) {
    super("RemoteServiceError", args);
    this.status = args.status;
    this.remoteCode = args.remoteCode;
  }
}

export class ChunkingError extends BulkLoadError {
  readonly code = "chunking_failed";

  constructor(args: BulkErrorArgs) {
    super("ChunkingError", args);
  }
}

export class JobStateError extends BulkLoadError {
  readonly code = "job_state";

  constructor(args: BulkErrorArgs) {
    super("JobStateError", args);
  }
}

export class JobDescriptorError extends BulkLoadError {
  readonly code = "invalid_job";

  constructor(args: BulkErrorArgs) {
    super("JobDescriptorError", args);
  }
}

export class CancelledError extends BulkLoadError {
  readonly code = "cancelled";

  constructor(args: BulkErrorArgs = { message: "Operation cancelled" }) {
    super("CancelledError", args);
  }
}

/** Terminal states observed before the wait loop gave up. */
export type PartialCompletion = {
  resolved: ReadonlyMap<string, "Completed" | "Failed">;
  pending: readonly string[];
};

export class TimeoutError extends BulkLoadError {
  readonly code = "poll_timeout";
  readonly completion: PartialCompletion;

  constructor(args: BulkErrorArgs & { completion: PartialCompletion }) {
    super("TimeoutError", args);
    this.completion = args.completion;
  }
}

export class PollingError extends BulkLoadError {
  readonly code = "poll_failed";
  readonly completion: PartialCompletion;

  constructor(args: BulkErrorArgs & { completion: PartialCompletion }) {
    super("PollingError", args);
    this.completion = args.completion;
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
