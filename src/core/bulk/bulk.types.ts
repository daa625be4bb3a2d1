export const operationKinds = ["insert", "update", "upsert", "delete"] as const;
export type OperationKind = (typeof operationKinds)[number];

export const isOperationKind = (value: string): value is OperationKind =>
  operationKinds.some((kind) => kind === value);

export type JobDescriptor = {
  objectType: string;
  operation: OperationKind;
  externalIdField?: string; // required for upsert
};

export type JobState = "Open" | "Closed";

export type Job = JobDescriptor & {
  id: string;
  state: JobState;
};

export type BatchState = "Queued" | "InProgress" | "Completed" | "Failed";
export type TerminalBatchState = Extract<BatchState, "Completed" | "Failed">;

export const isTerminalBatchState = (state: BatchState): state is TerminalBatchState =>
  state === "Completed" || state === "Failed";

export type Batch = {
  id: string;
  jobId: string;
  chunkIndex: number;
  rowCount: number;
  byteLength: number;
  state: BatchState;
  stateMessage?: string;
};

export type Chunk = {
  index: number;    // 0-based position in the dataset
  header: string;
  rows: string[];
  byteLength: number; // UTF-8 size of the serialized chunk, header included
};

export type RecordStatus = "created" | "updated" | "failed";

export type RecordOutcome = {
  row: number; // 1-based data row inside its batch
  status: RecordStatus;
  success: boolean;
  created: boolean;
  id?: string;
  error?: string;
};

export type BatchFailure = {
  code: string;
  message: string;
};

export type BatchReportEntry =
  | {
      kind: "reconciled";
      chunkIndex: number;
      batchId: string;
      state: TerminalBatchState;
      stateMessage?: string;
      outcomes: readonly RecordOutcome[];
    }
  | {
      kind: "reconcile_failed";
      chunkIndex: number;
      batchId: string;
      state: TerminalBatchState;
      failure: BatchFailure;
    }
  | {
      kind: "unresolved";
      chunkIndex: number;
      batchId: string;
      lastKnownState: BatchState;
      failure: BatchFailure;
    }
  | {
      kind: "submission_failed";
      chunkIndex: number;
      rowCount: number;
      failure: BatchFailure;
    };

export type Report = {
  jobId: string;
  objectType: string;
  operation: OperationKind;
  batches: readonly BatchReportEntry[];
  outcomesByBatch: ReadonlyMap<string, readonly RecordOutcome[]>;
  createdCount: number;
  updatedCount: number;
  failedCount: number;
  totalRecords: number;
  unresolvedBatchCount: number;
  degradedBatchCount: number; // every entry that is not "reconciled"
};
