import { createReadStream } from "fs";
import { loadRecords, type LoadRequest } from "../application/bulk-load/bulkLoad.usecase";
import type { Report } from "../core/bulk/bulk.types";
import { isOperationKind, operationKinds } from "../core/bulk/bulk.types";
import { BulkApiHttpClient } from "../infrastructure/bulkapi/BulkApiHttpClient";
import { MemoryChunkStager } from "../infrastructure/staging/MemoryChunkStager";
import { TempFileChunkStager } from "../infrastructure/staging/TempFileChunkStager";
import type { ChunkStager } from "../ports/ChunkStager";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type StagingMode } from "../shared/config/runtime.config";

export type LoadTarget = Omit<LoadRequest, "dataset"> & { inputFile: string };

const requireValue = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = env[name]?.trim();
  if (!value) throw new Error(`${name} is required`);
  return value;
};

export const resolveLoadTarget = (env: NodeJS.ProcessEnv = process.env): LoadTarget => {
  const inputFile = requireValue(env, "BULK_INPUT_FILE");
  const objectType = requireValue(env, "BULK_OBJECT");
  const operation = env.BULK_OPERATION?.trim() || "insert";
  if (!isOperationKind(operation)) {
    throw new Error(`BULK_OPERATION=${operation} must be one of ${operationKinds.join(", ")}`);
  }

  const target: LoadTarget = { inputFile, objectType, operation };
  const externalIdField = env.BULK_EXTERNAL_ID_FIELD?.trim();
  if (externalIdField) target.externalIdField = externalIdField;
  return target;
};

const createStager = (mode: StagingMode): ChunkStager =>
  mode === "tempfile" ? new TempFileChunkStager() : new MemoryChunkStager();

export const runBulkLoad = async (signal?: AbortSignal): Promise<Report> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const { inputFile, ...target } = resolveLoadTarget();

  const service = new BulkApiHttpClient(
    {
      instanceUrl: env.BULK_INSTANCE_URL,
      sessionId: env.BULK_SESSION_ID,
      apiVersion: env.BULK_API_VERSION
    },
    runtime.timeoutMs
  );
  const dataset = createReadStream(inputFile);

  try {
    return await loadRecords({
      service,
      stager: createStager(runtime.staging),
      config: runtime.loaderConfig,
      request: { ...target, dataset },
      signal
    });
  } finally {
    dataset.destroy();
  }
};
