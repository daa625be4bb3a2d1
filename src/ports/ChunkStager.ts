import type { Chunk } from "../core/bulk/bulk.types";
import type { BatchPayload } from "./BulkService";

export type StagedChunk = BatchPayload & {
  release(): Promise<void>;
};

/**
 * Materializes a chunk before upload. Callers own the staged chunk and must
 * release it on every exit path.
 */
export interface ChunkStager {
  stage(chunk: Chunk, signal?: AbortSignal): Promise<StagedChunk>;
}
