import { Readable } from "stream";
import type { Chunk } from "../../core/bulk/bulk.types";
import { serializeChunk } from "../../core/chunking/chunkDataset";
import type { ChunkStager, StagedChunk } from "../../ports/ChunkStager";
import { throwIfAborted } from "../../shared/async/abort";

/** Keeps the serialized chunk in a single Buffer. */
export class MemoryChunkStager implements ChunkStager {
  async stage(chunk: Chunk, signal?: AbortSignal): Promise<StagedChunk> {
    throwIfAborted(signal);
    let content: Buffer | undefined = Buffer.from(serializeChunk(chunk), "utf8");
    const byteLength = content.length;

    return {
      byteLength,
      open: () => {
        if (!content) throw new Error(`Staged chunk ${chunk.index} was already released`);
        return Readable.from([content]);
      },
      release: async () => {
        content = undefined;
      }
    };
  }
}
