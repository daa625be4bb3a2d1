import { createReadStream } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import type { Chunk } from "../../core/bulk/bulk.types";
import { serializeChunk } from "../../core/chunking/chunkDataset";
import type { ChunkStager, StagedChunk } from "../../ports/ChunkStager";
import { throwIfAborted } from "../../shared/async/abort";

/**
 * Writes each chunk to its own temporary directory and streams it back on upload.
 * `release` removes the directory.
 */
export class TempFileChunkStager implements ChunkStager {
  constructor(private readonly baseDir = tmpdir()) {}

  async stage(chunk: Chunk, signal?: AbortSignal): Promise<StagedChunk> {
    throwIfAborted(signal);
    const dir = await mkdtemp(path.join(this.baseDir, "bulk-chunk-"));
    const file = path.join(dir, `chunk-${chunk.index}.csv`);
    const content = Buffer.from(serializeChunk(chunk), "utf8");

    try {
      await writeFile(file, content, { signal });
    } catch (err) {
      await rm(dir, { recursive: true, force: true });
      throwIfAborted(signal);
      throw err;
    }

    return {
      byteLength: content.length,
      open: () => createReadStream(file),
      release: () => rm(dir, { recursive: true, force: true })
    };
  }
}
