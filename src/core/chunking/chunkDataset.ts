import type { Chunk } from "../bulk/bulk.types";
import { ChunkingError } from "../bulk/errors";
import { throwIfAborted } from "../../shared/async/abort";

export type ChunkLimits = {
  maxBytes: number;
  maxRows: number;
};

const lineBytes = (line: string): number => Buffer.byteLength(line, "utf8") + 1; // trailing "\n"

const assertPositiveInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new ChunkingError({ message: `${name} must be an integer >= 1. Received: ${String(value)}` });
  }
};

export const serializeChunk = (chunk: Pick<Chunk, "header" | "rows">): string => {
  const body = chunk.rows.length > 0 ? `${chunk.rows.join("\n")}\n` : "";
  return `${chunk.header}\n${body}`;
};

/**
 * Splits a header + rows line stream into standalone chunks, each starting with the header.
 *
 * A chunk is closed before a row that would push it over `maxBytes` or past `maxRows`.
 * A single row that alone exceeds `maxBytes` still becomes its own chunk.
 * The input is consumed once.
 */
export async function* chunkDataset(
  lines: AsyncIterable<string>,
  limits: ChunkLimits,
  signal?: AbortSignal
): AsyncGenerator<Chunk> {
  assertPositiveInteger("maxBytes", limits.maxBytes);
  assertPositiveInteger("maxRows", limits.maxRows);

  let header: string | undefined;
  let headerBytes = 0;
  let index = 0;
  let rows: string[] = [];
  let bytes = 0;

  for await (const line of lines) {
    throwIfAborted(signal);

    if (header === undefined) {
      const candidate = line.replace(/^\uFEFF/, "");
      if (candidate.trim() === "") {
        throw new ChunkingError({ message: "Dataset header row is blank" });
      }
      header = candidate;
      headerBytes = lineBytes(candidate);
      bytes = headerBytes;
      continue;
    }

    const size = lineBytes(line);
    if (rows.length > 0 && (bytes + size > limits.maxBytes || rows.length >= limits.maxRows)) {
      yield { index, header, rows, byteLength: bytes };
      index += 1;
      rows = [];
      bytes = headerBytes;
    }

    rows.push(line);
    bytes += size;
  }

  if (header === undefined) {
    throw new ChunkingError({ message: "Dataset is empty: missing header row" });
  }

  if (rows.length > 0) {
    yield { index, header, rows, byteLength: bytes };
  }
}
