import { Readable } from "stream";
import type { Chunk } from "../../src/core/bulk/bulk.types";
import { CancelledError, ChunkingError } from "../../src/core/bulk/errors";
import { chunkDataset, serializeChunk, type ChunkLimits } from "../../src/core/chunking/chunkDataset";
import { readLines } from "../../src/core/chunking/readLines";
import { linesOf } from "../support/inMemoryBulkService";

const collect = async (lines: AsyncIterable<string>, limits: ChunkLimits, signal?: AbortSignal): Promise<Chunk[]> => {
  const chunks: Chunk[] = [];
  for await (const chunk of chunkDataset(lines, limits, signal)) chunks.push(chunk);
  return chunks;
};

const rowsNamed = (count: number) => Array.from({ length: count }, (_, i) => `Name ${i + 1}`);

describe("chunkDataset", () => {
  it("splits 25,000 rows into chunks of 10000, 10000 and 5000 rows", async () => {
    const rows = rowsNamed(25000);
    const chunks = await collect(linesOf("Name", rows), { maxBytes: 10_000_000, maxRows: 10_000 });

    expect(chunks.map((chunk) => chunk.rows.length)).toEqual([10000, 10000, 5000]);
    expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2]);
    expect(chunks.every((chunk) => chunk.header === "Name")).toBe(true);
  });

  it("partitions rows losslessly and in order", async () => {
    const rows = ["a,1", "", "b,2", "c,3", "d,4", "e,5", "f,6", "g,7"];
    const chunks = await collect(linesOf("k,v", rows), { maxBytes: 1000, maxRows: 3 });

    expect(chunks.flatMap((chunk) => chunk.rows)).toEqual(rows);
    expect(chunks.map((chunk) => chunk.rows.length)).toEqual([3, 3, 2]);
  });

  it("closes a chunk before a row that would exceed the byte limit", async () => {
    // "Id\n" is 3 bytes, every "aaaa\n" row is 5 bytes.
    const chunks = await collect(linesOf("Id", ["aaaa", "aaaa", "aaaa", "aaaa", "aaaa"]), { maxBytes: 13, maxRows: 100 });

    expect(chunks.map((chunk) => chunk.rows.length)).toEqual([2, 2, 1]);
    expect(chunks.map((chunk) => chunk.byteLength)).toEqual([13, 13, 8]);
    for (const chunk of chunks) {
      expect(Buffer.byteLength(serializeChunk(chunk), "utf8")).toBe(chunk.byteLength);
    }
  });

  it("emits a single oversized row as its own chunk", async () => {
    const big = "x".repeat(50);
    const chunks = await collect(linesOf("Id", ["a", big, "b"]), { maxBytes: 10, maxRows: 100 });

    expect(chunks.map((chunk) => chunk.rows)).toEqual([["a"], [big], ["b"]]);
    expect(chunks.map((chunk) => chunk.byteLength)).toEqual([5, 54, 5]);
  });

  it("puts one row per chunk when maxRows is 1", async () => {
    const chunks = await collect(linesOf("Name", ["a", "b", "c"]), { maxBytes: 1000, maxRows: 1 });
    expect(chunks.map((chunk) => chunk.rows)).toEqual([["a"], ["b"], ["c"]]);
  });

  it("counts multi-byte characters by their UTF-8 size", async () => {
    const [chunk] = await collect(linesOf("N", ["é"]), { maxBytes: 100, maxRows: 10 });
    expect(chunk.byteLength).toBe(5);
  });

  it("strips a byte order mark from the header", async () => {
    const [chunk] = await collect(linesOf("\uFEFFName", ["a"]), { maxBytes: 100, maxRows: 10 });
    expect(chunk.header).toBe("Name");
  });

  it("yields nothing for a header-only dataset", async () => {
    await expect(collect(linesOf("Name", []), { maxBytes: 100, maxRows: 10 })).resolves.toEqual([]);
  });

  it("rejects an empty dataset", async () => {
    const empty = (async function* (): AsyncGenerator<string> {})();
    await expect(collect(empty, { maxBytes: 100, maxRows: 10 })).rejects.toThrow("Dataset is empty: missing header row");
  });

  it("rejects a blank header row", async () => {
    await expect(collect(linesOf("  ", ["a"]), { maxBytes: 100, maxRows: 10 })).rejects.toBeInstanceOf(ChunkingError);
  });

  it.each([
    { maxBytes: 0, maxRows: 10 },
    { maxBytes: 100, maxRows: 0 },
    { maxBytes: 1.5, maxRows: 10 }
  ])("rejects invalid limits %o", async (limits) => {
    await expect(collect(linesOf("Name", ["a"]), limits)).rejects.toBeInstanceOf(ChunkingError);
  });

  it("stops with CancelledError once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(collect(linesOf("Name", ["a"]), { maxBytes: 100, maxRows: 10 }, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
  });

  it("serializes a chunk with a trailing newline", () => {
    expect(serializeChunk({ header: "Name", rows: ["a", "b"] })).toBe("Name\na\nb\n");
  });
});

describe("readLines", () => {
  it("splits a byte stream on LF and CRLF", async () => {
    const lines: string[] = [];
    for await (const line of readLines(Readable.from(["Name\r\nAl", "ice\nBob\n", "Carol"]))) lines.push(line);
    expect(lines).toEqual(["Name", "Alice", "Bob", "Carol"]);
  });

  it("feeds the chunker directly from a stream", async () => {
    const chunks = await collect(readLines(Readable.from(["Name\nA\nB\nC\n"])), { maxBytes: 100, maxRows: 2 });
    expect(chunks.map((chunk) => chunk.rows)).toEqual([["A", "B"], ["C"]]);
  });
});
