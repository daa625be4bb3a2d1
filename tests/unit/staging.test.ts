import { existsSync } from "fs";
import { mkdtemp, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import type { Readable } from "stream";
import type { Chunk } from "../../src/core/bulk/bulk.types";
import { CancelledError } from "../../src/core/bulk/errors";
import { MemoryChunkStager } from "../../src/infrastructure/staging/MemoryChunkStager";
import { TempFileChunkStager } from "../../src/infrastructure/staging/TempFileChunkStager";

const chunk: Chunk = { index: 3, header: "Name,City", rows: ["Acme,Zürich", "Globex,Oslo"], byteLength: 35 };

const readAll = async (stream: Readable): Promise<string> => {
  const parts: Buffer[] = [];
  for await (const part of stream) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)));
  }
  return Buffer.concat(parts).toString("utf8");
};

describe("MemoryChunkStager", () => {
  it("serializes the chunk and can be opened repeatedly", async () => {
    const staged = await new MemoryChunkStager().stage(chunk);

    expect(staged.byteLength).toBe(35);
    expect(await readAll(staged.open())).toBe("Name,City\nAcme,Zürich\nGlobex,Oslo\n");
    expect(await readAll(staged.open())).toBe("Name,City\nAcme,Zürich\nGlobex,Oslo\n");
  });

  it("cannot be opened after release", async () => {
    const staged = await new MemoryChunkStager().stage(chunk);
    await staged.release();

    expect(() => staged.open()).toThrow("Staged chunk 3 was already released");
  });

  it("does not stage when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new MemoryChunkStager().stage(chunk, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("TempFileChunkStager", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(tmpdir(), "stager-test-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("streams the chunk back from a temporary file and removes it on release", async () => {
    const staged = await new TempFileChunkStager(baseDir).stage(chunk);
    const [dir] = await readdir(baseDir);

    expect(dir).toMatch(/^bulk-chunk-/);
    expect(await readdir(path.join(baseDir, dir))).toEqual(["chunk-3.csv"]);
    expect(staged.byteLength).toBe(35);
    expect(await readAll(staged.open())).toBe("Name,City\nAcme,Zürich\nGlobex,Oslo\n");

    await staged.release();
    expect(existsSync(path.join(baseDir, dir))).toBe(false);
  });

  it("does not create anything when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new TempFileChunkStager(baseDir).stage(chunk, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(await readdir(baseDir)).toEqual([]);
  });
});
