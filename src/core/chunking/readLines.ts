import { createInterface } from "readline";
import type { Readable } from "stream";

/**
 * Yields the lines of a UTF-8 text stream (`\n` or `\r\n` terminated).
 * The reader is closed when the consumer stops early or the stream errors.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const reader = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of reader) {
      yield line;
    }
  } finally {
    reader.close();
  }
}
