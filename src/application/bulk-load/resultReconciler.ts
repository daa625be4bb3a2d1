import Papa from "papaparse";
import type { Batch, Job, RecordOutcome } from "../../core/bulk/bulk.types";
import { isTerminalBatchState } from "../../core/bulk/bulk.types";
import {
  BulkLoadError,
  CancelledError,
  JobStateError,
  RemoteServiceError,
  TransportError,
  toErrorMessage
} from "../../core/bulk/errors";
import { resolveResultHeader, toRecordOutcome, type ResultHeader } from "../../core/results/recordOutcome";
import type { BulkService } from "../../ports/BulkService";
import { throwIfAborted } from "../../shared/async/abort";

const toFields = (record: unknown): string[] =>
  Array.isArray(record) ? record.map((value) => String(value)) : [];

/**
 * Streams the per-record outcomes of a Completed or Failed batch.
 *
 * The first result row names the result fields; every following row is matched to it by
 * position. The result stream is destroyed on every exit path, including an early stop
 * by the consumer.
 */
export async function* reconcileBatch(
  service: BulkService,
  job: Job,
  batch: Batch,
  signal?: AbortSignal
): AsyncGenerator<RecordOutcome> {
  if (!isTerminalBatchState(batch.state)) {
    throw new JobStateError({
      message: `Batch ${batch.id} is ${batch.state}; results are only available once it is terminal`,
      context: { chunkIndex: batch.chunkIndex }
    });
  }
  throwIfAborted(signal);

  const source = await service.getBatchResultStream(job.id, batch.id, signal);
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, { header: false, skipEmptyLines: true });
  const onAbort = () => source.destroy(new CancelledError({ message: "Operation cancelled", cause: signal?.reason }));

  signal?.addEventListener("abort", onAbort, { once: true });
  source.on("error", (err) => parser.destroy(err));
  source.setEncoding("utf8");
  source.pipe(parser);

  try {
    let header: ResultHeader | undefined;
    let row = 0;

    for await (const record of parser) {
      const fields = toFields(record);
      if (header === undefined) {
        const resolved = resolveResultHeader(fields);
        if (!resolved.ok) {
          throw new RemoteServiceError({
            message: `Result header of batch ${batch.id} is missing field(s): ${resolved.missing.join(", ")}`,
            context: { chunkIndex: batch.chunkIndex }
          });
        }
        header = resolved.header;
        continue;
      }

      row += 1;
      yield toRecordOutcome(header, fields, row);
    }
  } catch (err) {
    if (err instanceof BulkLoadError) throw err;
    throw new TransportError({
      message: `Reading results of batch ${batch.id} failed: ${toErrorMessage(err)}`,
      context: { chunkIndex: batch.chunkIndex },
      cause: err
    });
  } finally {
    signal?.removeEventListener("abort", onAbort);
    source.unpipe(parser);
    source.destroy();
    parser.destroy();
  }
}

export const collectOutcomes = async (
  service: BulkService,
  job: Job,
  batch: Batch,
  signal?: AbortSignal
): Promise<RecordOutcome[]> => {
  const outcomes: RecordOutcome[] = [];
  for await (const outcome of reconcileBatch(service, job, batch, signal)) {
    outcomes.push(outcome);
  }
  return outcomes;
};
