#!/usr/bin/env node
import { runBulkLoad } from "../composition/root";
import {
  BulkLoadError,
  RemoteServiceError,
  TransportError,
  type BulkErrorCode,
  type BulkErrorContext
} from "../core/bulk/errors";

type CliErrorEnvelope = {
  event: "load.failed";
  name: string;
  message: string;
  code?: BulkErrorCode;
  context?: BulkErrorContext;
  status?: number;
  stack?: string;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/** Loader errors keep their code, numeric context and HTTP status. Causes never reach the output. */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: CliErrorEnvelope = {
    event: "load.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (error instanceof BulkLoadError) {
    envelope.code = error.code;
    if (Object.keys(error.context).length > 0) {
      envelope.context = { ...error.context };
    }
    if ((error instanceof TransportError || error instanceof RemoteServiceError) && error.status !== undefined) {
      envelope.status = error.status;
    }
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

/** Runs one load; SIGINT/SIGTERM cancel it and let open streams unwind. */
export const executeLoadCli = async (): Promise<void> => {
  const controller = new AbortController();
  const cancel = () => controller.abort(new Error("Interrupted by signal"));
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  try {
    await runBulkLoad(controller.signal);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", cancel);
    process.removeListener("SIGTERM", cancel);
  }
};

if (require.main === module) {
  void executeLoadCli();
}
