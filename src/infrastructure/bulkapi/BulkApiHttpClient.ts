import { Readable } from "stream";
import type { BatchState, JobDescriptor } from "../../core/bulk/bulk.types";
import { CancelledError, RemoteServiceError, TransportError, toErrorMessage } from "../../core/bulk/errors";
import type { BatchPayload, BatchStateSnapshot, BulkService } from "../../ports/BulkService";
import { throwIfAborted } from "../../shared/async/abort";
import { retry, type RetryOptions } from "../../shared/retry/retry";

/** Caller-owned session; establishing it is not this client's job. */
export type BulkSession = {
  instanceUrl: string;
  sessionId: string;
  apiVersion: string;
};

type RequestSpec = {
  method: "GET" | "POST";
  path: string;
  json?: unknown;
  csv?: BatchPayload;
};

type WebBodyReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(): Promise<void>;
  releaseLock(): void;
};

export type BulkRetryPolicy = Pick<RetryOptions, "retries" | "minDelayMs" | "maxDelayMs" | "jitterRatio">;

export const defaultBulkRetryPolicy: BulkRetryPolicy = {
  retries: 5,
  minDelayMs: 250,
  maxDelayMs: 5000
};

const remoteStates: Record<string, { state: BatchState; message?: string }> = {
  Queued: { state: "Queued" },
  InProgress: { state: "InProgress" },
  Completed: { state: "Completed" },
  Failed: { state: "Failed" },
  NotProcessed: { state: "Failed", message: "Batch was not processed" }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readRemoteErrorCode = (text: string): string | undefined => {
  try {
    const parsed: unknown = JSON.parse(text);
    const first = Array.isArray(parsed) ? parsed[0] : parsed;
    if (!isRecord(first)) return undefined;
    const code = first.exceptionCode ?? first.errorCode;
    return typeof code === "string" ? code : undefined;
  } catch {
    return undefined;
  }
};

async function* readWebBody(reader: WebBodyReader): AsyncGenerator<Uint8Array> {
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}

/**
 * REST/JSON adapter for the asynchronous bulk service using native fetch.
 *
 * GET requests are retried on timeouts, network errors, 429 and 5xx. POST requests
 * (job creation, batch upload, close) are sent once: repeating them is not idempotent.
 * Response bodies are never logged.
 */
export class BulkApiHttpClient implements BulkService {
  constructor(
    private readonly session: BulkSession,
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: BulkRetryPolicy = defaultBulkRetryPolicy
  ) {}

  async createJob(descriptor: JobDescriptor, signal?: AbortSignal): Promise<string> {
    const res = await this.send({
      method: "POST",
      path: "job",
      json: {
        object: descriptor.objectType,
        operation: descriptor.operation,
        contentType: "CSV",
        ...(descriptor.externalIdField ? { externalIdFieldName: descriptor.externalIdField } : {})
      }
    }, signal);
    return this.readId(res, "job");
  }

  async submitBatch(jobId: string, payload: BatchPayload, signal?: AbortSignal): Promise<string> {
    const res = await this.send({ method: "POST", path: `job/${encodeURIComponent(jobId)}/batch`, csv: payload }, signal);
    return this.readId(res, "batch");
  }

  async closeJob(jobId: string, signal?: AbortSignal): Promise<void> {
    const res = await this.send({ method: "POST", path: `job/${encodeURIComponent(jobId)}`, json: { state: "Closed" } }, signal);
    await res.text().catch(() => "");
  }

  async getBatchStates(jobId: string, signal?: AbortSignal): Promise<BatchStateSnapshot[]> {
    const res = await this.send({ method: "GET", path: `job/${encodeURIComponent(jobId)}/batch` }, signal);
    const json = await this.readJson(res);
    const list = isRecord(json) ? json.batchInfo : undefined;
    if (!Array.isArray(list)) {
      throw new RemoteServiceError({ message: "Batch list response has no batchInfo array", context: { status: res.status } });
    }

    return list.map((item: unknown): BatchStateSnapshot => {
      const id = isRecord(item) ? item.id : undefined;
      const state = isRecord(item) ? item.state : undefined;
      const mapped = typeof state === "string" ? remoteStates[state] : undefined;
      if (typeof id !== "string" || mapped === undefined) {
        throw new RemoteServiceError({ message: `Unexpected batch info entry (state=${String(state)})` });
      }
      const stateMessage = isRecord(item) && typeof item.stateMessage === "string" ? item.stateMessage : mapped.message;
      return stateMessage ? { batchId: id, state: mapped.state, stateMessage } : { batchId: id, state: mapped.state };
    });
  }

  async getBatchResultStream(jobId: string, batchId: string, signal?: AbortSignal): Promise<Readable> {
    const res = await this.send({
      method: "GET",
      path: `job/${encodeURIComponent(jobId)}/batch/${encodeURIComponent(batchId)}/result`
    }, signal);
    if (!res.body) return Readable.from([]);
    return Readable.from(readWebBody(res.body.getReader()));
  }

  private buildUrl(path: string): URL {
    const url = new URL(this.session.instanceUrl);
    const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${base}services/async/${this.session.apiVersion}/${path}`;
    return url;
  }

  /** `signal` cancels the request in flight and the wait between retries. */
  private async send(spec: RequestSpec, signal?: AbortSignal): Promise<Response> {
    const url = this.buildUrl(spec.path);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const doFetch = async (): Promise<Response> => {
      throwIfAborted(signal);
      const headers: Record<string, string> = {
        "X-SFDC-Session": this.session.sessionId,
        Accept: "application/json"
      };
      let body: string | Readable | undefined;
      if (spec.csv) {
        headers["Content-Type"] = "text/csv; charset=UTF-8";
        body = spec.csv.open();
      } else if (spec.json !== undefined) {
        headers["Content-Type"] = "application/json; charset=UTF-8";
        body = JSON.stringify(spec.json);
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener("abort", onAbort, { once: true });
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method: spec.method,
          headers,
          body,
          ...(body instanceof Readable ? { duplex: "half" as const } : {}),
          signal: controller.signal
        });
      } catch (err) {
        if (body instanceof Readable) body.destroy();
        if (signal?.aborted) {
          throw new CancelledError({ message: "Operation cancelled", cause: signal.reason });
        }
        throw new TransportError({
          message: controller.signal.aborted
            ? `Bulk request timeout after ${this.timeoutMs}ms: ${spec.method} ${safeRequestUrl}`
            : `Bulk request failed: ${spec.method} ${safeRequestUrl}: ${toErrorMessage(err)}`,
          isTimeout: controller.signal.aborted,
          cause: err
        });
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        const remoteCode = readRemoteErrorCode(text);
        const message = `Bulk request failed: ${res.status}${remoteCode ? ` (${remoteCode})` : ""}`;
        if (res.status === 429 || res.status >= 500) {
          const retryAfter = res.headers.get("retry-after");
          throw new TransportError({
            message,
            status: res.status,
            context: { status: res.status },
            retryAfterMs: retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined
          });
        }
        throw new RemoteServiceError({ message, status: res.status, remoteCode, context: { status: res.status } });
      }

      return res;
    };

    if (spec.method !== "GET") return doFetch();

    return retry(doFetch, {
      ...this.retryPolicy,
      signal,
      onRetry: ({ attempt, maxAttempts, error }) => {
        console.warn(JSON.stringify({
          event: "http.retry",
          status: error instanceof TransportError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        console.warn(JSON.stringify({
          event: "http.give_up",
          status: error instanceof TransportError || error instanceof RemoteServiceError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        }));
      },
      shouldRetry: (err) => {
        if (!(err instanceof TransportError)) return false;
        if (err.status === 429) return { retry: true, delayMs: err.retryAfterMs };
        return true;
      }
    });
  }

  private async readJson(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new RemoteServiceError({ message: "Bulk response is not valid JSON", context: { status: res.status }, cause: err });
    }
  }

  private async readId(res: Response, what: "job" | "batch"): Promise<string> {
    const json = await this.readJson(res);
    const id = isRecord(json) ? json.id : undefined;
    if (typeof id !== "string" || id.trim() === "") {
      throw new RemoteServiceError({ message: `Bulk ${what} response has no id`, context: { status: res.status } });
    }
    return id;
  }
}
