import http from "http";
import { URL } from "url";

/**
 * In-memory stand-in for the asynchronous bulk service, for local runs and tests.
 *
 * - POST /services/async/:version/job                        create job
 * - POST /services/async/:version/job/:jobId/batch           add CSV batch
 * - POST /services/async/:version/job/:jobId                 close job ({ state: "Closed" })
 * - GET  /services/async/:version/job/:jobId/batch           batch states
 * - GET  /services/async/:version/job/:jobId/batch/:id/result  CSV results
 *
 * Rows containing FAIL come back as failed records. A batch is Queued on the first
 * status call and Completed after `completeAfterPolls` calls.
 */
export type FakeBulkServerOptions = {
  sessionId?: string;
  completeAfterPolls?: number;
  failBatch?: (csv: string) => boolean;
};

type FakeBatch = { id: string; csv: string; polls: number; failed: boolean };
type FakeJob = { id: string; object: string; state: "Open" | "Closed"; batches: FakeBatch[] };

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const sendError = (res: http.ServerResponse, status: number, exceptionCode: string, exceptionMessage: string) =>
  sendJson(res, status, { exceptionCode, exceptionMessage });

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    req.on("data", (part: Buffer) => parts.push(part));
    req.on("end", () => resolve(Buffer.concat(parts).toString("utf8")));
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readJsonBody = async (req: http.IncomingMessage): Promise<Record<string, unknown>> => {
  const parsed: unknown = JSON.parse(await readBody(req));
  return isRecord(parsed) ? parsed : {};
};

const quote = (value: string) => `"${value.replace(/"/g, '""')}"`;

export const createFakeBulkServer = (options: FakeBulkServerOptions = {}) => {
  const completeAfterPolls = options.completeAfterPolls ?? 1;
  const jobs = new Map<string, FakeJob>();
  let sequence = 0;
  let recordSequence = 0;

  const nextId = (prefix: string) => {
    sequence += 1;
    return `${prefix}${String(sequence).padStart(15, "0")}`;
  };

  const batchState = (batch: FakeBatch): string => {
    if (batch.polls <= 1 && completeAfterPolls > 1) return "Queued";
    if (batch.polls < completeAfterPolls) return "InProgress";
    return batch.failed ? "Failed" : "Completed";
  };

  const resultCsv = (batch: FakeBatch): string => {
    const [, ...rows] = batch.csv.split("\n").filter((line) => line !== "");
    const lines = [["Id", "Success", "Created", "Error"].map(quote).join(",")];
    for (const row of rows) {
      if (batch.failed) {
        lines.push(["", "false", "false", "InvalidBatch : batch could not be processed"].map(quote).join(","));
      } else if (row.includes("FAIL")) {
        lines.push(["", "false", "false", "REQUIRED_FIELD_MISSING:Required fields are missing: [Name]:--"].map(quote).join(","));
      } else {
        recordSequence += 1;
        lines.push([`001${String(recordSequence).padStart(15, "0")}`, "true", "true", ""].map(quote).join(","));
      }
    }
    return `${lines.join("\n")}\n`;
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = /^\/services\/async\/[^/]+\/job(?:\/([^/]+))?(?:\/(batch))?(?:\/([^/]+))?(?:\/(result))?$/.exec(url.pathname);
    if (!match) return sendError(res, 404, "NotFound", "Unknown resource");

    if (options.sessionId !== undefined && req.headers["x-sfdc-session"] !== options.sessionId) {
      return sendError(res, 401, "InvalidSessionId", "Invalid session id");
    }

    const [, jobId, batchSegment, batchId, resultSegment] = match;
    const method = req.method ?? "GET";

    if (!jobId) {
      if (method !== "POST") return sendError(res, 405, "MethodNotAllowed", "Use POST");
      const body = await readJsonBody(req);
      if (typeof body.object !== "string" || body.object === "" || body.object === "Invalid") {
        return sendError(res, 400, "InvalidJob", "Unable to find object");
      }
      const job: FakeJob = { id: nextId("750"), object: body.object, state: "Open", batches: [] };
      jobs.set(job.id, job);
      return sendJson(res, 201, { id: job.id, object: job.object, operation: body.operation, state: job.state });
    }

    const job = jobs.get(jobId);
    if (!job) return sendError(res, 400, "InvalidJob", "Unable to find job");

    if (!batchSegment) {
      if (method !== "POST") return sendJson(res, 200, { id: job.id, state: job.state });
      const body = await readJsonBody(req);
      if (body.state === "Closed") job.state = "Closed";
      return sendJson(res, 200, { id: job.id, state: job.state });
    }

    if (!batchId) {
      if (method === "POST") {
        if (job.state !== "Open") return sendError(res, 400, "InvalidJobState", "Job is closed");
        const csv = await readBody(req);
        const batch: FakeBatch = { id: nextId("751"), csv, polls: 0, failed: options.failBatch?.(csv) ?? false };
        job.batches.push(batch);
        return sendJson(res, 201, { id: batch.id, jobId: job.id, state: "Queued" });
      }
      const batchInfo = job.batches.map((batch) => {
        batch.polls += 1;
        const state = batchState(batch);
        return state === "Failed"
          ? { id: batch.id, jobId: job.id, state, stateMessage: "InvalidBatch : batch could not be processed" }
          : { id: batch.id, jobId: job.id, state };
      });
      return sendJson(res, 200, { batchInfo });
    }

    const batch = job.batches.find((candidate) => candidate.id === batchId);
    if (!batch || !resultSegment) return sendError(res, 400, "InvalidBatch", "Unable to find batch");
    res.writeHead(200, { "content-type": "text/csv; charset=UTF-8" });
    res.end(resultCsv(batch));
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      sendError(res, 500, "Unexpected", err instanceof Error ? err.message : String(err));
    });
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_BULK_PORT ?? 3998);
  const server = createFakeBulkServer({ completeAfterPolls: 2 });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake bulk service on http://localhost:${port}`);
  });
}
