import http from "http";
import type { IngestOptions, IngestionReport } from "./application/ingest-window/ingestWindow.usecase";
import { InvalidIngestOptionsError, parseIngestOptions } from "./application/ingest-window/ingest.options";
import { IngestionFatalError } from "./application/ingest-window/ingest.error-handler";
import { toErrorMessage } from "./core/ingestion/errors";
import { createIngestionRuntime } from "./composition/root";

export type TriggerDeps = {
  ingest: (options: IngestOptions) => Promise<IngestionReport>;
};

const MAX_BODY_BYTES = 64 * 1024;

class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "BodyTooLargeError";
  }
}

const sendJson = (res: http.ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(payload));
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        // keep draining so the 400 can still be written
        reject(new BodyTooLargeError());
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Query-string options, overlaid by a JSON object body when one is sent. */
export const collectRawOptions = (url: URL, body: string): Record<string, unknown> => {
  const raw: Record<string, unknown> = Object.fromEntries(url.searchParams.entries());
  if (body.trim() === "") return raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new InvalidIngestOptionsError("Request body must be a JSON object");
  }
  if (!isRecord(parsed)) {
    throw new InvalidIngestOptionsError("Request body must be a JSON object");
  }
  return { ...raw, ...parsed };
};

const handleIngest = async (deps: TriggerDeps, req: http.IncomingMessage, res: http.ServerResponse, url: URL) => {
  let options: IngestOptions;
  try {
    options = parseIngestOptions(collectRawOptions(url, await readBody(req)));
  } catch (err) {
    if (err instanceof InvalidIngestOptionsError || err instanceof BodyTooLargeError) {
      sendJson(res, 400, { ok: false, error: { kind: "InvalidRequest", message: err.message } });
      return;
    }
    throw err;
  }

  try {
    const report = await deps.ingest(options);
    sendJson(res, 200, { ok: true, ...report });
  } catch (err) {
    if (err instanceof IngestionFatalError) {
      sendJson(res, 500, {
        ok: false,
        state: "Failed",
        invocationId: err.context.invocationId,
        error: { kind: err.code, message: err.message, stage: err.context.stage }
      });
      return;
    }
    sendJson(res, 500, { ok: false, state: "Failed", error: { kind: "Unexpected", message: toErrorMessage(err) } });
  }
};

/**
 * Scheduler-facing trigger. `POST /ingest` (or `GET`) runs one invocation;
 * `GET /healthz` answers liveness probes.
 */
export const createServer = (deps: TriggerDeps) => {
  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    if (url.pathname === "/healthz") {
      if (method !== "GET") {
        sendJson(res, 405, { ok: false, error: { kind: "MethodNotAllowed" } }, { allow: "GET" });
        return;
      }
      sendJson(res, 200, { ok: true });
      return;
    }

    if (url.pathname === "/ingest") {
      if (method !== "POST" && method !== "GET") {
        sendJson(res, 405, { ok: false, error: { kind: "MethodNotAllowed" } }, { allow: "GET, POST" });
        return;
      }
      handleIngest(deps, req, res, url).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "http.handler_failed", message: toErrorMessage(err) }));
        if (!res.headersSent) {
          sendJson(res, 500, { ok: false, error: { kind: "Unexpected", message: "internal error" } });
        }
      });
      return;
    }

    sendJson(res, 404, { ok: false, error: { kind: "NotFound" } });
  });
};

if (require.main === module) {
  const runtime = createIngestionRuntime();
  const server = createServer({ ingest: runtime.run });

  server.listen(runtime.port, () => {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "server.listening", port: runtime.port }));
  });

  process.once("SIGTERM", () => {
    server.close(() => {
      runtime.close().catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "server.close_failed", message: toErrorMessage(err) }));
        process.exitCode = 1;
      });
    });
  });
}
