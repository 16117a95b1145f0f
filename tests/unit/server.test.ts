import { collectRawOptions, createServer } from "../../src/server";
import type { IngestOptions, IngestionReport } from "../../src/application/ingest-window/ingestWindow.usecase";
import { IngestionFatalError } from "../../src/application/ingest-window/ingest.error-handler";
import { listen, type TestServer } from "../helpers/http-server";

const report: IngestionReport = {
  invocationId: "inv-1",
  entity: "tracks",
  state: "Done",
  states: ["Idle", "Fetching", "Landing", "Notifying", "Done"],
  dryRun: false,
  window: { start: "2025-12-18T05:00:00.000Z", end: "2025-12-18T06:00:00.000Z" },
  pages: 1,
  recordCount: 2,
  batchPath: "bronze/tracks/20251218T050000.000Z_20251218T060000.000Z/inv-1.json",
  batchUri: "gs://raw-bucket/bronze/tracks/20251218T050000.000Z_20251218T060000.000Z/inv-1.json",
  landed: true,
  watermarkAdvanced: true,
  notified: true
};

describe("trigger server", () => {
  let server: TestServer;
  let ingest: jest.Mock<Promise<IngestionReport>, [IngestOptions]>;

  beforeEach(async () => {
    ingest = jest.fn<Promise<IngestionReport>, [IngestOptions]>().mockResolvedValue(report);
    server = await listen(createServer({ ingest }));
  });

  afterEach(async () => {
    await server.close();
    jest.restoreAllMocks();
  });

  it("answers health probes", async () => {
    const res = await fetch(`${server.baseUrl}/healthz`);
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ ok: true });
  });

  it("runs one invocation per POST and returns its report", async () => {
    const res = await fetch(`${server.baseUrl}/ingest`, { method: "POST" });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ ok: true, ...report });
    expect(ingest).toHaveBeenCalledWith({});
  });

  it("passes backfill overrides from the query string and JSON body", async () => {
    const res = await fetch(`${server.baseUrl}/ingest?dry_run=true&start=2025-12-18T01:00:00Z`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ start: "2025-12-18T03:00:00Z", end: "2025-12-18T04:00:00Z" })
    });

    expect(res.status).toBe(200);
    expect(ingest).toHaveBeenCalledWith({
      start: new Date("2025-12-18T03:00:00.000Z"),
      end: new Date("2025-12-18T04:00:00.000Z"),
      dryRun: true
    });
  });

  it("accepts GET for schedulers that cannot POST", async () => {
    const res = await fetch(`${server.baseUrl}/ingest?invocation_id=sched-42`);

    expect(res.status).toBe(200);
    expect(ingest).toHaveBeenCalledWith({ invocationId: "sched-42" });
  });

  it("rejects invalid options with 400 without running", async () => {
    const res = await fetch(`${server.baseUrl}/ingest?window=1h`, { method: "POST" });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({
      ok: false,
      error: {
        kind: "InvalidRequest",
        message: 'Unknown option "window"; expected one of start, end, dry_run, invocation_id'
      }
    });
    expect(ingest).not.toHaveBeenCalled();
  });

  it("rejects a body that is not a JSON object", async () => {
    const res = await fetch(`${server.baseUrl}/ingest`, { method: "POST", body: "[1,2]" });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toMatchObject({
      error: { kind: "InvalidRequest", message: "Request body must be a JSON object" }
    });
  });

  it("rejects oversized bodies", async () => {
    const res = await fetch(`${server.baseUrl}/ingest`, { method: "POST", body: "x".repeat(70 * 1024) });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toMatchObject({
      error: { kind: "InvalidRequest", message: "Request body exceeds 65536 bytes" }
    });
    expect(ingest).not.toHaveBeenCalled();
  });

  it("reports a failed invocation as 500 with its kind and stage", async () => {
    ingest.mockRejectedValue(
      new IngestionFatalError({
        code: "SourceApiError",
        message: "Ingestion failed during Fetching (invocation=inv-9): Catalog request failed: 400",
        context: { invocationId: "inv-9", entity: "tracks", stage: "Fetching" },
        states: ["Idle", "Fetching", "Failed"],
        status: 400
      })
    );

    const res = await fetch(`${server.baseUrl}/ingest`, { method: "POST" });

    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toEqual({
      ok: false,
      state: "Failed",
      invocationId: "inv-9",
      error: {
        kind: "SourceApiError",
        message: "Ingestion failed during Fetching (invocation=inv-9): Catalog request failed: 400",
        stage: "Fetching"
      }
    });
  });

  it("reports unexpected failures as 500", async () => {
    ingest.mockRejectedValue(new Error("entity=Bad must match ^[a-z0-9][a-z0-9_-]*$"));

    const res = await fetch(`${server.baseUrl}/ingest`, { method: "POST" });

    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toEqual({
      ok: false,
      state: "Failed",
      error: { kind: "Unexpected", message: "entity=Bad must match ^[a-z0-9][a-z0-9_-]*$" }
    });
  });

  it("returns 405 with Allow for unsupported methods and 404 elsewhere", async () => {
    const put = await fetch(`${server.baseUrl}/ingest`, { method: "PUT" });
    expect(put.status).toBe(405);
    expect(put.headers.get("allow")).toBe("GET, POST");
    await put.text();

    const missing = await fetch(`${server.baseUrl}/metrics`);
    expect(missing.status).toBe(404);
    await expect(missing.json()).resolves.toEqual({ ok: false, error: { kind: "NotFound" } });
  });
});

describe("collectRawOptions", () => {
  it("overlays body keys on query keys", () => {
    const url = new URL("http://localhost/ingest?start=a&dry_run=true");
    expect(collectRawOptions(url, '{"start":"b"}')).toEqual({ start: "b", dry_run: "true" });
  });

  it("ignores a blank body", () => {
    const url = new URL("http://localhost/ingest?end=c");
    expect(collectRawOptions(url, "  \n")).toEqual({ end: "c" });
  });
});
