import { randomUUID } from "crypto";
import type { MusicCatalogClient } from "../../ports/MusicCatalogClient";
import type { LandedBatch, RawLandingWriter } from "../../ports/RawLandingWriter";
import type { WatermarkStore } from "../../ports/WatermarkStore";
import type { DownstreamTrigger } from "../../ports/DownstreamTrigger";
import { buildBatch, type RawRecord } from "../../core/ingestion/batch";
import { WatermarkConflictError, isIngestionError } from "../../core/ingestion/errors";
import { createInvocationTracker, type InvocationState } from "../../core/ingestion/invocation";
import { decideRetry, retryKindOf } from "../../core/ingestion/retry-policy";
import { type ExtractionWindow, resolveWindow, watermarkMoveFor, windowToJson } from "../../core/ingestion/window";
import { retry } from "../../shared/retry/retry";
import type { IngestionConfigInput } from "./ingestion.config";
import { resolveIngestionConfig } from "./ingestion.config";
import { toFailedLog, wrapInvocationFailure } from "./ingest.error-handler";

export type IngestOptions = {
  start?: Date;
  end?: Date;
  dryRun?: boolean;
  invocationId?: string;
};

export type IngestionReport = {
  invocationId: string;
  entity: string;
  state: InvocationState;
  states: InvocationState[];
  dryRun: boolean;
  window: { start: string; end: string };
  pages: number;
  recordCount: number;
  batchPath: string;
  batchUri: string;
  landed: boolean;
  watermarkAdvanced: boolean;
  notified: boolean;
};

export type IngestDeps = {
  source: MusicCatalogClient;
  landing: RawLandingWriter;
  watermarks: WatermarkStore;
  downstream: DownstreamTrigger;
  config: IngestionConfigInput;
  now?: () => Date;
  newInvocationId?: () => string;
};

/**
 * One scheduled tick: Idle -> Fetching -> Landing -> Notifying -> Done.
 * Fetching and Landing failures end in Failed with the watermark untouched;
 * the watermark only moves after the batch write is confirmed.
 */
export const ingestWindow = async (deps: IngestDeps, options: IngestOptions = {}): Promise<IngestionReport> => {
  const { source, landing, watermarks, downstream } = deps;
  const config = resolveIngestionConfig(deps.config);
  const now = deps.now ?? (() => new Date());
  const invocationId = options.invocationId ?? (deps.newInvocationId ?? randomUUID)();
  const entity = config.entity;
  const dryRun = options.dryRun ?? false;

  const tracker = createInvocationTracker(invocationId, ({ from, to }) => {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "ingest.state", invocationId, entity, from, to }));
  });

  let window: ExtractionWindow | undefined;
  let pages = 0;
  let records: RawRecord[] = [];
  let batchPath = "";
  let landed: LandedBatch | undefined;
  let watermarkAdvanced = false;

  try {
    tracker.transition("Fetching");
    const watermark = await watermarks.read(entity);
    window = resolveWindow({
      watermarkEnd: watermark?.windowEnd,
      now: now(),
      initialLookbackHours: config.initialLookbackHours,
      overrides: { start: options.start, end: options.end }
    });

    const collected: RawRecord[] = [];
    for await (const page of source.pages(entity, window)) {
      pages += 1;
      for (const record of page) collected.push(record);
    }
    records = collected;

    const batch = buildBatch({ entity, invocationId, window, timeZone: config.timeZone, records });
    batchPath = landing.pathFor(batch);

    tracker.transition("Landing");
    if (!dryRun) {
      const latest = await watermarks.read(entity);
      if ((latest?.revision ?? null) !== (watermark?.revision ?? null)) {
        throw new WatermarkConflictError(
          `Watermark for ${entity} moved to ${latest?.windowEnd.toISOString() ?? "none"} while fetching`
        );
      }

      landed = await retry(() => landing.write(batch), {
        retries: config.writeRetries,
        minDelayMs: config.minDelayMs,
        maxDelayMs: config.maxDelayMs,
        shouldRetry: decideRetry,
        kindOf: retryKindOf,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "landing.retry",
            invocationId,
            path: batchPath,
            kind: isIngestionError(error) ? error.kind : "Unknown",
            attempt,
            maxAttempts,
            delayMs
          }));
        }
      });
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        event: "landing.written",
        invocationId,
        uri: landed.uri,
        recordCount: landed.recordCount
      }));

      const move = watermarkMoveFor(window, watermark?.windowEnd);
      if (move !== "advance") {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          event: "watermark.unchanged",
          invocationId,
          entity,
          reason: move,
          watermarkEnd: watermark?.windowEnd.toISOString(),
          windowStart: window.start.toISOString(),
          windowEnd: window.end.toISOString()
        }));
      } else {
        const advanced = await watermarks.advance({
          entity,
          expectedRevision: watermark?.revision ?? null,
          windowEnd: window.end,
          batchPath: landed.path,
          invocationId
        });
        watermarkAdvanced = true;
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          event: "watermark.advanced",
          invocationId,
          entity,
          windowEnd: advanced.windowEnd.toISOString(),
          revision: advanced.revision
        }));
      }
    }
  } catch (reason) {
    const stage = tracker.stage();
    tracker.transition("Failed");
    const error = wrapInvocationFailure(
      reason,
      {
        invocationId,
        entity,
        stage,
        windowStart: window?.start.toISOString(),
        windowEnd: window?.end.toISOString()
      },
      tracker.history()
    );
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(toFailedLog(error)));
    throw error;
  }

  tracker.transition("Notifying");
  let notified = false;
  if (landed) {
    try {
      await downstream.notify({
        batchUri: landed.uri,
        batchPath: landed.path,
        entity,
        window: windowToJson(window),
        invocationId,
        recordCount: landed.recordCount
      });
      notified = true;
    } catch (err) {
      // notify failures never fail a landed invocation
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "notify.failed",
        invocationId,
        kind: isIngestionError(err) ? err.kind : "Unknown",
        status: isIngestionError(err) ? err.status ?? null : null,
        batchUri: landed.uri
      }));
    }
  }
  tracker.transition("Done");

  const report: IngestionReport = {
    invocationId,
    entity,
    state: tracker.current(),
    states: tracker.history(),
    dryRun,
    window: windowToJson(window),
    pages,
    recordCount: records.length,
    batchPath,
    batchUri: landing.uriFor(batchPath),
    landed: landed != null,
    watermarkAdvanced,
    notified
  };

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({
    event: "ingest.completed",
    invocationId,
    entity,
    dryRun,
    pages,
    recordCount: report.recordCount,
    watermarkAdvanced,
    notified
  }));

  return report;
};
