import type { ExtractionWindow } from "./window";
import { windowKey, windowToJson } from "./window";

export type RawRecord = Record<string, unknown>;

export type Batch = {
  entity: string;
  invocationId: string;
  window: ExtractionWindow;
  snapshotDate: string;
  records: RawRecord[];
};

/** Calendar date (YYYY-MM-DD) of `at` in the given IANA time zone. */
export const snapshotDateFor = (at: Date, timeZone: string): string => {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(at);

  const pick = (type: "year" | "month" | "day") => parts.find((part) => part.type === type)?.value ?? "";
  return `${pick("year")}-${pick("month")}-${pick("day")}`;
};

export const buildBatch = (args: {
  entity: string;
  invocationId: string;
  window: ExtractionWindow;
  timeZone: string;
  records: RawRecord[];
}): Batch => ({
  entity: args.entity,
  invocationId: args.invocationId,
  window: args.window,
  snapshotDate: snapshotDateFor(args.window.end, args.timeZone),
  records: args.records
});

export const batchPath = (prefix: string, batch: Pick<Batch, "entity" | "window" | "invocationId">): string =>
  `${prefix}/${batch.entity}/${windowKey(batch.window)}/${batch.invocationId}.json`;

export const watermarkPath = (prefix: string, entity: string): string => `${prefix}/${entity}/_watermark`;

/**
 * Serialized form is a pure function of the batch, so a retried write of the
 * same batch produces identical bytes at the same path.
 */
export const serializeBatch = (batch: Batch): string =>
  JSON.stringify({
    entity: batch.entity,
    invocationId: batch.invocationId,
    window: windowToJson(batch.window),
    snapshotDate: batch.snapshotDate,
    recordCount: batch.records.length,
    records: batch.records
  });
