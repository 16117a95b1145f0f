import type { Batch } from "../core/ingestion/batch";

export type LandedBatch = {
  path: string;
  uri: string;
  recordCount: number;
};

export interface RawLandingWriter {
  /** Path the batch lands at; deterministic in entity, window and invocation id. */
  pathFor(batch: Pick<Batch, "entity" | "window" | "invocationId">): string;
  uriFor(path: string): string;
  write(batch: Batch): Promise<LandedBatch>;
}
