export type Watermark = {
  entity: string;
  windowEnd: Date;
  batchPath: string;
  invocationId: string;
  updatedAt: Date;
  revision: string;
};

export type AdvanceWatermarkInput = {
  entity: string;
  /** Revision read before landing; `null` when no watermark existed. */
  expectedRevision: string | null;
  windowEnd: Date;
  batchPath: string;
  invocationId: string;
};

export interface WatermarkStore {
  read(entity: string): Promise<Watermark | null>;
  /**
   * Compare-and-set. Rejects with `WatermarkConflictError` when the stored
   * revision moved or the new end would not be strictly later.
   */
  advance(input: AdvanceWatermarkInput): Promise<Watermark>;
}
