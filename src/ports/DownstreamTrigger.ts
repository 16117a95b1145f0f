export type BatchLandedNotice = {
  batchUri: string;
  batchPath: string;
  entity: string;
  window: { start: string; end: string };
  invocationId: string;
  recordCount: number;
};

export interface DownstreamTrigger {
  notify(notice: BatchLandedNotice): Promise<void>;
}
