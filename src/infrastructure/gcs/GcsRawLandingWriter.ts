import type { Bucket } from "@google-cloud/storage";
import type { LandedBatch, RawLandingWriter } from "../../ports/RawLandingWriter";
import { type Batch, batchPath, serializeBatch } from "../../core/ingestion/batch";
import { toErrorMessage, WriteError } from "../../core/ingestion/errors";
import { storageErrorCode } from "./gcs.errors";

/**
 * Lands each batch as a single object under `<prefix>/<entity>/<window>/<invocation>.json`.
 * Non-resumable uploads are all-or-nothing, so readers never see a partial batch.
 */
export class GcsRawLandingWriter implements RawLandingWriter {
  constructor(
    private readonly bucket: Bucket,
    private readonly prefix = "bronze"
  ) {}

  pathFor(batch: Pick<Batch, "entity" | "window" | "invocationId">): string {
    return batchPath(this.prefix, batch);
  }

  uriFor(path: string): string {
    return `gs://${this.bucket.name}/${path}`;
  }

  async write(batch: Batch): Promise<LandedBatch> {
    const path = this.pathFor(batch);

    try {
      await this.bucket.file(path).save(serializeBatch(batch), {
        resumable: false,
        contentType: "application/json",
        metadata: {
          metadata: {
            entity: batch.entity,
            invocationId: batch.invocationId,
            windowStart: batch.window.start.toISOString(),
            windowEnd: batch.window.end.toISOString(),
            recordCount: String(batch.records.length)
          }
        }
      });
    } catch (err) {
      throw new WriteError(`Batch write to ${path} failed: ${toErrorMessage(err)}`, {
        status: storageErrorCode(err),
        cause: err
      });
    }

    return { path, uri: this.uriFor(path), recordCount: batch.records.length };
  }
}
