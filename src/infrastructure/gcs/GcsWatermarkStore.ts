import type { Bucket } from "@google-cloud/storage";
import type { AdvanceWatermarkInput, Watermark, WatermarkStore } from "../../ports/WatermarkStore";
import { watermarkPath } from "../../core/ingestion/batch";
import { toErrorMessage, WatermarkConflictError, WriteError } from "../../core/ingestion/errors";
import { isNotFound, isPreconditionFailed, storageErrorCode } from "./gcs.errors";

type StoredWatermark = {
  entity: string;
  windowEnd: string;
  batchPath: string;
  invocationId: string;
  updatedAt: string;
};

const READ_ATTEMPTS = 3;

const parseStoredWatermark = (raw: string, path: string): StoredWatermark => {
  const value: unknown = JSON.parse(raw);
  if (
    typeof value === "object" && value !== null &&
    "entity" in value && typeof value.entity === "string" &&
    "windowEnd" in value && typeof value.windowEnd === "string" &&
    "batchPath" in value && typeof value.batchPath === "string" &&
    "invocationId" in value && typeof value.invocationId === "string" &&
    "updatedAt" in value && typeof value.updatedAt === "string"
  ) {
    return {
      entity: value.entity,
      windowEnd: value.windowEnd,
      batchPath: value.batchPath,
      invocationId: value.invocationId,
      updatedAt: value.updatedAt
    };
  }
  throw new Error(`Watermark object ${path} is malformed`);
};

/**
 * Watermark kept as a marker object next to the batches it describes.
 * The object generation is the revision; writes are conditional on it.
 */
export class GcsWatermarkStore implements WatermarkStore {
  constructor(
    private readonly bucket: Bucket,
    private readonly prefix = "bronze",
    private readonly now: () => Date = () => new Date()
  ) {}

  async read(entity: string): Promise<Watermark | null> {
    const path = watermarkPath(this.prefix, entity);

    for (let attempt = 1; attempt <= READ_ATTEMPTS; attempt += 1) {
      let generation: string;
      try {
        const [metadata] = await this.bucket.file(path).getMetadata();
        generation = String(metadata.generation ?? "");
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }

      try {
        // pin the download to the generation we just saw
        const [content] = await this.bucket.file(path, { generation }).download();
        const stored = parseStoredWatermark(content.toString("utf-8"), path);
        return {
          entity: stored.entity,
          windowEnd: new Date(stored.windowEnd),
          batchPath: stored.batchPath,
          invocationId: stored.invocationId,
          updatedAt: new Date(stored.updatedAt),
          revision: generation
        };
      } catch (err) {
        // overwritten between metadata and download; look again
        if (isNotFound(err)) continue;
        throw err;
      }
    }

    throw new WatermarkConflictError(`Watermark ${path} kept changing while being read`);
  }

  async advance(input: AdvanceWatermarkInput): Promise<Watermark> {
    const path = watermarkPath(this.prefix, input.entity);
    const current = await this.read(input.entity);

    if ((current?.revision ?? null) !== input.expectedRevision) {
      throw new WatermarkConflictError(
        `Watermark ${path} moved from revision ${input.expectedRevision ?? "none"} to ${current?.revision ?? "none"}`
      );
    }
    if (current && input.windowEnd.getTime() <= current.windowEnd.getTime()) {
      throw new WatermarkConflictError(
        `Watermark ${path} is already at ${current.windowEnd.toISOString()}, not after ${input.windowEnd.toISOString()}`
      );
    }

    const updatedAt = this.now();
    const stored: StoredWatermark = {
      entity: input.entity,
      windowEnd: input.windowEnd.toISOString(),
      batchPath: input.batchPath,
      invocationId: input.invocationId,
      updatedAt: updatedAt.toISOString()
    };

    const file = this.bucket.file(path);
    try {
      await file.save(JSON.stringify(stored), {
        resumable: false,
        contentType: "application/json",
        preconditionOpts: { ifGenerationMatch: input.expectedRevision ?? 0 }
      });
    } catch (err) {
      if (isPreconditionFailed(err)) {
        throw new WatermarkConflictError(`Watermark ${path} was advanced concurrently`, { status: 412, cause: err });
      }
      throw new WriteError(`Watermark write to ${path} failed: ${toErrorMessage(err)}`, {
        status: storageErrorCode(err),
        cause: err
      });
    }

    const generation = file.metadata.generation ?? (await file.getMetadata())[0].generation;

    return {
      entity: input.entity,
      windowEnd: input.windowEnd,
      batchPath: input.batchPath,
      invocationId: input.invocationId,
      updatedAt,
      revision: String(generation ?? "")
    };
  }
}
