import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import { Storage } from "@google-cloud/storage";
import type { IngestOptions, IngestionReport } from "../application/ingest-window/ingestWindow.usecase";
import { ingestWindow } from "../application/ingest-window/ingestWindow.usecase";
import type { TokenProvider } from "../ports/TokenProvider";
import type { WatermarkStore } from "../ports/WatermarkStore";
import type { DownstreamTrigger } from "../ports/DownstreamTrigger";
import {
  ClientCredentialsTokenProvider,
  StaticTokenProvider
} from "../infrastructure/catalog/ClientCredentialsTokenProvider";
import { MusicCatalogHttpClient } from "../infrastructure/catalog/MusicCatalogHttpClient";
import { GcsRawLandingWriter } from "../infrastructure/gcs/GcsRawLandingWriter";
import { GcsWatermarkStore } from "../infrastructure/gcs/GcsWatermarkStore";
import { MongoWatermarkStore } from "../infrastructure/mongo/MongoWatermarkStore";
import { SecretManagerCredentials } from "../infrastructure/secrets/SecretManagerCredentials";
import { HttpDownstreamTrigger, NoopDownstreamTrigger } from "../infrastructure/downstream/HttpDownstreamTrigger";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type IngestionRuntime = {
  port: number;
  run: (options?: IngestOptions) => Promise<IngestionReport>;
  close: () => Promise<void>;
};

export const createIngestionRuntime = (env: NodeJS.ProcessEnv = process.env): IngestionRuntime => {
  const config = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);
  const timeoutMs = runtime.sourceClient.timeoutMs;

  const knownCredentials = { clientId: config.SOURCE_CLIENT_ID, clientSecret: config.SOURCE_CLIENT_SECRET };
  const needsSecrets = !config.SOURCE_ACCESS_TOKEN && (!knownCredentials.clientId || !knownCredentials.clientSecret);
  const secrets =
    needsSecrets && config.GCP_PROJECT
      ? new SecretManagerCredentials(
          new SecretManagerServiceClient({ projectId: config.GCP_PROJECT }),
          config.GCP_PROJECT,
          { clientId: config.SECRET_CLIENT_ID_NAME, clientSecret: config.SECRET_CLIENT_SECRET_NAME }
        )
      : undefined;

  const tokens: TokenProvider = config.SOURCE_ACCESS_TOKEN
    ? new StaticTokenProvider(config.SOURCE_ACCESS_TOKEN)
    : new ClientCredentialsTokenProvider(
        config.SOURCE_TOKEN_URL,
        secrets ? () => secrets.resolve(knownCredentials) : knownCredentials,
        timeoutMs
      );
  const source = new MusicCatalogHttpClient(config.SOURCE_API_BASE_URL, tokens, runtime.sourceClient);

  const storage = config.GCP_PROJECT ? new Storage({ projectId: config.GCP_PROJECT }) : new Storage();
  const bucket = storage.bucket(config.GCS_BUCKET);
  const landing = new GcsRawLandingWriter(bucket, config.RAW_PREFIX);

  const mongoStore = config.WATERMARK_STORE === "mongo" ? new MongoWatermarkStore(config.MONGO_URI) : undefined;
  const watermarks: WatermarkStore = mongoStore ?? new GcsWatermarkStore(bucket, config.RAW_PREFIX);

  const downstream: DownstreamTrigger = config.DOWNSTREAM_TRIGGER_URL
    ? new HttpDownstreamTrigger(config.DOWNSTREAM_TRIGGER_URL, config.DOWNSTREAM_TRIGGER_TOKEN, timeoutMs)
    : new NoopDownstreamTrigger();

  return {
    port: config.PORT,
    run: (options) =>
      ingestWindow({ source, landing, watermarks, downstream, config: runtime.ingestionConfig }, options),
    close: async () => {
      await mongoStore?.close();
      await secrets?.close();
    }
  };
};

export const runIngestion = async (options?: IngestOptions): Promise<IngestionReport> => {
  const runtime = createIngestionRuntime();

  try {
    return await runtime.run(options);
  } finally {
    await runtime.close();
  }
};
