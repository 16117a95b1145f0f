import {
  defaultIngestionConfig,
  type IngestionConfig,
  validateIngestionConfig
} from "../../application/ingest-window/ingestion.config";
import {
  defaultCatalogClientOptions,
  type MusicCatalogHttpClientOptions
} from "../../infrastructure/catalog/MusicCatalogHttpClient";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 30000 },
  pageSize: { min: 1, max: 50 },
  maxPages: { min: 1, max: 100000 },
  retries: { min: 0, max: 10 },
  minDelayMs: { min: 1, max: 60000 },
  maxDelayMs: { min: 1, max: 300000 },
  maxRetryAfterMs: { min: 0, max: 600000 },
  initialLookbackHours: { min: 1, max: 8760 }
} as const;

export type RuntimeConfig = {
  ingestionConfig: IngestionConfig;
  sourceClient: MusicCatalogHttpClientOptions;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const minDelayMs =
    parseOptionalIntInRange(env, "RETRY_MIN_DELAY_MS", runtimeCaps.minDelayMs) ?? defaultIngestionConfig.minDelayMs;
  const maxDelayMs =
    parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", runtimeCaps.maxDelayMs) ?? defaultIngestionConfig.maxDelayMs;

  const ingestionConfig = validateIngestionConfig({
    entity: env.INGEST_ENTITY?.trim() || defaultIngestionConfig.entity,
    timeZone: env.INGEST_TIMEZONE?.trim() || defaultIngestionConfig.timeZone,
    initialLookbackHours:
      parseOptionalIntInRange(env, "INGEST_INITIAL_LOOKBACK_HOURS", runtimeCaps.initialLookbackHours) ??
      defaultIngestionConfig.initialLookbackHours,
    writeRetries: parseOptionalIntInRange(env, "WRITE_MAX_RETRIES", runtimeCaps.retries) ?? defaultIngestionConfig.writeRetries,
    minDelayMs,
    maxDelayMs
  });

  const sourceClient: MusicCatalogHttpClientOptions = {
    timeoutMs: parseOptionalIntInRange(env, "SOURCE_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultCatalogClientOptions.timeoutMs,
    pageSize: parseOptionalIntInRange(env, "SOURCE_PAGE_SIZE", runtimeCaps.pageSize) ?? defaultCatalogClientOptions.pageSize,
    maxPages: parseOptionalIntInRange(env, "SOURCE_MAX_PAGES", runtimeCaps.maxPages) ?? defaultCatalogClientOptions.maxPages,
    retries: parseOptionalIntInRange(env, "SOURCE_MAX_RETRIES", runtimeCaps.retries) ?? defaultCatalogClientOptions.retries,
    minDelayMs,
    maxDelayMs,
    maxRetryAfterMs:
      parseOptionalIntInRange(env, "SOURCE_MAX_RETRY_AFTER_MS", runtimeCaps.maxRetryAfterMs) ??
      defaultCatalogClientOptions.maxRetryAfterMs
  };

  return { ingestionConfig, sourceClient };
};
