export type WatermarkBackend = "gcs" | "mongo";

export type Env = {
  SOURCE_API_BASE_URL: string;
  SOURCE_TOKEN_URL: string;
  SOURCE_CLIENT_ID: string;
  SOURCE_CLIENT_SECRET: string;
  SOURCE_ACCESS_TOKEN: string;
  GCS_BUCKET: string;
  GCP_PROJECT?: string;
  SECRET_CLIENT_ID_NAME: string;
  SECRET_CLIENT_SECRET_NAME: string;
  RAW_PREFIX: string;
  WATERMARK_STORE: WatermarkBackend;
  MONGO_URI: string;
  DOWNSTREAM_TRIGGER_URL?: string;
  DOWNSTREAM_TRIGGER_TOKEN?: string;
  PORT: number;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optionalTrimmed = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const parseWatermarkBackend = (value: string | undefined): WatermarkBackend => {
  const backend = optionalTrimmed(value) ?? "gcs";
  if (backend !== "gcs" && backend !== "mongo") {
    throw new Error(`WATERMARK_STORE must be "gcs" or "mongo". Received: ${backend}`);
  }
  return backend;
};

const parsePort = (value: string | undefined): number => {
  const raw = optionalTrimmed(value);
  if (raw == null) return 8080;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [0..65535]`);
  }
  return port;
};

const RAW_PREFIX_PATTERN = /^[A-Za-z0-9_-]+(\/[A-Za-z0-9_-]+)*$/;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const SOURCE_API_BASE_URL = validateHttpUrl(
    "SOURCE_API_BASE_URL",
    optionalTrimmed(env.SOURCE_API_BASE_URL) ?? "https://api.spotify.com/v1"
  );
  const SOURCE_TOKEN_URL = validateHttpUrl(
    "SOURCE_TOKEN_URL",
    optionalTrimmed(env.SOURCE_TOKEN_URL) ?? "https://accounts.spotify.com/api/token"
  );
  const SOURCE_CLIENT_ID = optionalTrimmed(env.SOURCE_CLIENT_ID) ?? "";
  const SOURCE_CLIENT_SECRET = optionalTrimmed(env.SOURCE_CLIENT_SECRET) ?? "";
  const SOURCE_ACCESS_TOKEN = optionalTrimmed(env.SOURCE_ACCESS_TOKEN) ?? "";

  const GCP_PROJECT = optionalTrimmed(env.GCP_PROJECT);

  // with GCP_PROJECT set, unset client credentials are read from Secret Manager
  if (!SOURCE_ACCESS_TOKEN && !GCP_PROJECT && (!SOURCE_CLIENT_ID || !SOURCE_CLIENT_SECRET)) {
    throw new Error(
      "Source credentials missing. Set SOURCE_CLIENT_ID and SOURCE_CLIENT_SECRET or SOURCE_ACCESS_TOKEN, " +
        "or set GCP_PROJECT to read them from Secret Manager."
    );
  }

  const GCS_BUCKET = optionalTrimmed(env.GCS_BUCKET) ?? "";
  if (!GCS_BUCKET) {
    throw new Error("GCS_BUCKET must be set.");
  }

  const RAW_PREFIX = optionalTrimmed(env.RAW_PREFIX) ?? "bronze";
  if (!RAW_PREFIX_PATTERN.test(RAW_PREFIX)) {
    throw new Error(`RAW_PREFIX must be a relative object path. Received: ${RAW_PREFIX}`);
  }

  const downstreamUrl = optionalTrimmed(env.DOWNSTREAM_TRIGGER_URL);

  return {
    SOURCE_API_BASE_URL,
    SOURCE_TOKEN_URL,
    SOURCE_CLIENT_ID,
    SOURCE_CLIENT_SECRET,
    SOURCE_ACCESS_TOKEN,
    GCS_BUCKET,
    GCP_PROJECT,
    SECRET_CLIENT_ID_NAME: optionalTrimmed(env.SECRET_CLIENT_ID_NAME) ?? "spotify-client-id",
    SECRET_CLIENT_SECRET_NAME: optionalTrimmed(env.SECRET_CLIENT_SECRET_NAME) ?? "spotify-client-secret",
    RAW_PREFIX,
    WATERMARK_STORE: parseWatermarkBackend(env.WATERMARK_STORE),
    MONGO_URI: optionalTrimmed(env.MONGO_URI) ?? "mongodb://localhost:27017/artist_pulse",
    DOWNSTREAM_TRIGGER_URL: downstreamUrl ? validateHttpUrl("DOWNSTREAM_TRIGGER_URL", downstreamUrl) : undefined,
    DOWNSTREAM_TRIGGER_TOKEN: optionalTrimmed(env.DOWNSTREAM_TRIGGER_TOKEN),
    PORT: parsePort(env.PORT)
  };
};
