#!/usr/bin/env node
import { runIngestion } from "../composition/root";
import { parseIngestOptions } from "../application/ingest-window/ingest.options";

type ErrorContext = Partial<{
  invocationId: string;
  entity: string;
  stage: string;
  windowStart: string;
  windowEnd: string;
}>;

type CliErrorEnvelope = {
  event: "ingest.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const allowedContextKeys: Array<keyof ErrorContext> = ["invocationId", "entity", "stage", "windowStart", "windowEnd"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "ingest.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const flagToOption: Record<string, string> = {
  "--start": "start",
  "--end": "end",
  "--dry-run": "dry_run",
  "--invocation-id": "invocation_id"
};

/**
 * Backfill overrides from `--start=... --end=... --dry-run --invocation-id=...`,
 * falling back to INGEST_START / INGEST_END / INGEST_DRY_RUN / INGEST_INVOCATION_ID.
 */
export const readCliOptions = (argv: string[], env: NodeJS.ProcessEnv = process.env): Record<string, unknown> => {
  const raw: Record<string, unknown> = {};
  if (env.INGEST_START) raw.start = env.INGEST_START;
  if (env.INGEST_END) raw.end = env.INGEST_END;
  if (env.INGEST_DRY_RUN) raw.dry_run = env.INGEST_DRY_RUN;
  if (env.INGEST_INVOCATION_ID) raw.invocation_id = env.INGEST_INVOCATION_ID;

  for (const arg of argv) {
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = Object.hasOwn(flagToOption, flag) ? flagToOption[flag] : undefined;
    if (!key) {
      throw new Error(`Unknown argument ${arg}`);
    }
    raw[key] = eq === -1 ? (key === "dry_run" ? "true" : "") : arg.slice(eq + 1);
  }

  return raw;
};

export const executeIngestCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const options = parseIngestOptions(readCliOptions(argv));
    const report = await runIngestion(options);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(report));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeIngestCli();
}
