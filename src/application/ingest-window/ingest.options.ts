import type { IngestOptions } from "./ingestWindow.usecase";

export class InvalidIngestOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidIngestOptionsError";
  }
}

export const recognizedOptionKeys = ["start", "end", "dry_run", "invocation_id"] as const;

const INVOCATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}(T|$)/;

const isRecognizedKey = (key: string): key is (typeof recognizedOptionKeys)[number] =>
  (recognizedOptionKeys as readonly string[]).includes(key);

const parseInstant = (name: string, value: unknown): Date | undefined => {
  if (value == null || value === "") return undefined;
  if (typeof value !== "string" || !ISO_DATE_PREFIX.test(value)) {
    throw new InvalidIngestOptionsError(`${name} must be an ISO-8601 timestamp`);
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidIngestOptionsError(`${name} must be an ISO-8601 timestamp`);
  }
  return parsed;
};

const parseFlag = (name: string, value: unknown): boolean | undefined => {
  if (value == null || value === "") return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new InvalidIngestOptionsError(`${name} must be true, false, 1 or 0`);
};

const parseInvocationId = (value: unknown): string | undefined => {
  if (value == null || value === "") return undefined;
  if (typeof value !== "string" || !INVOCATION_ID_PATTERN.test(value)) {
    throw new InvalidIngestOptionsError(`invocation_id must match ${INVOCATION_ID_PATTERN.source}`);
  }
  return value;
};

/**
 * Validates trigger overrides coming from a query string, a JSON body or the CLI.
 * Unknown keys are rejected.
 */
export const parseIngestOptions = (raw: Record<string, unknown>): IngestOptions => {
  for (const key of Object.keys(raw)) {
    if (!isRecognizedKey(key)) {
      throw new InvalidIngestOptionsError(
        `Unknown option "${key}"; expected one of ${recognizedOptionKeys.join(", ")}`
      );
    }
  }

  const start = parseInstant("start", raw.start);
  const end = parseInstant("end", raw.end);
  if (start && end && start.getTime() >= end.getTime()) {
    throw new InvalidIngestOptionsError("start must be before end");
  }

  const options: IngestOptions = {};
  if (start) options.start = start;
  if (end) options.end = end;
  const dryRun = parseFlag("dry_run", raw.dry_run);
  if (dryRun != null) options.dryRun = dryRun;
  const invocationId = parseInvocationId(raw.invocation_id);
  if (invocationId) options.invocationId = invocationId;
  return options;
};
