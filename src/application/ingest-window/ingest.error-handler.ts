import type { InvocationState } from "../../core/ingestion/invocation";
import { type IngestionErrorKind, isIngestionError, toErrorMessage } from "../../core/ingestion/errors";

export type IngestionFailureCode = IngestionErrorKind | "Unexpected";

export type IngestionErrorContext = {
  invocationId: string;
  entity: string;
  stage: InvocationState;
  windowStart?: string;
  windowEnd?: string;
};

export class IngestionFatalError extends Error {
  readonly code: IngestionFailureCode;
  readonly context: IngestionErrorContext;
  readonly states: InvocationState[];
  readonly status?: number;

  constructor(args: {
    code: IngestionFailureCode;
    message: string;
    context: IngestionErrorContext;
    states: InvocationState[];
    status?: number;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "IngestionFatalError";
    this.code = args.code;
    this.context = args.context;
    this.states = args.states;
    this.status = args.status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const classifyFailure = (reason: unknown): IngestionFailureCode =>
  isIngestionError(reason) ? reason.kind : "Unexpected";

export const wrapInvocationFailure = (
  reason: unknown,
  context: IngestionErrorContext,
  states: InvocationState[]
): IngestionFatalError =>
  new IngestionFatalError({
    code: classifyFailure(reason),
    message: `Ingestion failed during ${context.stage} (invocation=${context.invocationId}): ${toErrorMessage(reason)}`,
    context,
    states,
    status: isIngestionError(reason) ? reason.status : undefined,
    cause: reason
  });

export type IngestionFailedLog = {
  event: "ingest.failed";
  code: IngestionFailureCode;
  message: string;
  states: InvocationState[];
} & IngestionErrorContext;

export const toFailedLog = (error: IngestionFatalError): IngestionFailedLog => ({
  event: "ingest.failed",
  code: error.code,
  message: error.message,
  states: error.states,
  ...error.context
});
