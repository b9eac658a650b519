import { ZodError } from "zod";

export type ErrorCode = "INGEST" | "EXPORT" | "CONFIG";

export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Base class for run-level failures. Any of these aborts the report.
 */
export class ReportError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
  }
}

/** Input file missing, unreadable, or without the required columns. */
export class IngestError extends ReportError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super("INGEST", message, options);
  }
}

/** Output directory not creatable/writable, or an artifact write failed. */
export class ExportError extends ReportError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super("EXPORT", message, options);
  }
}

export class ConfigError extends ReportError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super("CONFIG", message, options);
  }
}

/**
 * Convert zod validation issues into a ConfigError
 */
export function fromZodError(error: ZodError, subject: string): ConfigError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const lines = issues.map((i) => `  ${i.path || "(root)"}: ${i.message}`);
  return new ConfigError(`Invalid ${subject}:\n${lines.join("\n")}`, {
    cause: error,
    details: { issues },
  });
}

function errorCause(error: Error): string | undefined {
  if (error.cause instanceof Error) return error.cause.message;
  return undefined;
}

/**
 * Report a fatal error and return the process exit status
 */
export function handleError(error: unknown, logger: Logger = console): number {
  if (error instanceof ZodError) {
    return handleError(fromZodError(error, "input"), logger);
  }

  if (error instanceof ReportError) {
    logger.error(`❌ ${error.name} [${error.code}]: ${error.message}`);
    const cause = errorCause(error);
    if (cause) logger.error(`   caused by: ${cause}`);
    return 1;
  }

  const message =
    error instanceof Error ? error.message : "An unexpected error occurred";
  logger.error(`❌ Unexpected error: ${message}`);
  if (error instanceof Error && error.stack) logger.error(error.stack);
  return 1;
}
