export type SummarizerErrorCode =
  | "PDF_UNREADABLE"
  | "PDF_NO_PAGES"
  | "PDF_NO_TEXT"
  | "AUTH_MISSING"
  | "AUTH_MALFORMED"
  | "AUTH_REJECTED"
  | "RATE_LIMITED"
  | "NETWORK_TIMEOUT"
  | "NETWORK_UNREACHABLE"
  | "UPSTREAM_UNAVAILABLE"
  | "MODEL_NOT_FOUND"
  | "GENERATION_FAILED"
  | "RESPONSE_MALFORMED"
  | "CONFIG_INVALID"
  | "OUTPUT_WRITE_FAILED"
  | "RUN_CANCELLED";

/**
 * Base for every failure the summarization pipeline reports. `permanent` errors are
 * never retried; the rest are eligible for the single generation retry.
 */
export class SummarizerError extends Error {
  readonly code: SummarizerErrorCode;
  readonly permanent: boolean;

  constructor(input: { code: SummarizerErrorCode; message: string; permanent: boolean; cause?: unknown }) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "SummarizerError";
    this.code = input.code;
    this.permanent = input.permanent;
  }
}

export class ExtractionError extends SummarizerError {
  constructor(input: { code: "PDF_UNREADABLE" | "PDF_NO_PAGES" | "PDF_NO_TEXT"; message?: string; cause?: unknown }) {
    super({
      code: input.code,
      message: input.message ?? `Unable to extract text from PDF (${input.code})`,
      permanent: true,
      cause: input.cause
    });
    this.name = "ExtractionError";
  }
}

export class AuthenticationError extends SummarizerError {
  readonly httpStatus?: number;

  constructor(input: {
    code: "AUTH_MISSING" | "AUTH_MALFORMED" | "AUTH_REJECTED";
    message?: string;
    httpStatus?: number;
  }) {
    super({
      code: input.code,
      message: input.message ?? `Generation API credential rejected (${input.code})`,
      permanent: true
    });
    this.name = "AuthenticationError";
    this.httpStatus = input.httpStatus;
  }
}

export class RateLimitError extends SummarizerError {
  readonly httpStatus: number;

  constructor(input: { message?: string; httpStatus?: number }) {
    super({
      code: "RATE_LIMITED",
      message: input.message ?? "Generation API rate limit exceeded",
      permanent: false
    });
    this.name = "RateLimitError";
    this.httpStatus = input.httpStatus ?? 429;
  }
}

export class TransientNetworkError extends SummarizerError {
  readonly httpStatus?: number;

  constructor(input: {
    code: "NETWORK_TIMEOUT" | "NETWORK_UNREACHABLE" | "UPSTREAM_UNAVAILABLE";
    message?: string;
    httpStatus?: number;
    cause?: unknown;
  }) {
    super({
      code: input.code,
      message: input.message ?? `Network failure calling generation API (${input.code})`,
      permanent: false,
      cause: input.cause
    });
    this.name = "TransientNetworkError";
    this.httpStatus = input.httpStatus;
  }
}

export class InvalidModelError extends SummarizerError {
  readonly model: string;

  constructor(input: { model: string; message?: string }) {
    super({
      code: "MODEL_NOT_FOUND",
      message: input.message ?? `Model "${input.model}" is not recognized by the generation API`,
      permanent: true
    });
    this.name = "InvalidModelError";
    this.model = input.model;
  }
}

export class GenerationFailedError extends SummarizerError {
  readonly httpStatus?: number;

  constructor(input: { message: string; httpStatus?: number }) {
    super({ code: "GENERATION_FAILED", message: input.message, permanent: true });
    this.name = "GenerationFailedError";
    this.httpStatus = input.httpStatus;
  }
}

export class MalformedResponseError extends SummarizerError {
  readonly reason: string;

  constructor(input: { reason: string; message?: string }) {
    super({
      code: "RESPONSE_MALFORMED",
      message: input.message ?? `Model response could not be parsed: ${input.reason}`,
      permanent: true
    });
    this.name = "MalformedResponseError";
    this.reason = input.reason;
  }
}

export class ConfigError extends SummarizerError {
  readonly field: string;

  constructor(input: { field: string; message: string }) {
    super({ code: "CONFIG_INVALID", message: input.message, permanent: true });
    this.name = "ConfigError";
    this.field = input.field;
  }
}

export class OutputWriteError extends SummarizerError {
  readonly outputPath: string;

  constructor(input: { outputPath: string; cause?: unknown }) {
    super({
      code: "OUTPUT_WRITE_FAILED",
      message: `Failed to write summary to ${input.outputPath}`,
      permanent: true,
      cause: input.cause
    });
    this.name = "OutputWriteError";
    this.outputPath = input.outputPath;
  }
}

export class RunCancelledError extends SummarizerError {
  constructor(input: { message?: string } = {}) {
    super({ code: "RUN_CANCELLED", message: input.message ?? "Run cancelled", permanent: true });
    this.name = "RunCancelledError";
  }
}
