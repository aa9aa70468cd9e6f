import { SummarizerError } from "../summary/errors.js";

export enum ErrorClass {
  TRANSIENT = "TRANSIENT",
  PERMANENT = "PERMANENT"
}

export type ClassifiedError = {
  class: ErrorClass;
  reason: string;
  code?: string;
  httpStatus?: number;
};

const NODE_TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET"
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const candidate = value[key];
  return typeof candidate === "string" ? candidate : undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const candidate = value[key];
  return typeof candidate === "number" ? candidate : undefined;
}

function extractHttpStatus(value: unknown): number | undefined {
  return readNumber(value, "httpStatus") ?? readNumber(value, "status") ?? readNumber(value, "statusCode");
}

function extractCode(value: unknown): string | undefined {
  const code = readString(value, "code") ?? readString(value, "errno");
  return code?.toUpperCase();
}

export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof SummarizerError) {
    const httpStatus = extractHttpStatus(err);
    return {
      class: err.permanent ? ErrorClass.PERMANENT : ErrorClass.TRANSIENT,
      reason: err.permanent ? "summarizer_permanent" : "summarizer_transient",
      code: err.code,
      httpStatus
    };
  }

  const code = extractCode(err);
  const httpStatus = extractHttpStatus(err);

  if (code && NODE_TRANSIENT_CODES.has(code)) {
    return {
      class: ErrorClass.TRANSIENT,
      reason: "network_code",
      code,
      httpStatus
    };
  }

  if (typeof httpStatus === "number" && (httpStatus === 408 || httpStatus === 429 || httpStatus >= 500)) {
    return {
      class: ErrorClass.TRANSIENT,
      reason: "http_retryable_status",
      code,
      httpStatus
    };
  }

  return {
    class: ErrorClass.PERMANENT,
    reason: "unclassified",
    code,
    httpStatus
  };
}
