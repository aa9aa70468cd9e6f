import type { PipelineStage, RunId } from "@pdf-brief/shared";

export type StructuredLogContext = {
  runId?: RunId;
  stage?: PipelineStage;
  provider?: string;
  model?: string;
  inputFile?: string;
};

export type StructuredLogEvent = StructuredLogContext & {
  level: "info" | "warn" | "error";
  event: string;
  elapsedMs?: number;
  startedAt?: string;
  attempt?: number;
  maxAttempts?: number;
  errorClass?: string;
  errorCode?: string;
  errorMessage?: string;
  detail?: Record<string, string | number | boolean | undefined>;
};

type LogExtra = Omit<StructuredLogEvent, keyof StructuredLogContext | "level" | "event">;

export interface Logger {
  info(context: StructuredLogContext, event: string, extra?: LogExtra): void;
  warn(context: StructuredLogContext, event: string, extra?: LogExtra): void;
  error(context: StructuredLogContext, event: string, extra?: LogExtra): void;
}

export function toStructuredLogContext(context: StructuredLogContext): StructuredLogContext {
  return {
    runId: context.runId,
    stage: context.stage,
    provider: context.provider,
    model: context.model,
    inputFile: context.inputFile
  };
}

export function toStructuredLogEvent(
  context: StructuredLogContext,
  level: StructuredLogEvent["level"],
  event: string,
  extra?: LogExtra
): StructuredLogEvent {
  return {
    level,
    ...toStructuredLogContext(context),
    event,
    elapsedMs: extra?.elapsedMs,
    startedAt: extra?.startedAt,
    attempt: extra?.attempt,
    maxAttempts: extra?.maxAttempts,
    errorClass: extra?.errorClass,
    errorCode: extra?.errorCode,
    errorMessage: extra?.errorMessage,
    detail: extra?.detail
  };
}

export function toLogError(error: unknown): { message: string; stack?: string; code?: string } {
  if (error instanceof Error) {
    const maybeCode = (error as { code?: unknown }).code;
    return {
      message: error.message,
      stack: error.stack,
      code: typeof maybeCode === "string" ? maybeCode : undefined
    };
  }

  return {
    message: String(error)
  };
}

// Log lines never carry credentials: every line passes through redaction, and a line
// whose redaction throws is replaced by a fixed notice.
export function redactSecrets(text: string): string {
  let out = text;
  out = out.replace(/(Authorization\s*:\s*Bearer\s+)([^\s"]+)/gi, "$1***REDACTED***");
  out = out.replace(/\bBearer\s+([A-Za-z0-9\-._~+/]+=*)/g, "Bearer ***REDACTED***");
  out = out.replace(/\bsk-[A-Za-z0-9_-]{10,}/g, "***REDACTED***");
  out = out.replace(/\bAIza[0-9A-Za-z\-_]{20,}/g, "***REDACTED***");
  out = out.replace(/\b([A-Z0-9_]{2,}_)?API_KEY\s*=\s*([^\s"']+)/g, "$1API_KEY=***REDACTED***");
  out = out.replace(/([?&](?:api_key|apikey|access_token|token|key)=)([^&#\s"]+)/gi, "$1***REDACTED***");
  return out;
}

const REDACTION_FAILED_LINE = JSON.stringify({
  level: "error",
  event: "log.redaction_failed",
  errorMessage: "Log redaction failed; original content suppressed."
});

export function formatLogLine(event: StructuredLogEvent): string {
  try {
    return redactSecrets(JSON.stringify(event));
  } catch {
    return REDACTION_FAILED_LINE;
  }
}

// Log output goes to stderr so stdout can carry the rendered summary.
export function createJsonLogger(options: { quiet?: boolean; write?: (line: string) => void } = {}): Logger {
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.error(line));
  const emit = (level: StructuredLogEvent["level"], context: StructuredLogContext, event: string, extra?: LogExtra) => {
    if (options.quiet && level === "info") {
      return;
    }
    write(formatLogLine(toStructuredLogEvent(context, level, event, extra)));
  };

  return {
    info: (context, event, extra) => emit("info", context, event, extra),
    warn: (context, event, extra) => emit("warn", context, event, extra),
    error: (context, event, extra) => emit("error", context, event, extra)
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
};
