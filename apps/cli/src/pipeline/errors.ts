import type { PipelineStage } from "@pdf-brief/shared";

const MAX_MESSAGE_CHARS = 500;
const MAX_STACK_CHARS = 2000;

export type SerializedError = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
};

function truncate(value: string | undefined, maxChars: number): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.length > maxChars ? `${value.slice(0, maxChars)}…` : value;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const withCode = error as Error & { code?: unknown };
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      code: typeof withCode.code === "string" ? withCode.code : undefined,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  return {
    name: "UnknownError",
    message: truncate(String(error), MAX_MESSAGE_CHARS) ?? "Unknown error"
  };
}

/**
 * A failure tagged with the pipeline stage it happened in. The underlying error stays
 * reachable through `cause`.
 */
export class PipelineStageError extends Error {
  readonly stage: PipelineStage;
  override readonly cause: unknown;

  constructor(input: { stage: PipelineStage; cause: unknown }) {
    super(`Stage "${input.stage}" failed: ${serializeError(input.cause).message}`, { cause: input.cause });
    this.name = "PipelineStageError";
    this.stage = input.stage;
    this.cause = input.cause;
  }
}

export function stageOf(error: unknown): PipelineStage | undefined {
  return error instanceof PipelineStageError ? error.stage : undefined;
}

export function rootCause(error: unknown): unknown {
  return error instanceof PipelineStageError ? error.cause : error;
}

// One line for the terminal, e.g. "[generate] RateLimitError (RATE_LIMITED): ...".
export function describeFailure(error: unknown): string {
  const stage = stageOf(error);
  const serialized = serializeError(rootCause(error));
  const code = serialized.code ? ` (${serialized.code})` : "";
  const prefix = stage ? `[${stage}] ` : "";
  const message = serialized.message.replace(/\s+/g, " ").trim();
  return `${prefix}${serialized.name}${code}: ${message}`;
}
