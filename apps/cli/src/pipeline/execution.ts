import { setTimeout as delay } from "node:timers/promises";
import {
  ErrorClass,
  RunCancelledError,
  classifyError,
  type ClassifiedError,
  type PipelineStage,
  type RetryPolicy,
  type StageTiming
} from "@pdf-brief/shared";
import { toLogError, type Logger, type StructuredLogContext } from "../logging.js";
import { PipelineStageError } from "./errors.js";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    throw error;
  }
};

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

/**
 * Runs `run` once and, if that attempt fails with a TRANSIENT error, once more after
 * `policy.delayMs`. Permanent errors and the second failure propagate unchanged.
 */
export async function runWithSingleRetry<TResult>(input: {
  run: (attempt: number) => Promise<TResult>;
  policy: RetryPolicy;
  sleep?: SleepFn;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; error: unknown; classified: ClassifiedError }) => void;
}): Promise<TResult> {
  const sleep = input.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    throwIfCancelled(input.signal);
    try {
      return await input.run(attempt);
    } catch (error) {
      const classified = classifyError(error);
      if (classified.class !== ErrorClass.TRANSIENT || attempt >= input.policy.maxAttempts) {
        throw error;
      }
      input.onRetry?.({ attempt, error, classified });
      await sleep(input.policy.delayMs, input.signal);
    }
  }
}

export async function runStage<TResult>(input: {
  stage: PipelineStage;
  logger: Logger;
  context: StructuredLogContext;
  run: () => Promise<TResult> | TResult;
  timings?: StageTiming[];
  now?: () => number;
}): Promise<TResult> {
  const now = input.now ?? Date.now;
  const context = { ...input.context, stage: input.stage };
  const startedAt = now();
  input.logger.info(context, "stage.start", { startedAt: new Date(startedAt).toISOString() });

  try {
    const result = await input.run();
    const elapsedMs = now() - startedAt;
    input.timings?.push({ stage: input.stage, elapsedMs });
    input.logger.info(context, "stage.done", { elapsedMs });
    return result;
  } catch (error) {
    const classified = classifyError(error);
    const logError = toLogError(error);
    input.logger.error(context, "stage.failed", {
      elapsedMs: now() - startedAt,
      errorClass: classified.class,
      errorCode: classified.code ?? logError.code,
      errorMessage: logError.message
    });
    throw new PipelineStageError({ stage: input.stage, cause: error });
  }
}
