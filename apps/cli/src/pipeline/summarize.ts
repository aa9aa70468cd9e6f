import { basename } from "node:path";
import {
  newRunId,
  type GenerationResponse,
  type OutputDocument,
  type PipelineStage,
  type Reference,
  type RunId,
  type StageTiming,
  type SummaryResult
} from "@pdf-brief/shared";
import type { AppConfig } from "../config.js";
import { extractText, type PdfParseFn } from "../docs/extract.js";
import { createGenerationClient } from "../generation/create-client.js";
import { buildGenerationRequest } from "../generation/prompt.js";
import type { GenerationClient } from "../generation/types.js";
import type { FetchFn } from "../http.js";
import { toLogError, type Logger, type StructuredLogContext } from "../logging.js";
import type { WriteOutputFn } from "../output.js";
import { CrossrefReferenceResolver, type ReferenceResolver } from "../references/crossref.js";
import { parseSummary } from "../summary/parse.js";
import { renderSummary } from "../summary/render.js";
import { runStage, runWithSingleRetry, throwIfCancelled, type SleepFn } from "./execution.js";

export type PipelineInput = {
  inputPath: string;
  // null keeps the rendered summary in memory only (the CLI's --stdout mode).
  outputPath: string | null;
  config: AppConfig;
  credential: string | null;
  signal?: AbortSignal;
  runId?: RunId;
};

export type PipelineDeps = {
  readFile: (path: string) => Promise<Uint8Array>;
  writeOutput: WriteOutputFn;
  logger: Logger;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  parsePdf?: PdfParseFn;
  createClient?: typeof createGenerationClient;
  resolver?: ReferenceResolver;
  now?: () => number;
};

export type PipelineResult = {
  runId: RunId;
  document: OutputDocument;
  summary: SummaryResult;
  reference: Reference;
  outputPath: string | null;
  source: {
    pageCount: number;
    charCount: number;
    truncated: boolean;
  };
  generation: {
    provider: GenerationResponse["provider"];
    model: string;
    attempts: number;
    usage?: GenerationResponse["usage"];
  };
  timings: StageTiming[];
};

async function resolveReference(input: {
  resolver: ReferenceResolver;
  summary: SummaryResult;
  logger: Logger;
  context: StructuredLogContext;
  signal?: AbortSignal;
}): Promise<Reference> {
  try {
    return await input.resolver.resolve(input.summary.title, input.summary.authors, { signal: input.signal });
  } catch (error) {
    const logError = toLogError(error);
    input.logger.warn(input.context, "reference.resolver_threw", {
      errorCode: logError.code,
      errorMessage: logError.message
    });
    return { status: "unresolved", reason: `resolver error: ${logError.message}` };
  }
}

/**
 * Runs one PDF through extract, prompt, generate, parse, reference, render and write,
 * in that order. Each failure is rethrown as a PipelineStageError naming its stage.
 * The reference lookup never fails the run, and nothing is written unless every
 * earlier stage succeeded.
 */
export async function summarizePdf(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  const { config, signal } = input;
  const runId = input.runId ?? newRunId();
  const timings: StageTiming[] = [];
  const context: StructuredLogContext = {
    runId,
    provider: config.generation.provider,
    model: config.generation.model,
    inputFile: basename(input.inputPath)
  };
  const stage = <TResult>(name: PipelineStage, run: () => Promise<TResult> | TResult) => {
    throwIfCancelled(signal);
    return runStage({ stage: name, logger: deps.logger, context, run, timings, now: deps.now });
  };

  deps.logger.info(context, "run.start");

  const client: GenerationClient = await stage("authenticate", () =>
    (deps.createClient ?? createGenerationClient)({
      provider: config.generation.provider,
      credential: input.credential,
      baseUrls: config.apiBaseUrls,
      timeoutMs: config.generation.requestTimeoutMs,
      fetchFn: deps.fetchFn
    })
  );

  const source = await stage("extract", async () => {
    const bytes = await deps.readFile(input.inputPath);
    return extractText({ bytes, filename: basename(input.inputPath), parsePdf: deps.parsePdf });
  });

  const request = await stage("prompt", () => buildGenerationRequest(source.text, config.generation));
  if (request.truncated) {
    deps.logger.warn({ ...context, stage: "prompt" }, "prompt.truncated", {
      detail: { inputChars: request.inputChars, maxInputChars: config.generation.maxInputChars }
    });
  }

  let attempts = 0;
  const response = await stage("generate", () =>
    runWithSingleRetry({
      policy: config.retry,
      sleep: deps.sleep,
      signal,
      run: (attempt) => {
        attempts = attempt;
        return client.generate(request, { signal });
      },
      onRetry: ({ attempt, error, classified }) => {
        deps.logger.warn({ ...context, stage: "generate" }, "generation.retry", {
          attempt,
          maxAttempts: config.retry.maxAttempts,
          errorClass: classified.class,
          errorCode: classified.code,
          errorMessage: toLogError(error).message
        });
      }
    })
  );

  const summary = await stage("parse", () => parseSummary(response));

  const reference = await stage("reference", (): Promise<Reference> | Reference => {
    if (!config.generation.includeReference) {
      return { status: "skipped" };
    }
    const resolver =
      deps.resolver ??
      new CrossrefReferenceResolver({
        ...config.reference,
        fetchFn: deps.fetchFn,
        logger: deps.logger,
        logContext: context
      });
    return resolveReference({
      resolver,
      summary,
      logger: deps.logger,
      context: { ...context, stage: "reference" },
      signal
    });
  });

  const document = await stage("render", () => renderSummary(summary, reference));

  if (input.outputPath !== null) {
    const outputPath = input.outputPath;
    await stage("write", () => deps.writeOutput(outputPath, document.markdown));
  }

  deps.logger.info(context, "run.done", {
    detail: {
      attempts,
      reference: reference.status,
      outputPath: input.outputPath ?? undefined
    }
  });

  return {
    runId,
    document,
    summary,
    reference,
    outputPath: input.outputPath,
    source: {
      pageCount: source.pageCount,
      charCount: source.charCount,
      truncated: request.truncated
    },
    generation: {
      provider: response.provider,
      model: response.model,
      attempts,
      usage: response.usage
    },
    timings
  };
}
