export type { PipelineStage, RunId, StageTiming } from "./pipeline/types.js";
export { asRunId, newRunId } from "./pipeline/ids.js";

export type {
  GenerationConfig,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
  GenerationUsage,
  ModelInfo,
  OutputDocument,
  ParseOutcome,
  Reference,
  SourceDocument,
  SummaryResult,
  SummaryStyle
} from "./summary/types.js";
export { GENERATION_PROVIDERS, SUMMARY_STYLES } from "./summary/types.js";

export type { SummarizerErrorCode } from "./summary/errors.js";
export {
  AuthenticationError,
  ConfigError,
  ExtractionError,
  GenerationFailedError,
  InvalidModelError,
  MalformedResponseError,
  OutputWriteError,
  RateLimitError,
  RunCancelledError,
  SummarizerError,
  TransientNetworkError
} from "./summary/errors.js";

export type { ClassifiedError } from "./reliability/error-taxonomy.js";
export { ErrorClass, classifyError } from "./reliability/error-taxonomy.js";
export type { RetryPolicy } from "./reliability/retry-policy.js";
export {
  DEFAULT_RETRY_DELAY_MS,
  GENERATION_MAX_ATTEMPTS,
  buildRetryPolicy
} from "./reliability/retry-policy.js";
export { isFalsyEnv, isTruthyEnv } from "./reliability/env-flags.js";
