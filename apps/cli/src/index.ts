export { main, parseCliArgs, USAGE, EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from "./cli.js";
export type { CliDeps, CliIo, CliOptions } from "./cli.js";
export { loadConfig, DEFAULT_MODELS } from "./config.js";
export type { AppConfig, ConfigOverrides, ReferenceConfig } from "./config.js";
export { resolveCredential, tokenFilePath } from "./credentials.js";
export { extractText, parsePdfPages } from "./docs/extract.js";
export { buildGenerationRequest, truncationMarker } from "./generation/prompt.js";
export { createGenerationClient } from "./generation/create-client.js";
export { GeminiGenerationClient } from "./generation/gemini-client.js";
export { OpenAiGenerationClient } from "./generation/openai-client.js";
export type { GenerationClient } from "./generation/types.js";
export { classifyResponse, parseSummary } from "./summary/parse.js";
export { renderSummary } from "./summary/render.js";
export { CrossrefReferenceResolver, formatCitation } from "./references/crossref.js";
export type { ReferenceResolver } from "./references/crossref.js";
export { titleSimilarity } from "./references/similarity.js";
export { summarizePdf } from "./pipeline/summarize.js";
export type { PipelineDeps, PipelineInput, PipelineResult } from "./pipeline/summarize.js";
export { runWithSingleRetry } from "./pipeline/execution.js";
export { PipelineStageError, describeFailure } from "./pipeline/errors.js";
export { outputPathFor, writeOutputOnce } from "./output.js";
