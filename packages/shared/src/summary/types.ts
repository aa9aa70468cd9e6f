export type GenerationProvider = "gemini" | "openai";

export type SummaryStyle = "concise" | "detailed";

export const SUMMARY_STYLES: readonly SummaryStyle[] = ["concise", "detailed"];

export const GENERATION_PROVIDERS: readonly GenerationProvider[] = ["gemini", "openai"];

export type SourceDocument = {
  readonly filename: string | null;
  readonly text: string;
  readonly pageCount: number;
  readonly charCount: number;
};

export type GenerationConfig = {
  readonly provider: GenerationProvider;
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly style: SummaryStyle;
  readonly includeReference: boolean;
  readonly maxInputChars: number;
  readonly requestTimeoutMs: number;
};

export type GenerationRequest = {
  readonly systemInstruction: string;
  readonly prompt: string;
  readonly config: GenerationConfig;
  readonly inputChars: number;
  readonly truncated: boolean;
};

export type GenerationUsage = {
  promptTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
};

export type GenerationResponse = {
  text: string;
  provider: GenerationProvider;
  model: string;
  latencyMs: number;
  usage?: GenerationUsage;
  finishReason?: string;
};

export type SummaryResult = {
  title: string;
  authors: string[];
  synopsis: string;
};

export type ParseOutcome =
  | { status: "parsed"; summary: SummaryResult }
  | { status: "malformed"; reason: string };

export type Reference =
  | { status: "resolved"; citation: string; title: string; doi: string; score: number }
  | { status: "unresolved"; reason: string }
  | { status: "skipped" };

export type OutputDocument = {
  readonly markdown: string;
};

export type ModelInfo = {
  id: string;
  displayName?: string;
};
