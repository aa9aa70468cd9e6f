import {
  ConfigError,
  DEFAULT_RETRY_DELAY_MS,
  GENERATION_PROVIDERS,
  SUMMARY_STYLES,
  buildRetryPolicy,
  isFalsyEnv,
  isTruthyEnv,
  type GenerationConfig,
  type GenerationProvider,
  type RetryPolicy,
  type SummaryStyle
} from "@pdf-brief/shared";

export const DEFAULT_MODELS: Record<GenerationProvider, string> = {
  gemini: "gemini-2.5-flash",
  openai: "gpt-4.1-mini"
};

export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
export const DEFAULT_MAX_INPUT_CHARS = 120_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;
export const DEFAULT_REFERENCE_TIMEOUT_MS = 10_000;
export const DEFAULT_REFERENCE_ROWS = 5;

export type ReferenceConfig = {
  readonly baseUrl: string;
  readonly citationBaseUrl: string;
  readonly citationStyle: string;
  readonly mailto?: string;
  readonly rows: number;
  readonly similarityThreshold: number;
  readonly timeoutMs: number;
};

export type AppConfig = {
  readonly generation: GenerationConfig;
  readonly reference: ReferenceConfig;
  readonly retry: RetryPolicy;
  readonly apiBaseUrls: Readonly<Record<GenerationProvider, string>>;
};

export type ConfigOverrides = {
  provider?: string;
  model?: string;
  maxOutputTokens?: string;
  style?: string;
  includeReference?: boolean;
  maxInputChars?: string;
  timeoutMs?: string;
  similarityThreshold?: string;
};

type Env = Record<string, string | undefined>;

function pick(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

function parseIntegerSetting(
  field: string,
  raw: string | undefined,
  fallback: number,
  bounds: { min: number; max: number }
): number {
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError({ field, message: `${field} must be a positive integer, got "${raw}"` });
  }
  const value = Number.parseInt(raw, 10);
  if (value < bounds.min || value > bounds.max) {
    throw new ConfigError({ field, message: `${field} must be between ${bounds.min} and ${bounds.max}, got ${value}` });
  }
  return value;
}

function parseRatioSetting(field: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new ConfigError({ field, message: `${field} must be a number in (0, 1], got "${raw}"` });
  }
  return value;
}

function parseProvider(raw: string | undefined): GenerationProvider {
  if (raw === undefined) {
    return "gemini";
  }
  const normalized = raw.toLowerCase();
  const match = GENERATION_PROVIDERS.find((provider) => provider === normalized);
  if (!match) {
    throw new ConfigError({
      field: "provider",
      message: `provider must be one of ${GENERATION_PROVIDERS.join(", ")}, got "${raw}"`
    });
  }
  return match;
}

function parseStyle(raw: string | undefined): SummaryStyle {
  if (raw === undefined) {
    return "concise";
  }
  const normalized = raw.toLowerCase();
  const match = SUMMARY_STYLES.find((style) => style === normalized);
  if (!match) {
    throw new ConfigError({
      field: "style",
      message: `style must be one of ${SUMMARY_STYLES.join(", ")}, got "${raw}"`
    });
  }
  return match;
}

function parseIncludeReference(override: boolean | undefined, raw: string | undefined): boolean {
  if (override !== undefined) {
    return override;
  }
  if (raw === undefined) {
    return true;
  }
  if (isTruthyEnv(raw)) {
    return true;
  }
  if (isFalsyEnv(raw)) {
    return false;
  }
  throw new ConfigError({ field: "includeReference", message: `PDF_BRIEF_INCLUDE_REFERENCE is not a boolean: "${raw}"` });
}

/**
 * Builds the run configuration. Precedence is CLI overrides, then environment
 * variables, then defaults. The result is frozen.
 */
export function loadConfig(input: { env?: Env; overrides?: ConfigOverrides } = {}): AppConfig {
  const env = input.env ?? process.env;
  const overrides = input.overrides ?? {};

  const provider = parseProvider(pick(overrides.provider, env.PDF_BRIEF_PROVIDER));
  const model = pick(overrides.model, env.PDF_BRIEF_MODEL) ?? DEFAULT_MODELS[provider];

  const generation: GenerationConfig = Object.freeze({
    provider,
    model,
    maxOutputTokens: parseIntegerSetting(
      "maxOutputTokens",
      pick(overrides.maxOutputTokens, env.PDF_BRIEF_MAX_OUTPUT_TOKENS),
      DEFAULT_MAX_OUTPUT_TOKENS,
      { min: 64, max: 65_536 }
    ),
    style: parseStyle(pick(overrides.style, env.PDF_BRIEF_STYLE)),
    includeReference: parseIncludeReference(overrides.includeReference, pick(env.PDF_BRIEF_INCLUDE_REFERENCE)),
    maxInputChars: parseIntegerSetting(
      "maxInputChars",
      pick(overrides.maxInputChars, env.PDF_BRIEF_MAX_INPUT_CHARS),
      DEFAULT_MAX_INPUT_CHARS,
      { min: 1_000, max: 4_000_000 }
    ),
    requestTimeoutMs: parseIntegerSetting(
      "requestTimeoutMs",
      pick(overrides.timeoutMs, env.PDF_BRIEF_TIMEOUT_MS),
      DEFAULT_REQUEST_TIMEOUT_MS,
      { min: 1_000, max: 600_000 }
    )
  });

  const reference: ReferenceConfig = Object.freeze({
    baseUrl: pick(env.CROSSREF_API_BASE_URL) ?? "https://api.crossref.org",
    citationBaseUrl: pick(env.DOI_RESOLVER_BASE_URL) ?? "https://doi.org",
    citationStyle: pick(env.PDF_BRIEF_CITATION_STYLE) ?? "apa",
    mailto: pick(env.CROSSREF_MAILTO),
    rows: DEFAULT_REFERENCE_ROWS,
    similarityThreshold: parseRatioSetting(
      "similarityThreshold",
      pick(overrides.similarityThreshold, env.PDF_BRIEF_SIMILARITY_THRESHOLD),
      DEFAULT_SIMILARITY_THRESHOLD
    ),
    timeoutMs: DEFAULT_REFERENCE_TIMEOUT_MS
  });

  const retryDelayMs = parseIntegerSetting("retryDelayMs", pick(env.PDF_BRIEF_RETRY_DELAY_MS), DEFAULT_RETRY_DELAY_MS, {
    min: 0,
    max: 60_000
  });

  return Object.freeze({
    generation,
    reference,
    retry: buildRetryPolicy(retryDelayMs),
    apiBaseUrls: Object.freeze({
      gemini: pick(env.GEMINI_API_BASE_URL) ?? "https://generativelanguage.googleapis.com/v1beta",
      openai: pick(env.OPENAI_API_BASE_URL) ?? "https://api.openai.com/v1"
    })
  });
}
