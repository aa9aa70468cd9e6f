import {
  AuthenticationError,
  GenerationFailedError,
  InvalidModelError,
  RateLimitError,
  TransientNetworkError,
  type GenerationProvider,
  type SummarizerError
} from "@pdf-brief/shared";
import type { HttpResult } from "../http.js";

type ApiErrorDetail = {
  message: string;
  status: string;
  code: string;
  reasons: string[];
};

function readErrorDetail(payload: unknown): ApiErrorDetail {
  const error = (payload as { error?: unknown } | null | undefined)?.error;
  if (!error || typeof error !== "object") {
    return { message: "", status: "", code: "", reasons: [] };
  }
  const record = error as Record<string, unknown>;
  const details = Array.isArray(record.details) ? record.details : [];
  const reasons = details
    .map((detail) => (detail as { reason?: unknown } | null)?.reason)
    .filter((reason): reason is string => typeof reason === "string");
  return {
    message: typeof record.message === "string" ? record.message : "",
    status: typeof record.status === "string" ? record.status : "",
    code: typeof record.code === "string" ? record.code : "",
    reasons
  };
}

function looksLikeBadKey(detail: ApiErrorDetail): boolean {
  return (
    detail.reasons.includes("API_KEY_INVALID") ||
    detail.code === "invalid_api_key" ||
    /api key not valid|invalid api key|incorrect api key/i.test(detail.message)
  );
}

function looksLikeUnknownModel(detail: ApiErrorDetail): boolean {
  return (
    detail.code === "model_not_found" ||
    /model\b.*\b(not found|does not exist|is not supported|unknown)/i.test(detail.message)
  );
}

/**
 * Maps a non-2xx generation API response onto the summarizer error taxonomy.
 */
export function toGenerationError(input: {
  provider: GenerationProvider;
  model: string;
  result: HttpResult;
}): SummarizerError {
  const { status } = input.result;
  const detail = readErrorDetail(input.result.payload);
  const suffix = detail.message ? `: ${detail.message.slice(0, 300)}` : "";

  if (status === 401 || status === 403 || (status === 400 && looksLikeBadKey(detail))) {
    return new AuthenticationError({
      code: "AUTH_REJECTED",
      httpStatus: status,
      message: `${input.provider} rejected the API credential (status=${status})${suffix}`
    });
  }

  if (status === 404 || ((status === 400 || status === 403) && looksLikeUnknownModel(detail))) {
    return new InvalidModelError({
      model: input.model,
      message: `${input.provider} does not recognize model "${input.model}" (status=${status})${suffix}`
    });
  }

  if (status === 429) {
    return new RateLimitError({
      httpStatus: status,
      message: `${input.provider} rate limit exceeded${suffix}`
    });
  }

  if (status === 408 || status >= 500) {
    return new TransientNetworkError({
      code: "UPSTREAM_UNAVAILABLE",
      httpStatus: status,
      message: `${input.provider} is unavailable (status=${status})${suffix}`
    });
  }

  return new GenerationFailedError({
    httpStatus: status,
    message: `${input.provider} request failed (status=${status})${suffix || ` body=${input.result.bodyText.slice(0, 300)}`}`
  });
}

const CREDENTIAL_PATTERN = /^[\x21-\x7e]{8,}$/;

export function assertCredential(provider: GenerationProvider, credential: string | null | undefined): string {
  const value = credential?.trim() ?? "";
  if (value.length === 0) {
    throw new AuthenticationError({
      code: "AUTH_MISSING",
      message: `No API credential configured for ${provider}`
    });
  }
  if (!CREDENTIAL_PATTERN.test(value)) {
    throw new AuthenticationError({
      code: "AUTH_MALFORMED",
      message: `API credential for ${provider} is malformed`
    });
  }
  return value;
}
