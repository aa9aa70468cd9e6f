import {
  GenerationFailedError,
  type GenerationRequest,
  type GenerationResponse,
  type ModelInfo
} from "@pdf-brief/shared";
import { defaultFetch, sendRequest, type FetchFn } from "../http.js";
import { assertCredential, toGenerationError } from "./errors.js";
import type { CallOptions, GenerationClient, GenerationClientOptions } from "./types.js";

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
};

type GeminiListModelsResponse = {
  models?: Array<{
    name?: string;
    displayName?: string;
    supportedGenerationMethods?: string[];
  }>;
  nextPageToken?: string;
};

const MAX_MODEL_PAGES = 10;

export class GeminiGenerationClient implements GenerationClient {
  readonly provider = "gemini" as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(options: GenerationClientOptions) {
    this.apiKey = assertCredential("gemini", options.credential);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.now = options.now ?? Date.now;
  }

  async generate(request: GenerationRequest, options: CallOptions = {}): Promise<GenerationResponse> {
    const model = request.config.model;
    const startedAt = this.now();
    const result = await sendRequest({
      fetchFn: this.fetchFn,
      url: `${this.baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
      method: "POST",
      headers: { "x-goog-api-key": this.apiKey },
      body: {
        systemInstruction: {
          parts: [{ text: request.systemInstruction }]
        },
        contents: [
          {
            role: "user",
            parts: [{ text: request.prompt }]
          }
        ],
        generationConfig: {
          maxOutputTokens: request.config.maxOutputTokens,
          temperature: 0.2
        }
      },
      timeoutMs: this.timeoutMs,
      signal: options.signal
    });

    if (!result.ok) {
      throw toGenerationError({ provider: this.provider, model, result });
    }

    const payload = (result.payload ?? {}) as GeminiGenerateContentResponse;
    const candidate = payload.candidates?.[0];
    const parts = candidate?.content?.parts;
    const text = Array.isArray(parts) ? parts.map((part) => part.text ?? "").join("").trim() : "";
    if (text.length === 0) {
      throw new GenerationFailedError({
        httpStatus: result.status,
        message: `gemini returned no text (finishReason=${candidate?.finishReason ?? "none"})`
      });
    }

    return {
      text,
      provider: this.provider,
      model: payload.modelVersion ?? model,
      latencyMs: this.now() - startedAt,
      usage: payload.usageMetadata
        ? {
            promptTokens: payload.usageMetadata.promptTokenCount,
            outputTokens: payload.usageMetadata.candidatesTokenCount,
            totalTokens: payload.usageMetadata.totalTokenCount
          }
        : undefined,
      finishReason: candidate?.finishReason
    };
  }

  /** Models that support `generateContent`, in the order the API lists them. */
  async listModels(options: CallOptions = {}): Promise<ModelInfo[]> {
    const models: ModelInfo[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_MODEL_PAGES; page += 1) {
      const url = new URL(`${this.baseUrl}/models`);
      url.searchParams.set("pageSize", "100");
      if (pageToken) {
        url.searchParams.set("pageToken", pageToken);
      }
      const result = await sendRequest({
        fetchFn: this.fetchFn,
        url: url.toString(),
        method: "GET",
        headers: { "x-goog-api-key": this.apiKey },
        timeoutMs: this.timeoutMs,
        signal: options.signal
      });
      if (!result.ok) {
        throw toGenerationError({ provider: this.provider, model: "", result });
      }

      const payload = (result.payload ?? {}) as GeminiListModelsResponse;
      for (const model of payload.models ?? []) {
        if (!model.name || !(model.supportedGenerationMethods ?? []).includes("generateContent")) {
          continue;
        }
        models.push({
          id: model.name.replace(/^models\//, ""),
          displayName: model.displayName
        });
      }

      pageToken = payload.nextPageToken;
      if (!pageToken) {
        break;
      }
    }

    return models;
  }
}
