import {
  GenerationFailedError,
  type GenerationRequest,
  type GenerationResponse,
  type ModelInfo
} from "@pdf-brief/shared";
import { defaultFetch, sendRequest, type FetchFn } from "../http.js";
import { assertCredential, toGenerationError } from "./errors.js";
import type { CallOptions, GenerationClient, GenerationClientOptions } from "./types.js";

type ResponsesApiPayload = {
  model?: string;
  status?: string;
  output_text?: unknown;
  output?: Array<{
    content?: Array<{
      text?: unknown;
    }>;
  }>;
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  };
  incomplete_details?: { reason?: string } | null;
};

type ModelsApiPayload = {
  data?: Array<{ id?: unknown }>;
};

function extractOutputText(payload: ResponsesApiPayload): string {
  if (typeof payload.output_text === "string" && payload.output_text.trim().length > 0) {
    return payload.output_text.trim();
  }

  const segments: string[] = [];
  for (const item of payload.output ?? []) {
    for (const content of item.content ?? []) {
      if (typeof content.text === "string" && content.text.trim().length > 0) {
        segments.push(content.text.trim());
      }
    }
  }

  return segments.join("\n").trim();
}

export class OpenAiGenerationClient implements GenerationClient {
  readonly provider = "openai" as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(options: GenerationClientOptions) {
    this.apiKey = assertCredential("openai", options.credential);
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
      url: `${this.baseUrl}/responses`,
      method: "POST",
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model,
        temperature: 0.2,
        max_output_tokens: request.config.maxOutputTokens,
        input: [
          {
            role: "system",
            content: [{ type: "input_text", text: request.systemInstruction }]
          },
          {
            role: "user",
            content: [{ type: "input_text", text: request.prompt }]
          }
        ]
      },
      timeoutMs: this.timeoutMs,
      signal: options.signal
    });

    if (!result.ok) {
      throw toGenerationError({ provider: this.provider, model, result });
    }

    const payload = (result.payload ?? {}) as ResponsesApiPayload;
    const text = extractOutputText(payload);
    if (text.length === 0) {
      throw new GenerationFailedError({
        httpStatus: result.status,
        message: `openai returned no output text (status=${payload.status ?? "unknown"})`
      });
    }

    return {
      text,
      provider: this.provider,
      model: payload.model ?? model,
      latencyMs: this.now() - startedAt,
      usage: payload.usage
        ? {
            promptTokens: payload.usage.input_tokens,
            outputTokens: payload.usage.output_tokens,
            totalTokens: payload.usage.total_tokens
          }
        : undefined,
      finishReason: payload.incomplete_details?.reason ?? payload.status
    };
  }

  async listModels(options: CallOptions = {}): Promise<ModelInfo[]> {
    const result = await sendRequest({
      fetchFn: this.fetchFn,
      url: `${this.baseUrl}/models`,
      method: "GET",
      headers: { Authorization: `Bearer ${this.apiKey}` },
      timeoutMs: this.timeoutMs,
      signal: options.signal
    });
    if (!result.ok) {
      throw toGenerationError({ provider: this.provider, model: "", result });
    }

    const payload = (result.payload ?? {}) as ModelsApiPayload;
    return (payload.data ?? [])
      .map((model) => model.id)
      .filter((id): id is string => typeof id === "string" && id.length > 0)
      .sort((left, right) => left.localeCompare(right))
      .map((id) => ({ id }));
  }
}
