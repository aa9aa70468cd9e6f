import type {
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
  ModelInfo
} from "@pdf-brief/shared";
import type { FetchFn } from "../http.js";

export type CallOptions = {
  signal?: AbortSignal;
};

export interface GenerationClient {
  readonly provider: GenerationProvider;
  generate(request: GenerationRequest, options?: CallOptions): Promise<GenerationResponse>;
  listModels(options?: CallOptions): Promise<ModelInfo[]>;
}

export type GenerationClientOptions = {
  credential: string | null | undefined;
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
  now?: () => number;
};
