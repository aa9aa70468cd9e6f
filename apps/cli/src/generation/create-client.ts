import type { GenerationProvider } from "@pdf-brief/shared";
import type { FetchFn } from "../http.js";
import { GeminiGenerationClient } from "./gemini-client.js";
import { OpenAiGenerationClient } from "./openai-client.js";
import type { GenerationClient } from "./types.js";

// Throws AuthenticationError for a missing or malformed credential, so a bad key
// fails the run before any request leaves the process.
export function createGenerationClient(input: {
  provider: GenerationProvider;
  credential: string | null | undefined;
  baseUrls: Readonly<Record<GenerationProvider, string>>;
  timeoutMs: number;
  fetchFn?: FetchFn;
}): GenerationClient {
  const options = {
    credential: input.credential,
    baseUrl: input.baseUrls[input.provider],
    timeoutMs: input.timeoutMs,
    fetchFn: input.fetchFn
  };

  if (input.provider === "openai") {
    return new OpenAiGenerationClient(options);
  }
  return new GeminiGenerationClient(options);
}
