import assert from "node:assert/strict";
import test from "node:test";
import {
  AuthenticationError,
  InvalidModelError,
  RunCancelledError,
  TransientNetworkError,
  type GenerationConfig
} from "@pdf-brief/shared";
import type { FetchFn } from "../http.js";
import { createGenerationClient } from "./create-client.js";
import { OpenAiGenerationClient } from "./openai-client.js";
import { buildGenerationRequest } from "./prompt.js";

const config: GenerationConfig = {
  provider: "openai",
  model: "gpt-4.1-mini",
  maxOutputTokens: 1024,
  style: "detailed",
  includeReference: false,
  maxInputChars: 120_000,
  requestTimeoutMs: 60_000
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

test("OpenAiGenerationClient.generate calls the Responses API", async () => {
  let seenUrl = "";
  let seenAuth: string | null = null;
  let seenBody: unknown;
  const fetchFn: FetchFn = async (input, init) => {
    seenUrl = String(input);
    seenAuth = new Headers(init?.headers).get("authorization");
    seenBody = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    return jsonResponse(200, {
      model: "gpt-4.1-mini-2025-04-14",
      status: "completed",
      output: [{ content: [{ text: "## Roofline Modeling\n\n### Authors\n\n- A. Author" }] }],
      usage: { input_tokens: 120, output_tokens: 30, total_tokens: 150 }
    });
  };
  const client = new OpenAiGenerationClient({
    credential: "test-secret",
    baseUrl: "https://openai.test/v1",
    timeoutMs: 5_000,
    fetchFn,
    now: () => 0
  });
  const request = buildGenerationRequest("document text", config);

  const response = await client.generate(request);

  assert.equal(seenUrl, "https://openai.test/v1/responses");
  assert.equal(seenAuth, "Bearer test-secret");
  assert.deepEqual(seenBody, {
    model: "gpt-4.1-mini",
    temperature: 0.2,
    max_output_tokens: 1024,
    input: [
      { role: "system", content: [{ type: "input_text", text: request.systemInstruction }] },
      { role: "user", content: [{ type: "input_text", text: request.prompt }] }
    ]
  });
  assert.deepEqual(response, {
    text: "## Roofline Modeling\n\n### Authors\n\n- A. Author",
    provider: "openai",
    model: "gpt-4.1-mini-2025-04-14",
    latencyMs: 0,
    usage: { promptTokens: 120, outputTokens: 30, totalTokens: 150 },
    finishReason: "completed"
  });
});

test("OpenAiGenerationClient maps rejected keys, unknown models and outages", async () => {
  const request = buildGenerationRequest("document text", config);
  const cases: Array<[Response, (error: unknown) => boolean]> = [
    [
      jsonResponse(401, { error: { message: "Incorrect API key provided", code: "invalid_api_key" } }),
      (error) => error instanceof AuthenticationError && error.httpStatus === 401
    ],
    [
      jsonResponse(400, { error: { message: "The model `gpt-0` does not exist", code: "model_not_found" } }),
      (error) => error instanceof InvalidModelError
    ],
    [
      new Response("upstream connect error", { status: 502 }),
      (error) => error instanceof TransientNetworkError && error.httpStatus === 502
    ]
  ];

  for (const [response, matches] of cases) {
    const client = new OpenAiGenerationClient({
      credential: "test-secret",
      baseUrl: "https://openai.test/v1",
      timeoutMs: 5_000,
      fetchFn: async () => response
    });
    await assert.rejects(client.generate(request), matches);
  }
});

test("OpenAiGenerationClient reports transport failures as unreachable", async () => {
  const client = new OpenAiGenerationClient({
    credential: "test-secret",
    baseUrl: "https://openai.test/v1",
    timeoutMs: 5_000,
    fetchFn: async () => {
      throw new TypeError("fetch failed");
    }
  });

  await assert.rejects(
    client.generate(buildGenerationRequest("document text", config)),
    (error: unknown) =>
      error instanceof TransientNetworkError &&
      error.code === "NETWORK_UNREACHABLE" &&
      error.message === "Request to openai.test failed: fetch failed"
  );
});

test("OpenAiGenerationClient stops when the run is cancelled", async () => {
  let requested = false;
  const client = new OpenAiGenerationClient({
    credential: "test-secret",
    baseUrl: "https://openai.test/v1",
    timeoutMs: 5_000,
    fetchFn: async () => {
      requested = true;
      return jsonResponse(200, {});
    }
  });
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    client.generate(buildGenerationRequest("document text", config), { signal: controller.signal }),
    (error: unknown) => error instanceof RunCancelledError
  );
  assert.equal(requested, false);
});

test("OpenAiGenerationClient.listModels returns sorted model ids", async () => {
  const client = new OpenAiGenerationClient({
    credential: "test-secret",
    baseUrl: "https://openai.test/v1",
    timeoutMs: 5_000,
    fetchFn: async () => jsonResponse(200, { data: [{ id: "gpt-4o" }, { id: "gpt-4.1-mini" }, { id: 7 }] })
  });

  assert.deepEqual(await client.listModels(), [{ id: "gpt-4.1-mini" }, { id: "gpt-4o" }]);
});

test("createGenerationClient picks the client for the configured provider", () => {
  const baseUrls = { gemini: "https://gemini.test/v1beta", openai: "https://openai.test/v1" };

  assert.equal(
    createGenerationClient({ provider: "openai", credential: "test-secret", baseUrls, timeoutMs: 1_000 }).provider,
    "openai"
  );
  assert.equal(
    createGenerationClient({ provider: "gemini", credential: "test-secret", baseUrls, timeoutMs: 1_000 }).provider,
    "gemini"
  );
  assert.throws(
    () => createGenerationClient({ provider: "openai", credential: "", baseUrls, timeoutMs: 1_000 }),
    (error: unknown) => error instanceof AuthenticationError && error.code === "AUTH_MISSING"
  );
});
