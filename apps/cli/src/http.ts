import { RunCancelledError, TransientNetworkError } from "@pdf-brief/shared";

export type FetchFn = typeof fetch;

export const defaultFetch: FetchFn = (input, init) => fetch(input, init);

export type HttpResult = {
  status: number;
  ok: boolean;
  headers: Headers;
  bodyText: string;
  payload: unknown;
};

function parseJsonSafely(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    const cause = (error as { cause?: unknown }).cause;
    const causeCode = (cause as { code?: unknown } | null)?.code;
    return typeof causeCode === "string" ? `${error.message} (${causeCode})` : error.message;
  }
  return String(error);
}

/**
 * One HTTP exchange with a hard timeout. Transport failures become
 * TransientNetworkError; an abort of the caller's signal becomes RunCancelledError.
 * Non-2xx statuses are returned, not thrown.
 */
export async function sendRequest(input: {
  fetchFn: FetchFn;
  url: string;
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<HttpResult> {
  if (input.signal?.aborted) {
    throw new RunCancelledError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, input.timeoutMs);
  const onCallerAbort = () => controller.abort();
  input.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const response = await input.fetchFn(input.url, {
      method: input.method,
      headers: {
        ...(input.body === undefined ? {} : { "Content-Type": "application/json" }),
        ...input.headers
      },
      body: input.body === undefined ? undefined : JSON.stringify(input.body),
      signal: controller.signal
    });
    const bodyText = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      headers: response.headers,
      bodyText,
      payload: parseJsonSafely(bodyText)
    };
  } catch (error) {
    if (input.signal?.aborted) {
      throw new RunCancelledError();
    }
    const host = new URL(input.url).host;
    if (timedOut) {
      throw new TransientNetworkError({
        code: "NETWORK_TIMEOUT",
        message: `Request to ${host} timed out after ${input.timeoutMs}ms`,
        cause: error
      });
    }
    throw new TransientNetworkError({
      code: "NETWORK_UNREACHABLE",
      message: `Request to ${host} failed: ${describeCause(error)}`,
      cause: error
    });
  } finally {
    clearTimeout(timer);
    input.signal?.removeEventListener("abort", onCallerAbort);
  }
}
