import assert from "node:assert/strict";
import test from "node:test";
import { ConfigError } from "@pdf-brief/shared";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, main, parseCliArgs, type CliDeps } from "./cli.js";
import type { FetchFn } from "./http.js";
import { silentLogger } from "./logging.js";

const MODEL_REPLY = "## Roofline Modeling of RPC Throughput\n### Authors\n- Ada Lovelace\n### Synopsis\nWe bound RPC throughput.";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function captureIo() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      stdout: (text: string) => out.push(text),
      stderr: (text: string) => err.push(text)
    }
  };
}

function cliDeps(fetchFn: FetchFn, writes: Array<{ path: string; text: string }> = []): CliDeps {
  return {
    readFile: async () => new Uint8Array([0x25, 0x50, 0x44, 0x46]),
    writeOutput: async (path, text) => {
      writes.push({ path, text });
    },
    readTextFile: () => Promise.reject(Object.assign(new Error("no token file"), { code: "ENOENT" })),
    parsePdf: async () => ({ pageTexts: ["Roofline Modeling of RPC Throughput"] }),
    sleep: async () => {},
    logger: silentLogger,
    fetchFn
  };
}

test("parseCliArgs maps flags onto config overrides", () => {
  const options = parseCliArgs([
    "paper.pdf",
    "--provider",
    "openai",
    "--model",
    "gpt-4.1",
    "--style",
    "detailed",
    "--max-output-tokens",
    "1024",
    "--no-reference",
    "--out-dir",
    "out",
    "--quiet"
  ]);

  assert.deepEqual(options, {
    inputPath: "paper.pdf",
    overrides: {
      provider: "openai",
      model: "gpt-4.1",
      style: "detailed",
      maxOutputTokens: "1024",
      includeReference: false
    },
    outDir: "out",
    stdout: false,
    quiet: true,
    listModels: false,
    help: false
  });
  assert.equal(parseCliArgs(["paper.pdf"]).overrides.includeReference, undefined);
  assert.equal(parseCliArgs(["paper.pdf", "--reference"]).overrides.includeReference, true);
});

test("parseCliArgs rejects unknown flags and conflicting options", () => {
  for (const argv of [["paper.pdf", "--bogus"], ["a.pdf", "b.pdf"], ["paper.pdf", "--reference", "--no-reference"]]) {
    assert.throws(() => parseCliArgs(argv), (error: unknown) => error instanceof ConfigError && error.field === "arguments");
  }
});

test("main prints the summary with --stdout", async () => {
  const { io, out, err } = captureIo();
  const writes: Array<{ path: string; text: string }> = [];

  const code = await main({
    argv: ["/papers/roofline.pdf", "--stdout", "--no-reference"],
    env: { GEMINI_API_KEY: "test-secret" },
    io,
    deps: cliDeps(async () => jsonResponse(200, { candidates: [{ content: { parts: [{ text: MODEL_REPLY }] } }] }), writes)
  });

  assert.equal(code, EXIT_OK);
  assert.deepEqual(out, [
    "## Roofline Modeling of RPC Throughput\n\n### Authors\n\n- Ada Lovelace\n\n### Synopsis\n\nWe bound RPC throughput.\n"
  ]);
  assert.deepEqual(err, []);
  assert.deepEqual(writes, []);
});

test("main writes <name>.md beside the input by default", async () => {
  const { io, out } = captureIo();
  const writes: Array<{ path: string; text: string }> = [];

  const code = await main({
    argv: ["/papers/roofline.pdf"],
    env: { GEMINI_API_KEY: "test-secret", PDF_BRIEF_INCLUDE_REFERENCE: "false" },
    io,
    deps: cliDeps(async () => jsonResponse(200, { candidates: [{ content: { parts: [{ text: MODEL_REPLY }] } }] }), writes)
  });

  assert.equal(code, EXIT_OK);
  assert.deepEqual(out, ["/papers/roofline.md\n"]);
  assert.equal(writes.length, 1);
  assert.equal(writes[0].path, "/papers/roofline.md");
});

test("main reports the failed stage and exits 1", async () => {
  const { io, out, err } = captureIo();
  let requested = false;

  const code = await main({
    argv: ["/papers/roofline.pdf"],
    env: {},
    io,
    deps: cliDeps(async () => {
      requested = true;
      return jsonResponse(200, {});
    })
  });

  assert.equal(code, EXIT_FAILURE);
  assert.equal(requested, false);
  assert.deepEqual(out, []);
  assert.deepEqual(err, ["pdf-brief: [authenticate] AuthenticationError (AUTH_MISSING): No API credential configured for gemini\n"]);
});

test("main exits 2 on usage and configuration errors", async () => {
  const fetchFn: FetchFn = async () => jsonResponse(200, {});

  const badProvider = captureIo();
  assert.equal(
    await main({ argv: ["paper.pdf", "--provider", "other"], env: {}, io: badProvider.io, deps: cliDeps(fetchFn) }),
    EXIT_USAGE
  );
  assert.equal(badProvider.err[0], `pdf-brief: provider must be one of gemini, openai, got "other"\n\n${USAGE}`);

  const missingPath = captureIo();
  assert.equal(await main({ argv: [], env: {}, io: missingPath.io, deps: cliDeps(fetchFn) }), EXIT_USAGE);
  assert.equal(missingPath.err[0], `pdf-brief: missing PDF path\n\n${USAGE}`);

  const help = captureIo();
  assert.equal(await main({ argv: ["--help"], env: {}, io: help.io, deps: cliDeps(fetchFn) }), EXIT_OK);
  assert.deepEqual(help.out, [USAGE]);
});

test("main lists the available models", async () => {
  const { io, out } = captureIo();

  const code = await main({
    argv: ["--list-models"],
    env: { GOOGLE_API_KEY: "test-secret" },
    io,
    deps: cliDeps(async () =>
      jsonResponse(200, {
        models: [
          { name: "models/gemini-2.5-flash", displayName: "Gemini 2.5 Flash", supportedGenerationMethods: ["generateContent"] },
          { name: "models/gemini-2.5-pro", supportedGenerationMethods: ["generateContent"] }
        ]
      })
    )
  });

  assert.equal(code, EXIT_OK);
  assert.deepEqual(out, ["gemini-2.5-flash\tGemini 2.5 Flash\n", "gemini-2.5-pro\n"]);
});
