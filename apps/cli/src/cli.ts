import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { ConfigError } from "@pdf-brief/shared";
import { loadConfig, type AppConfig, type ConfigOverrides } from "./config.js";
import { resolveCredential } from "./credentials.js";
import type { PdfParseFn } from "./docs/extract.js";
import { createGenerationClient } from "./generation/create-client.js";
import type { FetchFn } from "./http.js";
import { createJsonLogger, type Logger } from "./logging.js";
import { outputPathFor, writeOutputOnce, type WriteOutputFn } from "./output.js";
import { describeFailure, rootCause } from "./pipeline/errors.js";
import type { SleepFn } from "./pipeline/execution.js";
import { summarizePdf } from "./pipeline/summarize.js";
import type { ReferenceResolver } from "./references/crossref.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: pdf-brief <file.pdf> [options]

Summarize a PDF into markdown (title, authors, synopsis and an optional reference).

Options:
  --provider <gemini|openai>   Generation API (default: gemini)
  --model <name>               Model name (default depends on provider)
  --style <concise|detailed>   Synopsis style (default: concise)
  --max-output-tokens <n>      Output token limit (default: 2048)
  --reference                  Look up a citation on Crossref (default)
  --no-reference               Skip the citation lookup
  --out-dir <dir>              Directory for <name>.md (default: beside the PDF)
  --stdout                     Print the summary instead of writing a file
  --quiet                      Only log warnings and errors
  --list-models                List models available to the configured credential
  -h, --help                   Show this help
`;

export type CliOptions = {
  inputPath?: string;
  overrides: ConfigOverrides;
  outDir?: string;
  stdout: boolean;
  quiet: boolean;
  listModels: boolean;
  help: boolean;
};

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type CliDeps = {
  readFile?: (path: string) => Promise<Uint8Array>;
  writeOutput?: WriteOutputFn;
  readTextFile?: (path: string) => Promise<string>;
  home?: string;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  parsePdf?: PdfParseFn;
  resolver?: ReferenceResolver;
  logger?: Logger;
};

function usageError(message: string): ConfigError {
  return new ConfigError({ field: "arguments", message });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (error) {
    throw usageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (positionals.length > 1) {
    throw usageError(`Expected one PDF path, got ${positionals.length}`);
  }
  if (values.reference && values["no-reference"]) {
    throw usageError("--reference and --no-reference cannot be combined");
  }

  const includeReference = values["no-reference"] ? false : values.reference ? true : undefined;
  return {
    inputPath: positionals[0],
    overrides: {
      provider: values.provider,
      model: values.model,
      style: values.style,
      maxOutputTokens: values["max-output-tokens"],
      includeReference
    },
    outDir: values["out-dir"],
    stdout: values.stdout ?? false,
    quiet: values.quiet ?? false,
    listModels: values["list-models"] ?? false,
    help: values.help ?? false
  };
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      provider: { type: "string" },
      model: { type: "string" },
      style: { type: "string" },
      "max-output-tokens": { type: "string" },
      reference: { type: "boolean" },
      "no-reference": { type: "boolean" },
      "out-dir": { type: "string" },
      stdout: { type: "boolean" },
      quiet: { type: "boolean" },
      "list-models": { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });
}

async function reportFailures(io: CliIo, run: () => Promise<number>): Promise<number> {
  try {
    return await run();
  } catch (error) {
    io.stderr(`pdf-brief: ${describeFailure(error)}\n`);
    return rootCause(error) instanceof ConfigError ? EXIT_USAGE : EXIT_FAILURE;
  }
}

async function listModels(input: {
  config: AppConfig;
  credential: string | null;
  io: CliIo;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}): Promise<number> {
  const client = createGenerationClient({
    provider: input.config.generation.provider,
    credential: input.credential,
    baseUrls: input.config.apiBaseUrls,
    timeoutMs: input.config.generation.requestTimeoutMs,
    fetchFn: input.fetchFn
  });
  const models = await client.listModels({ signal: input.signal });
  for (const model of models) {
    input.io.stdout(model.displayName ? `${model.id}\t${model.displayName}\n` : `${model.id}\n`);
  }
  return EXIT_OK;
}

/**
 * CLI entry point. Returns the process exit code: 0 on success, 1 when the run
 * fails, 2 for bad arguments or configuration.
 */
export async function main(input: {
  argv: string[];
  env: Record<string, string | undefined>;
  io: CliIo;
  signal?: AbortSignal;
  deps?: CliDeps;
}): Promise<number> {
  const deps = input.deps ?? {};
  const { io } = input;

  let options: CliOptions;
  let config: AppConfig;
  try {
    options = parseCliArgs(input.argv);
    if (options.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    config = loadConfig({ env: input.env, overrides: options.overrides });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`pdf-brief: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const provider = config.generation.provider;
  const resolveRunCredential = () =>
    resolveCredential({ provider, env: input.env, home: deps.home, readTextFile: deps.readTextFile });

  if (options.listModels) {
    return reportFailures(io, async () => {
      const credential = await resolveRunCredential();
      return listModels({
        config,
        credential: credential?.value ?? null,
        io,
        fetchFn: deps.fetchFn,
        signal: input.signal
      });
    });
  }

  const inputPath = options.inputPath;
  if (!inputPath) {
    io.stderr(`pdf-brief: missing PDF path\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const logger = deps.logger ?? createJsonLogger({ quiet: options.quiet, write: (line) => io.stderr(`${line}\n`) });
  return reportFailures(io, async () => {
    const credential = await resolveRunCredential();
    if (credential) {
      logger.info({ provider }, "credential.resolved", {
        detail: { source: credential.source, sourceName: credential.sourceName }
      });
    }

    const result = await summarizePdf(
      {
        inputPath,
        outputPath: options.stdout ? null : outputPathFor(inputPath, options.outDir),
        config,
        credential: credential?.value ?? null,
        signal: input.signal
      },
      {
        readFile: deps.readFile ?? ((path) => readFile(path)),
        writeOutput: deps.writeOutput ?? writeOutputOnce,
        logger,
        fetchFn: deps.fetchFn,
        sleep: deps.sleep,
        parsePdf: deps.parsePdf,
        resolver: deps.resolver
      }
    );

    io.stdout(result.outputPath === null ? result.document.markdown : `${result.outputPath}\n`);
    return EXIT_OK;
  });
}
