import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { GenerationProvider } from "@pdf-brief/shared";

const ENV_KEYS: Record<GenerationProvider, string[]> = {
  gemini: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
  openai: ["OPENAI_API_KEY"]
};

const TOKEN_FILES: Record<GenerationProvider, string> = {
  gemini: "gemini.token",
  openai: "openai.token"
};

export type CredentialSource = "env" | "token_file";

export type ResolvedCredential = {
  value: string;
  source: CredentialSource;
  sourceName: string;
};

export function tokenFilePath(provider: GenerationProvider, home: string = homedir()): string {
  return join(home, ".config", TOKEN_FILES[provider]);
}

function isMissingFile(error: unknown): boolean {
  const code = (error as { code?: unknown } | null)?.code;
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Environment variables win over the token file. Returns null when neither yields a
 * non-empty value; validating the value is left to the generation client.
 */
export async function resolveCredential(input: {
  provider: GenerationProvider;
  env?: Record<string, string | undefined>;
  home?: string;
  readTextFile?: (path: string) => Promise<string>;
}): Promise<ResolvedCredential | null> {
  const env = input.env ?? process.env;
  for (const key of ENV_KEYS[input.provider]) {
    const value = env[key]?.trim();
    if (value) {
      return { value, source: "env", sourceName: key };
    }
  }

  const path = tokenFilePath(input.provider, input.home);
  const readTextFile = input.readTextFile ?? ((filePath: string) => readFile(filePath, "utf8"));
  let content: string;
  try {
    content = await readTextFile(path);
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  const value = content.trim();
  return value ? { value, source: "token_file", sourceName: path } : null;
}
