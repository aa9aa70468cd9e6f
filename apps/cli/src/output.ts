import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { OutputWriteError } from "@pdf-brief/shared";

export type WriteOutputFn = (outputPath: string, text: string) => Promise<void>;

export function outputPathFor(inputPath: string, outDir?: string): string {
  const name = basename(inputPath, extname(inputPath)) || "summary";
  return join(outDir ?? dirname(inputPath), `${name}.md`);
}

/**
 * Writes `text` to a temp sibling of `outputPath` and renames it into place, so the
 * destination either keeps its previous content or holds the complete summary.
 */
export const writeOutputOnce: WriteOutputFn = async (outputPath, text) => {
  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${randomBytes(6).toString("hex")}.tmp`);
  try {
    await writeFile(tempPath, text, { encoding: "utf8", flag: "wx" });
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new OutputWriteError({ outputPath, cause: error });
  }
};
