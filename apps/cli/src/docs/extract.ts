import { PDFParse } from "pdf-parse";
import { ExtractionError, type SourceDocument } from "@pdf-brief/shared";

export type ParsedPdf = {
  pageTexts: string[];
};

export type PdfParseFn = (bytes: Uint8Array) => Promise<ParsedPdf>;

const PAGE_SEPARATOR = "\n\n";

function normalizeText(input: string): string {
  const normalizedLineEndings = input.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  const trimmedLineSpaces = normalizedLineEndings
    .split("\n")
    .map((line) => line.replace(/[ \t]+$/g, ""))
    .join("\n");
  const collapsedBlanks = trimmedLineSpaces.replace(/\n{3,}/g, "\n\n");
  return collapsedBlanks.trim();
}

export async function parsePdfPages(bytes: Uint8Array): Promise<ParsedPdf> {
  const parser = new PDFParse({
    data: bytes
  });
  try {
    const result = await parser.getText();
    const pages = Array.isArray(result.pages) ? [...result.pages].sort((left, right) => left.num - right.num) : [];
    return {
      pageTexts: pages.map((page) => page.text ?? "")
    };
  } finally {
    await parser.destroy();
  }
}

/**
 * Converts PDF bytes into plain text. Pages are joined in document order with a blank
 * line between them; paragraph breaks inside a page are kept as extracted.
 */
export async function extractText(input: {
  bytes: Uint8Array;
  filename: string | null;
  parsePdf?: PdfParseFn;
}): Promise<SourceDocument> {
  const parsePdf = input.parsePdf ?? parsePdfPages;

  let parsed: ParsedPdf;
  try {
    parsed = await parsePdf(input.bytes);
  } catch (error) {
    throw new ExtractionError({
      code: "PDF_UNREADABLE",
      message: `Not a readable PDF${input.filename ? `: ${input.filename}` : ""}`,
      cause: error
    });
  }

  if (parsed.pageTexts.length === 0) {
    throw new ExtractionError({ code: "PDF_NO_PAGES", message: "PDF contains no pages" });
  }

  const pages = parsed.pageTexts.map(normalizeText).filter((page) => page.length > 0);
  if (pages.length === 0) {
    throw new ExtractionError({ code: "PDF_NO_TEXT", message: "PDF contains no extractable text" });
  }

  const text = pages.join(PAGE_SEPARATOR);
  return {
    filename: input.filename,
    text,
    pageCount: parsed.pageTexts.length,
    charCount: text.length
  };
}
