import {
  MalformedResponseError,
  type GenerationResponse,
  type ParseOutcome,
  type SummaryResult
} from "@pdf-brief/shared";

type SectionLabel = "title" | "authors" | "synopsis" | "reference";
type Bucket = "preamble" | "title" | "authors" | "synopsis" | "body" | "reference";

const HEADING_PATTERN = /^ {0,3}#{1,6}[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_TITLE_UNDERLINE_PATTERN = /^ {0,3}=+[ \t]*$/;
const SETEXT_WEAK_UNDERLINE_PATTERN = /^ {0,3}-{3,}[ \t]*$/;
const LABEL_LINE_PATTERN = /^(?:\*\*|__)?([A-Za-z][A-Za-z ()]{0,30}?)(?:\*\*|__)?[ \t]*:[ \t]*(?:\*\*|__)?[ \t]*(.*)$/;
const BULLET_PATTERN = /^(?:[-*+•]|\d+[.)])[ \t]+(.*)$/;
const AUTHOR_SEPARATOR_PATTERN = /\s*(?:;|,|&|\band\b)\s*/;
const AUTHOR_PLACEHOLDER_PATTERN = /^(?:unknown|n\/a|none|not (?:specified|available|listed|provided))$/i;

const WRAPPERS: Array<[string, string]> = [
  ["**", "**"],
  ["__", "__"],
  ["*", "*"],
  ["_", "_"],
  ["`", "`"],
  ['"', '"'],
  ["“", "”"]
];

function cleanInline(text: string): string {
  let out = text.trim();
  let changed = true;
  while (changed) {
    changed = false;
    for (const [open, close] of WRAPPERS) {
      if (out.length > open.length + close.length && out.startsWith(open) && out.endsWith(close)) {
        out = out.slice(open.length, out.length - close.length).trim();
        changed = true;
      }
    }
  }
  return out.replace(/\s+/g, " ");
}

function classifyLabel(text: string): SectionLabel | null {
  const label = cleanInline(text).toLowerCase().replace(/[:.]+$/, "").trim();
  if (/^(?:paper |document )?title$/.test(label)) {
    return "title";
  }
  if (/^authors?(?:\(s\))?$/.test(label)) {
    return "authors";
  }
  if (/^(?:synopsis|summary|overview|abstract)$/.test(label)) {
    return "synopsis";
  }
  if (/^(?:references?|citation|bibliography)$/.test(label)) {
    return "reference";
  }
  return null;
}

function splitLabelLine(text: string): { label: SectionLabel; value: string } | null {
  const match = text.trim().match(LABEL_LINE_PATTERN);
  if (!match) {
    return null;
  }
  const label = classifyLabel(match[1]);
  return label ? { label, value: match[2].trim() } : null;
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[\w-]*[ \t]*\n([\s\S]*?)\n?```$/);
  return match ? match[1] : trimmed;
}

function joinBlock(lines: string[]): string {
  return lines
    .map((line) => line.replace(/[ \t]+$/, ""))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function parseAuthors(lines: string[]): string[] {
  const names: string[] = [];
  for (const raw of lines) {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      continue;
    }
    const bullet = trimmed.match(BULLET_PATTERN);
    const candidates = bullet ? [bullet[1]] : trimmed.split(AUTHOR_SEPARATOR_PATTERN);
    for (const candidate of candidates) {
      const name = cleanInline(candidate).replace(/[.;,]+$/, "").trim();
      if (name.length > 0 && !AUTHOR_PLACEHOLDER_PATTERN.test(name) && !names.includes(name)) {
        names.push(name);
      }
    }
  }
  return names;
}

class SectionCollector {
  title: string | undefined;
  // A "---" line may be a horizontal rule after chatty text, so it only names the
  // title when no heading or label does.
  setextCandidate: string | undefined;
  readonly authorLines: string[] = [];
  readonly synopsisLines: string[] = [];
  readonly bodyLines: string[] = [];
  private current: Bucket = "preamble";
  private previousText: string | undefined;

  consume(line: string): void {
    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      this.consumeHeading(line, heading[1]);
      return;
    }

    if (this.title === undefined && this.previousText !== undefined && this.current === "preamble") {
      if (SETEXT_TITLE_UNDERLINE_PATTERN.test(line)) {
        this.setTitle(this.previousText);
        return;
      }
      if (SETEXT_WEAK_UNDERLINE_PATTERN.test(line)) {
        this.setextCandidate = this.previousText;
        this.current = "body";
        return;
      }
    }

    const labelled = splitLabelLine(line);
    if (labelled && this.enterSection(labelled.label, labelled.value)) {
      return;
    }

    switch (this.current) {
      case "preamble":
        if (line.trim().length > 0) {
          this.previousText = line.trim();
        }
        break;
      case "title":
        if (line.trim().length > 0) {
          this.setTitle(line);
        }
        break;
      case "authors":
        this.authorLines.push(line);
        break;
      case "synopsis":
        this.synopsisLines.push(line);
        break;
      case "body":
        this.bodyLines.push(line);
        break;
      case "reference":
        break;
    }
  }

  private consumeHeading(line: string, text: string): void {
    const labelled = splitLabelLine(text);
    if (this.title === undefined && labelled?.label === "synopsis" && labelled.value.length > 0) {
      this.setTitle(labelled.value);
      return;
    }
    const label = labelled?.label ?? classifyLabel(text);
    const switchesSection = label !== null && !(this.current === "synopsis" && label === "synopsis");
    if (label && switchesSection && this.enterSection(label, labelled?.value ?? "")) {
      return;
    }
    if (this.title === undefined) {
      if (cleanInline(text).length > 0) {
        this.setTitle(text);
      }
      return;
    }
    if (this.current === "synopsis") {
      this.synopsisLines.push(line);
      return;
    }
    this.current = "body";
    this.bodyLines.push(line);
  }

  finish(): string | undefined {
    return this.title ?? (this.setextCandidate === undefined ? undefined : cleanInline(this.setextCandidate));
  }

  private setTitle(value: string): void {
    this.title = cleanInline(value);
    this.current = "body";
    // Anything gathered before the title is preamble.
    this.bodyLines.length = 0;
  }

  // Returns false when the label should be read as ordinary text instead.
  private enterSection(label: SectionLabel, value: string): boolean {
    if (label === "title") {
      if (this.title !== undefined) {
        return false;
      }
      if (value.length > 0) {
        this.setTitle(value);
      } else {
        this.current = "title";
      }
      return true;
    }
    this.current = label;
    if (value.length > 0 && label === "authors") {
      this.authorLines.push(value);
    } else if (value.length > 0 && label === "synopsis") {
      this.synopsisLines.push(value);
    }
    return true;
  }
}

/**
 * Classifies free-form model output. The expected shape is a title heading followed by
 * Authors and Synopsis sections, but heading levels, label lines ("Title: ..."), code
 * fences and blank-line noise are accepted. Only a missing title is malformed.
 */
export function classifyResponse(raw: string): ParseOutcome {
  const lines = stripCodeFence(raw.replace(/\r\n?/g, "\n")).split("\n");
  if (lines.every((line) => line.trim().length === 0)) {
    return { status: "malformed", reason: "empty response" };
  }

  const collector = new SectionCollector();
  for (const line of lines) {
    collector.consume(line);
  }

  const title = collector.finish();
  if (title === undefined || title.length === 0) {
    return { status: "malformed", reason: "no title heading found" };
  }

  const synopsis = collector.synopsisLines.some((line) => line.trim().length > 0)
    ? joinBlock(collector.synopsisLines)
    : joinBlock(collector.bodyLines);

  return {
    status: "parsed",
    summary: {
      title,
      authors: parseAuthors(collector.authorLines),
      synopsis
    }
  };
}

export function parseSummary(response: Pick<GenerationResponse, "text">): SummaryResult {
  const outcome = classifyResponse(response.text);
  if (outcome.status === "malformed") {
    throw new MalformedResponseError({ reason: outcome.reason });
  }
  return outcome.summary;
}
