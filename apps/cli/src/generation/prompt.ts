import type { GenerationConfig, GenerationRequest, SummaryStyle } from "@pdf-brief/shared";

export function truncationMarker(omittedChars: number): string {
  return `[... truncated ${omittedChars} characters ...]`;
}

const RESPONSE_SHAPE = [
  "## <paper title>",
  "### Authors",
  "- <author name>",
  "### Synopsis",
  "<synopsis in markdown>"
].join("\n");

const STYLE_INSTRUCTIONS: Record<SummaryStyle, string> = {
  concise: "Write the synopsis as at most three short paragraphs covering the problem, the approach and the main results.",
  detailed:
    "Write the synopsis section by section: motivation, method, experiments, results and limitations, using '####' sub-headings and bullet points where useful."
};

function buildSystemInstruction(config: GenerationConfig): string {
  return [
    "You summarize academic and technical documents extracted from PDF files.",
    "Respond in markdown with exactly this structure and nothing before it:",
    RESPONSE_SHAPE,
    "Use the document's own title verbatim on the first line.",
    "List every author on its own bullet line. If no authors can be identified, write '- Unknown'.",
    STYLE_INSTRUCTIONS[config.style],
    "Do not add a references section and do not invent facts that are not in the document."
  ].join("\n");
}

function clampInput(text: string, maxInputChars: number): { body: string; truncated: boolean } {
  if (text.length <= maxInputChars) {
    return { body: text, truncated: false };
  }
  // The title and abstract live at the start of a paper, so the tail is cut.
  const omitted = text.length - maxInputChars;
  return {
    body: `${text.slice(0, maxInputChars)}\n\n${truncationMarker(omitted)}`,
    truncated: true
  };
}

/**
 * Pure: the same text and config always produce an equal request.
 */
export function buildGenerationRequest(text: string, config: GenerationConfig): GenerationRequest {
  const { body, truncated } = clampInput(text, config.maxInputChars);
  const prompt = [
    "Summarize the following document.",
    "",
    "<document>",
    body,
    "</document>"
  ].join("\n");

  return Object.freeze({
    systemInstruction: buildSystemInstruction(config),
    prompt,
    config,
    inputChars: text.length,
    truncated
  });
}
