import type { OutputDocument, Reference, SummaryResult } from "@pdf-brief/shared";

function singleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function renderAuthors(authors: string[]): string {
  const names = authors.map(singleLine).filter((name) => name.length > 0);
  if (names.length === 0) {
    return "_Unknown_";
  }
  return names.map((name) => `- ${name}`).join("\n");
}

// Pure: equal inputs give byte-identical markdown.
export function renderSummary(summary: SummaryResult, reference: Reference): OutputDocument {
  const synopsis = summary.synopsis.trim();
  const sections = [
    `## ${singleLine(summary.title)}`,
    "### Authors",
    renderAuthors(summary.authors),
    "### Synopsis",
    synopsis.length > 0 ? synopsis : "_No synopsis provided._"
  ];

  if (reference.status === "resolved") {
    sections.push("### Reference", singleLine(reference.citation));
  }

  return { markdown: `${sections.join("\n\n")}\n` };
}
