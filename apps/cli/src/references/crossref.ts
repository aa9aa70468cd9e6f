import type { Reference } from "@pdf-brief/shared";
import { defaultFetch, sendRequest, type FetchFn } from "../http.js";
import { silentLogger, toLogError, type Logger, type StructuredLogContext } from "../logging.js";
import { titleSimilarity } from "./similarity.js";

export type CrossrefWork = {
  DOI?: string;
  title?: string[];
  author?: Array<{ given?: string; family?: string; name?: string }>;
  issued?: { "date-parts"?: Array<Array<number | null>> };
  "container-title"?: string[];
};

type CrossrefWorksResponse = {
  status?: string;
  message?: {
    items?: CrossrefWork[];
  };
};

export type ScoredCandidate = {
  work: CrossrefWork;
  title: string;
  doi: string;
  score: number;
};

export interface ReferenceResolver {
  resolve(title: string, authors: string[], options?: { signal?: AbortSignal }): Promise<Reference>;
}

export type CrossrefResolverOptions = {
  baseUrl: string;
  citationBaseUrl: string;
  citationStyle: string;
  similarityThreshold: number;
  rows: number;
  timeoutMs: number;
  mailto?: string;
  fetchFn?: FetchFn;
  logger?: Logger;
  logContext?: StructuredLogContext;
};

const SELECT_FIELDS = "DOI,title,author,issued,container-title";
// Anything else (a DOI landing page, say) falls back to formatCitation.
const CITATION_CONTENT_TYPES = ["text/x-bibliography", "text/plain"];

function authorName(author: { given?: string; family?: string; name?: string }): string {
  const parts = [author.given, author.family].filter((part): part is string => Boolean(part?.trim()));
  return parts.length > 0 ? parts.join(" ") : author.name?.trim() ?? "";
}

function issuedYear(work: CrossrefWork): number | undefined {
  const year = work.issued?.["date-parts"]?.[0]?.[0];
  return typeof year === "number" ? year : undefined;
}

/**
 * Plain citation assembled from the Crossref record, used when DOI content
 * negotiation does not return a formatted one.
 */
export function formatCitation(work: CrossrefWork): string {
  const authors = (work.author ?? []).map(authorName).filter((name) => name.length > 0);
  const year = issuedYear(work);
  const title = work.title?.[0]?.trim();
  const container = work["container-title"]?.[0]?.trim();
  const parts = [
    authors.length > 0 ? authors.join(", ") : undefined,
    year !== undefined ? `(${year})` : undefined
  ]
    .filter((part): part is string => part !== undefined)
    .join(" ");

  const segments = [parts, title, container]
    .filter((segment): segment is string => Boolean(segment))
    .map((segment) => (segment.endsWith(".") ? segment : `${segment}.`));
  if (work.DOI) {
    segments.push(`https://doi.org/${work.DOI}`);
  }
  return segments.join(" ");
}

export function pickBestCandidate(queryTitle: string, works: CrossrefWork[]): ScoredCandidate | undefined {
  let best: ScoredCandidate | undefined;
  for (const work of works) {
    const title = work.title?.[0];
    if (!title || !work.DOI) {
      continue;
    }
    const score = titleSimilarity(queryTitle, title);
    if (!best || score > best.score) {
      best = { work, title, doi: work.DOI, score };
    }
  }
  return best;
}

/**
 * Best-effort lookup of one citation on Crossref. `resolve` never rejects: lookup
 * failures and weak matches both come back as `unresolved`.
 */
export class CrossrefReferenceResolver implements ReferenceResolver {
  private readonly options: CrossrefResolverOptions;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: CrossrefResolverOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(title: string, authors: string[], options: { signal?: AbortSignal } = {}): Promise<Reference> {
    if (title.trim().length === 0) {
      return { status: "unresolved", reason: "empty title" };
    }

    try {
      const works = await this.search(title, authors, options.signal);
      const best = pickBestCandidate(title, works);
      if (!best) {
        return { status: "unresolved", reason: "no candidates" };
      }
      if (best.score < this.options.similarityThreshold) {
        this.logger.info(this.logContext(), "reference.below_threshold", {
          detail: { candidateDoi: best.doi, score: Number(best.score.toFixed(3)) }
        });
        return { status: "unresolved", reason: "no candidate above similarity threshold" };
      }

      const citation = (await this.fetchFormattedCitation(best.doi, options.signal)) ?? formatCitation(best.work);
      return {
        status: "resolved",
        citation,
        title: best.title,
        doi: best.doi,
        score: best.score
      };
    } catch (error) {
      const logError = toLogError(error);
      this.logger.warn(this.logContext(), "reference.lookup_failed", {
        errorCode: logError.code,
        errorMessage: logError.message
      });
      return { status: "unresolved", reason: `lookup failed: ${logError.message}` };
    }
  }

  private logContext(): StructuredLogContext {
    return { ...this.options.logContext, stage: "reference" };
  }

  private async search(title: string, authors: string[], signal?: AbortSignal): Promise<CrossrefWork[]> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, "")}/works`);
    url.searchParams.set("query.bibliographic", title);
    if (authors.length > 0) {
      url.searchParams.set("query.author", authors.join(" "));
    }
    url.searchParams.set("rows", String(this.options.rows));
    url.searchParams.set("select", SELECT_FIELDS);
    if (this.options.mailto) {
      url.searchParams.set("mailto", this.options.mailto);
    }

    const result = await sendRequest({
      fetchFn: this.fetchFn,
      url: url.toString(),
      method: "GET",
      headers: { Accept: "application/json" },
      timeoutMs: this.options.timeoutMs,
      signal
    });
    if (!result.ok) {
      throw new Error(`CROSSREF_SEARCH_FAILED: status=${result.status}`);
    }

    const payload = (result.payload ?? {}) as CrossrefWorksResponse;
    const items = payload.message?.items;
    return Array.isArray(items) ? items : [];
  }

  private async fetchFormattedCitation(doi: string, signal?: AbortSignal): Promise<string | undefined> {
    const encodedDoi = doi.split("/").map(encodeURIComponent).join("/");
    try {
      const result = await sendRequest({
        fetchFn: this.fetchFn,
        url: `${this.options.citationBaseUrl.replace(/\/+$/, "")}/${encodedDoi}`,
        method: "GET",
        headers: { Accept: `text/x-bibliography; style=${this.options.citationStyle}` },
        timeoutMs: this.options.timeoutMs,
        signal
      });
      const contentType = (result.headers.get("content-type") ?? "").toLowerCase();
      if (!result.ok || !CITATION_CONTENT_TYPES.some((type) => contentType.startsWith(type))) {
        return undefined;
      }
      const text = result.bodyText.replace(/\s+/g, " ").trim();
      return text.length > 0 ? text : undefined;
    } catch (error) {
      this.logger.warn(this.logContext(), "reference.citation_format_failed", {
        errorMessage: toLogError(error).message
      });
      return undefined;
    }
  }
}
