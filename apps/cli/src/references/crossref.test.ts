import assert from "node:assert/strict";
import test from "node:test";
import type { FetchFn } from "../http.js";
import type { Logger } from "../logging.js";
import { CrossrefReferenceResolver, formatCitation, pickBestCandidate, type CrossrefWork } from "./crossref.js";

const matchingWork: CrossrefWork = {
  DOI: "10.1234/rpc.2024.1",
  title: ["Roofline Modeling of RPC Throughput"],
  author: [{ given: "Ada", family: "Lovelace" }, { name: "Systems Group" }],
  issued: { "date-parts": [[2024, 3]] },
  "container-title": ["Journal of Systems"]
};

const unrelatedWork: CrossrefWork = {
  DOI: "10.1234/other",
  title: ["Deep Residual Learning for Image Recognition"]
};

type Call = { url: URL; accept: string | null };

function scriptedFetch(responses: Array<Response | Error>, calls: Call[]): FetchFn {
  return async (input, init) => {
    calls.push({ url: new URL(String(input)), accept: new Headers(init?.headers).get("accept") });
    const next = responses.shift();
    if (!next) {
      throw new Error("unexpected request");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
}

function worksResponse(items: CrossrefWork[]): Response {
  return new Response(JSON.stringify({ status: "ok", message: { items } }), {
    status: 200,
    headers: { "content-type": "application/json" }
  });
}

function recordingLogger(events: string[]): Logger {
  return {
    info: (_context, event) => events.push(event),
    warn: (_context, event) => events.push(event),
    error: (_context, event) => events.push(event)
  };
}

function createResolver(fetchFn: FetchFn, logger?: Logger): CrossrefReferenceResolver {
  return new CrossrefReferenceResolver({
    baseUrl: "https://crossref.test",
    citationBaseUrl: "https://doi.test/",
    citationStyle: "apa",
    similarityThreshold: 0.85,
    rows: 5,
    timeoutMs: 1_000,
    mailto: "maintainer@example.com",
    fetchFn,
    logger
  });
}

test("resolve returns the formatted citation for a close title match", async () => {
  const calls: Call[] = [];
  const resolver = createResolver(
    scriptedFetch(
      [
        worksResponse([unrelatedWork, matchingWork]),
        new Response("Lovelace, A. (2024). Roofline Modeling of RPC Throughput.\n  Journal of Systems.\n", {
          status: 200,
          headers: { "content-type": "text/x-bibliography; charset=utf-8" }
        })
      ],
      calls
    )
  );

  const reference = await resolver.resolve("Roofline modeling of RPC throughput", ["Ada Lovelace", "Alan Turing"]);

  assert.deepEqual(reference, {
    status: "resolved",
    citation: "Lovelace, A. (2024). Roofline Modeling of RPC Throughput. Journal of Systems.",
    title: "Roofline Modeling of RPC Throughput",
    doi: "10.1234/rpc.2024.1",
    score: 1
  });

  assert.equal(calls.length, 2);
  const search = calls[0].url;
  assert.equal(search.origin + search.pathname, "https://crossref.test/works");
  assert.equal(search.searchParams.get("query.bibliographic"), "Roofline modeling of RPC throughput");
  assert.equal(search.searchParams.get("query.author"), "Ada Lovelace Alan Turing");
  assert.equal(search.searchParams.get("rows"), "5");
  assert.equal(search.searchParams.get("mailto"), "maintainer@example.com");
  assert.equal(calls[1].url.toString(), "https://doi.test/10.1234/rpc.2024.1");
  assert.equal(calls[1].accept, "text/x-bibliography; style=apa");
});

test("resolve leaves the reference unresolved below the similarity threshold", async () => {
  const calls: Call[] = [];
  const events: string[] = [];
  const resolver = createResolver(scriptedFetch([worksResponse([unrelatedWork])], calls), recordingLogger(events));

  const reference = await resolver.resolve("Roofline Modeling of RPC Throughput", []);

  assert.deepEqual(reference, { status: "unresolved", reason: "no candidate above similarity threshold" });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url.searchParams.has("query.author"), false);
  assert.deepEqual(events, ["reference.below_threshold"]);
});

test("resolve absorbs lookup failures", async () => {
  const events: string[] = [];
  const offline = createResolver(scriptedFetch([new TypeError("fetch failed")], []), recordingLogger(events));
  const unavailable = createResolver(scriptedFetch([new Response("busy", { status: 503 })], []));

  assert.deepEqual(await offline.resolve("Roofline Modeling of RPC Throughput", []), {
    status: "unresolved",
    reason: "lookup failed: Request to crossref.test failed: fetch failed"
  });
  assert.deepEqual(events, ["reference.lookup_failed"]);
  assert.deepEqual(await unavailable.resolve("Roofline Modeling of RPC Throughput", []), {
    status: "unresolved",
    reason: "lookup failed: CROSSREF_SEARCH_FAILED: status=503"
  });
  assert.deepEqual(await unavailable.resolve("   ", []), { status: "unresolved", reason: "empty title" });
});

test("resolve falls back to a local citation when content negotiation fails", async () => {
  const resolver = createResolver(
    scriptedFetch([worksResponse([matchingWork]), new Response("not found", { status: 404 })], [])
  );

  const reference = await resolver.resolve("Roofline Modeling of RPC Throughput", ["Ada Lovelace"]);

  assert.equal(reference.status, "resolved");
  if (reference.status === "resolved") {
    assert.equal(
      reference.citation,
      "Ada Lovelace, Systems Group (2024). Roofline Modeling of RPC Throughput. Journal of Systems. https://doi.org/10.1234/rpc.2024.1"
    );
  }
});

test("resolve ignores a citation body that is not bibliography text", async () => {
  const resolver = createResolver(
    scriptedFetch(
      [
        worksResponse([matchingWork]),
        new Response("<html>\n<body>Roofline Modeling of RPC Throughput</body>\n</html>", {
          status: 200,
          headers: { "content-type": "text/html; charset=utf-8" }
        })
      ],
      []
    )
  );

  const reference = await resolver.resolve("Roofline Modeling of RPC Throughput", ["Ada Lovelace"]);

  assert.equal(reference.status, "resolved");
  if (reference.status === "resolved") {
    assert.equal(
      reference.citation,
      "Ada Lovelace, Systems Group (2024). Roofline Modeling of RPC Throughput. Journal of Systems. https://doi.org/10.1234/rpc.2024.1"
    );
  }
});

test("pickBestCandidate skips records without a title or DOI", () => {
  const best = pickBestCandidate("Roofline Modeling of RPC Throughput", [
    { title: ["Roofline Modeling of RPC Throughput"] },
    { DOI: "10.1234/untitled" },
    unrelatedWork
  ]);

  assert.equal(best?.doi, "10.1234/other");
  assert.equal(pickBestCandidate("anything", []), undefined);
});

test("formatCitation works with sparse records", () => {
  assert.equal(formatCitation({ title: ["Untitled Report."] }), "Untitled Report.");
  assert.equal(formatCitation({ DOI: "10.1234/x" }), "https://doi.org/10.1234/x");
});
