import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Document, Metric, SourceType } from "@/lib/dossier/types";
import { sha256Hex } from "@/lib/utils/canonicalHash";
import { countWords, documentLookup, quoteOccursIn, validateProvenance } from "../validator";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const TEN_K_TEXT = `ITEM 7. MANAGEMENT'S DISCUSSION
Revenue   grew 12%
year over year, driven by subscription renewals.`;

function doc(id: string, sourceType: SourceType, rawText: string, url = `https://www.sec.gov/${id}.htm`): Document {
  return Object.freeze({
    id,
    ticker: "ACME",
    sourceType,
    retrievedAt: "2025-02-01T00:00:00Z",
    contentHash: sha256Hex(rawText),
    rawText,
    url,
  });
}

const TEN_K = doc("doc-10k", "10-K", TEN_K_TEXT);
const MACRO = doc("doc-macro", "Macro", "10-Year Treasury yield 4.00 percent", "https://fred.stlouisfed.org/series/DGS10");
const DOCS = documentLookup([TEN_K, MACRO]);

function metric(overrides: Partial<Metric> = {}): Metric {
  return {
    name: "Revenue",
    value: 1_000,
    unit: "USD",
    period: "2024-Q4",
    category: "reported",
    provenance: {
      documentId: "doc-10k",
      pageOrSection: "Item 7",
      quote: "Revenue grew 12% year over year",
      url: TEN_K.url,
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Quote matching
// ---------------------------------------------------------------------------

describe("quote matching", () => {
  it("matches case-insensitively across collapsed whitespace", () => {
    assert.equal(quoteOccursIn("revenue GREW 12% Year over year", TEN_K_TEXT), true);
    assert.equal(quoteOccursIn("Revenue grew 13% year over year", TEN_K_TEXT), false);
  });

  it("counts words on whitespace", () => {
    assert.equal(countWords("  Revenue grew\n12%  "), 3);
    assert.equal(countWords(""), 0);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("validateProvenance", () => {
  it("accepts a 10-K quote that occurs in the document", () => {
    assert.deepEqual(validateProvenance([metric()], DOCS), []);
  });

  it("flags a quote that does not occur in the document", () => {
    const m = metric({ provenance: { ...metric().provenance, quote: "Revenue grew 15% year over year" } });
    assert.deepEqual(validateProvenance([m], DOCS), [{ metric: "Revenue", reason: "quote not found in document doc-10k" }]);
  });

  it("flags quotes over 30 words", () => {
    const long = Array.from({ length: 31 }, (_, i) => `w${i}`).join(" ");
    const issues = validateProvenance([metric({ provenance: { ...metric().provenance, quote: long } })], DOCS);
    assert.deepEqual(
      issues.map((i) => i.reason),
      ["quote exceeds 30 words (31)", "quote not found in document doc-10k"],
    );
  });

  it("permits Macro sources only for valuation-input metrics", () => {
    const provenance = {
      documentId: "doc-macro",
      pageOrSection: "DGS10",
      quote: "10-Year Treasury yield 4.00 percent",
      url: MACRO.url,
    };
    assert.deepEqual(validateProvenance([metric({ name: "WACC", category: "valuation-input", provenance })], DOCS), []);
    assert.deepEqual(validateProvenance([metric({ provenance })], DOCS), [
      { metric: "Revenue", reason: "source type Macro not permitted" },
    ]);
  });

  it("flags unknown documents and empty fields", () => {
    const unknown = metric({ provenance: { ...metric().provenance, documentId: "doc-missing" } });
    const empty = metric({ name: "EBIT", provenance: { ...metric().provenance, pageOrSection: " " } });
    assert.deepEqual(validateProvenance([unknown, empty], DOCS), [
      { metric: "Revenue", reason: "unknown document doc-missing" },
      { metric: "EBIT", reason: "missing provenance field: pageOrSection" },
    ]);
  });

  it("detects a document whose text no longer matches its point-in-time hash", () => {
    const tampered: Document = { ...TEN_K, rawText: `${TEN_K_TEXT} (restated)` };
    const issues = validateProvenance([metric()], documentLookup([tampered]));
    assert.deepEqual(issues, [{ metric: "Revenue", reason: "document doc-10k content hash mismatch" }]);
  });

  it("flags a citation URL that differs from the document's", () => {
    const m = metric({ provenance: { ...metric().provenance, url: "https://example.com/copy" } });
    assert.deepEqual(validateProvenance([m], DOCS), [
      { metric: "Revenue", reason: "citation url does not match document doc-10k" },
    ]);
  });
});
