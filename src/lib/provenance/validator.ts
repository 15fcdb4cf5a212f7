/**
 * Provenance Validator
 *
 * Checks every metric's citation against the point-in-time document it
 * names. Violations are collected, never thrown; the Verifier turns them
 * into blocking reasons.
 *
 * Pure function — deterministic, no side effects.
 */

import { PRIMARY_SOURCE_TYPES, VALUATION_SOURCE_TYPES } from "@/lib/dossier/types";
import type { Document, DocumentLookup, Metric, ProvenanceIssue, SourceType } from "@/lib/dossier/types";
import { sha256Hex } from "@/lib/utils/canonicalHash";

export const MAX_QUOTE_WORDS = 30;

export function normalizeForMatch(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/** Case-insensitive, whitespace-normalized substring match. */
export function quoteOccursIn(quote: string, rawText: string): boolean {
  const needle = normalizeForMatch(quote);
  return needle.length > 0 && normalizeForMatch(rawText).includes(needle);
}

export function permittedSourceTypes(metric: Metric): readonly SourceType[] {
  return metric.category === "valuation-input"
    ? [...PRIMARY_SOURCE_TYPES, ...VALUATION_SOURCE_TYPES]
    : PRIMARY_SOURCE_TYPES;
}

export function documentLookup(documents: readonly Document[]): DocumentLookup {
  const byId = new Map(documents.map((d) => [d.id, d]));
  return { get: (id) => byId.get(id) };
}

function checkMetric(metric: Metric, documents: DocumentLookup, textCache: Map<string, string>): string[] {
  const issues: string[] = [];
  const p = metric.provenance;

  const missing = (["documentId", "pageOrSection", "quote", "url"] as const).filter((f) => !p[f] || !p[f].trim());
  if (missing.length > 0) return missing.map((f) => `missing provenance field: ${f}`);

  const words = countWords(p.quote);
  if (words > MAX_QUOTE_WORDS) issues.push(`quote exceeds ${MAX_QUOTE_WORDS} words (${words})`);

  const doc = documents.get(p.documentId);
  if (!doc) {
    issues.push(`unknown document ${p.documentId}`);
    return issues;
  }

  if (sha256Hex(doc.rawText) !== doc.contentHash) {
    issues.push(`document ${doc.id} content hash mismatch`);
  }
  if (!permittedSourceTypes(metric).includes(doc.sourceType)) {
    issues.push(`source type ${doc.sourceType} not permitted`);
  }
  if (p.url !== doc.url) {
    issues.push(`citation url does not match document ${doc.id}`);
  }

  let normalized = textCache.get(doc.id);
  if (normalized === undefined) {
    normalized = normalizeForMatch(doc.rawText);
    textCache.set(doc.id, normalized);
  }
  const needle = normalizeForMatch(p.quote);
  if (needle.length === 0 || !normalized.includes(needle)) {
    issues.push(`quote not found in document ${doc.id}`);
  }
  return issues;
}

export function validateProvenance(metrics: readonly Metric[], documents: DocumentLookup): ProvenanceIssue[] {
  const textCache = new Map<string, string>();
  const issues: ProvenanceIssue[] = [];
  for (const metric of metrics) {
    for (const reason of checkMetric(metric, documents, textCache)) {
      issues.push({ metric: metric.name, reason });
    }
  }
  return issues;
}
