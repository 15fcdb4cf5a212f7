import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import { emitDossierEvent, emitErrorEvent, setEventSink } from "../emitEvent";
import type { EventRow } from "../emitEvent";

let restore: () => void = () => undefined;

afterEach(() => {
  restore();
});

function capture(): EventRow[] {
  const rows: EventRow[] = [];
  restore = setEventSink((row) => rows.push(row));
  return rows;
}

describe("emitDossierEvent", () => {
  it("redacts credential keys and leaves filing fields alone", () => {
    const rows = capture();
    emitDossierEvent({
      event_type: "store.committed",
      ticker: "ACME",
      payload: { token: "test-secret", Password: "test-secret", address: "Item 7", contentHash: "abc" },
    });

    assert.equal(rows.length, 1);
    assert.deepEqual(rows[0].payload, {
      token: "[REDACTED]",
      Password: "[REDACTED]",
      address: "Item 7",
      contentHash: "abc",
    });
    assert.equal(rows[0].event_category, "system");
    assert.equal(rows[0].ticker, "ACME");
  });

  it("replaces an oversized payload with a summary", () => {
    const rows = capture();
    emitDossierEvent({ event_type: "analysis.completed", payload: { blob: "x".repeat(9_000) } });
    assert.equal(rows[0].payload.truncated, true);
    assert.equal(rows[0].payload.bytes, 9_011);
  });
});

describe("emitErrorEvent", () => {
  it("records the error name and message", () => {
    const rows = capture();
    emitErrorEvent("analysis.failed", new RangeError("bad period"), { ticker: "ACME", trace_id: "trace-1" });

    assert.equal(rows[0].severity, "error");
    assert.equal(rows[0].event_category, "error");
    assert.equal(rows[0].trace_id, "trace-1");
    assert.equal(rows[0].payload.error_name, "RangeError");
    assert.equal(rows[0].payload.error_message, "bad period");
  });
});
