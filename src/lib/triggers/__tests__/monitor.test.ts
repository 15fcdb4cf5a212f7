import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Metric, Trigger } from "@/lib/dossier/types";
import { TriggerConfigError } from "@/lib/errors";
import { setEventSink } from "@/lib/observability/emitEvent";
import type { EventRow } from "@/lib/observability/emitEvent";
import { TriggerMonitor, evaluateTriggers, gateTriggerId, parseTriggerInput, upsertTrigger } from "../index";
import type { TriggerRepository } from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

class MemoryTriggerRepository implements TriggerRepository {
  readonly byTicker = new Map<string, Trigger[]>();
  saves = 0;

  async listTriggers(ticker: string): Promise<Trigger[]> {
    return [...(this.byTicker.get(ticker) ?? [])];
  }

  async updateTriggers(ticker: string, update: (current: Trigger[]) => Trigger[]): Promise<Trigger[]> {
    const next = update(await this.listTriggers(ticker));
    this.saves++;
    this.byTicker.set(ticker, [...next]);
    return next;
  }
}

const MARGIN_FLOOR: Trigger = {
  id: "ACME:Gross Margin",
  ticker: "ACME",
  metric: "Gross Margin",
  threshold: 0.22,
  comparison: "gte",
  deadline: "2025-06-30",
};

function metric(name: string, value: number | "NA"): Metric {
  return {
    name,
    value,
    unit: "ratio",
    period: "2025-Q1",
    category: "derived",
    provenance: { documentId: "doc-10q", pageOrSection: "Item 2", quote: "gross margin", url: "https://www.sec.gov/q.htm" },
  };
}

const events: EventRow[] = [];
let restoreSink: () => void = () => undefined;

before(() => {
  restoreSink = setEventSink((row) => events.push(row));
});

after(() => {
  restoreSink();
});

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

describe("evaluateTriggers", () => {
  it("reports a BREACH when the kept condition is violated before the deadline", () => {
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": 0.2 }, "2025-03-31"), [
      {
        triggerId: "ACME:Gross Margin",
        metric: "Gross Margin",
        status: "BREACH",
        message: "Gross Margin ≥ 0.22 breached: value 0.2",
        daysRemaining: 91,
      },
    ]);
  });

  it("stays silent while the condition holds", () => {
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": 0.23 }, "2025-03-31"), []);
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": 0.22 }, "2025-06-30"), []);
  });

  it("marks a missing value PENDING before the deadline", () => {
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": "NA" }, "2025-03-31"), [
      {
        triggerId: "ACME:Gross Margin",
        metric: "Gross Margin",
        status: "PENDING",
        message: "Gross Margin ≥ 0.22 awaiting a reported value (91 days left)",
        daysRemaining: 91,
      },
    ]);
  });

  it("expires unmet or unresolved triggers once the deadline has passed", () => {
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": 0.2 }, "2025-07-02"), [
      {
        triggerId: "ACME:Gross Margin",
        metric: "Gross Margin",
        status: "EXPIRED",
        message: "Gross Margin ≥ 0.22 not met by 2025-06-30 (value 0.2)",
        daysRemaining: -2,
      },
    ]);
    assert.equal(evaluateTriggers([MARGIN_FLOOR], {}, "2025-07-02")[0]?.message, "Gross Margin ≥ 0.22 unresolved at 2025-06-30: no value reported");
  });

  it("resolves silently when the condition held at expiry", () => {
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR], { "Gross Margin": 0.25 }, "2025-07-02"), []);
  });

  it("compares eq within a small tolerance", () => {
    const pinned: Trigger = { ...MARGIN_FLOOR, comparison: "eq", threshold: 0.3 };
    assert.deepEqual(evaluateTriggers([pinned], { "Gross Margin": 0.1 + 0.2 }, "2025-03-31"), []);
    assert.equal(evaluateTriggers([pinned], { "Gross Margin": 0.31 }, "2025-03-31")[0]?.status, "BREACH");
  });

  it("sorts alerts by metric and reproduces them exactly", () => {
    const leverage: Trigger = { ...MARGIN_FLOOR, id: "ACME:Net Debt / EBITDA", metric: "Net Debt / EBITDA", comparison: "lte", threshold: 2 };
    const values = { "Gross Margin": 0.2, "Net Debt / EBITDA": 2.5 };
    const first = evaluateTriggers([leverage, MARGIN_FLOOR], values, "2025-03-31");
    assert.deepEqual(first.map((a) => a.metric), ["Gross Margin", "Net Debt / EBITDA"]);
    assert.deepEqual(evaluateTriggers([MARGIN_FLOOR, leverage], values, "2025-03-31"), first);
  });
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe("parseTriggerInput", () => {
  const valid = { ticker: "acme", metric: "Gross Margin", threshold: 0.22, comparison: "gte", deadline: "2025-06-30" };

  it("normalizes the ticker and derives the id", () => {
    assert.deepEqual(parseTriggerInput(valid), MARGIN_FLOOR);
  });

  it("rejects invalid definitions with a typed code", () => {
    const cases: Array<[Record<string, unknown>, string]> = [
      [{ ...valid, comparison: "gtee" }, "INVALID_OPERATOR"],
      [{ ...valid, threshold: Number.NaN }, "INVALID_THRESHOLD"],
      [{ ...valid, threshold: Number.POSITIVE_INFINITY }, "INVALID_THRESHOLD"],
      [{ ...valid, deadline: "2025-02-30" }, "INVALID_DEADLINE"],
      [{ ...valid, ticker: "" }, "INVALID_TRIGGER"],
    ];
    for (const [input, code] of cases) {
      assert.throws(
        () => parseTriggerInput(input),
        (err: unknown) => err instanceof TriggerConfigError && err.code === code,
      );
    }
  });
});

describe("TriggerMonitor", () => {
  it("persists nothing when registration is rejected", async () => {
    const repo = new MemoryTriggerRepository();
    const monitor = new TriggerMonitor(repo);
    await assert.rejects(
      monitor.register({ ticker: "ACME", metric: "Gross Margin", threshold: 0.22, comparison: "between", deadline: "2025-06-30" }),
      (err: unknown) => err instanceof TriggerConfigError && err.code === "INVALID_OPERATOR",
    );
    assert.equal(repo.saves, 0);
    assert.equal(events.at(-1)?.event_type, "trigger.rejected");
  });

  it("upserts by ticker and metric and lists by deadline", async () => {
    const monitor = new TriggerMonitor(new MemoryTriggerRepository());
    await monitor.register({ ticker: "ACME", metric: "Gross Margin", threshold: 0.2, comparison: "gte", deadline: "2025-09-30" });
    await monitor.register({ ticker: "ACME", metric: "ROIC", threshold: 0.1, comparison: "gt", deadline: "2025-08-31" });
    await monitor.register({ ticker: "acme", metric: "Gross Margin", threshold: 0.22, comparison: "gte", deadline: "2025-06-30" });

    const listed = await monitor.list("ACME");
    assert.deepEqual(listed.map((t) => [t.metric, t.threshold]), [
      ["Gross Margin", 0.22],
      ["ROIC", 0.1],
    ]);
  });

  it("evaluates against the latest metrics and removes triggers", async () => {
    const monitor = new TriggerMonitor(new MemoryTriggerRepository());
    await monitor.register({ ticker: "ACME", metric: "Gross Margin", threshold: 0.22, comparison: "gte", deadline: "2025-06-30" });

    const alerts = await monitor.evaluate("ACME", [metric("Gross Margin", 0.2)], "2025-03-31");
    assert.deepEqual(alerts.map((a) => a.status), ["BREACH"]);

    assert.equal(await monitor.remove("ACME", "Gross Margin"), true);
    assert.equal(await monitor.remove("ACME", "Gross Margin"), false);
    assert.deepEqual(await monitor.evaluate("ACME", [metric("Gross Margin", 0.2)], "2025-03-31"), []);
  });

  it("keeps gate-sourced triggers beside the user's trigger on the same metric", async () => {
    const repo = new MemoryTriggerRepository();
    const monitor = new TriggerMonitor(repo);
    await monitor.register({ ticker: "ACME", metric: "Gross Margin", threshold: 0.22, comparison: "gte", deadline: "2025-06-30" });
    const fromGate: Trigger = {
      ...MARGIN_FLOOR,
      id: gateTriggerId("acme", "Gross Margin", "unit_economics"),
      threshold: 0.1,
      deadline: "2025-05-16",
      source: "gate:unit_economics",
    };
    await repo.updateTriggers("ACME", (current) => upsertTrigger(current, fromGate));

    assert.deepEqual(
      (await monitor.list("ACME")).map((t) => t.id),
      ["ACME:Gross Margin:gate:unit_economics", "ACME:Gross Margin"],
    );

    assert.equal(await monitor.remove("ACME", "Gross Margin"), true);
    assert.deepEqual(
      (await monitor.list("ACME")).map((t) => t.id),
      ["ACME:Gross Margin:gate:unit_economics"],
    );
  });
});
