/**
 * Register Trigger
 *
 * Adds, lists or removes monitoring triggers for a ticker. A trigger is a
 * condition a metric must keep until its deadline; one registered trigger
 * per (ticker, metric), so registering again replaces it. Gate-sourced
 * flip-triggers are listed too but --remove leaves them in place.
 *
 * Exit codes:
 *   0  — OK
 *   1  — invalid trigger or fatal error
 *
 * Usage:
 *   npx tsx scripts/registerTrigger.ts --ticker ACME --metric "Accruals Ratio" --comparison lte --threshold 0.15 --deadline 2025-06-30
 *   npx tsx scripts/registerTrigger.ts --ticker ACME --list
 *   npx tsx scripts/registerTrigger.ts --ticker ACME --metric "Accruals Ratio" --remove
 */

import * as dotenv from "dotenv";

import { loadDossierConfig } from "@/lib/env/server";
import { TriggerConfigError } from "@/lib/errors";
import { FileDossierStore } from "@/lib/storage";
import { TriggerMonitor, describeCondition } from "@/lib/triggers";

dotenv.config({ path: ".env.local" });

// ── CLI arg parsing ─────────────────────────────────────────────────────────

type Mode = "register" | "list" | "remove";

interface CliArgs {
  mode: Mode;
  values: Record<string, string>;
  help: boolean;
}

const VALUE_FLAGS = ["--ticker", "--metric", "--comparison", "--threshold", "--deadline", "--source", "--data-dir"];

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { mode: "register", values: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--help" || flag === "-h") {
      args.help = true;
    } else if (flag === "--list") {
      args.mode = "list";
    } else if (flag === "--remove") {
      args.mode = "remove";
    } else if (VALUE_FLAGS.includes(flag)) {
      const val = argv[i + 1];
      if (val === undefined || val.startsWith("--")) {
        console.error(`[registerTrigger] Missing value for ${flag}`);
        process.exit(1);
      }
      args.values[flag.slice(2)] = val;
      i++;
    } else {
      console.error(`[registerTrigger] Unknown argument: ${flag}`);
      process.exit(1);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Register Trigger
================
Manages the triggers evaluated on every analysis of a ticker.

Usage:
  npx tsx scripts/registerTrigger.ts --ticker T --metric M --comparison OP --threshold N --deadline YYYY-MM-DD
  npx tsx scripts/registerTrigger.ts --ticker T --list
  npx tsx scripts/registerTrigger.ts --ticker T --metric M --remove

Options:
  --comparison OP   One of gte, lte, gt, lt, eq
  --source TEXT     Free-text origin of the trigger
  --data-dir DIR    Durable store directory (default: DOSSIER_DATA_DIR)
  --help            Show this help text
`);
}

function required(values: Record<string, string>, name: string): string {
  const value = values[name];
  if (value === undefined) {
    console.error(`[registerTrigger] --${name} is required`);
    process.exit(1);
  }
  return value;
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  const config = loadDossierConfig();
  const ticker = required(args.values, "ticker");
  const store = new FileDossierStore(args.values["data-dir"] ?? config.dataDir);
  await store.init();
  const monitor = new TriggerMonitor(store);

  try {
    if (args.mode === "list") {
      const triggers = await monitor.list(ticker);
      if (triggers.length === 0) console.log(`[registerTrigger] No triggers for ${ticker.toUpperCase()}`);
      for (const t of triggers) {
        console.log(`  ${t.id}: ${describeCondition(t)} until ${t.deadline}${t.source ? ` (${t.source})` : ""}`);
      }
    } else if (args.mode === "remove") {
      const metric = required(args.values, "metric");
      const removed = await monitor.remove(ticker, metric);
      console.log(`[registerTrigger] ${removed ? "Removed" : "No trigger for"} ${ticker.toUpperCase()}:${metric}`);
    } else {
      const threshold = required(args.values, "threshold");
      const trigger = await monitor.register({
        ticker,
        metric: required(args.values, "metric"),
        comparison: required(args.values, "comparison"),
        threshold: threshold.trim() === "" ? Number.NaN : Number(threshold),
        deadline: required(args.values, "deadline"),
        ...(args.values.source !== undefined ? { source: args.values.source } : {}),
      });
      console.log(`[registerTrigger] Registered ${trigger.id}: ${describeCondition(trigger)} until ${trigger.deadline}`);
    }
  } finally {
    await store.close();
  }
  process.exit(0);
}

main().catch((e: unknown) => {
  const label = e instanceof TriggerConfigError ? `Invalid trigger (${e.code})` : "FATAL";
  console.error(`\n[registerTrigger] ${label}:`, e instanceof Error ? e.message : e);
  process.exit(1);
});
