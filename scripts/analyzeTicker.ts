/**
 * Analyze Ticker
 *
 * Builds a dossier from one or more collaborator bundles and commits it to
 * the durable store (reports, delta history, triggers).
 *
 * Exit codes:
 *   0  — every dossier passed verification
 *   1  — fatal error (bad arguments, invalid bundle, typed contract error)
 *   2  — at least one dossier was blocked by the verifier
 *
 * Usage:
 *   npx tsx scripts/analyzeTicker.ts --bundle fixtures/acme-bundle.json
 *   npx tsx scripts/analyzeTicker.ts --bundle a.json --bundle b.json --data-dir data/runtime
 *   npx tsx scripts/analyzeTicker.ts --bundle a.json --dry-run
 *   npx tsx scripts/analyzeTicker.ts --help
 *
 * Env vars (read from .env.local when present): see .env.example.
 */

import * as dotenv from "dotenv";
import { readFile } from "node:fs/promises";

import { AnalysisBundleSchema } from "@/lib/dossier/schemas";
import type { DossierReport } from "@/lib/dossier/types";
import { loadDossierConfig } from "@/lib/env/server";
import { isDossierError } from "@/lib/errors";
import { analyzeMany, analyzeTicker, commitAnalysis } from "@/lib/pipeline";
import type { AnalysisBundle } from "@/lib/pipeline";
import { FileDossierStore } from "@/lib/storage";

dotenv.config({ path: ".env.local" });

// ── CLI arg parsing ─────────────────────────────────────────────────────────

interface CliArgs {
  bundles: string[];
  dataDir: string | null;
  asOf: string | null;
  dryRun: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { bundles: [], dataDir: null, asOf: null, dryRun: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--help" || flag === "-h") {
      args.help = true;
    } else if (flag === "--dry-run") {
      args.dryRun = true;
    } else if (flag === "--bundle" || flag === "--data-dir" || flag === "--as-of") {
      const val = argv[i + 1];
      if (!val || val.startsWith("--")) {
        console.error(`[analyzeTicker] Missing value for ${flag}`);
        process.exit(1);
      }
      if (flag === "--bundle") args.bundles.push(val);
      else if (flag === "--data-dir") args.dataDir = val;
      else args.asOf = val;
      i++;
    } else {
      console.error(`[analyzeTicker] Unknown argument: ${flag}`);
      process.exit(1);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Analyze Ticker
==============
Normalizes the bundle's filings, computes metrics, values the company,
evaluates gates, verifies the result and commits the dossier.

Exit codes:
  0  — every dossier passed verification
  1  — fatal error
  2  — at least one dossier was blocked by the verifier

Usage:
  npx tsx scripts/analyzeTicker.ts --bundle <path> [options]

Options:
  --bundle PATH     Analysis bundle JSON (repeatable)
  --data-dir DIR    Durable store directory (default: DOSSIER_DATA_DIR)
  --as-of DATE      Override the bundle's as-of date (YYYY-MM-DD)
  --dry-run         Analyze without reading or writing the store
  --help            Show this help text
`);
}

// ── Helpers ─────────────────────────────────────────────────────────────────

async function loadBundle(path: string, asOf: string | null): Promise<AnalysisBundle> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const parsed = AnalysisBundleSchema.safeParse(asOf && raw !== null && typeof raw === "object" ? { ...raw, asOf } : raw);
  if (!parsed.success) {
    console.error(`[analyzeTicker] Invalid bundle ${path}:`, parsed.error.flatten().fieldErrors);
    throw new Error(`Invalid bundle: ${path}`);
  }
  return parsed.data;
}

function summarize(report: DossierReport): void {
  const valuation = report.analyst.valuation;
  const baseIrr = valuation === "NA" ? "NA" : String(valuation.scenarios.Base.irr);
  console.log(`\n${report.ticker} as of ${report.asOf}`);
  console.log(`  path:      ${report.analyst.path}`);
  console.log(`  base IRR:  ${baseIrr}`);
  console.log(`  verifier:  ${report.verifier.status}`);
  for (const reason of [...report.analyst.pathReasons, ...report.verifier.reasons]) {
    console.log(`    - ${reason}`);
  }
  for (const alert of report.triggers) {
    console.log(`  trigger ${alert.status}: ${alert.message}`);
  }
  console.log(`  hash:      ${report.contentHash}`);
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.bundles.length === 0) {
    console.error(`[analyzeTicker] At least one --bundle is required (see --help)`);
    process.exit(1);
  }

  const config = loadDossierConfig();
  const bundles = await Promise.all(args.bundles.map((path) => loadBundle(path, args.asOf)));
  const reports: DossierReport[] = [];
  let failures = 0;

  if (args.dryRun) {
    for (const bundle of bundles) reports.push(analyzeTicker(bundle, { config }).report);
  } else {
    const store = new FileDossierStore(args.dataDir ?? config.dataDir);
    await store.init();
    try {
      if (bundles.length === 1) {
        const [bundle] = bundles;
        reports.push((await commitAnalysis(store, bundle, { config })).report);
      } else {
        const results = await analyzeMany(store, bundles, { config, concurrency: config.analysisConcurrency });
        for (const result of results) {
          if (result.ok) {
            reports.push(result.report);
          } else {
            failures++;
            console.error(`[analyzeTicker] ${result.ticker} failed: ${result.error}`);
          }
        }
      }
    } finally {
      await store.close();
    }
  }

  reports.forEach(summarize);

  if (failures > 0) process.exit(1);
  if (reports.some((r) => r.verifier.status === "BLOCKER")) {
    console.log(`\n[analyzeTicker] BLOCKER: at least one dossier failed verification`);
    process.exit(2);
  }
  console.log(`\n[analyzeTicker] OK`);
  process.exit(0);
}

main().catch((e: unknown) => {
  const label = isDossierError(e) ? `${e.name} ${e.code}` : "FATAL";
  console.error(`\n[analyzeTicker] ${label}:`, e instanceof Error ? e.message : e);
  process.exit(1);
});
