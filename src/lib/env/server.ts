import { z } from "zod";

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const DossierEnvSchema = z.object({
  // Durable store
  DOSSIER_DATA_DIR: z.string().min(1).default("data/runtime"),

  // Normalizer
  DOSSIER_BASE_CURRENCY: z.string().regex(/^[A-Z]{3}$/).default("USD"),
  DOSSIER_PERIOD_TOLERANCE_DAYS: z.coerce.number().int().nonnegative().default(7),

  // Verifier
  DOSSIER_VERIFIER_SAMPLE_SIZE: intFromEnv(5),
  DOSSIER_VERIFIER_SEED: z.coerce.number().int().default(20240601),
  DOSSIER_SOURCE_ALLOWLIST: z.string().default("sec.gov,fred.stlouisfed.org,treasury.gov"),

  // Reverse-DCF root finder
  DOSSIER_SOLVER_MAX_ITERATIONS: intFromEnv(200),
  DOSSIER_SOLVER_EPSILON: z.coerce.number().positive().default(1e-6),
  DOSSIER_SOLVER_TIME_BUDGET_MS: intFromEnv(50),

  // Gates
  DOSSIER_FLIP_TRIGGER_HORIZON_DAYS: intFromEnv(90),

  // Batch runner
  DOSSIER_ANALYSIS_CONCURRENCY: intFromEnv(4),

  // Observability
  DOSSIER_DEBUG_EVENTS: z.enum(["true", "false"]).optional(),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type DossierEnv = z.infer<typeof DossierEnvSchema>;

export interface SolverConfig {
  maxIterations: number;
  epsilon: number;
  timeBudgetMs: number;
}

export interface DossierConfig {
  dataDir: string;
  baseCurrency: string;
  periodToleranceDays: number;
  verifier: { sampleSize: number; seed: number; sourceAllowlist: string[] };
  solver: SolverConfig;
  flipTriggerHorizonDays: number;
  analysisConcurrency: number;
}

export function parseAllowlist(raw: string): string[] {
  return raw
    .split(",")
    .map((host) => host.trim().toLowerCase())
    .filter((host) => host.length > 0);
}

export function loadDossierConfig(env: NodeJS.ProcessEnv = process.env): DossierConfig {
  const parsed = DossierEnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid dossier env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid dossier environment variables (see logs).");
  }
  const e = parsed.data;
  return {
    dataDir: e.DOSSIER_DATA_DIR,
    baseCurrency: e.DOSSIER_BASE_CURRENCY,
    periodToleranceDays: e.DOSSIER_PERIOD_TOLERANCE_DAYS,
    verifier: {
      sampleSize: e.DOSSIER_VERIFIER_SAMPLE_SIZE,
      seed: e.DOSSIER_VERIFIER_SEED,
      sourceAllowlist: parseAllowlist(e.DOSSIER_SOURCE_ALLOWLIST),
    },
    solver: {
      maxIterations: e.DOSSIER_SOLVER_MAX_ITERATIONS,
      epsilon: e.DOSSIER_SOLVER_EPSILON,
      timeBudgetMs: e.DOSSIER_SOLVER_TIME_BUDGET_MS,
    },
    flipTriggerHorizonDays: e.DOSSIER_FLIP_TRIGGER_HORIZON_DAYS,
    analysisConcurrency: e.DOSSIER_ANALYSIS_CONCURRENCY,
  };
}
