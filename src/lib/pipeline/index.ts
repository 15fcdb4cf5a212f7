export { VOLATILE_REPORT_KEYS, analyzeTicker, flipTriggersFrom, reportContentHash } from "./analyze";
export type { AnalysisResult } from "./analyze";
export { commitAnalysis } from "./commit";
export type { CommitOptions } from "./commit";
export { analyzeMany } from "./batch";
export type { BatchOptions, BatchResult } from "./batch";
export type { AnalysisBundle, AnalysisConfig, AnalyzeOptions } from "./types";
