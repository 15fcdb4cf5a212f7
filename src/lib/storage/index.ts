export { FileDossierStore, normalizeTicker } from "./fileStore";
export type { TickerTransaction } from "./fileStore";
export { readJsonFile, writeJsonAtomic } from "./atomicJson";
export { KeyedMutex } from "./keyedMutex";
