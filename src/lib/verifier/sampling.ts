/**
 * Verifier — Deterministic Sampling
 *
 * A seeded PRNG keeps the QA sample reproducible: the same metric names
 * and seed always select the same metrics.
 */

export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

/**
 * Fisher–Yates over the sorted, de-duplicated names; returns the first
 * `size` picks in name order. All names when fewer exist.
 */
export function sampleMetricNames(names: readonly string[], size: number, seed: number): string[] {
  const pool = [...new Set(names)].sort();
  if (size >= pool.length) return pool;

  const random = mulberry32(seed);
  for (let i = pool.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, Math.max(0, size)).sort();
}
