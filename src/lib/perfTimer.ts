/**
 * Performance instrumentation for analysis pipeline stages.
 */

import { logger } from "./logger";

const timings: Record<string, number[]> = {};

/** Keep the most recent samples per label so long sessions stay bounded */
const MAX_SAMPLES = 500;

export function startTimer(label: string): () => number {
  const start = performance.now();
  return () => {
    const elapsed = performance.now() - start;
    const list = (timings[label] ??= []);
    list.push(elapsed);
    if (list.length > MAX_SAMPLES) list.shift();
    logger.debug(`[perf] ${label}: ${elapsed.toFixed(2)}ms`);
    return elapsed;
  };
}

export function getTimings(): Record<string, { avg: number; max: number; count: number }> {
  const result: Record<string, { avg: number; max: number; count: number }> = {};
  for (const [label, times] of Object.entries(timings)) {
    const avg = times.reduce((a, b) => a + b, 0) / times.length;
    const max = Math.max(...times);
    result[label] = { avg, max, count: times.length };
  }
  return result;
}

export function clearTimings(): void {
  for (const key of Object.keys(timings)) delete timings[key];
}
