import type { StageName, StageResult } from '../types/pipeline.js';
import { errorMessage } from './errors.js';

/**
 * Reject after `ms`. The wrapped promise keeps running and its result is
 * discarded; in-flight writes are never aborted half-applied.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Run one external stage under a timeout and fold any failure into an
 * unavailable StageResult carrying `fallback`.
 */
export async function runStage<T>(
  stage: StageName,
  timeoutMs: number,
  fallback: T,
  fn: () => Promise<T>
): Promise<StageResult<T>> {
  const startedAt = Date.now();

  try {
    const value = await withTimeout(fn(), timeoutMs, stage);
    return { stage, ok: true, value, durationMs: Date.now() - startedAt };
  } catch (error) {
    const reason = errorMessage(error);
    console.warn(`[Pipeline] Stage ${stage} unavailable, continuing degraded: ${reason}`);
    return { stage, ok: false, value: fallback, durationMs: Date.now() - startedAt, reason };
  }
}

/**
 * A stage that had nothing to do. Counts as available.
 */
export function skippedStage<T>(stage: StageName, value: T): StageResult<T> {
  return { stage, ok: true, value, durationMs: 0 };
}
