/**
 * Run lifecycle helpers: track batch analyses in the database
 *
 * One run = one batch over a document set for one job profile.
 * These helpers ensure every run is finalized (success or failure).
 */

import type { RunAccumulator, RunStatus } from "@/types";
import { createRun, finishRun as repoFinishRun } from "@/db";

/**
 * Start a new run for a profile
 *
 * @returns The run ID
 */
export function startRun(profileTitle: string): number {
  return createRun(profileTitle);
}

/**
 * Finish a run with status and the accumulated counters
 */
export function finishRun(
  runId: number,
  status: RunStatus,
  acc: RunAccumulator,
  notes?: string,
): void {
  repoFinishRun(runId, {
    finished_at: new Date().toISOString(),
    status,
    ...acc.counters,
    ...(notes !== undefined && { notes }),
  });
}

/**
 * Create a fresh run accumulator with zeroed counters
 */
export function createRunAccumulator(): RunAccumulator {
  return {
    counters: {
      documents_total: 0,
      documents_processed: 0,
      documents_skipped: 0,
      total_time_ms: 0,
    },
  };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On success: status = "success"
 * On error: status = "failure" with the error message in notes, then rethrows
 *
 * Counters are written in the `finally` block, so whatever `fn` managed to
 * accumulate before throwing is kept.
 *
 * @param profileTitle - Job profile the run scores against
 * @param fn - Async function to execute, receives (runId, acc)
 * @returns The result of fn
 */
export async function withRun<T>(
  profileTitle: string,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(profileTitle);
  const acc = createRunAccumulator();
  let succeeded = false;
  let failureNote: string | undefined;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } catch (err) {
    failureNote = err instanceof Error ? err.message : String(err);
    throw err;
  } finally {
    finishRun(runId, succeeded ? "success" : "failure", acc, failureNote);
  }
}
