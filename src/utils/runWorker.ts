import type { WorkerRunRepository } from '../db/store';
import { errorMessage } from '../errors';
import { logger } from './logger';

const log = logger.child({ module: 'worker' });

export type WorkerSummary = Record<string, unknown>;
export type WorkerFn = () => Promise<WorkerSummary>;

export type WorkerRunResult =
  | { ok: true; runId: string; summary: WorkerSummary }
  | { ok: false; runId: string; error: string };

/**
 * Runs one housekeeping worker and records it in worker_runs. A worker that
 * throws is recorded as failed and reported, not rethrown.
 */
export async function runWorker(
  runs: WorkerRunRepository,
  workerName: string,
  workerFn: WorkerFn,
  now: () => Date = () => new Date()
): Promise<WorkerRunResult> {
  const startedAt = now();
  log.info({ worker: workerName }, `⚙️ Starting worker: ${workerName}`);
  const runId = await runs.start(workerName, startedAt);

  const elapsed = () => (now().getTime() - startedAt.getTime()) / 1000;

  try {
    const summary = await workerFn();
    const duration = elapsed();
    await runs.finish(runId, { success: summary.success !== false, durationSeconds: duration, summary }, now());

    log.info({ worker: workerName, duration, ...summary }, `✅ Worker ${workerName} finished in ${duration.toFixed(2)}s`);
    return { ok: true, runId, summary };
  } catch (err) {
    const duration = elapsed();
    const error = errorMessage(err);
    log.error({ worker: workerName, duration, err: error }, `❌ Worker ${workerName} failed`);

    await runs.finish(runId, { success: false, durationSeconds: duration, error }, now());
    return { ok: false, runId, error };
  }
}
