// src/cron.ts
import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { WorkerRunRepository } from './db/store';
import { errorMessage } from './errors';
import { logger } from './utils/logger';
import { runWorker } from './utils/runWorker';
import { WORKER_NAMES } from './workers';
import type { WorkerName, WorkerRegistry } from './workers';

const log = logger.child({ module: 'cron' });

export const SCHEDULES: Record<WorkerName, string> = {
  'sensor-status': '* * * * *',
  'reading-aggregation': '0 * * * *',
  'reading-retention': '0 3 * * *',
  'command-log-retention': '15 3 * * *',
  'alert-cleanup': '30 3 * * *',
  'alert-escalation': '*/5 * * * *',
};

/**
 * Schedules every worker. A tick that arrives while the previous run of the
 * same worker is still going is skipped.
 */
export function startCronJobs(workers: WorkerRegistry, runs: WorkerRunRepository): ScheduledTask[] {
  log.info('🕐 Starting cron jobs...');
  const running = new Set<WorkerName>();
  const tasks: ScheduledTask[] = [];

  for (const name of WORKER_NAMES) {
    const worker = workers[name];
    tasks.push(
      cron.schedule(SCHEDULES[name], async () => {
        if (running.has(name)) {
          log.warn({ worker: name }, 'Previous run still in progress, skipping');
          return;
        }
        running.add(name);
        try {
          await runWorker(runs, name, worker);
        } catch (err) {
          log.error({ worker: name, err: errorMessage(err) }, '[CRON] Worker could not be recorded');
        } finally {
          running.delete(name);
        }
      })
    );
  }

  log.info({ count: tasks.length }, '✅ All cron jobs scheduled');
  return tasks;
}
