import { describe, expect, it } from 'vitest';
import { MemoryThermalStore } from '../../test/memoryStore';
import { TestClock } from '../../test/fakes';
import { runWorker } from './runWorker';

function setup() {
  const clock = new TestClock();
  const store = new MemoryThermalStore(clock.now);
  return { clock, store, now: () => clock.now() };
}

function runOf(store: MemoryThermalStore, id: string) {
  return store.workerRunRows.get(id);
}

describe('runWorker', () => {
  it('should record a successful run with its summary', async () => {
    const { clock, store, now } = setup();

    const result = await runWorker(
      store.workerRuns,
      'reading-retention',
      async () => {
        clock.advanceMinutes(1);
        return { deleted_count: 4 };
      },
      now
    );

    expect(result).toEqual({ ok: true, runId: expect.any(String), summary: { deleted_count: 4 } });
    expect(store.workerRunRows.size).toBe(1);
    expect(runOf(store, result.runId)).toMatchObject({
      worker_name: 'reading-retention',
      status: 'success',
      success: true,
      duration_seconds: 60,
      summary: { deleted_count: 4 },
      error_message: null,
    });
  });

  it('should mark a run unsuccessful when the summary says so', async () => {
    const { store, now } = setup();

    const result = await runWorker(store.workerRuns, 'sensor-status', async () => ({ success: false, failed: 2 }), now);

    expect(result.ok).toBe(true);
    expect(runOf(store, result.runId)).toMatchObject({ status: 'failed', success: false, error_message: null });
  });

  it('should record a thrown error without rethrowing', async () => {
    const { store, now } = setup();

    const result = await runWorker(
      store.workerRuns,
      'alert-cleanup',
      async () => {
        throw new Error('connection reset');
      },
      now
    );

    expect(result).toEqual({ ok: false, runId: expect.any(String), error: 'connection reset' });
    expect(runOf(store, result.runId)).toMatchObject({
      status: 'failed',
      success: false,
      error_message: 'connection reset',
      summary: null,
    });
  });
});
