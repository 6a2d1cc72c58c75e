import type { ReadingService } from '../services/readingService';
import type { WorkerSummary } from '../utils/runWorker';

export async function runReadingRetentionWorker(readings: ReadingService): Promise<WorkerSummary> {
  return { deleted_count: await readings.cleanupOldReadings() };
}
