import type { ReadingService } from '../services/readingService';
import type { WorkerSummary } from '../utils/runWorker';

/**
 * Hourly compaction of raw readings past the aggregation window into
 * min/max/avg/count buckets. The raw rows are removed once folded in.
 */
export async function runReadingAggregationWorker(readings: ReadingService): Promise<WorkerSummary> {
  const summary = await readings.aggregateReadings();
  return { ...summary, success: summary.failed === 0 };
}
