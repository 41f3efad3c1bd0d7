import { eachDay, eachMonth } from '@growatt-dashboard/integrations-core';
import { type Collector, type CollectorContext, monthSlice } from './collector.js';
import { AuthenticationError, describeError } from './errors.js';
import type { MetricPoint } from './points.js';
import type { MetricStore } from './store.js';

export interface BackfillResult {
  days: number;
  months: number;
  pointsWritten: number;
  failures: number;
}

/**
 * Backfill Logic
 *
 * Until a backfill of the plant has run to the end, fetches every day from
 * the start date up to yesterday (power curve) and every month touched by
 * that range (daily energy). A day or month that fails is logged and
 * skipped. An aborted signal stops between requests and leaves the backfill
 * unfinished, so the next start runs it again; rewritten samples replace
 * the stored ones.
 */
export async function backfillTelemetry(
  collector: Collector,
  store: MetricStore,
  ctx: CollectorContext,
  signal?: AbortSignal
): Promise<BackfillResult> {
  const plantId = ctx.plant.vendorPlantId;
  const result: BackfillResult = { days: 0, months: 0, pointsWritten: 0, failures: 0 };

  if (store.isBackfillComplete(plantId)) {
    console.log(`[Backfill] Plant ${plantId} already backfilled, skipping`);
    return result;
  }

  const range = collector.backfillRange();
  if (!range) {
    console.log(`[Backfill] Plant ${plantId} has no days before today to backfill`);
    return result;
  }

  const step = async (label: string, fetch: () => Promise<MetricPoint[]>): Promise<void> => {
    let points: MetricPoint[];
    try {
      points = await collector.withSession(ctx, fetch);
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      result.failures += 1;
      console.error(`[Backfill] Error fetching ${label} for plant ${plantId}: ${describeError(error)}`);
      return;
    }

    const written = collector.writeTelemetry(points);
    if (written.error) {
      result.failures += 1;
      return;
    }
    result.pointsWritten += written.written;
  };

  const days = eachDay(range.start, range.end);
  console.log(`[Backfill] Plant ${plantId} backfilling power for ${days.length} days`);
  for (const day of days) {
    if (signal?.aborted) return result;
    await step(`power of ${day.toString()}`, () => collector.fetchPower(ctx, day));
    result.days += 1;
  }

  const months = eachMonth(range.start, range.end);
  console.log(`[Backfill] Plant ${plantId} backfilling energy for ${months.length} months`);
  for (const month of months) {
    if (signal?.aborted) return result;
    await step(`energy of ${month.toString().slice(0, 7)}`, () =>
      collector.fetchEnergy(ctx, monthSlice(range, month))
    );
    result.months += 1;
  }

  store.markBackfillComplete(plantId, new Date());
  console.log(
    `[Backfill] Completed for plant ${plantId}: ${result.pointsWritten} points, ${result.failures} failures`
  );
  return result;
}
