import type { VendorAdapter } from '@growatt-dashboard/integrations-core';
import { backfillTelemetry } from './backfill.js';
import { Collector, type CollectorContext } from './collector.js';
import type { CollectorConfig } from './config.js';
import { describeError } from './errors.js';
import { Scheduler } from './scheduler.js';
import type { CollectorStatus } from './status.js';
import type { MetricStore } from './store.js';

export interface CollectorRun {
  config: CollectorConfig;
  adapter: VendorAdapter;
  store: MetricStore;
  /** Aborting it ends the loop after the current cycle */
  signal: AbortSignal;
  status?: CollectorStatus;
  now?: () => Date;
}

/**
 * Log in, backfill, then poll until the signal aborts.
 * Resolves with the process exit code.
 */
export async function runCollector(run: CollectorRun): Promise<number> {
  const { plant, runtime } = run.config;

  const collector = new Collector(
    run.adapter,
    run.store,
    {
      credentials: { username: plant.username, password: plant.password },
      plant: { vendorPlantId: plant.plant_id, timezone: plant.timezone },
      startDate: plant.start_date,
      collectDeviceHistory: plant.collect_device_history,
    },
    { status: run.status, now: run.now }
  );

  const { brand, polling } = run.adapter.getCapabilities();
  if (runtime.POLL_INTERVAL_SECONDS < polling.recommendedMinIntervalSeconds) {
    console.warn(
      `[Collector] Poll interval ${runtime.POLL_INTERVAL_SECONDS}s is below the ${polling.recommendedMinIntervalSeconds}s ${brand} recommends`
    );
  }

  let ctx: CollectorContext;
  try {
    ctx = await collector.authenticate();
    console.log(`✓ Logged in as ${plant.username}`);
  } catch (error) {
    console.error('✗ Authentication failed:', describeError(error));
    return 1;
  }

  try {
    await collector.verifyPlant(ctx);

    if (plant.backfill) {
      await backfillTelemetry(collector, run.store, ctx, run.signal);
    }

    const scheduler = new Scheduler(() => collector.runCycle(ctx), runtime.POLL_INTERVAL_SECONDS);
    await scheduler.start(run.signal);
    return 0;
  } catch (error) {
    console.error('✗ Collector stopped:', describeError(error));
    return 1;
  }
}
